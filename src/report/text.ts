import type { AuditResult } from "../core/models.js";
import { formatTimestamp } from "../utils/time.js";

export const REPORT_TITLE = "=== System Security Audit Report ===";
const RULE = "=".repeat(40);

export function renderText(result: AuditResult): string {
  const head = [
    REPORT_TITLE,
    `Generated on: ${formatTimestamp(result.generatedAt)}`,
    RULE,
  ].join("\n");

  const body = result.sections
    .map((s) => `${s.header}\n${s.body}\n`)
    .join("\n");

  return `${head}\n\n${body}`;
}
