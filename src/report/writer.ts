import { writeFileSync } from "node:fs";
import { join } from "node:path";
import { formatFileTimestamp } from "../utils/time.js";

export class ReportWriteError extends Error {
  override name = "ReportWriteError";

  constructor(readonly path: string, cause: unknown) {
    super(
      `Could not write report to ${path}: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause },
    );
  }
}

export function reportFileName(date: Date, sequence = 0): string {
  const suffix = sequence > 0 ? `_${sequence}` : "";
  return `security_report_${formatFileTimestamp(date)}${suffix}.txt`;
}

function isFileExists(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "EEXIST";
}

/**
 * Writes the report without ever replacing an existing one: a name already
 * taken within the same second gets a _1, _2, ... suffix.
 */
export function writeReport(text: string, opts: { directory: string; date: Date }): string {
  for (let sequence = 0; ; sequence++) {
    const path = join(opts.directory, reportFileName(opts.date, sequence));
    try {
      writeFileSync(path, text, { encoding: "utf-8", flag: "wx" });
      return path;
    } catch (err) {
      if (isFileExists(err)) continue;
      throw new ReportWriteError(path, err);
    }
  }
}
