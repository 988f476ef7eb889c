import type { AuditResult, CollectorName, ReportOutcome, ReportSection } from "./models.js";
import type { AuditContext } from "./context.js";
import { COLLECTOR_REGISTRY } from "../collectors/index.js";
import { renderText } from "../report/text.js";
import { writeReport, ReportWriteError } from "../report/writer.js";

export class Auditor {
  async run(ctx: AuditContext): Promise<AuditResult> {
    const startTime = Date.now();
    const sections: ReportSection[] = [];
    const absent: CollectorName[] = [];

    // Sequential on purpose: report order is collector order.
    for (const name of ctx.collectors) {
      ctx.callbacks.onCollectorStart?.(name);

      const collectorStart = Date.now();
      let section: ReportSection | null = null;

      try {
        section = await COLLECTOR_REGISTRY[name].collect(ctx.runner);
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        ctx.reportError(`Error: ${name} probe failed: ${message}`);
      }

      ctx.callbacks.onCollectorComplete?.(name, Date.now() - collectorStart, section !== null);

      if (section) sections.push(section);
      else absent.push(name);
    }

    return {
      generatedAt: ctx.now(),
      sections,
      absent,
      durationMs: Date.now() - startTime,
    };
  }
}

export async function generateReport(ctx: AuditContext): Promise<ReportOutcome> {
  const result = await new Auditor().run(ctx);
  const text = renderText(result);

  let path: string | null = null;
  try {
    path = writeReport(text, { directory: ctx.directory, date: result.generatedAt });
  } catch (err) {
    if (!(err instanceof ReportWriteError)) throw err;
    ctx.reportError(`CRITICAL: ${err.message}`);
  }

  return { result, text, path };
}
