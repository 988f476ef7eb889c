import type { CollectorName, ReportSection } from "../core/models.js";
import type { CommandRunner } from "../utils/shell.js";

export abstract class BaseCollector {
  abstract readonly name: CollectorName;
  abstract readonly header: string;
  /** Progress text shown while the probe runs. */
  abstract readonly label: string;

  /** Resolves to null when the probe could not run (an absent section). */
  abstract collect(runner: CommandRunner): Promise<ReportSection | null>;

  protected section(body: string): ReportSection {
    return { collector: this.name, header: this.header, body };
  }
}
