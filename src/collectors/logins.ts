import type { ReportSection } from "../core/models.js";
import type { CommandRunner } from "../utils/shell.js";
import { BaseCollector } from "./base.js";

export const LOGIN_HISTORY_LIMIT = 10;

export class LoginsCollector extends BaseCollector {
  readonly name = "logins" as const;
  readonly header = `--- Last ${LOGIN_HISTORY_LIMIT} Logins ---`;
  readonly label = `Retrieving last ${LOGIN_HISTORY_LIMIT} logins`;

  async collect(runner: CommandRunner): Promise<ReportSection | null> {
    const result = runner.run(["last", "-n", String(LOGIN_HISTORY_LIMIT)]);
    if (!result.ok) return null;

    return this.section(result.output || "No login history found.");
  }
}
