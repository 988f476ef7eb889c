import type { ReportSection } from "../core/models.js";
import type { CommandRunner } from "../utils/shell.js";
import { BaseCollector } from "./base.js";

export class UsersCollector extends BaseCollector {
  readonly name = "users" as const;
  readonly header = "--- Active Users ---";
  readonly label = "Checking for active users";

  async collect(runner: CommandRunner): Promise<ReportSection | null> {
    const result = runner.run(["who"]);
    if (!result.ok) return null;

    return this.section(result.output || "No active users found.");
  }
}
