import type { ReportSection } from "../core/models.js";
import type { CommandRunner } from "../utils/shell.js";
import { BaseCollector } from "./base.js";

export const METADATA_URL = "http://169.254.169.254/latest/meta-data/";

export const METADATA_REACHABLE =
  "Cloud metadata service is reachable. This is likely a cloud instance.";
export const METADATA_UNREACHABLE =
  "Cloud metadata service is not reachable. This is likely not a cloud instance.";

export class CloudMetadataCollector extends BaseCollector {
  readonly name = "cloud" as const;
  readonly header = "--- Cloud Metadata Check ---";
  readonly label = "Probing cloud metadata service";

  async collect(runner: CommandRunner): Promise<ReportSection> {
    // Unreachable is the normal outcome off-cloud, so failures stay quiet.
    const result = runner.run(
      ["curl", "-s", "--connect-timeout", "1", METADATA_URL],
      { suppressErrorOutput: true },
    );

    const reachable = result.ok && result.output.length > 0;
    return this.section(reachable ? METADATA_REACHABLE : METADATA_UNREACHABLE);
  }
}
