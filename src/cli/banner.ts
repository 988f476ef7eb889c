import chalk from "chalk";
import { VERSION } from "../core/models.js";
import { getPlatformInfo } from "../utils/platform.js";
import { isRoot } from "../utils/permissions.js";

export function printBanner(): void {
  const platform = getPlatformInfo();

  console.error("");
  console.error(
    chalk.bold("  Host Auditor") +
      chalk.dim(` - Security Signal Report v${VERSION}`)
  );
  console.error(
    chalk.dim(`  ${platform.hostname} | ${platform.os} | kernel ${platform.kernel}`)
  );

  if (!isRoot()) {
    console.error(
      chalk.yellow(
        "\n  Warning: Not running as root. Process names and login history may be incomplete."
      )
    );
  }

  console.error("");
}
