#!/usr/bin/env node

import { Command } from "commander";
import chalk from "chalk";
import { ALL_COLLECTORS, VERSION } from "../core/models.js";
import { AuditContext } from "../core/context.js";
import { generateReport } from "../core/auditor.js";
import { createCommandRunner, describeFailure } from "../utils/shell.js";
import { printBanner } from "./banner.js";
import { createProgress } from "./display.js";

const program = new Command();

program
  .name("host-audit")
  .description("Collect host security signals into a timestamped text report")
  .version(VERSION)
  .action(async () => {
    const interactive = process.stderr.isTTY === true;

    if (interactive) {
      printBanner();
    }

    const progress = createProgress({ interactive, total: ALL_COLLECTORS.length });

    const ctx = new AuditContext({
      runner: createCommandRunner({
        onFailure: (failure) => {
          for (const line of describeFailure(failure)) progress.print(chalk.red(line));
        },
      }),
      callbacks: progress.callbacks,
      reportError: (message) => progress.print(chalk.red.bold(message)),
    });

    const { path } = await generateReport(ctx);

    if (path) {
      console.error(chalk.green(`Report saved to ${path}`));
    }
  });

await program.parseAsync();
