import ora, { type Ora } from "ora";
import chalk from "chalk";
import type { CollectorName } from "../core/models.js";
import type { AuditCallbacks } from "../core/context.js";
import { COLLECTOR_REGISTRY } from "../collectors/index.js";

export interface Progress {
  callbacks: AuditCallbacks;
  /** Prints a diagnostic line without tearing the spinner. */
  print(line: string): void;
}

export function createProgress(opts: { interactive: boolean; total: number }): Progress {
  let spinner: Ora | null = null;
  let completedCount = 0;

  const labelFor = (collector: CollectorName): string => COLLECTOR_REGISTRY[collector].label;
  const counter = (): string => chalk.dim(`[${completedCount + 1}/${opts.total}] `);

  return {
    callbacks: {
      onCollectorStart(collector) {
        const label = labelFor(collector);
        if (!opts.interactive) {
          console.error(`${label}...`);
          return;
        }
        spinner = ora({ text: counter() + label, stream: process.stderr }).start();
      },
      onCollectorComplete(collector, durationMs, present) {
        completedCount++;
        if (!spinner) return;
        const label = labelFor(collector);
        if (present) {
          spinner.succeed(`${label} ${chalk.dim(`(${durationMs}ms)`)}`);
        } else {
          spinner.warn(`${label} ${chalk.dim("(no output, section skipped)")}`);
        }
        spinner = null;
      },
    },
    print(line) {
      if (spinner) {
        spinner.clear();
        console.error(line);
        spinner.render();
      } else {
        console.error(line);
      }
    },
  };
}
