import chalk from "chalk";
import { type CollectorName, ALL_COLLECTORS } from "./models.js";
import { type CommandRunner, createCommandRunner } from "../utils/shell.js";

export interface AuditCallbacks {
  onCollectorStart?: (collector: CollectorName) => void;
  onCollectorComplete?: (collector: CollectorName, durationMs: number, present: boolean) => void;
}

/** Sink for operator-facing errors that are not command failures. */
export type ErrorReporter = (message: string) => void;

export const printError: ErrorReporter = (message) => {
  console.error(chalk.red(message));
};

export class AuditContext {
  readonly collectors: CollectorName[];
  readonly runner: CommandRunner;
  readonly directory: string;
  readonly now: () => Date;
  readonly callbacks: AuditCallbacks;
  readonly reportError: ErrorReporter;

  constructor(opts: {
    collectors?: CollectorName[];
    runner?: CommandRunner;
    directory?: string;
    now?: () => Date;
    callbacks?: AuditCallbacks;
    reportError?: ErrorReporter;
  } = {}) {
    this.collectors = opts.collectors ?? [...ALL_COLLECTORS];
    this.runner = opts.runner ?? createCommandRunner();
    this.directory = opts.directory ?? process.cwd();
    this.now = opts.now ?? (() => new Date());
    this.callbacks = opts.callbacks ?? {};
    this.reportError = opts.reportError ?? printError;
  }
}
