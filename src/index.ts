/**
 * Host Auditor: host security signal report
 *
 * Programmatic API for scripts that want the report without the CLI.
 *
 * @example
 * ```typescript
 * import { audit, generateReport } from 'host-auditor';
 *
 * const result = await audit();
 * console.log(result.absent); // probes that could not run
 *
 * // Run, render and write security_report_<timestamp>.txt into /var/tmp
 * const { path } = await generateReport({ directory: '/var/tmp' });
 * ```
 */

import type { AuditResult, CollectorName, ReportOutcome } from "./core/models.js";
import { AuditContext, type AuditCallbacks, type ErrorReporter } from "./core/context.js";
import { Auditor, generateReport as generate } from "./core/auditor.js";
import type { CommandRunner } from "./utils/shell.js";

export interface AuditOptions {
  collectors?: CollectorName[];
  runner?: CommandRunner;
  directory?: string;
  now?: () => Date;
  callbacks?: AuditCallbacks;
  reportError?: ErrorReporter;
}

export async function audit(options: AuditOptions = {}): Promise<AuditResult> {
  return new Auditor().run(new AuditContext(options));
}

export async function generateReport(options: AuditOptions = {}): Promise<ReportOutcome> {
  return generate(new AuditContext(options));
}

// Re-export types for consumers
export {
  type AuditResult,
  type CollectorName,
  type CommandFailure,
  type CommandResult,
  type FailureKind,
  type ListeningSocket,
  type ReportOutcome,
  type ReportSection,
  ALL_COLLECTORS,
  VERSION,
} from "./core/models.js";
export { AuditContext, type AuditCallbacks, type ErrorReporter } from "./core/context.js";
export { parseListeningSockets } from "./parsers/ss.js";
export { renderText, writeReport, reportFileName, ReportWriteError } from "./report/index.js";
export {
  createCommandRunner,
  runCommand,
  describeFailure,
  COMMAND_TIMEOUT_MS,
  type CommandRunner,
  type FailureReporter,
  type RunOptions,
  type RunnerOptions,
} from "./utils/index.js";
