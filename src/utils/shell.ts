import { spawnSync } from "node:child_process";
import chalk from "chalk";
import type { CommandFailure, CommandResult } from "../core/models.js";

export const COMMAND_TIMEOUT_MS = 10_000;

export interface RunOptions {
  suppressErrorOutput?: boolean;
}

export type FailureReporter = (failure: CommandFailure) => void;

export interface CommandRunner {
  run(argv: readonly string[], options?: RunOptions): CommandResult;
}

export interface RunnerOptions {
  timeoutMs?: number;
  onFailure?: FailureReporter;
}

export function describeFailure(failure: CommandFailure): string[] {
  switch (failure.kind) {
    case "not_found":
      return [`Error: Command not found: '${failure.command}'`];
    case "non_zero_exit":
      return [
        `Error executing command: '${failure.argv.join(" ")}'`,
        `  Stderr: ${failure.stderr}`,
      ];
    case "timeout":
      return [
        `Error: Command timed out after ${failure.timeoutMs}ms: '${failure.argv.join(" ")}'`,
      ];
  }
}

export const printFailure: FailureReporter = (failure) => {
  for (const line of describeFailure(failure)) {
    console.error(chalk.red(line));
  }
};

function errorCode(err: Error): string | undefined {
  return "code" in err && typeof err.code === "string" ? err.code : undefined;
}

/**
 * Runs argv[0] with the remaining entries as its arguments, never through a
 * shell. A child that outlives `timeoutMs` is SIGKILLed and reaped before
 * this returns.
 */
export function runCommand(argv: readonly string[], timeoutMs = COMMAND_TIMEOUT_MS): CommandResult {
  const [command, ...args] = argv;
  if (command === undefined || command.length === 0) {
    return { ok: false, failure: { kind: "not_found", command: "" } };
  }

  const result = spawnSync(command, args, {
    encoding: "utf-8",
    stdio: ["ignore", "pipe", "pipe"],
    timeout: timeoutMs,
    killSignal: "SIGKILL",
    maxBuffer: 10 * 1024 * 1024,
  });

  if (result.error) {
    const code = errorCode(result.error);
    if (code === "ETIMEDOUT") {
      return { ok: false, failure: { kind: "timeout", argv: [...argv], timeoutMs } };
    }
    if (code === "ENOENT" || code === "EACCES") {
      return { ok: false, failure: { kind: "not_found", command } };
    }
    return {
      ok: false,
      failure: {
        kind: "non_zero_exit",
        argv: [...argv],
        exitCode: result.status,
        signal: result.signal,
        stderr: result.error.message,
      },
    };
  }

  if (result.status !== 0) {
    return {
      ok: false,
      failure: {
        kind: "non_zero_exit",
        argv: [...argv],
        exitCode: result.status,
        signal: result.signal,
        stderr: result.stderr.trim(),
      },
    };
  }

  return { ok: true, output: result.stdout.trimEnd() };
}

export function createCommandRunner(opts: RunnerOptions = {}): CommandRunner {
  const timeoutMs = opts.timeoutMs ?? COMMAND_TIMEOUT_MS;
  const onFailure = opts.onFailure ?? printFailure;

  return {
    run(argv, options = {}) {
      const result = runCommand(argv, timeoutMs);
      if (!result.ok && !options.suppressErrorOutput) {
        onFailure(result.failure);
      }
      return result;
    },
  };
}
