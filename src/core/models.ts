export const VERSION = "0.1.0";

export type CollectorName = "users" | "logins" | "ports" | "cloud";

export const ALL_COLLECTORS: CollectorName[] = [
  "users",
  "logins",
  "ports",
  "cloud",
];

export type FailureKind = "not_found" | "non_zero_exit" | "timeout";

export type CommandFailure =
  | { kind: "not_found"; command: string }
  | {
      kind: "non_zero_exit";
      argv: string[];
      exitCode: number | null;
      signal: NodeJS.Signals | null;
      stderr: string;
    }
  | { kind: "timeout"; argv: string[]; timeoutMs: number };

export type CommandResult =
  | { ok: true; output: string }
  | { ok: false; failure: CommandFailure };

export interface ListeningSocket {
  localAddressPort: string;
  /** "N/A" when the descriptor is missing or carries no quoted name. */
  processName: string;
}

export interface ReportSection {
  collector: CollectorName;
  header: string;
  body: string;
}

export interface AuditResult {
  generatedAt: Date;
  sections: ReportSection[];
  /** Collectors whose probe failed and contributed nothing. */
  absent: CollectorName[];
  durationMs: number;
}

export interface ReportOutcome {
  result: AuditResult;
  text: string;
  /** null when the report could not be written. */
  path: string | null;
}
