import { hostname, release } from "node:os";
import { runCommand } from "./shell.js";

export interface PlatformInfo {
  hostname: string;
  os: string;
  kernel: string;
}

function prettyName(): string {
  const result = runCommand(["lsb_release", "-ds"], 2_000);
  return result.ok && result.output ? result.output.replace(/"/g, "") : "Linux";
}

export function getPlatformInfo(): PlatformInfo {
  return {
    hostname: hostname(),
    os: prettyName(),
    kernel: release(),
  };
}
