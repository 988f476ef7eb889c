import type { ListeningSocket, ReportSection } from "../core/models.js";
import type { CommandRunner } from "../utils/shell.js";
import { parseListeningSockets } from "../parsers/ss.js";
import { BaseCollector } from "./base.js";

export class PortsCollector extends BaseCollector {
  readonly name = "ports" as const;
  readonly header = "--- Listening Ports ---";
  readonly label = "Checking listening ports";

  async collect(runner: CommandRunner): Promise<ReportSection | null> {
    // TCP + UDP, listening only, numeric, with owning process
    const result = runner.run(["ss", "-tulnp"]);
    if (!result.ok) return null;

    const sockets = parseListeningSockets(result.output);
    if (sockets.length === 0) {
      return this.section("No listening ports found.");
    }

    return this.section(sockets.map(formatSocket).join("\n"));
  }
}

export function formatSocket(socket: ListeningSocket): string {
  return `${socket.localAddressPort.padEnd(30)} ${socket.processName}`;
}
