import type { ListeningSocket } from "../core/models.js";

const MIN_FIELDS = 5;
const UNKNOWN_PROCESS = "N/A";

/**
 * Parses `ss -tulnp` style output into listening sockets.
 *
 * The first line is always a header. With a leading Netid column (what
 * `ss -tulnp` prints) the local address is field 4 and the process
 * descriptor field 6; without it both shift one to the left.
 */
export function parseListeningSockets(rawOutput: string): ListeningSocket[] {
  const [header = "", ...records] = rawOutput.split("\n");
  const offset = header.trim().startsWith("Netid") ? 0 : -1;
  const sockets: ListeningSocket[] = [];

  for (const line of records) {
    if (!line.trim()) continue;

    const parts = line.trim().split(/\s+/);
    if (parts.length < MIN_FIELDS) continue;

    sockets.push({
      localAddressPort: parts[4 + offset],
      processName: extractProcessName(parts[6 + offset]),
    });
  }

  return sockets;
}

// users:(("sshd",pid=1,fd=3)) -> sshd
export function extractProcessName(descriptor: string | undefined): string {
  if (descriptor === undefined || !descriptor.includes('"')) return UNKNOWN_PROCESS;
  return descriptor.split('"')[1];
}
