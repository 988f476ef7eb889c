export function isRoot(): boolean {
  return typeof process.getuid === "function" && process.getuid() === 0;
}
