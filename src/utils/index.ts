export {
  runCommand,
  createCommandRunner,
  describeFailure,
  printFailure,
  COMMAND_TIMEOUT_MS,
  type CommandRunner,
  type FailureReporter,
  type RunOptions,
  type RunnerOptions,
} from "./shell.js";
export { formatTimestamp, formatFileTimestamp } from "./time.js";
export { getPlatformInfo, type PlatformInfo } from "./platform.js";
export { isRoot } from "./permissions.js";
