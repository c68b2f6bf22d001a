export { buildProgram, runCli } from './program.js';
export { createCliContext, type CliContext } from './context.js';
export {
  EXIT_FAILURE,
  EXIT_INTERRUPTED,
  EXIT_SUCCESS,
  runCommand,
  type FailureLabels,
} from './commands/run-command.js';
export { describeStatus } from './commands/version.js';
