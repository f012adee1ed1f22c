export { authorizeCommand, type AuthorizeCommandOptions } from "./authorize.js";
export { statusCommand } from "./status.js";
export { resetCommand } from "./reset.js";
export { browseCommand } from "./browse.js";
export { runCommand, type RunCommandOptions } from "./run.js";
export { serveCommand } from "./serve.js";
export {
  EXIT_OK,
  EXIT_FAILED,
  EXIT_CONFIG_ERROR,
  EXIT_RUNTIME_ERROR,
  exitCodeFor,
  reportFailure,
  type CommonOptions,
} from "./shared.js";
