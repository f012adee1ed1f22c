export type { InteractiveAuthHandler } from './types.js';
export { createCLIAuthHandler, type CLIAuthHandlerOptions } from './cli-handler.js';
