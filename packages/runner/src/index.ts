// Application wiring
export {
  createAppContext,
  type AppContext,
  type AppContextOverrides,
} from "./context.js";

// Config utilities
export {
  loadConfig,
  validateConfig,
  REQUIRED_ENV_VARS,
  type Environment,
} from "./config-loader.js";

// Stages and pipeline
export * from "./stages/index.js";
export * from "./pipeline/index.js";
