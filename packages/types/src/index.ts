export * from "./config/index.js";
export * from "./auth/index.js";
export * from "./drive/index.js";
export * from "./pipeline/index.js";
