export * from "./command-context.js";
export * from "./config.js";
export * from "./envelope.js";
export * from "./errors.js";
export * from "./exit-codes.js";
export * from "./logger.js";
