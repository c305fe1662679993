export * from "./enums.js";
export * from "./types.js";
export * from "./errors.js";
export * from "./math.js";
export * from "./position.js";
export * from "./config.js";
export * from "./logger.js";
export * from "./notifier.js";
