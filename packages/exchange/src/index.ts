export * from "./exchange.interface.js";
export * from "./registry.js";
export * from "./retry.js";
export * from "./paper/paper.exchange.js";
export * from "./paper/paper.feed.js";
