export * from "./tiers.js";
export * from "./net-worth-cache.js";
export * from "./drawdown-monitor.js";
