export * from "./serial-queue.js";
export * from "./event-hub.js";
export * from "./grid.js";
export * from "./order-lifecycle.js";
export * from "./hedge-coordinator.js";
export * from "./stop-loss.js";
export * from "./slot.js";
export * from "./session.js";
