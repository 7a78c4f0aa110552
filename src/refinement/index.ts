export * from "./types.js";
export * from "./evaluator.js";
export * from "./failure-categorizer.js";
export * from "./history-db.js";
export * from "./loop.js";
