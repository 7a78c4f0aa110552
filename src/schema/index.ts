export * from "./types.js";
export * from "./values.js";
export * from "./paths.js";
export * from "./inferencer.js";
