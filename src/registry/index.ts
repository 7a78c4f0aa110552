export * from "./types.js";
export * from "./version.js";
export * from "./symbol-table.js";
export * from "./catalog-store.js";
export * from "./registry.js";
