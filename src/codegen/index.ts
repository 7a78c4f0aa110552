export * from "./types.js";
export * from "./template.js";
export * from "./domains.js";
export * from "./context.js";
export * from "./bundle.js";
export * from "./synthesizer.js";
export * from "./validator.js";
export * from "./writer.js";
export * from "./refine.js";
