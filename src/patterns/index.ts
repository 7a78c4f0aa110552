export * from "./types.js";
export * from "./conversions.js";
export * from "./string-transforms.js";
export * from "./recognizers.js";
export * from "./detector.js";
export * from "./filter.js";
