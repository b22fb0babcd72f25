export * from "./errors.js";
export * from "./baseConversion.js";
export * from "./systems.js";
export * from "./arithmetic.js";
export * from "./batch.js";
export * from "./history.js";
