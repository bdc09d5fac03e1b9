export * from "./types.js";
export * from "./bounds.js";
export * from "./color.js";
export * from "./hash.js";
export * from "./errors.js";
export * from "./config.js";
