export * from "./parse.js";
export * from "./program.js";
