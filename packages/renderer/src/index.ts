export * from "./greedy.js";
export * from "./thumbnail.js";
export * from "./cache.js";
