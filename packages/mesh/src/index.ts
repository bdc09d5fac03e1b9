export * from "./block.js";
export * from "./merge.js";
export * from "./mesh.js";
export * from "./shapes.js";
export * from "./edit.js";
export * from "./serialize.js";
