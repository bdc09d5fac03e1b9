export * from "./layer.js";
export * from "./camera.js";
export * from "./image.js";
export * from "./history.js";
export * from "./tools.js";
export * from "./session.js";
