export * from "./constants.js";
export * from "./grid.js";
export * from "./protocol.js";
export * from "./logger.js";
