export * from "./errors.js";
export * from "./errorHandler.js";
