export * from "./error-types.js";
export * from "./health-types.js";
export * from "./token-types.js";
