export * from "./constants.js";
export * from "./errors.js";
export * from "./ignore-rules.js";
export * from "./paths.js";
export * from "./planner.js";
export type * from "./types.js";
