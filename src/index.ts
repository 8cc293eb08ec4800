/**
 * Library entry point
 */

export * from "./types";
export * from "./modules";
export * from "./utils";
