/**
 * Core package centralizes shared contracts and configuration helpers.
 * Everything else in the workspace depends on these primitives.
 */
export * from "./types";
export * from "./instrument";
export * from "./errors";
export * from "./indicatorSpec";
export * from "./config";
export * from "./env";
export * from "./utils/logger";
