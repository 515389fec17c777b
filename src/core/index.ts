export * from "./pipeline.ts";
export * from "./runner.ts";
export * from "./chain.ts";
export * from "./input.ts";
export * from "./sinks.ts";
export * from "./record.ts";
export * from "./host-functions.ts";
export * from "./catalog.ts";
export * from "./stage.ts";
export * from "./args.ts";
export * from "./errors.ts";
export * from "./logger.ts";
export * from "./config.ts";
export { getEnv, setEnv, unsetEnv } from "./env.ts";
export * from "./stages/index.ts";

// Re-export type-only modules for public consumption
export type * from "../types/stream.ts";
export type * from "../types/logger.ts";
