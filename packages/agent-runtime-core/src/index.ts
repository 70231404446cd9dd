/**
 * Agent Runtime Core Types
 *
 * Shared contracts for the orchestration and tool-safety engine.
 */

export * from "./conversation";
export * from "./errors";
export * from "./events";
export * from "./paths";
export * from "./provider";
export * from "./research";
export * from "./routing";
export * from "./safety";
export * from "./snapshot";
export * from "./tools";
export * from "./updates";
