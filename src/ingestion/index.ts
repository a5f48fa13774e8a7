/**
 * Ingestion module barrel exports
 */

export * from "./runLifecycle";
export * from "./processDocument";
