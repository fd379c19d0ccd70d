/**
 * Barrel re-export for type definitions.
 */
export * from "./event.js";
