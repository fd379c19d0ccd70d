/**
 * Barrel re-export for all event payload schemas.
 */
export * from "./common.js";
export * from "./metadata.js";
export * from "./file-upload.js";
export * from "./file-download.js";
export * from "./notification.js";
export * from "./access-control.js";
export * from "./payload-registry.js";
