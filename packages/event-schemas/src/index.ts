/**
 * @file-events/event-schemas: the event contract layer shared by the file
 * management and access control services.
 *
 * Contains:
 *   - Zod schemas for every event payload, keyed by event type
 *   - The schema registry (event type -> schema lookup)
 *   - Payload validation with missing / mistyped / unexpected field reports
 *   - Topic and event-type config blocks plus their environment loader
 *   - Structured error hierarchy and pino logger factory
 */

// Event type names and the raw payload type
export * from "./types/index.js";

// Zod schemas for event payloads
export * from "./schemas/index.js";

// Event type -> schema lookup table
export * from "./registry.js";

// Payload validation and the shared upload-date rule
export * from "./validation.js";

// Registry lookup + validation for consumers, with logging
export * from "./inbound.js";

// Topic/type config blocks
export * from "./configs/index.js";

// Structured error classes
export * from "./errors.js";

// pino logger factory
export * from "./logger.js";
