/**
 * Inbound event guard: the registry lookup and payload validation a
 * consumer runs on every message it receives.
 *
 * Neither an unknown event type nor an invalid payload throws here. Both
 * come back as a failed result (and are logged at warn), so the consuming
 * service can decide whether to dead-letter the message or skip it.
 */

import type { Logger } from "pino";
import {
  SchemaNotFoundError,
  type EventSchemaValidationError,
} from "./errors.js";
import { getDefaultLogger } from "./logger.js";
import type { SchemaRegistry } from "./registry.js";
import { safeValidatePayload } from "./validation.js";

export interface InboundEvent {
  /** Registry built at startup by createSchemaRegistry() */
  registry: SchemaRegistry;
  /** Event type taken from the message metadata */
  eventType: string;
  /** Deserialized message body; anything that is not an object is rejected */
  payload: unknown;
  /** Logger scoped to the consumer; defaults to the shared library logger */
  logger?: Logger;
}

export type InboundEventResult =
  | { success: true; eventType: string; data: Record<string, unknown> }
  | {
      success: false;
      eventType: string;
      error: SchemaNotFoundError | EventSchemaValidationError;
    };

/**
 * Resolve the schema for an inbound event and validate its payload.
 */
export function validateInboundEvent({
  registry,
  eventType,
  payload,
  logger = getDefaultLogger(),
}: InboundEvent): InboundEventResult {
  const log = logger.child({ eventType });

  const schema = registry.lookup(eventType);
  if (!schema) {
    const error = new SchemaNotFoundError(eventType);
    log.warn({ err: error }, "No schema registered for event type");
    return { success: false, eventType, error };
  }

  const result = safeValidatePayload(payload, schema);
  if (!result.success) {
    log.warn(
      { errorInfo: result.error.errorInfo },
      "Event payload failed schema validation",
    );
    return { success: false, eventType, error: result.error };
  }

  log.debug("Event payload validated");
  return { success: true, eventType, data: result.data };
}
