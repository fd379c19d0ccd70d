/**
 * Errors raised by the event schema catalog.
 *
 * Codes are prefixed by category: CONFIG_* for startup problems (topic/type
 * settings, duplicate schema registration), VALIDATION_* for per-message
 * problems (unknown event type, payload that does not match its schema).
 */

/** Machine-readable error code, always category-prefixed */
export type EventSchemasErrorCode = `CONFIG_${string}` | `VALIDATION_${string}`;

export class EventSchemasError extends Error {
  constructor(
    message: string,
    readonly code: EventSchemasErrorCode,
    /** Structured data for log lines; not part of the message */
    readonly context: Record<string, unknown> = {},
  ) {
    super(message);
    this.name = new.target.name;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
    };
  }
}

/** Missing or invalid topic/type settings, found at startup */
export class ConfigError extends EventSchemasError {
  constructor(
    message: string,
    code: `CONFIG_${string}` = "CONFIG_ERROR",
    context: Record<string, unknown> = {},
  ) {
    super(message, code, context);
  }
}

/**
 * Raised while building a schema registry when two schemas claim the same
 * event type. This is a startup failure, never a per-message one.
 */
export class DuplicateSchemaError extends ConfigError {
  readonly eventType: string;

  constructor(eventType: string) {
    super(
      `A schema is already registered for event type "${eventType}"`,
      "CONFIG_DUPLICATE_SCHEMA",
      { eventType },
    );
    this.eventType = eventType;
  }
}

/** A message that cannot be matched against the catalog */
export class ValidationError extends EventSchemasError {
  constructor(
    message: string,
    code: `VALIDATION_${string}` = "VALIDATION_ERROR",
    context: Record<string, unknown> = {},
  ) {
    super(message, code, context);
  }
}

/** No schema is registered for the requested event type. */
export class SchemaNotFoundError extends ValidationError {
  readonly eventType: string;

  constructor(eventType: string) {
    super(
      `No event schema is registered for event type "${eventType}"`,
      "VALIDATION_SCHEMA_NOT_FOUND",
      { eventType },
    );
    this.eventType = eventType;
  }
}

/**
 * Breakdown of why a payload failed validation against its schema.
 */
export interface SchemaErrorInfo {
  /** Declared fields absent from the payload, in declaration order */
  readonly missing_fields: readonly string[];
  /** Field name -> reason the present value was rejected */
  readonly mistyped_fields: Readonly<Record<string, string>>;
  /** Payload keys the schema does not declare */
  readonly unexpected_fields: readonly string[];
}

/** Raised when an event payload fails to validate against its event schema. */
export class EventSchemaValidationError extends ValidationError {
  readonly payload: unknown;
  readonly errorInfo: SchemaErrorInfo;

  constructor({
    payload,
    errorInfo,
  }: {
    payload: unknown;
    errorInfo: SchemaErrorInfo;
  }) {
    super(
      "The event payload failed validation against the corresponding" +
        ` event schema: ${toJsonText(errorInfo)}.` +
        ` The complete payload is: ${toJsonText(payload)}`,
      "VALIDATION_EVENT_PAYLOAD",
      { payload, errorInfo },
    );
    this.payload = payload;
    this.errorInfo = errorInfo;
  }
}

/** JSON text for error messages; values JSON cannot hold (BigInt, cycles) get a placeholder */
function toJsonText(value: unknown): string {
  try {
    return JSON.stringify(value);
  } catch (err) {
    return `[unserializable: ${err instanceof Error ? err.message : String(err)}]`;
  }
}
