/**
 * Schema registry: resolves an event-type string to its payload schema.
 *
 * Built once at process start with createSchemaRegistry() and passed to
 * whatever consumes events. A built registry has no mutating methods, so it
 * can be shared freely between concurrent consumers.
 */

import type { Logger } from "pino";
import { DuplicateSchemaError, SchemaNotFoundError } from "./errors.js";
import { EVENT_SCHEMAS } from "./schemas/payload-registry.js";
import type { EventSchema } from "./validation.js";

/**
 * Immutable event type -> schema lookup table.
 * Instances are created by SchemaRegistryBuilder.build().
 */
export class SchemaRegistry {
  /** Frozen, prototype-less lookup table */
  private readonly schemas: Readonly<Record<string, EventSchema>>;
  /** Event types in registration order */
  private readonly names: readonly string[];

  constructor(entries: ReadonlyArray<readonly [string, EventSchema]>) {
    const schemas: Record<string, EventSchema> = Object.create(null);
    for (const [name, schema] of entries) {
      if (Object.hasOwn(schemas, name)) {
        throw new DuplicateSchemaError(name);
      }
      schemas[name] = schema;
    }
    this.schemas = Object.freeze(schemas);
    this.names = Object.freeze(entries.map(([name]) => name));
  }

  /** Look up the schema for an event type (undefined if none registered) */
  lookup(eventType: string): EventSchema | undefined {
    return Object.hasOwn(this.schemas, eventType)
      ? this.schemas[eventType]
      : undefined;
  }

  /**
   * Resolve the schema an inbound event must be validated against.
   *
   * @throws SchemaNotFoundError if the event type has no registered schema
   */
  schemaFor(eventType: string): EventSchema {
    const schema = this.lookup(eventType);
    if (!schema) {
      throw new SchemaNotFoundError(eventType);
    }
    return schema;
  }

  has(eventType: string): boolean {
    return Object.hasOwn(this.schemas, eventType);
  }

  /** All registered event types, in registration order */
  eventTypes(): readonly string[] {
    return this.names;
  }

  get size(): number {
    return this.names.length;
  }
}

/**
 * Collects schema registrations during startup.
 *
 * Registering the same event type twice is a programming error and throws
 * immediately. Once build() has been called the builder is sealed.
 */
export class SchemaRegistryBuilder {
  private entries: Array<readonly [string, EventSchema]> = [];
  private registered = new Set<string>();
  private built = false;

  /**
   * Register the schema for an event type.
   *
   * @throws DuplicateSchemaError if the event type is already registered
   */
  register(eventType: string, schema: EventSchema): this {
    if (this.built) {
      throw new Error("SchemaRegistryBuilder.register() called after build()");
    }
    if (this.registered.has(eventType)) {
      throw new DuplicateSchemaError(eventType);
    }
    this.registered.add(eventType);
    this.entries.push([eventType, schema]);
    return this;
  }

  /** Freeze the registrations into a SchemaRegistry */
  build(): SchemaRegistry {
    this.built = true;
    return new SchemaRegistry(this.entries);
  }
}

export interface CreateSchemaRegistryOptions {
  /** Schemas to register; defaults to the full event catalog */
  schemas?: Readonly<Record<string, EventSchema>>;
  /** Logs the registered event types at debug level */
  logger?: Logger;
}

/**
 * Build the registry for the event catalog. Call once at startup and pass
 * the result to consumers.
 */
export function createSchemaRegistry(
  options: CreateSchemaRegistryOptions = {},
): SchemaRegistry {
  const { schemas = EVENT_SCHEMAS, logger } = options;
  const builder = new SchemaRegistryBuilder();

  for (const [eventType, schema] of Object.entries(schemas)) {
    builder.register(eventType, schema);
  }

  const registry = builder.build();
  logger?.debug(
    { eventTypes: registry.eventTypes() },
    `Registered ${registry.size} event schemas`,
  );
  return registry;
}
