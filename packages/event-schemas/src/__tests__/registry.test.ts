/**
 * Tests for the schema registry: the default catalog, lookups, and the
 * startup-time duplicate check.
 */

import { describe, expect, test } from "vitest";
import { pino } from "pino";
import { z } from "zod";
import { DuplicateSchemaError, SchemaNotFoundError } from "../errors.js";
import {
  SchemaRegistry,
  SchemaRegistryBuilder,
  createSchemaRegistry,
} from "../registry.js";
import { userIdSchema } from "../schemas/common.js";
import { notificationSchema } from "../schemas/notification.js";
import { EVENT_SCHEMAS } from "../schemas/payload-registry.js";
import { EVENT_TYPES } from "../types/event.js";

const pingSchema = z.object({ sent_at: z.string() });
const pongSchema = z.object({ received_at: z.string() });

describe("createSchemaRegistry", () => {
  test("registers every known event type in catalog order", () => {
    const registry = createSchemaRegistry();

    expect(registry.size).toBe(EVENT_TYPES.length);
    expect(registry.eventTypes()).toEqual([...EVENT_TYPES]);
  });

  test("resolves event types to their catalog schemas", () => {
    const registry = createSchemaRegistry();

    expect(registry.schemaFor("notification")).toBe(notificationSchema);
    expect(registry.schemaFor("file_upload_received")).toBe(
      EVENT_SCHEMAS.file_upload_received,
    );
  });

  test("user_id and second_factor_recreated share a schema", () => {
    const registry = createSchemaRegistry();

    expect(registry.schemaFor("user_id")).toBe(userIdSchema);
    expect(registry.schemaFor("second_factor_recreated")).toBe(userIdSchema);
  });

  test("accepts a custom schema set", () => {
    const registry = createSchemaRegistry({
      schemas: { ping: pingSchema, pong: pongSchema },
    });

    expect(registry.eventTypes()).toEqual(["ping", "pong"]);
    expect(registry.lookup("notification")).toBeUndefined();
  });

  test("logs the registered event types at debug level", () => {
    const lines: Array<Record<string, unknown>> = [];
    const logger = pino(
      { level: "debug" },
      { write: (line: string) => void lines.push(JSON.parse(line)) },
    );

    createSchemaRegistry({ schemas: { ping: pingSchema }, logger });

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({
      level: 20,
      msg: "Registered 1 event schemas",
      eventTypes: ["ping"],
    });
  });
});

describe("SchemaRegistry lookups", () => {
  const registry = createSchemaRegistry();

  test("lookup returns undefined for unknown event types", () => {
    expect(registry.lookup("file_uploaded")).toBeUndefined();
    expect(registry.has("file_uploaded")).toBe(false);
  });

  test("lookup ignores Object.prototype members", () => {
    expect(registry.lookup("toString")).toBeUndefined();
    expect(registry.lookup("__proto__")).toBeUndefined();
    expect(registry.has("constructor")).toBe(false);
  });

  test("schemaFor throws SchemaNotFoundError for unknown event types", () => {
    expect(() => registry.schemaFor("file_uploaded")).toThrow(SchemaNotFoundError);

    try {
      registry.schemaFor("file_uploaded");
    } catch (err) {
      expect(err).toBeInstanceOf(SchemaNotFoundError);
      if (err instanceof SchemaNotFoundError) {
        expect(err.eventType).toBe("file_uploaded");
        expect(err.code).toBe("VALIDATION_SCHEMA_NOT_FOUND");
        expect(err.message).toBe(
          'No event schema is registered for event type "file_uploaded"',
        );
      }
    }
  });

  test("the event type list cannot be modified", () => {
    expect(Object.isFrozen(registry.eventTypes())).toBe(true);
  });
});

describe("SchemaRegistryBuilder", () => {
  test("builds a registry from registrations", () => {
    const registry = new SchemaRegistryBuilder()
      .register("ping", pingSchema)
      .register("pong", pongSchema)
      .build();

    expect(registry).toBeInstanceOf(SchemaRegistry);
    expect(registry.schemaFor("ping")).toBe(pingSchema);
    expect(registry.schemaFor("pong")).toBe(pongSchema);
  });

  test("rejects a second schema under the same event type", () => {
    const builder = new SchemaRegistryBuilder().register("ping", pingSchema);

    expect(() => builder.register("ping", pongSchema)).toThrow(DuplicateSchemaError);
    expect(() => builder.register("ping", pongSchema)).toThrow(
      'A schema is already registered for event type "ping"',
    );
  });

  test("rejects registrations after build()", () => {
    const builder = new SchemaRegistryBuilder().register("ping", pingSchema);
    builder.build();

    expect(() => builder.register("pong", pongSchema)).toThrow(
      "SchemaRegistryBuilder.register() called after build()",
    );
  });

  test("the constructor also rejects duplicate entries", () => {
    expect(
      () =>
        new SchemaRegistry([
          ["ping", pingSchema],
          ["ping", pongSchema],
        ]),
    ).toThrow(DuplicateSchemaError);
  });
});
