/**
 * Payload validation against event schemas.
 *
 * getValidatedPayload() is the entry point consumers call for every inbound
 * message: it returns the parsed payload or throws an
 * EventSchemaValidationError describing every fault found in one pass,
 * grouped as missing, mistyped and unexpected fields.
 *
 * Everything here is synchronous and side-effect free.
 */

import { z } from "zod";
import {
  EventSchemaValidationError,
  type SchemaErrorInfo,
} from "./errors.js";

/**
 * Any object schema in the catalog. Fields are declared in its shape, so the
 * declared field names are `Object.keys(schema.shape)`.
 */
export type EventSchema<TOutput = Record<string, unknown>> = z.ZodObject<
  z.ZodRawShape,
  z.UnknownKeysParam,
  z.ZodTypeAny,
  TOutput,
  unknown
>;

/** Key used in mistyped_fields for issues not tied to a single field */
const ROOT_FIELD = "__root__";

/**
 * Validate an event payload against an event schema and return the parsed
 * payload.
 *
 * Keys the schema does not declare are dropped from the result (unless the
 * schema is a passthrough schema). They are only reported, as
 * unexpected_fields, when validation fails for another reason.
 *
 * @throws EventSchemaValidationError if any declared field is missing or invalid
 */
export function getValidatedPayload<TOutput>(
  payload: unknown,
  schema: EventSchema<TOutput>,
): TOutput {
  const result = schema.safeParse(payload);
  if (result.success) {
    return result.data;
  }

  throw new EventSchemaValidationError({
    payload,
    errorInfo: buildSchemaErrorInfo(payload, schema, result.error),
  });
}

/**
 * Non-throwing variant of getValidatedPayload(), shaped like zod's safeParse.
 */
export function safeValidatePayload<TOutput>(
  payload: unknown,
  schema: EventSchema<TOutput>,
):
  | { success: true; data: TOutput }
  | { success: false; error: EventSchemaValidationError } {
  const result = schema.safeParse(payload);
  if (result.success) {
    return { success: true, data: result.data };
  }

  return {
    success: false,
    error: new EventSchemaValidationError({
      payload,
      errorInfo: buildSchemaErrorInfo(payload, schema, result.error),
    }),
  };
}

/**
 * Sort zod issues into the three report categories.
 *
 * An issue counts as "missing" only when it concerns a top-level field whose
 * value is undefined. Faults deeper in a nested record or list are reported
 * under their top-level field, prefixed with the path below it.
 */
export function buildSchemaErrorInfo(
  payload: unknown,
  schema: EventSchema<unknown>,
  error: z.ZodError,
): SchemaErrorInfo {
  const missing: string[] = [];
  const mistyped = new Map<string, string[]>();

  for (const issue of error.issues) {
    const [head, ...rest] = issue.path;
    const field = head === undefined ? ROOT_FIELD : String(head);

    if (
      rest.length === 0 &&
      head !== undefined &&
      issue.code === z.ZodIssueCode.invalid_type &&
      issue.received === z.ZodParsedType.undefined
    ) {
      if (!missing.includes(field)) missing.push(field);
      continue;
    }

    const reason =
      rest.length > 0 ? `${rest.join(".")}: ${issue.message}` : issue.message;
    const reasons = mistyped.get(field);
    if (reasons) {
      reasons.push(reason);
    } else {
      mistyped.set(field, [reason]);
    }
  }

  const declared = schema.shape;
  const unexpected = isRecord(payload)
    ? Object.keys(payload).filter((key) => !Object.hasOwn(declared, key))
    : [];

  return {
    missing_fields: missing,
    mistyped_fields: Object.fromEntries(
      [...mistyped].map(([field, reasons]) => [field, reasons.join("; ")]),
    ),
    unexpected_fields: unexpected,
  };
}

/** A payload that has keys of its own; null, arrays and primitives do not */
function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// ---------------------------------------------------------------------------
// Upload date
// ---------------------------------------------------------------------------

/** YYYY-MM-DD or YYYYMMDD, optionally followed by "T" or " " and a time */
const ISO_DATE = /^(\d{4})(-?)(\d{2})\2(\d{2})(?:[T ](.+))?$/;

/**
 * HH, HH:MM, HH:MM:SS[.f], or the same without colons, then an optional
 * "Z" or +/-HH[:MM[:SS[.f]]] offset.
 */
const ISO_TIME =
  /^(\d{2})(?:(:?)(\d{2})(?:\2(\d{2})(?:[.,]\d+)?)?)?(?:Z|[+-](\d{2})(?::?(\d{2})(?::?(\d{2})(?:[.,]\d+)?)?)?)?$/;

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

function daysInMonth(year: number, month: number): number {
  if (month === 2) return isLeapYear(year) ? 29 : 28;
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

/** Parse an optional two-digit group and check it against an upper bound */
function withinRange(group: string | undefined, max: number): boolean {
  return group === undefined || Number(group) <= max;
}

function isIsoTime(value: string): boolean {
  const match = ISO_TIME.exec(value);
  if (!match) return false;
  const [, hour, , minute, second, offsetHour, offsetMinute, offsetSecond] = match;
  return (
    withinRange(hour, 23) &&
    withinRange(minute, 59) &&
    withinRange(second, 59) &&
    withinRange(offsetHour, 23) &&
    withinRange(offsetMinute, 59) &&
    withinRange(offsetSecond, 59)
  );
}

/**
 * Whether a string is an ISO-8601 date or date-time in any of the forms
 * upload dates are produced in: extended or basic, "T" or space separated,
 * with or without fractional seconds and an offset.
 */
export function isIsoDateTime(value: string): boolean {
  const match = ISO_DATE.exec(value);
  if (!match) return false;
  const [, yearText = "", , monthText = "", dayText = "", time] = match;
  const year = Number(yearText);
  const month = Number(monthText);
  const day = Number(dayText);
  if (year < 1 || month < 1 || month > 12) return false;
  if (day < 1 || day > daysInMonth(year, month)) return false;
  return time === undefined || isIsoTime(time);
}

/**
 * Ensure that an upload date string can be interpreted as a date/time.
 * Shared by every schema carrying an `upload_date` field.
 *
 * @returns the unchanged string
 * @throws Error naming the unparseable value
 */
export function validatedUploadDate(uploadDate: string): string {
  if (!isIsoDateTime(uploadDate)) {
    throw new Error(`Could not convert upload date to datetime: ${uploadDate}`);
  }
  return uploadDate;
}
