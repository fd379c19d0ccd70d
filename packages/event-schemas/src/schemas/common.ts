/**
 * Field building blocks shared across event schemas.
 *
 * Declared once so that schemas carrying the same kind of field (an upload
 * date, a UTC timestamp, an e-mail address) cannot drift apart.
 */

import { z } from "zod";
import { validatedUploadDate } from "../validation.js";

/**
 * ISO-8601 date or date-time string describing when a file was uploaded.
 * Offsets are optional, so naive UTC timestamps such as
 * "2024-05-02T09:41:17.219034" are accepted. The value stays a string.
 */
export const uploadDateField = z.string().superRefine((value, ctx) => {
  try {
    validatedUploadDate(value);
  } catch (err) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: err instanceof Error ? err.message : String(err),
    });
  }
});

/**
 * ISO-8601 date-time with an explicit offset ("Z" or "+01:00"), parsed into
 * a Date.
 */
export const utcDatetimeField = z
  .string()
  .datetime({ offset: true })
  .transform((value) => new Date(value));

/**
 * Integer that may arrive as a digit-only string ("1024" becomes 1024).
 * Any other string, including "" and "10.5", is still reported as mistyped.
 */
export const integerField = z.preprocess(
  (value) =>
    typeof value === "string" && /^-?\d+$/.test(value) ? Number(value) : value,
  z.number().int(),
);

/** E-mail address */
export const emailField = z.string().email();

/** Base shape for events about an uploaded file */
export const uploadDateSchema = z.object({
  /** When the file was uploaded (ISO-8601) */
  upload_date: uploadDateField,
});

/** Generic payload relaying a user ID; base for the user-centric events */
export const userIdSchema = z.object({
  user_id: z.string(),
});

export type UserID = z.infer<typeof userIdSchema>;
