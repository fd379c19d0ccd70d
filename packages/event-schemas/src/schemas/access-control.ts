/**
 * Zod schemas for user, access request and IVA events.
 *
 * IVA = independent verification address: a phone number, fax number or
 * postal address used to confirm a user's identity out of band.
 */

import { z } from "zod";
import { emailField, userIdSchema, utcDatetimeField } from "./common.js";

export const academicTitleSchema = z.enum(["Dr.", "Prof."]);

export type AcademicTitle = z.infer<typeof academicTitleSchema>;

/**
 * User data published via the outbox pattern.
 */
export const userSchema = userIdSchema.extend({
  /** Full name of the user, e.g. "Rosalind Franklin" */
  name: z.string(),
  title: academicTitleSchema.nullable().default(null),
  /** Preferred e-mail address of the user */
  email: emailField,
});

export type User = z.infer<typeof userSchema>;

export const accessRequestStatusSchema = z.enum(["allowed", "denied", "pending"]);

export type AccessRequestStatus = z.infer<typeof accessRequestStatusSchema>;

/**
 * Payload schema for "access_request_details" events.
 * Conveys the full state of a data access request.
 */
export const accessRequestDetailsSchema = userIdSchema.extend({
  /** The access request ID */
  id: z.string(),
  dataset_id: z.string(),
  dataset_title: z.string(),
  dataset_description: z.string().nullable().default(null),
  status: accessRequestStatusSchema,
  /** Text note submitted with the request */
  request_text: z.string(),
  /** Alias of the Data Access Committee responsible for the dataset */
  dac_alias: z.string(),
  dac_email: emailField,
  /** Ticket associated with the access request */
  ticket_id: z.string().nullable().default(null),
  /** Only visible to Data Stewards */
  internal_note: z.string().nullable().default(null),
  /** Visible to the requester */
  note_to_requester: z.string().nullable().default(null),
  /** Start of the validity period */
  access_starts: utcDatetimeField,
  /** End of the validity period */
  access_ends: utcDatetimeField,
});

export type AccessRequestDetails = z.infer<typeof accessRequestDetailsSchema>;

export const ivaTypeSchema = z.enum(["Phone", "Fax", "PostalAddress", "InPerson"]);

export type IvaType = z.infer<typeof ivaTypeSchema>;

export const ivaStateSchema = z.enum([
  "Unverified",
  "CodeRequested",
  "CodeCreated",
  "CodeTransmitted",
  "Verified",
]);

export type IvaState = z.infer<typeof ivaStateSchema>;

/**
 * Payload schema for "iva_state_changed" events.
 * `value` and `type` are null when the change applies to all IVAs of the
 * user; both keys must still be present.
 */
export const userIvaStateSchema = userIdSchema.extend({
  value: z.string().nullable(),
  type: ivaTypeSchema.nullable(),
  state: ivaStateSchema,
});

export type UserIvaState = z.infer<typeof userIvaStateSchema>;
