/**
 * Zod schema for the notification event payload.
 *
 * Emitted by any service that wants an e-mail sent; picked up by the
 * notification service.
 */

import { z } from "zod";
import { emailField } from "./common.js";

/**
 * Payload schema for "notification" events.
 */
export const notificationSchema = z.object({
  /** Primary recipient of the e-mail */
  recipient_email: emailField,
  /** Recipients cc'd on the e-mail */
  email_cc: z.array(emailField).default([]),
  /** Recipients bcc'd on the e-mail */
  email_bcc: z.array(emailField).default([]),
  subject: z.string(),
  /** Full name of the recipient, used in the greeting */
  recipient_name: z.string(),
  /** Plain text notification body */
  plaintext_body: z.string(),
});

export type Notification = z.infer<typeof notificationSchema>;
