/**
 * Zod schemas for the file upload pipeline.
 *
 * A file upload moves through these events in order:
 *   file_upload_received -> file_upload_validation_success | _failure
 *   -> file_internally_registered -> file_registered_for_download
 *
 * All of them carry the upload date of the file, validated by the shared
 * upload-date rule.
 */

import { z } from "zod";
import { integerField, uploadDateSchema } from "./common.js";

/** Fields locating an uploaded object in a specific S3 bucket */
const storedObjectShape = {
  /** Public ID of the file as present in the metadata catalog */
  file_id: z.string(),
  /** ID of the file in the specific S3 bucket */
  object_id: z.string(),
  /** ID/name of the S3 bucket used to store the file */
  bucket_id: z.string(),
  /**
   * Alias for the object storage location where the object is stored.
   * Maps to an endpoint configuration in each service.
   */
  s3_endpoint_alias: z.string(),
};

/**
 * Payload schema for "file_upload_received" events.
 * Triggered when a new file upload is received.
 */
export const fileUploadReceivedSchema = uploadDateSchema.extend({
  ...storedObjectShape,
  /** Public key of the submitter */
  submitter_public_key: z.string(),
  /** Size of the entire decrypted file content in bytes */
  decrypted_size: integerField,
  /** Expected SHA-256 of the decrypted content, still to be verified */
  expected_decrypted_sha256: z.string(),
});

export type FileUploadReceived = z.infer<typeof fileUploadReceivedSchema>;

/**
 * Payload schema for "file_upload_validation_success" events.
 * Triggered when an uploaded file passed validation and was re-encrypted.
 */
export const fileUploadValidationSuccessSchema = uploadDateSchema.extend({
  ...storedObjectShape,
  decrypted_size: integerField,
  /** ID of the file encryption secret (not the secret itself) */
  decryption_secret_id: z.string(),
  /** Offset in bytes at which the encrypted content starts, after the Crypt4GH envelope */
  content_offset: integerField,
  /** Part size used for the encrypted part checksums, in bytes */
  encrypted_part_size: integerField,
  encrypted_parts_md5: z.array(z.string()),
  encrypted_parts_sha256: z.array(z.string()),
  decrypted_sha256: z.string(),
});

export type FileUploadValidationSuccess = z.infer<
  typeof fileUploadValidationSuccessSchema
>;

/**
 * Payload schema for "file_upload_validation_failure" events.
 */
export const fileUploadValidationFailureSchema = uploadDateSchema.extend({
  ...storedObjectShape,
  /** Why the validation failed */
  reason: z.string(),
});

export type FileUploadValidationFailure = z.infer<
  typeof fileUploadValidationFailureSchema
>;

/**
 * Payload schema for "file_internally_registered" events.
 * Everything from a validation success plus the encrypted size.
 */
export const fileInternallyRegisteredSchema =
  fileUploadValidationSuccessSchema.extend({
    /** Size of the encrypted content in bytes, without the Crypt4GH envelope */
    encrypted_size: integerField,
  });

export type FileInternallyRegistered = z.infer<
  typeof fileInternallyRegisteredSchema
>;

/**
 * Payload schema for "file_registered_for_download" events.
 * The file is now served through a GA4GH DRS-compatible API.
 */
export const fileRegisteredForDownloadSchema = uploadDateSchema.extend({
  file_id: z.string(),
  decrypted_sha256: z.string(),
  /** URI for accessing the file according to the GA4GH DRS standard */
  drs_uri: z.string(),
});

export type FileRegisteredForDownload = z.infer<
  typeof fileRegisteredForDownloadSchema
>;
