/**
 * Zod schemas for file staging, download and deletion events.
 */

import { z } from "zod";

/**
 * Payload schema for "non_staged_file_requested" events.
 * A user requested a file that is not yet in the outbox and must be staged.
 */
export const nonStagedFileRequestedSchema = z.object({
  /** Public ID of the file as present in the metadata catalog */
  file_id: z.string(),
  /** ID of the object in the outbox bucket */
  target_object_id: z.string(),
  /** ID/name of the bucket in which the object was expected */
  target_bucket_id: z.string(),
  s3_endpoint_alias: z.string(),
  decrypted_sha256: z.string(),
});

export type NonStagedFileRequested = z.infer<
  typeof nonStagedFileRequestedSchema
>;

/** Payload schema for "file_staged_for_download" events */
export const fileStagedForDownloadSchema = nonStagedFileRequestedSchema;

export type FileStagedForDownload = NonStagedFileRequested;

/**
 * Payload schema for "file_download_served" events.
 * Emitted whenever file content was served, mostly for auditing.
 */
export const fileDownloadServedSchema = nonStagedFileRequestedSchema.extend({
  /** Context the download was served in, e.g. the data access request ID */
  context: z.string(),
});

export type FileDownloadServed = z.infer<typeof fileDownloadServedSchema>;

/** Payload schema for "file_deletion_requested" events */
export const fileDeletionRequestedSchema = z.object({
  file_id: z.string(),
});

export type FileDeletionRequested = z.infer<
  typeof fileDeletionRequestedSchema
>;

/**
 * Emitted once a service has deleted a file from its database and from the
 * buckets it controls.
 */
export const fileDeletionSuccessSchema = fileDeletionRequestedSchema;

export type FileDeletionSuccess = FileDeletionRequested;
