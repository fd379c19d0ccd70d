/**
 * Static catalog mapping event types to their payload schemas.
 *
 * This is plain data: the runtime lookup table is built from it by
 * createSchemaRegistry() (see ../registry.ts). Consumers that know the event
 * type statically can pick a schema from here and keep its precise type:
 *
 *   getValidatedPayload(payload, EVENT_SCHEMAS.notification)
 */

import type { z } from "zod";
import type { EventType } from "../types/event.js";
import type { EventSchema } from "../validation.js";
import { userIdSchema } from "./common.js";
import {
  metadataDatasetIdSchema,
  metadataDatasetOverviewSchema,
  metadataSubmissionUpsertedSchema,
  searchableResourceInfoSchema,
  searchableResourceSchema,
} from "./metadata.js";
import {
  fileInternallyRegisteredSchema,
  fileRegisteredForDownloadSchema,
  fileUploadReceivedSchema,
  fileUploadValidationFailureSchema,
  fileUploadValidationSuccessSchema,
} from "./file-upload.js";
import {
  fileDownloadServedSchema,
  fileStagedForDownloadSchema,
  nonStagedFileRequestedSchema,
} from "./file-download.js";
import { notificationSchema } from "./notification.js";
import {
  accessRequestDetailsSchema,
  userIvaStateSchema,
} from "./access-control.js";

/** Event type -> payload schema, one entry per EventType */
export const EVENT_SCHEMAS = {
  metadata_dataset_deleted: metadataDatasetIdSchema,
  metadata_dataset_overview: metadataDatasetOverviewSchema,
  metadata_submission_upserted: metadataSubmissionUpsertedSchema,
  file_upload_received: fileUploadReceivedSchema,
  file_upload_validation_success: fileUploadValidationSuccessSchema,
  file_upload_validation_failure: fileUploadValidationFailureSchema,
  file_internally_registered: fileInternallyRegisteredSchema,
  file_registered_for_download: fileRegisteredForDownloadSchema,
  non_staged_file_requested: nonStagedFileRequestedSchema,
  file_staged_for_download: fileStagedForDownloadSchema,
  file_download_served: fileDownloadServedSchema,
  notification: notificationSchema,
  searchable_resource_deleted: searchableResourceInfoSchema,
  searchable_resource_upserted: searchableResourceSchema,
  user_id: userIdSchema,
  second_factor_recreated: userIdSchema,
  access_request_details: accessRequestDetailsSchema,
  iva_state_changed: userIvaStateSchema,
} as const satisfies Record<EventType, EventSchema>;

/** Parsed payload type for a given event type */
export type EventPayload<T extends EventType> = z.output<
  (typeof EVENT_SCHEMAS)[T]
>;
