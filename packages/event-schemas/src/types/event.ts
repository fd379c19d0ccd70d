/**
 * Event type names for the file-management and access-control services.
 *
 * The event type travels out-of-band (message metadata) and selects the
 * schema that the message body must satisfy. Categories:
 *   - metadata_*             dataset and submission metadata changes
 *   - file_* / non_staged_*  file upload, registration, staging and deletion
 *   - searchable_resource_*  search index updates
 *   - user_id / access_* / iva_* / second_factor_*  user and access control
 *   - notification           outbound e-mail notifications
 */

/** Every event type with a registered schema */
export const EVENT_TYPES = [
  "metadata_dataset_deleted",
  "metadata_dataset_overview",
  "metadata_submission_upserted",
  "file_upload_received",
  "file_upload_validation_success",
  "file_upload_validation_failure",
  "file_internally_registered",
  "file_registered_for_download",
  "non_staged_file_requested",
  "file_staged_for_download",
  "file_download_served",
  "notification",
  "searchable_resource_deleted",
  "searchable_resource_upserted",
  "user_id",
  "second_factor_recreated",
  "access_request_details",
  "iva_state_changed",
] as const;

export type EventType = (typeof EVENT_TYPES)[number];

/** Deserialized message body, before any validation */
export type JsonObject = Readonly<Record<string, unknown>>;
