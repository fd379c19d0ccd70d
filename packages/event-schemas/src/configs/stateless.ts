/**
 * Topic and event-type settings for stateless events.
 *
 * Each block is a zod object that a service merges into its own config and
 * loads with loadEventsConfig(). Every field is a required, non-empty string;
 * the description is attached with .describe() so config docs can be
 * generated from the schema.
 */

import { z } from "zod";

/** Required, non-empty topic or event-type name */
function nameField(description: string) {
  return z.string().min(1).describe(description);
}

/** New or changed metadata on files that shall be registered for upload */
export const fileMetadataEventsTopicSchema = z.object({
  /** e.g. "metadata" */
  file_metadata_event_topic: nameField(
    "Name of the topic to receive new or changed metadata on files that shall" +
      " be registered for uploaded.",
  ),
  /** e.g. "file_metadata_upserted" */
  file_metadata_event_type: nameField(
    "The type used for events to receive new or changed metadata on files that" +
      " are expected to be uploaded.",
  ),
});

export const fileUploadReceivedEventsConfigSchema = z.object({
  /** e.g. "received-file-uploads" */
  file_upload_received_topic: nameField(
    "The name of the topic used for FileUploadReceived events.",
  ),
  /** e.g. "file_upload_received" */
  file_upload_received_event_type: nameField(
    "The name of the type used for FileUploadReceived events.",
  ),
});

export const notificationEventsConfigSchema = z.object({
  /** e.g. "notifications" */
  notification_event_topic: nameField(
    "Name of the topic used for notification events.",
  ),
  /** e.g. "notification" */
  notification_event_type: nameField("The type used for notification events."),
});

/** A download was requested for a file that is not in the outbox yet */
export const fileStagingRequestedEventsConfigSchema = z.object({
  /** e.g. "file-stage-requests" */
  files_to_stage_event_topic: nameField(
    "Name of the topic used for events indicating that a download was requested" +
      " for a file that is not yet available in the outbox.",
  ),
  /** e.g. "non_staged_file_requested" */
  files_to_stage_event_type: nameField(
    "The type used for non-staged file request events",
  ),
});

export const fileStagedEventsConfigSchema = z.object({
  /** e.g. "file-stagings" */
  file_staged_event_topic: nameField(
    "Name of the topic used for events indicating that a new file has" +
      " been internally registered.",
  ),
  /** e.g. "file_staged_for_download" */
  file_staged_event_type: nameField(
    "The type used for events indicating that a new file has" +
      " been internally registered.",
  ),
});

export const downloadServedEventsConfigSchema = z.object({
  /** e.g. "file-downloads" */
  download_served_event_topic: nameField(
    "Name of the topic used for events indicating that a download of a" +
      " specified file happened.",
  ),
  /** e.g. "download_served" */
  download_served_event_type: nameField(
    "The type used for event indicating that a download of a specified" +
      " file happened.",
  ),
});

export const fileDeletionRequestEventsConfigSchema = z.object({
  /** e.g. "file-deletion-requests" */
  files_to_delete_topic: nameField(
    "The name of the topic to receive events informing about files to delete.",
  ),
  /** e.g. "file_deletion_requested" */
  file_deletion_request_event_topic: nameField(
    "The type used for events indicating that a request to delete" +
      " a file has been received.",
  ),
});

export const fileDeletedEventsConfigSchema = z.object({
  /** e.g. "file-deletions" */
  file_deleted_event_topic: nameField(
    "Name of the topic used for events indicating that a file has" +
      " been deleted.",
  ),
  /** e.g. "file_deleted" */
  file_deleted_event_type: nameField(
    "The type used for events indicating that a file has been deleted.",
  ),
});

const fileInterrogationsConfigSchema = z.object({
  /** e.g. "file-interrogations" */
  file_interrogations_topic: nameField(
    "The name of the topic use to publish file interrogation outcome events.",
  ),
});

export const fileValidationSuccessEventsConfigSchema =
  fileInterrogationsConfigSchema.extend({
    /** e.g. "file_interrogation_success" */
    interrogation_success_event_type: nameField(
      "The type used for events informing about successful file validations.",
    ),
  });

export const fileValidationFailureEventsConfigSchema =
  fileInterrogationsConfigSchema.extend({
    /** e.g. "file_interrogation_failed" */
    interrogation_failure_event_type: nameField(
      "The type used for events informing about failed file validations.",
    ),
  });

export const fileToRegisterEventsConfigSchema = z.object({
  /** e.g. "files-to-register" */
  files_to_register_event_topic: nameField(
    "The name of the topic to receive events informing about new files " +
      "to register.",
  ),
  /** e.g. "file_to_register" */
  files_to_register_event_type: nameField(
    "The name of the type for events informing about new files " +
      "to register.",
  ),
});

export const fileRegisteredEventsConfigSchema = z.object({
  /** e.g. "file-registrations" */
  file_registered_event_topic: nameField(
    "Name of the topic used for events indicating that a file has" +
      " been registered for download.",
  ),
  /** e.g. "file_registered" */
  file_registered_event_type: nameField(
    "The type used for event indicating that that a file has" +
      " been registered for download.",
  ),
});

const accessRequestConfigSchema = z.object({
  /** e.g. "access-requests" */
  access_request_events_topic: nameField(
    "Name of the event topic used to consume access request events",
  ),
});

export const accessRequestCreatedEventsConfigSchema =
  accessRequestConfigSchema.extend({
    /** e.g. "access_request_created" */
    access_request_created_event_type: nameField(
      "The type to use for access request created events",
    ),
  });

export const accessRequestAllowedEventsConfigSchema =
  accessRequestConfigSchema.extend({
    /** e.g. "access_request_allowed" */
    access_request_allowed_event_type: nameField(
      "The type to use for access request allowed events",
    ),
  });

export const accessRequestDeniedEventsConfigSchema =
  accessRequestConfigSchema.extend({
    /** e.g. "access_request_denied" */
    access_request_denied_event_type: nameField(
      "The type to use for access request denied events",
    ),
  });

/**
 * IVA status updates. Despite the name these are stateless events.
 */
export const ivaChangeEventsTypeSchema = z.object({
  /** e.g. "ivas" */
  iva_state_changed_event_topic: nameField(
    "The name of the topic containing IVA events.",
  ),
  /** e.g. "iva_state_changed" */
  iva_state_changed_event_type: nameField(
    "The type to use for iva state changed events.",
  ),
});

const authEventsConfigSchema = z.object({
  /** e.g. "auth-events" */
  auth_event_topic: nameField(
    "The name of the topic containing auth-related events.",
  ),
});

export const secondFactorRecreatedEventsConfigSchema =
  authEventsConfigSchema.extend({
    /** e.g. "second_factor_recreated" */
    second_factor_recreated_event_type: nameField(
      "The event type for recreation of the second factor for authentication",
    ),
  });

export type FileMetadataEventsTopic = z.infer<typeof fileMetadataEventsTopicSchema>;
export type FileUploadReceivedEventsConfig = z.infer<typeof fileUploadReceivedEventsConfigSchema>;
export type NotificationEventsConfig = z.infer<typeof notificationEventsConfigSchema>;
export type FileStagingRequestedEventsConfig = z.infer<typeof fileStagingRequestedEventsConfigSchema>;
export type FileStagedEventsConfig = z.infer<typeof fileStagedEventsConfigSchema>;
export type DownloadServedEventsConfig = z.infer<typeof downloadServedEventsConfigSchema>;
export type FileDeletionRequestEventsConfig = z.infer<typeof fileDeletionRequestEventsConfigSchema>;
export type FileDeletedEventsConfig = z.infer<typeof fileDeletedEventsConfigSchema>;
export type FileValidationSuccessEventsConfig = z.infer<typeof fileValidationSuccessEventsConfigSchema>;
export type FileValidationFailureEventsConfig = z.infer<typeof fileValidationFailureEventsConfigSchema>;
export type FileToRegisterEventsConfig = z.infer<typeof fileToRegisterEventsConfigSchema>;
export type FileRegisteredEventsConfig = z.infer<typeof fileRegisteredEventsConfigSchema>;
export type AccessRequestCreatedEventsConfig = z.infer<typeof accessRequestCreatedEventsConfigSchema>;
export type AccessRequestAllowedEventsConfig = z.infer<typeof accessRequestAllowedEventsConfigSchema>;
export type AccessRequestDeniedEventsConfig = z.infer<typeof accessRequestDeniedEventsConfigSchema>;
export type IvaChangeEventsType = z.infer<typeof ivaChangeEventsTypeSchema>;
export type SecondFactorRecreatedEventsConfig = z.infer<typeof secondFactorRecreatedEventsConfigSchema>;
