/**
 * Zod schemas for metadata events: dataset overviews and deletions,
 * metadata submissions, searchable resources and artifacts.
 *
 * Emitted by the metadata services whenever a dataset, a submission or an
 * indexed resource changes.
 */

import { z } from "zod";
import { emailField, integerField } from "./common.js";

/** The stage a metadata dataset is in */
export const metadataDatasetStageSchema = z.enum(["download", "upload"]);

export type MetadataDatasetStage = z.infer<typeof metadataDatasetStageSchema>;

/**
 * A file that is part of a dataset. Only the fields needed downstream are
 * declared; any other keys are kept as they are.
 */
export const metadataDatasetFileSchema = z
  .object({
    /** The file accession */
    accession: z.string(),
    /** The description of the file */
    description: z.string().nullable(),
    /** The file extension with a leading dot */
    file_extension: z.string(),
  })
  .passthrough();

export type MetadataDatasetFile = z.infer<typeof metadataDatasetFileSchema>;

/**
 * Payload schema for "metadata_dataset_deleted" events.
 * Carries just the accession of the dataset that was removed.
 */
export const metadataDatasetIdSchema = z.object({
  /** The dataset accession */
  accession: z.string(),
});

export type MetadataDatasetID = z.infer<typeof metadataDatasetIdSchema>;

/**
 * Payload schema for "metadata_dataset_overview" events.
 * Overview of the files contained in a dataset. Extra keys are kept.
 */
export const metadataDatasetOverviewSchema = metadataDatasetIdSchema
  .extend({
    title: z.string(),
    stage: metadataDatasetStageSchema,
    description: z.string().nullable(),
    /** Alias of the Data Access Committee */
    dac_alias: z.string(),
    /** E-mail address of the Data Access Committee */
    dac_email: emailField,
    files: z.array(metadataDatasetFileSchema),
  })
  .passthrough();

export type MetadataDatasetOverview = z.infer<
  typeof metadataDatasetOverviewSchema
>;

/** A file associated with, or affected by, a metadata submission */
export const metadataSubmissionFilesSchema = z.object({
  /** Public ID of the file as present in the metadata catalog */
  file_id: z.string(),
  /** Name of the file as it was submitted, e.g. "treatment_R1.fastq.gz" */
  file_name: z.string(),
  /** Size of the entire decrypted file content in bytes */
  decrypted_size: integerField,
  /** SHA-256 checksum of the entire decrypted file content */
  decrypted_sha256: z.string(),
});

export type MetadataSubmissionFiles = z.infer<
  typeof metadataSubmissionFilesSchema
>;

/**
 * Payload schema for "metadata_submission_upserted" events.
 * Emitted when a metadata submission is created or updated.
 */
export const metadataSubmissionUpsertedSchema = z.object({
  associated_files: z.array(metadataSubmissionFilesSchema),
});

export type MetadataSubmissionUpserted = z.infer<
  typeof metadataSubmissionUpsertedSchema
>;

/**
 * Payload schema for "searchable_resource_deleted" events.
 * Identifies a resource in the search index.
 */
export const searchableResourceInfoSchema = z.object({
  /** The resource accession */
  accession: z.string(),
  /** Name of the class this resource corresponds to */
  class_name: z.string(),
});

export type SearchableResourceInfo = z.infer<
  typeof searchableResourceInfoSchema
>;

/** Payload schema for "searchable_resource_upserted" events */
export const searchableResourceSchema = searchableResourceInfoSchema.extend({
  /** Metadata content of the resource */
  content: z.record(z.unknown()),
});

export type SearchableResource = z.infer<typeof searchableResourceSchema>;

/** Tag identifying an artifact: artifact name plus study accession */
export const artifactTagSchema = z.object({
  study_accession: z.string(),
  /** e.g. "added_accessions" */
  artifact_name: z.string(),
});

export type ArtifactTag = z.infer<typeof artifactTagSchema>;

export const artifactSchema = artifactTagSchema.extend({
  content: z.record(z.unknown()),
});

export type Artifact = z.infer<typeof artifactSchema>;
