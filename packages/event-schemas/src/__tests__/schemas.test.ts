/**
 * Tests for the event payload schemas in the catalog.
 *
 * Each schema is exercised through getValidatedPayload so the assertions
 * cover both the declared fields and the report they produce on failure.
 */

import { describe, expect, test } from "vitest";
import type { z } from "zod";
import { EventSchemaValidationError } from "../errors.js";
import {
  EVENT_SCHEMAS,
  type EventPayload,
} from "../schemas/payload-registry.js";
import { userSchema } from "../schemas/access-control.js";
import { artifactSchema } from "../schemas/metadata.js";
import type { JsonObject } from "../types/event.js";
import { getValidatedPayload } from "../validation.js";

/** Run a validation expected to fail and return the thrown error */
function expectValidationError(
  payload: JsonObject,
  schema: z.AnyZodObject,
): EventSchemaValidationError {
  try {
    getValidatedPayload(payload, schema);
  } catch (err) {
    if (err instanceof EventSchemaValidationError) return err;
    throw err;
  }
  throw new Error("expected getValidatedPayload to throw");
}

/** Helper: a valid file_upload_validation_success payload */
function makeValidationSuccess(overrides: Record<string, unknown> = {}) {
  return {
    upload_date: "2024-05-02T09:41:17.219034",
    file_id: "file-0001",
    object_id: "obj-001",
    bucket_id: "inbox",
    s3_endpoint_alias: "test-node",
    decrypted_size: 1024,
    decryption_secret_id: "secret-ref-001",
    content_offset: 124,
    encrypted_part_size: 65536,
    encrypted_parts_md5: ["md5-part-1"],
    encrypted_parts_sha256: ["sha256-part-1"],
    decrypted_sha256: "sha256-of-content",
    ...overrides,
  };
}

describe("file upload schemas", () => {
  test("file_upload_received accepts a complete payload", () => {
    const payload = {
      upload_date: "2024-05-02T09:41:17+00:00",
      file_id: "file-0001",
      object_id: "obj-001",
      bucket_id: "inbox",
      s3_endpoint_alias: "test-node",
      submitter_public_key: "test-public-key",
      decrypted_size: 1024,
      expected_decrypted_sha256: "sha256-of-content",
    };

    const validated = getValidatedPayload(payload, EVENT_SCHEMAS.file_upload_received);

    expect(validated).toEqual(payload);
  });

  test("file_upload_received reports an unparseable upload date", () => {
    const error = expectValidationError(
      {
        upload_date: "yesterday",
        file_id: "file-0001",
        object_id: "obj-001",
        bucket_id: "inbox",
        s3_endpoint_alias: "test-node",
        submitter_public_key: "test-public-key",
        decrypted_size: 1024,
        expected_decrypted_sha256: "sha256-of-content",
      },
      EVENT_SCHEMAS.file_upload_received,
    );

    expect(error.errorInfo).toEqual({
      missing_fields: [],
      mistyped_fields: {
        upload_date: "Could not convert upload date to datetime: yesterday",
      },
      unexpected_fields: [],
    });
  });

  test("file_registered_for_download reports a bad upload date", () => {
    const error = expectValidationError(
      {
        upload_date: "not-a-date",
        file_id: "file-0001",
        decrypted_sha256: "sha256-of-content",
        drs_uri: "drs://example.org/file-0001",
      },
      EVENT_SCHEMAS.file_registered_for_download,
    );

    expect(error.errorInfo.mistyped_fields).toEqual({
      upload_date: "Could not convert upload date to datetime: not-a-date",
    });
  });

  test("file_internally_registered extends validation success with encrypted_size", () => {
    const payload = makeValidationSuccess({ encrypted_size: 2048 });

    const validated = getValidatedPayload(
      payload,
      EVENT_SCHEMAS.file_internally_registered,
    );

    expect(validated.encrypted_size).toBe(2048);
    expect(validated.decryption_secret_id).toBe("secret-ref-001");
  });

  test("integer fields take digit-only strings as numbers", () => {
    const payload = makeValidationSuccess({ decrypted_size: "1024", content_offset: "124" });

    const validated = getValidatedPayload(
      payload,
      EVENT_SCHEMAS.file_upload_validation_success,
    );

    expect(validated.decrypted_size).toBe(1024);
    expect(validated.content_offset).toBe(124);
  });

  test.each([
    ["", "Expected number, received string"],
    ["10.5", "Expected number, received string"],
    [10.5, "Expected integer, received float"],
  ])("integer fields reject %j", (value, reason) => {
    const error = expectValidationError(
      makeValidationSuccess({ decrypted_size: value }),
      EVENT_SCHEMAS.file_upload_validation_success,
    );

    expect(error.errorInfo.mistyped_fields).toEqual({ decrypted_size: reason });
  });

  test("file_internally_registered lists inherited fields first when missing", () => {
    const error = expectValidationError({}, EVENT_SCHEMAS.file_internally_registered);

    expect(error.errorInfo.missing_fields).toEqual([
      "upload_date",
      "file_id",
      "object_id",
      "bucket_id",
      "s3_endpoint_alias",
      "decrypted_size",
      "decryption_secret_id",
      "content_offset",
      "encrypted_part_size",
      "encrypted_parts_md5",
      "encrypted_parts_sha256",
      "decrypted_sha256",
      "encrypted_size",
    ]);
  });

  test("file_upload_validation_success rejects non-string part checksums", () => {
    const error = expectValidationError(
      makeValidationSuccess({ encrypted_parts_md5: ["md5-part-1", 7] }),
      EVENT_SCHEMAS.file_upload_validation_success,
    );

    expect(error.errorInfo.mistyped_fields).toEqual({
      encrypted_parts_md5: "1: Expected string, received number",
    });
  });
});

describe("file download schemas", () => {
  const requested = {
    file_id: "file-0001",
    target_object_id: "obj-001",
    target_bucket_id: "outbox",
    s3_endpoint_alias: "test-node",
    decrypted_sha256: "sha256-of-content",
  };

  test("file_staged_for_download accepts the non-staged request fields", () => {
    expect(getValidatedPayload(requested, EVENT_SCHEMAS.file_staged_for_download)).toEqual(
      requested,
    );
  });

  test("file_download_served requires a context", () => {
    const error = expectValidationError(requested, EVENT_SCHEMAS.file_download_served);

    expect(error.errorInfo.missing_fields).toEqual(["context"]);
  });
});

describe("metadata schemas", () => {
  const overview = {
    accession: "dataset-0001",
    title: "Test dataset",
    stage: "download",
    description: null,
    dac_alias: "Test DAC",
    dac_email: "dac@example.org",
    files: [
      {
        accession: "file-0001",
        description: "Reads",
        file_extension: ".fastq.gz",
        format: "FASTQ",
      },
    ],
    curated: true,
  };

  test("metadata_dataset_overview keeps undeclared keys", () => {
    const validated = getValidatedPayload(
      overview,
      EVENT_SCHEMAS.metadata_dataset_overview,
    );

    expect(validated).toEqual(overview);
  });

  test("metadata_dataset_overview rejects an unknown stage and a bad e-mail", () => {
    const error = expectValidationError(
      { ...overview, stage: "archived", dac_email: "not-an-email" },
      EVENT_SCHEMAS.metadata_dataset_overview,
    );

    expect(error.errorInfo).toEqual({
      missing_fields: [],
      mistyped_fields: {
        stage: "Invalid enum value. Expected 'download' | 'upload', received 'archived'",
        dac_email: "Invalid email",
      },
      unexpected_fields: ["curated"],
    });
  });

  test("metadata_dataset_deleted needs only the accession", () => {
    expect(
      getValidatedPayload(
        { accession: "dataset-0001" },
        EVENT_SCHEMAS.metadata_dataset_deleted,
      ),
    ).toEqual({ accession: "dataset-0001" });
  });

  test("searchable_resource_upserted takes free-form content", () => {
    const payload = {
      accession: "study-0001",
      class_name: "Study",
      content: { title: "A study", nested: { tags: ["a", "b"] } },
    };

    expect(
      getValidatedPayload(payload, EVENT_SCHEMAS.searchable_resource_upserted),
    ).toEqual(payload);
  });

  test("searchable_resource_upserted rejects non-object content", () => {
    const error = expectValidationError(
      { accession: "study-0001", class_name: "Study", content: "text" },
      EVENT_SCHEMAS.searchable_resource_upserted,
    );

    expect(error.errorInfo.mistyped_fields).toEqual({
      content: "Expected object, received string",
    });
  });

  test("artifact extends its tag with content", () => {
    const payload = {
      study_accession: "study-0001",
      artifact_name: "added_accessions",
      content: {},
    };

    expect(getValidatedPayload(payload, artifactSchema)).toEqual(payload);
  });
});

describe("notification schema", () => {
  const notification = {
    recipient_email: "user@example.org",
    subject: "Your upload",
    recipient_name: "Test User",
    plaintext_body: "The upload is complete.",
  };

  test("defaults cc and bcc to empty lists", () => {
    const validated: EventPayload<"notification"> = getValidatedPayload(
      notification,
      EVENT_SCHEMAS.notification,
    );

    expect(validated.email_cc).toEqual([]);
    expect(validated.email_bcc).toEqual([]);
  });

  test("reports invalid addresses inside cc by index", () => {
    const error = expectValidationError(
      { ...notification, email_cc: ["ok@example.org", "nope"] },
      EVENT_SCHEMAS.notification,
    );

    expect(error.errorInfo.mistyped_fields).toEqual({ email_cc: "1: Invalid email" });
  });
});

describe("access control schemas", () => {
  const details = {
    user_id: "user-1",
    id: "request-1",
    dataset_id: "dataset-0001",
    dataset_title: "Test dataset",
    status: "pending",
    request_text: "Research use",
    dac_alias: "Test DAC",
    dac_email: "dac@example.org",
    access_starts: "2025-01-01T00:00:00Z",
    access_ends: "2025-12-31T23:59:59+01:00",
  };

  test("access_request_details parses dates and fills optional fields", () => {
    const validated = getValidatedPayload(details, EVENT_SCHEMAS.access_request_details);

    expect(validated.access_starts).toEqual(new Date("2025-01-01T00:00:00Z"));
    expect(validated.access_ends.toISOString()).toBe("2025-12-31T22:59:59.000Z");
    expect(validated.dataset_description).toBeNull();
    expect(validated.ticket_id).toBeNull();
    expect(validated.internal_note).toBeNull();
    expect(validated.note_to_requester).toBeNull();
  });

  test("access_request_details rejects dates without an offset", () => {
    const error = expectValidationError(
      { ...details, access_starts: "2025-01-01T00:00:00", status: "revoked" },
      EVENT_SCHEMAS.access_request_details,
    );

    expect(error.errorInfo.mistyped_fields).toEqual({
      status: "Invalid enum value. Expected 'allowed' | 'denied' | 'pending', received 'revoked'",
      access_starts: "Invalid datetime",
    });
  });

  test("iva_state_changed requires value and type even when null", () => {
    const error = expectValidationError(
      { user_id: "user-1", state: "Verified" },
      EVENT_SCHEMAS.iva_state_changed,
    );

    expect(error.errorInfo.missing_fields).toEqual(["value", "type"]);
  });

  test("iva_state_changed accepts null value and type", () => {
    const payload = { user_id: "user-1", value: null, type: null, state: "Unverified" };

    expect(getValidatedPayload(payload, EVENT_SCHEMAS.iva_state_changed)).toEqual(payload);
  });

  test("user title defaults to null and must be a known title", () => {
    const user = { user_id: "user-1", name: "Test User", email: "user@example.org" };

    expect(getValidatedPayload(user, userSchema).title).toBeNull();

    const error = expectValidationError({ ...user, title: "Sir" }, userSchema);
    expect(error.errorInfo.mistyped_fields).toEqual({
      title: "Invalid enum value. Expected 'Dr.' | 'Prof.', received 'Sir'",
    });
  });
});
