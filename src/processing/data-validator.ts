/**
 * Data Validator
 *
 * Validates persisted snapshot documents against the expected schema
 * using Joi, so a hand-edited or truncated file is rejected on load
 * instead of feeding half-formed events into the change detector.
 */
import Joi from "joi";
import { CHANGE_TYPES } from "../config/constants";
import { SnapshotLoadError } from "../shared/errors/check.errors";
import { logger } from "../monitoring/logger";

/** On-disk event shape (snake_case) */
export interface EventDocument {
  id: string;
  stable_key: string;
  state: string;
  title: string;
  date_text: string;
  city?: string;
  raw: string;
  source_url: string;
  first_seen: string;
}

export interface ChangeDocument {
  event_id: string;
  change_type: string;
  old_value: string;
  new_value: string;
  detected_at: string;
}

export interface RemovedEventDocument {
  event: EventDocument;
  removed_at: string;
}

/** On-disk snapshot layout */
export interface SnapshotDocument {
  events: Record<string, EventDocument>;
  stable_index: Record<string, string>;
  change_log: ChangeDocument[];
  removed_events: Record<string, RemovedEventDocument>;
  captured_at: string;
}

const eventSchema = Joi.object({
  id: Joi.string().required(),
  stable_key: Joi.string().required(),
  state: Joi.string().length(2).required(),
  title: Joi.string().allow("").required(),
  date_text: Joi.string().allow("").required(),
  city: Joi.string().allow(""),
  raw: Joi.string().allow("").required(),
  source_url: Joi.string().allow("").required(),
  first_seen: Joi.string().isoDate().required(),
});

const changeSchema = Joi.object({
  event_id: Joi.string().required(),
  change_type: Joi.string()
    .valid(...Object.values(CHANGE_TYPES))
    .required(),
  old_value: Joi.string().allow("").required(),
  new_value: Joi.string().allow("").required(),
  detected_at: Joi.string().isoDate().required(),
});

const snapshotSchema = Joi.object<SnapshotDocument>({
  events: Joi.object().pattern(Joi.string(), eventSchema).required(),
  stable_index: Joi.object().pattern(Joi.string(), Joi.string()).default({}),
  change_log: Joi.array().items(changeSchema).default([]),
  removed_events: Joi.object()
    .pattern(
      Joi.string(),
      Joi.object({
        event: eventSchema.required(),
        removed_at: Joi.string().isoDate().required(),
      })
    )
    .default({}),
  captured_at: Joi.string().isoDate().required(),
});

/**
 * Validate a parsed snapshot document.
 * Throws SnapshotLoadError if the document does not match the schema.
 *
 * @param document - Parsed JSON of unknown shape
 * @param source - File path, for the error message
 */
export function validateSnapshotDocument(
  document: unknown,
  source: string
): SnapshotDocument {
  const { error, value } = snapshotSchema.validate(document, {
    abortEarly: false,
    stripUnknown: true,
  });

  if (error) {
    const details = error.details.map((d) => d.message).join("; ");
    logger.warn({ source, validationErrors: details }, "Snapshot validation failed");
    throw new SnapshotLoadError(`Snapshot ${source} failed validation: ${details}`);
  }

  return value;
}
