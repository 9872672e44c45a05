import { z } from "zod";

export const BLOB_CREATED_EVENT_TYPE = "Microsoft.Storage.BlobCreated";
export const DEFAULT_SPEC_VERSION = "1.0";

/** Missing or non-string values read as "". */
export const optionalText = z.string().catch("");

const cloudEventSchema = z.object({
  id: optionalText,
  source: optionalText,
  type: optionalText,
  time: optionalText,
  subject: optionalText,
  specversion: z.string().catch(DEFAULT_SPEC_VERSION),
  data: z.record(z.unknown()).catch({}),
});

export type CloudEventEnvelope = Readonly<{
  id: string;
  source: string;
  type: string;
  specVersion: string;
  time: string;
  subject: string;
  data: Readonly<Record<string, unknown>>;
}>;

/** What processors get to know about the event that announced a blob. */
export type EventMetadata = Readonly<{
  id: string;
  source: string;
  subject: string;
  eventType: string;
  eventTime: string;
  specVersion?: string;
  dataVersion?: string;
}>;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Lenient CloudEvents 1.0 reader: never throws, unknown specversion values are
 * passed through untouched.
 */
export function parseCloudEvent(
  body: Record<string, unknown>
): CloudEventEnvelope {
  const e = cloudEventSchema.parse(body);
  return {
    id: e.id,
    source: e.source,
    type: e.type,
    specVersion: e.specversion,
    time: e.time,
    subject: e.subject,
    data: e.data,
  };
}

export function toEventMetadata(envelope: CloudEventEnvelope): EventMetadata {
  return {
    id: envelope.id,
    source: envelope.source,
    subject: envelope.subject,
    eventType: envelope.type,
    eventTime: envelope.time,
    specVersion: envelope.specVersion,
  };
}

export function isBlobCreated(envelope: CloudEventEnvelope): boolean {
  return envelope.type === BLOB_CREATED_EVENT_TYPE;
}
