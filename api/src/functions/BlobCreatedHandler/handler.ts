import { z } from "zod";
import {
  isRecord,
  optionalText,
  type EventMetadata,
} from "../../shared/cloudEvent";
import { processBlobCreated } from "../../shared/dispatch";
import { errorMessage, type Logger } from "../../shared/logger";
import type { ProcessorFactory } from "../../shared/processors";

export const UNKNOWN_DATA_VERSION = "unknown";

/**
 * What the Event Grid trigger hands us, reduced to what we read. Tests build
 * these directly.
 */
export interface TriggerEvent {
  readonly id: string;
  readonly source: string;
  readonly subject: string;
  readonly type: string;
  readonly time: string;
  readonly dataVersion?: string;
  json(): unknown;
}

// Covers both the Event Grid schema and the CloudEvents schema.
const platformEventSchema = z.object({
  id: optionalText,
  source: optionalText,
  topic: optionalText,
  subject: optionalText,
  type: optionalText,
  eventType: optionalText,
  time: optionalText,
  eventTime: optionalText,
  dataVersion: z.string().min(1).catch(UNKNOWN_DATA_VERSION),
  data: z.unknown(),
});

export function fromEventGridEvent(raw: unknown): TriggerEvent {
  const e = platformEventSchema.parse(isRecord(raw) ? raw : {});
  return {
    id: e.id,
    source: e.source || e.topic,
    subject: e.subject,
    type: e.type || e.eventType,
    time: e.time || e.eventTime,
    dataVersion: e.dataVersion,
    json: () => e.data,
  };
}

// Storage events always carry an object; anything else has nothing to extract.
function hasEventData(data: unknown): data is Record<string, unknown> {
  return isRecord(data) && Object.keys(data).length > 0;
}

export type BlobCreatedTriggerDeps = {
  processors: ProcessorFactory;
};

export function createBlobCreatedTriggerHandler(deps: BlobCreatedTriggerDeps) {
  return async function blobCreatedHandler(
    event: TriggerEvent,
    logger: Logger
  ): Promise<void> {
    try {
      const metadata: EventMetadata = {
        id: event.id,
        source: event.source,
        subject: event.subject,
        eventType: event.type,
        eventTime: event.time,
        dataVersion: event.dataVersion ?? UNKNOWN_DATA_VERSION,
      };
      logger.info("CloudEvent metadata:", JSON.stringify(metadata, null, 2));

      const data = event.json();
      if (!hasEventData(data)) {
        logger.warn("No event data found in CloudEvent");
        return;
      }

      await processBlobCreated(data, metadata, {
        processors: deps.processors(logger),
        logger,
      });
    } catch (err) {
      // Rethrow so Event Grid retries per the subscription's policy.
      logger.error("Error processing CloudEvent:", errorMessage(err));
      throw err;
    }
  };
}
