import type { BlobInfo } from "./blobInfo";
import type { EventMetadata } from "./cloudEvent";
import type { Logger } from "./logger";

export type BlobKind = "image" | "text" | "json" | "generic";

/** Swap one of these out to add real work for a content type. */
export interface BlobProcessor {
  process(info: BlobInfo, metadata: EventMetadata): void | Promise<void>;
}

export type BlobProcessors = Record<BlobKind, BlobProcessor>;

/** Processors log through the invocation they run in, so they are built per call. */
export type ProcessorFactory = (logger: Logger) => BlobProcessors;

abstract class LoggingBlobProcessor implements BlobProcessor {
  protected abstract readonly label: string;

  constructor(protected readonly logger: Logger) {}

  process(info: BlobInfo, metadata: EventMetadata): void {
    this.logger.info(`Processing ${this.label} blob:`, info.blobName);
    this.logger.debug("Event id:", metadata.id);
  }
}

// TODO: resize and generate thumbnails once a target container is decided
export class ImageBlobProcessor extends LoggingBlobProcessor {
  protected readonly label = "image";
}

export class TextBlobProcessor extends LoggingBlobProcessor {
  protected readonly label = "text";
}

export class JsonBlobProcessor extends LoggingBlobProcessor {
  protected readonly label = "JSON";
}

export class GenericBlobProcessor extends LoggingBlobProcessor {
  protected readonly label = "generic";
}

export const createDefaultProcessors: ProcessorFactory = (logger) => ({
  image: new ImageBlobProcessor(logger),
  text: new TextBlobProcessor(logger),
  json: new JsonBlobProcessor(logger),
  generic: new GenericBlobProcessor(logger),
});
