import { extractBlobInfo, type BlobInfo } from "./blobInfo";
import type { EventMetadata } from "./cloudEvent";
import type { Logger } from "./logger";
import type { BlobKind, BlobProcessors } from "./processors";

/** Prefix checks are case-sensitive; first match wins. */
export function selectBlobKind(contentType: string): BlobKind {
  if (contentType.startsWith("image/")) return "image";
  if (contentType.startsWith("text/")) return "text";
  if (contentType === "application/json") return "json";
  return "generic";
}

export type BlobDispatcher = (
  info: BlobInfo,
  metadata: EventMetadata
) => Promise<BlobKind>;

export type DispatchDeps = {
  processors: BlobProcessors;
  logger: Logger;
};

export function createBlobDispatcher({
  processors,
  logger,
}: DispatchDeps): BlobDispatcher {
  return async (info, metadata) => {
    logger.info("Processing blob creation");
    logger.info("  Blob name:", info.blobName || "Unknown");
    logger.info("  Container:", info.containerName || "Unknown");
    logger.info("  Content type:", info.contentType || "Unknown");
    logger.info("  Content length:", `${info.contentLength} bytes`);
    logger.info("  Event time:", metadata.eventTime || "Unknown");

    const kind = selectBlobKind(info.contentType);
    await processors[kind].process(info, metadata);
    return kind;
  };
}

/**
 * Extract + dispatch, shared by the Event Grid trigger and the webhook.
 */
export async function processBlobCreated(
  data: unknown,
  metadata: EventMetadata,
  deps: DispatchDeps
): Promise<BlobKind> {
  const info = extractBlobInfo(data, deps.logger);
  return createBlobDispatcher(deps)(info, metadata);
}
