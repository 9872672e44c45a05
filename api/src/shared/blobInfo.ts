import { z } from "zod";
import { isRecord, optionalText } from "./cloudEvent";
import { errorMessage, type Logger } from "./logger";

/**
 * Storage BlobCreated data, flattened. blobName and containerName come from
 * the last two path segments of url.
 */
export type BlobInfo = {
  url: string;
  api: string;
  clientRequestId: string;
  requestId: string;
  etag: string;
  contentType: string;
  contentLength: number;
  blobType: string;
  sequencer: string;
  blobName: string;
  containerName: string;
};

const blobCreatedDataSchema = z.object({
  url: optionalText,
  api: optionalText,
  clientRequestId: optionalText,
  requestId: optionalText,
  eTag: optionalText,
  contentType: optionalText,
  blobType: optionalText,
  sequencer: optionalText,
});

export function emptyBlobInfo(): BlobInfo {
  return {
    url: "",
    api: "",
    clientRequestId: "",
    requestId: "",
    etag: "",
    contentType: "",
    contentLength: 0,
    blobType: "",
    sequencer: "",
    blobName: "",
    containerName: "",
  };
}

// https://{account}.blob.core.windows.net/{container}/{blobName}
export function splitBlobUrl(url: string): {
  blobName: string;
  containerName: string;
} {
  const segments = url.split("/");
  if (!url || segments.length < 2) return { blobName: "", containerName: "" };

  return {
    blobName: segments.at(-1) ?? "",
    containerName: segments.at(-2) ?? "",
  };
}

const DECIMAL_LENGTH = /^\d+(\.\d+)?$/;

function toContentLength(value: unknown, logger: Logger): number {
  if (value === undefined || value === null) return 0;

  const n =
    typeof value === "number"
      ? value
      : typeof value === "string" && DECIMAL_LENGTH.test(value.trim())
        ? Number(value.trim())
        : Number.NaN;

  if (!Number.isFinite(n) || n < 0) {
    logger.warn(
      `Invalid contentLength ${JSON.stringify(value)}, defaulting to 0`
    );
    return 0;
  }
  return Math.trunc(n);
}

/**
 * Best-effort: a malformed field never fails the delivery, it just leaves
 * that field empty (or the whole struct, if data is not an object).
 */
export function extractBlobInfo(data: unknown, logger: Logger): BlobInfo {
  if (!isRecord(data)) {
    logger.warn("Blob event data is not an object, using empty blob info");
    return emptyBlobInfo();
  }

  try {
    const fields = blobCreatedDataSchema.parse(data);
    return {
      url: fields.url,
      api: fields.api,
      clientRequestId: fields.clientRequestId,
      requestId: fields.requestId,
      etag: fields.eTag,
      contentType: fields.contentType,
      contentLength: toContentLength(data.contentLength, logger),
      blobType: fields.blobType,
      sequencer: fields.sequencer,
      ...splitBlobUrl(fields.url),
    };
  } catch (err) {
    logger.warn("Error extracting blob info:", errorMessage(err));
    return emptyBlobInfo();
  }
}
