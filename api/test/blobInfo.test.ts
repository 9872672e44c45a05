import { describe, expect, it } from "vitest";
import {
  emptyBlobInfo,
  extractBlobInfo,
  splitBlobUrl,
} from "../src/shared/blobInfo";
import { parseCloudEvent } from "../src/shared/cloudEvent";
import { BLOB_URL, MemoryLogger } from "./helpers";

describe("extractBlobInfo", () => {
  it("flattens storage event data", () => {
    const logger = new MemoryLogger();
    const info = extractBlobInfo(
      {
        url: BLOB_URL,
        api: "PutBlob",
        clientRequestId: "client-1",
        requestId: "req-1",
        eTag: "0x8D1",
        contentType: "image/png",
        contentLength: 524288,
        blobType: "BlockBlob",
        sequencer: "00000000000004420000000000028963",
      },
      logger
    );

    expect(info).toEqual({
      url: BLOB_URL,
      api: "PutBlob",
      clientRequestId: "client-1",
      requestId: "req-1",
      etag: "0x8D1",
      contentType: "image/png",
      contentLength: 524288,
      blobType: "BlockBlob",
      sequencer: "00000000000004420000000000028963",
      blobName: "myfile.png",
      containerName: "mycontainer",
    });
    expect(logger.entries).toEqual([]);
  });

  it("returns empty info for an envelope without data", () => {
    const logger = new MemoryLogger();
    const envelope = parseCloudEvent({ type: "Microsoft.Storage.BlobCreated" });

    expect(extractBlobInfo(envelope.data, logger)).toEqual(emptyBlobInfo());
    expect(logger.lines("warn")).toEqual([]);
  });

  it("returns empty info and warns when data is not an object", () => {
    const logger = new MemoryLogger();

    expect(extractBlobInfo("not-an-object", logger)).toEqual(emptyBlobInfo());
    expect(logger.lines("warn")).toEqual([
      "Blob event data is not an object, using empty blob info",
    ]);
  });

  it("accepts numeric strings and truncates fractions", () => {
    const logger = new MemoryLogger();

    expect(extractBlobInfo({ contentLength: "2048" }, logger).contentLength).toBe(2048);
    expect(extractBlobInfo({ contentLength: 12.9 }, logger).contentLength).toBe(12);
    expect(logger.entries).toEqual([]);
  });

  it("defaults a non-numeric length to zero and keeps the other fields", () => {
    const logger = new MemoryLogger();
    const info = extractBlobInfo(
      { url: BLOB_URL, contentType: "text/plain", contentLength: "abc" },
      logger
    );

    expect(info.contentLength).toBe(0);
    expect(info.contentType).toBe("text/plain");
    expect(info.blobName).toBe("myfile.png");
    expect(logger.lines("warn")).toEqual([
      'Invalid contentLength "abc", defaulting to 0',
    ]);
  });

  it.each(["0x10", "1e3", "12px"])("rejects the non-decimal length %s", (raw) => {
    const logger = new MemoryLogger();

    expect(extractBlobInfo({ contentLength: raw }, logger).contentLength).toBe(0);
    expect(logger.lines("warn")).toEqual([
      `Invalid contentLength "${raw}", defaulting to 0`,
    ]);
  });

  it("rejects negative lengths", () => {
    const logger = new MemoryLogger();

    expect(extractBlobInfo({ contentLength: -5 }, logger).contentLength).toBe(0);
    expect(logger.lines("warn")).toEqual([
      "Invalid contentLength -5, defaulting to 0",
    ]);
  });
});

describe("splitBlobUrl", () => {
  it("takes the last two path segments", () => {
    expect(splitBlobUrl(BLOB_URL)).toEqual({
      blobName: "myfile.png",
      containerName: "mycontainer",
    });
  });

  it("returns empty names for an empty url", () => {
    expect(splitBlobUrl("")).toEqual({ blobName: "", containerName: "" });
  });

  it("returns empty names when there is only one segment", () => {
    expect(splitBlobUrl("myfile.png")).toEqual({
      blobName: "",
      containerName: "",
    });
  });

  it("handles a bare container/blob pair", () => {
    expect(splitBlobUrl("docs/readme.txt")).toEqual({
      blobName: "readme.txt",
      containerName: "docs",
    });
  });
});
