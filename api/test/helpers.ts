import { vi } from "vitest";
import type { LogLevel } from "../src/shared/env";
import type { IncomingRequest } from "../src/shared/http";
import type { Logger } from "../src/shared/logger";

export type LogEntry = { level: LogLevel; line: string };

export class MemoryLogger implements Logger {
  readonly entries: LogEntry[] = [];

  debug(message: string, ...args: unknown[]): void {
    this.push("debug", message, args);
  }

  info(message: string, ...args: unknown[]): void {
    this.push("info", message, args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.push("warn", message, args);
  }

  error(message: string, ...args: unknown[]): void {
    this.push("error", message, args);
  }

  lines(level: LogLevel): string[] {
    return this.entries.filter((e) => e.level === level).map((e) => e.line);
  }

  private push(level: LogLevel, message: string, args: unknown[]): void {
    this.entries.push({ level, line: [message, ...args.map(String)].join(" ") });
  }
}

export function fakeRequest(
  method: string,
  init: { body?: string; headers?: Record<string, string> } = {}
): IncomingRequest {
  return {
    method,
    headers: new Headers(init.headers),
    text: async () => init.body ?? "",
  };
}

export function fakeProcessors() {
  const processors = {
    image: { process: vi.fn() },
    text: { process: vi.fn() },
    json: { process: vi.fn() },
    generic: { process: vi.fn() },
  };
  return { processors, factory: () => processors };
}

export const BLOB_URL =
  "https://acct.blob.core.windows.net/mycontainer/myfile.png";

export function blobCreatedEnvelope(data: Record<string, unknown>) {
  return {
    specversion: "1.0",
    type: "Microsoft.Storage.BlobCreated",
    source:
      "/subscriptions/test-sub/resourceGroups/test-rg/providers/Microsoft.Storage/storageAccounts/acct",
    id: "evt-1",
    subject: "/blobServices/default/containers/mycontainer/blobs/myfile.png",
    time: "2026-03-01T10:00:00Z",
    data,
  };
}
