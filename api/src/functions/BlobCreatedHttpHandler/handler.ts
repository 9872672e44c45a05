import type { HttpMethod, HttpResponseInit } from "@azure/functions";
import {
  isBlobCreated,
  isRecord,
  parseCloudEvent,
  toEventMetadata,
} from "../../shared/cloudEvent";
import { processBlobCreated } from "../../shared/dispatch";
import {
  badRequest,
  empty,
  getHeader,
  methodNotAllowed,
  serverError,
  type IncomingRequest,
} from "../../shared/http";
import { errorMessage, type Logger } from "../../shared/logger";
import type { ProcessorFactory } from "../../shared/processors";

export const REQUEST_ORIGIN_HEADER = "WebHook-Request-Origin";
export const ALLOWED_ORIGIN_HEADER = "WebHook-Allowed-Origin";
export const ALLOWED_RATE_HEADER = "WebHook-Allowed-Rate";

// Every method is routed here so the handler, not the host, answers 405.
export const CLOUD_EVENTS_METHODS: HttpMethod[] = [
  "GET",
  "POST",
  "PUT",
  "PATCH",
  "DELETE",
  "HEAD",
  "OPTIONS",
];

export type CloudEventsHandlerDeps = {
  processors: ProcessorFactory;
  allowedRate?: number;
};

type BodyResult =
  | { ok: true; body: Record<string, unknown> }
  | { ok: false; reason: string };

function readEventBody(text: string): BodyResult {
  if (!text.trim()) return { ok: false, reason: "No JSON data in request" };

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return { ok: false, reason: "Invalid JSON body" };
  }

  if (!isRecord(parsed) || Object.keys(parsed).length === 0) {
    return { ok: false, reason: "Request body is not a CloudEvent object" };
  }
  return { ok: true, body: parsed };
}

/**
 * CloudEvents abuse-protection handshake: echo the origin back to grant it.
 */
function handleValidation(
  req: IncomingRequest,
  logger: Logger,
  allowedRate?: number
): HttpResponseInit {
  logger.info("Handling CloudEvent validation request");

  const origin = getHeader(req, REQUEST_ORIGIN_HEADER);
  if (!origin) {
    logger.warn(`Validation request without ${REQUEST_ORIGIN_HEADER}`);
    return badRequest();
  }

  const headers: Record<string, string> = { [ALLOWED_ORIGIN_HEADER]: origin };
  if (allowedRate !== undefined) headers[ALLOWED_RATE_HEADER] = String(allowedRate);
  return empty(200, headers);
}

async function handleDelivery(
  body: Record<string, unknown>,
  logger: Logger,
  deps: CloudEventsHandlerDeps
): Promise<void> {
  logger.debug("CloudEvent received:", JSON.stringify(body, null, 2));

  const envelope = parseCloudEvent(body);
  logger.info("CloudEvent details");
  logger.info("  Spec version:", envelope.specVersion);
  logger.info("  Type:", envelope.type);
  logger.info("  Source:", envelope.source);
  logger.info("  ID:", envelope.id);
  logger.info("  Subject:", envelope.subject);
  logger.info("  Time:", envelope.time);

  if (!isBlobCreated(envelope)) {
    logger.warn("Unknown event type:", envelope.type);
    return;
  }

  await processBlobCreated(envelope.data, toEventMetadata(envelope), {
    processors: deps.processors(logger),
    logger,
  });
}

export function createCloudEventsHandler(deps: CloudEventsHandlerDeps) {
  return async function cloudEventsHandler(
    req: IncomingRequest,
    logger: Logger
  ): Promise<HttpResponseInit> {
    try {
      const method = req.method.toUpperCase();

      if (method === "OPTIONS") {
        return handleValidation(req, logger, deps.allowedRate);
      }

      if (method !== "POST") return methodNotAllowed();

      logger.info("Processing CloudEvent via HTTP trigger");

      const result = readEventBody(await req.text());
      if (!result.ok) {
        logger.error(result.reason);
        return badRequest();
      }

      await handleDelivery(result.body, logger, deps);
      return empty(200);
    } catch (err) {
      logger.error("Error processing CloudEvent:", errorMessage(err));
      return serverError();
    }
  };
}
