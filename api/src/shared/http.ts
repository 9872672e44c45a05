import type { HttpResponseInit } from "@azure/functions";

/**
 * The slice of HttpRequest the handlers read. HttpRequest from
 * @azure/functions satisfies it, and so does a plain object in tests.
 */
export interface IncomingRequest {
  readonly method: string;
  readonly headers: { get(name: string): string | null };
  text(): Promise<string>;
}

export function getHeader(req: IncomingRequest, name: string): string | undefined {
  const v = req.headers.get(name)?.trim();
  return v ? v : undefined;
}

export function empty(
  status: number,
  headers?: Record<string, string>
): HttpResponseInit {
  return headers ? { status, headers } : { status };
}

export function json(status: number, body: unknown): HttpResponseInit {
  return {
    status,
    headers: { "Content-Type": "application/json" },
    jsonBody: body,
  };
}

// CloudEvents webhook senders only look at the status code
export function badRequest(): HttpResponseInit {
  return empty(400);
}

export function methodNotAllowed(): HttpResponseInit {
  return empty(405);
}

export function serverError(): HttpResponseInit {
  return empty(500);
}
