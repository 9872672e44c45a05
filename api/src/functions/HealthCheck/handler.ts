import type { HttpResponseInit } from "@azure/functions";
import { json } from "../../shared/http";

export const APP_VERSION = "1.0.0";

export type HealthBody = {
  status: "healthy";
  timestamp: string;
  version: string;
};

export function createHealthHandler(clock: () => Date = () => new Date()) {
  return async function healthHandler(): Promise<HttpResponseInit> {
    const body: HealthBody = {
      status: "healthy",
      timestamp: clock().toISOString(),
      version: APP_VERSION,
    };
    return json(200, body);
  };
}
