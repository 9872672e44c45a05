import { app } from "@azure/functions";
import { createDefaultProcessors } from "../../shared/processors";
import { loggers, settings } from "../../shared/runtime";
import { CLOUD_EVENTS_METHODS, createCloudEventsHandler } from "./handler";

const handler = createCloudEventsHandler({
  processors: createDefaultProcessors,
  allowedRate: settings.webhookAllowedRate,
});

// Fallback delivery path for Event Grid subscriptions with a webhook endpoint.
app.http("BlobCreatedHttpHandler", {
  route: "cloudevents",
  methods: CLOUD_EVENTS_METHODS,
  authLevel: "anonymous",
  handler: (request, context) =>
    handler(request, loggers.forContext(context)),
});
