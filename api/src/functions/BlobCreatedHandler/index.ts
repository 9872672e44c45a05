import { app } from "@azure/functions";
import { createDefaultProcessors } from "../../shared/processors";
import { loggers } from "../../shared/runtime";
import { createBlobCreatedTriggerHandler, fromEventGridEvent } from "./handler";

const handler = createBlobCreatedTriggerHandler({
  processors: createDefaultProcessors,
});

app.eventGrid("BlobCreatedHandler", {
  handler: (event, context) => {
    const logger = loggers.forContext(context);
    logger.debug("Raw event received:", JSON.stringify(event));
    return handler(fromEventGridEvent(event), logger);
  },
});
