import { app } from "@azure/functions";
import { createHealthHandler } from "./handler";

app.http("HealthCheck", {
  route: "health",
  methods: ["GET"],
  authLevel: "anonymous",
  handler: createHealthHandler(),
});
