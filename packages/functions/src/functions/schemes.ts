import { app } from "@azure/functions";
import { withCors } from "../lib/http";
import { createScheme } from "../lib/scheme-handler";

app.http("schemes", {
  methods: ["POST", "OPTIONS"],
  authLevel: "anonymous",
  route: "schemes",
  handler: withCors(createScheme),
});
