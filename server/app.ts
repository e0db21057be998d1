import express, { type ErrorRequestHandler, type Express } from "express";
import { registerSlackRoutes } from "./slack";
import type { SlackEventsHandlerDeps } from "./slack/events";
import { handleRouteError } from "./utils/errorHandler";

export interface AppDeps {
  slackEvents: SlackEventsHandlerDeps;
}

export const HEALTH_PATHS = ["/", "/health"];

export function createApp(deps: AppDeps): Express {
  const app = express();
  app.disable("x-powered-by");

  app.get(HEALTH_PATHS, (_req, res) => {
    res.json({ status: "ok" });
  });

  registerSlackRoutes(app, deps.slackEvents);

  const errorHandler: ErrorRequestHandler = (err, _req, res, next) => {
    if (res.headersSent) {
      next(err);
      return;
    }
    handleRouteError(res, err, "HTTP");
  };
  app.use(errorHandler);

  return app;
}
