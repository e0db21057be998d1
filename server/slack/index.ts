/**
 * Slack Routes Registration
 *
 * Purpose:
 * Registers the Slack webhook endpoint with the Express app.
 * Uses raw body parsing for signature verification.
 *
 * Layer: Slack (route setup)
 */

import type { Express } from "express";
import express from "express";
import { SLACK_CONSTANTS } from "../config/constants";
import { createSlackEventsHandler, type SlackEventsHandlerDeps } from "./events";

export const SLACK_EVENTS_PATH = "/chat";

export function registerSlackRoutes(app: Express, deps: SlackEventsHandlerDeps) {
  app.post(
    SLACK_EVENTS_PATH,
    express.raw({ type: "*/*", limit: SLACK_CONSTANTS.MAX_BODY_BYTES }),
    createSlackEventsHandler(deps),
  );
}
