/**
 * Slack Events Handler
 *
 * Purpose:
 * HTTP gate for the Slack Events API. Verifies the request signature over the
 * raw body, classifies the payload, and hands recognized events to the sink.
 *
 * Key Flows:
 * 1. Signature verification (before anything is parsed)
 * 2. URL verification (Slack challenge echo)
 * 3. Retry and duplicate filtering
 * 4. Mention -> agent job, positive reaction -> feedback job
 *
 * Every authenticated request is acknowledged immediately with {ok: true};
 * the agent runs after the response. Slack never sees a 5xx from here.
 *
 * Layer: Slack (event handling)
 */

import type { Request, RequestHandler, Response } from "express";
import type { ConversationStore } from "../conversation/types";
import type { EventDeduplicator } from "../services/eventDeduplicator";
import { PreconditionError } from "../utils/errorHandler";
import { errorMeta, logDebug, logError, logInfo, logWarn, RequestLogger } from "../utils/logger";
import { classifySlackEvent, isPositiveReaction, type ClassifiedEvent } from "./eventClassifier";
import type { MentionJob, SlackEventSink } from "./types";
import { verifySlackSignature } from "./verify";

export interface SlackEventsHandlerDeps {
  signingSecret: string;
  toleranceSeconds: number;
  conversations: Pick<ConversationStore, "get">;
  sink: SlackEventSink;
  deduplicator?: EventDeduplicator;
  /** Clock for signature freshness, in milliseconds. */
  now?: () => number;
}

export type SlackEventRequest = Pick<Request, "headers" | "body">;
export type SlackEventResponse = Pick<Response, "status" | "json" | "end" | "headersSent">;

function headerValue(req: SlackEventRequest, name: string): string | undefined {
  const value = req.headers[name];
  const first = Array.isArray(value) ? value[0] : value;
  return first || undefined;
}

function acknowledge(res: SlackEventResponse): void {
  if (!res.headersSent) {
    res.status(200).json({ ok: true });
  }
}

export function createSlackEventsHandler(deps: SlackEventsHandlerDeps): RequestHandler {
  return (req, res) => handleSlackEvent(req, res, deps);
}

/**
 * Handles one Events API request. Responds synchronously; dispatched work
 * continues after return.
 */
export function handleSlackEvent(req: SlackEventRequest, res: SlackEventResponse, deps: SlackEventsHandlerDeps): void {
  const rawBody = Buffer.isBuffer(req.body) ? req.body : Buffer.alloc(0);
  const timestamp = headerValue(req, "x-slack-request-timestamp") ?? headerValue(req, "x-request-timestamp");
  const signature = headerValue(req, "x-slack-signature") ?? headerValue(req, "x-request-signature");

  const verified = verifySlackSignature(timestamp, signature, rawBody, deps.signingSecret, {
    toleranceSeconds: deps.toleranceSeconds,
    now: deps.now?.(),
  });
  if (!verified) {
    logWarn("[Slack] Rejected request with invalid signature");
    res.status(400).end();
    return;
  }

  let payload: unknown;
  try {
    payload = JSON.parse(rawBody.toString("utf8"));
  } catch (err) {
    logWarn("[Slack] Ignoring malformed event payload", errorMeta(err));
    acknowledge(res);
    return;
  }

  let event: ClassifiedEvent;
  try {
    event = classifySlackEvent(payload);
  } catch (err) {
    if (err instanceof PreconditionError) {
      logError(`[Slack] Dropping event: ${err.message}`);
    } else {
      logError("[Slack] Failed to classify event", errorMeta(err));
    }
    acknowledge(res);
    return;
  }

  if (event.kind === "handshake") {
    logInfo("[Slack] Received URL verification challenge");
    res.status(200).json({ challenge: event.challenge });
    return;
  }

  if (event.kind === "unknown") {
    logDebug(`[Slack] Ignoring ${event.reason}`);
    acknowledge(res);
    return;
  }

  const retryReason = headerValue(req, "x-slack-retry-reason");
  if (retryReason === "http_timeout") {
    logInfo(`[Slack] Ignoring http_timeout retry #${headerValue(req, "x-slack-retry-num") ?? "?"}`);
    acknowledge(res);
    return;
  }

  // ACK before dispatch; Slack expects an answer within 3 seconds
  acknowledge(res);

  try {
    if (event.kind === "mention") {
      const messageKey = event.messageTs ? `ts:${event.channelId}:${event.messageTs}` : undefined;
      if (deps.deduplicator?.isDuplicate(event.eventId, messageKey)) {
        logInfo(`[Slack] Duplicate event skipped (eventId=${event.eventId ?? "none"})`);
        return;
      }

      const logger = new RequestLogger(event.channelId, event.conversationId, event.userId);
      const history = deps.conversations.get(event.conversationId);
      const job: MentionJob = {
        conversationId: event.conversationId,
        channelId: event.channelId,
        text: event.text,
        userId: event.userId,
        priorMessageCount: history.length,
      };
      logger.info("Backgrounding message processing for thread", {
        text: event.text.substring(0, 100),
        priorMessageCount: job.priorMessageCount,
      });
      deps.sink.process(job);
      return;
    }

    if (!isPositiveReaction(event.reactionName)) {
      logDebug(`[Slack] Ignoring reaction ${event.reactionName}`);
      return;
    }
    if (deps.deduplicator?.isDuplicate(event.eventId)) {
      logInfo(`[Slack] Duplicate reaction skipped (eventId=${event.eventId ?? "none"})`);
      return;
    }
    deps.sink.recordFeedback({
      reactionName: event.reactionName,
      conversationId: event.conversationId,
      channelId: event.channelId,
      userId: event.userId,
    });
  } catch (err) {
    logError("[Slack] Failed to dispatch event", errorMeta(err));
  }
}
