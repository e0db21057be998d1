/**
 * Slack Event Classification
 *
 * Turns a verified Events API payload into one of a small set of event kinds
 * with normalized fields. Unrecognized shapes become `unknown` (a no-op for the
 * caller); recognized events missing a required field throw PreconditionError.
 *
 * Layer: Slack (event parsing)
 */

import { z } from "zod";
import { SLACK_CONSTANTS } from "../config/constants";
import { PreconditionError } from "../utils/errorHandler";

export type HandshakeEvent = {
  kind: "handshake";
  challenge: string;
};

export type MentionEvent = {
  kind: "mention";
  /** Thread root timestamp: `thread_ts`, or the message's own `ts` for a new thread. */
  conversationId: string;
  channelId: string;
  text: string;
  /** This message's own ts (equals conversationId for a thread root). */
  messageTs?: string;
  userId?: string;
  eventId?: string;
};

export type ReactionEvent = {
  kind: "reaction";
  reactionName: string;
  conversationId: string;
  channelId: string;
  userId?: string;
  eventId?: string;
};

export type UnknownEvent = {
  kind: "unknown";
  reason: string;
};

export type ClassifiedEvent = HandshakeEvent | MentionEvent | ReactionEvent | UnknownEvent;

const envelopeSchema = z.object({
  type: z.string().optional(),
  challenge: z.unknown().optional(),
  event_id: z.string().optional(),
  event: z.record(z.unknown()).optional(),
});

type SlackInnerEvent = Record<string, unknown>;

const LEADING_MENTION = /^\s*<@[A-Za-z0-9]+(?:\|[^>]*)?>\s*/;

/**
 * Remove a leading `<@U123>` mention and surrounding whitespace.
 */
export function stripLeadingMention(text: string): string {
  return text.replace(LEADING_MENTION, "").trim();
}

const POSITIVE_REACTIONS: ReadonlySet<string> = new Set(SLACK_CONSTANTS.POSITIVE_REACTIONS);

export function isPositiveReaction(reaction: string | undefined | null): boolean {
  return typeof reaction === "string" && POSITIVE_REACTIONS.has(reaction);
}

function readString(source: Record<string, unknown>, key: string): string | undefined {
  const value = source[key];
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

function readRecord(source: Record<string, unknown>, key: string): Record<string, unknown> | undefined {
  const parsed = z.record(z.unknown()).safeParse(source[key]);
  return parsed.success ? parsed.data : undefined;
}

function classifyMention(event: SlackInnerEvent, eventId: string | undefined): MentionEvent {
  const conversationId = readString(event, "thread_ts") ?? readString(event, "ts");
  if (!conversationId) {
    throw new PreconditionError("app_mention has neither thread_ts nor ts");
  }
  const channelId = readString(event, "channel");
  if (!channelId) {
    throw new PreconditionError(`app_mention in thread ${conversationId} has no channel`);
  }

  return {
    kind: "mention",
    conversationId,
    channelId,
    text: stripLeadingMention(readString(event, "text") ?? ""),
    messageTs: readString(event, "ts"),
    userId: readString(event, "user"),
    eventId,
  };
}

function classifyReaction(event: SlackInnerEvent, eventId: string | undefined): ReactionEvent {
  const reactionName = readString(event, "reaction");
  if (!reactionName) {
    throw new PreconditionError("reaction_added has no reaction name");
  }
  const item = readRecord(event, "item") ?? {};
  const conversationId = readString(item, "ts");
  const channelId = readString(item, "channel");
  if (!conversationId || !channelId) {
    throw new PreconditionError(`reaction_added (${reactionName}) has no item ts/channel`);
  }

  return {
    kind: "reaction",
    reactionName,
    conversationId,
    channelId,
    userId: readString(event, "user"),
    eventId,
  };
}

export function classifySlackEvent(payload: unknown): ClassifiedEvent {
  const parsed = envelopeSchema.safeParse(payload);
  if (!parsed.success) {
    return { kind: "unknown", reason: "payload is not an event envelope" };
  }
  const envelope = parsed.data;

  if (envelope.type === "url_verification") {
    if (typeof envelope.challenge !== "string") {
      return { kind: "unknown", reason: "url_verification without challenge" };
    }
    return { kind: "handshake", challenge: envelope.challenge };
  }

  const event = envelope.event;
  const eventType = event ? readString(event, "type") : undefined;

  if (event && envelope.type === "event_callback" && eventType === "app_mention") {
    return classifyMention(event, envelope.event_id);
  }

  if (event && eventType === "reaction_added") {
    return classifyReaction(event, envelope.event_id);
  }

  return {
    kind: "unknown",
    reason: `unhandled event: type=${envelope.type ?? "none"}, event.type=${eventType ?? "none"}`,
  };
}
