import { describe, it, expect, vi, beforeEach, type Mock } from "vitest";
import type { IncomingHttpHeaders } from "http";
import { handleSlackEvent, type SlackEventsHandlerDeps } from "../slack/events";
import { computeSlackSignature } from "../slack/verify";
import { EventDeduplicator } from "../services/eventDeduplicator";
import type { ConversationMessage } from "../conversation/types";

const SECRET = "test-secret";
const TIMESTAMP = "1700000000";
const NOW_MS = 1700000000 * 1000;

const history: ConversationMessage[] = [
  { role: "user", content: "earlier question", createdAt: "2024-01-01T00:00:00.000Z" },
  { role: "assistant", content: "earlier answer", createdAt: "2024-01-01T00:00:01.000Z" },
];

function signedRequest(payload: unknown, extraHeaders: IncomingHttpHeaders = {}) {
  const body = Buffer.from(typeof payload === "string" ? payload : JSON.stringify(payload), "utf8");
  const headers: IncomingHttpHeaders = {
    "x-slack-request-timestamp": TIMESTAMP,
    "x-slack-signature": computeSlackSignature(TIMESTAMP, body, SECRET),
    ...extraHeaders,
  };
  return { headers, body };
}

function createMockRes() {
  return {
    status: vi.fn().mockReturnThis(),
    json: vi.fn(),
    end: vi.fn(),
    headersSent: false,
  };
}

function mentionPayload(eventId = "Ev100") {
  return {
    type: "event_callback",
    event_id: eventId,
    event: {
      type: "app_mention",
      text: "<@UBOT> hello",
      ts: "111.222",
      channel: "C1",
      user: "U1",
    },
  };
}

function reactionPayload(reaction: string) {
  return {
    type: "event_callback",
    event_id: `Ev-${reaction}`,
    event: {
      type: "reaction_added",
      reaction,
      user: "U1",
      item: { type: "message", channel: "C1", ts: "111.333" },
    },
  };
}

describe("Slack events gate", () => {
  let deps: SlackEventsHandlerDeps;
  let sink: { process: Mock; recordFeedback: Mock };
  let conversations: { get: Mock };

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    sink = { process: vi.fn(), recordFeedback: vi.fn() };
    conversations = { get: vi.fn().mockReturnValue(history) };
    deps = {
      signingSecret: SECRET,
      toleranceSeconds: 300,
      conversations,
      sink,
      deduplicator: new EventDeduplicator({ now: () => NOW_MS }),
      now: () => NOW_MS,
    };
  });

  it("rejects a bad signature with an empty 400", () => {
    const req = signedRequest(mentionPayload(), { "x-slack-signature": "v0=deadbeef" });
    const res = createMockRes();

    handleSlackEvent(req, res, deps);

    expect(res.status).toHaveBeenCalledWith(400);
    expect(res.end).toHaveBeenCalledWith();
    expect(res.json).not.toHaveBeenCalled();
    expect(sink.process).not.toHaveBeenCalled();
  });

  it("rejects a stale request", () => {
    const res = createMockRes();

    handleSlackEvent(signedRequest(mentionPayload()), res, { ...deps, now: () => NOW_MS + 301_000 });

    expect(res.status).toHaveBeenCalledWith(400);
    expect(sink.process).not.toHaveBeenCalled();
  });

  it("rejects an unsigned handshake", () => {
    const res = createMockRes();
    const body = Buffer.from(JSON.stringify({ type: "url_verification", challenge: "abc123" }));

    handleSlackEvent({ headers: {}, body }, res, deps);

    expect(res.status).toHaveBeenCalledWith(400);
    expect(res.json).not.toHaveBeenCalled();
  });

  it("echoes the handshake challenge", () => {
    const res = createMockRes();

    handleSlackEvent(signedRequest({ type: "url_verification", challenge: "abc123" }), res, deps);

    expect(res.status).toHaveBeenCalledWith(200);
    expect(res.json).toHaveBeenCalledWith({ challenge: "abc123" });
  });

  it("accepts the X-Request-* header names", () => {
    const body = Buffer.from(JSON.stringify({ type: "url_verification", challenge: "abc123" }));
    const res = createMockRes();

    handleSlackEvent(
      {
        headers: {
          "x-request-timestamp": TIMESTAMP,
          "x-request-signature": computeSlackSignature(TIMESTAMP, body, SECRET),
        },
        body,
      },
      res,
      deps,
    );

    expect(res.json).toHaveBeenCalledWith({ challenge: "abc123" });
  });

  it("acknowledges a mention and dispatches it with the thread history length", () => {
    const res = createMockRes();

    handleSlackEvent(signedRequest(mentionPayload()), res, deps);

    expect(res.json).toHaveBeenCalledWith({ ok: true });
    expect(conversations.get).toHaveBeenCalledWith("111.222");
    expect(sink.process).toHaveBeenCalledWith({
      conversationId: "111.222",
      channelId: "C1",
      text: "hello",
      userId: "U1",
      priorMessageCount: 2,
    });
  });

  it("dispatches a redelivered event only once", () => {
    handleSlackEvent(signedRequest(mentionPayload("Ev200")), createMockRes(), deps);
    const res = createMockRes();

    handleSlackEvent(signedRequest(mentionPayload("Ev200")), res, deps);

    expect(res.json).toHaveBeenCalledWith({ ok: true });
    expect(sink.process).toHaveBeenCalledTimes(1);
  });

  it("acknowledges http_timeout retries without dispatching", () => {
    const res = createMockRes();

    handleSlackEvent(
      signedRequest(mentionPayload(), { "x-slack-retry-num": "1", "x-slack-retry-reason": "http_timeout" }),
      res,
      deps,
    );

    expect(res.json).toHaveBeenCalledWith({ ok: true });
    expect(sink.process).not.toHaveBeenCalled();
  });

  it("records positive reactions as feedback", () => {
    const res = createMockRes();

    handleSlackEvent(signedRequest(reactionPayload("+1")), res, deps);

    expect(res.json).toHaveBeenCalledWith({ ok: true });
    expect(sink.recordFeedback).toHaveBeenCalledWith({
      reactionName: "+1",
      conversationId: "111.333",
      channelId: "C1",
      userId: "U1",
    });
  });

  it("ignores other reactions", () => {
    const res = createMockRes();

    handleSlackEvent(signedRequest(reactionPayload("-1")), res, deps);

    expect(res.json).toHaveBeenCalledWith({ ok: true });
    expect(sink.recordFeedback).not.toHaveBeenCalled();
    expect(sink.process).not.toHaveBeenCalled();
  });

  it("acknowledges and logs an event missing required fields", () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    const res = createMockRes();

    handleSlackEvent(
      signedRequest({ type: "event_callback", event: { type: "app_mention", text: "hi", channel: "C1" } }),
      res,
      deps,
    );

    expect(res.status).toHaveBeenCalledWith(200);
    expect(res.json).toHaveBeenCalledWith({ ok: true });
    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(errorSpy.mock.calls[0][0]).toContain("app_mention has neither thread_ts nor ts");
    expect(sink.process).not.toHaveBeenCalled();
  });

  it("acknowledges a signed body that is not JSON", () => {
    const res = createMockRes();

    handleSlackEvent(signedRequest("not json"), res, deps);

    expect(res.json).toHaveBeenCalledWith({ ok: true });
  });

  it("acknowledges unknown events", () => {
    const res = createMockRes();

    handleSlackEvent(signedRequest({ type: "event_callback", event: { type: "message" } }), res, deps);

    expect(res.json).toHaveBeenCalledWith({ ok: true });
    expect(sink.process).not.toHaveBeenCalled();
  });

  it("still acknowledges when the sink throws", () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    sink.process.mockImplementation(() => {
      throw new Error("queue unavailable");
    });
    const res = createMockRes();

    handleSlackEvent(signedRequest(mentionPayload()), res, deps);

    expect(res.json).toHaveBeenCalledTimes(1);
    expect(res.json).toHaveBeenCalledWith({ ok: true });
  });
});
