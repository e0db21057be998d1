import { describe, it, expect, vi, beforeEach } from "vitest";
import { handleFeedback } from "../slack/feedbackHandler";
import type { FeedbackJob } from "../slack/types";

function createSlack() {
  return {
    postMessage: vi.fn().mockResolvedValue("111.999"),
    getChannelName: vi.fn().mockResolvedValue("support"),
  };
}

const job: FeedbackJob = {
  reactionName: "+1",
  conversationId: "111.333",
  channelId: "C1",
  userId: "U1",
};

describe("handleFeedback", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  it("acknowledges a positive reaction in the thread", async () => {
    const slack = createSlack();

    await handleFeedback(job, { slack });

    expect(slack.postMessage).toHaveBeenCalledTimes(1);
    expect(slack.postMessage).toHaveBeenCalledWith({
      channel: "C1",
      threadTs: "111.333",
      text: "Feedback received: +1",
    });
  });

  it("forwards feedback to the notification channel", async () => {
    const slack = createSlack();

    await handleFeedback({ ...job, reactionName: "thumbsup" }, { slack, notificationChannelId: "CNOTIFY" });

    expect(slack.postMessage).toHaveBeenCalledTimes(2);
    expect(slack.postMessage).toHaveBeenLastCalledWith({
      channel: "CNOTIFY",
      text: ":thumbsup: feedback from <@U1> in <#C1> on message 111.333",
    });
  });

  it("does not forward to the channel the reaction came from", async () => {
    const slack = createSlack();

    await handleFeedback(job, { slack, notificationChannelId: "C1" });

    expect(slack.postMessage).toHaveBeenCalledTimes(1);
  });

  it("ignores other reactions", async () => {
    const slack = createSlack();

    await handleFeedback({ ...job, reactionName: "-1" }, { slack, notificationChannelId: "CNOTIFY" });

    expect(slack.postMessage).not.toHaveBeenCalled();
  });
});
