/**
 * Feedback Handler
 *
 * Handles Slack reaction events on bot replies. Positive reactions are
 * acknowledged in the thread and, when a notification channel is configured,
 * forwarded there. Other reactions are ignored.
 */

import { logDebug, logInfo } from "../utils/logger";
import { isPositiveReaction } from "./eventClassifier";
import type { SlackMessenger } from "./slackApi";
import type { FeedbackJob } from "./types";

export interface FeedbackHandlerDeps {
  slack: SlackMessenger;
  notificationChannelId?: string;
}

export async function handleFeedback(job: FeedbackJob, deps: FeedbackHandlerDeps): Promise<void> {
  if (!isPositiveReaction(job.reactionName)) {
    logDebug(`[Feedback] Ignoring reaction ${job.reactionName}`);
    return;
  }

  logInfo(
    `[Feedback] Received ${job.reactionName} reaction from user ${job.userId ?? "unknown"} ` +
    `on message ${job.conversationId} in channel ${job.channelId}`,
  );

  await deps.slack.postMessage({
    channel: job.channelId,
    threadTs: job.conversationId,
    text: `Feedback received: ${job.reactionName}`,
  });

  const notificationChannel = deps.notificationChannelId;
  if (notificationChannel && notificationChannel !== job.channelId) {
    const from = job.userId ? `<@${job.userId}>` : "someone";
    await deps.slack.postMessage({
      channel: notificationChannel,
      text: `:${job.reactionName}: feedback from ${from} in <#${job.channelId}> on message ${job.conversationId}`,
    });
  }
}
