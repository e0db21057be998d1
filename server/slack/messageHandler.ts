/**
 * Mention Handler
 *
 * Runs the agent for one mention and posts the answer in the thread. Any
 * failure is reported back into the thread as an apology; nothing propagates
 * to the HTTP request, which was acknowledged long before.
 */

import type { AgentReply } from "../agent/slackAgent";
import { classifyPipelineError } from "../utils/errorHandler";
import { RequestLogger } from "../utils/logger";
import type { SlackMessenger } from "./slackApi";
import type { MentionJob } from "./types";

export interface MentionAgent {
  handleMessage(message: string, conversationId: string, channelId: string): Promise<AgentReply>;
}

export interface MentionHandlerDeps {
  agent: MentionAgent;
  slack: SlackMessenger;
}

export async function handleMentionJob(job: MentionJob, deps: MentionHandlerDeps): Promise<void> {
  const logger = new RequestLogger(job.channelId, job.conversationId, job.userId);
  const channelName = (await deps.slack.getChannelName(job.channelId)) ?? job.channelId;
  logger.info(`handle message in ${channelName}/${job.conversationId}`, {
    priorMessageCount: job.priorMessageCount,
  });
  logger.debug("Message text", { text: job.text.substring(0, 200) });

  try {
    logger.startStage("agent");
    const reply = await deps.agent.handleMessage(job.text, job.conversationId, job.channelId);
    logger.info(`Generated response for thread ${job.conversationId}`, {
      agentMs: logger.endStage("agent"),
      toolCalls: reply.toolCalls,
    });

    await deps.slack.postMessage({
      channel: job.channelId,
      threadTs: job.conversationId,
      text: reply.text,
    });
  } catch (err) {
    const classified = classifyPipelineError(err);
    logger.error(`Error processing message in thread ${job.conversationId}`, err, {
      errorType: classified.type,
      errorCode: classified.errorCode,
    });
    await deps.slack.postMessage({
      channel: job.channelId,
      threadTs: job.conversationId,
      text: classified.userMessage,
    });
  }
}
