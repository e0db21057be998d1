/**
 * Slack integration layer.
 *
 * Responsibilities:
 * - Post replies into threads
 * - Look up channel metadata for run labels
 *
 * This file MUST NOT:
 * - Contain business logic
 * - Call LLMs directly
 *
 * Layer: Integration (I/O only)
 */

import { WebClient } from "@slack/web-api";
import { formatMarkdown } from "../utils/markdownFormatter";
import { ExternalServiceError } from "../utils/errorHandler";
import { errorMeta, logDebug, logWarn } from "../utils/logger";

export type PostMessageParams = {
  channel: string;
  text: string;
  threadTs?: string;
};

export interface SlackMessenger {
  /** Returns the posted message ts, or undefined when nothing was sent. */
  postMessage(params: PostMessageParams): Promise<string | undefined>;
  getChannelName(channelId: string): Promise<string | undefined>;
}

export class SlackApi implements SlackMessenger {
  private readonly client: WebClient;
  private channelNames = new Map<string, string>();

  constructor(botToken: string, client?: WebClient) {
    this.client = client ?? new WebClient(botToken);
  }

  async postMessage(params: PostMessageParams): Promise<string | undefined> {
    if (!params.text.trim()) {
      logWarn("[SlackAPI] No message to send to Slack", { channel: params.channel, threadTs: params.threadTs });
      return undefined;
    }

    logDebug("[SlackAPI] Sending message to Slack", { channel: params.channel, threadTs: params.threadTs });
    const response = await this.client.chat.postMessage({
      channel: params.channel,
      thread_ts: params.threadTs,
      text: formatMarkdown(params.text, "slack"),
    });

    if (!response.ok) {
      throw new ExternalServiceError("Slack", `chat.postMessage failed: ${response.error ?? "unknown"}`);
    }
    return response.ts;
  }

  async getChannelName(channelId: string): Promise<string | undefined> {
    const cached = this.channelNames.get(channelId);
    if (cached) return cached;

    try {
      const response = await this.client.conversations.info({ channel: channelId });
      const name = response.channel?.name;
      if (name) {
        this.channelNames.set(channelId, name);
      }
      return name;
    } catch (error) {
      logWarn(`[SlackAPI] Failed to get channel name for ${channelId}`, errorMeta(error));
      return undefined;
    }
  }
}
