/**
 * Slack Agent
 *
 * Answers a message in the context of its thread's history. Runs an OpenAI
 * chat-completions loop in which the model may call the registered tools,
 * then appends the user message and the reply to the conversation cache.
 *
 * Tool schemas are derived from the tools' zod parameters. Tool failures are
 * returned to the model as "Error: ..." results so it can recover or explain.
 */

import type OpenAI from "openai";
import { zodToJsonSchema } from "zod-to-json-schema";
import type { ConversationMessage, ConversationStore } from "../conversation/types";
import { getErrorMessage } from "../utils/errorHandler";
import { logDebug, logInfo, logWarn } from "../utils/logger";
import type { AgentTool } from "./tool";
import type { ToolCallWrapper } from "./toolWrapper";

type ChatCompletion = OpenAI.Chat.Completions.ChatCompletion;
type ChatCompletionCreateParams = OpenAI.Chat.Completions.ChatCompletionCreateParamsNonStreaming;
type ChatCompletionMessageParam = OpenAI.Chat.Completions.ChatCompletionMessageParam;
type ChatCompletionMessageToolCall = OpenAI.Chat.Completions.ChatCompletionMessageToolCall;
type ChatCompletionTool = OpenAI.Chat.Completions.ChatCompletionTool;

export type ChatCompletionCreate = (params: ChatCompletionCreateParams) => Promise<ChatCompletion>;

export function createOpenAICompletion(client: OpenAI): ChatCompletionCreate {
  return (params) => client.chat.completions.create(params);
}

export interface SlackAgentOptions {
  model: string;
  temperature: number;
  maxToolSteps: number;
  systemPrompt: string;
  tools: AgentTool[];
  history: ConversationStore;
  complete: ChatCompletionCreate;
  /** Applied to every tool at construction (instrumentation, tracing). */
  wrapToolCall?: ToolCallWrapper;
  now?: () => Date;
}

export interface AgentReply {
  text: string;
  toolCalls: number;
  newMessages: ConversationMessage[];
}

export function toToolDefinition(tool: AgentTool): ChatCompletionTool {
  const parameters: Record<string, unknown> = {
    ...zodToJsonSchema(tool.parameters, { target: "openApi3" }),
  };
  delete parameters.$schema;

  return {
    type: "function",
    function: {
      name: tool.name,
      description: tool.description,
      parameters,
    },
  };
}

export class SlackAgent {
  private readonly options: SlackAgentOptions;
  private readonly tools = new Map<string, AgentTool>();
  private readonly toolDefinitions: ChatCompletionTool[];

  constructor(options: SlackAgentOptions) {
    this.options = options;
    for (const tool of options.tools) {
      this.tools.set(tool.name, options.wrapToolCall ? options.wrapToolCall(tool) : tool);
    }
    this.toolDefinitions = options.tools.map(toToolDefinition);
  }

  get toolNames(): string[] {
    return Array.from(this.tools.keys());
  }

  async handleMessage(message: string, conversationId: string, channelId: string): Promise<AgentReply> {
    const { history, complete, model, temperature, maxToolSteps } = this.options;
    const now = this.options.now ?? (() => new Date());

    const threadMessages = history.get(conversationId);
    logInfo(`[Agent] Handling message in thread ${conversationId}`, {
      channel: channelId,
      threadTs: conversationId,
      historyLength: threadMessages.length,
    });

    const userMessage: ConversationMessage = { role: "user", content: message, createdAt: now().toISOString() };
    const messages: ChatCompletionMessageParam[] = [
      { role: "system", content: this.options.systemPrompt },
      ...threadMessages.map((m): ChatCompletionMessageParam =>
        m.role === "user" ? { role: "user", content: m.content } : { role: "assistant", content: m.content },
      ),
      { role: "user", content: message },
    ];

    let toolCallCount = 0;
    for (let step = 0; step < maxToolSteps; step++) {
      const completion = await complete({
        model,
        temperature,
        messages,
        tools: this.toolDefinitions.length > 0 ? this.toolDefinitions : undefined,
      });

      const choice = completion.choices[0]?.message;
      if (!choice) {
        throw new Error("Model returned no choices");
      }

      const toolCalls = choice.tool_calls ?? [];
      if (toolCalls.length === 0) {
        const text = choice.content ?? "";
        const assistantMessage: ConversationMessage = { role: "assistant", content: text, createdAt: now().toISOString() };
        const newMessages = [userMessage, assistantMessage];
        await history.append(conversationId, newMessages);
        logDebug(`[Agent] Replied in thread ${conversationId}`, { threadTs: conversationId, toolCalls: toolCallCount });
        return { text, toolCalls: toolCallCount, newMessages };
      }

      messages.push({ role: "assistant", content: choice.content, tool_calls: toolCalls });
      for (const call of toolCalls) {
        toolCallCount++;
        messages.push({ role: "tool", tool_call_id: call.id, content: await this.runToolCall(call) });
      }
    }

    throw new Error(`No final answer after ${maxToolSteps} tool rounds`);
  }

  private async runToolCall(call: ChatCompletionMessageToolCall): Promise<string> {
    const tool = this.tools.get(call.function.name);
    if (!tool) {
      logWarn(`[Agent] Model called unknown tool ${call.function.name}`);
      return `Error: unknown tool "${call.function.name}"`;
    }

    let args: unknown;
    try {
      args = call.function.arguments ? JSON.parse(call.function.arguments) : {};
    } catch {
      return `Error: arguments for ${tool.name} are not valid JSON`;
    }

    try {
      return await tool.run(args);
    } catch (err) {
      return `Error: ${getErrorMessage(err)}`;
    }
  }
}
