/**
 * Tool-call instrumentation.
 *
 * A ToolCallWrapper is handed to the agent at construction and applied to
 * every tool it registers. watchToolCalls() logs each call with its tags,
 * arguments, duration and outcome, and reports it to an optional observer.
 */

import { errorMeta, logError, logInfo } from "../utils/logger";
import type { AgentTool } from "./tool";

export type ToolCallWrapper = (tool: AgentTool) => AgentTool;

export interface ToolCallRecord {
  tool: string;
  args: unknown;
  durationMs: number;
  ok: boolean;
  error?: string;
}

export interface WatchToolCallsOptions {
  tags?: string[];
  onCall?: (record: ToolCallRecord) => void;
}

export function watchToolCalls(options: WatchToolCallsOptions = {}): ToolCallWrapper {
  const tags = options.tags ?? [];

  return (tool) => ({
    ...tool,
    async run(rawArgs: unknown): Promise<string> {
      const startedAt = Date.now();
      logInfo(`[Tools] calling ${tool.name}`, { tool: tool.name, tags, args: rawArgs });

      try {
        const result = await tool.run(rawArgs);
        const durationMs = Date.now() - startedAt;
        logInfo(`[Tools] ${tool.name} finished`, { tool: tool.name, tags, duration: durationMs });
        options.onCall?.({ tool: tool.name, args: rawArgs, durationMs, ok: true });
        return result;
      } catch (err) {
        const durationMs = Date.now() - startedAt;
        const meta = errorMeta(err);
        logError(`[Tools] ${tool.name} failed`, { tool: tool.name, tags, duration: durationMs, ...meta });
        options.onCall?.({ tool: tool.name, args: rawArgs, durationMs, ok: false, error: meta.error });
        throw err;
      }
    },
  });
}
