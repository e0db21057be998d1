/**
 * Service entry point: configuration, wiring and the HTTP listener.
 */

import dotenv from "dotenv";
import OpenAI from "openai";
import { createAgentTools } from "./agent/tools";
import { createOpenAICompletion, SlackAgent } from "./agent/slackAgent";
import { watchToolCalls } from "./agent/toolWrapper";
import { createApp, HEALTH_PATHS } from "./app";
import { buildSystemPrompt } from "./config/prompts/system";
import { describeSettings, initializeSettings, loadSettings } from "./config/settings";
import { ConversationCache } from "./conversation/messageCache";
import { Knowledgebase } from "./knowledgebase";
import { ChromaClient } from "./knowledgebase/chromaClient";
import { OpenAIEmbedder } from "./knowledgebase/embeddings";
import { BackgroundTasks } from "./services/backgroundTasks";
import { EventDeduplicator } from "./services/eventDeduplicator";
import { KeyedSerialQueue } from "./services/serialQueue";
import { WorkflowClient } from "./services/workflowClient";
import { SLACK_EVENTS_PATH } from "./slack";
import { AgentEventSink } from "./slack/eventSink";
import { SlackApi } from "./slack/slackApi";
import { configureLogging, errorMeta, logDebug, logError, logInfo } from "./utils/logger";

async function main(): Promise<void> {
  dotenv.config();

  const settings = initializeSettings(loadSettings());
  configureLogging(settings.logging);
  logDebug("[Startup] Settings", describeSettings(settings));

  const cache = new ConversationCache(settings.messageCachePath);
  await cache.load();

  const openai = new OpenAI({ apiKey: settings.ai.apiKey });
  const knowledgebase = new Knowledgebase({
    chroma: new ChromaClient(settings.knowledgebase.chromaUrl),
    embedder: new OpenAIEmbedder(openai, settings.ai.embeddingModel),
    githubToken: settings.knowledgebase.githubToken,
  });

  const tools = createAgentTools({
    knowledgebase,
    defaultNamespace: settings.knowledgebase.namespace,
    google: settings.google,
    workflows: settings.workflow ? new WorkflowClient(settings.workflow) : undefined,
  });

  const agent = new SlackAgent({
    model: settings.ai.model,
    temperature: settings.ai.temperature,
    maxToolSteps: settings.ai.maxToolSteps,
    systemPrompt: buildSystemPrompt(settings.ai.baseSystemPrompt),
    tools,
    history: cache,
    complete: createOpenAICompletion(openai),
    wrapToolCall: watchToolCalls({ tags: ["slack"] }),
  });
  logInfo(`[Startup] Agent ready with tools: ${agent.toolNames.join(", ")}`);

  const slack = new SlackApi(settings.slack.botToken);
  const background = new BackgroundTasks();
  const sink = new AgentEventSink({
    background,
    threads: new KeyedSerialQueue(),
    mention: { agent, slack },
    feedback: { slack, notificationChannelId: settings.slack.notificationChannelId },
  });

  const app = createApp({
    slackEvents: {
      signingSecret: settings.slack.signingSecret,
      toleranceSeconds: settings.slack.signatureToleranceSeconds,
      conversations: cache,
      sink,
      deduplicator: new EventDeduplicator(),
    },
  });

  const { host, port } = settings.server;
  const server = app.listen(port, host, () => {
    logInfo(`[Startup] Listening on http://${host}:${port}`);
    logInfo(`[Startup] Routes: GET ${HEALTH_PATHS.join(", GET ")}, POST ${SLACK_EVENTS_PATH}`);
  });

  let shuttingDown = false;
  const shutdown = (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logInfo(`[Shutdown] ${signal} received, waiting for ${background.size} background task(s)`);
    server.close();
    background
      .drain()
      .then(() => cache.save())
      .then(
        () => process.exit(0),
        (err: unknown) => {
          logError("[Shutdown] Failed to flush state", errorMeta(err));
          process.exit(1);
        },
      );
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((err: unknown) => {
  logError("[Startup] Failed to start", errorMeta(err));
  process.exit(1);
});
