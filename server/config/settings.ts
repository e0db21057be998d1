/**
 * Runtime Settings
 *
 * Built once at startup from the environment and passed to every component.
 * Reading settings has no side effects; file creation happens in
 * initializeSettings() and logger setup in configureLogging().
 */

import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { z } from "zod";
import { fromZodError } from "zod-validation-error";
import { ConfigurationError } from "../utils/errorHandler";
import { isLogLevel, type LogLevel } from "../utils/logger";
import { SLACK_CONSTANTS } from "./constants";
import { LLM_DEFAULTS, LLM_MODELS } from "./models";
import { DEFAULT_BASE_SYSTEM_PROMPT } from "./prompts/system";

const APP_DIR = "~/.slack-kb-agent";

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() ? value.trim() : undefined));

const booleanFlag = z
  .string()
  .optional()
  .transform((value) => ["true", "1", "yes"].includes((value ?? "").trim().toLowerCase()));

const envSchema = z.object({
  SLACK_SIGNING_SECRET: z.string().min(1, "SLACK_SIGNING_SECRET is required"),
  SLACK_BOT_TOKEN: z.string().min(1, "SLACK_BOT_TOKEN is required"),
  OPENAI_API_KEY: z.string().min(1, "OPENAI_API_KEY is required"),

  AI_MODEL: z.string().min(1).default(LLM_MODELS.AGENT_DEFAULT),
  AI_TEMPERATURE: z.coerce.number().min(0).max(2).default(LLM_DEFAULTS.TEMPERATURE),
  AI_MAX_TOOL_STEPS: z.coerce.number().int().min(1).default(LLM_DEFAULTS.MAX_TOOL_STEPS),
  EMBEDDING_MODEL: z.string().min(1).default(LLM_MODELS.EMBEDDINGS),

  BASE_SYSTEM_PROMPT: optionalString,
  BASE_SYSTEM_PROMPT_PATH: z.string().default(`${APP_DIR}/base_system_prompt.txt`),
  MESSAGE_CACHE_PATH: z.string().default(`${APP_DIR}/message_cache.json`),

  HOST: z.string().default("0.0.0.0"),
  PORT: z.coerce.number().int().min(0).max(65535).default(8000),

  LOG_LEVEL: z
    .string()
    .default("info")
    .transform((value) => value.toLowerCase())
    .refine(isLogLevel, { message: "LOG_LEVEL must be one of debug, info, warn, error" }),
  LOG_DIR: optionalString,
  DEBUG: booleanFlag,

  SIGNATURE_TOLERANCE_SECONDS: z.coerce
    .number()
    .int()
    .min(1)
    .default(SLACK_CONSTANTS.SIGNATURE_TOLERANCE_SECONDS),

  KNOWLEDGEBASE_NAMESPACE: z.string().min(1).default("slack-kb-agent"),
  CHROMA_URL: z.string().url().default("http://localhost:8001"),

  GOOGLE_API_KEY: optionalString,
  GOOGLE_CX: optionalString,
  WORKFLOW_API_URL: optionalString.pipe(z.string().url().optional()),
  WORKFLOW_API_KEY: optionalString,
  GITHUB_TOKEN: optionalString,
  NOTIFICATION_CHANNEL_ID: optionalString,
});

export interface Settings {
  slack: {
    signingSecret: string;
    botToken: string;
    signatureToleranceSeconds: number;
    notificationChannelId?: string;
  };
  ai: {
    apiKey: string;
    model: string;
    temperature: number;
    maxToolSteps: number;
    embeddingModel: string;
    /** Explicit prompt text; when unset the prompt file is read at initialization. */
    baseSystemPrompt?: string;
    baseSystemPromptPath: string;
  };
  server: {
    host: string;
    port: number;
  };
  logging: {
    level: LogLevel;
    logDir?: string;
  };
  messageCachePath: string;
  knowledgebase: {
    namespace: string;
    chromaUrl: string;
    githubToken?: string;
  };
  google?: {
    apiKey: string;
    cx: string;
  };
  workflow?: {
    apiUrl: string;
    apiKey?: string;
  };
}

export interface InitializedSettings extends Settings {
  ai: Settings["ai"] & { baseSystemPrompt: string };
}

export function expandHomeDir(input: string): string {
  if (input === "~") return os.homedir();
  if (input.startsWith("~/") || input.startsWith("~\\")) {
    return path.join(os.homedir(), input.slice(2));
  }
  return input;
}

export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid configuration: ${fromZodError(parsed.error).message}`);
  }
  const values = parsed.data;
  const level: LogLevel = values.DEBUG ? "debug" : values.LOG_LEVEL;

  return {
    slack: {
      signingSecret: values.SLACK_SIGNING_SECRET,
      botToken: values.SLACK_BOT_TOKEN,
      signatureToleranceSeconds: values.SIGNATURE_TOLERANCE_SECONDS,
      notificationChannelId: values.NOTIFICATION_CHANNEL_ID,
    },
    ai: {
      apiKey: values.OPENAI_API_KEY,
      model: values.AI_MODEL,
      temperature: values.AI_TEMPERATURE,
      maxToolSteps: values.AI_MAX_TOOL_STEPS,
      embeddingModel: values.EMBEDDING_MODEL,
      baseSystemPrompt: values.BASE_SYSTEM_PROMPT,
      baseSystemPromptPath: path.resolve(expandHomeDir(values.BASE_SYSTEM_PROMPT_PATH)),
    },
    server: {
      host: values.HOST,
      port: values.PORT,
    },
    logging: {
      level,
      logDir: values.LOG_DIR ? path.resolve(expandHomeDir(values.LOG_DIR)) : undefined,
    },
    messageCachePath: path.resolve(expandHomeDir(values.MESSAGE_CACHE_PATH)),
    knowledgebase: {
      namespace: values.KNOWLEDGEBASE_NAMESPACE,
      chromaUrl: values.CHROMA_URL.replace(/\/$/, ""),
      githubToken: values.GITHUB_TOKEN,
    },
    google: values.GOOGLE_API_KEY && values.GOOGLE_CX
      ? { apiKey: values.GOOGLE_API_KEY, cx: values.GOOGLE_CX }
      : undefined,
    workflow: values.WORKFLOW_API_URL
      ? { apiUrl: values.WORKFLOW_API_URL.replace(/\/$/, ""), apiKey: values.WORKFLOW_API_KEY }
      : undefined,
  };
}

/**
 * Create the files the service expects and resolve the base system prompt.
 * The prompt file is seeded with the default persona the first time.
 */
export function initializeSettings(settings: Settings): InitializedSettings {
  fs.mkdirSync(path.dirname(settings.messageCachePath), { recursive: true });

  let baseSystemPrompt = settings.ai.baseSystemPrompt;
  if (!baseSystemPrompt) {
    const promptPath = settings.ai.baseSystemPromptPath;
    if (!fs.existsSync(promptPath)) {
      fs.mkdirSync(path.dirname(promptPath), { recursive: true });
      fs.writeFileSync(promptPath, DEFAULT_BASE_SYSTEM_PROMPT);
    }
    baseSystemPrompt = fs.readFileSync(promptPath, "utf-8").trim() || DEFAULT_BASE_SYSTEM_PROMPT;
  }

  return {
    ...settings,
    ai: { ...settings.ai, baseSystemPrompt },
  };
}

/**
 * Settings with secrets masked, for the startup debug log.
 */
export function describeSettings(settings: Settings): Record<string, unknown> {
  const mask = (value: string | undefined) => (value ? "***" : undefined);
  return {
    ...settings,
    slack: {
      ...settings.slack,
      signingSecret: mask(settings.slack.signingSecret),
      botToken: mask(settings.slack.botToken),
    },
    ai: { ...settings.ai, apiKey: mask(settings.ai.apiKey) },
    knowledgebase: {
      ...settings.knowledgebase,
      githubToken: mask(settings.knowledgebase.githubToken),
    },
    google: settings.google ? { ...settings.google, apiKey: mask(settings.google.apiKey) } : undefined,
    workflow: settings.workflow
      ? { ...settings.workflow, apiKey: mask(settings.workflow.apiKey) }
      : undefined,
  };
}
