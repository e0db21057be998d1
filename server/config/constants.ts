/**
 * Application Constants
 *
 * Centralized configuration values used across the application.
 * Values that operators tune per deployment live in settings.ts instead.
 */

/**
 * Slack request handling
 */
export const SLACK_CONSTANTS = {
  /**
   * Max age (seconds) of a Slack request timestamp before it's rejected as a replay.
   * Overridable with SIGNATURE_TOLERANCE_SECONDS.
   */
  SIGNATURE_TOLERANCE_SECONDS: 300, // 5 minutes

  /**
   * Version prefix of Slack's signing scheme ("v0:<ts>:<body>" / "v0=<hex>").
   */
  SIGNATURE_VERSION: "v0",

  /**
   * Reactions treated as positive feedback on a bot reply.
   */
  POSITIVE_REACTIONS: ["+1", "thumbsup"],

  /**
   * Upper bound on raw webhook payloads accepted by the events route.
   */
  MAX_BODY_BYTES: "1mb",
} as const;

export const HISTORY_CONSTANTS = {
  /**
   * History is never trimmed; past this many messages in one thread a warning is logged.
   */
  HISTORY_WARN_THRESHOLD: 200,
} as const;

export const DEDUPE_CONSTANTS = {
  TTL_MS: 60 * 60 * 1000, // 1 hour
  MAX_ENTRIES: 500,
} as const;

export const KNOWLEDGEBASE_CONSTANTS = {
  /**
   * Characters per stored chunk and overlap between neighbouring chunks.
   */
  CHUNK_SIZE: 2000,
  CHUNK_OVERLAP: 200,

  /**
   * Number of nearest chunks returned for a query.
   */
  QUERY_RESULTS: 5,

  /**
   * Pages fetched per sitemap and files per repository, to keep one tool call bounded.
   */
  MAX_SITEMAP_PAGES: 200,
  MAX_REPO_FILES: 200,

  /**
   * Texts sent per embeddings request.
   */
  EMBEDDING_BATCH_SIZE: 64,

  REPO_FILE_EXTENSIONS: [".md", ".mdx", ".rst", ".txt"],
} as const;

export const TIMEOUT_CONSTANTS = {
  /**
   * Timeout for outbound HTTP calls made by tools (milliseconds).
   */
  TOOL_HTTP_TIMEOUT_MS: 30000,
} as const;
