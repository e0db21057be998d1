/**
 * LLM model defaults.
 *
 * AGENT_DEFAULT - gpt-4o
 *   Answers questions and drives tool calls. Overridable with AI_MODEL.
 *
 * EMBEDDINGS - text-embedding-3-small
 *   Embeds knowledgebase chunks and queries. Changing it requires re-ingesting,
 *   since stored vectors from a different model are not comparable.
 */

export const LLM_MODELS = {
  AGENT_DEFAULT: "gpt-4o",
  EMBEDDINGS: "text-embedding-3-small",
} as const;

export const LLM_DEFAULTS = {
  TEMPERATURE: 0.7,
  /**
   * Completion rounds per message before the agent gives up on tool calling.
   */
  MAX_TOOL_STEPS: 8,
} as const;
