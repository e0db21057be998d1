/**
 * System-Level Prompts
 *
 * Written to BASE_SYSTEM_PROMPT_PATH on first start; operators edit that file
 * to change the persona without redeploying.
 */

export const DEFAULT_BASE_SYSTEM_PROMPT =
  "You are a helpful and friendly Slack assistant. " +
  "Use your memory of conversation threads and tools " +
  "to answer questions and help the user.";

export const SLACK_FORMATTING_GUIDELINES = `When you answer:
- Keep replies short enough to read in a Slack thread.
- Cite knowledgebase or search sources with their links.
- Say so plainly when the knowledgebase has nothing relevant instead of guessing.`;

export function buildSystemPrompt(basePrompt: string): string {
  return `${basePrompt.trim()}\n\n${SLACK_FORMATTING_GUIDELINES}`;
}
