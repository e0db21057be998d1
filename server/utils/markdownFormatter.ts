/**
 * Flexible markdown formatting system.
 *
 * LLM output is standard markdown; Slack's mrkdwn differs for links, bold and
 * strikethrough. Add new formats by extending the formatters object.
 */

export type MarkdownFormat = 'slack' | 'standard' | 'plaintext';

interface FormatRule {
  pattern: RegExp;
  replacement: string;
}

interface MarkdownFormatter {
  rules: FormatRule[];
}

const formatters: Record<MarkdownFormat, MarkdownFormatter> = {
  slack: {
    rules: [
      // [text](url) → <url|text>
      { pattern: /\[([^\]]+)\]\(([^)]+)\)/g, replacement: '<$2|$1>' },
      // **bold** → *bold* (Slack uses single asterisks)
      { pattern: /\*\*(.+?)\*\*/g, replacement: '*$1*' },
      // ~~strikethrough~~ → ~strikethrough~ (Slack uses single tildes)
      { pattern: /~~(.+?)~~/g, replacement: '~$1~' },
    ],
  },
  standard: {
    rules: [],
  },
  plaintext: {
    rules: [
      { pattern: /\[([^\]]+)\]\(([^)]+)\)/g, replacement: '$1 ($2)' },
      { pattern: /\*\*(.+?)\*\*/g, replacement: '$1' },
      { pattern: /\*(.+?)\*/g, replacement: '$1' },
      { pattern: /~~(.+?)~~/g, replacement: '$1' },
      { pattern: /`(.+?)`/g, replacement: '$1' },
      { pattern: /^#+\s+/gm, replacement: '' },
      { pattern: /^[-*]\s+/gm, replacement: '- ' },
    ],
  },
};

/**
 * Convert markdown to a specific output format.
 */
export function formatMarkdown(text: string, format: MarkdownFormat): string {
  return formatters[format].rules.reduce(
    (result, rule) => result.replace(rule.pattern, rule.replacement),
    text,
  );
}
