import { z } from 'zod';
import { TIMEOUT_CONSTANTS } from '../config/constants';
import { ExternalServiceError } from '../utils/errorHandler';
import type { FetchLike } from '../knowledgebase/chromaClient';

export interface SearchResult {
  title: string;
  link: string;
  snippet: string;
}

export interface GoogleSearchConfig {
  apiKey: string;
  cx: string;
}

const searchResponseSchema = z.object({
  items: z
    .array(
      z.object({
        title: z.string().default('Untitled'),
        link: z.string(),
        snippet: z.string().default(''),
      }),
    )
    .default([]),
});

const SEARCH_URL = 'https://www.googleapis.com/customsearch/v1';

export async function googleSearch(
  query: string,
  config: GoogleSearchConfig,
  options: { numResults?: number; fetchImpl?: FetchLike } = {},
): Promise<SearchResult[]> {
  const fetchImpl = options.fetchImpl ?? fetch;
  const params = new URLSearchParams({
    key: config.apiKey,
    cx: config.cx,
    q: query,
    num: String(options.numResults ?? 5),
  });

  const response = await fetchImpl(`${SEARCH_URL}?${params.toString()}`, {
    signal: AbortSignal.timeout(TIMEOUT_CONSTANTS.TOOL_HTTP_TIMEOUT_MS),
  });

  if (!response.ok) {
    const errorText = await response.text();
    throw new ExternalServiceError('Google Search', `${response.status} ${errorText}`, response.status);
  }

  return searchResponseSchema.parse(await response.json()).items;
}

export function formatSearchResults(results: SearchResult[]): string {
  if (results.length === 0) {
    return 'No search results found.';
  }
  return results
    .map((result, i) => `${i + 1}. [${result.title}](${result.link})\n${result.snippet}`)
    .join('\n\n');
}
