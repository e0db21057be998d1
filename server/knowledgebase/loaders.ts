/**
 * Document loaders for knowledgebase ingestion.
 *
 * Sitemaps: every <loc> page is fetched and reduced to text.
 * GitHub repositories: documentation files (see REPO_FILE_EXTENSIONS) on the
 * default branch are fetched raw.
 */

import { z } from "zod";
import { KNOWLEDGEBASE_CONSTANTS, TIMEOUT_CONSTANTS } from "../config/constants";
import { ExternalServiceError, ValidationError } from "../utils/errorHandler";
import { errorMeta, logWarn } from "../utils/logger";
import type { FetchLike } from "./chromaClient";

export interface LoadedDocument {
  source: string;
  title?: string;
  text: string;
}

const ENTITIES: Record<string, string> = {
  "&amp;": "&",
  "&lt;": "<",
  "&gt;": ">",
  "&quot;": "\"",
  "&#39;": "'",
  "&apos;": "'",
  "&nbsp;": " ",
};

function decodeEntities(text: string): string {
  return text.replace(/&(?:amp|lt|gt|quot|#39|apos|nbsp);/g, (entity) => ENTITIES[entity] ?? entity);
}

export function parseSitemap(xml: string): string[] {
  const urls: string[] = [];
  const pattern = /<loc>\s*([^<]+?)\s*<\/loc>/gi;
  let match: RegExpExecArray | null;
  while ((match = pattern.exec(xml)) !== null) {
    urls.push(decodeEntities(match[1]));
  }
  return Array.from(new Set(urls));
}

export function extractTitle(html: string): string | undefined {
  const match = /<title[^>]*>([\s\S]*?)<\/title>/i.exec(html);
  const title = match ? decodeEntities(match[1]).replace(/\s+/g, " ").trim() : "";
  return title || undefined;
}

export function htmlToText(html: string): string {
  const withoutCode = html
    .replace(/<(script|style|noscript)[^>]*>[\s\S]*?<\/\1>/gi, " ")
    .replace(/<!--[\s\S]*?-->/g, " ");
  return decodeEntities(withoutCode.replace(/<[^>]*>/g, " "))
    .replace(/\s+/g, " ")
    .trim();
}

/**
 * Split text into windows of `size` characters; consecutive chunks share
 * `overlap` characters.
 */
export function chunkText(
  text: string,
  size: number = KNOWLEDGEBASE_CONSTANTS.CHUNK_SIZE,
  overlap: number = KNOWLEDGEBASE_CONSTANTS.CHUNK_OVERLAP,
): string[] {
  if (overlap >= size) {
    throw new ValidationError("chunk overlap must be smaller than chunk size");
  }
  const trimmed = text.trim();
  if (!trimmed) return [];

  const chunks: string[] = [];
  const step = size - overlap;
  for (let start = 0; start < trimmed.length; start += step) {
    chunks.push(trimmed.slice(start, start + size));
    if (start + size >= trimmed.length) break;
  }
  return chunks;
}

async function fetchOk(fetchImpl: FetchLike, url: string, headers?: Record<string, string>): Promise<Response> {
  const response = await fetchImpl(url, {
    headers,
    signal: AbortSignal.timeout(TIMEOUT_CONSTANTS.TOOL_HTTP_TIMEOUT_MS),
  });
  if (!response.ok) {
    throw new ExternalServiceError(new URL(url).host, `GET ${url} failed: ${response.status}`, response.status);
  }
  return response;
}

export async function loadSitemapDocuments(
  sitemapUrl: string,
  fetchImpl: FetchLike = fetch,
  maxPages: number = KNOWLEDGEBASE_CONSTANTS.MAX_SITEMAP_PAGES,
): Promise<LoadedDocument[]> {
  const sitemap = await (await fetchOk(fetchImpl, sitemapUrl)).text();
  const urls = parseSitemap(sitemap).slice(0, maxPages);

  const documents: LoadedDocument[] = [];
  for (const url of urls) {
    try {
      const html = await (await fetchOk(fetchImpl, url)).text();
      const text = htmlToText(html);
      if (text) {
        documents.push({ source: url, title: extractTitle(html), text });
      }
    } catch (error) {
      logWarn(`[Knowledgebase] Skipping ${url}`, errorMeta(error));
    }
  }
  return documents;
}

const repoSchema = z.object({ default_branch: z.string() });
const treeSchema = z.object({
  tree: z.array(z.object({ path: z.string(), type: z.string() })),
  truncated: z.boolean().optional(),
});

/**
 * Accepts "owner/repo" or a github.com URL.
 */
export function parseRepoReference(reference: string): { owner: string; repo: string } {
  const cleaned = reference
    .trim()
    .replace(/^https?:\/\/(www\.)?github\.com\//i, "")
    .replace(/\.git$/i, "")
    .replace(/\/+$/, "");
  const [owner, repo, ...rest] = cleaned.split("/");
  if (!owner || !repo || rest.length > 0) {
    throw new ValidationError(`Not a GitHub repository reference: ${reference}`);
  }
  return { owner, repo };
}

export async function loadGithubRepoDocuments(
  reference: string,
  options: { token?: string; fetchImpl?: FetchLike; maxFiles?: number } = {},
): Promise<LoadedDocument[]> {
  const fetchImpl = options.fetchImpl ?? fetch;
  const maxFiles = options.maxFiles ?? KNOWLEDGEBASE_CONSTANTS.MAX_REPO_FILES;
  const { owner, repo } = parseRepoReference(reference);
  const headers: Record<string, string> = {
    Accept: "application/vnd.github+json",
    "User-Agent": "slack-kb-agent",
  };
  if (options.token) {
    headers.Authorization = `Bearer ${options.token}`;
  }

  const apiBase = `https://api.github.com/repos/${owner}/${repo}`;
  const { default_branch: branch } = repoSchema.parse(await (await fetchOk(fetchImpl, apiBase, headers)).json());
  const tree = treeSchema.parse(
    await (await fetchOk(fetchImpl, `${apiBase}/git/trees/${encodeURIComponent(branch)}?recursive=1`, headers)).json(),
  );
  if (tree.truncated) {
    logWarn(`[Knowledgebase] Tree listing for ${owner}/${repo} was truncated by GitHub`);
  }

  const extensions: readonly string[] = KNOWLEDGEBASE_CONSTANTS.REPO_FILE_EXTENSIONS;
  const paths = tree.tree
    .filter((entry) => entry.type === "blob")
    .map((entry) => entry.path)
    .filter((filePath) => extensions.some((ext) => filePath.toLowerCase().endsWith(ext)))
    .slice(0, maxFiles);

  const documents: LoadedDocument[] = [];
  for (const filePath of paths) {
    const rawUrl = `https://raw.githubusercontent.com/${owner}/${repo}/${branch}/${filePath}`;
    try {
      const text = (await (await fetchOk(fetchImpl, rawUrl)).text()).trim();
      if (text) {
        documents.push({
          source: `https://github.com/${owner}/${repo}/blob/${branch}/${filePath}`,
          title: `${owner}/${repo}: ${filePath}`,
          text,
        });
      }
    } catch (error) {
      logWarn(`[Knowledgebase] Skipping ${rawUrl}`, errorMeta(error));
    }
  }
  return documents;
}
