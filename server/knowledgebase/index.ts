/**
 * Knowledgebase: ingestion and retrieval over a Chroma collection per namespace.
 */

import crypto from "crypto";
import { KNOWLEDGEBASE_CONSTANTS } from "../config/constants";
import { logInfo } from "../utils/logger";
import type { ChromaClient, ChunkRecord, FetchLike } from "./chromaClient";
import type { Embedder } from "./embeddings";
import { chunkText, loadGithubRepoDocuments, loadSitemapDocuments, type LoadedDocument } from "./loaders";

export interface KnowledgebaseDeps {
  chroma: ChromaClient;
  embedder: Embedder;
  fetchImpl?: FetchLike;
  githubToken?: string;
}

export interface IngestSummary {
  documents: number;
  chunks: number;
}

function chunkId(source: string, index: number): string {
  return crypto.createHash("sha256").update(`${source}#${index}`).digest("hex").slice(0, 32);
}

export class Knowledgebase {
  constructor(private readonly deps: KnowledgebaseDeps) {}

  /**
   * Returns the closest chunks formatted for the model, most similar first.
   */
  async query(text: string, namespace: string, nResults: number = KNOWLEDGEBASE_CONSTANTS.QUERY_RESULTS): Promise<string> {
    const collectionId = await this.deps.chroma.getOrCreateCollection(namespace);
    const [embedding] = await this.deps.embedder.embed([text]);
    const matches = await this.deps.chroma.query(collectionId, embedding, nResults);

    if (matches.length === 0) {
      return `No relevant documents found in the "${namespace}" knowledgebase.`;
    }

    return matches
      .map((match, i) => {
        const source = typeof match.metadata.source === "string" ? match.metadata.source : "unknown source";
        const title = typeof match.metadata.title === "string" ? `${match.metadata.title} ` : "";
        return `[${i + 1}] ${title}(${source})\n${match.document}`;
      })
      .join("\n\n");
  }

  async addSitemap(sitemapUrl: string, namespace: string): Promise<IngestSummary> {
    const documents = await loadSitemapDocuments(sitemapUrl, this.deps.fetchImpl);
    return this.addDocuments(documents, namespace, sitemapUrl);
  }

  async addGithubRepo(repository: string, namespace: string): Promise<IngestSummary> {
    const documents = await loadGithubRepoDocuments(repository, {
      token: this.deps.githubToken,
      fetchImpl: this.deps.fetchImpl,
    });
    return this.addDocuments(documents, namespace, repository);
  }

  private async addDocuments(documents: LoadedDocument[], namespace: string, origin: string): Promise<IngestSummary> {
    const pending: Omit<ChunkRecord, "embedding">[] = [];
    for (const doc of documents) {
      chunkText(doc.text).forEach((chunk, index) => {
        pending.push({
          id: chunkId(doc.source, index),
          document: chunk,
          metadata: { source: doc.source, title: doc.title ?? doc.source, chunk: index, origin },
        });
      });
    }

    if (pending.length > 0) {
      const collectionId = await this.deps.chroma.getOrCreateCollection(namespace);
      const embeddings = await this.deps.embedder.embed(pending.map((record) => record.document));
      await this.deps.chroma.upsert(
        collectionId,
        pending.map((record, i) => ({ ...record, embedding: embeddings[i] })),
      );
    }

    logInfo(`[Knowledgebase] Ingested ${documents.length} documents (${pending.length} chunks) from ${origin}`, {
      namespace,
    });
    return { documents: documents.length, chunks: pending.length };
  }
}
