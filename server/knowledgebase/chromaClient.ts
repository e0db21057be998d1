/*This file:
knows about Chroma's REST API (v1 collections endpoints)
does not know about embeddings models or where documents come from*/

import { z } from "zod";
import { TIMEOUT_CONSTANTS } from "../config/constants";
import { ExternalServiceError } from "../utils/errorHandler";

export type FetchLike = typeof fetch;

export type ChunkMetadata = Record<string, string | number | boolean>;

export interface ChunkRecord {
  id: string;
  embedding: number[];
  document: string;
  metadata: ChunkMetadata;
}

export interface QueryMatch {
  id: string;
  document: string;
  metadata: ChunkMetadata;
  distance: number | null;
}

const collectionSchema = z.object({
  id: z.string(),
  name: z.string(),
});

const metadataSchema = z.record(z.union([z.string(), z.number(), z.boolean()])).nullable();

const queryResponseSchema = z.object({
  ids: z.array(z.array(z.string())),
  documents: z.array(z.array(z.string().nullable())).nullable().optional(),
  metadatas: z.array(z.array(metadataSchema)).nullable().optional(),
  distances: z.array(z.array(z.number())).nullable().optional(),
});

export class ChromaClient {
  private readonly baseUrl: string;
  private readonly fetchImpl: FetchLike;
  private collectionIds = new Map<string, string>();

  constructor(baseUrl: string, fetchImpl: FetchLike = fetch) {
    this.baseUrl = baseUrl.replace(/\/$/, "");
    this.fetchImpl = fetchImpl;
  }

  async getOrCreateCollection(name: string): Promise<string> {
    const cached = this.collectionIds.get(name);
    if (cached) return cached;

    const body = await this.post("/api/v1/collections", { name, get_or_create: true });
    const collection = collectionSchema.parse(body);
    this.collectionIds.set(name, collection.id);
    return collection.id;
  }

  /**
   * Insert or replace chunks by id, so re-ingesting a source is idempotent.
   */
  async upsert(collectionId: string, records: ChunkRecord[]): Promise<void> {
    if (records.length === 0) return;
    await this.post(`/api/v1/collections/${collectionId}/upsert`, {
      ids: records.map((r) => r.id),
      embeddings: records.map((r) => r.embedding),
      documents: records.map((r) => r.document),
      metadatas: records.map((r) => r.metadata),
    });
  }

  async query(collectionId: string, embedding: number[], nResults: number): Promise<QueryMatch[]> {
    const body = await this.post(`/api/v1/collections/${collectionId}/query`, {
      query_embeddings: [embedding],
      n_results: nResults,
      include: ["documents", "metadatas", "distances"],
    });
    const result = queryResponseSchema.parse(body);

    const ids = result.ids[0] ?? [];
    return ids.map((id, i) => ({
      id,
      document: result.documents?.[0]?.[i] ?? "",
      metadata: result.metadatas?.[0]?.[i] ?? {},
      distance: result.distances?.[0]?.[i] ?? null,
    }));
  }

  private async post(pathname: string, payload: unknown): Promise<unknown> {
    const response = await this.fetchImpl(`${this.baseUrl}${pathname}`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(payload),
      signal: AbortSignal.timeout(TIMEOUT_CONSTANTS.TOOL_HTTP_TIMEOUT_MS),
    });

    if (!response.ok) {
      const errorText = await response.text();
      throw new ExternalServiceError("Chroma", `${pathname} failed: ${response.status} ${errorText}`, response.status);
    }
    return response.json();
  }
}
