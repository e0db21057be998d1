import type OpenAI from "openai";
import { KNOWLEDGEBASE_CONSTANTS } from "../config/constants";

export interface Embedder {
  embed(texts: string[]): Promise<number[][]>;
}

export class OpenAIEmbedder implements Embedder {
  constructor(
    private readonly client: OpenAI,
    private readonly model: string,
    private readonly batchSize: number = KNOWLEDGEBASE_CONSTANTS.EMBEDDING_BATCH_SIZE,
  ) {}

  async embed(texts: string[]): Promise<number[][]> {
    const vectors: number[][] = [];
    for (let start = 0; start < texts.length; start += this.batchSize) {
      const batch = texts.slice(start, start + this.batchSize);
      const response = await this.client.embeddings.create({ model: this.model, input: batch });
      const ordered = [...response.data].sort((a, b) => a.index - b.index);
      vectors.push(...ordered.map((item) => item.embedding));
    }
    return vectors;
  }
}
