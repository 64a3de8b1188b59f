import { ChunkFilter, Embedder, RetrievedChunk, VectorStore } from '../types';
import { indexScope } from '../utils/documentScope';

export interface RetrieveOptions {
  materialId?: string;
  filter?: Omit<ChunkFilter, 'materialId'>;
  maxResults: number;
}

export class RetrievalService {
  private embedder: Embedder;
  private vectorStore: VectorStore;

  constructor(embedder: Embedder, vectorStore: VectorStore) {
    this.embedder = embedder;
    this.vectorStore = vectorStore;
  }

  /**
   * Ranked chunks for a query, scoped to one material when given. An empty
   * store (or nothing indexed for the material) yields an empty list.
   */
  async retrieve(query: string, options: RetrieveOptions): Promise<RetrievedChunk[]> {
    if (options.maxResults < 1) {
      return [];
    }

    const embedding = await this.embedder.embed(query);
    const filter: ChunkFilter = { ...options.filter };
    if (options.materialId) {
      filter.materialId = indexScope(options.materialId);
    }

    const results = await this.vectorStore.query(embedding, options.maxResults, filter);
    return [...results]
      .sort((a, b) => a.distance - b.distance)
      .slice(0, options.maxResults);
  }
}
