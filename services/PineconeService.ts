import { Pinecone, Index, RecordMetadata, PineconeRecord } from '@pinecone-database/pinecone';
import { Chunk, ChunkFilter, ChunkMetadata, RetrievedChunk, VectorStore } from '../types';

const RESERVED_METADATA_KEYS = new Set([
  'material_id',
  'source_document_id',
  'chunk_index',
  'total_chunks',
  'text'
]);

const UPSERT_BATCH_SIZE = 50;
// Pinecone has limits on URL length for fetch
const FETCH_BATCH_SIZE = 100;
const DELETE_BATCH_SIZE = 1000;

function readString(metadata: RecordMetadata, key: string): string {
  const value = metadata[key];
  return typeof value === 'string' ? value : '';
}

function readNumber(metadata: RecordMetadata, key: string): number {
  const value = metadata[key];
  return typeof value === 'number' ? value : Number.NaN;
}

export function chunkIdPrefix(materialId: string): string {
  return `${materialId}_chunk_`;
}

export function chunkId(materialId: string, index: number): string {
  return `${chunkIdPrefix(materialId)}${index}`;
}

export class PineconeService implements VectorStore {
  readonly collectionName: string;
  private index: Index;
  private dimension: number;

  constructor(apiKey: string, indexName: string, dimension: number) {
    const pinecone = new Pinecone({ apiKey });
    this.index = pinecone.index(indexName);
    this.collectionName = indexName;
    this.dimension = dimension;
  }

  async upsert(ids: string[], embeddings: number[][], documents: string[], metadatas: ChunkMetadata[]): Promise<void> {
    if (ids.length === 0) {
      return;
    }
    if (embeddings.length !== ids.length || documents.length !== ids.length || metadatas.length !== ids.length) {
      throw new Error(
        `Upsert arrays differ in length: ids=${ids.length}, embeddings=${embeddings.length}, ` +
        `documents=${documents.length}, metadatas=${metadatas.length}`
      );
    }

    const firstDimension = embeddings[0].length;
    for (const embedding of embeddings) {
      if (embedding.length !== firstDimension) {
        const errorMsg = `Vector dimension mismatch: expected ${firstDimension} but found ${embedding.length}`;
        console.error(`[PineconeService] ERROR: ${errorMsg}`);
        throw new Error(errorMsg);
      }
    }
    if (this.dimension && firstDimension !== this.dimension) {
      console.warn(`[PineconeService] WARNING: Vector dimension (${firstDimension}) doesn't match configured dimension (${this.dimension})`);
    }

    const records: PineconeRecord[] = ids.map((id, i) => ({
      id,
      values: embeddings[i],
      metadata: { ...metadatas[i], text: documents[i] }
    }));

    try {
      for (let i = 0; i < records.length; i += UPSERT_BATCH_SIZE) {
        await this.index.upsert(records.slice(i, i + UPSERT_BATCH_SIZE));
      }
    } catch (error) {
      console.error(`[PineconeService] ERROR: Failed to upsert vectors:`, error);
      throw new Error(`Failed to upsert vectors to Pinecone: ${error instanceof Error ? error.message : 'Unknown error'}`);
    }
  }

  async query(embedding: number[], k: number, filter?: ChunkFilter): Promise<RetrievedChunk[]> {
    try {
      const response = await this.index.query({
        vector: embedding,
        topK: k,
        includeMetadata: true,
        filter: filter ? this.buildFilter(filter) : undefined
      });

      const results: RetrievedChunk[] = [];
      for (const match of response.matches) {
        const chunk = this.toChunk(match.metadata);
        if (chunk) {
          // cosine similarity -> distance
          results.push({ chunk, distance: 1 - (match.score ?? 0) });
        }
      }
      return results;
    } catch (error) {
      console.error(`[PineconeService] ERROR: Failed to query Pinecone:`, error);
      throw new Error(`Failed to query Pinecone: ${error instanceof Error ? error.message : 'Unknown error'}`);
    }
  }

  async get(filter: ChunkFilter): Promise<Chunk[]> {
    try {
      const ids = await this.listIds(filter.materialId ? chunkIdPrefix(filter.materialId) : undefined);
      const chunks: Chunk[] = [];

      for (let i = 0; i < ids.length; i += FETCH_BATCH_SIZE) {
        const response = await this.index.fetch(ids.slice(i, i + FETCH_BATCH_SIZE));
        for (const record of Object.values(response.records)) {
          const chunk = this.toChunk(record.metadata);
          if (chunk && this.matches(chunk, filter)) {
            chunks.push(chunk);
          }
        }
      }

      return chunks.sort((a, b) => a.sequenceIndex - b.sequenceIndex);
    } catch (error) {
      console.error(`[PineconeService] ERROR: Failed to fetch chunks:`, error);
      throw new Error(`Failed to fetch chunks from Pinecone: ${error instanceof Error ? error.message : 'Unknown error'}`);
    }
  }

  async delete(ids: string[]): Promise<void> {
    try {
      for (let i = 0; i < ids.length; i += DELETE_BATCH_SIZE) {
        await this.index.deleteMany(ids.slice(i, i + DELETE_BATCH_SIZE));
      }
    } catch (error) {
      console.error(`[PineconeService] ERROR: Failed to delete vectors:`, error);
      throw new Error(`Failed to delete vectors from Pinecone: ${error instanceof Error ? error.message : 'Unknown error'}`);
    }
  }

  private async listIds(prefix?: string): Promise<string[]> {
    const ids: string[] = [];
    let paginationToken: string | undefined;

    do {
      const page = await this.index.listPaginated({ prefix, paginationToken });
      for (const item of page.vectors ?? []) {
        if (item.id) {
          ids.push(item.id);
        }
      }
      paginationToken = page.pagination?.next;
    } while (paginationToken);

    return ids;
  }

  private buildFilter(filter: ChunkFilter): Record<string, { $eq: string }> | undefined {
    const conditions: Record<string, { $eq: string }> = {};
    if (filter.materialId) {
      conditions.material_id = { $eq: filter.materialId };
    }
    if (filter.sourceDocumentId) {
      conditions.source_document_id = { $eq: filter.sourceDocumentId };
    }
    for (const [key, value] of Object.entries(filter.metadata ?? {})) {
      conditions[key] = { $eq: value };
    }
    return Object.keys(conditions).length > 0 ? conditions : undefined;
  }

  private matches(chunk: Chunk, filter: ChunkFilter): boolean {
    if (filter.materialId && chunk.materialId !== filter.materialId) return false;
    if (filter.sourceDocumentId && chunk.sourceDocumentId !== filter.sourceDocumentId) return false;
    return Object.entries(filter.metadata ?? {}).every(([key, value]) => chunk.metadata[key] === value);
  }

  private toChunk(metadata: RecordMetadata | undefined): Chunk | null {
    if (!metadata) {
      return null;
    }
    const sequenceIndex = readNumber(metadata, 'chunk_index');
    if (!Number.isFinite(sequenceIndex)) {
      return null;
    }

    const descriptive: Record<string, string> = {};
    for (const [key, value] of Object.entries(metadata)) {
      if (RESERVED_METADATA_KEYS.has(key)) continue;
      if (typeof value === 'string' || typeof value === 'number') {
        descriptive[key] = String(value);
      }
    }

    return {
      text: readString(metadata, 'text'),
      sourceDocumentId: readString(metadata, 'source_document_id'),
      sequenceIndex,
      totalChunks: readNumber(metadata, 'total_chunks'),
      materialId: readString(metadata, 'material_id'),
      metadata: descriptive
    };
  }
}
