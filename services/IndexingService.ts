import { ChunkMetadata, Embedder, IndexResult, PipelineConfig, VectorStore } from '../types';
import { ChunkingService } from './ChunkingService';
import { TextCleaningService } from './TextCleaningService';
import { chunkId } from './PineconeService';
import { indexScope } from '../utils/documentScope';

export interface IndexDeclarationParams {
  text: string;
  materialId: string;
  sourceDocumentId: string;
  sku?: string;
  // Descriptive BOM fields (name, supplier, component...) copied onto every chunk
  metadata?: Record<string, string>;
}

export class IndexingService {
  private embedder: Embedder;
  private vectorStore: VectorStore;
  private chunkingService: ChunkingService;
  private cleaningService: TextCleaningService;

  constructor(
    embedder: Embedder,
    vectorStore: VectorStore,
    chunkingService = new ChunkingService(),
    cleaningService = new TextCleaningService()
  ) {
    this.embedder = embedder;
    this.vectorStore = vectorStore;
    this.chunkingService = chunkingService;
    this.cleaningService = cleaningService;
  }

  /**
   * Chunks, embeds and stores one declaration under its material id (lower
   * cased). Chunks whose embedding fails are left out, and every id of an
   * earlier version that the new version did not write is removed.
   */
  async indexDeclaration(
    params: IndexDeclarationParams,
    config: Pick<PipelineConfig, 'chunkSize' | 'chunkOverlap'>
  ): Promise<IndexResult> {
    const materialId = indexScope(params.materialId);
    const cleaned = this.cleaningService.cleanText(params.text);
    const chunks = this.chunkingService.buildChunks({
      text: cleaned,
      materialId,
      sourceDocumentId: params.sourceDocumentId,
      metadata: params.metadata ?? {},
      chunkSize: config.chunkSize,
      chunkOverlap: config.chunkOverlap
    });

    if (chunks.length === 0) {
      console.warn(`[IndexingService] No text to index for ${params.sourceDocumentId}`);
      return { chunksCreated: 0, totalChunks: 0, collectionName: this.vectorStore.collectionName };
    }

    const uploadedAt = new Date().toISOString();
    const ids: string[] = [];
    const embeddings: number[][] = [];
    const documents: string[] = [];
    const metadatas: ChunkMetadata[] = [];
    const written = new Set<number>();

    for (const chunk of chunks) {
      try {
        const embedding = await this.embedder.embed(chunk.text);
        ids.push(chunkId(materialId, chunk.sequenceIndex));
        embeddings.push(embedding);
        documents.push(chunk.text);
        metadatas.push({
          ...chunk.metadata,
          material_id: materialId,
          sku: params.sku ?? '',
          source_document_id: params.sourceDocumentId,
          chunk_index: chunk.sequenceIndex,
          total_chunks: chunk.totalChunks,
          chunk_overlap: config.chunkOverlap,
          text: chunk.text,
          uploaded_at: uploadedAt
        });
        written.add(chunk.sequenceIndex);
      } catch (error) {
        console.error(
          `[IndexingService] Skipping chunk ${chunk.sequenceIndex} of ${params.sourceDocumentId}: ` +
          `${error instanceof Error ? error.message : 'Unknown error'}`
        );
      }
    }

    await this.vectorStore.upsert(ids, embeddings, documents, metadatas);
    await this.removeStaleChunks(materialId, written);

    console.log(
      `[IndexingService] Indexed ${ids.length}/${chunks.length} chunks for material ${materialId} ` +
      `into ${this.vectorStore.collectionName}`
    );

    return {
      chunksCreated: ids.length,
      totalChunks: chunks.length,
      collectionName: this.vectorStore.collectionName
    };
  }

  // Beyond the new chunk count, or at a position whose new embedding failed
  private async removeStaleChunks(materialId: string, written: Set<number>): Promise<void> {
    const existing = await this.vectorStore.get({ materialId });
    const staleIds = existing
      .filter(chunk => !written.has(chunk.sequenceIndex))
      .map(chunk => chunkId(materialId, chunk.sequenceIndex));

    if (staleIds.length > 0) {
      await this.vectorStore.delete(staleIds);
      console.log(`[IndexingService] Removed ${staleIds.length} stale chunks for material ${materialId}`);
    }
  }
}
