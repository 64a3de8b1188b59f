export const REGULATION_KEYWORDS = [
  'PPWD 94/62/EC',
  'PPWD 94/62/1',
  'PPWR (EU) 2025/40',
  'Lead (Pb)',
  'Cadmium (Cd)',
  'Hexavalent Chromium (Cr6+)'
] as const;

export type RegulationKeyword = typeof REGULATION_KEYWORDS[number];

// Flat so it can be stored as Pinecone record metadata
export type ChunkMetadata = {
  material_id: string;
  sku: string;
  source_document_id: string;
  chunk_index: number;
  total_chunks: number;
  chunk_overlap: number;
  text: string;
  uploaded_at: string;
  [key: string]: string | number;
};

export interface Chunk {
  text: string;
  sourceDocumentId: string;
  sequenceIndex: number;
  totalChunks: number;
  materialId: string;
  metadata: Record<string, string>;
}

export interface RetrievedChunk {
  chunk: Chunk;
  distance: number;
}

export interface ChunkFilter {
  materialId?: string;
  sourceDocumentId?: string;
  metadata?: Record<string, string>;
}

export interface Mention {
  keyword: string;
  evidenceText: string;
  compliant: boolean | null;
}

export interface ScannedMention {
  keyword: RegulationKeyword;
  evidenceText: string;
}

export interface ExtractionRecord {
  materialId: string;
  supplierName: string | null;
  declarationDate: string | null;
  complianceFlag: boolean | null;
  recyclability: string | null;
  recycledContentPercent: number | null;
  restrictedSubstances: string[];
  notes: string | null;
  regulatoryMentions: Mention[];
}

export interface MaterialRecord extends ExtractionRecord {
  sourcePath: string;
  createdAt: Date;
  updatedAt: Date;
}

export type SkipReason =
  | 'material_not_in_bom'
  | 'duplicate_material_in_pdf'
  | 'text_extraction_failed'
  | 'empty_document'
  | 'extraction_failed'
  | 'material_not_indexed';

export type SkipRecord =
  | { reason: 'material_not_in_bom' | 'duplicate_material_in_pdf'; materialId: string; file: string }
  | { reason: 'text_extraction_failed' | 'empty_document' | 'extraction_failed'; file: string }
  | { reason: 'material_not_indexed'; materialId: string };

export interface ConsolidationResult {
  runId: string;
  inserted: number;
  updated: number;
  skipped: number;
  skippedReasons: SkipRecord[];
  complianceConflicts: string[];
}

export interface IndexResult {
  chunksCreated: number;
  totalChunks: number;
  collectionName: string;
}

export interface PipelineConfig {
  collectionName: string;
  chunkSize: number;
  chunkOverlap: number;
  mentionWindowLines: number;
  maxResults: number;
  temperature: number;
  maxTokens: number;
  mentionAssessment: {
    enabled: boolean;
    temperature: number;
    maxTokens: number;
  };
}

export interface VectorStore {
  readonly collectionName: string;
  upsert(ids: string[], embeddings: number[][], documents: string[], metadatas: ChunkMetadata[]): Promise<void>;
  query(embedding: number[], k: number, filter?: ChunkFilter): Promise<RetrievedChunk[]>;
  get(filter: ChunkFilter): Promise<Chunk[]>;
  delete(ids: string[]): Promise<void>;
}

export interface Embedder {
  embed(text: string): Promise<number[]>;
}

export interface ExtractedText {
  text: string;
  pages: number;
}

export interface TextExtractor {
  extractText(buffer: Buffer, mimetype: string, filename: string): Promise<ExtractedText>;
}

export interface LanguageModel {
  generate(prompt: string, temperature: number, maxTokens: number): Promise<string>;
}

// Reads and writes that commit or roll back together
export interface MaterialRecordTransaction {
  find(materialId: string): Promise<MaterialRecord | null>;
  insert(record: MaterialRecord): Promise<void>;
  replace(record: MaterialRecord): Promise<void>;
}

export interface MaterialRecordStore {
  withTransaction<T>(work: (tx: MaterialRecordTransaction) => Promise<T>): Promise<T>;
  list(materialId?: string): Promise<MaterialRecord[]>;
}
