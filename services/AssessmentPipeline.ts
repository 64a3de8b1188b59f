import { v4 as uuidv4 } from 'uuid';
import {
  ConsolidationResult,
  ExtractionRecord,
  MaterialRecord,
  MaterialRecordStore,
  PipelineConfig,
  SkipRecord,
  TextExtractor,
  VectorStore
} from '../types';
import { contentScope, indexScope } from '../utils/documentScope';
import { ChunkingService } from './ChunkingService';
import { ComplianceExtractionService } from './ComplianceExtractionService';
import { IndexingService } from './IndexingService';
import { MaterialResolver } from './MaterialResolver';
import { MentionAssessmentService } from './MentionAssessmentService';
import { reconcileMentions } from './MentionReconciler';
import { scanRegulatoryMentions } from './MentionScanner';
import { OutputNormalizer } from './OutputNormalizer';
import { JsonObject } from './ResponseParser';

export interface DeclarationDocument {
  file: string;
  buffer: Buffer;
  mimetype: string;
  // Material id declared at upload; fills records the model left without one
  materialIdHint?: string;
  sku?: string;
  metadata?: Record<string, string>;
}

export interface AssessmentPipelineDeps {
  textExtractor: TextExtractor;
  indexingService: IndexingService;
  extractionService: ComplianceExtractionService;
  mentionAssessment: MentionAssessmentService;
  vectorStore: VectorStore;
  store: MaterialRecordStore;
  normalizer?: OutputNormalizer;
  chunkingService?: ChunkingService;
}

interface CandidateRecord extends ExtractionRecord {
  complianceConflict: boolean;
}

interface AcceptedRecord {
  record: CandidateRecord;
  sourcePath: string;
}

// Accumulates one run's outcome across documents or materials
class RunState {
  readonly runId = uuidv4();
  readonly accepted: AcceptedRecord[] = [];
  readonly skipped: SkipRecord[] = [];

  accept(records: CandidateRecord[], sourcePath: string): void {
    for (const record of records) {
      this.accepted.push({ record, sourcePath });
    }
  }
}

export class AssessmentPipeline {
  private deps: AssessmentPipelineDeps;
  private config: PipelineConfig;
  private normalizer: OutputNormalizer;
  private chunkingService: ChunkingService;

  constructor(deps: AssessmentPipelineDeps, config: PipelineConfig) {
    this.deps = deps;
    this.config = config;
    this.normalizer = deps.normalizer ?? new OutputNormalizer();
    this.chunkingService = deps.chunkingService ?? new ChunkingService();
  }

  /**
   * Upload path: every document is indexed under its own scope, extracted,
   * scanned and resolved against the BOM. All surviving records are written
   * in one transaction.
   */
  async assessDocuments(bomMaterialIds: string[], documents: DeclarationDocument[]): Promise<ConsolidationResult> {
    const resolver = new MaterialResolver(bomMaterialIds);
    const run = new RunState();
    console.log(`[AssessmentPipeline] Run ${run.runId}: ${documents.length} document(s), ${resolver.bomMaterialIds.length} BOM material(s)`);

    for (const document of documents) {
      let text: string;
      try {
        text = (await this.deps.textExtractor.extractText(document.buffer, document.mimetype, document.file)).text;
      } catch (error) {
        console.error(`[AssessmentPipeline] text_extraction_failed: ${document.file}: ${this.describe(error)}`);
        run.skipped.push({ reason: 'text_extraction_failed', file: document.file });
        continue;
      }

      if (!text.trim()) {
        console.warn(`[AssessmentPipeline] empty_document: ${document.file}`);
        run.skipped.push({ reason: 'empty_document', file: document.file });
        continue;
      }

      const hint = document.materialIdHint?.trim() || undefined;
      const scope = indexScope(hint ?? contentScope(text));

      // A failed index leaves retrieval without context; the scan below still runs
      try {
        await this.deps.indexingService.indexDeclaration(
          {
            text,
            materialId: scope,
            sourceDocumentId: document.file,
            sku: document.sku,
            metadata: document.metadata
          },
          this.config
        );
      } catch (error) {
        console.error(`[AssessmentPipeline] indexing_failed: ${document.file}: ${this.describe(error)}`);
      }

      try {
        const candidates = await this.buildCandidates(text, scope);
        const { resolved, skipped } = resolver.resolveDocument(candidates, document.file, hint);
        run.accept(resolved, document.file);
        run.skipped.push(...skipped);
      } catch (error) {
        console.error(`[AssessmentPipeline] extraction_failed: ${document.file}: ${this.describe(error)}`);
        run.skipped.push({ reason: 'extraction_failed', file: document.file });
      }
    }

    return this.persist(run);
  }

  /**
   * Re-assesses declarations indexed earlier: each BOM material's chunks are
   * read back, the text is rebuilt and run through the same consolidation.
   */
  async assessIndexedMaterials(bomMaterialIds: string[]): Promise<ConsolidationResult> {
    const resolver = new MaterialResolver(bomMaterialIds);
    const run = new RunState();
    console.log(`[AssessmentPipeline] Run ${run.runId}: ${resolver.bomMaterialIds.length} indexed BOM material(s)`);

    for (const materialId of resolver.bomMaterialIds) {
      try {
        const scope = indexScope(materialId);
        const chunks = await this.deps.vectorStore.get({ materialId: scope });
        if (chunks.length === 0) {
          console.warn(`[AssessmentPipeline] material_not_indexed: ${materialId}`);
          run.skipped.push({ reason: 'material_not_indexed', materialId });
          continue;
        }

        const storedOverlap = Number(chunks[0].metadata.chunk_overlap);
        const overlap = Number.isInteger(storedOverlap) && storedOverlap >= 0 ? storedOverlap : this.config.chunkOverlap;
        const text = this.chunkingService.reconstructText(chunks, overlap);
        const sourcePath = chunks[0].sourceDocumentId;

        const candidates = await this.buildCandidates(text, scope);
        const { resolved, skipped } = resolver.resolveDocument(candidates, sourcePath, materialId);
        run.accept(resolved, sourcePath);
        run.skipped.push(...skipped);
      } catch (error) {
        console.error(`[AssessmentPipeline] extraction_failed: ${materialId}: ${this.describe(error)}`);
        run.skipped.push({ reason: 'extraction_failed', file: materialId });
      }
    }

    return this.persist(run);
  }

  // Extraction, normalization and mention reconciliation for one document's text
  private async buildCandidates(text: string, scope: string): Promise<CandidateRecord[]> {
    const extracted = await this.deps.extractionService.extract(scope, this.config);
    let raw: JsonObject[] = extracted;
    if (raw.length === 0) {
      console.log(`[AssessmentPipeline] No fields extracted for ${scope}, keeping an empty record for scanned evidence`);
      raw = [{}];
    }

    const scanned = scanRegulatoryMentions(text, this.config.mentionWindowLines);
    const assessed = this.config.mentionAssessment.enabled
      ? await this.deps.mentionAssessment.assess(scanned, this.config.mentionAssessment)
      : [];

    return raw.map(item => {
      const record = this.normalizer.normalize(item);
      return {
        ...record,
        regulatoryMentions: reconcileMentions(record.regulatoryMentions, assessed, scanned),
        complianceConflict: this.normalizer.hasComplianceConflict(item)
      };
    });
  }

  private async persist(run: RunState): Promise<ConsolidationResult> {
    const now = new Date();

    let counts: { inserted: number; updated: number };
    try {
      counts = await this.deps.store.withTransaction(async tx => {
        let inserted = 0;
        let updated = 0;
        for (const { record, sourcePath } of run.accepted) {
          const existing = await tx.find(record.materialId);
          if (existing) {
            await tx.replace(this.toMaterialRecord(record, sourcePath, existing.createdAt, now));
            updated++;
          } else {
            await tx.insert(this.toMaterialRecord(record, sourcePath, now, now));
            inserted++;
          }
        }
        return { inserted, updated };
      });
    } catch (error) {
      console.error(`[AssessmentPipeline] Run ${run.runId} rolled back: ${this.describe(error)}`);
      throw error;
    }

    const complianceConflicts = run.accepted
      .filter(({ record }) => record.complianceConflict)
      .map(({ record }) => record.materialId);
    for (const materialId of complianceConflicts) {
      console.warn(`[AssessmentPipeline] Compliance conflict for ${materialId}: model asserted compliance despite restricted substances`);
    }

    console.log(
      `[AssessmentPipeline] Run ${run.runId} committed: inserted=${counts.inserted}, ` +
      `updated=${counts.updated}, skipped=${run.skipped.length}`
    );

    return {
      runId: run.runId,
      inserted: counts.inserted,
      updated: counts.updated,
      skipped: run.skipped.length,
      skippedReasons: run.skipped,
      complianceConflicts
    };
  }

  private toMaterialRecord(record: CandidateRecord, sourcePath: string, createdAt: Date, updatedAt: Date): MaterialRecord {
    return {
      materialId: record.materialId,
      supplierName: record.supplierName,
      declarationDate: record.declarationDate,
      complianceFlag: record.complianceFlag,
      recyclability: record.recyclability,
      recycledContentPercent: record.recycledContentPercent,
      restrictedSubstances: record.restrictedSubstances,
      notes: record.notes,
      regulatoryMentions: record.regulatoryMentions,
      sourcePath,
      createdAt,
      updatedAt
    };
  }

  private describe(error: unknown): string {
    return error instanceof Error ? error.message : 'Unknown error';
  }
}
