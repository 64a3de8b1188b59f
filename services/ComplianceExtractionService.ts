import { LanguageModel, PipelineConfig } from '../types';
import { EXTRACTION_FIELDS, EXTRACTION_ROLE, ExtractionField } from './extractionFields';
import { PromptBuilder } from './PromptBuilder';
import { JsonObject, ResponseParser } from './ResponseParser';
import { RetrievalService } from './RetrievalService';

export type FieldExtractionConfig = Pick<PipelineConfig, 'maxResults' | 'temperature' | 'maxTokens'>;

/**
 * Record i takes the i-th object of every field's output; later fields
 * overwrite keys set by earlier ones.
 */
export function consolidateFieldOutputs(outputs: JsonObject[][]): JsonObject[] {
  const count = outputs.reduce((max, output) => Math.max(max, output.length), 0);
  const records: JsonObject[] = [];
  for (let i = 0; i < count; i++) {
    const record: JsonObject = {};
    for (const output of outputs) {
      if (i < output.length) {
        Object.assign(record, output[i]);
      }
    }
    records.push(record);
  }
  return records;
}

export class ComplianceExtractionService {
  private retrievalService: RetrievalService;
  private languageModel: LanguageModel;
  private promptBuilder: PromptBuilder;
  private parser: ResponseParser;
  private fields: ExtractionField[];

  constructor(
    retrievalService: RetrievalService,
    languageModel: LanguageModel,
    promptBuilder = new PromptBuilder(),
    parser = new ResponseParser(),
    fields: ExtractionField[] = EXTRACTION_FIELDS
  ) {
    this.retrievalService = retrievalService;
    this.languageModel = languageModel;
    this.promptBuilder = promptBuilder;
    this.parser = parser;
    this.fields = fields;
  }

  /**
   * Runs every field in its own retrieve -> prompt -> generate -> parse pass
   * over the chunks indexed for materialId and consolidates the results.
   */
  async extract(materialId: string, config: FieldExtractionConfig): Promise<JsonObject[]> {
    const outputs: JsonObject[][] = [];
    for (const field of this.fields) {
      outputs.push(await this.extractField(field, materialId, config));
    }
    return consolidateFieldOutputs(outputs);
  }

  // A failing field yields no objects; the remaining fields still run.
  async extractField(field: ExtractionField, materialId: string, config: FieldExtractionConfig): Promise<JsonObject[]> {
    try {
      const retrieved = await this.retrievalService.retrieve(field.query, {
        materialId,
        maxResults: config.maxResults
      });

      const prompt = this.promptBuilder.buildFieldPrompt({
        role: EXTRACTION_ROLE,
        field: field.name,
        query: field.query,
        instructions: field.instructions,
        chunkTexts: retrieved.map(result => result.chunk.text)
      });

      const response = await this.languageModel.generate(prompt, config.temperature, config.maxTokens);
      const parsed = this.parser.parse(response);

      // A bare list of mention objects belongs under the field's own key
      if (field.name === 'regulatory_mentions' && parsed.length > 0 && parsed.every(item => !(field.name in item))) {
        return [{ regulatory_mentions: parsed }];
      }
      return parsed;
    } catch (error) {
      console.warn(
        `[ComplianceExtraction] Field ${field.name} failed for ${materialId}: ` +
        `${error instanceof Error ? error.message : 'Unknown error'}`
      );
      return [];
    }
  }
}
