import { LanguageModel, Mention, ScannedMention } from '../types';
import { coerceMentions } from './OutputNormalizer';
import { PromptBuilder } from './PromptBuilder';
import { ResponseParser } from './ResponseParser';

export interface MentionAssessmentOptions {
  temperature: number;
  maxTokens: number;
}

/**
 * Second model pass over the scanner's snippets, asking for a compliance
 * verdict per keyword. Failures are logged and yield no mentions.
 */
export class MentionAssessmentService {
  private languageModel: LanguageModel;
  private promptBuilder: PromptBuilder;
  private parser: ResponseParser;

  constructor(languageModel: LanguageModel, promptBuilder = new PromptBuilder(), parser = new ResponseParser()) {
    this.languageModel = languageModel;
    this.promptBuilder = promptBuilder;
    this.parser = parser;
  }

  async assess(snippets: ScannedMention[], options: MentionAssessmentOptions): Promise<Mention[]> {
    if (snippets.length === 0) {
      return [];
    }

    try {
      const prompt = this.promptBuilder.buildMentionAssessmentPrompt(snippets);
      const response = await this.languageModel.generate(prompt, options.temperature, options.maxTokens);
      return coerceMentions(this.parser.parse(response));
    } catch (error) {
      console.warn(`[MentionAssessment] Assessment failed: ${error instanceof Error ? error.message : 'Unknown error'}`);
      return [];
    }
  }
}
