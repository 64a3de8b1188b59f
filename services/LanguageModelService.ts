import { GoogleGenerativeAI } from '@google/generative-ai';
import { LanguageModel } from '../types';

/**
 * Single-call gateway to the generation model. Callers own failure isolation:
 * an error here is meant to fail one field or one material, never the batch.
 */
export class LanguageModelService implements LanguageModel {
  private genAI: GoogleGenerativeAI;
  private model: string;

  constructor(apiKey: string | undefined, model: string = 'gemini-2.5-flash') {
    if (!apiKey) {
      throw new Error('GEMINI_API_KEY is required for compliance extraction');
    }
    this.genAI = new GoogleGenerativeAI(apiKey);
    this.model = model;
  }

  async generate(prompt: string, temperature: number, maxTokens: number): Promise<string> {
    try {
      const model = this.genAI.getGenerativeModel({
        model: this.model,
        generationConfig: {
          temperature,
          maxOutputTokens: maxTokens
        }
      });
      const result = await model.generateContent(prompt);
      return result.response.text();
    } catch (error) {
      console.error(`[LanguageModelService] ERROR: LLM call failed:`, error);
      throw new Error(`Failed to generate completion: ${error instanceof Error ? error.message : 'Unknown error'}`);
    }
  }
}
