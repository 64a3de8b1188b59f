import { GoogleGenerativeAI, GenerativeModel } from '@google/generative-ai';
import { Embedder } from '../types';

export class EmbeddingService implements Embedder {
  private configuredDimension: number;
  private actualDimension: number | null = null;
  private dimensionWarned: boolean = false;
  private readonly MAX_RETRIES = 3;
  private readonly INITIAL_RETRY_DELAY_MS = 1000;
  private readonly MAX_CACHE_ENTRIES = 1000;
  private embeddingCache: Map<string, number[]> = new Map();
  private modelInstance: GenerativeModel;

  constructor(apiKey: string | undefined, dimension: number = 768, model: string = 'text-embedding-004') {
    if (!apiKey) {
      throw new Error('GEMINI_API_KEY is required for embedding generation');
    }
    const genAI = new GoogleGenerativeAI(apiKey);
    this.configuredDimension = dimension;
    this.modelInstance = genAI.getGenerativeModel({ model });
  }

  async embed(text: string, retryCount: number = 0): Promise<number[]> {
    // Re-indexing a declaration embeds the same windows again
    const cached = this.embeddingCache.get(text);
    if (cached && retryCount === 0) {
      return [...cached];
    }

    try {
      if (retryCount > 0) {
        console.log(`[EmbeddingService] Retry ${retryCount}/${this.MAX_RETRIES}...`);
      }

      const result = await this.modelInstance.embedContent(text);
      const values = result.embedding?.values;
      if (!Array.isArray(values)) {
        throw new Error('Unexpected embedding response format');
      }

      if (this.actualDimension === null) {
        this.actualDimension = values.length;
        if (this.actualDimension !== this.configuredDimension && !this.dimensionWarned) {
          console.warn(`[EmbeddingService] Dimension mismatch: ${this.configuredDimension} vs ${this.actualDimension}`);
          this.dimensionWarned = true;
        }
      }

      const embedding = this.fitDimension(values);

      if (retryCount === 0) {
        if (this.embeddingCache.size >= this.MAX_CACHE_ENTRIES) {
          const firstKey = this.embeddingCache.keys().next().value;
          if (firstKey !== undefined) this.embeddingCache.delete(firstKey);
        }
        this.embeddingCache.set(text, embedding);
      }

      return [...embedding];
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      const isNetworkError = err.message.includes('fetch failed') ||
        err.message.includes('ECONNRESET') ||
        err.message.includes('ETIMEDOUT') ||
        err.message.includes('network');

      if (isNetworkError && retryCount < this.MAX_RETRIES) {
        const delay = this.INITIAL_RETRY_DELAY_MS * Math.pow(2, retryCount);
        console.warn(`[EmbeddingService] Network error (attempt ${retryCount + 1}/${this.MAX_RETRIES + 1}), retrying in ${delay}ms:`, err.message);
        await new Promise(resolve => setTimeout(resolve, delay));
        return this.embed(text, retryCount + 1);
      }

      console.error(`[EmbeddingService] ERROR: Failed to generate embedding after ${retryCount} retries:`, err);
      throw new Error(`Failed to generate embedding: ${err.message}`);
    }
  }

  getDimension(): number {
    return this.configuredDimension;
  }

  private fitDimension(values: number[]): number[] {
    if (values.length > this.configuredDimension) {
      return values.slice(0, this.configuredDimension);
    }
    if (values.length < this.configuredDimension) {
      return [...values, ...new Array<number>(this.configuredDimension - values.length).fill(0)];
    }
    return values;
  }
}
