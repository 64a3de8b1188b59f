import { PipelineConfig } from '../types';

export type Env = Record<string, string | undefined>;

export const DEFAULT_COLLECTION_NAME = 'ppwr-supplier-declarations';

function readNumber(env: Env, key: string, fallback: number): number {
  const raw = env[key]?.trim();
  if (!raw) {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`${key} must be a number, got '${raw}'`);
  }
  return value;
}

function readInteger(env: Env, key: string, fallback: number, min: number): number {
  const value = readNumber(env, key, fallback);
  if (!Number.isInteger(value) || value < min) {
    throw new Error(`${key} must be an integer >= ${min}, got ${value}`);
  }
  return value;
}

function readBoolean(env: Env, key: string, fallback: boolean): boolean {
  const raw = env[key]?.trim().toLowerCase();
  if (!raw) {
    return fallback;
  }
  if (['true', '1', 'yes', 'on'].includes(raw)) return true;
  if (['false', '0', 'no', 'off'].includes(raw)) return false;
  throw new Error(`${key} must be a boolean, got '${raw}'`);
}

export function loadPipelineConfig(env: Env = process.env): PipelineConfig {
  const chunkSize = readInteger(env, 'CHUNK_SIZE', 300, 1);
  const chunkOverlap = readInteger(env, 'CHUNK_OVERLAP', 50, 0);
  if (chunkOverlap >= chunkSize) {
    throw new Error(`CHUNK_OVERLAP (${chunkOverlap}) must be smaller than CHUNK_SIZE (${chunkSize})`);
  }

  return {
    collectionName: env.PINECONE_INDEX_NAME?.trim() || DEFAULT_COLLECTION_NAME,
    chunkSize,
    chunkOverlap,
    mentionWindowLines: readInteger(env, 'MENTION_WINDOW_LINES', 50, 0),
    maxResults: readInteger(env, 'MAX_RESULTS', 3, 1),
    temperature: readNumber(env, 'LLM_TEMPERATURE', 0.4),
    maxTokens: readInteger(env, 'LLM_MAX_TOKENS', 2048, 1),
    mentionAssessment: {
      enabled: readBoolean(env, 'MENTION_ASSESSMENT_ENABLED', true),
      temperature: 0,
      maxTokens: readInteger(env, 'MENTION_ASSESSMENT_MAX_TOKENS', 700, 1)
    }
  };
}
