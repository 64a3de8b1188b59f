import { Chunk } from '../types';

export interface BuildChunksParams {
  text: string;
  materialId: string;
  sourceDocumentId: string;
  metadata: Record<string, string>;
  chunkSize: number;
  chunkOverlap: number;
}

interface WordToken {
  word: string;
  // Whitespace before the word: its line breaks, or a single space
  separator: string;
}

function tokenize(text: string): WordToken[] {
  const tokens: WordToken[] = [];
  for (const match of text.matchAll(/(\s*)(\S+)/g)) {
    const breaks = match[1].replace(/[^\n]/g, '');
    tokens.push({ word: match[2], separator: breaks || ' ' });
  }
  return tokens;
}

export class ChunkingService {
  /**
   * Sliding word window. The cursor advances by max(size - overlap, 1) words
   * until it passes the last word, so every word lands in at least one chunk.
   * Line breaks between words are kept; a chunk that starts on a new line
   * carries that break in front of its first word.
   */
  splitWords(text: string, chunkSize: number, chunkOverlap: number): string[] {
    if (chunkSize < 1) {
      throw new Error(`Chunk size must be at least 1 word, got ${chunkSize}`);
    }
    if (chunkOverlap < 0 || chunkOverlap >= chunkSize) {
      throw new Error(`Chunk overlap must be in [0, ${chunkSize}), got ${chunkOverlap}`);
    }

    const tokens = tokenize(text);
    if (tokens.length === 0) {
      return [];
    }

    const step = Math.max(chunkSize - chunkOverlap, 1);
    const windows: string[] = [];
    for (let cursor = 0; cursor < tokens.length; cursor += step) {
      const leading = cursor > 0 && tokens[cursor].separator !== ' ' ? tokens[cursor].separator : '';
      windows.push(leading + this.join(tokens.slice(cursor, cursor + chunkSize)));
    }
    return windows;
  }

  buildChunks(params: BuildChunksParams): Chunk[] {
    const windows = this.splitWords(params.text, params.chunkSize, params.chunkOverlap);
    return windows.map((windowText, index) => ({
      text: windowText,
      sourceDocumentId: params.sourceDocumentId,
      sequenceIndex: index,
      totalChunks: windows.length,
      materialId: params.materialId,
      metadata: { ...params.metadata }
    }));
  }

  // Inverse of splitWords: drop the leading overlap of every chunk after the first.
  reconstructText(chunks: Chunk[], chunkOverlap: number): string {
    const ordered = [...chunks].sort((a, b) => a.sequenceIndex - b.sequenceIndex);
    const tokens: WordToken[] = [];

    ordered.forEach((chunk, position) => {
      const chunkTokens = tokenize(chunk.text);
      tokens.push(...(position === 0 ? chunkTokens : chunkTokens.slice(chunkOverlap)));
    });

    return this.join(tokens);
  }

  private join(tokens: WordToken[]): string {
    return tokens.map((token, i) => (i === 0 ? token.word : token.separator + token.word)).join('');
  }
}
