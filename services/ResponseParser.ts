export type JsonObject = Record<string, unknown>;

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

const PREVIEW_LENGTH = 500;

export class ResponseParser {
  /**
   * Model text -> list of objects. Tries the whole text as JSON first, then
   * every flat {...} fragment on its own. Unparsable text yields [].
   */
  parse(response: string): JsonObject[] {
    const text = this.stripCodeFence(response.trim());
    if (!text || text === '[]') {
      return [];
    }

    const direct = this.tryParse(text);
    if (Array.isArray(direct)) {
      return direct.filter(isJsonObject);
    }
    if (isJsonObject(direct)) {
      return [direct];
    }

    const parsed: JsonObject[] = [];
    for (const fragment of text.match(/\{[\s\S]*?\}/g) ?? []) {
      const candidate = this.tryParse(fragment);
      if (isJsonObject(candidate)) {
        parsed.push(candidate);
      }
    }
    if (parsed.length > 0) {
      return parsed;
    }

    console.warn(`[ResponseParser] Could not parse model response: ${text.substring(0, PREVIEW_LENGTH)}`);
    return [];
  }

  // Models often wrap JSON in markdown code blocks
  private stripCodeFence(text: string): string {
    if (text.startsWith('```json')) {
      return text.replace(/```json\n?/g, '').replace(/```\n?/g, '').trim();
    }
    if (text.startsWith('```')) {
      return text.replace(/```\n?/g, '').trim();
    }
    return text;
  }

  private tryParse(text: string): unknown {
    try {
      return JSON.parse(text);
    } catch {
      return undefined;
    }
  }
}
