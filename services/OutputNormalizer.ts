import { ExtractionRecord, Mention, REGULATION_KEYWORDS } from '../types';
import { JsonObject, isJsonObject } from './ResponseParser';

const TRUE_STRINGS = new Set(['true', 'yes', 'y', '1']);
const FALSE_STRINGS = new Set(['false', 'no', 'n', '0']);

// Model output uses snake_case; already-normalized records use camelCase.
const FIELD_KEYS = {
  materialId: ['material_id', 'materialId'],
  supplierName: ['supplier_name', 'supplierName'],
  declarationDate: ['declaration_date', 'declarationDate'],
  complianceFlag: ['ppwr_compliant', 'compliance_flag', 'complianceFlag'],
  recyclability: ['packaging_recyclability', 'recyclability'],
  recycledContentPercent: ['recycled_content_percent', 'recycledContentPercent'],
  restrictedSubstances: ['restricted_substances', 'restrictedSubstances'],
  notes: ['notes'],
  regulatoryMentions: ['regulatory_mentions', 'regulatoryMentions']
} as const;

function pick(raw: JsonObject, keys: readonly string[]): unknown {
  for (const key of keys) {
    const value = raw[key];
    if (value !== undefined && value !== null) {
      return value;
    }
  }
  return undefined;
}

/** true / false / null: strings outside both vocabularies are unknown. */
export function coerceTriState(value: unknown): boolean | null {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return Number.isNaN(value) ? null : value !== 0;
  if (typeof value === 'string') {
    const lowered = value.trim().toLowerCase();
    if (TRUE_STRINGS.has(lowered)) return true;
    if (FALSE_STRINGS.has(lowered)) return false;
  }
  return null;
}

/**
 * The declaration-level flag: any non-blank string outside the true vocabulary
 * counts as false. null means the model said nothing usable.
 */
export function coerceComplianceFlag(value: unknown): boolean | null {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return Number.isNaN(value) ? null : value !== 0;
  if (typeof value === 'string') {
    const lowered = value.trim().toLowerCase();
    return lowered.length === 0 ? null : TRUE_STRINGS.has(lowered);
  }
  return null;
}

export function coerceNumber(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value !== 'string') {
    return null;
  }
  const cleaned = value.trim().replace(/%$/, '').trim();
  if (cleaned.length === 0) {
    return null;
  }
  const parsed = Number(cleaned);
  return Number.isFinite(parsed) ? parsed : null;
}

export function coerceString(value: unknown): string | null {
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : null;
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }
  return null;
}

export function coerceStringList(value: unknown): string[] {
  if (Array.isArray(value)) {
    return value
      .map(item => coerceString(item))
      .filter((item): item is string => item !== null);
  }
  if (typeof value === 'string') {
    return value
      .split(',')
      .map(token => token.trim())
      .filter(token => token.length > 0);
  }
  return [];
}

export function canonicalKeyword(keyword: string): string {
  const lowered = keyword.toLowerCase();
  return REGULATION_KEYWORDS.find(known => known.toLowerCase() === lowered) ?? keyword;
}

function toMention(item: unknown): Mention | null {
  if (typeof item === 'string') {
    const evidenceText = item.trim();
    return evidenceText ? { keyword: '', evidenceText, compliant: null } : null;
  }
  if (!isJsonObject(item)) {
    return null;
  }

  const keyword = canonicalKeyword(coerceString(item.keyword) ?? '');
  const evidenceText = coerceString(pick(item, ['evidenceText', 'text', 'evidence'])) ?? '';
  if (!keyword && !evidenceText) {
    return null;
  }
  return { keyword, evidenceText, compliant: coerceTriState(item.compliant) };
}

export function coerceMentions(value: unknown): Mention[] {
  let items: unknown[] = [];
  if (Array.isArray(value)) {
    items = value;
  } else if (typeof value === 'string') {
    items = parseMentionString(value);
  }

  const seen = new Set<string>();
  const mentions: Mention[] = [];
  for (const item of items) {
    const mention = toMention(item);
    if (!mention) continue;
    const key = `${mention.keyword.toLowerCase()}\u0000${mention.evidenceText}`;
    if (seen.has(key)) continue;
    seen.add(key);
    mentions.push(mention);
  }
  return mentions;
}

function parseMentionString(value: string): unknown[] {
  try {
    const parsed: unknown = JSON.parse(value);
    if (Array.isArray(parsed)) {
      return parsed;
    }
  } catch {
    // not JSON, fall through to the comma-separated form
  }
  return coerceStringList(value);
}

export class OutputNormalizer {
  normalize(raw: JsonObject): ExtractionRecord {
    const restrictedSubstances = coerceStringList(pick(raw, FIELD_KEYS.restrictedSubstances));
    const materialId = coerceString(pick(raw, FIELD_KEYS.materialId)) ?? '';

    return {
      materialId,
      supplierName: coerceString(pick(raw, FIELD_KEYS.supplierName)),
      declarationDate: coerceString(pick(raw, FIELD_KEYS.declarationDate)),
      complianceFlag: this.inferComplianceFlag(
        coerceComplianceFlag(pick(raw, FIELD_KEYS.complianceFlag)),
        restrictedSubstances,
        materialId
      ),
      recyclability: coerceString(pick(raw, FIELD_KEYS.recyclability)),
      recycledContentPercent: coerceNumber(pick(raw, FIELD_KEYS.recycledContentPercent)),
      restrictedSubstances,
      notes: coerceString(pick(raw, FIELD_KEYS.notes)),
      regulatoryMentions: coerceMentions(pick(raw, FIELD_KEYS.regulatoryMentions))
    };
  }

  normalizeAll(items: JsonObject[]): ExtractionRecord[] {
    return items.map(item => this.normalize(item));
  }

  /** The model asserted compliance, but restricted substances force the flag to false. */
  hasComplianceConflict(raw: JsonObject): boolean {
    const explicit = coerceComplianceFlag(pick(raw, FIELD_KEYS.complianceFlag));
    return explicit === true && coerceStringList(pick(raw, FIELD_KEYS.restrictedSubstances)).length > 0;
  }

  // Restricted substances win over any explicit statement; without either, compliant.
  private inferComplianceFlag(explicit: boolean | null, restrictedSubstances: string[], materialId: string): boolean {
    if (restrictedSubstances.length > 0) {
      if (explicit === true) {
        console.warn(
          `[OutputNormalizer] compliance_flag_override: material '${materialId}' declared compliant ` +
          `but lists restricted substances (${restrictedSubstances.join(', ')})`
        );
      }
      return false;
    }
    return explicit ?? true;
  }
}
