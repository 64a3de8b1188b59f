import { RegulationKeyword, ScannedMention } from '../types';

export interface RegulationRule {
  keyword: RegulationKeyword;
  pattern: RegExp;
  // A line matching any exclusion never counts as a hit for this rule
  exclusions: RegExp[];
}

export const DEFAULT_WINDOW_LINES = 50;

export const REGULATION_RULES: RegulationRule[] = [
  {
    keyword: 'PPWD 94/62/EC',
    pattern: /94\/62\s*\/?\s*ec|packaging and packaging waste directive|packaging directive(?!\s+for)|ppwd/i,
    exclusions: []
  },
  {
    keyword: 'PPWD 94/62/1',
    pattern: /94\/62\/1/i,
    exclusions: []
  },
  {
    keyword: 'PPWR (EU) 2025/40',
    pattern: /2025\/40|packaging and packaging waste regulation|ppwr/i,
    exclusions: []
  },
  {
    keyword: 'Lead (Pb)',
    pattern: /\blead(?!\s+(to|time|in|by|through))\b(?![a-z])|\bpb\b(?!\s*-?\s*(rom|&j|ratio))/i,
    exclusions: [/lead\s+to/i]
  },
  {
    keyword: 'Cadmium (Cd)',
    pattern: /\bcadmium\b|\bcd\b(?=\s*(metal|ppm|\(|concentration|content|level))/i,
    exclusions: []
  },
  {
    keyword: 'Hexavalent Chromium (Cr6+)',
    pattern: /hexavalent chromium|cr\s*6\+?|cr\s*\(vi\)|chrome\s*6/i,
    exclusions: []
  }
];

function matchesRule(line: string, rule: RegulationRule): boolean {
  if (rule.exclusions.some(exclusion => exclusion.test(line))) {
    return false;
  }
  return rule.pattern.test(line);
}

/**
 * Finds the first line matching each rule and returns the surrounding window
 * of lines as evidence. At most one snippet per keyword.
 */
export function scanRegulatoryMentions(
  text: string,
  windowLines: number = DEFAULT_WINDOW_LINES,
  rules: RegulationRule[] = REGULATION_RULES
): ScannedMention[] {
  if (!text) {
    return [];
  }

  const window = Math.max(0, windowLines);
  const lines = text.split(/\r\n|\r|\n/);
  const seen = new Set<string>();
  const mentions: ScannedMention[] = [];

  for (const rule of rules) {
    const index = lines.findIndex(line => matchesRule(line, rule));
    if (index === -1) {
      continue;
    }

    const start = Math.max(0, index - window);
    const end = Math.min(lines.length, index + window + 1);
    const evidenceText = lines.slice(start, end).join('\n').trim();

    const key = `${rule.keyword}\u0000${evidenceText}`;
    if (seen.has(key)) {
      continue;
    }
    seen.add(key);
    mentions.push({ keyword: rule.keyword, evidenceText });
  }

  return mentions;
}
