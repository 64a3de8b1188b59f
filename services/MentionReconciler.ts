import { Mention, ScannedMention } from '../types';

const EVIDENCE_KEY_LENGTH = 50;

function mentionKey(mention: Pick<Mention, 'keyword' | 'evidenceText'>): string {
  return `${mention.keyword.toLowerCase()}\u0000${mention.evidenceText.slice(0, EVIDENCE_KEY_LENGTH)}`;
}

/**
 * Merges what the model reported with what the line scanner found. Model
 * mentions come first and win on duplicates; scanner snippets carry an
 * unknown compliance status.
 */
export function reconcileMentions(
  extractedMentions: Mention[],
  assessedMentions: Mention[],
  scannedMentions: ScannedMention[]
): Mention[] {
  const modelMentions = [...extractedMentions, ...assessedMentions];
  const deterministic: Mention[] = scannedMentions.map(snippet => ({
    keyword: snippet.keyword,
    evidenceText: snippet.evidenceText,
    compliant: null
  }));

  if (modelMentions.length === 0) {
    if (deterministic.length > 0) {
      console.log(`[MentionReconciler] deterministic_mention_fallback: using ${deterministic.length} scanned snippet(s)`);
    }
    return deterministic;
  }

  const seen = new Set<string>();
  const merged: Mention[] = [];
  for (const mention of [...modelMentions, ...deterministic]) {
    const key = mentionKey(mention);
    if (seen.has(key)) continue;
    seen.add(key);
    merged.push(mention);
  }
  return merged;
}
