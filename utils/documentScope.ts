import { createHash } from 'crypto';

const SCOPE_HASH_LENGTH = 16;

/** Index scope for a document uploaded without a declared material id. */
export function contentScope(text: string): string {
  const digest = createHash('sha256').update(text, 'utf8').digest('hex');
  return `doc-${digest.substring(0, SCOPE_HASH_LENGTH)}`;
}

/** Vector-store key for a material: ids that differ only in case share one scope. */
export function indexScope(materialId: string): string {
  return materialId.trim().toLowerCase();
}
