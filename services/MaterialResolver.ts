import { ExtractionRecord, SkipRecord } from '../types';

export interface ResolvedRecords<R extends ExtractionRecord> {
  resolved: R[];
  skipped: SkipRecord[];
}

/**
 * Maps extracted material ids onto the BOM of one assessment run.
 */
export class MaterialResolver {
  private bomByLowerCase = new Map<string, string>();

  constructor(bomMaterialIds: string[]) {
    for (const raw of bomMaterialIds) {
      const id = raw.trim();
      if (id && !this.bomByLowerCase.has(id.toLowerCase())) {
        this.bomByLowerCase.set(id.toLowerCase(), id);
      }
    }
  }

  get bomMaterialIds(): string[] {
    return [...this.bomByLowerCase.values()];
  }

  /** BOM id for a candidate, or null when it cannot be placed. */
  resolveId(candidate: string): string | null {
    const exact = this.bomByLowerCase.get(candidate.trim().toLowerCase());
    if (exact) {
      return exact;
    }

    const bom = this.bomMaterialIds;
    if (bom.length === 1) {
      console.log(`[MaterialResolver] single_bom_fallback: '${candidate}' assigned to '${bom[0]}'`);
      return bom[0];
    }
    return null;
  }

  /**
   * Resolves every record of one source document. A document contributes at
   * most one record per material; later records for a claimed id are skipped.
   */
  resolveDocument<R extends ExtractionRecord>(records: R[], file: string, materialIdHint?: string): ResolvedRecords<R> {
    const claimed = new Set<string>();
    const resolved: R[] = [];
    const skipped: SkipRecord[] = [];

    for (const record of records) {
      const candidate = record.materialId.trim() || materialIdHint?.trim() || '';
      const materialId = this.resolveId(candidate);

      if (materialId === null) {
        console.warn(`[MaterialResolver] material_not_in_bom: '${candidate}' in ${file}`);
        skipped.push({ reason: 'material_not_in_bom', materialId: candidate, file });
        continue;
      }
      if (claimed.has(materialId)) {
        console.warn(`[MaterialResolver] duplicate_material_in_pdf: '${materialId}' in ${file}`);
        skipped.push({ reason: 'duplicate_material_in_pdf', materialId, file });
        continue;
      }

      claimed.add(materialId);
      resolved.push({ ...record, materialId });
    }

    return { resolved, skipped };
  }
}
