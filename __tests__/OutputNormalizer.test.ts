import {
  OutputNormalizer,
  coerceComplianceFlag,
  coerceMentions,
  coerceNumber,
  coerceTriState
} from '../services/OutputNormalizer';

describe('OutputNormalizer', () => {
  let normalizer: OutputNormalizer;

  beforeEach(() => {
    normalizer = new OutputNormalizer();
  });

  describe('coercion helpers', () => {
    it('should coerce affirmative and negative strings to booleans', () => {
      expect(['YES', '1', 'true', ' y '].map(coerceTriState)).toEqual([true, true, true, true]);
      expect(['no', '0', 'FALSE', 'n'].map(coerceTriState)).toEqual([false, false, false, false]);
    });

    it('should treat unrecognized mention values as unknown', () => {
      expect(coerceTriState('maybe')).toBeNull();
      expect(coerceTriState(undefined)).toBeNull();
      expect(coerceTriState(2)).toBe(true);
    });

    it('should read any other non-blank compliance string as false', () => {
      expect(coerceComplianceFlag('maybe')).toBe(false);
      expect(coerceComplianceFlag('Yes')).toBe(true);
      expect(coerceComplianceFlag('')).toBeNull();
      expect(coerceComplianceFlag(['yes'])).toBeNull();
    });

    it('should parse numbers and reject blanks', () => {
      expect(coerceNumber('30%')).toBe(30);
      expect(coerceNumber(' 12.5 ')).toBe(12.5);
      expect(coerceNumber('')).toBeNull();
      expect(coerceNumber('about thirty')).toBeNull();
      expect(coerceNumber(Number.NaN)).toBeNull();
    });
  });

  describe('coerceMentions', () => {
    it('should accept a JSON-encoded list and the evidence alias', () => {
      expect(coerceMentions('[{"keyword": "PPWR (EU) 2025/40", "evidence": "Complies with PPWR"}]')).toEqual([
        { keyword: 'PPWR (EU) 2025/40', evidenceText: 'Complies with PPWR', compliant: null }
      ]);
    });

    it('should canonicalize keyword casing', () => {
      expect(coerceMentions([{ keyword: 'lead (pb)', text: 'Pb < 100 ppm', compliant: 'yes' }])).toEqual([
        { keyword: 'Lead (Pb)', evidenceText: 'Pb < 100 ppm', compliant: true }
      ]);
    });

    it('should drop entries without keyword or evidence and collapse exact duplicates', () => {
      const mentions = coerceMentions([
        { compliant: true },
        { keyword: 'Cadmium (Cd)', text: 'Cd below 5 ppm', compliant: true },
        { keyword: 'CADMIUM (CD)', text: 'Cd below 5 ppm', compliant: false },
        42
      ]);

      expect(mentions).toEqual([{ keyword: 'Cadmium (Cd)', evidenceText: 'Cd below 5 ppm', compliant: true }]);
    });

    it('should split a plain string into evidence entries', () => {
      expect(coerceMentions('94/62/EC, lead')).toEqual([
        { keyword: '', evidenceText: '94/62/EC', compliant: null },
        { keyword: '', evidenceText: 'lead', compliant: null }
      ]);
    });
  });

  describe('normalize', () => {
    it('should map every model field into the record', () => {
      const record = normalizer.normalize({
        material_id: ' MAT-1 ',
        supplier_name: 'Acme Corp',
        declaration_date: '2024-03-01',
        ppwr_compliant: 'yes',
        packaging_recyclability: 'Recyclable',
        recycled_content_percent: '30%',
        restricted_substances: '',
        notes: '  ',
        regulatory_mentions: [{ keyword: 'PPWD 94/62/EC', text: 'Complies with 94/62/EC.', compliant: true }]
      });

      expect(record).toEqual({
        materialId: 'MAT-1',
        supplierName: 'Acme Corp',
        declarationDate: '2024-03-01',
        complianceFlag: true,
        recyclability: 'Recyclable',
        recycledContentPercent: 30,
        restrictedSubstances: [],
        notes: null,
        regulatoryMentions: [{ keyword: 'PPWD 94/62/EC', evidenceText: 'Complies with 94/62/EC.', compliant: true }]
      });
    });

    it('should default an empty response to a compliant record without a material id', () => {
      expect(normalizer.normalize({})).toEqual({
        materialId: '',
        supplierName: null,
        declarationDate: null,
        complianceFlag: true,
        recyclability: null,
        recycledContentPercent: null,
        restrictedSubstances: [],
        notes: null,
        regulatoryMentions: []
      });
    });

    it('should infer non-compliance from restricted substances', () => {
      const record = normalizer.normalize({ restricted_substances: 'Lead, Cadmium' });

      expect(record.restrictedSubstances).toEqual(['Lead', 'Cadmium']);
      expect(record.complianceFlag).toBe(false);
    });

    it('should override an explicit compliance claim and report the conflict', () => {
      const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
      const raw = { material_id: 'MAT-2', ppwr_compliant: true, restricted_substances: ['Lead'] };

      expect(normalizer.normalize(raw).complianceFlag).toBe(false);
      expect(normalizer.hasComplianceConflict(raw)).toBe(true);
      expect(normalizer.hasComplianceConflict({ ppwr_compliant: false, restricted_substances: ['Lead'] })).toBe(false);
      expect(warn).toHaveBeenCalledWith(
        "[OutputNormalizer] compliance_flag_override: material 'MAT-2' declared compliant but lists restricted substances (Lead)"
      );

      warn.mockRestore();
    });

    it('should be idempotent on an already-normalized record', () => {
      const once = normalizer.normalize({
        material_id: 'MAT-3',
        supplier_name: 'Example Packaging Ltd',
        ppwr_compliant: 'no',
        recycled_content_percent: 45,
        restricted_substances: ['Hexavalent chromium'],
        regulatory_mentions: [
          { keyword: 'hexavalent chromium (cr6+)', text: 'Cr(VI) 2 ppm', compliant: 'unclear' },
          { keyword: 'PPWR (EU) 2025/40', text: 'Meets PPWR', compliant: 'y' }
        ]
      });

      const twice = normalizer.normalize(JSON.parse(JSON.stringify(once)));
      expect(twice).toEqual(once);
    });
  });
});
