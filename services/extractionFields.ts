import { REGULATION_KEYWORDS } from '../types';

export type ExtractionFieldName =
  | 'material_id'
  | 'supplier_name'
  | 'compliance_flags'
  | 'notes'
  | 'regulatory_mentions';

export interface ExtractionField {
  name: ExtractionFieldName;
  query: string;
  instructions: string;
}

export const EXTRACTION_ROLE = 'You are a data extraction assistant specializing in packaging compliance declarations.';

const materialIdInstructions = `Extract the material identifier the declaration is about.

Rules:
- material_id is the same as part number, item number or product #. It may be alphanumeric with dashes or underscores.
- Copy the code exactly as printed in the document.
- If the declaration covers several materials, return one object per material.
- If no code is present, return material_id as "".

Return only JSON, one object per material:
{ "material_id": "MAT-00123" }`;

const supplierNameInstructions = `Extract the supplier (vendor) name.

Rules:
- supplier_name is the company issuing or signing the declaration: letterhead, signature block or document header.
- Include the full official name, even if it contains generic words.
- If no company name is found, return supplier_name as "Not specified".

Return only JSON:
{ "supplier_name": "Example Packaging Ltd" }`;

const complianceFlagInstructions = `Extract the packaging compliance fields.

Fields:
- declaration_date: date of the declaration, YYYY-MM-DD if possible.
- ppwr_compliant: true if the document states the material complies with the packaging regulations, false if it states non-compliance, omit if it says neither.
- packaging_recyclability: short description such as "Recyclable" or "Partially recyclable".
- recycled_content_percent: number between 0 and 100.
- restricted_substances: list of restricted substances the document says are PRESENT. Do not list substances that are declared absent or below limits.

Return only JSON:
{
  "declaration_date": "2024-03-01",
  "ppwr_compliant": true,
  "packaging_recyclability": "Recyclable",
  "recycled_content_percent": 30,
  "restricted_substances": []
}`;

const notesInstructions = `Summarize qualifiers, exemptions or conditions the supplier attaches to the declaration in one or two sentences.

Return only JSON:
{ "notes": "Valid for deliveries from the Lyon plant only." }`;

const regulatoryMentionInstructions = `Extract regulatory mentions whenever a target keyword appears. Match case-insensitively.

Targets (keyword -> match rule):
- "${REGULATION_KEYWORDS[0]}" -> "94/62/EC", "94/62 EC", "Packaging and Packaging Waste Directive", "Packaging Directive" or "PPWD".
- "${REGULATION_KEYWORDS[1]}" -> "94/62/1".
- "${REGULATION_KEYWORDS[2]}" -> "2025/40", "Packaging and Packaging Waste Regulation" or "PPWR".
- "${REGULATION_KEYWORDS[3]}" -> lead as a metal, or "Pb". Not the verb ("lead to", "lead time").
- "${REGULATION_KEYWORDS[4]}" -> "cadmium" or "Cd" as a metal.
- "${REGULATION_KEYWORDS[5]}" -> "hexavalent chromium", "Cr6+", "Cr(VI)".

Each mention is an object:
{ "keyword": one of the target keywords, "text": exact sentence containing the match, "compliant": true | false | null }
compliant is true when the sentence affirms compliance, absence or values below limits, false when it states exceedance or non-compliance, null when unclear.

Example
Text: "This declaration complies with Directive 94/62/EC. Heavy metals (Pb, Cd) are below limits."
Output:
{
  "regulatory_mentions": [
    {"keyword": "${REGULATION_KEYWORDS[0]}", "text": "This declaration complies with Directive 94/62/EC.", "compliant": true},
    {"keyword": "${REGULATION_KEYWORDS[3]}", "text": "Heavy metals (Pb, Cd) are below limits.", "compliant": true},
    {"keyword": "${REGULATION_KEYWORDS[4]}", "text": "Heavy metals (Pb, Cd) are below limits.", "compliant": true}
  ]
}

Do not reuse the example text. If no target occurs, return {"regulatory_mentions": []}. Never invent text.`;

export const EXTRACTION_FIELDS: ExtractionField[] = [
  {
    name: 'material_id',
    query: 'Extract the material_id (same as product # or part number) from the declaration.',
    instructions: materialIdInstructions
  },
  {
    name: 'supplier_name',
    query: 'Extract the supplier (vendor) name from the declaration.',
    instructions: supplierNameInstructions
  },
  {
    name: 'compliance_flags',
    query: 'Extract the declaration date, packaging compliance statement, recyclability, recycled content and restricted substances.',
    instructions: complianceFlagInstructions
  },
  {
    name: 'notes',
    query: 'Extract conditions, exemptions or qualifiers attached to the compliance declaration.',
    instructions: notesInstructions
  },
  {
    name: 'regulatory_mentions',
    query: 'Find statements about packaging directives, the packaging regulation and heavy metals lead, cadmium and hexavalent chromium.',
    instructions: regulatoryMentionInstructions
  }
];
