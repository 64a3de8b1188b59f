import { ScannedMention } from '../types';

export const NO_CONTEXT_SENTINEL = 'No relevant documents found in the knowledge base for this query.';

export interface FieldPromptParams {
  role: string;
  field: string;
  query: string;
  instructions: string;
  chunkTexts: string[];
}

export class PromptBuilder {
  buildContext(chunkTexts: string[]): string {
    const context = chunkTexts
      .map(text => text.trim())
      .filter(text => text.length > 0)
      .join('\n\n');
    return context.length > 0 ? context : NO_CONTEXT_SENTINEL;
  }

  /**
   * One self-contained prompt per field. Only the chunks retrieved for this
   * field are included, so concurrent fields never share context.
   */
  buildFieldPrompt(params: FieldPromptParams): string {
    const context = this.buildContext(params.chunkTexts);

    return `${params.role}

Please analyze the following document content and extract the requested information.

Document Content:
${context}

Task: Extract ${params.field} information
Query: ${params.query}

Instructions:
${params.instructions}

Please focus on extracting the ${params.field} data from the document above.`;
  }

  buildMentionAssessmentPrompt(snippets: ScannedMention[]): string {
    const items = snippets.map(snippet => ({
      keyword: snippet.keyword,
      text_window: snippet.evidenceText
    }));

    return `You are checking packaging regulatory compliance. For each item, decide if the text explicitly states compliance, no intentional addition, or values below limits for the cited keyword.

- compliant=true if it affirms compliance, absence or below-limit values.
- compliant=false if it states non-compliance or exceedance.
- compliant=null if unclear.

Always return the quoted evidence used, as objects {"keyword": ..., "evidence": ..., "compliant": ...}.
Return a JSON list only.

Items:
${JSON.stringify(items)}`;
  }
}
