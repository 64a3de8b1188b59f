import pdfParse from 'pdf-parse';
import mammoth from 'mammoth';
import { ExtractedText, TextExtractor } from '../types';

const DOCX_MIMETYPE = 'application/vnd.openxmlformats-officedocument.wordprocessingml.document';

const WORDS_PER_PAGE = 500;

export class TextExtractionService implements TextExtractor {
  /**
   * Text of an uploaded declaration. Unreadable PDFs come back empty rather
   * than throwing; unsupported file types throw.
   */
  async extractText(buffer: Buffer, mimetype: string, filename: string): Promise<ExtractedText> {
    const lowerName = filename.toLowerCase();

    if (mimetype === 'application/pdf' || lowerName.endsWith('.pdf')) {
      return this.extractFromPDF(buffer, filename);
    }
    // mammoth reads DOCX only; legacy .doc falls through to the unsupported branch
    if (mimetype === DOCX_MIMETYPE || lowerName.endsWith('.docx')) {
      return this.extractFromDOCX(buffer);
    }
    if (mimetype === 'text/plain' || lowerName.endsWith('.txt')) {
      return this.extractFromText(buffer);
    }
    throw new Error(`Unsupported file type: ${mimetype || filename}`);
  }

  private async extractFromPDF(buffer: Buffer, filename: string): Promise<ExtractedText> {
    try {
      const data = await pdfParse(buffer);
      return {
        text: data.text,
        pages: data.numpages
      };
    } catch (error) {
      console.error(`[TextExtraction] Could not read PDF ${filename}: ${error instanceof Error ? error.message : 'Unknown error'}`);
      return { text: '', pages: 0 };
    }
  }

  private async extractFromDOCX(buffer: Buffer): Promise<ExtractedText> {
    try {
      const result = await mammoth.extractRawText({ buffer });
      return {
        text: result.value,
        pages: this.estimatePages(result.value)
      };
    } catch (error) {
      throw new Error(`Failed to extract text from DOCX: ${error instanceof Error ? error.message : 'Unknown error'}`);
    }
  }

  private async extractFromText(buffer: Buffer): Promise<ExtractedText> {
    const text = buffer.toString('utf-8');
    return {
      text,
      pages: this.estimatePages(text)
    };
  }

  private estimatePages(text: string): number {
    const wordCount = text.split(/\s+/).filter(word => word.length > 0).length;
    return Math.max(1, Math.ceil(wordCount / WORDS_PER_PAGE));
  }
}
