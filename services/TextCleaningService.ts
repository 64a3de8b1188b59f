export class TextCleaningService {
  /** Layout noise removal ahead of chunking. Content lines are left intact. */
  cleanText(text: string): string {
    let cleaned = text;

    cleaned = cleaned.replace(/\r\n/g, '\n');
    cleaned = cleaned.replace(/\r/g, '\n');
    cleaned = cleaned.replace(/[ \t]+/g, ' ');
    cleaned = cleaned.replace(/^ +| +$/gm, '');

    // page numbering
    cleaned = cleaned.replace(/^Page\s+\d+\s+of\s+\d+$/gim, '');
    cleaned = cleaned.replace(/^\d+\s*\/\s*\d+$/gm, '');
    cleaned = cleaned.replace(/^-\s*\d+\s*-$/gm, '');

    cleaned = cleaned.replace(/\n{3,}/g, '\n\n');
    return cleaned.trim();
  }
}
