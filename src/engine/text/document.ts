/**
 * Plain-text document model: pages are separated by form feeds, paragraphs
 * by blank lines.
 */

export const PAGE_SEPARATOR = "\f";
const PARAGRAPH_SEPARATOR = /\n[ \t]*\n+/;

export interface TextPage {
  /** 1-based page number. */
  number: number;
  paragraphs: string[];
}

export function splitParagraphs(pageText: string): string[] {
  return pageText
    .replace(/\r\n?/g, "\n")
    .split(PARAGRAPH_SEPARATOR)
    .map((paragraph) => paragraph.trim())
    .filter((paragraph) => paragraph !== "");
}

export function splitPages(text: string): TextPage[] {
  return text.split(PAGE_SEPARATOR).map((pageText, index) => ({
    number: index + 1,
    paragraphs: splitParagraphs(pageText),
  }));
}

/**
 * Split selected page numbers into consecutive parts of at most `size` pages.
 */
export function chunkPages(pages: number[], size: number | null): number[][] {
  if (pages.length === 0) {
    return [];
  }
  const partSize = size === null ? pages.length : size;
  const parts: number[][] = [];
  for (let offset = 0; offset < pages.length; offset += partSize) {
    parts.push(pages.slice(offset, offset + partSize));
  }
  return parts;
}
