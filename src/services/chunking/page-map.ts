/**
 * Joins a document's pages into one text and maps offsets back to pages.
 *
 * @module services/chunking/page-map
 */

import { DocumentPage, PageOffset, PAGE_SEPARATOR } from '../../models/document.js';

export interface JoinedText {
  text: string;
  pageOffsets: PageOffset[];
}

/**
 * Pages are joined in page_number order with PAGE_SEPARATOR between them.
 * Each page's span excludes the separator.
 */
export function joinPages(pages: DocumentPage[]): JoinedText {
  const ordered = [...pages].sort((a, b) => a.page_number - b.page_number);
  const pageOffsets: PageOffset[] = [];
  const parts: string[] = [];
  let cursor = 0;

  ordered.forEach((page, i) => {
    if (i > 0) {
      parts.push(PAGE_SEPARATOR);
      cursor += PAGE_SEPARATOR.length;
    }
    pageOffsets.push({
      page: page.page_number,
      charStart: cursor,
      charEnd: cursor + page.raw_text.length,
    });
    parts.push(page.raw_text);
    cursor += page.raw_text.length;
  });

  return { text: parts.join(''), pageOffsets };
}

/**
 * Page containing charOffset: the last page starting at or before it.
 * Offsets inside a separator belong to the page before it.
 * Returns null when there are no pages.
 */
export function pageForOffset(charOffset: number, pageOffsets: PageOffset[]): number | null {
  if (pageOffsets.length === 0) {
    return null;
  }
  if (charOffset < pageOffsets[0].charStart) {
    return pageOffsets[0].page;
  }

  let low = 0;
  let high = pageOffsets.length - 1;
  let found = 0;
  while (low <= high) {
    const mid = Math.floor((low + high) / 2);
    if (pageOffsets[mid].charStart <= charOffset) {
      found = mid;
      low = mid + 1;
    } else {
      high = mid - 1;
    }
  }
  return pageOffsets[found].page;
}
