/**
 * Text extraction
 *
 * Turns raw file bytes into ordered pages. Only plain text and markdown are
 * handled in-process; image formats need OCR, which this service does not
 * bundle.
 *
 * FAIL-FAST: extraction errors are per document and never retried.
 *
 * @module services/extraction/extractor
 */

import * as fs from 'fs';
import * as path from 'path';
import { DocumentPage, TEXT_FILE_TYPES, TextFileType } from '../../models/document.js';

export type ExtractionFailure = 'unsupported_format' | 'corrupt_file' | 'ocr_unavailable';

export class ExtractionError extends Error {
  constructor(
    message: string,
    public readonly reason: ExtractionFailure,
    public readonly fileType: string
  ) {
    super(message);
    this.name = 'ExtractionError';
    Error.captureStackTrace?.(this, ExtractionError);
  }
}

export interface ExtractedFile {
  source_name: string;
  file_type: string;
  pages: DocumentPage[];
}

export interface Extractor {
  extract(bytes: Buffer, fileType: string): DocumentPage[];
}

const IMAGE_FILE_TYPES = new Set(['png', 'jpg', 'jpeg', 'tif', 'tiff', 'bmp', 'gif', 'webp']);

/** Page length when the text carries no form feeds */
export const DEFAULT_PAGE_CHARS = 3000;

function isTextFileType(fileType: string): fileType is TextFileType {
  return TEXT_FILE_TYPES.some((t) => t === fileType);
}

/**
 * Split text into pages of at most `pageChars` characters, cutting at the
 * last line break inside each window when there is one.
 */
export function paginate(text: string, pageChars: number = DEFAULT_PAGE_CHARS): string[] {
  if (text.includes('\f')) {
    return text.split('\f');
  }
  const pages: string[] = [];
  let start = 0;
  while (text.length - start > pageChars) {
    const window = text.slice(start, start + pageChars);
    const lineBreak = window.lastIndexOf('\n');
    const cut = lineBreak > 0 ? start + lineBreak + 1 : start + pageChars;
    pages.push(text.slice(start, cut));
    start = cut;
  }
  pages.push(text.slice(start));
  return pages;
}

export class PlainTextExtractor implements Extractor {
  constructor(private readonly pageChars: number = DEFAULT_PAGE_CHARS) {}

  extract(bytes: Buffer, fileType: string): DocumentPage[] {
    const type = fileType.toLowerCase().replace(/^\./, '');
    if (IMAGE_FILE_TYPES.has(type)) {
      throw new ExtractionError(`OCR is required for .${type} files and is not available`, 'ocr_unavailable', type);
    }
    if (!isTextFileType(type)) {
      throw new ExtractionError(`Unsupported file type: .${type}`, 'unsupported_format', type);
    }

    let text: string;
    try {
      text = new TextDecoder('utf-8', { fatal: true }).decode(bytes);
    } catch (error) {
      throw new ExtractionError(
        `File is not valid UTF-8: ${error instanceof Error ? error.message : String(error)}`,
        'corrupt_file',
        type
      );
    }

    return paginate(text.replace(/^\uFEFF/, ''), this.pageChars).map((raw_text, i) => ({
      page_number: i + 1,
      raw_text,
    }));
  }

  /**
   * @throws ExtractionError corrupt_file when the file cannot be read
   */
  extractFile(filePath: string): ExtractedFile {
    const fileType = path.extname(filePath).slice(1).toLowerCase();
    let bytes: Buffer;
    try {
      bytes = fs.readFileSync(filePath);
    } catch (error) {
      throw new ExtractionError(
        `Cannot read ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
        'corrupt_file',
        fileType
      );
    }
    return { source_name: path.basename(filePath), file_type: fileType, pages: this.extract(bytes, fileType) };
  }
}
