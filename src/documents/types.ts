/**
 * Document Loading Types
 */

/**
 * Formats the loader can turn into text.
 */
export type DocumentFormat = 'pdf' | 'docx' | 'text' | 'html';

/**
 * A unit of extracted text: one PDF page, or the whole document for other formats.
 */
export interface LoadedPage {
  content: string;
  /** 1-based page number, PDFs only */
  page?: number;
}

export interface LoadedDocument {
  url: string;
  format: DocumentFormat;
  pages: LoadedPage[];
  /** Size of the downloaded file in bytes */
  byteLength: number;
}

export interface DocumentLoaderOptions {
  /** Abort the download after this many milliseconds */
  timeoutMs: number;
  /** Reject documents larger than this */
  maxBytes: number;
}
