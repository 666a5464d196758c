/**
 * Document Loader
 * Downloads a document by URL and extracts its text (PDF, DOCX, plain text, markdown, HTML).
 */

import type { DocumentFormat, DocumentLoaderOptions, LoadedDocument, LoadedPage } from './types.js';
import { DocumentDownloadError, DocumentProcessingError, errorMessage } from '../errors.js';

const DOCX_MIME = 'application/vnd.openxmlformats-officedocument.wordprocessingml.document';

/**
 * File extensions and MIME types mapped to the parser that handles them.
 */
const EXTENSION_FORMATS: Record<string, DocumentFormat> = {
  '.pdf': 'pdf',
  '.docx': 'docx',
  '.txt': 'text',
  '.md': 'text',
  '.markdown': 'text',
  '.html': 'html',
  '.htm': 'html',
};

const MIME_FORMATS: Record<string, DocumentFormat> = {
  'application/pdf': 'pdf',
  [DOCX_MIME]: 'docx',
  'text/plain': 'text',
  'text/markdown': 'text',
  'text/html': 'html',
};

const DEFAULT_LOADER_OPTIONS: DocumentLoaderOptions = {
  timeoutMs: 60_000,
  maxBytes: 50 * 1024 * 1024,
};

/**
 * Work out how to parse a document.
 *
 * A URL mentioning `.pdf` anywhere is a PDF (signed storage URLs often carry the
 * file name before a long query string). Then the path extension decides, then the
 * response Content-Type. Anything unrecognised is parsed as DOCX.
 */
export function detectFormat(url: string, contentType?: string | null): DocumentFormat {
  if (url.toLowerCase().includes('.pdf')) {
    return 'pdf';
  }

  const path = url.split(/[?#]/)[0].toLowerCase();
  const dot = path.lastIndexOf('.');
  if (dot > path.lastIndexOf('/')) {
    const byExtension = EXTENSION_FORMATS[path.slice(dot)];
    if (byExtension) return byExtension;
  }

  const mime = contentType?.split(';')[0].trim().toLowerCase();
  if (mime && MIME_FORMATS[mime]) {
    return MIME_FORMATS[mime];
  }

  return 'docx';
}

/**
 * Strip tags, scripts and styles from HTML.
 */
export function htmlToText(html: string): string {
  return html
    .replace(/<script[^>]*>[\s\S]*?<\/script>/gi, '')
    .replace(/<style[^>]*>[\s\S]*?<\/style>/gi, '')
    .replace(/<[^>]+>/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

async function parsePdf(buffer: Buffer): Promise<LoadedPage[]> {
  const { extractText, getDocumentProxy } = await import('unpdf');

  const pdf = await getDocumentProxy(new Uint8Array(buffer));
  const { text } = await extractText(pdf, { mergePages: false });

  return text.map((content, index) => ({ content, page: index + 1 }));
}

async function parseDocx(buffer: Buffer): Promise<LoadedPage[]> {
  const { default: mammoth } = await import('mammoth');

  const result = await mammoth.extractRawText({ buffer });
  return [{ content: result.value }];
}

export class DocumentLoader {
  private options: DocumentLoaderOptions;

  constructor(options: Partial<DocumentLoaderOptions> = {}) {
    this.options = { ...DEFAULT_LOADER_OPTIONS, ...options };
  }

  /**
   * Download a document and return its text, page by page where the format has pages.
   */
  async load(url: string): Promise<LoadedDocument> {
    const { buffer, contentType } = await this.download(url);
    const format = detectFormat(url, contentType);
    console.log(`[Loader] Downloaded ${buffer.byteLength} bytes from ${url} (${format})`);

    let pages: LoadedPage[];
    try {
      pages = await this.parse(format, buffer);
    } catch (error) {
      console.error(`[Loader] Failed to parse ${format} document ${url}:`, error);
      throw new DocumentProcessingError(`failed to parse ${format}: ${errorMessage(error)}`, { cause: error });
    }

    const nonEmpty = pages.filter((page) => page.content.trim().length > 0);
    if (nonEmpty.length === 0) {
      throw new DocumentProcessingError('document contains no extractable text');
    }

    return { url, format, pages: nonEmpty, byteLength: buffer.byteLength };
  }

  private async parse(format: DocumentFormat, buffer: Buffer): Promise<LoadedPage[]> {
    switch (format) {
      case 'pdf':
        return parsePdf(buffer);
      case 'docx':
        return parseDocx(buffer);
      case 'html':
        return [{ content: htmlToText(buffer.toString('utf-8')) }];
      case 'text':
        return [{ content: buffer.toString('utf-8') }];
    }
  }

  private async download(url: string): Promise<{ buffer: Buffer; contentType: string | null }> {
    let response: Response;
    try {
      response = await fetch(url, { signal: AbortSignal.timeout(this.options.timeoutMs) });
    } catch (error) {
      console.error(`[Loader] Failed to download document from ${url}:`, error);
      throw new DocumentDownloadError(errorMessage(error), { cause: error });
    }

    if (!response.ok) {
      console.error(`[Loader] Download of ${url} failed with HTTP ${response.status}`);
      throw new DocumentDownloadError(`HTTP ${response.status} ${response.statusText}`.trim());
    }

    const declaredLength = Number(response.headers.get('content-length'));
    if (declaredLength > this.options.maxBytes) {
      throw new DocumentDownloadError(
        `document is ${declaredLength} bytes, limit is ${this.options.maxBytes}`
      );
    }

    const buffer = await this.readBody(response);
    return { buffer, contentType: response.headers.get('content-type') };
  }

  /**
   * Read the body chunk by chunk, stopping as soon as it passes the size limit.
   */
  private async readBody(response: Response): Promise<Buffer> {
    if (!response.body) return Buffer.alloc(0);

    const reader = response.body.getReader();
    const chunks: Uint8Array[] = [];
    let received = 0;

    try {
      for (;;) {
        const { done, value } = await reader.read();
        if (done) break;

        received += value.byteLength;
        if (received > this.options.maxBytes) {
          await reader.cancel();
          throw new DocumentDownloadError(
            `document is larger than ${this.options.maxBytes} bytes`
          );
        }
        chunks.push(value);
      }
    } catch (error) {
      if (error instanceof DocumentDownloadError) throw error;
      throw new DocumentDownloadError(errorMessage(error), { cause: error });
    } finally {
      reader.releaseLock();
    }

    return Buffer.concat(chunks, received);
  }
}
