import { describe, it, expect, vi, beforeEach } from 'vitest';
import { DocumentLoader, detectFormat, htmlToText } from './loader.js';
import { DocumentDownloadError, DocumentProcessingError } from '../errors.js';

const { extractText, getDocumentProxy, extractRawText } = vi.hoisted(() => ({
  extractText: vi.fn(),
  getDocumentProxy: vi.fn(),
  extractRawText: vi.fn(),
}));

vi.mock('unpdf', () => ({ extractText, getDocumentProxy }));
vi.mock('mammoth', () => ({ default: { extractRawText } }));

const mockFetch = vi.fn<typeof fetch>();

function fileResponse(body: string, contentType?: string): Response {
  return new Response(body, { status: 200, headers: contentType ? { 'Content-Type': contentType } : {} });
}

describe('detectFormat', () => {
  it('should treat any URL mentioning .pdf as a PDF', () => {
    expect(detectFormat('https://blob.test/files/Policy.PDF?sv=2023&sig=abc')).toBe('pdf');
  });

  it('should use the path extension', () => {
    expect(detectFormat('https://files.test/handbook.docx')).toBe('docx');
    expect(detectFormat('https://files.test/readme.md?download=1')).toBe('text');
    expect(detectFormat('https://files.test/page.htm')).toBe('html');
  });

  it('should fall back to the content type', () => {
    expect(detectFormat('https://files.test/download/42', 'application/pdf')).toBe('pdf');
    expect(detectFormat('https://files.test/download/42', 'text/html; charset=utf-8')).toBe('html');
  });

  it('should default to DOCX', () => {
    expect(detectFormat('https://files.test/download/42', 'application/octet-stream')).toBe('docx');
    expect(detectFormat('https://files.test')).toBe('docx');
  });
});

describe('htmlToText', () => {
  it('should drop scripts, styles and tags', () => {
    const html = '<html><style>p{}</style><body><p>Hello</p><script>track()</script> world</body></html>';
    expect(htmlToText(html)).toBe('Hello world');
  });
});

describe('DocumentLoader', () => {
  beforeEach(() => {
    mockFetch.mockReset();
    extractText.mockReset();
    getDocumentProxy.mockReset();
    extractRawText.mockReset();
    vi.stubGlobal('fetch', mockFetch);
  });

  it('should extract PDF text page by page and drop empty pages', async () => {
    mockFetch.mockResolvedValueOnce(fileResponse('%PDF-1.7 fake', 'application/pdf'));
    getDocumentProxy.mockResolvedValueOnce({ numPages: 3 });
    extractText.mockResolvedValueOnce({ totalPages: 3, text: ['Page one', '  ', 'Page three'] });

    const doc = await new DocumentLoader().load('https://files.test/policy.pdf');

    expect(doc).toEqual({
      url: 'https://files.test/policy.pdf',
      format: 'pdf',
      pages: [
        { content: 'Page one', page: 1 },
        { content: 'Page three', page: 3 },
      ],
      byteLength: 13,
    });
    expect(extractText).toHaveBeenCalledWith({ numPages: 3 }, { mergePages: false });
  });

  it('should extract DOCX text with mammoth', async () => {
    mockFetch.mockResolvedValueOnce(fileResponse('PK fake docx'));
    extractRawText.mockResolvedValueOnce({ value: 'Employee handbook body', messages: [] });

    const doc = await new DocumentLoader().load('https://files.test/handbook.docx');

    expect(doc.format).toBe('docx');
    expect(doc.pages).toEqual([{ content: 'Employee handbook body' }]);
    expect(extractRawText).toHaveBeenCalledWith({ buffer: expect.any(Buffer) });
  });

  it('should read plain text served without an extension', async () => {
    mockFetch.mockResolvedValueOnce(fileResponse('Plain notes', 'text/plain; charset=utf-8'));

    const doc = await new DocumentLoader().load('https://files.test/notes');

    expect(doc.format).toBe('text');
    expect(doc.pages).toEqual([{ content: 'Plain notes' }]);
  });

  it('should pass a timeout signal to fetch', async () => {
    mockFetch.mockResolvedValueOnce(fileResponse('Plain notes', 'text/plain'));

    await new DocumentLoader({ timeoutMs: 1000 }).load('https://files.test/notes.txt');

    expect(mockFetch).toHaveBeenCalledWith('https://files.test/notes.txt', {
      signal: expect.any(AbortSignal),
    });
  });

  it('should report HTTP errors as download failures', async () => {
    mockFetch.mockResolvedValueOnce(new Response('', { status: 404, statusText: 'Not Found' }));

    const error = await new DocumentLoader().load('https://files.test/missing.pdf').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(DocumentDownloadError);
    expect(error instanceof DocumentDownloadError && error.detail).toBe(
      'Failed to download document: HTTP 404 Not Found'
    );
  });

  it('should report network errors as download failures', async () => {
    mockFetch.mockRejectedValueOnce(new TypeError('fetch failed'));

    await expect(new DocumentLoader().load('https://unreachable.test/a.pdf')).rejects.toThrow(
      'Failed to download document: fetch failed'
    );
  });

  it('should reject documents over the size limit', async () => {
    mockFetch.mockResolvedValueOnce(fileResponse('too long body', 'text/plain'));

    await expect(new DocumentLoader({ maxBytes: 4 }).load('https://files.test/big.txt')).rejects.toThrow(
      'Failed to download document: document is larger than 4 bytes'
    );
  });

  it('should stop reading an undeclared body once it passes the size limit', async () => {
    const chunk = new Uint8Array(1024);
    let pulled = 0;
    let cancelled = false;
    const body = new ReadableStream<Uint8Array>({
      pull(controller) {
        pulled++;
        if (pulled > 64) controller.close();
        else controller.enqueue(chunk);
      },
      cancel() {
        cancelled = true;
      },
    });
    mockFetch.mockResolvedValueOnce(new Response(body, { status: 200, headers: { 'Content-Type': 'text/plain' } }));

    await expect(new DocumentLoader({ maxBytes: 2048 }).load('https://files.test/stream.txt')).rejects.toThrow(
      'Failed to download document: document is larger than 2048 bytes'
    );
    expect(cancelled).toBe(true);
    expect(pulled).toBeLessThan(8);
  });

  it('should reject a declared length over the size limit before reading the body', async () => {
    mockFetch.mockResolvedValueOnce(
      new Response('x', { status: 200, headers: { 'Content-Length': '999', 'Content-Type': 'text/plain' } })
    );

    await expect(new DocumentLoader({ maxBytes: 10 }).load('https://files.test/big.txt')).rejects.toThrow(
      'Failed to download document: document is 999 bytes, limit is 10'
    );
  });

  it('should reject documents without text', async () => {
    mockFetch.mockResolvedValueOnce(fileResponse('   \n  ', 'text/plain'));

    const error = await new DocumentLoader().load('https://files.test/blank.txt').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(DocumentProcessingError);
    expect(error instanceof DocumentProcessingError && error.reason).toBe('document contains no extractable text');
  });

  it('should wrap parser failures', async () => {
    mockFetch.mockResolvedValueOnce(fileResponse('not a pdf', 'application/pdf'));
    getDocumentProxy.mockRejectedValueOnce(new Error('Invalid PDF structure'));

    const error = await new DocumentLoader().load('https://files.test/broken.pdf').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(DocumentProcessingError);
    expect(error instanceof DocumentProcessingError && error.reason).toBe('failed to parse pdf: Invalid PDF structure');
    expect(error instanceof DocumentProcessingError && error.detail).toBe('Document could not be processed.');
  });
});
