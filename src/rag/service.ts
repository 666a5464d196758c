import type { Chunk, EmbeddingProvider, IndexResult, SearchResult } from './types.js';
import type { Chunker } from './chunker.js';
import type { MongoVectorStore } from './store.js';
import type { LoadedDocument } from '../documents/index.js';
import { DocumentProcessingError, LLMError } from '../errors.js';

export interface DocumentSource {
  load(url: string): Promise<LoadedDocument>;
}

export interface DocumentIndexServiceConfig {
  loader: DocumentSource;
  chunker: Chunker;
  embeddingProvider: EmbeddingProvider;
  store: MongoVectorStore;
}

/**
 * Document Index Service - Orchestrates loading, chunking, embedding, storage, and retrieval
 *
 * A document URL is indexed once. Later requests for the same URL reuse the stored chunks.
 */
export class DocumentIndexService {
  private loader: DocumentSource;
  private chunker: Chunker;
  private embeddingProvider: EmbeddingProvider;
  private store: MongoVectorStore;
  private inFlight = new Map<string, Promise<IndexResult>>();

  constructor(config: DocumentIndexServiceConfig) {
    this.loader = config.loader;
    this.chunker = config.chunker;
    this.embeddingProvider = config.embeddingProvider;
    this.store = config.store;
  }

  /**
   * Make sure the document behind `url` is in the vector store.
   * Concurrent calls for the same URL share a single indexing run.
   */
  async ensureIndexed(url: string): Promise<IndexResult> {
    const pending = this.inFlight.get(url);
    if (pending) {
      console.log(`[Index] Waiting for in-progress indexing of ${url}`);
      return pending;
    }

    const run = this.indexIfMissing(url).finally(() => {
      this.inFlight.delete(url);
    });
    this.inFlight.set(url, run);
    return run;
  }

  isIndexing(url: string): boolean {
    return this.inFlight.has(url);
  }

  /**
   * Retrieve the chunks relevant to any of the questions, de-duplicated by text
   * and kept in first-seen order.
   */
  async retrieve(url: string, questions: string[], topK: number): Promise<SearchResult[]> {
    const perQuestion = await Promise.all(
      questions.map(async (question) => {
        const vector = await this.embeddingProvider.embed(question, 'RETRIEVAL_QUERY');
        return this.store.search(vector, { topK, sourceUrl: url });
      })
    );

    const unique = new Map<string, SearchResult>();
    for (const results of perQuestion) {
      for (const result of results) {
        if (!unique.has(result.content)) {
          unique.set(result.content, result);
        }
      }
    }
    return [...unique.values()];
  }

  private async indexIfMissing(url: string): Promise<IndexResult> {
    if (await this.store.hasSource(url)) {
      console.log(`[Index] Document already stored, reusing existing chunks: ${url}`);
      return { sourceUrl: url, status: 'existing', chunkCount: 0 };
    }

    console.log(`[Index] Document not found in store. Processing and storing: ${url}`);
    const chunks = await this.loadChunks(url);

    const startTime = Date.now();
    const embeddings = await this.embeddingProvider.embedBatch(
      chunks.map((chunk) => chunk.content),
      'RETRIEVAL_DOCUMENT'
    );
    const dimensions = this.embeddingProvider.getDimensions();
    const wrongSize = embeddings.findIndex((vector) => vector.length !== dimensions);
    if (wrongSize !== -1) {
      throw new LLMError(
        `Embedding for chunk ${wrongSize} has ${embeddings[wrongSize].length} dimensions, the vector index expects ${dimensions}`
      );
    }

    const stored = await this.store.addChunks(chunks, embeddings);
    console.log(`[Index] Stored ${stored} chunks for ${url} (${Date.now() - startTime}ms)`);

    return { sourceUrl: url, status: 'indexed', chunkCount: stored };
  }

  private async loadChunks(url: string): Promise<Chunk[]> {
    const document = await this.loader.load(url);
    const chunks = this.chunker.splitPages(document.pages, url, {
      source_document: sourceDocumentName(url),
      source_url: url,
    });

    if (chunks.length === 0) {
      throw new DocumentProcessingError('no text chunks could be extracted');
    }
    return chunks;
  }
}

/**
 * File name of a document URL: last path segment, without query string or fragment.
 */
export function sourceDocumentName(url: string): string {
  const path = url.split(/[?#]/)[0];
  const segments = path.split('/').filter((segment) => segment.length > 0);
  const last = segments[segments.length - 1] ?? path;
  try {
    return decodeURIComponent(last);
  } catch {
    return last;
  }
}
