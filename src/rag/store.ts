import type { Document } from 'mongodb';
import type { Chunk, ChunkCollection, ChunkDocument, ChunkMetadata, SearchOptions, SearchResult } from './types.js';

// Candidates the ANN search considers per result returned
const CANDIDATES_PER_RESULT = 20;

/**
 * Vector Store - Stores and retrieves chunks in a MongoDB Atlas collection
 *
 * Similarity search is delegated to the Atlas `$vectorSearch` stage; the index named
 * by `indexName` must exist in Atlas (see atlas-vector-index.json).
 */
export class MongoVectorStore {
  private getCollection: () => Promise<ChunkCollection>;
  private indexName: string;

  constructor(getCollection: () => Promise<ChunkCollection>, indexName: string) {
    this.getCollection = getCollection;
    this.indexName = indexName;
  }

  /**
   * Check whether any chunk of the given document URL is already stored
   */
  async hasSource(sourceUrl: string): Promise<boolean> {
    const collection = await this.getCollection();
    const count = await collection.countDocuments({ 'metadata.source_url': sourceUrl }, { limit: 1 });
    return count > 0;
  }

  /**
   * Store chunks with their embeddings
   */
  async addChunks(chunks: Chunk[], embeddings: number[][]): Promise<number> {
    if (chunks.length !== embeddings.length) {
      throw new Error(`Got ${embeddings.length} embeddings for ${chunks.length} chunks`);
    }
    if (chunks.length === 0) return 0;

    const now = new Date();
    const docs: ChunkDocument[] = chunks.map((chunk, i) => ({
      chunkId: chunk.id,
      text: chunk.content,
      embedding: embeddings[i],
      metadata: { ...chunk.metadata, chunk_index: chunk.chunkIndex },
      createdAt: now,
    }));

    const collection = await this.getCollection();
    await collection.insertMany(docs);
    return docs.length;
  }

  /**
   * Find the chunks closest to a query vector
   */
  async search(queryVector: number[], options: SearchOptions): Promise<SearchResult[]> {
    const collection = await this.getCollection();

    const vectorSearch: Document = {
      index: this.indexName,
      path: 'embedding',
      queryVector,
      numCandidates: options.topK * CANDIDATES_PER_RESULT,
      limit: options.topK,
    };
    if (options.sourceUrl) {
      vectorSearch.filter = { 'metadata.source_url': options.sourceUrl };
    }

    const rows = await collection
      .aggregate([
        { $vectorSearch: vectorSearch },
        {
          $project: {
            _id: 0,
            text: 1,
            metadata: 1,
            score: { $meta: 'vectorSearchScore' },
          },
        },
      ])
      .toArray();

    return rows.flatMap((row) => {
      const result = toSearchResult(row);
      return result ? [result] : [];
    });
  }
}

function toSearchResult(row: Document): SearchResult | null {
  const text: unknown = row.text;
  const metadata: unknown = row.metadata;
  const score: unknown = row.score;
  if (typeof text !== 'string' || !isChunkMetadata(metadata)) {
    return null;
  }
  return {
    content: text,
    metadata: {
      source_document: metadata.source_document,
      source_url: metadata.source_url,
      ...(typeof metadata.page === 'number' ? { page: metadata.page } : {}),
    },
    score: typeof score === 'number' ? score : 0,
  };
}

function isChunkMetadata(value: unknown): value is ChunkMetadata {
  if (!value || typeof value !== 'object') return false;
  return (
    'source_document' in value &&
    typeof value.source_document === 'string' &&
    'source_url' in value &&
    typeof value.source_url === 'string'
  );
}
