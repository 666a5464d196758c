/**
 * RAG (Retrieval-Augmented Generation) Types
 */

import type { CountDocumentsOptions, Document, Filter } from 'mongodb';

export interface Chunk {
  id: string;
  source: string;
  chunkIndex: number;
  content: string;
  metadata: ChunkMetadata;
}

export interface ChunkMetadata {
  source_document: string;
  source_url: string;
  page?: number;
}

export interface ChunkingOptions {
  chunkSize: number; // characters
  chunkOverlap: number; // characters carried over into the next chunk
}

/**
 * Gemini embedding task types. Stored chunks and questions are embedded
 * with different task types so the vectors are tuned for retrieval.
 */
export type EmbeddingTaskType = 'RETRIEVAL_DOCUMENT' | 'RETRIEVAL_QUERY';

export interface EmbeddingProvider {
  embed(text: string, taskType?: EmbeddingTaskType): Promise<number[]>;
  embedBatch(texts: string[], taskType?: EmbeddingTaskType): Promise<number[][]>;
  getDimensions(): number;
}

export interface SearchResult {
  content: string;
  metadata: ChunkMetadata;
  score: number;
}

export interface SearchOptions {
  topK: number;
  sourceUrl?: string;
}

/**
 * A chunk as stored in the Atlas collection.
 * The vector index covers `embedding` and filters on `metadata.source_url`.
 */
export interface ChunkDocument {
  chunkId: string;
  text: string;
  embedding: number[];
  metadata: ChunkMetadata & { chunk_index: number };
  createdAt: Date;
}

/**
 * The slice of the driver's Collection the vector store uses.
 */
export interface ChunkCollection {
  countDocuments(filter: Filter<ChunkDocument>, options?: CountDocumentsOptions): Promise<number>;
  insertMany(docs: ChunkDocument[]): Promise<unknown>;
  aggregate(pipeline: Document[]): { toArray(): Promise<Document[]> };
}

export type IndexStatus = 'existing' | 'indexed';

export interface IndexResult {
  sourceUrl: string;
  status: IndexStatus;
  chunkCount: number;
}
