import { v4 as uuid } from 'uuid';
import type { Chunk, ChunkMetadata, ChunkingOptions } from './types.js';

const SEPARATORS = ['\n\n', '\n', ' ', ''];

export interface PageInput {
  content: string;
  page?: number;
}

/**
 * Document Chunker - Splits documents into overlapping chunks for RAG
 *
 * Text is split on the coarsest separator that occurs in it (paragraphs, then lines,
 * then words, then characters) and the pieces are merged back into chunks of at most
 * `chunkSize` characters. The tail of each chunk, up to `chunkOverlap` characters,
 * is repeated at the start of the next one.
 */
export class Chunker {
  private options: ChunkingOptions;

  constructor(options: Partial<ChunkingOptions> = {}) {
    this.options = {
      chunkSize: 1500,
      chunkOverlap: 200,
      ...options,
    };
    if (this.options.chunkOverlap >= this.options.chunkSize) {
      throw new Error(
        `Chunk overlap (${this.options.chunkOverlap}) must be smaller than chunk size (${this.options.chunkSize})`
      );
    }
  }

  /**
   * Split raw text into chunk strings
   */
  splitText(text: string): string[] {
    return this.split(text, SEPARATORS);
  }

  /**
   * Chunk every page of a document. Chunk indexes run across the whole document.
   */
  splitPages(
    pages: PageInput[],
    source: string,
    metadata: Omit<ChunkMetadata, 'page'>
  ): Chunk[] {
    const chunks: Chunk[] = [];

    for (const page of pages) {
      for (const content of this.splitText(page.content)) {
        chunks.push({
          id: uuid(),
          source,
          chunkIndex: chunks.length,
          content,
          metadata: page.page === undefined ? { ...metadata } : { ...metadata, page: page.page },
        });
      }
    }

    return chunks;
  }

  private split(text: string, separators: string[]): string[] {
    let separator = separators[separators.length - 1];
    let remaining: string[] = [];

    for (let i = 0; i < separators.length; i++) {
      const candidate = separators[i];
      if (candidate === '' || text.includes(candidate)) {
        separator = candidate;
        remaining = separators.slice(i + 1);
        break;
      }
    }

    const pieces = text.split(separator).filter((piece) => piece !== '');
    const output: string[] = [];
    let pending: string[] = [];

    for (const piece of pieces) {
      if (piece.length <= this.options.chunkSize) {
        pending.push(piece);
        continue;
      }

      if (pending.length > 0) {
        output.push(...this.merge(pending, separator));
        pending = [];
      }

      if (remaining.length === 0) {
        output.push(piece);
      } else {
        output.push(...this.split(piece, remaining));
      }
    }

    if (pending.length > 0) {
      output.push(...this.merge(pending, separator));
    }

    return output;
  }

  /**
   * Merge small pieces into chunks, keeping an overlapping tail between neighbours
   */
  private merge(pieces: string[], separator: string): string[] {
    const { chunkSize, chunkOverlap } = this.options;
    const chunks: string[] = [];
    const window: string[] = [];
    let total = 0;

    const separatorCost = () => (window.length > 0 ? separator.length : 0);

    for (const piece of pieces) {
      if (total + piece.length + separatorCost() > chunkSize && window.length > 0) {
        const chunk = window.join(separator).trim();
        if (chunk) {
          chunks.push(chunk);
        }

        // Drop pieces from the front until what is left fits as overlap
        while (
          window.length > 0 &&
          (total > chunkOverlap || total + piece.length + separatorCost() > chunkSize)
        ) {
          total -= window[0].length + (window.length > 1 ? separator.length : 0);
          window.shift();
        }
      }

      total += piece.length + separatorCost();
      window.push(piece);
    }

    const last = window.join(separator).trim();
    if (last) {
      chunks.push(last);
    }

    return chunks;
  }
}
