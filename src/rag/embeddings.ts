import type { EmbeddingProvider, EmbeddingTaskType } from './types.js';
import { LLMError } from '../errors.js';

// batchEmbedContents accepts at most 100 requests per call
const MAX_BATCH_SIZE = 100;

interface EmbedContentRequest {
  model: string;
  content: { parts: Array<{ text: string }> };
  taskType?: EmbeddingTaskType;
  outputDimensionality: number;
}

/**
 * Gemini embedding provider
 */
export class GoogleEmbeddingProvider implements EmbeddingProvider {
  private apiKey: string;
  private model: string;
  private dimensions: number;
  private baseUrl = 'https://generativelanguage.googleapis.com/v1beta';

  constructor(apiKey: string, model: string = 'gemini-embedding-001', dimensions: number = 768) {
    this.apiKey = apiKey;
    this.model = model.startsWith('models/') ? model : `models/${model}`;
    this.dimensions = dimensions;
  }

  async embed(text: string, taskType?: EmbeddingTaskType): Promise<number[]> {
    const data = await this.post<{ embedding?: { values?: number[] } }>(
      'embedContent',
      this.buildRequest(text, taskType)
    );

    const values = data.embedding?.values;
    if (!values || values.length === 0) {
      throw new LLMError('Gemini embedding API returned no embedding');
    }
    return values;
  }

  async embedBatch(texts: string[], taskType?: EmbeddingTaskType): Promise<number[][]> {
    const vectors: number[][] = [];

    for (let i = 0; i < texts.length; i += MAX_BATCH_SIZE) {
      const batch = texts.slice(i, i + MAX_BATCH_SIZE);
      const data = await this.post<{ embeddings?: Array<{ values?: number[] }> }>('batchEmbedContents', {
        requests: batch.map((text) => this.buildRequest(text, taskType)),
      });

      const embeddings = data.embeddings ?? [];
      if (embeddings.length !== batch.length) {
        throw new LLMError(
          `Gemini embedding API returned ${embeddings.length} embeddings for ${batch.length} texts`
        );
      }
      for (const [j, embedding] of embeddings.entries()) {
        if (!embedding.values || embedding.values.length === 0) {
          throw new LLMError(`Gemini embedding API returned no embedding for text ${i + j}`);
        }
        vectors.push(embedding.values);
      }
    }

    return vectors;
  }

  getDimensions(): number {
    return this.dimensions;
  }

  private buildRequest(text: string, taskType?: EmbeddingTaskType): EmbedContentRequest {
    return {
      model: this.model,
      content: { parts: [{ text }] },
      taskType,
      outputDimensionality: this.dimensions,
    };
  }

  private async post<T>(method: string, body: unknown): Promise<T> {
    const url = `${this.baseUrl}/${this.model}:${method}?key=${this.apiKey}`;

    const response = await fetch(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
    });

    if (!response.ok) {
      const error = await response.text();
      throw new LLMError(`Gemini embedding API error: ${response.status} ${error}`, response.status);
    }

    return (await response.json()) as T;
  }
}
