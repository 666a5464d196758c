/**
 * Service configuration loaded from environment variables.
 *
 * Required:
 * - API_BEARER_TOKEN: shared secret callers send as `Authorization: Bearer <token>`
 * - GOOGLE_API_KEY: Gemini API key (generation and embeddings)
 * - MONGO_HOST, MONGO_USER, MONGO_PASS: Atlas cluster host and credentials
 *
 * Everything else has a default, see `configSchema`.
 */

import { z } from 'zod';
import { ConfigError } from '../errors.js';

const requiredString = (name: string) =>
  z.string({ required_error: `${name} is not set.` }).trim().min(1, `${name} is not set.`);

const configSchema = z
  .object({
    PORT: z.coerce.number().int().min(0).max(65535).default(8000),
    API_BEARER_TOKEN: requiredString('API_BEARER_TOKEN'),
    GOOGLE_API_KEY: requiredString('GOOGLE_API_KEY'),
    MONGO_HOST: requiredString('MONGO_HOST'),
    MONGO_USER: requiredString('MONGO_USER'),
    MONGO_PASS: requiredString('MONGO_PASS'),
    MONGO_DB_NAME: z.string().min(1).default('langchain_db'),
    MONGO_COLLECTION: z.string().min(1).default('documents'),
    // Must match the index created in Atlas
    MONGO_VECTOR_INDEX: z.string().min(1).default('vector_index'),
    LLM_MODEL: z.string().min(1).default('gemini-2.5-flash'),
    LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.2),
    EMBEDDING_MODEL: z.string().min(1).default('gemini-embedding-001'),
    EMBEDDING_DIMENSIONS: z.coerce.number().int().positive().default(768),
    CHUNK_SIZE: z.coerce.number().int().positive().default(1500),
    CHUNK_OVERLAP: z.coerce.number().int().min(0).default(200),
    RETRIEVAL_TOP_K: z.coerce.number().int().positive().default(5),
    DOWNLOAD_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
    MAX_DOCUMENT_BYTES: z.coerce.number().int().positive().default(50 * 1024 * 1024),
  })
  .refine((env) => env.CHUNK_OVERLAP < env.CHUNK_SIZE, {
    message: 'CHUNK_OVERLAP must be smaller than CHUNK_SIZE',
    path: ['CHUNK_OVERLAP'],
  });

export interface MongoConfig {
  host: string;
  user: string;
  password: string;
  dbName: string;
  collectionName: string;
  indexName: string;
}

export interface AppConfig {
  port: number;
  apiBearerToken: string;
  googleApiKey: string;
  mongo: MongoConfig;
  llm: {
    model: string;
    temperature: number;
  };
  embedding: {
    model: string;
    dimensions: number;
  };
  chunking: {
    chunkSize: number;
    chunkOverlap: number;
  };
  retrievalTopK: number;
  download: {
    timeoutMs: number;
    maxBytes: number;
  };
}

/**
 * Validate the environment and build the typed configuration.
 * Throws ConfigError naming every missing or invalid variable.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  // Empty strings count as unset so optional variables fall back to their defaults
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );

  const result = configSchema.safeParse(present);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) =>
        issue.message.endsWith('is not set.') ? issue.message : `${issue.path.join('.')}: ${issue.message}`
      )
    );
  }

  const parsed = result.data;
  return {
    port: parsed.PORT,
    apiBearerToken: parsed.API_BEARER_TOKEN,
    googleApiKey: parsed.GOOGLE_API_KEY,
    mongo: {
      host: parsed.MONGO_HOST,
      user: parsed.MONGO_USER,
      password: parsed.MONGO_PASS,
      dbName: parsed.MONGO_DB_NAME,
      collectionName: parsed.MONGO_COLLECTION,
      indexName: parsed.MONGO_VECTOR_INDEX,
    },
    llm: {
      model: parsed.LLM_MODEL,
      temperature: parsed.LLM_TEMPERATURE,
    },
    embedding: {
      model: parsed.EMBEDDING_MODEL,
      dimensions: parsed.EMBEDDING_DIMENSIONS,
    },
    chunking: {
      chunkSize: parsed.CHUNK_SIZE,
      chunkOverlap: parsed.CHUNK_OVERLAP,
    },
    retrievalTopK: parsed.RETRIEVAL_TOP_K,
    download: {
      timeoutMs: parsed.DOWNLOAD_TIMEOUT_MS,
      maxBytes: parsed.MAX_DOCUMENT_BYTES,
    },
  };
}
