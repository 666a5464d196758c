/**
 * MongoDB Atlas connection management.
 *
 * The client is created once at startup. A failed first connection is not fatal:
 * the next request that needs the collection retries before giving up.
 */

import { MongoClient, type Collection } from 'mongodb';
import type { MongoConfig } from '../config/index.js';
import { VectorStoreUnavailableError, errorMessage } from '../errors.js';
import type { ChunkDocument } from '../rag/types.js';

export class MongoConnection {
  private config: MongoConfig;
  private client: MongoClient | null = null;
  private collection: Collection<ChunkDocument> | null = null;
  private opening: Promise<Collection<ChunkDocument> | null> | null = null;

  constructor(config: MongoConfig) {
    this.config = config;
  }

  /**
   * Connect and ping the cluster. Returns false instead of throwing so startup can continue.
   */
  async connect(): Promise<boolean> {
    return (await this.open()) !== null;
  }

  /**
   * Concurrent callers share one connection attempt.
   */
  private open(): Promise<Collection<ChunkDocument> | null> {
    if (!this.opening) {
      this.opening = this.createClient().finally(() => {
        this.opening = null;
      });
    }
    return this.opening;
  }

  private async createClient(): Promise<Collection<ChunkDocument> | null> {
    const client = new MongoClient(`mongodb+srv://${this.config.host}`, {
      auth: {
        username: this.config.user,
        password: this.config.password,
      },
      tls: true,
      authSource: 'admin',
      authMechanism: 'SCRAM-SHA-1',
      serverSelectionTimeoutMS: 5000,
      connectTimeoutMS: 10000,
      socketTimeoutMS: 10000,
    });

    try {
      await client.connect();
      await client.db('admin').command({ ping: 1 });
    } catch (error) {
      console.error(`[Mongo] Failed to connect to MongoDB Atlas: ${errorMessage(error)}`);
      await client.close().catch((closeError: unknown) => {
        console.warn(`[Mongo] Error closing failed client: ${errorMessage(closeError)}`);
      });
      return null;
    }

    const collection = client.db(this.config.dbName).collection<ChunkDocument>(this.config.collectionName);
    this.client = client;
    this.collection = collection;
    console.log('[Mongo] Connection to MongoDB Atlas successful');
    return collection;
  }

  isConnected(): boolean {
    return this.collection !== null;
  }

  /**
   * Get the chunk collection, reconnecting first if the earlier attempt failed.
   */
  async getCollection(): Promise<Collection<ChunkDocument>> {
    if (this.collection) {
      return this.collection;
    }

    console.log('[Mongo] Not connected, retrying connection');
    const collection = await this.open();
    if (!collection) {
      throw new VectorStoreUnavailableError();
    }
    return collection;
  }

  async close(): Promise<void> {
    if (!this.client) return;
    await this.client.close();
    this.client = null;
    this.collection = null;
    console.log('[Mongo] Connection closed');
  }
}
