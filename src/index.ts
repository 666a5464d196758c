import 'dotenv/config';
import { loadConfig } from './config/index.js';
import { MongoConnection } from './db/index.js';
import { GoogleProvider } from './llm/index.js';
import { Chunker, DocumentIndexService, GoogleEmbeddingProvider, MongoVectorStore } from './rag/index.js';
import { DocumentLoader } from './documents/index.js';
import { QueryService } from './answering/index.js';
import { DocumentQAServer, SERVICE_NAME, SERVICE_VERSION } from './server/index.js';

async function main(): Promise<void> {
  const config = loadConfig();

  console.log('[Init] Connecting to MongoDB Atlas...');
  const mongo = new MongoConnection(config.mongo);
  if (!(await mongo.connect())) {
    console.warn('[Init] MongoDB connection failed during startup. Will retry on first request.');
  }

  const llm = new GoogleProvider(config.googleApiKey, config.llm.model, config.llm.temperature);
  const embeddingProvider = new GoogleEmbeddingProvider(
    config.googleApiKey,
    config.embedding.model,
    config.embedding.dimensions
  );

  const indexService = new DocumentIndexService({
    loader: new DocumentLoader(config.download),
    chunker: new Chunker(config.chunking),
    embeddingProvider,
    store: new MongoVectorStore(() => mongo.getCollection(), config.mongo.indexName),
  });

  const queryService = new QueryService({
    indexService,
    llm,
    topK: config.retrievalTopK,
  });

  const server = new DocumentQAServer({
    port: config.port,
    apiToken: config.apiBearerToken,
    queryHandler: queryService,
  });
  await server.start();

  console.log(`
✅ ${SERVICE_NAME} v${SERVICE_VERSION} ready!

  🌐 API:        http://localhost:${config.port}/api/v1/hackrx/run
  📚 Docs:       http://localhost:${config.port}/docs
  🗄️  Collection: ${config.mongo.dbName}.${config.mongo.collectionName} (index: ${config.mongo.indexName})
  🧠 LLM:        google/${config.llm.model}
  🔢 Embeddings: google/${config.embedding.model} (${config.embedding.dimensions} dims)
`);

  // Handle shutdown
  let shuttingDown = false;
  const shutdown = async (): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log('\n[Shutdown] Gracefully shutting down...');
    try {
      await server.stop();
      await mongo.close();
      console.log('[Shutdown] Complete');
      process.exit(0);
    } catch (error) {
      console.error('[Shutdown] Failed:', error);
      process.exit(1);
    }
  };

  process.on('SIGINT', () => void shutdown());
  process.on('SIGTERM', () => void shutdown());
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
