export * from './types.js';
export { Chunker, type PageInput } from './chunker.js';
export { GoogleEmbeddingProvider } from './embeddings.js';
export { MongoVectorStore } from './store.js';
export { DocumentIndexService, sourceDocumentName, type DocumentSource } from './service.js';
