import { describe, it, expect, beforeEach } from 'vitest';
import { QueryService } from './service.js';
import { NO_CONTEXT_ANSWER } from './prompt.js';
import { DocumentIndexService } from '../rag/service.js';
import { Chunker } from '../rag/chunker.js';
import { MongoVectorStore } from '../rag/store.js';
import {
  FakeChunkCollection,
  FakeDocumentSource,
  FakeEmbeddingProvider,
  FakeLLMProvider,
  searchRow,
} from '../__tests__/utils/fakes.js';

const DOC_URL = 'https://files.test/policy.pdf';

describe('QueryService', () => {
  let collection: FakeChunkCollection;
  let loader: FakeDocumentSource;
  let indexService: DocumentIndexService;

  beforeEach(() => {
    collection = new FakeChunkCollection();
    loader = new FakeDocumentSource([{ content: 'The grace period is thirty days.', page: 1 }]);
    indexService = new DocumentIndexService({
      loader,
      chunker: new Chunker(),
      embeddingProvider: new FakeEmbeddingProvider(),
      store: new MongoVectorStore(async () => collection, 'vector_index'),
    });
  });

  it('should answer every question from one model call', async () => {
    collection.searchRows = [
      searchRow('The grace period is thirty days.', DOC_URL),
      searchRow('Maternity is covered after two years.', DOC_URL),
    ];
    const llm = new FakeLLMProvider('1. The grace period is thirty days.\n2. Maternity is covered after two years.');
    const service = new QueryService({ indexService, llm });

    const response = await service.run({
      documents: DOC_URL,
      questions: ['What is the grace period?', 'Is maternity covered?'],
    });

    expect(response).toEqual({
      answers: ['The grace period is thirty days.', 'Maternity is covered after two years.'],
    });
    expect(loader.load).toHaveBeenCalledWith(DOC_URL);
    expect(llm.complete).toHaveBeenCalledTimes(1);

    const prompt = llm.complete.mock.calls[0][0][0].content;
    expect(prompt).toContain('The grace period is thirty days.\n\n---\n\nMaternity is covered after two years.');
    expect(prompt).toContain('1. What is the grace period?\n2. Is maternity covered?');
  });

  it('should use the configured number of results per question', async () => {
    const service = new QueryService({ indexService, llm: new FakeLLMProvider('1. x'), topK: 3 });

    await service.run({ documents: DOC_URL, questions: ['Q?'] });

    expect(collection.pipelines[0][0].$vectorSearch.limit).toBe(3);
  });

  it('should answer with the fallback phrase when nothing is retrieved', async () => {
    const llm = new FakeLLMProvider('unused');
    const service = new QueryService({ indexService, llm });

    const response = await service.run({ documents: DOC_URL, questions: ['Q1?', 'Q2?'] });

    expect(response).toEqual({ answers: [NO_CONTEXT_ANSWER, NO_CONTEXT_ANSWER] });
    expect(llm.complete).not.toHaveBeenCalled();
  });

  it('should return the raw output when the answer count does not match', async () => {
    collection.searchRows = [searchRow('Some clause.', DOC_URL)];
    const raw = 'Both questions concern the same clause, which sets a thirty day grace period.';
    const service = new QueryService({ indexService, llm: new FakeLLMProvider(raw) });

    const response = await service.run({ documents: DOC_URL, questions: ['Q1?', 'Q2?'] });

    expect(response).toEqual({ answers: [raw] });
  });

  it('should not reload a document that is already indexed', async () => {
    collection.searchRows = [searchRow('Some clause.', DOC_URL)];
    const service = new QueryService({ indexService, llm: new FakeLLMProvider('1. Yes.') });

    await service.run({ documents: DOC_URL, questions: ['Q?'] });
    await service.run({ documents: DOC_URL, questions: ['Q?'] });

    expect(loader.load).toHaveBeenCalledTimes(1);
  });
});
