import type { LLMProvider } from '../llm/index.js';
import type { DocumentIndexService } from '../rag/index.js';
import { buildAnswerPrompt, NO_CONTEXT_ANSWER } from './prompt.js';
import { parseNumberedAnswers } from './parser.js';
import type { QueryHandler, QueryRequest, QueryResponse } from './types.js';

export interface QueryServiceConfig {
  indexService: DocumentIndexService;
  llm: LLMProvider;
  topK?: number;
}

/**
 * Answers a batch of questions about one document.
 *
 * The document is indexed on first use, the chunks relevant to any question are pooled
 * into one context, and all questions are answered in a single model call.
 */
export class QueryService implements QueryHandler {
  private indexService: DocumentIndexService;
  private llm: LLMProvider;
  private topK: number;

  constructor(config: QueryServiceConfig) {
    this.indexService = config.indexService;
    this.llm = config.llm;
    this.topK = config.topK ?? 5;
  }

  async run(request: QueryRequest): Promise<QueryResponse> {
    const { documents: url, questions } = request;

    await this.indexService.ensureIndexed(url);

    console.log(`[QA] Retrieving relevant chunks for ${questions.length} questions`);
    const chunks = await this.indexService.retrieve(url, questions, this.topK);

    if (chunks.length === 0) {
      console.warn(`[QA] No relevant chunks found for ${url}`);
      return { answers: questions.map(() => NO_CONTEXT_ANSWER) };
    }

    const prompt = buildAnswerPrompt(
      chunks.map((chunk) => chunk.content),
      questions
    );

    console.log(`[QA] Sending batch request to the LLM (${chunks.length} context chunks)`);
    const response = await this.llm.complete([{ role: 'user', content: prompt }]);

    const answers = parseNumberedAnswers(response.content);
    if (answers.length !== questions.length) {
      console.warn(
        `[QA] LLM did not return the expected number of answers. Got ${answers.length}, expected ${questions.length}. Returning raw output.`
      );
      return { answers: [response.content] };
    }

    return { answers };
  }
}
