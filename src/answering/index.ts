export * from './types.js';
export { QueryService, type QueryServiceConfig } from './service.js';
export { buildAnswerPrompt, formatQuestions, NO_CONTEXT_ANSWER, CONTEXT_SEPARATOR } from './prompt.js';
export { parseNumberedAnswers } from './parser.js';
