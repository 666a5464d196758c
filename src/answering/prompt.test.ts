import { describe, it, expect } from 'vitest';
import { buildAnswerPrompt, formatQuestions, NO_CONTEXT_ANSWER } from './prompt.js';

describe('formatQuestions', () => {
  it('should number questions from 1', () => {
    expect(formatQuestions(['What is covered?', 'What is excluded?'])).toBe(
      '1. What is covered?\n2. What is excluded?'
    );
  });
});

describe('buildAnswerPrompt', () => {
  const prompt = buildAnswerPrompt(['Chunk A text', 'Chunk B text'], ['What is covered?']);

  it('should join context chunks with separators', () => {
    expect(prompt).toContain('---\nChunk A text\n\n---\n\nChunk B text\n---');
  });

  it('should include the numbered questions', () => {
    expect(prompt).toContain('**Questions:**\n---\n1. What is covered?\n---');
  });

  it('should tell the model the exact fallback phrase', () => {
    expect(prompt).toContain(`you MUST write the exact phrase: "${NO_CONTEXT_ANSWER}"`);
  });

  it('should end with the output format instruction', () => {
    expect(prompt.endsWith('Your output should begin immediately with "1."')).toBe(true);
  });
});
