/**
 * Answer written for a question the retrieved context cannot answer.
 * The model is told to use this exact phrase too.
 */
export const NO_CONTEXT_ANSWER =
  'The provided context does not contain sufficient information to answer this question.';

export const CONTEXT_SEPARATOR = '\n\n---\n\n';

export function formatQuestions(questions: string[]): string {
  return questions.map((question, i) => `${i + 1}. ${question}`).join('\n');
}

/**
 * Build the single prompt that answers every question in one model call.
 */
export function buildAnswerPrompt(contextChunks: string[], questions: string[]): string {
  return `You are an expert AI assistant for analyzing legal and policy documents. Your goal is to answer a list of questions based *exclusively* on the provided context.

**Context from the document:**
---
${contextChunks.join(CONTEXT_SEPARATOR)}
---

**Questions:**
---
${formatQuestions(questions)}
---

**Instructions:**
1. Carefully read the entire context to understand the document's content.
2. Answer each question from the list one by one.
3. **Your response MUST be a numbered list**, where each number corresponds to the question number.
4. Each answer must be a clear, concise, and objective statement derived only from the provided context.
5. Write full, formal sentences instead of two or three words.
6. **CRITICAL:** If the information to answer a specific question is not in the context, you MUST write the exact phrase: "${NO_CONTEXT_ANSWER}" for that corresponding number.
7. Do not add any preamble or closing remarks. Your output should begin immediately with "1."`;
}
