// src/knowledge/prompts.ts
// Instructions sent to the language capability.

/* ---------- Classification ---------- */

export const CLASSIFICATION_SYSTEM_PROMPT = [
  "You label questions for a document question-answering system.",
  "Reply with exactly one word from this list: factual, relational, reasoning.",
  "factual: asks for a specific fact stated in a document.",
  "relational: asks how people, organizations or places are connected.",
  "reasoning: needs several facts combined, compared or explained.",
].join("\n");

export function buildClassificationPrompt(question: string): string {
  return `Question: ${question}\n\nLabel:`;
}

/* ---------- Generation ---------- */

/** Returned verbatim whenever the context cannot support an answer */
export const INSUFFICIENT_INFORMATION_MESSAGE =
  "I have insufficient information to answer this question based on the available documents.";

export const GENERATION_SYSTEM_PROMPT = [
  "Answer the question using only the numbered context passages.",
  "Do not use outside knowledge and do not guess.",
  `If the passages do not contain the answer, reply exactly: "${INSUFFICIENT_INFORMATION_MESSAGE}"`,
].join("\n");

export const CONTEXT_BLOCK_SEPARATOR = "\n\n---\n\n";
export const CONTEXT_HEADER = "Context:\n";
export const QUESTION_HEADER = "\n\nQuestion: ";

export function numberContextBlocks(blocks: readonly string[]): string {
  return blocks.map((block, i) => `[${i + 1}] ${block}`).join(CONTEXT_BLOCK_SEPARATOR);
}

export function buildGenerationPrompt(question: string, blocks: readonly string[]): string {
  return (
    CONTEXT_HEADER +
    numberContextBlocks(blocks) +
    QUESTION_HEADER +
    question +
    "\n\nAnswer:"
  );
}
