// src/agents/token-estimator.ts

/**
 * Cheap stand-in for a tokenizer: about 1.3 tokens per word plus an allowance
 * for punctuation-heavy code. Only used to pick single-shot vs chunked review.
 */
export function estimateTokens(text: string): number {
  const words = text.split(/\s+/).filter(word => word.length > 0).length;
  return Math.round(words * 1.3 + text.length * 0.1);
}
