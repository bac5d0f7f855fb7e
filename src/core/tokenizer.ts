import type { Token } from "./types.js";

/**
 * Turns text into a stream of tokens.
 *
 * Contract notes:
 * - should be deterministic for given input
 * - tokens are yielded in encounter order and are never empty
 */
export interface Tokenizer {
  tokenize(text: string): Iterable<Token>;
}
