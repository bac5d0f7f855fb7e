import type { Token } from "../types.js";
import type { Tokenizer } from "../tokenizer.js";

// space, \t \n \v \f \r. Wider than the classic " \t\n\r\f" delimiter set: \v separates tokens too.
function isWhitespace(code: number): boolean {
  return code === 32 || (code >= 9 && code <= 13);
}

/**
 * Splits on runs of ASCII whitespace and keeps everything else verbatim:
 * - no case folding
 * - punctuation stays attached to the token
 * - yields token positions (token index) and character offsets
 */
export class WhitespaceTokenizer implements Tokenizer {
  *tokenize(text: string): Iterable<Token> {
    const n = text.length;
    let i = 0;
    let position = 0;

    while (i < n) {
      // skip separators
      while (i < n && isWhitespace(text.charCodeAt(i))) i++;
      if (i >= n) break;

      const start = i;
      while (i < n && !isWhitespace(text.charCodeAt(i))) i++;
      const end = i;

      yield { term: text.slice(start, end), position, startOffset: start, endOffset: end };
      position++;
    }
  }
}
