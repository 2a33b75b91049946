/**
 * Whitespace and string helpers built from the primitives and combinators.
 */

import type { Parser } from "./types.js";
import { parser, success, failure } from "./types.js";
import { whitespaceChar } from "./primitives.js";
import { zeroOrMore, oneOrMore, left, right } from "./combinators.js";

/** Zero or more whitespace characters. */
export const space0: Parser<string[]> = zeroOrMore(whitespaceChar);

/** One or more whitespace characters. */
export const space1: Parser<string[]> = oneOrMore(whitespaceChar);

/** Parse `p` surrounded by optional whitespace. */
export function whitespaceWrap<T>(p: Parser<T>): Parser<T> {
  return right(space0, left(p, space0));
}

/**
 * A double-quoted string with no escape processing. The value is the text
 * between the quotes; an unterminated string fails at the opening quote.
 */
export const quotedString: Parser<string> = parser((input) => {
  if (!input.startsWith('"')) return failure(input, "quoted string");
  const [body, afterBody] = input.advance(1).takeWhile((ch) => ch !== '"');
  if (afterBody.atEnd) return failure(input, "closing quote");
  return success(body, afterBody.advance(1));
});
