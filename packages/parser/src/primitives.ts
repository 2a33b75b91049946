/**
 * Primitive parsers for @tagweave/parser
 *
 * Primitives read the input directly and never delegate. On failure they
 * return the input they were given, untouched.
 */

import type { Parser } from "./types.js";
import { parser, success, failure } from "./types.js";

const ALPHABETIC = /^\p{Alphabetic}$/u;
const WHITESPACE = /^\s$/u;

export function isAlphabetic(ch: string): boolean {
  return ALPHABETIC.test(ch);
}

export function isWhitespace(ch: string): boolean {
  return WHITESPACE.test(ch);
}

/**
 * Match an exact string, unit for unit. The value is the matched text.
 * A match that would end inside a surrogate pair fails.
 */
export function literal<S extends string>(expected: S): Parser<S> {
  const description = JSON.stringify(expected);
  return parser((input) =>
    input.startsWith(expected) && input.isBoundary(expected.length)
      ? success(expected, input.advance(expected.length))
      : failure(input, description)
  );
}

/**
 * Match an identifier: one alphabetic character, then the longest run of
 * alphabetic characters and hyphens. Anything else ends the run.
 */
export const identifier: Parser<string> = parser((input) => {
  const first = input.peek();
  if (first === undefined || !isAlphabetic(first)) {
    return failure(input, "identifier");
  }
  const [tail, rest] = input
    .advance(first.length)
    .takeWhile((ch) => ch === "-" || isAlphabetic(ch));
  return success(first + tail, rest);
});

/**
 * Match one specific code point. The value is `undefined`.
 *
 * @throws RangeError if `c` is not exactly one code point
 */
export function charEquals(c: string): Parser<undefined> {
  if (Array.from(c).length !== 1) {
    throw new RangeError(`charEquals() takes a single character, got ${JSON.stringify(c)}`);
  }
  const description = JSON.stringify(c);
  return parser((input) =>
    input.peek() === c ? success(undefined, input.advance(c.length)) : failure(input, description)
  );
}

/** Match one code point satisfying `pred`. The value is that character. */
export function satisfy(pred: (ch: string) => boolean, expected: string): Parser<string> {
  return parser((input) => {
    const ch = input.peek();
    if (ch !== undefined && pred(ch)) {
      return success(ch, input.advance(ch.length));
    }
    return failure(input, expected);
  });
}

/** Match any single code point. */
export const anyChar: Parser<string> = satisfy(() => true, "any character");

/** Match one whitespace character. */
export const whitespaceChar: Parser<string> = satisfy(isWhitespace, "whitespace");

/** Match end of input without consuming anything. */
export const eof: Parser<null> = parser((input) =>
  input.atEnd ? success(null, input) : failure(input, "end of input")
);
