/**
 * @tagweave/parser
 *
 * A small parser-combinator engine. Grammars are assembled by nesting
 * combinator calls around primitives; the composite is run once with
 * `parse()` and yields either a value with the leftover input, or a failure
 * pinned to the input where matching stopped.
 *
 * @module
 */

// Cursor
export { Input } from "./input.js";

// Core types
export type { ParseOutcome, Success, Failure, ParseFn, ParsedBy, Parser } from "./types.js";
export { parser, success, failure } from "./types.js";

// Errors
export { ParseError, describeFailure, renderFailure, type RenderFailureOptions } from "./errors.js";

// Primitives
export {
  literal,
  identifier,
  charEquals,
  satisfy,
  anyChar,
  whitespaceChar,
  eof,
  isAlphabetic,
  isWhitespace,
} from "./primitives.js";

// Combinators
export {
  pair,
  left,
  right,
  map,
  pred,
  andThen,
  zeroOrMore,
  oneOrMore,
  either,
  optional,
  lazy,
  traced,
} from "./combinators.js";

// Text helpers
export { space0, space1, whitespaceWrap, quotedString } from "./text.js";
