/**
 * Core types for @tagweave/parser
 *
 * Defines the parse outcome, the parser capability, and the adapter that turns
 * a plain function into a parser.
 */

import { Input } from "./input.js";
import { ParseError } from "./errors.js";

/** Successful parse: the value and the unconsumed remainder. */
export interface Success<T> {
  readonly ok: true;
  readonly value: T;
  readonly rest: Input;
}

/**
 * Failed parse, pinned to the input where the failing parser was tried.
 * `expected` describes what the innermost failing primitive wanted.
 */
export interface Failure {
  readonly ok: false;
  readonly at: Input;
  readonly expected: string;
}

/** Result of a parse attempt. */
export type ParseOutcome<T> = Success<T> | Failure;

/** The raw function shape every parser is built from. */
export type ParseFn<T> = (input: Input) => ParseOutcome<T>;

/** Value type produced by a parser. */
export type ParsedBy<P> = P extends Parser<infer T> ? T : never;

/**
 * A parser is a stateless capability from input to outcome. Primitives and
 * combinators are both parsers, so either can be passed wherever one is taken.
 */
export interface Parser<T> {
  /** Attempt to parse at the start of `input`. Strings are wrapped with `Input.of`. */
  parse(input: Input | string): ParseOutcome<T>;
  /** Parse the full text, throwing `ParseError` if it fails or leaves input over. */
  parseAll(text: string): T;
}

export function success<T>(value: T, rest: Input): Success<T> {
  return { ok: true, value, rest };
}

export function failure(at: Input, expected: string): Failure {
  return { ok: false, at, expected };
}

/** Create a Parser<T> from a raw parse function. */
export function parser<T>(parseFn: ParseFn<T>): Parser<T> {
  return {
    parse(input: Input | string): ParseOutcome<T> {
      return parseFn(typeof input === "string" ? Input.of(input) : input);
    },
    parseAll(text: string): T {
      const result = parseFn(Input.of(text));
      if (!result.ok) {
        throw new ParseError(result.at, result.expected);
      }
      if (!result.rest.atEnd) {
        throw new ParseError(result.rest, "end of input");
      }
      return result.value;
    },
  };
}
