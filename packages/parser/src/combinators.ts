/**
 * Parser combinators for @tagweave/parser
 *
 * Every combinator takes parsers and returns a parser, so primitives and
 * composites nest freely. Failures short-circuit: the first sub-parser that
 * fails decides the outcome, and nothing already consumed is rolled back
 * except where a combinator says so (`either`, `pred`, `oneOrMore`).
 */

import { createLogger, type Logger } from "@tagweave/core";
import type { Input } from "./input.js";
import type { Parser, Success } from "./types.js";
import { parser, success, failure } from "./types.js";

// ---------------------------------------------------------------------------
// Sequencing
// ---------------------------------------------------------------------------

/**
 * Run `p1`, then `p2` on its remainder, keeping both values.
 *
 * If `p2` fails the failure is reported where `p2` was tried, after whatever
 * `p1` consumed.
 */
export function pair<A, B>(p1: Parser<A>, p2: Parser<B>): Parser<[A, B]> {
  return parser((input) => {
    const r1 = p1.parse(input);
    if (!r1.ok) return r1;
    const r2 = p2.parse(r1.rest);
    if (!r2.ok) return r2;
    const both: [A, B] = [r1.value, r2.value];
    return success(both, r2.rest);
  });
}

/** Sequence two parsers, keeping the left value. */
export function left<A, B>(p1: Parser<A>, p2: Parser<B>): Parser<A> {
  return map(pair(p1, p2), ([a]) => a);
}

/** Sequence two parsers, keeping the right value. */
export function right<A, B>(p1: Parser<A>, p2: Parser<B>): Parser<B> {
  return map(pair(p1, p2), ([, b]) => b);
}

// ---------------------------------------------------------------------------
// Transformation
// ---------------------------------------------------------------------------

/** Transform a parser's value. `f` never sees a failure. */
export function map<A, B>(p: Parser<A>, f: (a: A) => B): Parser<B> {
  return parser((input) => {
    const r = p.parse(input);
    if (!r.ok) return r;
    return success(f(r.value), r.rest);
  });
}

/**
 * Succeed only when `p` succeeds with a value satisfying `predicate`.
 * A rejected value fails at the original input.
 */
export function pred<A>(
  p: Parser<A>,
  predicate: (a: A) => boolean,
  expected = "a matching value"
): Parser<A> {
  return parser((input) => {
    const r = p.parse(input);
    if (!r.ok) return r;
    return predicate(r.value) ? r : failure(input, expected);
  });
}

/**
 * Build the next parser from a value and run it on the remainder.
 * Used where what comes next depends on what was just parsed.
 */
export function andThen<A, B>(p: Parser<A>, f: (a: A) => Parser<B>): Parser<B> {
  return parser((input) => {
    const r = p.parse(input);
    if (!r.ok) return r;
    return f(r.value).parse(r.rest);
  });
}

// ---------------------------------------------------------------------------
// Repetition
// ---------------------------------------------------------------------------

/**
 * Collect successes of `p` from `start` until `p` fails.
 * A success that consumes nothing stops the loop without being collected.
 */
function collect<T>(p: Parser<T>, results: T[], start: Input): Success<T[]> {
  let cur = start;
  for (;;) {
    const r = p.parse(cur);
    if (!r.ok) break;
    if (r.rest.offset === cur.offset) break; // zero-width match would never end
    results.push(r.value);
    cur = r.rest;
  }
  return success(results, cur);
}

/** Zero or more repetitions, in order. Always succeeds. */
export function zeroOrMore<T>(p: Parser<T>): Parser<T[]> {
  return parser((input) => collect(p, [], input));
}

/**
 * One or more repetitions. When the first attempt fails the whole parser
 * fails at the input it was given.
 *
 * A first match that consumes nothing counts as no match, as in
 * `zeroOrMore`, so it fails here too.
 */
export function oneOrMore<T>(p: Parser<T>): Parser<T[]> {
  return parser((input) => {
    const first = p.parse(input);
    if (!first.ok) return failure(input, first.expected);
    if (first.rest.offset === input.offset) return failure(input, "at least one match");
    return collect(p, [first.value], first.rest);
  });
}

// ---------------------------------------------------------------------------
// Choice
// ---------------------------------------------------------------------------

/**
 * Ordered choice: try `p1`, then `p2` on the same input.
 * When both fail the failure of `p2` is reported.
 */
export function either<A, B>(p1: Parser<A>, p2: Parser<B>): Parser<A | B> {
  return parser<A | B>((input) => {
    const r1 = p1.parse(input);
    if (r1.ok) return r1;
    return p2.parse(input);
  });
}

/** Succeed with `null` when `p` fails, consuming nothing. */
export function optional<T>(p: Parser<T>): Parser<T | null> {
  return parser<T | null>((input) => {
    const r = p.parse(input);
    return r.ok ? r : success(null, input);
  });
}

// ---------------------------------------------------------------------------
// Recursion and tracing
// ---------------------------------------------------------------------------

/** Lazy parser for recursive grammars. `f` is called on first use. */
export function lazy<T>(f: () => Parser<T>): Parser<T> {
  let cached: Parser<T> | null = null;
  return parser((input) => {
    if (!cached) cached = f();
    return cached.parse(input);
  });
}

const traceLog = createLogger("trace");

/**
 * Log entry and exit of `p` through `log.debug` (by default only when the
 * `trace` flag is set). The outcome is returned unchanged.
 */
export function traced<T>(name: string, p: Parser<T>, log: Logger = traceLog): Parser<T> {
  return parser((input) => {
    if (!log.debugEnabled) return p.parse(input);
    const { line, column } = input.location();
    log.debug(`${name} at ${line}:${column}`);
    const r = p.parse(input);
    if (r.ok) {
      log.debug(`${name} matched ${JSON.stringify(r.rest.consumedSince(input))}`);
    } else {
      const at = r.at.location();
      log.debug(`${name} failed at ${at.line}:${at.column}, expected ${r.expected}`);
    }
    return r;
  });
}
