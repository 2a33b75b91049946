/**
 * Error reporting for @tagweave/parser
 *
 * Parse failures are ordinary values; these helpers turn one into a message,
 * a rendered source frame, or (at the `parseAll` boundary) an exception.
 */

import { renderDiagnostic, type RenderOptions } from "@tagweave/core";
import type { Input } from "./input.js";
import type { Failure } from "./types.js";

/** One-line description: `expected ">" at line 1, column 7`. */
export function describeFailure(failure: Pick<Failure, "at" | "expected">): string {
  const { line, column } = failure.at.location();
  return `expected ${failure.expected} at line ${line}, column ${column}`;
}

export interface RenderFailureOptions extends RenderOptions {
  /** Document name shown in the location line */
  name?: string;
}

/** Render a failure as a source frame with a caret at the failing column. */
export function renderFailure(
  failure: Pick<Failure, "at" | "expected">,
  options: RenderFailureOptions = {}
): string {
  return renderDiagnostic(
    {
      severity: "error",
      message: `expected ${failure.expected}`,
      source: failure.at.source,
      offset: failure.at.offset,
      name: options.name,
    },
    options
  );
}

/** Thrown by `parseAll` when the text does not parse completely. */
export class ParseError extends Error {
  /** The input where parsing stopped. */
  readonly at: Input;
  /** Zero-based UTF-16 offset of the failure. */
  readonly offset: number;
  readonly line: number;
  readonly column: number;
  /** What the parser expected at the failure position. */
  readonly expected: string;

  constructor(at: Input, expected: string) {
    super(describeFailure({ at, expected }));
    this.name = "ParseError";
    const { line, column } = at.location();
    this.at = at;
    this.offset = at.offset;
    this.line = line;
    this.column = column;
    this.expected = expected;
  }

  /** The source frame for this error. */
  render(options: RenderFailureOptions = {}): string {
    return renderFailure(this, options);
  }
}
