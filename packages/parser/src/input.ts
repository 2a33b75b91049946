/**
 * Input cursor for @tagweave/parser
 *
 * An `Input` is a read-only view of the unconsumed suffix of a source text.
 * Every view over one parse shares the same `source` string; advancing only
 * moves `offset`, so repetition never copies the remaining text.
 */

import { locate, type SourceLocation } from "@tagweave/core";

export class Input {
  /** The whole original text. */
  readonly source: string;
  /** UTF-16 index where the remainder starts. */
  readonly offset: number;

  private constructor(source: string, offset: number) {
    this.source = source;
    this.offset = offset;
  }

  /** Create the root view over a text (offset 0). */
  static of(text: string): Input {
    return new Input(text, 0);
  }

  /** The remaining text. Allocates a string; the parsers themselves never call it. */
  get rest(): string {
    return this.source.slice(this.offset);
  }

  /** Remaining length in UTF-16 code units. */
  get length(): number {
    return this.source.length - this.offset;
  }

  get atEnd(): boolean {
    return this.offset >= this.source.length;
  }

  /** Exact, case-sensitive prefix test. */
  startsWith(text: string): boolean {
    return this.source.startsWith(text, this.offset);
  }

  /** The first code point of the remainder, or `undefined` at end of input. */
  peek(): string | undefined {
    const cp = this.source.codePointAt(this.offset);
    return cp === undefined ? undefined : String.fromCodePoint(cp);
  }

  /** Whether `n` code units on lies between two characters, not inside a surrogate pair. */
  isBoundary(n: number): boolean {
    const at = this.offset + n;
    if (at <= 0 || at >= this.source.length) return true;
    const before = this.source.charCodeAt(at - 1);
    const after = this.source.charCodeAt(at);
    return !(before >= 0xd800 && before <= 0xdbff && after >= 0xdc00 && after <= 0xdfff);
  }

  /**
   * A view `n` code units further on.
   *
   * @throws RangeError when `n` is negative or past the end
   */
  advance(n: number): Input {
    if (!Number.isInteger(n) || n < 0 || n > this.length) {
      throw new RangeError(`Cannot advance by ${n} with ${this.length} code units remaining`);
    }
    return n === 0 ? this : new Input(this.source, this.offset + n);
  }

  /**
   * Consume the longest run of code points satisfying `pred`.
   * Returns the matched text and the view after it.
   */
  takeWhile(pred: (ch: string) => boolean): [string, Input] {
    let end = this.offset;
    while (end < this.source.length) {
      const cp = this.source.codePointAt(end);
      if (cp === undefined) break;
      const ch = String.fromCodePoint(cp);
      if (!pred(ch)) break;
      end += ch.length;
    }
    return [this.source.slice(this.offset, end), this.advance(end - this.offset)];
  }

  /** The text consumed between an earlier view over the same source and this one. */
  consumedSince(earlier: Input): string {
    if (earlier.source !== this.source || earlier.offset > this.offset) {
      throw new RangeError("consumedSince() needs an earlier view over the same source");
    }
    return this.source.slice(earlier.offset, this.offset);
  }

  equals(other: Input): boolean {
    return this.source === other.source && this.offset === other.offset;
  }

  /** 1-based line and column of the view's start. */
  location(): SourceLocation {
    return locate(this.source, this.offset);
  }

  toString(): string {
    const { line, column } = this.location();
    return `Input(${line}:${column})`;
  }
}
