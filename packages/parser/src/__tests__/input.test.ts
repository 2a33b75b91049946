import { describe, it, expect } from "vitest";
import { Input } from "../index.js";

describe("Input", () => {
  it("starts at offset 0 over the whole text", () => {
    const input = Input.of("abc");
    expect(input.offset).toBe(0);
    expect(input.rest).toBe("abc");
    expect(input.length).toBe(3);
    expect(input.atEnd).toBe(false);
  });

  it("advances without changing the shared source", () => {
    const input = Input.of("abc");
    const next = input.advance(2);
    expect(next.rest).toBe("c");
    expect(next.source).toBe("abc");
    expect(input.rest).toBe("abc");
    expect(next.advance(1).atEnd).toBe(true);
  });

  it("returns the same view when advancing by zero", () => {
    const input = Input.of("abc");
    expect(input.advance(0)).toBe(input);
  });

  it("rejects advancing past the end or backwards", () => {
    const input = Input.of("abc");
    expect(() => input.advance(4)).toThrow(RangeError);
    expect(() => input.advance(-1)).toThrow(RangeError);
  });

  it("tests prefixes without slicing", () => {
    const input = Input.of("<demo>").advance(1);
    expect(input.startsWith("demo")).toBe(true);
    expect(input.startsWith("Demo")).toBe(false);
  });

  it("peeks whole code points", () => {
    expect(Input.of("😁 smile").peek()).toBe("😁");
    expect(Input.of("").peek()).toBeUndefined();
  });

  it("takes a predicate-bounded run", () => {
    const [run, rest] = Input.of("ab1c").takeWhile((ch) => /[a-z]/.test(ch));
    expect(run).toBe("ab");
    expect(rest.rest).toBe("1c");
  });

  it("takes astral characters whole", () => {
    const [run, rest] = Input.of("😁😁x").takeWhile((ch) => ch === "😁");
    expect(run).toBe("😁😁");
    expect(rest.offset).toBe(4);
    expect(rest.rest).toBe("x");
  });

  it("reports the text consumed between two views", () => {
    const start = Input.of("hello");
    const later = start.advance(3);
    expect(later.consumedSince(start)).toBe("hel");
    expect(() => start.consumedSince(later)).toThrow(RangeError);
    expect(() => later.consumedSince(Input.of("other"))).toThrow(RangeError);
  });

  it("compares by source and offset", () => {
    expect(Input.of("x").equals(Input.of("x"))).toBe(true);
    expect(Input.of("xy").equals(Input.of("xy").advance(1))).toBe(false);
  });

  it("reconstructs the source from consumed prefix and remainder", () => {
    const view = Input.of("<a><b>").advance(3);
    expect(view.source.slice(0, view.offset) + view.rest).toBe("<a><b>");
  });

  it("locates itself by line and column", () => {
    const view = Input.of("a\nbc").advance(3);
    expect(view.location()).toEqual({ offset: 3, line: 2, column: 2 });
    expect(String(view)).toBe("Input(2:2)");
  });

  it("knows where characters begin and end", () => {
    const view = Input.of("a😁b");
    expect(view.isBoundary(0)).toBe(true);
    expect(view.isBoundary(1)).toBe(true);
    expect(view.isBoundary(2)).toBe(false);
    expect(view.isBoundary(3)).toBe(true);
    expect(view.advance(1).isBoundary(1)).toBe(false);
  });
});
