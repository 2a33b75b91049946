import { describe, it, expect } from "vitest";
import {
  Input,
  literal,
  identifier,
  charEquals,
  satisfy,
  anyChar,
  whitespaceChar,
  eof,
} from "../index.js";
import { view } from "./helpers.js";

// ---------------------------------------------------------------------------
// literal
// ---------------------------------------------------------------------------

describe("literal", () => {
  it("matches an exact prefix", () => {
    expect(view(literal("<").parse("<demo-id>"))).toEqual({
      ok: true,
      value: "<",
      rest: "demo-id>",
    });
  });

  it("matches multi-unit characters whole", () => {
    expect(view(literal("😁").parse("😁 smile"))).toEqual({
      ok: true,
      value: "😁",
      rest: " smile",
    });
  });

  it("refuses to split a surrogate pair", () => {
    expect(view(literal("\uD83D").parse("😁 smile"))).toEqual({
      ok: false,
      at: "😁 smile",
      expected: '"\\ud83d"',
    });
  });

  it("is case-sensitive", () => {
    expect(literal("abc").parse("ABC").ok).toBe(false);
  });

  it("fails without consuming on a short input", () => {
    expect(view(literal("hello").parse("hel"))).toEqual({
      ok: false,
      at: "hel",
      expected: '"hello"',
    });
  });

  it("returns the very input it was given on failure", () => {
    const input = Input.of("world");
    const r = literal("hello").parse(input);
    expect(r.ok).toBe(false);
    if (!r.ok) expect(r.at).toBe(input);
  });

  it("matches the empty string without consuming", () => {
    expect(view(literal("").parse("abc"))).toEqual({ ok: true, value: "", rest: "abc" });
  });
});

// ---------------------------------------------------------------------------
// identifier
// ---------------------------------------------------------------------------

describe("identifier", () => {
  it("matches letters and hyphens", () => {
    expect(view(identifier.parse("demo-id>"))).toEqual({
      ok: true,
      value: "demo-id",
      rest: ">",
    });
  });

  it("stops at digits without failing", () => {
    expect(view(identifier.parse("abc123"))).toEqual({ ok: true, value: "abc", rest: "123" });
  });

  it("keeps repeated hyphens", () => {
    expect(view(identifier.parse("a--b c"))).toEqual({ ok: true, value: "a--b", rest: " c" });
  });

  it("accepts non-ASCII letters", () => {
    expect(view(identifier.parse("élan-vital!"))).toEqual({
      ok: true,
      value: "élan-vital",
      rest: "!",
    });
  });

  it("requires an alphabetic first character", () => {
    expect(view(identifier.parse("-abc"))).toEqual({ ok: false, at: "-abc", expected: "identifier" });
    expect(view(identifier.parse("1abc"))).toEqual({ ok: false, at: "1abc", expected: "identifier" });
  });

  it("fails on empty input", () => {
    expect(view(identifier.parse(""))).toEqual({ ok: false, at: "", expected: "identifier" });
  });
});

// ---------------------------------------------------------------------------
// charEquals
// ---------------------------------------------------------------------------

describe("charEquals", () => {
  it("consumes one code point", () => {
    expect(view(charEquals("😁").parse("😁 smile"))).toEqual({
      ok: true,
      value: undefined,
      rest: " smile",
    });
  });

  it("fails on a different character", () => {
    expect(view(charEquals("x").parse("yx"))).toEqual({ ok: false, at: "yx", expected: '"x"' });
  });

  it("fails on empty input", () => {
    expect(view(charEquals("a").parse(""))).toEqual({ ok: false, at: "", expected: '"a"' });
  });

  it("rejects anything but a single character", () => {
    expect(() => charEquals("ab")).toThrow(RangeError);
    expect(() => charEquals("")).toThrow(RangeError);
  });
});

// ---------------------------------------------------------------------------
// Character classes
// ---------------------------------------------------------------------------

describe("satisfy", () => {
  it("matches a character meeting the predicate", () => {
    const digit = satisfy((ch) => ch >= "0" && ch <= "9", "digit");
    expect(view(digit.parse("7a"))).toEqual({ ok: true, value: "7", rest: "a" });
    expect(view(digit.parse("a7"))).toEqual({ ok: false, at: "a7", expected: "digit" });
  });
});

describe("anyChar", () => {
  it("matches any single code point", () => {
    expect(view(anyChar.parse("😁x"))).toEqual({ ok: true, value: "😁", rest: "x" });
  });

  it("fails at end of input", () => {
    expect(view(anyChar.parse(""))).toEqual({ ok: false, at: "", expected: "any character" });
  });
});

describe("whitespaceChar", () => {
  it("matches whitespace", () => {
    expect(view(whitespaceChar.parse("\tx"))).toEqual({ ok: true, value: "\t", rest: "x" });
  });

  it("rejects other characters", () => {
    expect(view(whitespaceChar.parse("x"))).toEqual({ ok: false, at: "x", expected: "whitespace" });
  });
});

describe("eof", () => {
  it("succeeds only at end of input", () => {
    expect(view(eof.parse(""))).toEqual({ ok: true, value: null, rest: "" });
    expect(view(eof.parse("a"))).toEqual({ ok: false, at: "a", expected: "end of input" });
  });
});
