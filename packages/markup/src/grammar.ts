/**
 * Element grammar
 *
 * ```
 * element       = ws (singleElement | parentElement) ws
 * singleElement = "<" identifier attributes ws "/>"
 * parentElement = "<" identifier attributes ws ">" element* ws "</" identifier ">"
 * attributes    = (ws+ identifier "=" quotedString)*
 * ```
 *
 * The closing tag of a parent must repeat the opening tag's name.
 */

import { createLogger } from "@tagweave/core";
import {
  type Parser,
  type ParseOutcome,
  literal,
  identifier,
  pair,
  left,
  right,
  map,
  pred,
  andThen,
  either,
  zeroOrMore,
  traced,
  space0,
  space1,
  whitespaceWrap,
  quotedString,
} from "@tagweave/parser";
import type { Attribute, Element } from "./types.js";

const log = createLogger("markup");

/** `key="value"` */
export const attributePair: Parser<Attribute> = pair(identifier, right(literal("="), quotedString));

/** Attributes, each preceded by at least one whitespace character. */
export const attributes: Parser<Attribute[]> = zeroOrMore(right(space1, attributePair));

const elementStart: Parser<[string, Attribute[]]> = right(
  literal("<"),
  pair(identifier, attributes)
);

function toElement([name, attrs]: [string, Attribute[]]): Element {
  return { name, attributes: attrs, children: [] };
}

/** `<name attrs/>` */
export const singleElement: Parser<Element> = map(
  left(elementStart, right(space0, literal("/>"))),
  toElement
);

/** `<name attrs>`, producing an element with no children yet. */
export const openElement: Parser<Element> = map(
  left(elementStart, right(space0, literal(">"))),
  toElement
);

/** `</name>` for exactly the given name. */
export function closeElement(name: string): Parser<string> {
  return pred(
    right(literal("</"), left(identifier, literal(">"))),
    (closing) => closing === name,
    `closing tag </${name}>`
  );
}

/**
 * An opening tag, its children, and the matching closing tag.
 *
 * Children are collected until one fails to parse, and that failure is not
 * kept. A broken child therefore shows up as this element's closing tag
 * failing where the child began: `<a><b></c></a>` fails at `<b>` expecting
 * `"</"`, not at `</c>`.
 */
export const parentElement: Parser<Element> = andThen(openElement, (el) =>
  map(
    left(zeroOrMore(element), right(space0, closeElement(el.name))),
    (children): Element => ({ ...el, children })
  )
);

/** Any element, with surrounding whitespace skipped. */
export const element: Parser<Element> = traced(
  "element",
  whitespaceWrap(either(singleElement, parentElement)),
  log
);

/** Parse one element from the start of `text`; leftover text is allowed. */
export function parseElement(text: string): ParseOutcome<Element> {
  return element.parse(text);
}

/**
 * Parse a whole document consisting of a single root element.
 *
 * @throws ParseError when the text is not exactly one element
 */
export function parseDocument(text: string): Element {
  return element.parseAll(text);
}
