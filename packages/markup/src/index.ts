/**
 * @tagweave/markup
 *
 * A grammar for tag-delimited markup (`<name key="value">children</name>` and
 * `<name key="value"/>`), built on @tagweave/parser.
 *
 * @module
 */

export type { Attribute, Element } from "./types.js";

export {
  attributePair,
  attributes,
  singleElement,
  openElement,
  closeElement,
  parentElement,
  element,
  parseElement,
  parseDocument,
} from "./grammar.js";

export { elementToString, getAttribute, findAll } from "./tree.js";
