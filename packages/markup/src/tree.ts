/**
 * Helpers over parsed element trees.
 */

import { invariant } from "@tagweave/core";
import type { Element } from "./types.js";

/**
 * Serialize an element back to markup. Childless elements use the
 * self-closing form, so the output parses back to an equal tree.
 */
export function elementToString(el: Element): string {
  let attrs = "";
  for (const [key, value] of el.attributes) {
    invariant(!value.includes('"'), `Attribute ${key} contains a double quote`);
    attrs += ` ${key}="${value}"`;
  }
  if (el.children.length === 0) {
    return `<${el.name}${attrs}/>`;
  }
  return `<${el.name}${attrs}>${el.children.map(elementToString).join("")}</${el.name}>`;
}

/** First value of the attribute `key`, or `undefined`. */
export function getAttribute(el: Element, key: string): string | undefined {
  return el.attributes.find(([k]) => k === key)?.[1];
}

/** Every element named `name` in the tree, root included, in document order. */
export function findAll(root: Element, name: string): Element[] {
  const found: Element[] = [];
  const visit = (el: Element): void => {
    if (el.name === name) found.push(el);
    el.children.forEach(visit);
  };
  visit(root);
  return found;
}
