/**
 * Tree types produced by the markup grammar.
 */

/** A `key="value"` pair. */
export type Attribute = [key: string, value: string];

/**
 * One element of a markup document. Attribute and child order is document
 * order; attribute keys may repeat.
 */
export interface Element {
  name: string;
  attributes: Attribute[];
  children: Element[];
}
