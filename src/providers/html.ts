// pattern: Functional Core

import { parseHTML } from "linkedom";

/**
 * The slice of the DOM element surface the scrapers read.
 */
export type ElementLike = {
  readonly textContent: string | null;
  getAttribute(name: string): string | null;
  querySelector(selector: string): ElementLike | null;
  querySelectorAll(selector: string): ArrayLike<ElementLike>;
};

/**
 * The parsed document root: queryable like an element, but without attributes.
 */
export type DocumentLike = Omit<ElementLike, "getAttribute">;

export function parseDocument(html: string): DocumentLike {
  const { document } = parseHTML(html);
  return document;
}

export function selectAll(root: DocumentLike, selector: string): Array<ElementLike> {
  return Array.from(root.querySelectorAll(selector));
}
