/**
 * Flattened, document-order view of parsed markup
 *
 * The listing page has no container per entry, so the extractor works on
 * positions: every node gets an index in pre-order (the order a reader
 * meets opening tags and text), and neighbor searches move an index back
 * and forth instead of following parent/sibling pointers.
 */

import * as cheerio from "cheerio";
import { hasChildren, isTag, isText } from "domhandler";
import type { AnyNode, Element } from "domhandler";

export type FlatDocument = {
  /** Every node of the document in pre-order */
  readonly nodes: readonly AnyNode[];
  /** Indexes into `nodes` of every anchor element, ascending */
  readonly anchorPositions: readonly number[];
};

/**
 * List the given nodes and all their descendants in pre-order
 */
function collectPreOrder(roots: readonly AnyNode[]): AnyNode[] {
  const ordered: AnyNode[] = [];
  const pending: AnyNode[] = [...roots].reverse();

  let node = pending.pop();
  while (node) {
    ordered.push(node);
    if (hasChildren(node)) {
      for (let i = node.children.length - 1; i >= 0; i--) {
        pending.push(node.children[i]);
      }
    }
    node = pending.pop();
  }

  return ordered;
}

/**
 * Check whether a node is an element with the given (lowercase) tag name
 */
export function isElementNamed(
  node: AnyNode,
  tagName: string,
): node is Element {
  return isTag(node) && node.name === tagName;
}

/**
 * Parse HTML and flatten it, recording where each anchor element sits
 *
 * @param html - Raw page markup
 * @param anchorTag - Tag name that starts an entry (e.g. "h3")
 */
export function flattenDocument(html: string, anchorTag: string): FlatDocument {
  // Scripting off: <noscript> children become elements (lazy-loaded logos)
  const $ = cheerio.load(html, { scriptingEnabled: false });
  const root = $.root().get(0);
  if (!root) {
    return { nodes: [], anchorPositions: [] };
  }

  const nodes = collectPreOrder(root.children);
  const anchorPositions: number[] = [];
  nodes.forEach((node, index) => {
    if (isElementNamed(node, anchorTag)) {
      anchorPositions.push(index);
    }
  });

  return { nodes, anchorPositions };
}

/**
 * Visible text of an element: each descendant text node trimmed, empty
 * pieces dropped, the rest joined by single spaces
 *
 * @example
 * // <h3> Acme <br> GmbH </h3>
 * readElementText(h3) // "Acme GmbH"
 */
export function readElementText(element: Element): string {
  const pieces: string[] = [];
  for (const node of collectPreOrder(element.children)) {
    if (!isText(node)) {
      continue;
    }
    const piece = node.data.trim();
    if (piece) {
      pieces.push(piece);
    }
  }
  return pieces.join(" ");
}
