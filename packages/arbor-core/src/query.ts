/**
 * Query façade: selecting and matching nodes with selector text or parsed
 * selectors.
 */

import { parseSelectorGroup } from './selector/parser.js';
import { Selector, SelectorGroup } from './selector/selector.js';
import type { Node } from './tree/node.js';

/** Selector text, a parsed selector, or a parsed group */
export type SelectorLike = string | Selector | SelectorGroup;

/**
 * Parse selector text once; a lone Selector is wrapped in a group.
 */
export function normalizeSelector(selector: SelectorLike): SelectorGroup {
  if (typeof selector === 'string') {
    return parseSelectorGroup(selector);
  }
  if (selector instanceof Selector) {
    return new SelectorGroup([selector]);
  }
  return selector;
}

/**
 * Descendants of `node` matched by `selector`, in document order.
 * `node` itself is never included; matching looks no higher than `node`.
 */
export function selectAll(node: Node, selector: SelectorLike): Node[] {
  const group = normalizeSelector(selector);
  const matches: Node[] = [];
  for (const descendant of node.descendants()) {
    if (group.matches(descendant, node)) {
      matches.push(descendant);
    }
  }
  return matches;
}

/**
 * First descendant of `node` matched by `selector`, or `null`.
 */
export function select(node: Node, selector: SelectorLike): Node | null {
  const group = normalizeSelector(selector);
  for (const descendant of node.descendants()) {
    if (group.matches(descendant, node)) {
      return descendant;
    }
  }
  return null;
}

export function matchedBy(node: Node, selector: SelectorLike, root: Node | null = null): boolean {
  return normalizeSelector(selector).matches(node, root);
}
