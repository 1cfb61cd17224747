/**
 * The query behind `arbor <selector>`: parse the document, collect matches,
 * and render them as output lines.
 */

import { matchedBy, normalizeSelector, parseHtml, selectAll } from 'arbor-core';
import type { Node } from 'arbor-core';

export interface QueryOptions {
  /** Print text content instead of HTML */
  text?: boolean;
  /** Stop after the first match */
  first?: boolean;
  /** Print the number of matches only */
  count?: boolean;
}

/**
 * Nodes of `html` matched by `selector`: the root element itself when it
 * matches, then its matching descendants in document order.
 */
export function findMatches(html: string, selector: string): Node[] {
  const group = normalizeSelector(selector);
  const root = parseHtml(html);
  const matches = selectAll(root, group);
  if (matchedBy(root, group, root)) {
    matches.unshift(root);
  }
  return matches;
}

/**
 * Output lines for a query
 */
export function runQuery(html: string, selector: string, options: QueryOptions = {}): string[] {
  let matches = findMatches(html, selector);
  if (options.first) {
    matches = matches.slice(0, 1);
  }
  if (options.count) {
    return [String(matches.length)];
  }
  return matches.map(node => (options.text ? node.text : node.html));
}
