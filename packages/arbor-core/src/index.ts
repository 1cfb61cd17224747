/**
 * Arbor Core - HTML document tree with a CSS selector engine
 *
 * This is the core library containing:
 * - Tree model and navigation primitives
 * - Tree builder and HTML front end
 * - Selector parser and matcher
 * - Query façade
 */

export { NodeType, BaseNode, ElementNode, TextNode } from './tree/node.js';
export type { Node } from './tree/node.js';
export { TreeBuilder } from './tree/builder.js';
export type { Attribute, TreeEvent } from './tree/builder.js';
export { LineIndex, parseHtml, tokenizeHtml } from './tree/html.js';
export { isVoidElement } from './tree/void-elements.js';

// Selectors
export {
  AttributeOperator,
  AttributeSelector,
  Combinator,
  Selector,
  SelectorGroup,
} from './selector/selector.js';
export type { SelectorInit } from './selector/selector.js';
export { SelectorParser, parseSelector, parseSelectorGroup } from './selector/parser.js';
export type { ParsedSelector } from './selector/parser.js';
export { matchedBy, normalizeSelector, select, selectAll } from './query.js';
export type { SelectorLike } from './query.js';

export { NavigationError, SelectorSyntaxError, TreeBuilderError } from './errors.js';
export type { SourcePosition } from './errors.js';
