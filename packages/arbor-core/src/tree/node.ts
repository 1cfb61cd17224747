/**
 * Document tree model
 *
 * A tree is made of two node kinds only: elements and text. Both share the
 * same capability set (tag, attributes, parent, children) and the same
 * navigation primitives, so code that walks the tree can just call methods
 * and branch on `nodeType` only when it needs the variant.
 *
 * Ownership runs downwards: an element owns its children. `parent` is a
 * back reference used for upward navigation only.
 *
 * Tag and attribute names are case-insensitive (stored lowercased);
 * attribute values and text are case-sensitive.
 *
 * Selecting:
 *   const root = parseHtml(html);
 *   root.selectAll('table#primary tr.highlight + tr > td');
 *   root.select('a[href^="/docs"]')?.attr('title');
 */

import { escapeUTF8 } from 'entities';
import { NavigationError } from '../errors.js';
import * as query from '../query.js';
import type { SelectorLike } from '../query.js';
import { isVoidElement } from './void-elements.js';

/**
 * Node kinds. The set is closed: every node is either an element or text.
 */
export enum NodeType {
  Element = 'element',
  Text = 'text',
}

export type Node = ElementNode | TextNode;

const NO_CHILDREN: readonly Node[] = Object.freeze([]);
const NO_ATTRIBUTES: ReadonlyMap<string, string> = new Map();

/**
 * Capabilities shared by element and text nodes
 */
export abstract class BaseNode {
  abstract readonly nodeType: NodeType;

  /** Lowercased tag name, `null` for text */
  abstract readonly tag: string | null;

  /** Attributes keyed by lowercased name, in source order */
  abstract readonly attrs: ReadonlyMap<string, string>;

  abstract readonly children: readonly Node[];

  private parentNode: ElementNode | null = null;

  /** Owning element, `null` for a root */
  get parent(): ElementNode | null {
    return this.parentNode;
  }

  /**
   * Attach this node below `parent`.
   *
   * @internal Only ElementNode calls this, while taking ownership of its
   * children. A node can be attached once.
   */
  attachTo(parent: ElementNode): void {
    if (this.parentNode) {
      throw new NavigationError('node is already attached to a parent');
    }
    this.parentNode = parent;
  }

  isElement(): this is ElementNode {
    return this.nodeType === NodeType.Element;
  }

  isText(): this is TextNode {
    return this.nodeType === NodeType.Text;
  }

  // ============ Content ============

  /** Concatenation of all descendant text */
  abstract get text(): string;

  textContent(): string {
    return this.text;
  }

  /** Attribute value, or `null` if the attribute is absent */
  attr(name: string): string | null {
    return this.attrs.get(name.toLowerCase()) ?? null;
  }

  /** Whitespace-separated tokens of the `class` attribute */
  get classes(): string[] {
    return (this.attr('class') ?? '').split(/\s+/).filter(token => token.length > 0);
  }

  classList(): string[] {
    return this.classes;
  }

  // ============ Serialization ============

  /** HTML of the node itself (text nodes give their escaped text) */
  get html(): string {
    return this.toString();
  }

  outerHtml(): string {
    return this.html;
  }

  /** HTML of the node's children */
  innerHtml(): string {
    return this.children.map(child => child.html).join('');
  }

  abstract toString(): string;

  // ============ Children ============

  childNodes(): readonly Node[] {
    return this.children;
  }

  firstChild(): Node | null {
    return this.children[0] ?? null;
  }

  lastChild(): Node | null {
    return this.children[this.children.length - 1] ?? null;
  }

  firstElementChild(): ElementNode | null {
    for (const child of this.children) {
      if (child.isElement()) return child;
    }
    return null;
  }

  lastElementChild(): ElementNode | null {
    for (let i = this.children.length - 1; i >= 0; i--) {
      const child = this.children[i];
      if (child.isElement()) return child;
    }
    return null;
  }

  // ============ Siblings ============

  /**
   * Siblings after this node, in document order.
   * Empty for a root.
   */
  nextSiblings(): Node[] {
    const parent = this.parent;
    if (!parent) return [];
    return parent.children.slice(this.indexIn(parent) + 1);
  }

  /**
   * Siblings before this node, nearest first (the reverse of document
   * order). Empty for a root.
   */
  previousSiblings(): Node[] {
    const parent = this.parent;
    if (!parent) return [];
    return parent.children.slice(0, this.indexIn(parent)).reverse();
  }

  /** Not O(1): scans the parent's children on each call. */
  nextSibling(): Node | null {
    return this.nextSiblings()[0] ?? null;
  }

  /** Not O(1): scans the parent's children on each call. */
  nextElementSibling(): ElementNode | null {
    for (const sibling of this.nextSiblings()) {
      if (sibling.isElement()) return sibling;
    }
    return null;
  }

  /** Not O(1): scans the parent's children on each call. */
  previousSibling(): Node | null {
    return this.previousSiblings()[0] ?? null;
  }

  /** Not O(1): scans the parent's children on each call. */
  previousElementSibling(): ElementNode | null {
    for (const sibling of this.previousSiblings()) {
      if (sibling.isElement()) return sibling;
    }
    return null;
  }

  private indexIn(parent: ElementNode): number {
    const index = parent.children.findIndex(child => child === this);
    if (index < 0) {
      throw new NavigationError('node is not found in children of its parent');
    }
    return index;
  }

  // ============ Ancestors & descendants ============

  /**
   * Ancestors from the parent upwards.
   *
   * With `root`, the walk stops at `root`, which is yielded last; nothing is
   * yielded when this node is `root`. A `NavigationError` is thrown during
   * iteration if `root` is not in the ancestral chain.
   */
  *ancestors(root: Node | null = null): Generator<ElementNode, void, undefined> {
    if (this === root) return;
    let ancestor = this.parent;
    while (ancestor !== root) {
      if (!ancestor) {
        throw new NavigationError('provided root node not found in ancestral chain');
      }
      yield ancestor;
      ancestor = ancestor.parent;
    }
    if (ancestor) yield ancestor;
  }

  /**
   * Descendants in pre-order (each node right before its own subtree).
   * Every call walks the tree afresh.
   */
  *descendants(): Generator<Node, void, undefined> {
    for (const child of this.children) {
      yield child;
      yield* child.descendants();
    }
  }

  // ============ Selectors ============

  /** First descendant matched by `selector`, or `null` */
  select(this: Node, selector: SelectorLike): Node | null {
    return query.select(this, selector);
  }

  /** All descendants matched by `selector`, in document order */
  selectAll(this: Node, selector: SelectorLike): Node[] {
    return query.selectAll(this, selector);
  }

  querySelector(this: Node, selector: SelectorLike): Node | null {
    return query.select(this, selector);
  }

  querySelectorAll(this: Node, selector: SelectorLike): Node[] {
    return query.selectAll(this, selector);
  }

  /** Whether this node is matched by `selector`, looking no higher than `root` */
  matchedBy(this: Node, selector: SelectorLike, root: Node | null = null): boolean {
    return query.matchedBy(this, selector, root);
  }
}

/**
 * Element node
 *
 * Children are fixed at construction and attached to the new element.
 */
export class ElementNode extends BaseNode {
  readonly nodeType = NodeType.Element;
  readonly tag: string;
  readonly attrs: ReadonlyMap<string, string>;
  readonly children: readonly Node[];

  constructor(
    tag: string,
    attrs: Iterable<readonly [string, string]> = [],
    children: readonly Node[] = [],
  ) {
    super();
    this.tag = tag.toLowerCase();

    // Repeated names keep their first position and take the last value
    const normalized = new Map<string, string>();
    for (const [name, value] of attrs) {
      normalized.set(name.toLowerCase(), value);
    }
    this.attrs = normalized;

    this.children = children.length > 0 ? Object.freeze([...children]) : NO_CHILDREN;
    for (const child of this.children) {
      child.attachTo(this);
    }
  }

  get text(): string {
    return this.children.map(child => child.text).join('');
  }

  toString(): string {
    let html = `<${this.tag}`;
    for (const [name, value] of this.attrs) {
      html += ` ${name}="${escapeUTF8(value)}"`;
    }
    if (this.children.length > 0) {
      return `${html}>${this.innerHtml()}</${this.tag}>`;
    }
    return isVoidElement(this.tag) ? `${html}/>` : `${html}></${this.tag}>`;
  }
}

/**
 * Text node
 *
 * Two text nodes are the same only if they are the same object; compare
 * `text` for content.
 */
export class TextNode extends BaseNode {
  readonly nodeType = NodeType.Text;
  readonly tag = null;
  readonly attrs = NO_ATTRIBUTES;
  readonly children = NO_CHILDREN;

  constructor(public readonly data: string) {
    super();
  }

  get text(): string {
    return this.data;
  }

  /** Escaped text; use `text` for the raw content */
  toString(): string {
    return escapeUTF8(this.data);
  }
}
