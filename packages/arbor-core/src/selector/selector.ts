/**
 * Parsed CSS selectors and matching
 *
 * A selector is a chain of sequences of simple selectors separated by
 * combinators. It is held as a cons list in right-to-left order: each
 * Selector is one sequence, with the combinator that joins it to the
 * `previous` sequence.
 *
 * `main#main p.important > a.term[href]` is held as:
 *
 *   ">" tag=a classes=[term] attrs=[[href]]
 *     -> " " tag=p classes=[important]
 *       -> tag=main id=main
 *
 * Supported (selectors level 3): type, universal, class, ID and attribute
 * selectors, and the four combinators. Pseudo-classes, pseudo-elements and
 * namespace prefixes are not supported.
 */

import type { Node } from '../tree/node.js';

/**
 * Combinators between two sequences of simple selectors
 */
export enum Combinator {
  Descendant = ' ',
  Child = '>',
  NextSibling = '+',
  SubsequentSibling = '~',
}

/**
 * Attribute selector operators
 */
export enum AttributeOperator {
  Exists = '',
  Equal = '=',
  Includes = '~=',
  DashMatch = '|=',
  Prefix = '^=',
  Suffix = '$=',
  Substring = '*=',
}

const IDENTIFIER = /^[\w-]+$/;

function assertNever(value: never, what: string): never {
  throw new Error(`unimplemented ${what}: ${String(value)}`);
}

/**
 * Attribute selector: `[name]`, `[name=value]`, `[name~=value]`, ...
 *
 * Names are case-insensitive, values are case-sensitive.
 */
export class AttributeSelector {
  readonly name: string;

  constructor(
    name: string,
    public readonly operator: AttributeOperator,
    public readonly value: string | null = null,
  ) {
    this.name = name.toLowerCase();
  }

  matches(node: Node): boolean {
    const actual = node.attr(this.name);
    if (actual === null) return false;

    const expected = this.value ?? '';
    switch (this.operator) {
      case AttributeOperator.Exists:
        return true;
      case AttributeOperator.Equal:
        return actual === expected;
      case AttributeOperator.Includes:
        return actual.split(/\s+/).filter(token => token.length > 0).includes(expected);
      case AttributeOperator.DashMatch:
        return actual === expected || actual.startsWith(`${expected}-`);
      case AttributeOperator.Prefix:
        return expected !== '' && actual.startsWith(expected);
      case AttributeOperator.Suffix:
        return expected !== '' && actual.endsWith(expected);
      case AttributeOperator.Substring:
        return expected !== '' && actual.includes(expected);
      default:
        return assertNever(this.operator, 'attribute operator');
    }
  }

  toString(): string {
    if (this.operator === AttributeOperator.Exists) {
      return `[${this.name}]`;
    }
    return `[${this.name}${this.operator}${formatValue(this.value ?? '')}]`;
  }
}

// Identifiers go out bare, anything else double-quoted
function formatValue(value: string): string {
  if (IDENTIFIER.test(value)) return value;
  return `"${value.replace(/"/g, '\\"')}"`;
}

export interface SelectorInit {
  tag?: string | null;
  classes?: string[];
  id?: string | null;
  attrs?: AttributeSelector[];
  combinator?: Combinator | null;
  previous?: Selector | null;
}

/**
 * One sequence of simple selectors, linked to the sequences on its left.
 */
export class Selector {
  /** Type selector, lowercased; `null` for universal */
  readonly tag: string | null;
  readonly classes: readonly string[];
  readonly id: string | null;
  readonly attrs: readonly AttributeSelector[];
  /** Combinator joining `previous` to this sequence */
  readonly combinator: Combinator | null;
  readonly previous: Selector | null;

  constructor(init: SelectorInit = {}) {
    this.tag = init.tag ? init.tag.toLowerCase() : null;
    this.classes = [...(init.classes ?? [])];
    this.id = init.id ?? null;
    this.attrs = [...(init.attrs ?? [])];
    this.previous = init.previous ?? null;
    this.combinator = this.previous ? init.combinator ?? Combinator.Descendant : null;
  }

  /**
   * Whether the selector matches `node`.
   *
   * Every sequence in the chain must match. If `root` is given, parent and
   * ancestor lookups stop at `root`. Text nodes go through the same checks,
   * so they match only sequences without tag, ID, class or attribute.
   */
  matches(node: Node, root: Node | null = null): boolean {
    if (!this.matchesSequence(node)) {
      return false;
    }

    const previous = this.previous;
    if (!previous) return true;

    const combinator = this.combinator ?? Combinator.Descendant;
    switch (combinator) {
      case Combinator.Descendant:
        if (node === root) return false;
        // Sibling lookups pass root down to nodes it is not above; those
        // walk up to the top of the tree.
        for (const ancestor of node.ancestors()) {
          if (previous.matches(ancestor, root)) return true;
          if (ancestor === root) break;
        }
        return false;

      case Combinator.Child: {
        const parent = node.parent;
        if (node === root || !parent) return false;
        return previous.matches(parent, root);
      }

      case Combinator.NextSibling: {
        const sibling = node.previousElementSibling();
        if (!sibling) return false;
        return previous.matches(sibling, root);
      }

      case Combinator.SubsequentSibling:
        // The sibling scan is not bounded by root; only the lookups made
        // by `previous` are.
        return node.previousSiblings().some(
          sibling => sibling.isElement() && previous.matches(sibling, root),
        );

      default:
        return assertNever(combinator, 'combinator');
    }
  }

  private matchesSequence(node: Node): boolean {
    if (this.tag && node.tag !== this.tag) return false;
    if (this.id && node.attr('id') !== this.id) return false;
    if (this.classes.length > 0) {
      const classes = node.classes;
      if (!this.classes.every(name => classes.includes(name))) return false;
    }
    return this.attrs.every(attr => attr.matches(node));
  }

  toString(): string {
    let text = this.sequenceString();
    let sequence: Selector = this;
    while (sequence.previous) {
      text = `${sequence.previous.sequenceString()}${combinatorString(sequence.combinator)}${text}`;
      sequence = sequence.previous;
    }
    return text;
  }

  // A single sequence, without combinator
  private sequenceString(): string {
    let text = this.tag ?? '';
    text += this.classes.map(name => `.${name}`).join('');
    if (this.id) text += `#${this.id}`;
    text += this.attrs.map(attr => attr.toString()).join('');
    return text || '*';
  }
}

function combinatorString(combinator: Combinator | null): string {
  switch (combinator ?? Combinator.Descendant) {
    case Combinator.Descendant:
      return ' ';
    case Combinator.Child:
      return ' > ';
    case Combinator.NextSibling:
      return ' + ';
    case Combinator.SubsequentSibling:
      return ' ~ ';
  }
}

/**
 * Comma-separated group of selectors; matches when any member matches.
 */
export class SelectorGroup implements Iterable<Selector> {
  readonly selectors: readonly Selector[];

  constructor(selectors: Iterable<Selector>) {
    this.selectors = [...selectors];
  }

  get length(): number {
    return this.selectors.length;
  }

  at(index: number): Selector | undefined {
    return this.selectors.at(index);
  }

  [Symbol.iterator](): Iterator<Selector> {
    return this.selectors[Symbol.iterator]();
  }

  /**
   * Whether any selector of the group matches `node`. If `root` is given,
   * parent and ancestor lookups stop at `root`.
   */
  matches(node: Node, root: Node | null = null): boolean {
    return this.selectors.some(selector => selector.matches(node, root));
  }

  toString(): string {
    return this.selectors.map(selector => selector.toString()).join(', ');
  }
}
