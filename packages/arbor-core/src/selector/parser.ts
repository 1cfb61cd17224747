/**
 * Selector Parser
 *
 * Parses selector text into Selector chains. The grammar loosely follows
 * selectors level 3 and favours simple scanning over strictness, so some
 * invalid selectors are accepted (e.g. `*div`) and some exotic valid ones
 * are rejected.
 *
 * Simplifications:
 * - whitespace is the ASCII set (space, tab, LF, CR, FF, VT)
 * - identifiers are `[A-Za-z0-9_-]+`
 * - attribute values are identifiers or quoted strings; inside a string only
 *   the quote character itself may be escaped (`\'` or `\"`), any other
 *   backslash is kept as is
 */

import { SelectorSyntaxError } from '../errors.js';
import {
  AttributeOperator,
  AttributeSelector,
  Combinator,
  Selector,
  SelectorGroup,
} from './selector.js';

/**
 * What was found after a simple selector: a combinator, the end of the
 * selector (end of input or a comma), or nothing (the sequence goes on)
 */
type Boundary = Combinator | 'end' | null;

const COMBINATOR_SYMBOLS: Record<string, Combinator> = {
  '>': Combinator.Child,
  '+': Combinator.NextSibling,
  '~': Combinator.SubsequentSibling,
};

const OPERATOR_PREFIXES: Record<string, AttributeOperator> = {
  '~': AttributeOperator.Includes,
  '|': AttributeOperator.DashMatch,
  '^': AttributeOperator.Prefix,
  '$': AttributeOperator.Suffix,
  '*': AttributeOperator.Substring,
};

export interface ParsedSelector {
  selector: Selector;
  /** Offset just past the selector's trailing comma, or the end of input */
  cursor: number;
}

export class SelectorParser {
  private pos: number;

  constructor(private readonly input: string, cursor: number = 0) {
    this.pos = cursor;
  }

  get cursor(): number {
    return this.pos;
  }

  /**
   * Parse the rest of the input as a comma-separated group
   */
  parseGroup(): SelectorGroup {
    const selectors: Selector[] = [];
    while (!this.isAtEnd()) {
      selectors.push(this.parseSelector());
    }
    if (selectors.length === 0) {
      throw this.error('selector group is empty');
    }
    return new SelectorGroup(selectors);
  }

  /**
   * Parse one selector, up to and including a comma, or to the end of input
   */
  parseSelector(): Selector {
    let tag: string | null = null;
    let classes: string[] = [];
    let id: string | null = null;
    let attrs: AttributeSelector[] = [];

    let selector: Selector | null = null;
    let previousCombinator: Combinator | null = null;

    this.skipWhitespace();

    while (!this.isAtEnd()) {
      // One simple selector
      const c = this.peek();
      if (this.isIdentifierChar(c)) {
        if (tag) {
          throw this.error('multiple type selectors found');
        }
        tag = this.readIdentifier();
      } else if (c === '*') {
        this.advance();
      } else if (c === '[') {
        attrs.push(this.parseAttributeSelector());
      } else if (c === '.' && this.isIdentifierChar(this.peekAhead(1))) {
        this.advance();
        classes.push(this.readIdentifier());
      } else if (c === '#' && this.isIdentifierChar(this.peekAhead(1))) {
        if (id) {
          throw this.error('multiple id selectors found');
        }
        this.advance();
        id = this.readIdentifier();
      } else if (c === ':' && this.isIdentifierChar(this.peekAhead(1))) {
        throw this.error('pseudo-classes not supported');
      } else if (c === ':' && this.peekAhead(1) === ':' && this.isIdentifierChar(this.peekAhead(2))) {
        throw this.error('pseudo-elements not supported');
      } else {
        throw this.error('expecting simple selector, found none');
      }

      const boundary = this.parseBoundary();
      if (boundary === null) {
        continue;
      }
      if (boundary !== 'end' && this.isAtEnd()) {
        throw this.error('unexpected end at combinator');
      }

      selector = new Selector({
        tag,
        classes,
        id,
        attrs,
        combinator: previousCombinator,
        previous: selector,
      });

      if (boundary === 'end') {
        break;
      }

      previousCombinator = boundary;
      tag = null;
      classes = [];
      id = null;
      attrs = [];
    }

    if (!selector) {
      throw this.error('selector is empty');
    }
    return selector;
  }

  /**
   * Combinators are tried before the end of the selector, and the
   * descendant combinator last: its whitespace is a prefix of all the
   * others.
   */
  private parseBoundary(): Boundary {
    const start = this.pos;
    this.skipWhitespace();

    const combinator = COMBINATOR_SYMBOLS[this.peek()];
    if (combinator) {
      this.advance();
      this.skipWhitespace();
      return combinator;
    }

    if (this.isAtEnd()) {
      return 'end';
    }
    if (this.peek() === ',') {
      this.advance();
      return 'end';
    }

    return this.pos > start ? Combinator.Descendant : null;
  }

  private parseAttributeSelector(): AttributeSelector {
    const start = this.pos;
    const attribute = this.matchAttributeSelector();
    if (!attribute) {
      this.pos = start;
      throw this.error('malformed attribute selector');
    }
    return attribute;
  }

  /**
   * `[ name ]` or `[ name op value ]`; null when the text does not form an
   * attribute selector
   */
  private matchAttributeSelector(): AttributeSelector | null {
    this.advance(); // '['
    this.skipWhitespace();

    if (!this.isIdentifierChar(this.peek())) return null;
    const name = this.readIdentifier();
    this.skipWhitespace();

    if (this.peek() === ']') {
      this.advance();
      return new AttributeSelector(name, AttributeOperator.Exists);
    }

    const operator = this.readAttributeOperator();
    if (operator === null) return null;
    this.skipWhitespace();

    const c = this.peek();
    if (this.isIdentifierChar(c)) {
      const value = this.readIdentifier();
      this.skipWhitespace();
      if (this.peek() !== ']') return null;
      this.advance();
      return new AttributeSelector(name, operator, value);
    }

    if (c === '"' || c === "'") {
      const value = this.readQuotedValue(c);
      if (value === null) return null;
      return new AttributeSelector(name, operator, value);
    }

    return null;
  }

  private readAttributeOperator(): AttributeOperator | null {
    const c = this.peek();
    if (c === '=') {
      this.advance();
      return AttributeOperator.Equal;
    }
    const operator = OPERATOR_PREFIXES[c];
    if (operator && this.peekAhead(1) === '=') {
      this.advance();
      this.advance();
      return operator;
    }
    return null;
  }

  /**
   * Quoted value followed by `]`. The closing quote is the first unescaped
   * quote that is followed by optional whitespace and `]`; strings do not
   * span lines.
   */
  private readQuotedValue(quote: string): string | null {
    const open = this.pos;

    for (let close = open + 1; close < this.input.length; close++) {
      const c = this.input[close];
      if (c === '\n') return null;
      if (c !== quote || this.input[close - 1] === '\\') continue;

      let after = close + 1;
      while (after < this.input.length && this.isWhitespace(this.input[after])) {
        after++;
      }
      if (this.input[after] === ']') {
        this.pos = after + 1;
        return this.input.slice(open + 1, close).replaceAll(`\\${quote}`, quote);
      }
    }

    return null;
  }

  // ============ Scanner helpers ============

  private readIdentifier(): string {
    const start = this.pos;
    while (this.isIdentifierChar(this.peek())) {
      this.advance();
    }
    return this.input.substring(start, this.pos);
  }

  private skipWhitespace(): void {
    while (this.isWhitespace(this.peek())) {
      this.advance();
    }
  }

  private isWhitespace(c: string): boolean {
    return c === ' ' || c === '\t' || c === '\n' || c === '\r' || c === '\f' || c === '\v';
  }

  private isIdentifierChar(c: string): boolean {
    return (c >= 'a' && c <= 'z')
      || (c >= 'A' && c <= 'Z')
      || (c >= '0' && c <= '9')
      || c === '_'
      || c === '-';
  }

  private isAtEnd(): boolean {
    return this.pos >= this.input.length;
  }

  private peek(): string {
    if (this.isAtEnd()) return '\0';
    return this.input[this.pos];
  }

  private peekAhead(n: number): string {
    if (this.pos + n >= this.input.length) return '\0';
    return this.input[this.pos + n];
  }

  private advance(): string {
    return this.input[this.pos++];
  }

  private error(reason: string): SelectorSyntaxError {
    return new SelectorSyntaxError(this.input, this.pos, reason);
  }
}

/**
 * Parse a comma-separated group of selectors.
 * Throws SelectorSyntaxError on invalid input.
 */
export function parseSelectorGroup(text: string): SelectorGroup {
  return new SelectorParser(text).parseGroup();
}

/**
 * Parse one selector of a group, starting at `cursor`. The returned cursor
 * is past the selector's trailing comma, or at the end of `text`.
 */
export function parseSelector(text: string, cursor: number = 0): ParsedSelector {
  const parser = new SelectorParser(text, cursor);
  const selector = parser.parseSelector();
  return { selector, cursor: parser.cursor };
}
