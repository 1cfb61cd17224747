/**
 * Tree Builder
 *
 * Builds a node tree from start tag, end tag and text events. The builder
 * does no error recovery: any tag mismatch aborts the build with a
 * TreeBuilderError located at the offending event.
 *
 * Elements are built bottom-up. A start tag pushes an open frame; an end tag
 * pops the finished nodes above the topmost open frame and turns that frame
 * into an ElementNode owning them. Open/closed state lives only in the
 * builder's frames, never on public nodes.
 */

import { TreeBuilderError } from '../errors.js';
import type { SourcePosition } from '../errors.js';
import { ElementNode, TextNode } from './node.js';
import type { Node } from './node.js';
import { isVoidElement } from './void-elements.js';

export type Attribute = readonly [name: string, value: string];

export type TreeEvent =
  | { type: 'start-tag'; name: string; attrs: readonly Attribute[]; position?: SourcePosition }
  | { type: 'end-tag'; name: string; position?: SourcePosition }
  | { type: 'text'; data: string; position?: SourcePosition };

/**
 * An element whose end tag has not been seen yet
 */
class OpenFrame {
  constructor(
    readonly tag: string,
    readonly attrs: readonly Attribute[],
  ) {}
}

type StackEntry = OpenFrame | Node;

export class TreeBuilder {
  private stack: StackEntry[] = [];
  private position: SourcePosition = { line: 1, offset: 0 };

  startTag(name: string, attrs: readonly Attribute[] = [], position?: SourcePosition): void {
    this.locate(position);
    const tag = name.toLowerCase();
    this.trace(`open <${tag}>`);
    this.stack.push(new OpenFrame(tag, attrs));

    // <img> and <img/> give the same tree
    if (isVoidElement(tag)) {
      this.endTag(tag, position);
    }
  }

  endTag(name: string, position?: SourcePosition): void {
    this.locate(position);
    const tag = name.toLowerCase();

    const children: Node[] = [];
    let top = this.stack.pop();
    while (top && !(top instanceof OpenFrame)) {
      children.push(top);
      top = this.stack.pop();
    }

    if (!(top instanceof OpenFrame)) {
      throw this.error(`extra end tag: ${JSON.stringify(tag)}`);
    }
    if (top.tag !== tag) {
      throw this.error(`expecting end tag ${JSON.stringify(top.tag)}, got ${JSON.stringify(tag)}`);
    }

    children.reverse();
    this.stack.push(new ElementNode(top.tag, top.attrs, children));
    this.trace(`close </${tag}> with ${children.length} children`);
  }

  text(data: string, position?: SourcePosition): void {
    this.locate(position);
    // Text before the first tag is dropped
    if (this.stack.length === 0) return;
    this.stack.push(new TextNode(data));
  }

  /**
   * Feed a sequence of events
   */
  consume(events: Iterable<TreeEvent>): this {
    for (const event of events) {
      switch (event.type) {
        case 'start-tag':
          this.startTag(event.name, event.attrs, event.position);
          break;
        case 'end-tag':
          this.endTag(event.name, event.position);
          break;
        case 'text':
          this.text(event.data, event.position);
          break;
      }
    }
    return this;
  }

  /**
   * Record where the input ended; completion errors from `root()` report
   * this position.
   */
  end(position: SourcePosition): this {
    this.locate(position);
    return this;
  }

  /**
   * The finished root element. Top-level nodes after the first element are
   * dropped.
   */
  root(): ElementNode {
    const bottom = this.stack[0];
    if (!bottom) {
      throw this.error('no root tag');
    }
    if (bottom instanceof OpenFrame) {
      throw this.error('root tag not closed yet');
    }
    if (!bottom.isElement()) {
      // Text is only ever pushed above a start tag
      throw this.error('no root tag');
    }
    return bottom;
  }

  private locate(position: SourcePosition | undefined): void {
    if (position) {
      this.position = { line: position.line, offset: position.offset };
    }
  }

  private error(reason: string): TreeBuilderError {
    return new TreeBuilderError(this.position, reason);
  }

  private trace(message: string): void {
    if (process.env.DEBUG_TREE) {
      console.error(`DEBUG_TREE: ${this.position.line}:${this.position.offset} ${message}`);
    }
  }
}
