/**
 * HTML front end
 *
 * Turns markup into tree events with the htmlparser2 Tokenizer. Only the
 * tokenizer is used: its Parser closes elements implicitly and drops stray
 * end tags, while tag mismatches here must reach the TreeBuilder as-is.
 */

import { Tokenizer } from 'htmlparser2';
import type { SourcePosition } from '../errors.js';
import { TreeBuilder } from './builder.js';
import type { Attribute, TreeEvent } from './builder.js';
import type { ElementNode } from './node.js';

/**
 * Maps string offsets to line / column positions
 */
export class LineIndex {
  private readonly lineStarts: number[] = [0];

  constructor(text: string) {
    for (let i = 0; i < text.length; i++) {
      if (text[i] === '\n') {
        this.lineStarts.push(i + 1);
      }
    }
  }

  position(index: number): SourcePosition {
    // Last line starting at or before index
    let low = 0;
    let high = this.lineStarts.length - 1;
    while (low < high) {
      const mid = (low + high + 1) >> 1;
      if (this.lineStarts[mid] <= index) {
        low = mid;
      } else {
        high = mid - 1;
      }
    }
    return { line: low + 1, offset: index - this.lineStarts[low] };
  }
}

/**
 * Tokenize `html` into start tag, end tag and text events.
 *
 * Character references are decoded. Adjacent text is merged into one event;
 * comments, CDATA sections, processing instructions and declarations give no
 * event but still end the current text run.
 */
export function tokenizeHtml(html: string): TreeEvent[] {
  const lines = new LineIndex(html);
  const events: TreeEvent[] = [];

  let text = '';
  let textStart = -1;

  let tagName = '';
  let tagStart = 0;
  let attrs: Attribute[] = [];
  let attrName = '';
  let attrValue = '';

  const appendText = (data: string, start: number): void => {
    if (textStart < 0) textStart = start;
    text += data;
  };

  const flushText = (): void => {
    if (text.length > 0) {
      events.push({ type: 'text', data: text, position: lines.position(textStart) });
    }
    text = '';
    textStart = -1;
  };

  const finishOpenTag = (): void => {
    events.push({ type: 'start-tag', name: tagName, attrs, position: lines.position(tagStart) });
    attrs = [];
  };

  const tokenizer = new Tokenizer(
    { xmlMode: false, decodeEntities: true },
    {
      ontext(start, end) {
        appendText(html.slice(start, end), start);
      },
      ontextentity(codepoint, end) {
        // `end` is past the reference; it starts at the last '&' before it
        appendText(String.fromCodePoint(codepoint), html.lastIndexOf('&', end - 1));
      },
      onopentagname(start, end) {
        flushText();
        tagName = html.slice(start, end);
        tagStart = start - 1;
      },
      onattribname(start, end) {
        attrName = html.slice(start, end).toLowerCase();
        attrValue = '';
      },
      onattribdata(start, end) {
        attrValue += html.slice(start, end);
      },
      onattribentity(codepoint) {
        attrValue += String.fromCodePoint(codepoint);
      },
      onattribend() {
        attrs.push([attrName, attrValue]);
      },
      onopentagend() {
        finishOpenTag();
      },
      // `<x/>` is a plain start tag; void elements are closed by the builder
      onselfclosingtag() {
        finishOpenTag();
      },
      onclosetag(start, end) {
        flushText();
        events.push({ type: 'end-tag', name: html.slice(start, end), position: lines.position(start - 2) });
      },
      oncomment() {
        flushText();
      },
      oncdata() {
        flushText();
      },
      ondeclaration() {
        flushText();
      },
      onprocessinginstruction() {
        flushText();
      },
      onend() {
        flushText();
      },
    },
  );

  tokenizer.write(html);
  tokenizer.end();
  return events;
}

/**
 * Parse HTML and return the root element.
 *
 * Throws TreeBuilderError on mismatched or extra end tags, and when there is
 * no root element or it is never closed. Only the first top-level element is
 * kept.
 */
export function parseHtml(html: string): ElementNode {
  return new TreeBuilder()
    .consume(tokenizeHtml(html))
    .end(new LineIndex(html).position(html.length))
    .root();
}
