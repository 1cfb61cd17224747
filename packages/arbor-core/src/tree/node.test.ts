/**
 * Tree model tests - construction, navigation, serialization
 */

import { describe, it, expect } from 'vitest';
import { NavigationError } from '../errors.js';
import { ElementNode, NodeType, TextNode } from './node.js';

function sampleTree() {
  const t0 = new TextNode('\n');
  const li1 = new ElementNode('li', [], [new TextNode('1')]);
  const t1 = new TextNode(' ');
  const li2 = new ElementNode('li', [['class', 'last']], [new TextNode('2')]);
  const t2 = new TextNode('\n');
  const ul = new ElementNode('ul', [], [t0, li1, t1, li2, t2]);
  const div = new ElementNode('div', [['id', 'list']], [ul]);
  return { div, ul, li1, li2, t0, t1, t2 };
}

describe('Tree - Construction', () => {
  it('should lowercase tag and attribute names', () => {
    const node = new ElementNode('DIV', [['ID', 'Main'], ['Data-X', 'Y']]);
    expect(node.tag).toBe('div');
    expect([...node.attrs.keys()]).toEqual(['id', 'data-x']);
    expect(node.attr('Id')).toBe('Main');
    expect(node.attr('DATA-x')).toBe('Y');
  });

  it('should keep first position and last value of repeated attributes', () => {
    const node = new ElementNode('p', [['id', 'a'], ['class', 'c'], ['ID', 'b']]);
    expect([...node.attrs.entries()]).toEqual([['id', 'b'], ['class', 'c']]);
  });

  it('should return null for absent attributes', () => {
    expect(new ElementNode('p').attr('title')).toBeNull();
    expect(new TextNode('x').attr('title')).toBeNull();
  });

  it('should attach children to their parent', () => {
    const { div, ul, li1, t0 } = sampleTree();
    expect(div.parent).toBeNull();
    expect(ul.parent).toBe(div);
    expect(li1.parent).toBe(ul);
    expect(t0.parent).toBe(ul);
  });

  it('should refuse to attach a node twice', () => {
    const text = new TextNode('x');
    new ElementNode('p', [], [text]);
    expect(() => new ElementNode('p', [], [text])).toThrow(NavigationError);
  });

  it('should give text nodes no tag, attributes or children', () => {
    const text = new TextNode('hello');
    expect(text.nodeType).toBe(NodeType.Text);
    expect(text.tag).toBeNull();
    expect(text.attrs.size).toBe(0);
    expect(text.children).toHaveLength(0);
    expect(text.isText()).toBe(true);
    expect(text.isElement()).toBe(false);
  });

  it('should compare text nodes by identity', () => {
    const a = new TextNode('same');
    const b = new TextNode('same');
    expect(a).not.toBe(b);
    expect(a.text).toBe(b.text);
  });

  it('should split class tokens', () => {
    const node = new ElementNode('p', [['class', '  a b\ta ']]);
    expect(node.classes).toEqual(['a', 'b', 'a']);
    expect(node.classList()).toEqual(['a', 'b', 'a']);
    expect(new ElementNode('p').classes).toEqual([]);
  });

  it('should concatenate descendant text', () => {
    const { div } = sampleTree();
    expect(div.text).toBe('\n1 2\n');
    expect(div.textContent()).toBe('\n1 2\n');
  });
});

describe('Tree - Navigation', () => {
  it('should give first and last children', () => {
    const { ul, li1, li2, t0, t2 } = sampleTree();
    expect(ul.firstChild()).toBe(t0);
    expect(ul.lastChild()).toBe(t2);
    expect(ul.firstElementChild()).toBe(li1);
    expect(ul.lastElementChild()).toBe(li2);
    expect(new ElementNode('p').firstChild()).toBeNull();
    expect(new ElementNode('p').lastElementChild()).toBeNull();
  });

  it('should list next siblings in document order', () => {
    const { li1, li2, t1, t2 } = sampleTree();
    expect(li1.nextSiblings()).toEqual([t1, li2, t2]);
    expect(li1.nextSibling()).toBe(t1);
    expect(li1.nextElementSibling()).toBe(li2);
    expect(li2.nextElementSibling()).toBeNull();
    expect(t2.nextSibling()).toBeNull();
  });

  it('should list previous siblings nearest first', () => {
    const { li1, li2, t0, t1 } = sampleTree();
    const previous = li2.previousSiblings();
    expect(previous).toHaveLength(3);
    expect(previous[0]).toBe(t1);
    expect(previous[1]).toBe(li1);
    expect(previous[2]).toBe(t0);
    expect(li2.previousSibling()).toBe(t1);
    expect(li2.previousElementSibling()).toBe(li1);
    expect(li1.previousElementSibling()).toBeNull();
  });

  it('should give roots no siblings', () => {
    const { div } = sampleTree();
    expect(div.nextSiblings()).toEqual([]);
    expect(div.previousSiblings()).toEqual([]);
    expect(div.nextSibling()).toBeNull();
  });

  it('should walk ancestors from the parent upwards', () => {
    const { div, ul, li1 } = sampleTree();
    expect([...li1.ancestors()]).toEqual([ul, div]);
    expect([...div.ancestors()]).toEqual([]);
  });

  it('should stop ancestors at root, inclusive', () => {
    const { div, ul, li1 } = sampleTree();
    expect([...li1.ancestors(ul)]).toEqual([ul]);
    expect([...li1.ancestors(div)]).toEqual([ul, div]);
    expect([...li1.ancestors(li1)]).toEqual([]);
  });

  it('should throw when root is not an ancestor', () => {
    const { li1, li2 } = sampleTree();
    expect(() => [...li1.ancestors(li2)]).toThrow(NavigationError);
    expect(() => [...li1.ancestors(li2)]).toThrow('provided root node not found in ancestral chain');
  });

  it('should walk descendants in pre-order', () => {
    const { div, ul, li1, li2 } = sampleTree();
    const elements = [...div.descendants()].filter(node => node.isElement());
    expect(elements).toEqual([ul, li1, li2]);
    expect([...div.descendants()]).toHaveLength(8);
    // Restartable
    expect([...div.descendants()]).toHaveLength(8);
  });
});

describe('Tree - Serialization', () => {
  it('should render elements with escaped attributes', () => {
    const node = new ElementNode('a', [['href', '/x?a=1&b=2'], ['title', 'say "hi"']], [new TextNode('go')]);
    expect(node.toString()).toBe('<a href="/x?a=1&amp;b=2" title="say &quot;hi&quot;">go</a>');
  });

  it('should render void and empty elements', () => {
    expect(new ElementNode('img', [['src', 'x']]).html).toBe('<img src="x"/>');
    expect(new ElementNode('BR').html).toBe('<br/>');
    expect(new ElementNode('div').html).toBe('<div></div>');
  });

  it('should escape text', () => {
    const text = new TextNode(`a < b & "c" 'd'`);
    expect(text.html).toBe('a &lt; b &amp; &quot;c&quot; &apos;d&apos;');
    expect(text.text).toBe(`a < b & "c" 'd'`);
  });

  it('should render inner and outer HTML', () => {
    const { ul } = sampleTree();
    expect(ul.innerHtml()).toBe('\n<li>1</li> <li class="last">2</li>\n');
    expect(ul.outerHtml()).toBe('<ul>\n<li>1</li> <li class="last">2</li>\n</ul>');
  });
});
