/**
 * Text Processor
 * Whitespace normalization and block-level text collection over a parsed DOM
 */

import { isDocument, isTag, isText } from 'domhandler';
import type { AnyNode } from 'domhandler';

// Elements that start a new text block
const BLOCK_TAGS = new Set([
  'address',
  'article',
  'aside',
  'blockquote',
  'body',
  'caption',
  'dd',
  'details',
  'dialog',
  'div',
  'dl',
  'dt',
  'fieldset',
  'figcaption',
  'figure',
  'footer',
  'form',
  'h1',
  'h2',
  'h3',
  'h4',
  'h5',
  'h6',
  'header',
  'hr',
  'html',
  'li',
  'main',
  'nav',
  'ol',
  'p',
  'pre',
  'section',
  'summary',
  'table',
  'tbody',
  'td',
  'tfoot',
  'th',
  'thead',
  'tr',
  'ul',
]);

// Never rendered as visible text
const INVISIBLE_TAGS = new Set(['script', 'style', 'noscript', 'template', 'head', 'title', 'meta', 'link']);

/**
 * Collapse runs of whitespace to single spaces and trim
 */
export function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

export function isBlockTag(tagName: string): boolean {
  return BLOCK_TAGS.has(tagName.toLowerCase());
}

/**
 * Visible text blocks in document order. A block's text excludes the text of
 * nested blocks, which are emitted as blocks of their own.
 */
export function collectTextBlocks(nodes: readonly AnyNode[]): string[] {
  const blocks: string[] = [];
  let buffer = '';

  const flush = () => {
    const text = normalizeWhitespace(buffer);
    if (text) {
      blocks.push(text);
    }
    buffer = '';
  };

  const walk = (node: AnyNode) => {
    if (isText(node)) {
      buffer += node.data;
      return;
    }
    if (isDocument(node)) {
      node.children.forEach(walk);
      return;
    }
    if (!isTag(node)) {
      return;
    }

    const tagName = node.name.toLowerCase();
    if (INVISIBLE_TAGS.has(tagName)) {
      return;
    }
    // A line break stays inside the current block
    if (tagName === 'br') {
      buffer += ' ';
      return;
    }

    if (!isBlockTag(tagName)) {
      node.children.forEach(walk);
      return;
    }

    flush();
    node.children.forEach(walk);
    flush();
  };

  nodes.forEach(walk);
  flush();
  return blocks;
}
