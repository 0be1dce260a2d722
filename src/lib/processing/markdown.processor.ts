/// <reference path="../../types/turndown-plugin-gfm.d.ts" />
/**
 * Markdown Processor
 * HTML to Markdown converter using Turndown with GFM support
 */

import TurndownService from 'turndown';
import { gfm } from 'turndown-plugin-gfm';

export interface MarkdownProcessorOptions {
  /** Render anchors as [text](href); otherwise keep only their text */
  includeLinks?: boolean;
  /** Render images as ![alt](src); otherwise drop them */
  includeImages?: boolean;
}

export class MarkdownProcessor {
  private turndownService: TurndownService;
  private readonly includeLinks: boolean;
  private readonly includeImages: boolean;

  constructor(options: MarkdownProcessorOptions = {}) {
    this.includeLinks = options.includeLinks !== false;
    this.includeImages = options.includeImages !== false;

    this.turndownService = new TurndownService({
      headingStyle: 'atx', // Use # for headings
      codeBlockStyle: 'fenced', // Use ``` for code blocks
      bulletListMarker: '-',
      emDelimiter: '*',
      strongDelimiter: '**',
      linkStyle: 'inlined',
      hr: '---',
    });

    this.turndownService.use(gfm);
    this.configureRules();
  }

  /**
   * Configure custom Turndown rules
   */
  private configureRules(): void {
    this.turndownService.addRule('image', {
      filter: 'img',
      replacement: (_content, node) => {
        if (!this.includeImages) {
          return '';
        }
        const src = node.getAttribute('src') || '';
        const alt = (node.getAttribute('alt') || '').replace(/[\[\]]/g, '');
        const title = node.getAttribute('title');
        const titlePart = title ? ` "${title.replace(/"/g, '\\"')}"` : '';
        return src ? `![${alt}](${src}${titlePart})` : '';
      },
    });

    if (!this.includeLinks) {
      this.turndownService.addRule('plainLink', {
        filter: 'a',
        replacement: (content) => content,
      });
    }

    this.turndownService.addRule('codeBlock', {
      filter: (node) => {
        return node.nodeName === 'PRE' && node.firstChild !== null && node.firstChild.nodeName === 'CODE';
      },
      replacement: (_content, node) => {
        const code = node.firstChild;
        const text = code?.textContent || '';
        const className = code && isDomElement(code) ? code.getAttribute('class') : null;
        const language = className?.match(/language-(\w+)/)?.[1] || '';
        return `\n\n\`\`\`${language}\n${text.replace(/\n$/, '')}\n\`\`\`\n\n`;
      },
    });
  }

  /**
   * Convert HTML string to Markdown
   */
  convert(html: string): string {
    if (!html || html.trim().length === 0) {
      return '';
    }
    return this.cleanMarkdown(this.turndownService.turndown(html));
  }

  /**
   * Clean up markdown output
   */
  private cleanMarkdown(markdown: string): string {
    return (
      markdown
        // Single space after list markers
        .replace(/^(\s*)([-*+]|\d+\.)[ \t]+/gm, '$1$2 ')
        // Remove excessive blank lines (more than 2 consecutive)
        .replace(/\n{3,}/g, '\n\n')
        .trim()
    );
  }
}

function isDomElement(node: ChildNode): node is Element {
  return node.nodeType === 1;
}
