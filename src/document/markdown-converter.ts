/**
 * Markdown to HTML Conversion
 *
 * GFM (tables, strikethrough, task lists, autolinks) plus math. Math nodes
 * are emitted as `\(...\)` / `\[...\]` text so MathJax typesets them in the
 * page; nothing is typeset here.
 */

import { unified } from 'unified';
import remarkParse from 'remark-parse';
import remarkGfm from 'remark-gfm';
import remarkMath from 'remark-math';
import remarkRehype from 'remark-rehype';
import rehypeStringify from 'rehype-stringify';
import { SKIP, visit } from 'unist-util-visit';
import type { Element, ElementContent, Root } from 'hast';

/**
 * Converts Markdown source to an HTML fragment. Must be side-effect free.
 */
export type MarkdownConverter = (markdown: string) => Promise<string>;

/**
 * Rewrite `\(...\)` and `\[...\]` to dollar delimiters.
 *
 * remark-math only recognises dollar forms, and Markdown would otherwise
 * unescape `\(` to a bare parenthesis.
 */
export function preprocessTexDelimiters(markdown: string): string {
  return markdown
    .replace(/(?<!\\)\\\((.+?)\\\)/g, (_match, expr: string) => `$${expr.trim()}$`)
    .replace(/(?<!\\)\\\[([\s\S]+?)\\\]/g, (_match, expr: string) => `\n\n$$\n${expr.trim()}\n$$\n\n`);
}

function hasClass(node: Element, name: string): boolean {
  const className = node.properties.className;
  return Array.isArray(className) && className.includes(name);
}

function textOf(node: Element): string {
  return node.children
    .map((child) => {
      if (child.type === 'text') return child.value;
      if (child.type === 'element') return textOf(child);
      return '';
    })
    .join('');
}

function mathPlaceholder(tagName: 'span' | 'div', className: string, tex: string): Element {
  return {
    type: 'element',
    tagName,
    properties: { className: [className] },
    children: [{ type: 'text', value: tex }],
  };
}

/**
 * Replace remark-math output (`code.math-inline`, `pre > code.math-display`)
 * with TeX-delimited text placeholders.
 */
function rehypeMathPlaceholders() {
  return (tree: Root) => {
    visit(tree, 'element', (node: Element, index, parent) => {
      if (!parent || index === undefined) return;

      let replacement: ElementContent | null = null;
      if (node.tagName === 'code' && hasClass(node, 'math-inline')) {
        replacement = mathPlaceholder('span', 'math-inline', `\\(${textOf(node)}\\)`);
      } else if (node.tagName === 'pre') {
        const code = node.children.find(
          (child): child is Element => child.type === 'element' && child.tagName === 'code'
        );
        if (code && hasClass(code, 'math-display')) {
          replacement = mathPlaceholder('div', 'math-display', `\\[${textOf(code)}\\]`);
        }
      } else if (node.tagName === 'code' && hasClass(node, 'math-display')) {
        replacement = mathPlaceholder('div', 'math-display', `\\[${textOf(node)}\\]`);
      }

      if (replacement) {
        parent.children[index] = replacement;
        return SKIP;
      }
      return undefined;
    });
  };
}

const processor = unified()
  .use(remarkParse)
  .use(remarkGfm, { singleTilde: false })
  .use(remarkMath)
  .use(remarkRehype, { allowDangerousHtml: true })
  .use(rehypeMathPlaceholders)
  .use(rehypeStringify, { allowDangerousHtml: true });

/**
 * Convert Markdown to an HTML fragment
 */
export const markdownToHtml: MarkdownConverter = async (markdown) => {
  const file = await processor.process(preprocessTexDelimiters(markdown));
  return String(file);
};
