/**
 * Document Template
 *
 * Wraps an HTML fragment in the standalone page the renderer screenshots.
 * MathJax is configured with `startup.typeset: false` so the renderer decides
 * when typesetting runs and can await its completion.
 */

export const DEFAULT_MATHJAX_URL = 'https://cdn.jsdelivr.net/npm/mathjax@3/es5/tex-svg.js';

/** Upper bound of the auto-fit body width (px) */
export const MAX_AUTO_WIDTH = 1500;

export interface DocumentLayout {
  /** Lower bound of the auto-fit width (px) */
  minWidth: number;
  /** Upper bound of the auto-fit width (px) */
  maxWidth?: number;
  /** Fixed width including padding (px); overrides auto-fit */
  fixedWidth?: number;
  mathJaxUrl?: string;
}

const MATHJAX_CONFIG = {
  tex: {
    inlineMath: [
      ['$', '$'],
      ['\\(', '\\)'],
    ],
    displayMath: [
      ['$$', '$$'],
      ['\\[', '\\]'],
    ],
    processEscapes: true,
  },
  svg: { fontCache: 'global' },
  startup: { typeset: false },
};

function escapeAttribute(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/"/g, '&quot;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;');
}

/**
 * CSS sizing rule for the body element
 */
export function bodySizing(layout: DocumentLayout): string {
  if (layout.fixedWidth !== undefined) {
    return `width: ${layout.fixedWidth}px; box-sizing: border-box;`;
  }
  return `min-width: ${layout.minWidth}px; max-width: ${layout.maxWidth ?? MAX_AUTO_WIDTH}px;`;
}

export function buildDocument(fragment: string, layout: DocumentLayout): string {
  const mathJaxUrl = escapeAttribute(layout.mathJaxUrl ?? DEFAULT_MATHJAX_URL);

  return `<!DOCTYPE html>
<html>
<head>
  <meta charset="UTF-8">
  <title>Markdown Render</title>
  <style>
    html { margin: 0; padding: 0; background: #ffffff; }
    body {
      ${bodySizing(layout)}
      display: inline-block;
      margin: 0;
      padding: 25px;
      background: #ffffff;
      color: #1f2328;
      font-family: -apple-system, BlinkMacSystemFont, "Segoe UI", "Noto Sans", Helvetica, Arial, "PingFang SC", "Microsoft YaHei", sans-serif, "Apple Color Emoji", "Segoe UI Emoji";
      font-size: 16px;
      line-height: 1.6;
      -webkit-font-smoothing: antialiased;
      text-rendering: optimizeLegibility;
    }
    pre {
      background-color: #f6f8fa;
      border-radius: 6px;
      padding: 16px;
      overflow: auto;
      font-size: 85%;
      line-height: 1.45;
    }
    code {
      font-family: "SFMono-Regular", Consolas, "Liberation Mono", Menlo, monospace;
    }
    :not(pre) > code {
      background-color: rgba(175, 184, 193, 0.2);
      border-radius: 4px;
      padding: 0.2em 0.4em;
      font-size: 85%;
    }
    table { border-collapse: collapse; margin: 12px 0; }
    th, td { border: 1px solid #d0d7de; padding: 6px 13px; }
    tr:nth-child(2n) { background-color: #f6f8fa; }
    blockquote { margin: 0; padding: 0 1em; color: #59636e; border-left: 0.25em solid #d0d7de; }
    ul.contains-task-list { list-style: none; padding-left: 1.2em; }
    .math-display { margin: 12px 0; overflow-x: auto; }
    img { max-width: 100%; }
  </style>
  <script>window.MathJax = ${JSON.stringify(MATHJAX_CONFIG)};</script>
  <script id="MathJax-script" src="${mathJaxUrl}"></script>
</head>
<body>
${fragment}
</body>
</html>`;
}
