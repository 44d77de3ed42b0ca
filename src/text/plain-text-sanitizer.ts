/**
 * Plain-Text Sanitizer
 *
 * Strips lightweight-markup syntax from literal reply text so it reads as
 * plain text in chat clients that do not style Markdown.
 *
 * Passes run in order; later passes never see tokens earlier ones consumed.
 */

interface SanitizePass {
  name: string;
  pattern: RegExp;
  replacement: string;
}

const PASSES: readonly SanitizePass[] = [
  // ```lang\nbody``` -> body
  { name: 'code-fence', pattern: /```[^\n]*\n([\s\S]*?)```/g, replacement: '$1' },
  { name: 'inline-code', pattern: /`([^`\n]+)`/g, replacement: '$1' },
  { name: 'bold-asterisk', pattern: /\*\*(.+?)\*\*/g, replacement: '$1' },
  { name: 'bold-underscore', pattern: /__(.+?)__/g, replacement: '$1' },
  // Marker must not touch another marker or a word character, and must not hug whitespace
  {
    name: 'italic-asterisk',
    pattern: /(?<![*\w])\*(?![\s*])([^*\n]+?)(?<![\s*])\*(?![*\w])/g,
    replacement: '$1',
  },
  {
    name: 'italic-underscore',
    pattern: /(?<![_\w])_(?![\s_])([^_\n]+?)(?<![\s_])_(?![_\w])/g,
    replacement: '$1',
  },
  // "# Title" at line start, or a spaced "#" run after whitespace
  { name: 'heading', pattern: /(^|[ \t])#{1,6}[ \t]+/gm, replacement: '$1' },
  { name: 'blockquote', pattern: /^[ \t]*(?:>[ \t]?)+/gm, replacement: '' },
  { name: 'link', pattern: /!?\[([^\]\n]*)\]\([^)\n]*\)/g, replacement: '$1' },
  // Bullet removed, indentation kept
  { name: 'list-bullet', pattern: /^([ \t]*)[-*+][ \t]+/gm, replacement: '$1' },
];

export function sanitizePlainText(text: string): string {
  return PASSES.reduce((current, pass) => current.replace(pass.pattern, pass.replacement), text);
}
