/**
 * Content Normalizer
 *
 * Repairs escaping artifacts that models leave in math-heavy Markdown before
 * it is rendered. These are pattern repairs, not a TeX parser: malformed or
 * nested delimiter sequences get no guarantee.
 *
 * The transform is idempotent: normalizeContent(normalizeContent(s)) equals
 * normalizeContent(s).
 */

type Rule = readonly [pattern: RegExp, replace: (match: string, inner: string) => string];

/** Body of a single-dollar math span, trimmed on both sides */
function trimInlineMath(match: string, inner: string): string {
  const leading = inner.trimStart();
  const body = leading.trimEnd();
  if (!body) {
    return match;
  }
  // Trimming after a trailing backslash would produce an escaped delimiter
  return body.endsWith('\\') ? `$${leading}$` : `$${body}$`;
}

const RULES: readonly Rule[] = [
  // \$ and \\$ -> $ (any run of backslashes, so a second pass finds nothing)
  [/\\+\$/g, () => '$'],
  // \_ -> _
  [/\\+_/g, () => '_'],
  // "$   \frac" -> "$\frac" (single-dollar delimiters only)
  [/(?<!\$)\$[ \t]+(?=\\[A-Za-z])/g, () => '$'],
  // "$ x $" -> "$x$"
  [/(?<!\$)\$(?!\$)([^$\n]+)\$(?!\$)/g, trimInlineMath],
];

export function normalizeContent(text: string): string {
  return RULES.reduce((current, [pattern, replace]) => current.replace(pattern, replace), text);
}
