/**
 * Segment Splitter
 *
 * Partitions reply text into literal and renderable segments using a paired
 * tag grammar: `<md>...</md>`.
 *
 * Invariants:
 * - Matching is a single, non-greedy pass over the input. Enclosed content
 *   may span lines.
 * - Tags do not nest. A tag token inside a renderable span is plain text of
 *   that span and is never split again.
 * - An open tag without a matching close tag is literal text.
 * - Segments whose trimmed text is empty are dropped.
 */

import {
  DEFAULT_TAG,
  type LiteralSegment,
  type RenderableSegment,
  type Segment,
  type SplitOptions,
} from './segment.types.js';

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Build the tag matcher. A fresh RegExp per call keeps `lastIndex` local.
 */
export function createTagPattern(tag: string = DEFAULT_TAG): RegExp {
  const name = escapeRegExp(tag);
  return new RegExp(`<${name}>([\\s\\S]*?)</${name}>`, 'g');
}

function literal(raw: string): LiteralSegment | null {
  const text = raw.trim();
  return text ? { kind: 'literal', text, raw } : null;
}

function renderable(raw: string, inner: string): RenderableSegment | null {
  const text = inner.trim();
  return text ? { kind: 'renderable', text, raw } : null;
}

/**
 * Split text into ordered segments.
 *
 * @example
 * splitSegments('intro <md># Title</md> outro');
 * // [literal 'intro', renderable '# Title', literal 'outro']
 */
export function splitSegments(input: string, options: SplitOptions = {}): Segment[] {
  const pattern = createTagPattern(options.tag);
  const segments: Segment[] = [];
  let cursor = 0;

  const push = (segment: Segment | null): void => {
    if (segment) segments.push(segment);
  };

  let match: RegExpExecArray | null;
  while ((match = pattern.exec(input)) !== null) {
    push(literal(input.slice(cursor, match.index)));
    push(renderable(match[0], match[1]));
    cursor = match.index + match[0].length;
  }

  push(literal(input.slice(cursor)));
  return segments;
}

/**
 * Concatenate the raw source spans of a segment sequence.
 * Reproduces the input of `splitSegments` when no segment was dropped.
 */
export function joinSegments(segments: readonly Segment[]): string {
  return segments.map((segment) => segment.raw).join('');
}
