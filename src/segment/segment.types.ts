/**
 * Segment Types
 *
 * A reply is split into an ordered sequence of segments. Order is
 * significant end to end: the assembled output follows it exactly.
 */

interface SegmentBase {
  /** Trimmed payload (tags stripped for renderable segments) */
  readonly text: string;
  /** Exact source span, including the surrounding tags for renderable segments */
  readonly raw: string;
}

export interface LiteralSegment extends SegmentBase {
  readonly kind: 'literal';
}

export interface RenderableSegment extends SegmentBase {
  readonly kind: 'renderable';
}

export type Segment = LiteralSegment | RenderableSegment;

export interface SplitOptions {
  /** Tag name without angle brackets (default: 'md') */
  tag?: string;
}

export const DEFAULT_TAG = 'md';
