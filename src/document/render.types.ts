/**
 * Render Types
 *
 * Request and result shapes exchanged between the output assembler and a
 * content renderer. Failures are values; nothing is thrown across this seam.
 */

export interface RenderRequest {
  /** Normalized Markdown source */
  content: string;
  /** Device scale factor, integer >= 1 */
  scaleFactor: number;
  /** Lower bound of the auto-fit body width (px) */
  minWidth: number;
  /** Fixed body width (px); replaces the auto-fit rule when set */
  fixedWidth?: number;
}

export type RenderFailureReason =
  | 'EMPTY_DOCUMENT'
  | 'ENGINE_UNAVAILABLE'
  | 'TIMEOUT'
  | 'MISSING_OUTPUT'
  | 'UNKNOWN';

export interface RenderFailure {
  reason: RenderFailureReason;
  message: string;
  /** Content exactly as it was submitted */
  content: string;
}

export interface RenderedImage {
  /** Absolute path of the PNG in the cache directory */
  path: string;
}

export type RenderResult = { ok: true; image: RenderedImage } | { ok: false; failure: RenderFailure };

/**
 * Anything that turns a render request into a result.
 * DocumentRenderer is the browser-backed implementation.
 */
export interface ContentRenderer {
  render(request: RenderRequest): Promise<RenderResult>;
}

export function renderSucceeded(path: string): RenderResult {
  return { ok: true, image: { path } };
}

export function renderFailed(
  reason: RenderFailureReason,
  message: string,
  content: string
): RenderResult {
  return { ok: false, failure: { reason, message, content } };
}
