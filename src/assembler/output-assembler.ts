/**
 * Output Assembler
 *
 * Walks a segment sequence in order and emits text and image items.
 * Renderable segments that fail to render come back as text carrying the
 * original source, so nothing the model wrote is lost.
 */

import type { Segment } from '../segment/segment.types.js';
import type { ContentRenderer } from '../document/render.types.js';
import { normalizeContent, sanitizePlainText } from '../text/index.js';
import { getLogger } from '../shared/services/logging.service.js';
import type { OutputItem } from './output.types.js';

export const RENDER_FAILED_MARKER = '--- render failed ---';

export interface AssemblerOptions {
  /** Strip Markdown syntax from literal segments (default: false) */
  sanitizeLiterals?: boolean;
  scaleFactor: number;
  minWidth: number;
  fixedWidth?: number;
}

/**
 * Text shown in place of a renderable segment that could not be rendered
 */
export function renderFailureText(content: string): string {
  return `${RENDER_FAILED_MARKER}\n${content}`;
}

export class OutputAssembler {
  private readonly logger = getLogger();

  constructor(
    private readonly renderer: ContentRenderer,
    private readonly options: AssemblerOptions
  ) {}

  /**
   * Segments are processed one at a time, in order.
   */
  async assemble(segments: readonly Segment[]): Promise<OutputItem[]> {
    const items: OutputItem[] = [];

    for (const segment of segments) {
      const item = await this.assembleSegment(segment);
      if (item) {
        items.push(item);
      }
    }

    return items;
  }

  private async assembleSegment(segment: Segment): Promise<OutputItem | null> {
    switch (segment.kind) {
      case 'literal': {
        const text = (
          this.options.sanitizeLiterals ? sanitizePlainText(segment.text) : segment.text
        ).trim();
        return text ? { type: 'text', text } : null;
      }

      case 'renderable': {
        const result = await this.renderer.render({
          content: normalizeContent(segment.text),
          scaleFactor: this.options.scaleFactor,
          minWidth: this.options.minWidth,
          fixedWidth: this.options.fixedWidth,
        });

        if (result.ok) {
          return { type: 'image', path: result.image.path };
        }

        this.logger.warning('Falling back to source text for failed render', {
          reason: result.failure.reason,
          contentLength: segment.text.length,
        });
        return { type: 'text', text: renderFailureText(segment.text) };
      }
    }
  }
}
