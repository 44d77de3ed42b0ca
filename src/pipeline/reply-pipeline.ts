/**
 * Reply Pipeline
 *
 * Wires splitter, assembler, renderer and render session together and owns
 * their lifecycle. One instance per process; the host calls `start()` when
 * it loads the renderer and `stop()` when it unloads it.
 */

import { splitSegments, DEFAULT_TAG, type Segment } from '../segment/index.js';
import {
  OutputAssembler,
  expandMessageChain,
  type AssemblerOptions,
  type MessageChainItem,
  type OutputItem,
} from '../assembler/index.js';
import type { ContentRenderer, RenderRequest, RenderResult } from '../document/render.types.js';
import type { RenderSession } from '../browser/render-session.js';
import { appendTagInstructions } from '../prompt/tag-instructions.js';
import { getLogger } from '../shared/services/logging.service.js';

export interface ReplyPipelineOptions extends AssemblerOptions {
  /** Render tag name (default: 'md') */
  tag?: string;
}

export class ReplyPipeline {
  private readonly logger = getLogger();
  private readonly tag: string;

  constructor(
    private readonly session: RenderSession,
    private readonly renderer: ContentRenderer,
    private readonly options: ReplyPipelineOptions
  ) {
    this.tag = options.tag ?? DEFAULT_TAG;
  }

  async start(): Promise<void> {
    await this.session.open();
    this.logger.info('Reply pipeline started', { tag: this.tag, state: this.session.state });
  }

  async stop(): Promise<void> {
    await this.session.close();
  }

  split(text: string): Segment[] {
    return splitSegments(text, { tag: this.tag });
  }

  /**
   * Render a full reply. Only tagged spans reach the renderer; text without
   * any span comes back as a single text item (sanitized when configured).
   */
  async renderReply(
    text: string,
    overrides: Partial<Pick<AssemblerOptions, 'sanitizeLiterals'>> = {}
  ): Promise<OutputItem[]> {
    const assembler = new OutputAssembler(this.renderer, {
      ...this.options,
      sanitizeLiterals: overrides.sanitizeLiterals ?? this.options.sanitizeLiterals,
    });
    return assembler.assemble(this.split(text));
  }

  /**
   * Render one Markdown document directly, bypassing the tag grammar.
   */
  async renderMarkdown(
    content: string,
    overrides: Partial<Omit<RenderRequest, 'content'>> = {}
  ): Promise<RenderResult> {
    return this.renderer.render({
      content,
      scaleFactor: overrides.scaleFactor ?? this.options.scaleFactor,
      minWidth: overrides.minWidth ?? this.options.minWidth,
      fixedWidth: overrides.fixedWidth ?? this.options.fixedWidth,
    });
  }

  async expandChain<TPayload>(
    chain: readonly MessageChainItem<TPayload>[]
  ): Promise<MessageChainItem<TPayload>[]> {
    return expandMessageChain(chain, (text) => this.renderReply(text));
  }

  withInstructions(systemPrompt: string): string {
    return appendTagInstructions(systemPrompt, this.tag);
  }
}
