/**
 * ReplyPipeline Tests
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { ReplyPipeline } from '../../../src/pipeline/reply-pipeline.js';
import { RenderSession } from '../../../src/browser/render-session.js';
import { buildTagInstructions } from '../../../src/prompt/tag-instructions.js';
import { createFakeRenderer, type FakeRenderer } from '../../mocks/renderer.mock.js';

vi.mock('puppeteer-core', () => ({
  default: {
    launch: vi.fn(),
  },
}));

const OPTIONS = { scaleFactor: 2, minWidth: 400 };

describe('ReplyPipeline', () => {
  let session: RenderSession;
  let renderer: FakeRenderer;

  beforeEach(() => {
    session = new RenderSession();
    vi.spyOn(session, 'open').mockResolvedValue(undefined);
    vi.spyOn(session, 'close').mockResolvedValue(undefined);
    renderer = createFakeRenderer();
  });

  it('should open the session on start and close it on stop', async () => {
    const pipeline = new ReplyPipeline(session, renderer, OPTIONS);

    await pipeline.start();
    await pipeline.stop();

    expect(session.open).toHaveBeenCalledTimes(1);
    expect(session.close).toHaveBeenCalledTimes(1);
  });

  it('should render tagged spans of a reply', async () => {
    const pipeline = new ReplyPipeline(session, renderer, OPTIONS);

    const items = await pipeline.renderReply('The answer: <md>$x^2$</md>');

    expect(items).toEqual([
      { type: 'text', text: 'The answer:' },
      { type: 'image', path: '/cache/1.png' },
    ]);
  });

  it('should not render replies without tagged spans', async () => {
    const pipeline = new ReplyPipeline(session, renderer, OPTIONS);

    const items = await pipeline.renderReply('just text');

    expect(items).toEqual([{ type: 'text', text: 'just text' }]);
    expect(renderer.render).not.toHaveBeenCalled();
  });

  it('should split on the configured tag', async () => {
    const pipeline = new ReplyPipeline(session, renderer, { ...OPTIONS, tag: 'render' });

    expect(pipeline.split('a <render>b</render> <md>c</md>').map((s) => s.kind)).toEqual([
      'literal',
      'renderable',
      'literal',
    ]);
  });

  it('should let a request override literal sanitizing', async () => {
    const pipeline = new ReplyPipeline(session, renderer, { ...OPTIONS, sanitizeLiterals: true });

    expect(await pipeline.renderReply('**bold**')).toEqual([{ type: 'text', text: 'bold' }]);
    expect(await pipeline.renderReply('**bold**', { sanitizeLiterals: false })).toEqual([
      { type: 'text', text: '**bold**' },
    ]);
  });

  it('should render a document with per-request geometry', async () => {
    const pipeline = new ReplyPipeline(session, renderer, { ...OPTIONS, fixedWidth: 800 });

    const result = await pipeline.renderMarkdown('# Doc', { scaleFactor: 3 });

    expect(result).toEqual({ ok: true, image: { path: '/cache/1.png' } });
    expect(renderer.render).toHaveBeenCalledWith({
      content: '# Doc',
      scaleFactor: 3,
      minWidth: 400,
      fixedWidth: 800,
    });
  });

  it('should expand a host message chain', async () => {
    const pipeline = new ReplyPipeline(session, renderer, OPTIONS);

    const chain = await pipeline.expandChain<string>([
      { kind: 'passthrough', payload: 'reply-to:42' },
      { kind: 'plain', text: 'see <md>| a |\n| - |\n| 1 |</md>' },
    ]);

    expect(chain).toEqual([
      { kind: 'passthrough', payload: 'reply-to:42' },
      { kind: 'plain', text: 'see' },
      { kind: 'image', path: '/cache/1.png' },
    ]);
  });

  it('should append tag instructions for its tag', () => {
    const pipeline = new ReplyPipeline(session, renderer, { ...OPTIONS, tag: 'render' });

    expect(pipeline.withInstructions('Be helpful.')).toBe(
      `Be helpful.\n\n${buildTagInstructions('render')}`
    );
  });
});
