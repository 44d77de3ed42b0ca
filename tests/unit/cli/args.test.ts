/**
 * CLI Argument Parsing Tests
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { ZodError } from 'zod';
import { parseArgs, DEFAULT_CACHE_DIR, type ServerArgs } from '../../../src/cli/args.js';

describe('parseArgs', () => {
  beforeEach(() => {
    vi.mocked(console.warn).mockClear();
  });

  it('should return default options when no args provided', () => {
    const args: ServerArgs = parseArgs([], {});

    expect(args).toEqual({
      tag: 'md',
      cacheDir: DEFAULT_CACHE_DIR,
      scale: 2,
      minWidth: 400,
      width: undefined,
      sanitize: false,
      executablePath: undefined,
      channel: undefined,
      engineCacheDir: undefined,
      mathJaxUrl: undefined,
      settleDelayMs: 300,
      navigationTimeoutMs: 30000,
    });
  });

  it('should parse space-separated values', () => {
    const args = parseArgs(['--tag', 'render', '--cacheDir', '/tmp/images'], {});

    expect(args.tag).toBe('render');
    expect(args.cacheDir).toBe('/tmp/images');
  });

  it('should parse inline values and coerce numbers', () => {
    const args = parseArgs(['--scale=3', '--minWidth=320', '--width=800'], {});

    expect(args.scale).toBe(3);
    expect(args.minWidth).toBe(320);
    expect(args.width).toBe(800);
  });

  it('should keep everything after the first equals sign', () => {
    const args = parseArgs(['--mathJaxUrl=http://localhost:8080/tex-svg.js?v=3'], {});

    expect(args.mathJaxUrl).toBe('http://localhost:8080/tex-svg.js?v=3');
  });

  it('should parse --sanitize alone as true', () => {
    expect(parseArgs(['--sanitize'], {}).sanitize).toBe(true);
  });

  it('should parse --sanitize=false', () => {
    expect(parseArgs(['--sanitize=false'], {}).sanitize).toBe(false);
  });

  it('should parse --sanitize=1', () => {
    expect(parseArgs(['--sanitize=1'], {}).sanitize).toBe(true);
  });

  it('should parse --channel', () => {
    expect(parseArgs(['--channel', 'chrome-beta'], {}).channel).toBe('chrome-beta');
  });

  it('should read environment variables', () => {
    const args = parseArgs([], {
      MD_RENDER_TAG: 'render',
      MD_RENDER_SCALE: '3',
      MD_RENDER_SANITIZE: 'true',
      PUPPETEER_EXECUTABLE_PATH: '/usr/bin/chromium',
      MATHJAX_URL: 'http://localhost/mj.js',
    });

    expect(args.tag).toBe('render');
    expect(args.scale).toBe(3);
    expect(args.sanitize).toBe(true);
    expect(args.executablePath).toBe('/usr/bin/chromium');
    expect(args.mathJaxUrl).toBe('http://localhost/mj.js');
  });

  it('should ignore empty environment variables', () => {
    expect(parseArgs([], { MD_RENDER_TAG: '' }).tag).toBe('md');
  });

  it('should prefer flags over the environment', () => {
    const args = parseArgs(['--scale', '1'], { MD_RENDER_SCALE: '3' });

    expect(args.scale).toBe(1);
  });

  it('should reject an out-of-range scale', () => {
    expect(() => parseArgs(['--scale', '9'], {})).toThrow(ZodError);
  });

  it('should reject a tag that is not an element name', () => {
    expect(() => parseArgs(['--tag', 'two words'], {})).toThrow(ZodError);
  });

  it('should reject an unknown channel', () => {
    expect(() => parseArgs(['--channel', 'firefox'], {})).toThrow(ZodError);
  });

  it('should warn about unknown arguments', () => {
    const args = parseArgs(['--sanitise'], {});

    expect(args.sanitize).toBe(false);
    expect(console.warn).toHaveBeenCalledWith('Warning: Unknown argument "--sanitise" - ignored');
  });

  it('should warn about positional arguments', () => {
    parseArgs(['extra'], {});

    expect(console.warn).toHaveBeenCalledWith('Warning: Unexpected argument "extra" - ignored');
  });

  it('should warn about a missing value', () => {
    const args = parseArgs(['--cacheDir'], {});

    expect(args.cacheDir).toBe(DEFAULT_CACHE_DIR);
    expect(console.warn).toHaveBeenCalledWith('Warning: Missing value for "--cacheDir" - ignored');
  });
});
