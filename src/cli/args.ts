/**
 * CLI Argument Parsing
 *
 * Parses command-line arguments and environment variables into the
 * validated server configuration. Flags take precedence over the environment.
 */

import os from 'node:os';
import path from 'node:path';
import { z } from 'zod';

/** Default directory for rendered images */
export const DEFAULT_CACHE_DIR = path.join(os.homedir(), '.cache', 'md-reply-renderer', 'images');

export const ServerArgsSchema = z.object({
  /** Render tag name, e.g. `md` for `<md>...</md>` */
  tag: z
    .string()
    .regex(/^[A-Za-z][\w-]*$/, 'Tag must be a simple element name')
    .default('md'),

  /** Directory receiving rendered PNGs */
  cacheDir: z.string().min(1).default(DEFAULT_CACHE_DIR),

  /** Device scale factor */
  scale: z.coerce.number().int().min(1).max(4).default(2),

  /** Minimum auto-fit width (px) */
  minWidth: z.coerce.number().int().positive().default(400),

  /** Fixed document width (px); disables auto-fit */
  width: z.coerce.number().int().positive().optional(),

  /** Strip Markdown from text outside render tags */
  sanitize: z.boolean().default(false),

  /** Path to Chrome executable */
  executablePath: z.string().min(1).optional(),

  /** Chrome channel to use instead of a provisioned build */
  channel: z.enum(['chrome', 'chrome-canary', 'chrome-beta', 'chrome-dev']).optional(),

  /** Directory for provisioned browser builds */
  engineCacheDir: z.string().min(1).optional(),

  /** MathJax 3 script URL */
  mathJaxUrl: z.string().url().optional(),

  /** Delay after typesetting before capture (ms) */
  settleDelayMs: z.coerce.number().int().nonnegative().default(300),

  /** Page content load timeout (ms) */
  navigationTimeoutMs: z.coerce.number().int().positive().default(30000),
});

export type ServerArgs = z.infer<typeof ServerArgsSchema>;

type RawArgs = Record<string, string | boolean>;

const BOOLEAN_FLAGS = new Set(['sanitize']);

const KNOWN_ARG_NAMES = new Set(Object.keys(ServerArgsSchema.shape));

/** Environment variables and the option each one sets */
const ENV_OPTIONS: Record<string, keyof ServerArgs> = {
  MD_RENDER_TAG: 'tag',
  MD_RENDER_CACHE_DIR: 'cacheDir',
  MD_RENDER_SCALE: 'scale',
  MD_RENDER_MIN_WIDTH: 'minWidth',
  MD_RENDER_WIDTH: 'width',
  MD_RENDER_SANITIZE: 'sanitize',
  PUPPETEER_EXECUTABLE_PATH: 'executablePath',
  MATHJAX_URL: 'mathJaxUrl',
};

function parseBoolean(value: string): boolean {
  return value === 'true' || value === '1';
}

function readEnv(env: NodeJS.ProcessEnv): RawArgs {
  const raw: RawArgs = {};
  for (const [variable, option] of Object.entries(ENV_OPTIONS)) {
    const value = env[variable];
    if (value === undefined || value === '') continue;
    raw[option] = BOOLEAN_FLAGS.has(option) ? parseBoolean(value) : value;
  }
  return raw;
}

function readArgv(argv: string[]): RawArgs {
  const raw: RawArgs = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (!arg.startsWith('--')) {
      console.warn(`Warning: Unexpected argument "${arg}" - ignored`);
      continue;
    }

    const [name, inlineValue] = arg.slice(2).split(/=(.*)/s, 2);
    if (!KNOWN_ARG_NAMES.has(name)) {
      // Catch typos like --sanitise
      console.warn(`Warning: Unknown argument "${arg}" - ignored`);
      continue;
    }

    if (BOOLEAN_FLAGS.has(name)) {
      raw[name] = inlineValue === undefined ? true : parseBoolean(inlineValue);
    } else if (inlineValue !== undefined) {
      raw[name] = inlineValue;
    } else if (argv[i + 1] !== undefined) {
      raw[name] = argv[++i];
    } else {
      console.warn(`Warning: Missing value for "${arg}" - ignored`);
    }
  }

  return raw;
}

/**
 * Parse command-line arguments into ServerArgs.
 *
 * @param argv - Command line arguments (process.argv.slice(2))
 * @param env - Environment to read fallbacks from
 * @throws ZodError when a value is out of range or malformed
 */
export function parseArgs(argv: string[], env: NodeJS.ProcessEnv = process.env): ServerArgs {
  return ServerArgsSchema.parse({ ...readEnv(env), ...readArgv(argv) });
}
