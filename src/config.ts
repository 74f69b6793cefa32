/**
 * Sync configuration: built once at startup from the environment and CLI
 * flags, validated, then frozen and passed to the API client and reconciler.
 */

import { z } from 'zod';
import { resolve } from 'node:path';
import { ConfigurationError } from './errors.js';
import { assertContentRoot } from './content/tree.js';

export interface SyncConfig {
  readonly baseUrl: string;
  readonly tokenId: string;
  readonly tokenSecret: string;
  readonly bookName: string;
  /** Absolute path of the folder mirrored into the book. */
  readonly contentRoot: string;
  readonly dryRun: boolean;
  readonly timeoutMs: number;
}

/** Values given on the command line; they win over the environment. */
export interface ConfigOverrides {
  baseUrl?: string;
  bookName?: string;
  contentDir?: string;
  dryRun?: boolean;
}

export interface LoadConfigOptions {
  /** False when the folder is an output that will be created (book download). */
  contentRootMustExist?: boolean;
}

export const ENV_KEYS = {
  baseUrl: 'BOOKSTACK_BASE_URL',
  tokenId: 'BOOKSTACK_TOKEN_ID',
  tokenSecret: 'BOOKSTACK_TOKEN_SECRET',
  bookName: 'BOOKSTACK_BOOK_NAME',
  contentDir: 'CONTENT_DIR',
  dryRun: 'BOOKSTACK_DRY_RUN',
  timeoutMs: 'BOOKSTACK_TIMEOUT_MS',
} as const;

const DEFAULT_TIMEOUT_MS = 60_000;
const TRUE_VALUES = new Set(['1', 'true', 'yes']);

const ConfigSchema = z.object({
  baseUrl: z
    .string()
    .url()
    .transform((url) => url.replace(/\/+$/, '')),
  tokenId: z.string(),
  tokenSecret: z.string(),
  bookName: z.string(),
  contentDir: z.string().optional(),
  dryRun: z.boolean(),
  timeoutMs: z.coerce.number().int().positive(),
});

function isConfigKey(key: unknown): key is keyof typeof ENV_KEYS {
  return typeof key === 'string' && Object.hasOwn(ENV_KEYS, key);
}

function envValue(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

/**
 * Build the sync configuration.
 *
 * Throws ConfigurationError when a required setting is missing or invalid,
 * or, unless `contentRootMustExist` is false, when the content folder does
 * not exist. The content folder defaults to `./<book name>` under `cwd`.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: ConfigOverrides = {},
  cwd: string = process.cwd(),
  { contentRootMustExist = true }: LoadConfigOptions = {},
): SyncConfig {
  const raw = {
    baseUrl: overrides.baseUrl ?? envValue(env, ENV_KEYS.baseUrl),
    tokenId: envValue(env, ENV_KEYS.tokenId),
    tokenSecret: envValue(env, ENV_KEYS.tokenSecret),
    bookName: overrides.bookName?.trim() || envValue(env, ENV_KEYS.bookName),
    contentDir: overrides.contentDir ?? envValue(env, ENV_KEYS.contentDir),
    dryRun: overrides.dryRun || TRUE_VALUES.has((envValue(env, ENV_KEYS.dryRun) ?? '').toLowerCase()),
    timeoutMs: envValue(env, ENV_KEYS.timeoutMs) ?? DEFAULT_TIMEOUT_MS,
  };

  const required = ['baseUrl', 'tokenId', 'tokenSecret', 'bookName'] as const;
  const missing = required.filter((key) => !raw[key]).map((key) => ENV_KEYS[key]);
  if (missing.length > 0) {
    throw new ConfigurationError(`Missing required environment variable(s): ${missing.join(', ')}`);
  }

  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => {
        const key = i.path[0];
        return `${isConfigKey(key) ? ENV_KEYS[key] : String(key)}: ${i.message}`;
      })
      .join('; ');
    throw new ConfigurationError(`Invalid configuration: ${issues}`);
  }

  const { contentDir, ...settings } = parsed.data;
  const folder = resolve(cwd, contentDir ?? settings.bookName);
  const contentRoot = contentRootMustExist ? assertContentRoot(folder) : folder;

  return Object.freeze({ ...settings, contentRoot });
}
