/**
 * Configuration
 *
 * Defaults, then `manuscript.config.json` in the project root, then
 * environment variables. The merged object is validated once; anything
 * invalid raises ConfigurationError listing every bad field.
 */

import { z } from 'zod';
import type { FileSystem } from '../storage/FileSystem';
import { isNotFoundError } from '../storage/FileSystem';
import { ConfigurationError } from '../errors';

export const CONFIG_FILE_NAME = 'manuscript.config.json';

const ConfigSchema = z.object({
  anthropic: z.object({
    apiKey: z.string().optional(),
    baseUrl: z.string().url(),
    model: z.string().min(1),
  }),
  context: z.object({
    maxTokens: z.coerce.number().int().positive(),
    safetyMargin: z.coerce.number().min(0).max(1),
  }),
  generation: z.object({
    timeoutMs: z.coerce.number().int().positive(),
    maxOutputTokens: z.coerce.number().int().positive(),
    temperature: z.coerce.number().min(0).max(1),
    maxRetries: z.coerce.number().int().min(0),
    initialDelayMs: z.coerce.number().int().min(0),
    maxDelayMs: z.coerce.number().int().min(0),
  }),
  citations: z.object({
    format: z.enum(['latex', 'markdown-author-year']),
    bibliographyStyle: z.enum(['apa', 'ieee']),
  }),
  logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']),
  lockTimeoutMs: z.coerce.number().int().positive(),
});

export type ManuscriptConfig = z.infer<typeof ConfigSchema>;

export const DEFAULT_CONFIG: ManuscriptConfig = {
  anthropic: {
    baseUrl: 'https://api.anthropic.com/v1',
    model: 'claude-sonnet-4-5',
  },
  context: {
    maxTokens: 100_000,
    safetyMargin: 0.1,
  },
  generation: {
    timeoutMs: 120_000,
    maxOutputTokens: 4096,
    temperature: 0.7,
    maxRetries: 2,
    initialDelayMs: 1000,
    maxDelayMs: 30_000,
  },
  citations: {
    format: 'markdown-author-year',
    bibliographyStyle: 'apa',
  },
  logLevel: 'info',
  lockTimeoutMs: 30_000,
};

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  /** Path of the project config file; skipped when absent */
  projectFile?: string;
  fs?: FileSystem;
}

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function deepMerge(base: PlainObject, override: PlainObject): PlainObject {
  const merged: PlainObject = { ...base };
  for (const [key, value] of Object.entries(override)) {
    if (value === undefined) continue;
    const current = merged[key];
    merged[key] = isPlainObject(current) && isPlainObject(value) ? deepMerge(current, value) : value;
  }
  return merged;
}

function nonEmpty(value: string | undefined): string | undefined {
  return value !== undefined && value.trim() !== '' ? value.trim() : undefined;
}

/**
 * Environment overrides in config shape
 */
function fromEnv(env: NodeJS.ProcessEnv): PlainObject {
  return {
    anthropic: {
      apiKey: nonEmpty(env.ANTHROPIC_API_KEY),
      baseUrl: nonEmpty(env.ANTHROPIC_BASE_URL),
      model: nonEmpty(env.MANUSCRIPT_MODEL),
    },
    context: {
      maxTokens: nonEmpty(env.MANUSCRIPT_MAX_CONTEXT_TOKENS),
    },
    generation: {
      timeoutMs: nonEmpty(env.MANUSCRIPT_TIMEOUT_MS),
    },
    citations: {
      format: nonEmpty(env.MANUSCRIPT_CITATION_FORMAT),
    },
    logLevel: nonEmpty(env.MANUSCRIPT_LOG_LEVEL),
  };
}

async function readProjectFile(fs: FileSystem, filePath: string): Promise<PlainObject> {
  let raw: string;
  try {
    raw = await fs.read(filePath);
  } catch (error) {
    if (isNotFoundError(error)) return {};
    throw new ConfigurationError(`Cannot read ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError(`${filePath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }

  if (!isPlainObject(parsed)) {
    throw new ConfigurationError(`${filePath} must contain a JSON object`);
  }
  return parsed;
}

/**
 * Validate an already merged config object
 */
export function parseConfig(raw: unknown): ManuscriptConfig {
  const result = ConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(issue => ({ field: issue.path.join('.'), message: issue.message }));
    throw new ConfigurationError(
      `Invalid configuration: ${issues.map(i => `${i.field}: ${i.message}`).join('; ')}`,
      issues
    );
  }
  return result.data;
}

export async function loadConfig(options: LoadConfigOptions = {}): Promise<ManuscriptConfig> {
  const env = options.env ?? process.env;

  let merged: PlainObject = deepMerge({}, DEFAULT_CONFIG);
  if (options.projectFile && options.fs) {
    merged = deepMerge(merged, await readProjectFile(options.fs, options.projectFile));
  }
  merged = deepMerge(merged, fromEnv(env));

  return parseConfig(merged);
}
