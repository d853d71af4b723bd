/**
 * Config Module
 *
 * Responsibilities:
 * - Validate the task configuration file (snake_case JSON)
 * - Resolve provider, model and API key from the environment
 * - Derive the default output location from the target domain
 *
 * Usage:
 * ```typescript
 * const config = await loadTaskConfig('task.json');
 * ```
 */

import { z } from 'zod';
import { readFile } from 'fs/promises';
import { join } from 'path';
import { ConfigError } from '../errors/index.js';
import { hostnameOf } from '../tree/index.js';
import type { AIProvider } from '../types/index.js';

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULT_MODELS: Record<AIProvider, string> = {
  anthropic: 'claude-sonnet-4-20250514',
  openai: 'gpt-4o-mini',
  google: 'gemini-1.5-flash',
};

/** Environment variables holding each provider's key, in lookup order */
export const API_KEY_ENV: Record<AIProvider, readonly string[]> = {
  anthropic: ['ANTHROPIC_API_KEY', 'CLAUDE_API_KEY'],
  openai: ['OPENAI_API_KEY'],
  google: ['GOOGLE_API_KEY', 'GEMINI_API_KEY'],
};

const DEFAULT_OUTPUT_DIR = 'output';

// ============================================================================
// Schema
// ============================================================================

const httpUrl = z
  .string()
  .trim()
  .url({ message: 'url must be an absolute URL' })
  .refine((val) => hostnameOf(val) !== null, {
    message: 'url must be an http(s) URL with a hostname',
  });

const providerSchema = z.enum(['anthropic', 'openai', 'google']);

export const TaskConfigFileSchema = z
  .object({
    url: httpUrl,
    delay: z.number().min(0).default(1.0),
    max_pages: z.number().int().positive().default(50),
    output: z.string().trim().min(1).optional(),
    enable_dynamic_loading: z.boolean().default(false),
    ai_provider: providerSchema.optional(),
    ai_model: z.string().trim().min(1).optional(),
    max_duration_seconds: z.number().positive().optional(),
    fetch_timeout_ms: z.number().int().positive().default(15000),
    ai_timeout_ms: z.number().int().positive().default(60000),
    wait_timeout_ms: z.number().int().positive().default(10000),
    max_fetch_attempts: z.number().int().positive().default(3),
  })
  .passthrough();

export type TaskConfigFile = z.input<typeof TaskConfigFileSchema>;

/**
 * Fully resolved task configuration
 */
export interface TaskConfig {
  url: string;
  domain: string;
  /** Seconds between node iterations */
  delay: number;
  maxPages: number;
  output: string;
  enableDynamicLoading: boolean;
  aiProvider: AIProvider;
  aiModel: string;
  apiKey: string;
  maxDurationSeconds: number | null;
  fetchTimeoutMs: number;
  aiTimeoutMs: number;
  waitTimeoutMs: number;
  maxFetchAttempts: number;
  /** Chromium binary for dynamic loading (BROWSER_EXECUTABLE_PATH) */
  browserExecutablePath: string | null;
}

export type Env = Record<string, string | undefined>;

// ============================================================================
// Resolution
// ============================================================================

/**
 * Default result filename for a domain: ai_crawl_results_example_com.json
 */
export function defaultOutputFileName(domain: string): string {
  return `ai_crawl_results_${domain.replace(/\./g, '_')}.json`;
}

function firstEnv(env: Env, names: readonly string[]): string | undefined {
  for (const name of names) {
    const value = env[name]?.trim();
    if (value) return value;
  }
  return undefined;
}

/**
 * Validate a raw config object and resolve it against the environment
 *
 * @throws ConfigError when validation fails or the provider key is missing
 */
export function resolveTaskConfig(raw: unknown, env: Env = process.env): TaskConfig {
  const parseResult = TaskConfigFileSchema.safeParse(raw);
  if (!parseResult.success) {
    const errors = parseResult.error.errors.map((e) => `${e.path.join('.') || '(root)'}: ${e.message}`);
    throw new ConfigError(`Invalid task config: ${errors.join('; ')}`, errors);
  }
  const file = parseResult.data;

  const envProvider = env.AI_PROVIDER?.trim().toLowerCase();
  let aiProvider: AIProvider = 'anthropic';
  if (file.ai_provider) {
    aiProvider = file.ai_provider;
  } else if (envProvider) {
    const parsed = providerSchema.safeParse(envProvider);
    if (!parsed.success) {
      throw new ConfigError(`Unsupported AI_PROVIDER "${envProvider}"`);
    }
    aiProvider = parsed.data;
  }

  const apiKey = firstEnv(env, API_KEY_ENV[aiProvider]);
  if (!apiKey) {
    throw new ConfigError(
      `Missing API key for ${aiProvider}: set ${API_KEY_ENV[aiProvider].join(' or ')}`
    );
  }

  const domain = hostnameOf(file.url);
  if (domain === null) {
    throw new ConfigError(`url has no hostname: ${file.url}`);
  }

  const outputDir = env.OUTPUT_DIR?.trim() || DEFAULT_OUTPUT_DIR;

  return {
    url: file.url,
    domain,
    delay: file.delay,
    maxPages: file.max_pages,
    output: file.output ?? join(outputDir, defaultOutputFileName(domain)),
    enableDynamicLoading: file.enable_dynamic_loading,
    aiProvider,
    aiModel: file.ai_model ?? (env.AI_MODEL?.trim() || DEFAULT_MODELS[aiProvider]),
    apiKey,
    maxDurationSeconds: file.max_duration_seconds ?? null,
    fetchTimeoutMs: file.fetch_timeout_ms,
    aiTimeoutMs: file.ai_timeout_ms,
    waitTimeoutMs: file.wait_timeout_ms,
    maxFetchAttempts: file.max_fetch_attempts,
    browserExecutablePath: env.BROWSER_EXECUTABLE_PATH?.trim() || null,
  };
}

/**
 * Read and resolve a task config file
 */
export async function loadTaskConfig(path: string, env: Env = process.env): Promise<TaskConfig> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Cannot read config file ${path}`, error instanceof Error ? error.message : error);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`Config file ${path} is not valid JSON`, error instanceof Error ? error.message : error);
  }
  return resolveTaskConfig(raw, env);
}
