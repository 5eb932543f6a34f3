/**
 * Runtime configuration.
 *
 * Resolution order, highest first:
 * 1. Explicit overrides passed to `loadConfig`
 * 2. Environment variables
 * 3. `etp-assistant.config.json` in the working directory
 * 4. Defaults
 */

import { readFileSync, existsSync } from 'node:fs';
import { homedir } from 'node:os';
import { join, resolve } from 'node:path';
import { z } from 'zod';
import { logger } from './logger.js';

export const CONFIG_FILE_NAME = 'etp-assistant.config.json';

const ConfigFileSchema = z
  .object({
    anthropicApiKey: z.string().min(1).optional(),
    dbPath: z.string().min(1).optional(),
    model: z.string().min(1).optional(),
    shortTimeoutMs: z.number().int().positive().optional(),
    longTimeoutMs: z.number().int().positive().optional(),
    maxRetries: z.number().int().min(0).max(5).optional(),
    knowledgePath: z.string().min(1).optional(),
  })
  .passthrough();

export const AppConfigSchema = z.object({
  anthropicApiKey: z.string().min(1).nullable(),
  dbPath: z.string().min(1),
  model: z.string().min(1).nullable(),
  shortTimeoutMs: z.number().int().positive(),
  longTimeoutMs: z.number().int().positive(),
  maxRetries: z.number().int().min(0).max(5),
  knowledgePath: z.string().min(1).nullable(),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

export const DEFAULT_CONFIG: AppConfig = {
  anthropicApiKey: null,
  dbPath: join(homedir(), '.etp-assistant', 'etp-assistant.db'),
  model: null,
  shortTimeoutMs: 60_000,
  longTimeoutMs: 120_000,
  maxRetries: 0,
  knowledgePath: null,
};

type ConfigFile = z.infer<typeof ConfigFileSchema>;

function readConfigFile(cwd: string): ConfigFile {
  const configPath = resolve(cwd, CONFIG_FILE_NAME);
  if (!existsSync(configPath)) {
    logger.debug(`No config file found at ${CONFIG_FILE_NAME}`);
    return {};
  }

  let parsedJson: unknown;
  try {
    parsedJson = JSON.parse(readFileSync(configPath, 'utf-8'));
  } catch (error) {
    logger.warn('Config file could not be read as JSON', error, { configPath });
    return {};
  }

  const result = ConfigFileSchema.safeParse(parsedJson);
  if (!result.success) {
    logger.warn('Config file has invalid structure', undefined, {
      issues: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      configPath,
    });
    return {};
  }
  return result.data;
}

function intFromEnv(name: string): number | undefined {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    logger.warn(`Ignoring non-integer ${name}`, undefined, { value: raw });
    return undefined;
  }
  return value;
}

function stringFromEnv(name: string): string | undefined {
  const raw = process.env[name];
  return raw && raw.trim() !== '' ? raw.trim() : undefined;
}

/**
 * Build the effective configuration. Invalid merged values fall back to defaults field by field.
 */
export function loadConfig(overrides: Partial<AppConfig> = {}, cwd: string = process.cwd()): AppConfig {
  const file = readConfigFile(cwd);

  const merged = {
    anthropicApiKey:
      overrides.anthropicApiKey ?? stringFromEnv('ANTHROPIC_API_KEY') ?? file.anthropicApiKey ?? DEFAULT_CONFIG.anthropicApiKey,
    dbPath: overrides.dbPath ?? stringFromEnv('ETP_DB_PATH') ?? file.dbPath ?? DEFAULT_CONFIG.dbPath,
    model: overrides.model ?? stringFromEnv('ETP_MODEL') ?? file.model ?? DEFAULT_CONFIG.model,
    shortTimeoutMs:
      overrides.shortTimeoutMs ?? intFromEnv('ETP_SHORT_TIMEOUT_MS') ?? file.shortTimeoutMs ?? DEFAULT_CONFIG.shortTimeoutMs,
    longTimeoutMs:
      overrides.longTimeoutMs ?? intFromEnv('ETP_LONG_TIMEOUT_MS') ?? file.longTimeoutMs ?? DEFAULT_CONFIG.longTimeoutMs,
    maxRetries: overrides.maxRetries ?? intFromEnv('ETP_MAX_RETRIES') ?? file.maxRetries ?? DEFAULT_CONFIG.maxRetries,
    knowledgePath:
      overrides.knowledgePath ?? stringFromEnv('ETP_KNOWLEDGE_PATH') ?? file.knowledgePath ?? DEFAULT_CONFIG.knowledgePath,
  };

  const result = AppConfigSchema.safeParse(merged);
  if (result.success) {
    return result.data;
  }

  logger.warn('Configuration contains invalid values, using defaults for them', undefined, {
    issues: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
  });
  const invalidKeys = new Set(result.error.issues.map((issue) => String(issue.path[0])));
  const repaired: AppConfig = { ...DEFAULT_CONFIG };
  if (!invalidKeys.has('anthropicApiKey')) repaired.anthropicApiKey = merged.anthropicApiKey;
  if (!invalidKeys.has('dbPath')) repaired.dbPath = merged.dbPath;
  if (!invalidKeys.has('model')) repaired.model = merged.model;
  if (!invalidKeys.has('shortTimeoutMs')) repaired.shortTimeoutMs = merged.shortTimeoutMs;
  if (!invalidKeys.has('longTimeoutMs')) repaired.longTimeoutMs = merged.longTimeoutMs;
  if (!invalidKeys.has('maxRetries')) repaired.maxRetries = merged.maxRetries;
  if (!invalidKeys.has('knowledgePath')) repaired.knowledgePath = merged.knowledgePath;
  return repaired;
}
