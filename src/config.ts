import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { z } from 'zod';

import { parseDurationMs } from './cache/ttl.js';
import { ModelPriceSchema } from './monitoring/pricing.js';
import { CACHE_POLICIES } from './pipeline/cache-policy.js';
import { MAX_TIMEOUT_MS, MIN_TIMEOUT_MS } from './pipeline/request.js';

const CONFIG_FILENAME = '.toolrun.json';
export const DATA_DIR_ENV = 'TOOLRUN_DATA_DIR';

const DurationSchema = z.union([z.number(), z.string()]).transform((value, ctx) => {
  const ms = parseDurationMs(value);
  if (ms === undefined) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'expected milliseconds or a duration like 5m/2h/7d' });
    return z.NEVER;
  }
  return ms;
});

const CacheSectionSchema = z.object({
  maxEntries: z.number().int().positive().default(1000),
}).strict();

const ArtifactsSectionSchema = z.object({
  dir: z.string().min(1).optional(),
  inlineThresholdBytes: z.number().int().positive().default(1_000_000),
  maxAge: DurationSchema.default('24h'),
}).strict();

const TimeoutsSectionSchema = z.object({
  defaultMs: z.number().int().min(MIN_TIMEOUT_MS).max(MAX_TIMEOUT_MS).default(30_000),
  maxRetries: z.number().int().min(0).max(10).default(3),
  retryOnTimeout: z.boolean().default(true),
}).strict();

const MonitoringSectionSchema = z.object({
  enabled: z.boolean().default(true),
  dir: z.string().min(1).optional(),
  traceRetention: DurationSchema.default('7d'),
  metricsRetention: DurationSchema.default('30d'),
}).strict();

const LoggingSectionSchema = z.object({
  format: z.enum(['logfmt', 'json', 'console', 'none']).default('logfmt'),
}).strict();

export const ConfigurationSchema = z.object({
  storageDir: z.string().min(1).optional(),
  cache: CacheSectionSchema.default({}),
  artifacts: ArtifactsSectionSchema.default({}),
  timeouts: TimeoutsSectionSchema.default({}),
  monitoring: MonitoringSectionSchema.default({}),
  toolPolicies: z.record(z.string(), z.enum(CACHE_POLICIES)).default({}),
  pricing: z.record(z.string(), ModelPriceSchema).default({}),
  logging: LoggingSectionSchema.default({}),
}).strict();

export type Configuration = z.output<typeof ConfigurationSchema>;
export type ConfigurationInput = z.input<typeof ConfigurationSchema>;

export interface StorageLayout {
  root: string;
  artifactsDir: string;
  tracesDir: string;
  metricsDir: string;
}

/** Replaces `${NAME}` with the environment value; unset variables expand to an empty string. */
export function expandEnv(str: string, env: NodeJS.ProcessEnv = process.env): string {
  return str.replace(/\$\{([^}]+)\}/g, (_m: string, name: string) => env[name] ?? '');
}

function expandDeep(value: unknown, env: NodeJS.ProcessEnv): unknown {
  if (typeof value === 'string') return expandEnv(value, env);
  if (Array.isArray(value)) return value.map((item) => expandDeep(item, env));
  if (value !== null && typeof value === 'object') {
    return Object.fromEntries(Object.entries(value).map(([key, item]) => [key, expandDeep(item, env)]));
  }
  return value;
}

function resolveConfigPath(configPath?: string): string | undefined {
  if (typeof configPath === 'string' && configPath.length > 0) {
    if (!fs.existsSync(configPath)) throw new Error(`Configuration file not found: ${configPath}`);
    return configPath;
  }
  const local = path.join(process.cwd(), CONFIG_FILENAME);
  if (fs.existsSync(local)) return local;
  const home = path.join(os.homedir(), CONFIG_FILENAME);
  if (fs.existsSync(home)) return home;
  return undefined;
}

export function parseConfiguration(raw: unknown, source = 'configuration', env: NodeJS.ProcessEnv = process.env): Configuration {
  const parsed = ConfigurationSchema.safeParse(expandDeep(raw, env));
  if (!parsed.success) {
    const msgs = parsed.error.issues
      .map((issue) => `  ${issue.path.map((p) => String(p)).join('.')}: ${issue.message}`)
      .join('\n');
    throw new Error(`Configuration validation failed in ${source}:\n${msgs}`);
  }
  return parsed.data;
}

/**
 * An explicit path must exist. Without one, `./.toolrun.json` then `~/.toolrun.json`
 * are tried, and built-in defaults apply when neither is present.
 */
export function loadConfiguration(configPath?: string, env: NodeJS.ProcessEnv = process.env): Configuration {
  const resolved = resolveConfigPath(configPath);
  if (resolved === undefined) return parseConfiguration({}, 'defaults', env);
  let raw: string;
  try {
    raw = fs.readFileSync(resolved, 'utf-8');
  } catch (e) {
    throw new Error(`Failed to read configuration file ${resolved}: ${e instanceof Error ? e.message : String(e)}`);
  }
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (e) {
    throw new Error(`Invalid JSON in configuration file ${resolved}: ${e instanceof Error ? e.message : String(e)}`);
  }
  return parseConfiguration(json, resolved, env);
}

export function platformDataDir(
  platform: NodeJS.Platform = process.platform,
  env: NodeJS.ProcessEnv = process.env,
  home: string = os.homedir(),
): string {
  if (platform === 'win32') {
    const base = env.LOCALAPPDATA ?? path.join(home, 'AppData', 'Local');
    return path.join(base, 'toolrun');
  }
  if (platform === 'darwin') return path.join(home, 'Library', 'Application Support', 'toolrun');
  const xdg = env.XDG_DATA_HOME;
  return path.join(xdg !== undefined && xdg.length > 0 ? xdg : path.join(home, '.local', 'share'), 'toolrun');
}

// config storageDir > TOOLRUN_DATA_DIR > platform data directory
export function resolveStorageDir(config: Pick<Configuration, 'storageDir'>, env: NodeJS.ProcessEnv = process.env): string {
  if (config.storageDir !== undefined) return path.resolve(config.storageDir);
  const fromEnv = env[DATA_DIR_ENV];
  if (fromEnv !== undefined && fromEnv.length > 0) return path.resolve(fromEnv);
  return platformDataDir(process.platform, env);
}

export function resolveStorageLayout(config: Configuration, env: NodeJS.ProcessEnv = process.env): StorageLayout {
  const root = resolveStorageDir(config, env);
  const monitoringDir = config.monitoring.dir !== undefined ? path.resolve(config.monitoring.dir) : path.join(root, 'monitoring');
  return {
    root,
    artifactsDir: config.artifacts.dir !== undefined ? path.resolve(config.artifacts.dir) : root,
    tracesDir: path.join(monitoringDir, 'traces'),
    metricsDir: path.join(monitoringDir, 'metrics'),
  };
}
