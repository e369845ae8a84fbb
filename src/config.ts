import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { z } from 'zod';

export const CONFIG_FILE_NAME = '.tabular-analyst.json';

export const DEFAULT_MODEL = 'claude-sonnet-4-5';
export const DEFAULT_MAX_ITERATIONS = 15;
export const DEFAULT_FALLBACK_TEXT = 'I was not able to produce an answer for this request. Please try rephrasing the question.';

const LlmConfigSchema = z.object({
  provider: z.enum(['anthropic']).optional(),
  model: z.string().min(1).optional(),
  apiKey: z.string().optional(),
  baseUrl: z.string().optional(),
  maxOutputTokens: z.number().int().positive().optional(),
  stream: z.boolean().optional(),
});

const AgentConfigSchema = z.object({
  maxIterations: z.number().int().min(1).max(50).optional(),
  parallelTools: z.boolean().optional(),
  maxConcurrentTools: z.number().int().min(1).max(32).optional(),
  fallbackText: z.string().min(1).optional(),
});

const SandboxConfigSchema = z.object({
  tableName: z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'must be a plain SQL identifier').optional(),
  previewRows: z.number().int().min(1).max(1000).optional(),
  previewMaxBytes: z.number().int().min(256).max(65536).optional(),
  maxResultRows: z.number().int().positive().optional(),
  queryTimeoutMs: z.number().int().positive().optional(),
  allowScripts: z.boolean().optional(),
});

const OutputConfigSchema = z.object({
  maxTableRows: z.number().int().positive().optional(),
  maxPlotPoints: z.number().int().positive().optional(),
});

const JudgeConfigSchema = z.object({
  enabled: z.boolean().optional(),
  model: z.string().min(1).optional(),
});

const PersistenceConfigSchema = z.object({
  sessionsDir: z.string().optional(),
});

const LoggingConfigSchema = z.object({
  format: z.enum(['logfmt', 'json', 'console', 'none']).optional(),
  verbose: z.boolean().optional(),
});

export const ConfigurationSchema = z.object({
  llm: LlmConfigSchema.optional(),
  agent: AgentConfigSchema.optional(),
  sandbox: SandboxConfigSchema.optional(),
  output: OutputConfigSchema.optional(),
  judge: JudgeConfigSchema.optional(),
  persistence: PersistenceConfigSchema.optional(),
  logging: LoggingConfigSchema.optional(),
});

export type Configuration = z.infer<typeof ConfigurationSchema>;

export interface SandboxSettings {
  tableName: string;
  previewRows: number;
  previewMaxBytes: number;
  maxResultRows: number;
  queryTimeoutMs: number;
  allowScripts: boolean;
}

export interface Settings {
  llm: {
    provider: 'anthropic';
    model: string;
    apiKey?: string;
    baseUrl?: string;
    maxOutputTokens: number;
    stream: boolean;
  };
  agent: {
    maxIterations: number;
    parallelTools: boolean;
    maxConcurrentTools: number;
    fallbackText: string;
  };
  sandbox: SandboxSettings;
  output: {
    maxTableRows: number;
    maxPlotPoints: number;
  };
  judge: {
    enabled: boolean;
    model: string;
  };
  persistence: {
    sessionsDir?: string;
  };
  logging: {
    format: 'logfmt' | 'json' | 'console' | 'none';
    verbose: boolean;
  };
}

type Env = Record<string, string | undefined>;

function expandEnv(value: string, env: Env): string {
  return value.replace(/\$\{([^}]+)\}/g, (_match, name: string) => {
    const resolved = env[name.trim()];
    if (resolved === undefined) throw new Error(`environment variable '${name.trim()}' is not set`);
    return resolved;
  });
}

function expandDeep(obj: unknown, env: Env): unknown {
  if (typeof obj === 'string') return expandEnv(obj, env);
  if (Array.isArray(obj)) return obj.map((v) => expandDeep(v, env));
  if (obj !== null && typeof obj === 'object') {
    return Object.entries(obj).reduce<Record<string, unknown>>((acc, [k, v]) => {
      acc[k] = expandDeep(v, env);
      return acc;
    }, {});
  }
  return obj;
}

function resolveConfigPath(configPath?: string): string | undefined {
  if (typeof configPath === 'string' && configPath.length > 0) {
    if (!fs.existsSync(configPath)) throw new Error(`Configuration file not found: ${configPath}`);
    return configPath;
  }
  const local = path.join(process.cwd(), CONFIG_FILE_NAME);
  if (fs.existsSync(local)) return local;
  const home = path.join(os.homedir(), CONFIG_FILE_NAME);
  if (fs.existsSync(home)) return home;
  return undefined;
}

export function parseConfiguration(json: unknown, source = 'configuration', env: Env = process.env): Configuration {
  let expanded: unknown;
  try {
    expanded = expandDeep(json, env);
  } catch (e) {
    throw new Error(`Environment variable expansion failed in ${source}: ${e instanceof Error ? e.message : String(e)}`);
  }
  return validateConfiguration(expanded, source);
}

function validateConfiguration(value: unknown, source: string): Configuration {
  const parsed = ConfigurationSchema.safeParse(value);
  if (!parsed.success) {
    const msgs = parsed.error.issues
      .map((issue) => `  ${issue.path.map((p) => String(p)).join('.')}: ${issue.message}`)
      .join('\n');
    throw new Error(`Configuration validation failed in ${source}:\n${msgs}`);
  }
  return parsed.data;
}

/**
 * Layer overrides (command-line options) on top of a loaded configuration,
 * section by section, and validate the result against the same schema.
 */
export function withOverrides(config: Configuration, overrides: Configuration, source: string): Configuration {
  return validateConfiguration({
    llm: { ...config.llm, ...overrides.llm },
    agent: { ...config.agent, ...overrides.agent },
    sandbox: { ...config.sandbox, ...overrides.sandbox },
    output: { ...config.output, ...overrides.output },
    judge: { ...config.judge, ...overrides.judge },
    persistence: { ...config.persistence, ...overrides.persistence },
    logging: { ...config.logging, ...overrides.logging },
  }, source);
}

/**
 * Load the configuration file, or an empty configuration when none exists
 * and no explicit path was given.
 */
export function loadConfiguration(configPath?: string, env: Env = process.env): Configuration {
  const resolved = resolveConfigPath(configPath);
  if (resolved === undefined) return {};
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

const freezeSettings = (settings: Settings): Settings => {
  Object.values(settings).forEach((section) => {
    Object.freeze(section);
  });
  return Object.freeze(settings);
};

export function resolveSettings(config: Configuration = {}, env: Env = process.env): Settings {
  const model = config.llm?.model ?? DEFAULT_MODEL;
  const apiKey = config.llm?.apiKey ?? env.ANTHROPIC_API_KEY;
  return freezeSettings({
    llm: {
      provider: config.llm?.provider ?? 'anthropic',
      model,
      ...(apiKey !== undefined && apiKey.length > 0 ? { apiKey } : {}),
      ...(config.llm?.baseUrl !== undefined ? { baseUrl: config.llm.baseUrl } : {}),
      maxOutputTokens: config.llm?.maxOutputTokens ?? 4096,
      stream: config.llm?.stream ?? true,
    },
    agent: {
      maxIterations: config.agent?.maxIterations ?? DEFAULT_MAX_ITERATIONS,
      parallelTools: config.agent?.parallelTools ?? true,
      maxConcurrentTools: config.agent?.maxConcurrentTools ?? 4,
      fallbackText: config.agent?.fallbackText ?? DEFAULT_FALLBACK_TEXT,
    },
    sandbox: {
      tableName: config.sandbox?.tableName ?? 'data',
      previewRows: config.sandbox?.previewRows ?? 50,
      previewMaxBytes: config.sandbox?.previewMaxBytes ?? 4000,
      maxResultRows: config.sandbox?.maxResultRows ?? 100_000,
      queryTimeoutMs: config.sandbox?.queryTimeoutMs ?? 10_000,
      allowScripts: config.sandbox?.allowScripts ?? true,
    },
    output: {
      maxTableRows: config.output?.maxTableRows ?? 200,
      maxPlotPoints: config.output?.maxPlotPoints ?? 100,
    },
    judge: {
      enabled: config.judge?.enabled ?? false,
      model: config.judge?.model ?? model,
    },
    persistence: {
      ...(config.persistence?.sessionsDir !== undefined ? { sessionsDir: config.persistence.sessionsDir } : {}),
    },
    logging: {
      format: config.logging?.format ?? 'logfmt',
      verbose: config.logging?.verbose ?? false,
    },
  });
}
