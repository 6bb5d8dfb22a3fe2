import { promises as fs, Stats } from 'node:fs';
import path from 'node:path';
import yaml from 'yaml';
import { z } from 'zod';
import { DocscoutError, errnoCode, errorMessage } from './errors.js';
import { DEFAULT_MAX_COMMAND_LENGTH } from './validator.js';
import { DEFAULT_MAX_CONCURRENT, DEFAULT_MAX_OUTPUT_BYTES, DEFAULT_TIMEOUT_MS } from './executor.js';
import { SessionManagerConfigSchema } from './sessions/index.js';
import { DEFAULT_FINAL_MARKER, DEFAULT_MAX_STEPS, DEFAULT_THINKING_MARKERS } from './orchestrator/index.js';

export const CONFIG_FILE_NAME = 'docscout.yaml';

// ============================================
// Schema
// ============================================

export const DocscoutConfigSchema = z.object({
  document_root: z.string().min(1).default('./docs'),
  server: z
    .object({
      host: z.string().default('0.0.0.0'),
      port: z.number().int().min(1).max(65535).default(8000),
      cors_origins: z.array(z.string()).default(['http://localhost:3000']),
    })
    .default({}),
  validator: z
    .object({
      max_command_length: z.number().int().positive().default(DEFAULT_MAX_COMMAND_LENGTH),
    })
    .default({}),
  executor: z
    .object({
      timeout_ms: z.number().int().positive().default(DEFAULT_TIMEOUT_MS),
      max_output_bytes: z.number().int().positive().default(DEFAULT_MAX_OUTPUT_BYTES),
      max_concurrent: z.number().int().positive().default(DEFAULT_MAX_CONCURRENT),
    })
    .default({}),
  session: SessionManagerConfigSchema.default({}),
  orchestrator: z
    .object({
      max_steps: z.number().int().positive().default(DEFAULT_MAX_STEPS),
      thinking_markers: z.array(z.string().min(1)).default([...DEFAULT_THINKING_MARKERS]),
      final_marker: z.string().min(1).default(DEFAULT_FINAL_MARKER),
    })
    .default({}),
  audit: z
    .object({
      sink: z.enum(['jsonl', 'console']).default('jsonl'),
      path: z.string().default('logs/audit.jsonl'),
    })
    .default({}),
  llm: z
    .object({
      model: z.string().default('gpt-4o-mini'),
      temperature: z.number().min(0).max(2).default(0.2),
      max_tokens: z.number().int().positive().optional(),
    })
    .default({}),
});

export type DocscoutConfig = z.infer<typeof DocscoutConfigSchema>;

export class ConfigError extends DocscoutError {
  constructor(message: string) {
    super(message, 'config_invalid', 500);
    this.name = 'ConfigError';
  }
}

export interface LoadConfigOptions {
  /** Explicit config file; must exist */
  configPath?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

// ============================================
// Loading
// ============================================

function formatZodError(error: z.ZodError): string {
  return error.errors
    .map(err => {
      const path = err.path.join('.');
      return `  - ${path || '(root)'}: ${err.message}`;
    })
    .join('\n');
}

async function readConfigFile(configPath: string, required: boolean): Promise<unknown> {
  let content: string;
  try {
    content = await fs.readFile(configPath, 'utf-8');
  } catch (error) {
    if (!required && errnoCode(error) === 'ENOENT') {
      return {};
    }
    throw new ConfigError(`Failed to read ${configPath}: ${errorMessage(error)}`);
  }

  try {
    return yaml.parse(content) ?? {};
  } catch (error) {
    throw new ConfigError(`Failed to parse ${configPath}: ${errorMessage(error)}`);
  }
}

function envNumber(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigError(`${name} must be a positive number, got '${raw}'`);
  }
  return value;
}

/**
 * Apply environment overrides on top of the file configuration
 */
export function applyEnvOverrides(config: DocscoutConfig, env: NodeJS.ProcessEnv): DocscoutConfig {
  const port = envNumber(env, 'DOCSCOUT_PORT');
  const commandTimeoutS = envNumber(env, 'COMMAND_TIMEOUT');
  const sessionTimeoutS = envNumber(env, 'SESSION_TIMEOUT');
  const maxCommandLength = envNumber(env, 'MAX_COMMAND_LENGTH');

  const merged = {
    ...config,
    document_root: env.DOCSCOUT_ROOT || config.document_root,
    server: {
      ...config.server,
      host: env.DOCSCOUT_HOST || config.server.host,
      port: port ?? config.server.port,
    },
    validator: {
      max_command_length: maxCommandLength ?? config.validator.max_command_length,
    },
    executor: {
      ...config.executor,
      timeout_ms: commandTimeoutS !== undefined ? Math.round(commandTimeoutS * 1000) : config.executor.timeout_ms,
    },
    session: {
      ...config.session,
      idle_timeout_s: sessionTimeoutS ?? config.session.idle_timeout_s,
    },
  };

  const parsed = DocscoutConfigSchema.safeParse(merged);
  if (!parsed.success) {
    throw new ConfigError(`Invalid environment override:\n${formatZodError(parsed.error)}`);
  }
  return parsed.data;
}

/**
 * Load docscout.yaml (optional unless given explicitly), apply environment
 * overrides and resolve relative paths against the config file's directory.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<DocscoutConfig> {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;
  const explicit = options.configPath ?? env.DOCSCOUT_CONFIG;
  const configPath = path.resolve(cwd, explicit ?? CONFIG_FILE_NAME);
  const baseDir = path.dirname(configPath);

  const raw = await readConfigFile(configPath, explicit !== undefined);
  const parsed = DocscoutConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Configuration validation failed (${configPath}):\n${formatZodError(parsed.error)}`);
  }

  const config = applyEnvOverrides(parsed.data, env);

  return {
    ...config,
    // An override from the environment is relative to the working directory
    document_root: env.DOCSCOUT_ROOT
      ? path.resolve(cwd, env.DOCSCOUT_ROOT)
      : path.resolve(baseDir, config.document_root),
    audit: { ...config.audit, path: path.resolve(baseDir, config.audit.path) },
    session: {
      ...config.session,
      ...(config.session.sessions_dir !== undefined
        ? { sessions_dir: path.resolve(baseDir, config.session.sessions_dir) }
        : {}),
    },
  };
}

/**
 * Check that the document root exists and is a directory
 */
export async function assertDocumentRoot(root: string): Promise<void> {
  let stats: Stats;
  try {
    stats = await fs.stat(root);
  } catch (error) {
    throw new ConfigError(`Document root ${root} is not accessible: ${errorMessage(error)}`);
  }
  if (!stats.isDirectory()) {
    throw new ConfigError(`Document root ${root} is not a directory`);
  }
}
