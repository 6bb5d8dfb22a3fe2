import path from 'node:path';
import { DocscoutConfig, loadConfig } from '../config.js';
import { loadEnvFiles } from '../env-loader.js';
import { logger, setVerbose } from '../logger.js';

/**
 * Options shared by every command
 */
export interface CommonOptions {
  config?: string;
  root?: string;
  verbose?: boolean;
}

/**
 * Load .env files and the configuration, then apply command-line flags,
 * which win over both.
 */
export async function loadCommandConfig(
  options: CommonOptions,
  overrides: { port?: number; host?: string } = {}
): Promise<DocscoutConfig> {
  if (options.verbose) {
    setVerbose(true);
  }

  const cwd = process.cwd();
  const loaded = loadEnvFiles(cwd, options.root ?? process.env.DOCSCOUT_ROOT);
  for (const file of loaded) {
    logger.debug(`Loaded environment from ${file}`);
  }

  const config = await loadConfig({ configPath: options.config, cwd });

  return {
    ...config,
    document_root: options.root ? path.resolve(cwd, options.root) : config.document_root,
    server: {
      ...config.server,
      ...(overrides.port !== undefined ? { port: overrides.port } : {}),
      ...(overrides.host !== undefined ? { host: overrides.host } : {}),
    },
  };
}

/**
 * Commander argument parser for port numbers
 */
export function parsePort(value: string): number {
  const port = parseInt(value, 10);
  if (isNaN(port) || port < 1 || port > 65535) {
    throw new Error('port must be an integer between 1 and 65535');
  }
  return port;
}
