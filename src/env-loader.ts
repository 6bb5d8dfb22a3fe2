import { existsSync } from 'node:fs';
import path from 'node:path';
import dotenv from 'dotenv';
import { logger } from './logger.js';
import { errorMessage } from './errors.js';

/**
 * Load .env files in cascading order (local overrides global)
 * Priority: process.env > working directory/.env > document root/.env
 *
 * Uses dotenv with override: false, so earlier loaded files take precedence
 *
 * @returns Array of successfully loaded .env file paths
 */
export function loadEnvFiles(cwd: string, documentRoot?: string): string[] {
  const loadedFiles: string[] = [];

  const envFilePaths = [path.join(cwd, '.env')];
  if (documentRoot) {
    const rootEnv = path.join(path.resolve(cwd, documentRoot), '.env');
    if (!envFilePaths.includes(rootEnv)) {
      envFilePaths.push(rootEnv);
    }
  }

  for (const envPath of envFilePaths) {
    if (!existsSync(envPath)) {
      continue;
    }
    const result = dotenv.config({ path: envPath, override: false });
    if (result.error) {
      logger.warn(`Failed to load ${envPath}: ${errorMessage(result.error)}`);
      continue;
    }
    loadedFiles.push(envPath);
  }

  return loadedFiles;
}
