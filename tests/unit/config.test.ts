/**
 * Unit tests for config.ts
 *
 * - docscout.yaml validation against the Zod schema
 * - environment overrides
 * - path resolution relative to the config file
 */

import { promises as fs } from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import { v4 as uuidv4 } from 'uuid';
import {
  ConfigError,
  DocscoutConfigSchema,
  applyEnvOverrides,
  assertDocumentRoot,
  loadConfig,
} from '../../src/config.js';

describe('config.ts', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = path.join(os.tmpdir(), `config-test-${uuidv4()}`);
    await fs.mkdir(tempDir, { recursive: true });
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  describe('loadConfig', () => {
    it('should fall back to defaults without a config file', async () => {
      const config = await loadConfig({ cwd: tempDir, env: {} });

      expect(config.document_root).toBe(path.join(tempDir, 'docs'));
      expect(config.server).toEqual({ host: '0.0.0.0', port: 8000, cors_origins: ['http://localhost:3000'] });
      expect(config.validator.max_command_length).toBe(1000);
      expect(config.executor).toEqual({ timeout_ms: 30_000, max_output_bytes: 65_536, max_concurrent: 4 });
      expect(config.session).toEqual({ idle_timeout_s: 3600, expire_timeout_s: 86_400, sweep_interval_s: 60 });
      expect(config.orchestrator.max_steps).toBe(30);
      expect(config.audit).toEqual({ sink: 'jsonl', path: path.join(tempDir, 'logs', 'audit.jsonl') });
      expect(config.llm).toEqual({ model: 'gpt-4o-mini', temperature: 0.2 });
    });

    it('should read docscout.yaml and resolve paths against its directory', async () => {
      await fs.writeFile(
        path.join(tempDir, 'docscout.yaml'),
        `document_root: content
executor:
  timeout_ms: 5000
session:
  sessions_dir: state/sessions
audit:
  sink: console
llm:
  model: gpt-4o
  max_tokens: 800
`
      );

      const config = await loadConfig({ cwd: tempDir, env: {} });

      expect(config.document_root).toBe(path.join(tempDir, 'content'));
      expect(config.executor.timeout_ms).toBe(5000);
      expect(config.executor.max_concurrent).toBe(4);
      expect(config.session.sessions_dir).toBe(path.join(tempDir, 'state', 'sessions'));
      expect(config.audit.sink).toBe('console');
      expect(config.llm).toEqual({ model: 'gpt-4o', temperature: 0.2, max_tokens: 800 });
    });

    it('should load an explicit config path', async () => {
      const configDir = path.join(tempDir, 'conf');
      await fs.mkdir(configDir);
      await fs.writeFile(path.join(configDir, 'custom.yaml'), 'document_root: ../docs\n');

      const config = await loadConfig({ cwd: tempDir, configPath: 'conf/custom.yaml', env: {} });
      expect(config.document_root).toBe(path.join(tempDir, 'docs'));
    });

    it('should fail when an explicit config path is missing', async () => {
      await expect(loadConfig({ cwd: tempDir, configPath: 'missing.yaml', env: {} })).rejects.toThrow(
        /^Failed to read .*missing\.yaml/
      );
    });

    it('should report schema violations with their path', async () => {
      await fs.writeFile(path.join(tempDir, 'docscout.yaml'), 'server:\n  port: not-a-number\n');

      const failure = loadConfig({ cwd: tempDir, env: {} });
      await expect(failure).rejects.toBeInstanceOf(ConfigError);
      await expect(failure).rejects.toThrow('  - server.port: Expected number, received string');
    });

    it('should report YAML syntax errors', async () => {
      await fs.writeFile(path.join(tempDir, 'docscout.yaml'), 'server: [unclosed\n');
      await expect(loadConfig({ cwd: tempDir, env: {} })).rejects.toThrow(/^Failed to parse /);
    });

    it('should treat an empty file as defaults', async () => {
      await fs.writeFile(path.join(tempDir, 'docscout.yaml'), '');
      const config = await loadConfig({ cwd: tempDir, env: {} });
      expect(config.server.port).toBe(8000);
    });

    it('should resolve DOCSCOUT_ROOT against the working directory', async () => {
      const configDir = path.join(tempDir, 'conf');
      await fs.mkdir(configDir);
      await fs.writeFile(path.join(configDir, 'docscout.yaml'), 'document_root: ignored\n');

      const config = await loadConfig({
        cwd: tempDir,
        configPath: 'conf/docscout.yaml',
        env: { DOCSCOUT_ROOT: 'handbook' },
      });
      expect(config.document_root).toBe(path.join(tempDir, 'handbook'));
    });

    it('should honour DOCSCOUT_CONFIG', async () => {
      await fs.writeFile(path.join(tempDir, 'other.yaml'), 'server:\n  port: 9100\n');
      const config = await loadConfig({ cwd: tempDir, env: { DOCSCOUT_CONFIG: 'other.yaml' } });
      expect(config.server.port).toBe(9100);
    });
  });

  describe('applyEnvOverrides', () => {
    const defaults = DocscoutConfigSchema.parse({});

    it('should apply every supported variable', () => {
      const config = applyEnvOverrides(defaults, {
        DOCSCOUT_ROOT: '/srv/handbook',
        DOCSCOUT_HOST: '127.0.0.1',
        DOCSCOUT_PORT: '9000',
        COMMAND_TIMEOUT: '2.5',
        SESSION_TIMEOUT: '120',
        MAX_COMMAND_LENGTH: '500',
      });

      expect(config.document_root).toBe('/srv/handbook');
      expect(config.server.host).toBe('127.0.0.1');
      expect(config.server.port).toBe(9000);
      expect(config.executor.timeout_ms).toBe(2500);
      expect(config.session.idle_timeout_s).toBe(120);
      expect(config.validator.max_command_length).toBe(500);
    });

    it('should ignore empty variables', () => {
      expect(applyEnvOverrides(defaults, { DOCSCOUT_PORT: '', DOCSCOUT_HOST: '' })).toEqual(defaults);
    });

    it('should reject values that are not positive numbers', () => {
      expect(() => applyEnvOverrides(defaults, { DOCSCOUT_PORT: 'abc' })).toThrow(
        "DOCSCOUT_PORT must be a positive number, got 'abc'"
      );
      expect(() => applyEnvOverrides(defaults, { COMMAND_TIMEOUT: '-1' })).toThrow(ConfigError);
    });

    it('should validate the merged result', () => {
      expect(() => applyEnvOverrides(defaults, { DOCSCOUT_PORT: '70000' })).toThrow(/^Invalid environment override:/);
    });
  });

  describe('assertDocumentRoot', () => {
    it('should accept a directory', async () => {
      await expect(assertDocumentRoot(tempDir)).resolves.toBeUndefined();
    });

    it('should reject a missing path', async () => {
      await expect(assertDocumentRoot(path.join(tempDir, 'missing'))).rejects.toThrow(/is not accessible/);
    });

    it('should reject a file', async () => {
      const file = path.join(tempDir, 'notes.md');
      await fs.writeFile(file, '# Notes\n');
      await expect(assertDocumentRoot(file)).rejects.toThrow(`Document root ${file} is not a directory`);
    });
  });
});
