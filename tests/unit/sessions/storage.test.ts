import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { promises as fs } from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { SessionStorage } from '../../../src/sessions/storage.js';
import type { SessionSnapshot } from '../../../src/sessions/types.js';
import { SessionState } from '../../../src/types.js';

function snapshot(id: string, overrides: Partial<SessionSnapshot> = {}): SessionSnapshot {
  return {
    id,
    created_at: '2026-01-15T10:00:00.000Z',
    last_active_at: '2026-01-15T10:05:00.000Z',
    state: SessionState.ACTIVE,
    turns: [
      { role: 'user', content: 'Where is the install guide?', attempts: [], started_at: '2026-01-15T10:00:00.000Z' },
    ],
    sequence_no: 4,
    ...overrides,
  };
}

describe('SessionStorage', () => {
  let testDir: string;
  let storage: SessionStorage;

  beforeEach(async () => {
    testDir = path.join(os.tmpdir(), `test-sessions-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    await fs.mkdir(testDir, { recursive: true });
    storage = new SessionStorage(testDir);
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await fs.rm(testDir, { recursive: true, force: true });
  });

  describe('saveSnapshot and loadSnapshot', () => {
    it('should save and load a snapshot', async () => {
      await storage.saveSnapshot(snapshot('sess_1'));
      expect(await storage.loadSnapshot('sess_1')).toEqual(snapshot('sess_1'));
    });

    it('should write snapshot.json inside the session directory', async () => {
      await storage.saveSnapshot(snapshot('sess_2'));

      const content = await fs.readFile(path.join(testDir, 'sess_2', 'snapshot.json'), 'utf-8');
      expect(JSON.parse(content)).toEqual(snapshot('sess_2'));
      expect(await fs.readdir(path.join(testDir, 'sess_2'))).toEqual(['snapshot.json']);
    });

    it('should overwrite an earlier snapshot', async () => {
      await storage.saveSnapshot(snapshot('sess_3'));
      await storage.saveSnapshot(snapshot('sess_3', { state: SessionState.EXPIRED }));

      const loaded = await storage.loadSnapshot('sess_3');
      expect(loaded?.state).toBe(SessionState.EXPIRED);
    });

    it('should return null for a missing snapshot', async () => {
      expect(await storage.loadSnapshot('nope')).toBeNull();
    });

    it('should treat a corrupt snapshot as missing', async () => {
      jest.spyOn(console, 'error').mockImplementation(() => undefined);
      await fs.mkdir(path.join(testDir, 'broken'), { recursive: true });
      await fs.writeFile(path.join(testDir, 'broken', 'snapshot.json'), '{"id": 42', 'utf-8');

      expect(await storage.loadSnapshot('broken')).toBeNull();
    });

    it('should default a missing sequence number to 0', async () => {
      const { sequence_no: _unused, ...legacy } = snapshot('sess_4');
      await fs.mkdir(path.join(testDir, 'sess_4'), { recursive: true });
      await fs.writeFile(path.join(testDir, 'sess_4', 'snapshot.json'), JSON.stringify(legacy), 'utf-8');

      const loaded = await storage.loadSnapshot('sess_4');
      expect(loaded?.sequence_no).toBe(0);
    });
  });
});
