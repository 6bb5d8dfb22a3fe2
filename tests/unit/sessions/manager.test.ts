import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { promises as fs } from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { v4 as uuidv4 } from 'uuid';
import { SessionManager } from '../../../src/sessions/manager.js';
import { SessionStorage } from '../../../src/sessions/storage.js';
import { SessionState } from '../../../src/types.js';
import { SessionBusyError, SessionExpiredError, SessionNotFoundError } from '../../../src/errors.js';

const UUID_V4 = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

describe('SessionManager', () => {
  let now: number;
  let manager: SessionManager;

  beforeEach(() => {
    now = Date.parse('2026-01-15T10:00:00.000Z');
    manager = new SessionManager({ idleTimeoutS: 10, expireTimeoutS: 100, clock: () => now });
  });

  afterEach(() => {
    manager.stop();
  });

  describe('acquire', () => {
    it('creates a session with a generated id', async () => {
      const session = await manager.acquire();
      expect(session.id).toMatch(UUID_V4);
      expect(session.state).toBe(SessionState.CREATED);
    });

    it('creates a session under the requested id', async () => {
      const session = await manager.acquire('docs-1');
      expect(session.id).toBe('docs-1');
      expect(manager.size).toBe(1);
    });

    it('returns the same session for the same id', async () => {
      const first = await manager.acquire('docs-1');
      const second = await manager.acquire('docs-1');
      expect(second).toBe(first);
    });

    it('resolves concurrent acquisitions to one session', async () => {
      const sessions = await Promise.all([
        manager.acquire('race'),
        manager.acquire('race'),
        manager.acquire('race'),
      ]);
      expect(new Set(sessions).size).toBe(1);
      expect(manager.size).toBe(1);
    });
  });

  describe('find', () => {
    it('fails for an unknown id', async () => {
      await expect(manager.find('ghost')).rejects.toThrow(SessionNotFoundError);
    });

    it('returns an existing session', async () => {
      const created = await manager.acquire('docs-1');
      expect(await manager.find('docs-1')).toBe(created);
    });
  });

  describe('expire', () => {
    it('expires a session and refuses it afterwards', async () => {
      const session = await manager.acquire('docs-1');

      expect(await manager.expire('docs-1')).toBe(true);
      expect(session.state).toBe(SessionState.EXPIRED);
      expect(manager.size).toBe(0);
      await expect(manager.acquire('docs-1')).rejects.toThrow(SessionExpiredError);
      await expect(manager.find('docs-1')).rejects.toThrow(SessionExpiredError);
    });

    it('returns false for an unknown id', async () => {
      expect(await manager.expire('ghost')).toBe(false);
    });

    it('refuses to expire a session with a turn in flight', async () => {
      const session = await manager.acquire('docs-1');
      session.beginTurn();

      await expect(manager.expire('docs-1')).rejects.toThrow(SessionBusyError);
      expect(session.state).not.toBe(SessionState.EXPIRED);
      expect(await manager.find('docs-1')).toBe(session);

      session.endTurn();
      expect(await manager.expire('docs-1')).toBe(true);
    });
  });

  describe('sweep', () => {
    it('idles, then expires inactive sessions', async () => {
      const session = await manager.acquire('docs-1');

      now += 9_999;
      expect(manager.sweep()).toEqual({ idled: [], expired: [] });

      now += 1;
      expect(manager.sweep()).toEqual({ idled: ['docs-1'], expired: [] });
      expect(session.state).toBe(SessionState.IDLE);

      now += 1_000;
      expect(manager.sweep()).toEqual({ idled: [], expired: [] });

      now += 89_000;
      expect(manager.sweep()).toEqual({ idled: [], expired: ['docs-1'] });
      expect(session.state).toBe(SessionState.EXPIRED);
      await expect(manager.acquire('docs-1')).rejects.toThrow(SessionExpiredError);
    });

    it('leaves sessions with a turn in flight alone', async () => {
      const session = await manager.acquire('busy');
      session.beginTurn();

      now += 500_000;
      expect(manager.sweep()).toEqual({ idled: [], expired: [] });
      expect(session.state).toBe(SessionState.ACTIVE);
    });

    it('forgets expired ids after another expiry period', async () => {
      await manager.acquire('docs-1');
      await manager.expire('docs-1');

      now += 99_999;
      manager.sweep();
      await expect(manager.acquire('docs-1')).rejects.toThrow(SessionExpiredError);

      now += 1;
      manager.sweep();
      const fresh = await manager.acquire('docs-1');
      expect(fresh.state).toBe(SessionState.CREATED);
    });

    it('activity resets the inactivity clock', async () => {
      const session = await manager.acquire('docs-1');
      now += 9_000;
      session.beginTurn();
      session.endTurn();

      now += 9_000;
      expect(manager.sweep().idled).toEqual([]);
    });
  });

  describe('with storage', () => {
    let testDir: string;
    let storage: SessionStorage;

    beforeEach(async () => {
      testDir = path.join(os.tmpdir(), `docscout-manager-${uuidv4()}`);
      await fs.mkdir(testDir, { recursive: true });
      storage = new SessionStorage(testDir);
      manager = new SessionManager({ idleTimeoutS: 10, expireTimeoutS: 100, storage, clock: () => now });
    });

    afterEach(async () => {
      await fs.rm(testDir, { recursive: true, force: true });
    });

    it('resolves concurrent acquisitions to one session', async () => {
      const [a, b] = await Promise.all([manager.acquire('race'), manager.acquire('race')]);
      expect(a).toBe(b);
    });

    it('creates a session when a lookup of the same id is still in flight', async () => {
      const lookup = manager.find('late');
      const acquired = manager.acquire('late');

      await expect(lookup).rejects.toThrow(SessionNotFoundError);
      const session = await acquired;
      expect(session.id).toBe('late');
      expect(await manager.find('late')).toBe(session);
    });

    it('persists an expiry', async () => {
      await manager.acquire('docs-1');
      await manager.expire('docs-1');

      const saved = await storage.loadSnapshot('docs-1');
      expect(saved?.state).toBe(SessionState.EXPIRED);
    });

    it('persists sessions expired by the sweep', async () => {
      await manager.acquire('docs-1');
      now += 100_000;
      manager.sweep();

      // The sweep persists in the background
      for (let i = 0; i < 50 && (await storage.loadSnapshot('docs-1')) === null; i++) {
        await new Promise(resolve => setTimeout(resolve, 10));
      }
      const saved = await storage.loadSnapshot('docs-1');
      expect(saved?.state).toBe(SessionState.EXPIRED);
    });
  });
});
