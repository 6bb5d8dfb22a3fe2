/**
 * Session Storage - snapshot persistence
 */

import { promises as fs } from 'node:fs';
import * as path from 'node:path';
import type { SessionSnapshot } from './types.js';
import { SessionSnapshotSchema } from './types.js';
import { errnoCode, errorMessage } from '../errors.js';
import { logger } from '../logger.js';

/**
 * Session storage operations. One directory per session under `sessionsDir`.
 */
export class SessionStorage {
  constructor(private sessionsDir: string) {}

  /**
   * Get session directory path
   */
  getSessionDir(sessionId: string): string {
    return path.join(this.sessionsDir, sessionId);
  }

  /**
   * Get snapshot file path
   */
  private getSnapshotPath(sessionId: string): string {
    return path.join(this.getSessionDir(sessionId), 'snapshot.json');
  }

  /**
   * Save a snapshot. Written to a temp file and renamed into place.
   */
  async saveSnapshot(snapshot: SessionSnapshot): Promise<void> {
    const sessionDir = this.getSessionDir(snapshot.id);
    await fs.mkdir(sessionDir, { recursive: true });

    const snapshotPath = this.getSnapshotPath(snapshot.id);
    const tempPath = `${snapshotPath}.tmp`;
    await fs.writeFile(tempPath, JSON.stringify(snapshot, null, 2), 'utf-8');
    await fs.rename(tempPath, snapshotPath);
  }

  /**
   * Load a snapshot. Returns null when none exists; a corrupt snapshot is
   * logged and treated as missing.
   */
  async loadSnapshot(sessionId: string): Promise<SessionSnapshot | null> {
    let content: string;
    try {
      content = await fs.readFile(this.getSnapshotPath(sessionId), 'utf-8');
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') {
        return null;
      }
      throw error;
    }

    try {
      return SessionSnapshotSchema.parse(JSON.parse(content));
    } catch (error) {
      logger.warn(`Ignoring corrupt snapshot for session ${sessionId}: ${errorMessage(error)}`);
      return null;
    }
  }
}
