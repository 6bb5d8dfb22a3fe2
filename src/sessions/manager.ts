/**
 * Session Manager - keyed registry and lifecycle
 */

import { v4 as uuidv4 } from 'uuid';
import { SessionState } from '../types.js';
import { SessionBusyError, SessionExpiredError, SessionNotFoundError, errorMessage } from '../errors.js';
import { logger } from '../logger.js';
import { Clock, Session } from './session.js';
import { SessionStorage } from './storage.js';
import {
  DEFAULT_EXPIRE_TIMEOUT_S,
  DEFAULT_IDLE_TIMEOUT_S,
  DEFAULT_SWEEP_INTERVAL_S,
  SweepReport,
} from './types.js';

export interface SessionManagerOptions {
  idleTimeoutS?: number;
  expireTimeoutS?: number;
  sweepIntervalS?: number;
  /** Snapshots are persisted here when given */
  storage?: SessionStorage;
  clock?: Clock;
}

/**
 * The only state shared between sessions. Every create, fetch and expire
 * goes through this registry.
 *
 * Lookups that need storage are asynchronous; concurrent lookups of the same
 * id share one in-flight promise so they always resolve to the same Session.
 */
export class SessionManager {
  private readonly sessions = new Map<string, Session>();
  private readonly inflight = new Map<string, { create: boolean; lookup: Promise<Session> }>();
  /** Expired ids and when they expired */
  private readonly tombstones = new Map<string, number>();
  private readonly idleTimeoutMs: number;
  private readonly expireTimeoutMs: number;
  private readonly sweepIntervalMs: number;
  private readonly storage: SessionStorage | undefined;
  private readonly clock: Clock;
  private sweepTimer: NodeJS.Timeout | null = null;

  constructor(options: SessionManagerOptions = {}) {
    this.idleTimeoutMs = (options.idleTimeoutS ?? DEFAULT_IDLE_TIMEOUT_S) * 1000;
    this.expireTimeoutMs = (options.expireTimeoutS ?? DEFAULT_EXPIRE_TIMEOUT_S) * 1000;
    this.sweepIntervalMs = (options.sweepIntervalS ?? DEFAULT_SWEEP_INTERVAL_S) * 1000;
    this.storage = options.storage;
    this.clock = options.clock ?? Date.now;
  }

  /**
   * Get the session for `sessionId`, creating it if it does not exist.
   * Without an id a new session with a generated UUID is created.
   *
   * @throws SessionExpiredError if the id belongs to an expired session
   */
  async acquire(sessionId?: string | null): Promise<Session> {
    return this.resolve(sessionId ?? uuidv4(), true);
  }

  /**
   * Get an existing session without creating one
   *
   * @throws SessionNotFoundError if no session has this id
   * @throws SessionExpiredError if the id belongs to an expired session
   */
  async find(sessionId: string): Promise<Session> {
    return this.resolve(sessionId, false);
  }

  /**
   * Expire a session now. Returns false if the id was unknown.
   *
   * @throws SessionBusyError while the session has a turn in flight
   */
  async expire(sessionId: string): Promise<boolean> {
    let session: Session;
    try {
      session = await this.find(sessionId);
    } catch (error) {
      if (error instanceof SessionNotFoundError || error instanceof SessionExpiredError) {
        return false;
      }
      throw error;
    }

    if (session.isBusy) {
      throw new SessionBusyError(sessionId);
    }

    this.retire(session, this.clock());
    await this.persist(session);
    return true;
  }

  /**
   * Write the session snapshot to storage, if configured
   */
  async persist(session: Session): Promise<void> {
    if (!this.storage) {
      return;
    }
    await this.storage.saveSnapshot(session.toSnapshot());
  }

  /**
   * Move inactive sessions to IDLE and expire the long-inactive ones.
   * Sessions with a turn in flight are left alone.
   */
  sweep(): SweepReport {
    const now = this.clock();
    const report: SweepReport = { idled: [], expired: [] };

    for (const session of [...this.sessions.values()]) {
      if (session.isBusy) {
        continue;
      }

      const inactive = session.inactiveFor(now);
      if (inactive >= this.expireTimeoutMs) {
        this.retire(session, now);
        report.expired.push(session.id);
        this.persist(session).catch(error => {
          logger.warn(`Failed to persist expired session ${session.id}: ${errorMessage(error)}`);
        });
      } else if (inactive >= this.idleTimeoutMs && session.state !== SessionState.IDLE) {
        session.markIdle();
        report.idled.push(session.id);
      }
    }

    // Tombstones outlive their session by one more expiry period
    for (const [id, expiredAt] of this.tombstones) {
      if (now - expiredAt >= this.expireTimeoutMs) {
        this.tombstones.delete(id);
      }
    }

    if (report.idled.length > 0 || report.expired.length > 0) {
      logger.debug(`Session sweep: ${report.idled.length} idle, ${report.expired.length} expired`);
    }
    return report;
  }

  /**
   * Start the periodic sweep. The timer does not keep the process alive.
   */
  start(): void {
    if (this.sweepTimer) {
      return;
    }
    this.sweepTimer = setInterval(() => this.sweep(), this.sweepIntervalMs);
    this.sweepTimer.unref();
  }

  stop(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
  }

  /**
   * Number of live (non-expired) sessions held in memory
   */
  get size(): number {
    return this.sessions.size;
  }

  private resolve(sessionId: string, create: boolean): Promise<Session> {
    if (this.tombstones.has(sessionId)) {
      return Promise.reject(new SessionExpiredError(sessionId));
    }

    const live = this.sessions.get(sessionId);
    if (live) {
      return Promise.resolve(live);
    }

    const pending = this.inflight.get(sessionId);
    if (pending) {
      if (pending.create || !create) {
        return pending.lookup;
      }
      // A plain lookup is in flight; create once it reports the id unknown
      return pending.lookup.catch((error: unknown) => {
        if (error instanceof SessionNotFoundError) {
          return this.resolve(sessionId, true);
        }
        throw error;
      });
    }

    const lookup = this.load(sessionId, create).finally(() => {
      this.inflight.delete(sessionId);
    });
    this.inflight.set(sessionId, { create, lookup });
    return lookup;
  }

  private async load(sessionId: string, create: boolean): Promise<Session> {
    const snapshot = this.storage ? await this.storage.loadSnapshot(sessionId) : null;

    if (snapshot?.state === SessionState.EXPIRED) {
      this.tombstones.set(sessionId, Date.parse(snapshot.last_active_at));
      throw new SessionExpiredError(sessionId);
    }

    // Expired while the snapshot was loading
    if (this.tombstones.has(sessionId)) {
      throw new SessionExpiredError(sessionId);
    }

    let session: Session;
    if (snapshot) {
      session = Session.restore(snapshot, this.clock);
      logger.debug(`Restored session ${sessionId} (${session.turns.length} turns)`);
    } else if (create) {
      session = new Session(sessionId, this.clock);
      logger.debug(`Created session ${sessionId}`);
    } else {
      throw new SessionNotFoundError(sessionId);
    }

    this.sessions.set(sessionId, session);
    return session;
  }

  private retire(session: Session, now: number): void {
    session.expire();
    this.sessions.delete(session.id);
    this.tombstones.set(session.id, now);
  }
}
