/**
 * Session - one conversation and its append-only history
 */

import { SessionState, Turn } from '../types.js';
import { SessionBusyError, SessionExpiredError } from '../errors.js';
import type { SessionSnapshot } from './types.js';

export type Clock = () => number;

export class Session {
  readonly id: string;
  readonly createdAt: string;
  private lastActive: number;
  private currentState: SessionState;
  private readonly history: Turn[];
  private sequence: number;
  private busy = false;

  constructor(id: string, private readonly clock: Clock = Date.now, snapshot?: SessionSnapshot) {
    this.id = id;
    if (snapshot) {
      this.createdAt = snapshot.created_at;
      this.lastActive = Date.parse(snapshot.last_active_at);
      this.currentState = snapshot.state;
      this.history = [...snapshot.turns];
      this.sequence = snapshot.sequence_no;
    } else {
      this.lastActive = clock();
      this.createdAt = new Date(this.lastActive).toISOString();
      this.currentState = SessionState.CREATED;
      this.history = [];
      this.sequence = 0;
    }
  }

  /**
   * Rebuild a session from a persisted snapshot
   */
  static restore(snapshot: SessionSnapshot, clock: Clock = Date.now): Session {
    return new Session(snapshot.id, clock, snapshot);
  }

  get state(): SessionState {
    return this.currentState;
  }

  get turns(): readonly Turn[] {
    return this.history;
  }

  get lastActiveAt(): string {
    return new Date(this.lastActive).toISOString();
  }

  get isBusy(): boolean {
    return this.busy;
  }

  /**
   * Milliseconds since the last message or turn completion
   */
  inactiveFor(now: number = this.clock()): number {
    return now - this.lastActive;
  }

  /**
   * Claim the session for one turn. Only one turn runs at a time.
   */
  beginTurn(): void {
    if (this.currentState === SessionState.EXPIRED) {
      throw new SessionExpiredError(this.id);
    }
    if (this.busy) {
      throw new SessionBusyError(this.id);
    }
    this.busy = true;
    this.currentState = SessionState.ACTIVE;
    this.touch();
  }

  endTurn(): void {
    this.busy = false;
    this.touch();
  }

  appendTurn(turn: Turn): void {
    this.history.push(turn);
    this.touch();
  }

  nextSequence(): number {
    this.sequence += 1;
    return this.sequence;
  }

  markIdle(): void {
    if (this.currentState === SessionState.ACTIVE || this.currentState === SessionState.CREATED) {
      this.currentState = SessionState.IDLE;
    }
  }

  expire(): void {
    this.currentState = SessionState.EXPIRED;
  }

  toSnapshot(): SessionSnapshot {
    return {
      id: this.id,
      created_at: this.createdAt,
      last_active_at: this.lastActiveAt,
      state: this.currentState,
      turns: this.history.map(turn => ({ ...turn, attempts: [...turn.attempts] })),
      sequence_no: this.sequence,
    };
  }

  private touch(): void {
    this.lastActive = this.clock();
  }
}
