/**
 * Session types
 */

import { z } from 'zod';
import { SessionState, TurnSchema } from '../types.js';

// ============================================================================
// Session Snapshot
// ============================================================================

export const SessionSnapshotSchema = z.object({
  id: z.string(),
  created_at: z.string(), // ISO 8601
  last_active_at: z.string(), // ISO 8601
  state: z.nativeEnum(SessionState),
  turns: z.array(TurnSchema),
  /** Last sequence number handed out to a stream event */
  sequence_no: z.number().int().nonnegative().default(0),
});

export type SessionSnapshot = z.infer<typeof SessionSnapshotSchema>;

// ============================================================================
// Manager Configuration
// ============================================================================

export const DEFAULT_IDLE_TIMEOUT_S = 3600;
export const DEFAULT_EXPIRE_TIMEOUT_S = 86400;
export const DEFAULT_SWEEP_INTERVAL_S = 60;

export const SessionManagerConfigSchema = z.object({
  idle_timeout_s: z.number().positive().default(DEFAULT_IDLE_TIMEOUT_S),
  expire_timeout_s: z.number().positive().default(DEFAULT_EXPIRE_TIMEOUT_S),
  sweep_interval_s: z.number().positive().default(DEFAULT_SWEEP_INTERVAL_S),
  /** Persist snapshots here; in-memory only when absent */
  sessions_dir: z.string().optional(),
});

export type SessionManagerConfig = z.infer<typeof SessionManagerConfigSchema>;

export interface SweepReport {
  idled: string[];
  expired: string[];
}
