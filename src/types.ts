import { z } from 'zod';

// ============================================
// Enums
// ============================================

export enum RejectionReason {
  EMPTY = 'empty',
  TOO_LONG = 'too_long',
  MALFORMED = 'malformed',
  VERB_NOT_ALLOWED = 'verb_not_allowed',
  DANGEROUS_PATTERN = 'dangerous_pattern',
  PATH_ESCAPE = 'path_escape',
  FORBIDDEN_OPTION = 'forbidden_option',
}

export enum SessionState {
  CREATED = 'CREATED',
  ACTIVE = 'ACTIVE',
  IDLE = 'IDLE',
  EXPIRED = 'EXPIRED',
}

export enum TurnState {
  AWAITING_AGENT = 'AWAITING_AGENT',
  THOUGHT = 'THOUGHT',
  COMMAND_CYCLE = 'COMMAND_CYCLE',
  FINAL = 'FINAL',
  DONE = 'DONE',
  ERROR = 'ERROR',
  ABORTED = 'ABORTED',
}

export const STREAM_EVENT_TYPES = [
  'progress',
  'thinking',
  'command',
  'result',
  'final',
  'error',
  'done',
] as const;

export type StreamEventType = (typeof STREAM_EVENT_TYPES)[number];

/**
 * Event types that collapse: a newer one replaces the buffered one
 */
export type TransientEventType = Extract<StreamEventType, 'progress' | 'thinking'>;

// ============================================
// Validator Decision
// ============================================

export type Decision =
  | { allowed: true; tokens: string[] }
  | { allowed: false; reason: RejectionReason; detail: string; tokens: string[] };

// ============================================
// Execution Result
// ============================================

export const ExecutionStatusSchema = z.enum(['exited', 'timeout', 'aborted']);

export type ExecutionStatus = z.infer<typeof ExecutionStatusSchema>;

export const ExecutionResultSchema = z.object({
  stdout: z.string(),
  stderr: z.string(),
  exit_code: z.number().nullable(),
  duration_ms: z.number(),
  truncated: z.boolean(),
  status: ExecutionStatusSchema,
});

export type ExecutionResult = z.infer<typeof ExecutionResultSchema>;

// ============================================
// Command Attempt and Turn
// ============================================

export const CommandAttemptSchema = z.object({
  raw: z.string(),
  tokens: z.array(z.string()),
  decision: z.enum(['ALLOWED', 'REJECTED']),
  reason: z.nativeEnum(RejectionReason).optional(),
  /** Human-readable rejection detail */
  detail: z.string().optional(),
  result: ExecutionResultSchema.optional(),
  timestamp: z.string(), // ISO 8601
  duration_ms: z.number(),
});

export type CommandAttempt = z.infer<typeof CommandAttemptSchema>;

export const TurnSchema = z.object({
  role: z.enum(['user', 'agent']),
  content: z.string(),
  attempts: z.array(CommandAttemptSchema),
  started_at: z.string(),
  ended_at: z.string().optional(),
});

export type Turn = z.infer<typeof TurnSchema>;

// ============================================
// Stream Events
// ============================================

export const StreamEventSchema = z.object({
  type: z.enum(STREAM_EVENT_TYPES),
  content: z.string(),
  session_id: z.string(),
  sequence_no: z.number().int().nonnegative(),
});

export type StreamEvent = z.infer<typeof StreamEventSchema>;

// ============================================
// Agent Collaborator
// ============================================

export type FragmentCategory = 'progress' | 'thinking' | 'final';

/**
 * One unit of agent output. `category` is the structured tag an agent may
 * attach to text; untagged text is classified by the marker predicate.
 */
export type Fragment =
  | { kind: 'text'; content: string; category?: FragmentCategory }
  | { kind: 'command'; content: string };

/**
 * Work already done in the current turn, in production order
 */
export type TurnStep =
  | { kind: 'text'; category: FragmentCategory; content: string }
  | { kind: 'command'; attempt: CommandAttempt; observation: string };

export interface AgentHistory {
  /** Completed turns of the session, oldest first */
  turns: readonly Turn[];
  /** The message that opened the current turn */
  message: string;
  steps: readonly TurnStep[];
}

export interface AgentCollaborator {
  /**
   * Produce the next fragment of the turn. `signal` aborts when the client
   * goes away.
   */
  propose(history: AgentHistory, signal?: AbortSignal): Promise<Fragment>;
}

// ============================================
// Chat Request
// ============================================

export const SESSION_ID_PATTERN = /^[A-Za-z0-9_-]{1,128}$/;

export const ChatRequestSchema = z.object({
  message: z.string().trim().min(1, 'message must not be empty'),
  session_id: z
    .string()
    .regex(SESSION_ID_PATTERN, 'session_id must be 1-128 characters of [A-Za-z0-9_-]')
    .nullish(),
  debug_mode: z.boolean().nullish(),
});

export type ChatRequest = z.infer<typeof ChatRequestSchema>;
