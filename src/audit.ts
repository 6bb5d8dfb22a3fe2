import { promises as fs } from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { CommandAttempt, RejectionReason, ExecutionStatusSchema } from './types.js';
import { errorMessage } from './errors.js';

/** Commands longer than this are cut in audit records */
export const AUDIT_COMMAND_MAX_CHARS = 200;

export const AuditRecordSchema = z.object({
  timestamp: z.string(), // ISO 8601
  session_id: z.string(),
  command: z.string(),
  decision: z.enum(['ALLOWED', 'REJECTED']),
  reason: z.nativeEnum(RejectionReason).optional(),
  duration_ms: z.number(),
  exit_code: z.number().nullable().optional(),
  status: ExecutionStatusSchema.optional(),
  output_size: z.number().optional(),
  truncated: z.boolean().optional(),
});

export type AuditRecord = z.infer<typeof AuditRecordSchema>;

/**
 * Destination for audit records. Format and storage are up to the sink.
 */
export interface AuditSink {
  write(record: AuditRecord): Promise<void>;
  close?(): Promise<void>;
}

/**
 * Build the audit record for one command attempt
 */
export function toAuditRecord(sessionId: string, attempt: CommandAttempt): AuditRecord {
  const record: AuditRecord = {
    timestamp: attempt.timestamp,
    session_id: sessionId,
    command: attempt.raw.length > AUDIT_COMMAND_MAX_CHARS
      ? attempt.raw.slice(0, AUDIT_COMMAND_MAX_CHARS)
      : attempt.raw,
    decision: attempt.decision,
    duration_ms: attempt.duration_ms,
  };

  if (attempt.reason) {
    record.reason = attempt.reason;
  }

  if (attempt.result) {
    record.exit_code = attempt.result.exit_code;
    record.status = attempt.result.status;
    record.output_size = Buffer.byteLength(attempt.result.stdout) + Buffer.byteLength(attempt.result.stderr);
    record.truncated = attempt.result.truncated;
  }

  return record;
}

// ============================================
// Sinks
// ============================================

/**
 * Appends one JSON object per line to a file
 */
export class JsonlAuditSink implements AuditSink {
  private ready: Promise<void> | null = null;

  constructor(private readonly filePath: string) {}

  async write(record: AuditRecord): Promise<void> {
    if (!this.ready) {
      this.ready = fs.mkdir(path.dirname(this.filePath), { recursive: true }).then(() => undefined);
    }
    await this.ready;
    await fs.appendFile(this.filePath, JSON.stringify(record) + '\n', 'utf-8');
  }
}

/**
 * Writes JSON lines to stdout for collection by the process supervisor
 */
export class ConsoleAuditSink implements AuditSink {
  async write(record: AuditRecord): Promise<void> {
    process.stdout.write(JSON.stringify({ event: 'command_attempt', ...record }) + '\n');
  }
}

/**
 * Read back a JSONL audit file. Lines that do not parse are skipped.
 */
export async function readAuditLog(filePath: string): Promise<AuditRecord[]> {
  const content = await fs.readFile(filePath, 'utf-8');
  const records: AuditRecord[] = [];

  for (const line of content.split('\n')) {
    if (!line.trim()) {
      continue;
    }
    try {
      const parsed = AuditRecordSchema.safeParse(JSON.parse(line));
      if (parsed.success) {
        records.push(parsed.data);
      }
    } catch {
      continue;
    }
  }

  return records;
}

// ============================================
// Audit Logger
// ============================================

/**
 * Append-only audit trail of command attempts.
 *
 * `record()` returns immediately; writes are chained so records land in
 * call order. A failing sink never reaches the caller: the record is written
 * to the fallback (stderr by default) instead.
 */
export class AuditLogger {
  private writePromise: Promise<void> = Promise.resolve();
  private recordedCount = 0;
  private failedCount = 0;

  constructor(
    private readonly sink: AuditSink,
    private readonly fallback: (line: string) => void = line => {
      process.stderr.write(line);
    }
  ) {}

  record(sessionId: string, attempt: CommandAttempt): void {
    const record = toAuditRecord(sessionId, attempt);
    this.recordedCount++;

    this.writePromise = this.writePromise.then(async () => {
      try {
        await this.sink.write(record);
      } catch (error) {
        this.failedCount++;
        this.fallback(`[AUDIT] ${JSON.stringify(record)} (sink error: ${errorMessage(error)})\n`);
      }
    });
  }

  /**
   * Wait until every record so far has reached the sink or the fallback
   */
  async flush(): Promise<void> {
    await this.writePromise;
  }

  async close(): Promise<void> {
    await this.flush();
    await this.sink.close?.();
  }

  get stats(): { recorded: number; failed: number } {
    return { recorded: this.recordedCount, failed: this.failedCount };
  }
}
