import type { StreamEvent, StreamEventType, TransientEventType } from '../types.js';

export interface EventStreamOptions {
  sessionId: string;
  /** Forward command and result events */
  debug: boolean;
  /** Hands out the session's next sequence number */
  nextSequence: () => number;
}

function isTransient(type: StreamEventType): type is TransientEventType {
  return type === 'progress' || type === 'thinking';
}

/**
 * Boundary between what a turn produces and what the client sees.
 *
 * Rules:
 * - progress and thinking are buffered, one slot each; a newer event of the
 *   same type replaces the buffered one
 * - buffered events are released in production order at a checkpoint, which
 *   happens before a command runs and before any other visible event
 * - final drops the buffers and is forwarded at most once per turn
 * - command and result are forwarded only in debug mode
 * - an event equal to the last forwarded one (type and content) is dropped
 * - done drops the buffers and closes the stream
 *
 * Every method returns the events to forward, already sequenced.
 */
export class EventStream {
  private readonly buffered = new Map<TransientEventType, string>();
  private lastForwarded: { type: StreamEventType; content: string } | null = null;
  private finalSent = false;
  private closed = false;

  constructor(private readonly options: EventStreamOptions) {}

  push(type: StreamEventType, content: string): StreamEvent[] {
    if (this.closed) {
      return [];
    }

    if (isTransient(type)) {
      // Re-inserting moves the slot to the end of production order
      this.buffered.delete(type);
      this.buffered.set(type, content);
      return [];
    }

    switch (type) {
      case 'final':
        if (this.finalSent) {
          return [];
        }
        this.finalSent = true;
        this.buffered.clear();
        return this.forward(type, content);

      case 'command':
      case 'result':
        if (!this.options.debug) {
          return [];
        }
        return [...this.checkpoint(), ...this.forward(type, content)];

      case 'error':
        return [...this.checkpoint(), ...this.forward(type, content)];

      case 'done':
        this.buffered.clear();
        this.closed = true;
        return this.forward(type, content);
    }
  }

  /**
   * Release buffered progress and thinking in the order they were produced
   */
  checkpoint(): StreamEvent[] {
    if (this.closed) {
      return [];
    }
    const released: StreamEvent[] = [];
    for (const [type, content] of this.buffered) {
      released.push(...this.forward(type, content));
    }
    this.buffered.clear();
    return released;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  private forward(type: StreamEventType, content: string): StreamEvent[] {
    const last = this.lastForwarded;
    if (last && last.type === type && last.content === content) {
      return [];
    }
    this.lastForwarded = { type, content };
    return [
      {
        type,
        content,
        session_id: this.options.sessionId,
        sequence_no: this.options.nextSequence(),
      },
    ];
  }
}
