import type {
  AgentCollaborator,
  CommandAttempt,
  Decision,
  Fragment,
  StreamEvent,
  Turn,
  TurnStep,
} from '../types.js';
import { TurnState } from '../types.js';
import type { CommandValidator } from '../validator.js';
import type { SandboxedExecutor } from '../executor.js';
import type { AuditLogger } from '../audit.js';
import type { Session } from '../sessions/index.js';
import { AgentCollaboratorError, errorMessage } from '../errors.js';
import { logger } from '../logger.js';
import { createMarkerClassifier, FragmentClassifier } from './classifier.js';
import { EventStream } from './event-stream.js';
import { formatObservation } from './observation.js';

export const DEFAULT_MAX_STEPS = 30;

const TRANSITIONS: Readonly<Record<TurnState, readonly TurnState[]>> = {
  [TurnState.AWAITING_AGENT]: [TurnState.THOUGHT, TurnState.COMMAND_CYCLE, TurnState.FINAL],
  [TurnState.THOUGHT]: [TurnState.AWAITING_AGENT],
  [TurnState.COMMAND_CYCLE]: [TurnState.AWAITING_AGENT],
  [TurnState.FINAL]: [TurnState.DONE],
  [TurnState.ERROR]: [TurnState.DONE],
  [TurnState.ABORTED]: [TurnState.DONE],
  [TurnState.DONE]: [],
};

/**
 * Per-turn state machine. ERROR and ABORTED are reachable from every state
 * except the terminal ones.
 */
export class TurnStateMachine {
  private current: TurnState = TurnState.AWAITING_AGENT;

  get state(): TurnState {
    return this.current;
  }

  transition(next: TurnState): void {
    const from = this.current;
    const failure = next === TurnState.ERROR || next === TurnState.ABORTED;
    const terminal = from === TurnState.DONE || from === TurnState.ERROR || from === TurnState.ABORTED;

    if (!(failure && !terminal) && !TRANSITIONS[from].includes(next)) {
      throw new Error(`Illegal turn transition ${from} -> ${next}`);
    }
    this.current = next;
  }
}

export interface OrchestratorOptions {
  validator: CommandValidator;
  executor: SandboxedExecutor;
  audit: AuditLogger;
  classifier?: FragmentClassifier;
  maxSteps?: number;
}

export interface TurnOptions {
  /** Forward command and result events to the client */
  debug?: boolean;
  /** Aborts the turn and any running command */
  signal?: AbortSignal;
}

/**
 * Drives one turn: asks the agent for fragments until it produces a final
 * answer, running each proposed command through validation and the sandbox.
 *
 * The caller must hold the session's turn lock (`session.beginTurn()`).
 */
export class Orchestrator {
  private readonly validator: CommandValidator;
  private readonly executor: SandboxedExecutor;
  private readonly audit: AuditLogger;
  private readonly classify: FragmentClassifier;
  private readonly maxSteps: number;

  constructor(options: OrchestratorOptions) {
    this.validator = options.validator;
    this.executor = options.executor;
    this.audit = options.audit;
    this.classify = options.classifier ?? createMarkerClassifier();
    this.maxSteps = options.maxSteps ?? DEFAULT_MAX_STEPS;
  }

  /**
   * Run a turn, yielding the client-visible events in order. The last event
   * is always `done` unless the consumer stops iterating first.
   */
  async *runTurn(
    session: Session,
    message: string,
    agent: AgentCollaborator,
    options: TurnOptions = {}
  ): AsyncGenerator<StreamEvent, void, undefined> {
    const { signal } = options;
    const machine = new TurnStateMachine();
    const stream = new EventStream({
      sessionId: session.id,
      debug: options.debug ?? false,
      nextSequence: () => session.nextSequence(),
    });

    const priorTurns: readonly Turn[] = [...session.turns];
    const startedAt = new Date().toISOString();
    session.appendTurn({ role: 'user', content: message, attempts: [], started_at: startedAt, ended_at: startedAt });

    const steps: TurnStep[] = [];
    const attempts: CommandAttempt[] = [];
    let answer = '';

    try {
      for (let step = 0; ; step++) {
        if (signal?.aborted) {
          machine.transition(TurnState.ABORTED);
          break;
        }

        if (step >= this.maxSteps) {
          machine.transition(TurnState.ERROR);
          answer = `No final answer after ${this.maxSteps} steps`;
          logger.warn(`Session ${session.id}: ${answer}`);
          yield* stream.push('error', answer);
          break;
        }

        let fragment: Fragment;
        try {
          fragment = await agent.propose({ turns: priorTurns, message, steps }, signal);
        } catch (error) {
          if (signal?.aborted) {
            machine.transition(TurnState.ABORTED);
            break;
          }
          const failure = error instanceof AgentCollaboratorError
            ? error
            : new AgentCollaboratorError(errorMessage(error), error);
          machine.transition(TurnState.ERROR);
          answer = failure.message;
          logger.error(`Session ${session.id}: agent failed: ${failure.message}`);
          yield* stream.push('error', failure.message);
          break;
        }

        if (fragment.kind === 'command') {
          machine.transition(TurnState.COMMAND_CYCLE);
          const { attempt, observation } = yield* this.commandCycle(session.id, fragment.content, stream, signal);
          attempts.push(attempt);
          steps.push({ kind: 'command', attempt, observation });
          if (signal?.aborted) {
            machine.transition(TurnState.ABORTED);
            break;
          }
          machine.transition(TurnState.AWAITING_AGENT);
          continue;
        }

        const category = this.classify(fragment);
        if (category === 'final') {
          machine.transition(TurnState.FINAL);
          answer = fragment.content;
          yield* stream.push('final', fragment.content);
          break;
        }

        machine.transition(TurnState.THOUGHT);
        steps.push({ kind: 'text', category, content: fragment.content });
        yield* stream.push(category, fragment.content);
        machine.transition(TurnState.AWAITING_AGENT);
      }
    } finally {
      session.appendTurn({
        role: 'agent',
        content: answer,
        attempts,
        started_at: startedAt,
        ended_at: new Date().toISOString(),
      });
    }

    if (machine.state === TurnState.ABORTED) {
      logger.info(`Session ${session.id}: turn aborted by client`);
    }
    machine.transition(TurnState.DONE);
    yield* stream.push('done', '');
  }

  /**
   * propose → validate → execute (if allowed) → observation.
   * The attempt is audited exactly once, whatever happens.
   */
  private async *commandCycle(
    sessionId: string,
    raw: string,
    stream: EventStream,
    signal: AbortSignal | undefined
  ): AsyncGenerator<StreamEvent, { attempt: CommandAttempt; observation: string }, undefined> {
    const timestamp = new Date().toISOString();
    const startTime = Date.now();
    const decision = this.validator.validate(raw);
    let attempt: CommandAttempt = toAttempt(raw, decision, timestamp, startTime);

    try {
      yield* stream.push('command', raw);

      if (decision.allowed) {
        yield* stream.checkpoint();
        const result = await this.executor.execute(decision.tokens, { signal });
        attempt = { ...toAttempt(raw, decision, timestamp, startTime), result };
      } else {
        logger.debug(`Rejected '${raw}': ${decision.reason} (${decision.detail})`);
      }

      const observation = formatObservation(attempt, this.executor.timeout);
      yield* stream.push('result', observation);
      return { attempt, observation };
    } finally {
      this.audit.record(sessionId, attempt);
    }
  }
}

function toAttempt(raw: string, decision: Decision, timestamp: string, startTime: number): CommandAttempt {
  const base = {
    raw,
    tokens: decision.tokens,
    timestamp,
    duration_ms: Date.now() - startTime,
  };
  if (decision.allowed) {
    return { ...base, decision: 'ALLOWED' };
  }
  return { ...base, decision: 'REJECTED', reason: decision.reason, detail: decision.detail };
}
