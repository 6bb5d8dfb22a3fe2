import { z } from 'zod';
import { ChatRequest, ChatRequestSchema, StreamEvent } from './types.js';
import { MalformedRequestError, errorMessage } from './errors.js';
import type { Orchestrator } from './orchestrator/index.js';
import type { Session, SessionManager } from './sessions/index.js';
import type { AgentFactory } from './agent/openai-agent.js';
import { logger } from './logger.js';

/**
 * Result of the non-streaming chat call
 */
export interface ChatSummary {
  session_id: string;
  response: string;
  commands_executed: string[];
  outputs: string[];
}

/**
 * A turn that passed every request-level check and holds its session's
 * turn lock. `close()` releases the lock; it is safe to call more than once.
 */
export interface ActiveTurn {
  readonly sessionId: string;
  readonly session: Session;
  readonly debug: boolean;
  stream(signal?: AbortSignal): AsyncGenerator<StreamEvent, void, undefined>;
  close(): Promise<void>;
}

export interface ChatServiceOptions {
  sessions: SessionManager;
  orchestrator: Orchestrator;
  agentFactory: AgentFactory;
}

/**
 * Parse a chat request body
 * @throws MalformedRequestError when the body does not match
 */
export function parseChatRequest(body: unknown): ChatRequest {
  const parsed = ChatRequestSchema.safeParse(body);
  if (!parsed.success) {
    throw new MalformedRequestError(formatIssues(parsed.error));
  }
  return parsed.data;
}

function formatIssues(error: z.ZodError): string {
  return error.errors
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Entry point shared by the HTTP routes and the interactive CLI
 */
export class ChatService {
  private readonly sessions: SessionManager;
  private readonly orchestrator: Orchestrator;
  private readonly agentFactory: AgentFactory;

  constructor(options: ChatServiceOptions) {
    this.sessions = options.sessions;
    this.orchestrator = options.orchestrator;
    this.agentFactory = options.agentFactory;
  }

  /**
   * Validate the request, resolve the session and claim it for one turn.
   * Every request-level rejection happens here, before any event exists.
   *
   * @throws MalformedRequestError, SessionExpiredError, SessionBusyError
   */
  async open(body: unknown): Promise<ActiveTurn> {
    const request = parseChatRequest(body);
    const session = await this.sessions.acquire(request.session_id);
    session.beginTurn();

    const debug = request.debug_mode ?? false;
    let closed = false;
    const close = async (): Promise<void> => {
      if (closed) {
        return;
      }
      closed = true;
      session.endTurn();
      await this.persist(session);
    };

    return {
      sessionId: session.id,
      session,
      debug,
      stream: (signal?: AbortSignal) =>
        this.orchestrator.runTurn(session, request.message, this.agentFactory(), { debug, signal }),
      close,
    };
  }

  /**
   * Run a whole turn and collect the answer and the commands it ran
   */
  async chat(body: unknown, signal?: AbortSignal): Promise<ChatSummary> {
    const turn = await this.open(body);
    const summary: ChatSummary = {
      session_id: turn.sessionId,
      response: '',
      commands_executed: [],
      outputs: [],
    };

    try {
      for await (const event of turn.stream(signal)) {
        if (event.type === 'final' || event.type === 'error') {
          summary.response = event.content;
        }
      }
    } finally {
      await turn.close();
    }

    const turns = turn.session.turns;
    const last = turns[turns.length - 1];
    for (const attempt of last?.attempts ?? []) {
      if (attempt.result) {
        summary.commands_executed.push(attempt.raw);
        summary.outputs.push(attempt.result.stdout);
      } else {
        summary.outputs.push(`Security error: ${attempt.reason ?? 'rejected'}${attempt.detail ? ` (${attempt.detail})` : ''}`);
      }
    }

    return summary;
  }

  private async persist(session: Session): Promise<void> {
    try {
      await this.sessions.persist(session);
    } catch (error) {
      logger.warn(`Failed to persist session ${session.id}: ${errorMessage(error)}`);
    }
  }
}
