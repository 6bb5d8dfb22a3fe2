import { serve } from '@hono/node-server';
import { Hono } from 'hono';
import type { Context } from 'hono';
import { cors } from 'hono/cors';
import { SESSION_ID_PATTERN, StreamEvent } from './types.js';
import {
  DocscoutError,
  MalformedRequestError,
  errorMessage,
} from './errors.js';
import type { ChatService } from './chat-service.js';
import type { SessionManager } from './sessions/index.js';
import { logger } from './logger.js';

export interface AppOptions {
  chat: ChatService;
  sessions: SessionManager;
  /** Allowed CORS origins; every origin when empty */
  corsOrigins?: string[];
}

export interface ServerOptions extends AppOptions {
  host: string;
  port: number;
}

export interface ServerHandle {
  port: number;
  host: string;
  close: () => Promise<void>;
}

/**
 * One Server-Sent Events frame
 */
export function formatSSE(event: StreamEvent): string {
  return `data: ${JSON.stringify(event)}\n\n`;
}

function errorResponse(error: DocscoutError): Response {
  return new Response(JSON.stringify({ error: error.toJSON() }), {
    status: error.status,
    headers: { 'content-type': 'application/json; charset=utf-8' },
  });
}

async function readJson(c: Context): Promise<unknown> {
  try {
    return await c.req.json<unknown>();
  } catch {
    throw new MalformedRequestError('Request body must be valid JSON');
  }
}

function sessionIdParam(c: Context): string {
  const id = c.req.param('id') ?? '';
  if (!SESSION_ID_PATTERN.test(id)) {
    throw new MalformedRequestError('session id must be 1-128 characters of [A-Za-z0-9_-]');
  }
  return id;
}

/**
 * Build the HTTP application. Request-level failures are answered with
 * `{error: {code, message}}` before any stream is opened.
 */
export function createApp(options: AppOptions): Hono {
  const app = new Hono();
  const origins = options.corsOrigins ?? [];
  app.use('*', cors({ origin: origins.length > 0 ? origins : '*' }));

  app.onError((error, c) => {
    if (error instanceof DocscoutError) {
      logger.debug(`${c.req.method} ${c.req.path} rejected: ${error.code}`);
      return errorResponse(error);
    }
    logger.error(`${c.req.method} ${c.req.path} failed: ${errorMessage(error)}`);
    return errorResponse(new DocscoutError('Internal server error', 'internal_error', 500));
  });

  app.get('/health', c => c.json({ status: 'healthy' }));

  app.post('/chat', async c => {
    const turn = await options.chat.open(await readJson(c));

    const controller = new AbortController();
    c.req.raw.signal?.addEventListener('abort', () => controller.abort(), { once: true });

    const events = turn.stream(controller.signal);
    const encoder = new TextEncoder();

    const body = new ReadableStream<Uint8Array>({
      async pull(stream) {
        try {
          const next = await events.next();
          if (next.done) {
            await turn.close();
            stream.close();
            return;
          }
          stream.enqueue(encoder.encode(formatSSE(next.value)));
        } catch (error) {
          logger.error(`Turn in session ${turn.sessionId} failed: ${errorMessage(error)}`);
          for (const type of ['error', 'done'] as const) {
            stream.enqueue(encoder.encode(formatSSE({
              type,
              content: type === 'error' ? 'Internal error while processing the message' : '',
              session_id: turn.sessionId,
              sequence_no: turn.session.nextSequence(),
            })));
          }
          await turn.close();
          stream.close();
        }
      },
      async cancel() {
        // Client went away: kill whatever is running and release the session
        controller.abort();
        try {
          await events.return(undefined);
        } finally {
          await turn.close();
        }
      },
    });

    c.header('Content-Type', 'text/event-stream');
    c.header('Cache-Control', 'no-cache');
    c.header('Connection', 'keep-alive');
    return c.body(body);
  });

  app.post('/cli-chat', async c => {
    const summary = await options.chat.chat(await readJson(c), c.req.raw.signal);
    return c.json(summary);
  });

  app.get('/sessions/:id', async c => {
    const session = await options.sessions.find(sessionIdParam(c));
    return c.json(session.toSnapshot());
  });

  app.delete('/sessions/:id', async c => {
    const id = sessionIdParam(c);
    // Surfaces 404 and 410 before expiring
    await options.sessions.find(id);
    await options.sessions.expire(id);
    return c.json({ session_id: id, state: 'EXPIRED' });
  });

  return app;
}

/**
 * Start the HTTP server
 */
export function startServer(options: ServerOptions): ServerHandle {
  const app = createApp(options);

  const nodeServer = serve({
    fetch: app.fetch,
    port: options.port,
    hostname: options.host,
  });

  return {
    port: options.port,
    host: options.host,
    close: () =>
      new Promise((resolve, reject) => {
        nodeServer.close(err => (err ? reject(err) : resolve()));
      }),
  };
}
