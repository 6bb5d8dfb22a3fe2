import { assertDocumentRoot } from '../config.js';
import { createRuntime } from '../runtime.js';
import { startServer } from '../server.js';
import { logger } from '../logger.js';
import { errorMessage } from '../errors.js';
import { CommonOptions, loadCommandConfig } from './options.js';

export interface ServeOptions extends CommonOptions {
  port?: number;
  host?: string;
}

/**
 * Handle the serve command: start the HTTP server and the session sweeper
 * and run until SIGINT or SIGTERM.
 */
export async function handleServeCommand(options: ServeOptions): Promise<void> {
  const config = await loadCommandConfig(options, { port: options.port, host: options.host });
  await assertDocumentRoot(config.document_root);

  const runtime = createRuntime(config);
  runtime.sessions.start();

  const server = startServer({
    chat: runtime.chat,
    sessions: runtime.sessions,
    corsOrigins: config.server.cors_origins,
    host: config.server.host,
    port: config.server.port,
  });

  logger.divider();
  logger.success(`docscout listening on http://${server.host}:${server.port}`);
  logger.info(`Document root: ${config.document_root}`);
  logger.info(`Audit: ${config.audit.sink === 'jsonl' ? config.audit.path : 'stdout'}`);
  logger.divider();

  let stopping = false;
  const handleSignal = async (signal: NodeJS.Signals): Promise<void> => {
    if (stopping) {
      return;
    }
    stopping = true;
    logger.info(`Received ${signal}, shutting down...`);

    try {
      await runtime.shutdown();
      await server.close();
    } catch (error) {
      logger.error(`Shutdown failed: ${errorMessage(error)}`);
      process.exit(1);
    }
    process.exit(0);
  };

  process.on('SIGINT', signal => void handleSignal(signal));
  process.on('SIGTERM', signal => void handleSignal(signal));
}
