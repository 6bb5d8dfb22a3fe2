import * as readline from 'node:readline';
import { stdin as input, stdout as output } from 'node:process';
import { v4 as uuidv4 } from 'uuid';
import type { StreamEvent } from '../types.js';
import { assertDocumentRoot } from '../config.js';
import { createRuntime } from '../runtime.js';
import { errorMessage } from '../errors.js';
import { CommonOptions, loadCommandConfig } from './options.js';

export interface ChatOptions extends CommonOptions {
  sessionId?: string;
  debug?: boolean;
}

/** Longest command output shown in the terminal */
const MAX_RESULT_CHARS = 500;

export const HELP_TEXT = `
📚 docscout interactive chat

Available commands:
- help      : Show this help message
- clear     : Start a new conversation
- exit/quit : Exit the chat

Ask questions about the documentation and the assistant will explore it
with read-only commands.

Examples:
- "Show me all markdown files"
- "Search for API documentation"
- "Find all files mentioning 'configuration'"`;

/**
 * Terminal rendering of one stream event; null for events with no output
 */
export function renderEvent(event: StreamEvent): string | null {
  switch (event.type) {
    case 'progress':
    case 'thinking':
      return `  ${event.content}`;
    case 'command':
      return `\n💻 $ ${event.content}`;
    case 'result':
      return event.content.length > MAX_RESULT_CHARS
        ? `${event.content.slice(0, MAX_RESULT_CHARS)}...`
        : event.content;
    case 'final':
      return `\n🤖 ${event.content}`;
    case 'error':
      return `\n❌ Error: ${event.content}`;
    case 'done':
      return null;
  }
}

function ask(rl: readline.Interface, prompt: string): Promise<string | null> {
  return new Promise(resolve => {
    const onClose = (): void => resolve(null);
    rl.once('close', onClose);
    rl.question(prompt, answer => {
      rl.off('close', onClose);
      resolve(answer);
    });
  });
}

/**
 * Handle the chat command: an interactive loop over the same pipeline the
 * HTTP server uses
 */
export async function handleChatCommand(options: ChatOptions): Promise<void> {
  const config = await loadCommandConfig(options);
  await assertDocumentRoot(config.document_root);
  const runtime = createRuntime(config);

  let sessionId = options.sessionId ?? uuidv4();
  let running: AbortController | null = null;

  const rl = readline.createInterface({ input, output, terminal: true });
  rl.on('SIGINT', () => {
    if (running) {
      console.log('\n⏹  Cancelling...');
      running.abort();
      return;
    }
    rl.close();
  });

  console.log('📚 docscout chat');
  console.log(`Document root: ${config.document_root}`);
  console.log("Type 'help' for available commands, 'exit' to quit");
  console.log('-'.repeat(50));

  try {
    for (;;) {
      const answer = await ask(rl, '\n> ');
      if (answer === null) {
        break;
      }

      const line = answer.trim();
      const keyword = line.toLowerCase();
      if (line === '') {
        continue;
      }
      if (keyword === 'exit' || keyword === 'quit' || keyword === 'q') {
        break;
      }
      if (keyword === 'help') {
        console.log(HELP_TEXT);
        continue;
      }
      if (keyword === 'clear') {
        sessionId = uuidv4();
        console.log('✨ Conversation cleared');
        continue;
      }

      running = new AbortController();
      try {
        const turn = await runtime.chat.open({
          message: line,
          session_id: sessionId,
          debug_mode: options.debug ?? false,
        });
        try {
          for await (const event of turn.stream(running.signal)) {
            const text = renderEvent(event);
            if (text !== null) {
              console.log(text);
            }
          }
        } finally {
          await turn.close();
        }
      } catch (error) {
        console.log(`\n❌ Error: ${errorMessage(error)}`);
      } finally {
        running = null;
      }
    }
  } finally {
    console.log('👋 Goodbye!');
    rl.close();
    await runtime.shutdown();
  }
}
