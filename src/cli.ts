import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';
import { handleServeCommand } from './commands/serve.js';
import { handleValidateCommand } from './commands/validate.js';
import { handleChatCommand } from './commands/chat.js';
import { parsePort } from './commands/options.js';

const PackageJsonSchema = z.object({ version: z.string() });

/**
 * Version from package.json (one level above src/ and dist/)
 */
function readVersion(): string {
  const packageJsonPath = join(__dirname, '..', 'package.json');
  return PackageJsonSchema.parse(JSON.parse(readFileSync(packageJsonPath, 'utf-8'))).version;
}

/**
 * Create and configure the CLI program
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('docscout')
    .description('Explore a read-only document tree through a sandboxed command agent')
    .version(readVersion());

  program
    .command('serve')
    .description('Start the HTTP server (POST /chat streams Server-Sent Events)')
    .option('-c, --config <path>', 'Path to docscout.yaml (defaults to ./docscout.yaml)')
    .option('-r, --root <path>', 'Document root (overrides the configuration)')
    .option('-p, --port <number>', 'Port to listen on', parsePort)
    .option('-H, --host <host>', 'Host to bind')
    .option('-v, --verbose', 'Enable verbose output', false)
    .action(handleServeCommand);

  program
    .command('validate <command...>')
    .description('Check a command against the validator and print the decision as JSON')
    .option('-c, --config <path>', 'Path to docscout.yaml (defaults to ./docscout.yaml)')
    .option('-r, --root <path>', 'Document root (overrides the configuration)')
    .option('-v, --verbose', 'Enable verbose output', false)
    .action(handleValidateCommand);

  program
    .command('chat')
    .description('Interactive chat in the terminal')
    .option('-c, --config <path>', 'Path to docscout.yaml (defaults to ./docscout.yaml)')
    .option('-r, --root <path>', 'Document root (overrides the configuration)')
    .option('-s, --session-id <id>', 'Continue an existing session')
    .option('-d, --debug', 'Show commands and their results', false)
    .option('-v, --verbose', 'Enable verbose output', false)
    .action(handleChatCommand);

  return program;
}

/**
 * Parse command line arguments and execute
 */
export async function run(argv: string[] = process.argv): Promise<void> {
  const program = createProgram();
  await program.parseAsync(argv);
}
