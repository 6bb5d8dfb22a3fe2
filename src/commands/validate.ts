import path from 'node:path';
import type { Decision } from '../types.js';
import { CommandValidator } from '../validator.js';
import { realpathResolver } from '../path-guard.js';
import { CommonOptions, loadCommandConfig } from './options.js';

/**
 * JSON view of a decision, as printed by `docscout validate`
 */
export function formatDecision(command: string, decision: Decision): string {
  const view = decision.allowed
    ? { command, allowed: true, tokens: decision.tokens }
    : { command, allowed: false, reason: decision.reason, detail: decision.detail, tokens: decision.tokens };
  return JSON.stringify(view, null, 2);
}

/**
 * Handle the validate command. Prints the decision to stdout and sets the
 * exit code: 0 when allowed, 1 when rejected.
 *
 * @param words - The command, possibly split by the invoking shell
 */
export async function handleValidateCommand(words: string[], options: CommonOptions): Promise<void> {
  const config = await loadCommandConfig(options);
  const command = words.join(' ');

  const validator = new CommandValidator(path.resolve(config.document_root), {
    maxCommandLength: config.validator.max_command_length,
    resolveLinks: realpathResolver(),
  });

  const decision = validator.validate(command);
  console.log(formatDecision(command, decision));
  process.exitCode = decision.allowed ? 0 : 1;
}
