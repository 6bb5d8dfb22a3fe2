import type { CommandAttempt } from '../types.js';
import {
  ExecutionFailedError,
  ExecutionTimeoutError,
  ValidationRejectedError,
} from '../errors.js';

export const NO_OUTPUT_MESSAGE = 'Command executed successfully (no output)';

/**
 * Render the outcome of a command attempt as text. This is what the agent
 * reads back and what a debug client sees in the result event.
 */
export function formatObservation(attempt: CommandAttempt, timeoutMs: number): string {
  if (attempt.decision === 'REJECTED' || !attempt.result) {
    const reason = attempt.reason;
    if (!reason) {
      return 'Command was not executed';
    }
    return new ValidationRejectedError(reason, attempt.detail ?? 'not allowed').message;
  }

  const result = attempt.result;
  switch (result.status) {
    case 'timeout':
      return withOutput(new ExecutionTimeoutError(timeoutMs).message, result.stdout);
    case 'aborted':
      return 'Command cancelled';
    case 'exited':
      break;
  }

  if (result.exit_code !== 0) {
    return withOutput(new ExecutionFailedError(result.exit_code, result.stderr).message, result.stdout);
  }

  const output = result.stdout.trim() === '' ? NO_OUTPUT_MESSAGE : result.stdout;
  return result.stderr.trim() === '' ? output : `${output}\n[stderr]\n${result.stderr}`;
}

function withOutput(message: string, stdout: string): string {
  return stdout.trim() === '' ? message : `${message}\n[partial output]\n${stdout}`;
}
