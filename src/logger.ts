/**
 * Operational logging.
 *
 * Every line goes to stderr so that stdout stays reserved for structured
 * output (decisions printed by `docscout validate`, JSON audit lines from the
 * console sink). Debug lines are only written when verbose mode is on.
 */

let verbose = process.env.DOCSCOUT_DEBUG === '1';

export function setVerbose(enabled: boolean): void {
  verbose = enabled;
}

export const logger = {
  info: (message: string) => console.error(`[INFO] ${message}`),
  success: (message: string) => console.error(`[SUCCESS] ${message}`),
  warn: (message: string) => console.error(`[WARN] ${message}`),
  error: (message: string) => console.error(`[ERROR] ${message}`),
  debug: (message: string) => {
    if (verbose) {
      console.error(`[DEBUG] ${message}`);
    }
  },
  divider: () => console.error('─'.repeat(60)),
};
