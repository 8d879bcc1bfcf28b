import { config } from '../config';

// One-time warning utility; keys already reported are skipped.
const seen = new Set<string>();

export function onceWarn(key: string, message: string) {
  if (seen.has(key)) return;
  seen.add(key);
  warn(message);
}

/** Print a runtime warning when `config.warnings` is enabled. */
export function warn(message: string, details?: Record<string, unknown>) {
  if (!config.warnings) return;
  // eslint-disable-next-line no-console
  if (details) console.warn(message, details);
  // eslint-disable-next-line no-console
  else console.warn(message);
}

/** Forget which one-time warnings were already printed (test harness helper). */
export function resetWarnings() {
  seen.clear();
}
