import { config } from '../config';

/** Signature shared by every log sink the game accepts. */
export type LogFn = (...args: unknown[]) => void;

/**
 * Write straight to stdout, bypassing any `console` patching.
 * Arguments are joined with spaces and terminated by a newline.
 */
export const forceLog: LogFn = (...args) => {
  process.stdout.write(args.join(' ') + '\n');
};

/** stderr counterpart of `forceLog`. */
export const forceError: LogFn = (...args) => {
  process.stderr.write(args.join(' ') + '\n');
};

/** Emit a warning when `config.warnings` is enabled. */
export function warn(message: string): void {
  if (!config.warnings) return;
  // eslint-disable-next-line no-console
  console.warn(message);
}

// One-time warning utility
const seen = new Set<string>();
export function onceWarn(key: string, message: string): void {
  if (!config.warnings || seen.has(key)) return;
  warn(message);
  seen.add(key);
}

/** Forget which one-time warnings were already emitted (tests). */
export function resetWarnings(): void {
  seen.clear();
}
