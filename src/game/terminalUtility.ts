/**
 * Terminal Utility - Handles terminal-specific functions
 *
 * Screen clearing and keypress subscription. Everything here works on plain
 * Node streams so tests can drive it with in-process `PassThrough` streams.
 */

import { emitKeypressEvents, Key } from 'readline';

/** Anything the game can read keys from (process.stdin or a test stream). */
export type KeySource = NodeJS.ReadableStream & {
  isTTY?: boolean;
  setRawMode?: (mode: boolean) => unknown;
};

/** Listener signature for `TerminalUtility.listenForKeys`. */
export type KeyListener = (input: string | undefined, key: Key | undefined) => void;

/**
 * TerminalUtility provides static helpers for terminal management.
 */
export class TerminalUtility {
  /** ANSI sequence that resets the terminal screen. */
  static readonly CLEAR_SCREEN = '\x1Bc';

  /**
   * Returns a function that clears the terminal screen using ANSI escape codes.
   *
   * @param write - Sink for the escape sequence (defaults to stdout).
   */
  static createTerminalClearer(
    write: (text: string) => void = (text) => {
      process.stdout.write(text);
    }
  ): () => void {
    return () => write(TerminalUtility.CLEAR_SCREEN);
  }

  /**
   * Subscribe to keypresses on `source`.
   *
   * A TTY source is switched to raw mode so single keys arrive without Enter,
   * and restored when the returned function is called. The source is resumed
   * while subscribed and paused again on release so the process can exit.
   *
   * @returns Function that detaches the listener and restores the terminal.
   */
  static listenForKeys(source: KeySource, listener: KeyListener): () => void {
    emitKeypressEvents(source);
    const rawMode = source.isTTY === true && typeof source.setRawMode === 'function';
    if (rawMode) source.setRawMode?.(true);

    source.on('keypress', listener);
    source.resume();

    return () => {
      source.removeListener('keypress', listener);
      if (rawMode) source.setRawMode?.(false);
      source.pause();
    };
  }
}
