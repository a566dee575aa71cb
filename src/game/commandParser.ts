import type { Key } from 'readline';
import { Command } from '../maze/interfaces';

/** Letter keys (lowercase) and the command each one issues. */
const LETTER_COMMANDS: ReadonlyMap<string, Command> = new Map<string, Command>([
  ['w', 'up'],
  ['k', 'up'],
  ['s', 'down'],
  ['j', 'down'],
  ['a', 'left'],
  ['h', 'left'],
  ['d', 'right'],
  ['l', 'right'],
  ['u', 'undo'],
  ['r', 'undo'],
  ['q', 'quit'],
]);

/** Named keys reported by `readline` keypress events. */
const NAMED_COMMANDS: ReadonlyMap<string, Command> = new Map<string, Command>([
  ['up', 'up'],
  ['down', 'down'],
  ['left', 'left'],
  ['right', 'right'],
  ['escape', 'quit'],
]);

/**
 * Map a keypress to a command.
 *
 * Accepts the `(str, key)` pair `readline` passes to `keypress` listeners.
 * Letters are case-insensitive; Ctrl+C always quits.
 *
 * @returns The command, or `undefined` for keys the game ignores.
 * @example
 * parseKey('W');                        // 'up'
 * parseKey(undefined, { name: 'left' }); // 'left'
 */
export function parseKey(input: string | undefined, key?: Key): Command | undefined {
  if (key?.ctrl) {
    return key.name === 'c' ? 'quit' : undefined;
  }
  if (key?.name) {
    const named = NAMED_COMMANDS.get(key.name);
    if (named) return named;
  }
  if (input && input.length === 1) {
    return LETTER_COMMANDS.get(input.toLowerCase());
  }
  return undefined;
}
