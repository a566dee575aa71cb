import type { Key } from 'readline';
import { ExitReason, IRenderOptions } from '../maze/interfaces';
import { MazeVisualization } from '../maze/mazeVisualization';
import { onceWarn } from '../utils/logger';
import { parseKey } from './commandParser';
import { MazeGame } from './mazeGame';
import { KeySource, TerminalUtility } from './terminalUtility';

/** Options for a `GameLoop`. */
export interface IGameLoopOptions extends IRenderOptions {
  /** Clear the screen before drawing each frame. */
  clearScreen: boolean;
  /** Sink for all output (frames, prompts, messages). */
  write: (text: string) => void;
}

/**
 * Drives a `MazeGame` from keypresses and draws it.
 *
 * The loop is event-driven: each keypress is handled to completion before the
 * next one is delivered, so the game has a single writer.
 */
export class GameLoop {
  static readonly PROMPT =
    'Move with W/A/S/D or the arrow keys, U to undo, Q to quit.';
  static readonly BLOCKED_NOTICE = 'Blocked! You cannot move there.';
  static readonly NOTHING_TO_UNDO = 'Nothing to undo.';
  static readonly FAREWELL = 'Bye!';

  readonly game: MazeGame;
  readonly #options: IGameLoopOptions;
  readonly #clear: () => void;
  #exitReason: ExitReason | undefined;

  constructor(game: MazeGame, options: IGameLoopOptions) {
    this.game = game;
    this.#options = options;
    this.#clear = TerminalUtility.createTerminalClearer(options.write);
  }

  /** Why the loop stopped, or `undefined` while it is still accepting keys. */
  get exitReason(): ExitReason | undefined {
    return this.#exitReason;
  }

  /** Draw the first frame. Warns once when the goal cannot be reached. */
  start(): void {
    if (!isFinite(this.game.optimalMoves)) {
      onceWarn(
        'unreachable-goal',
        'The goal cannot be reached from the start in this maze.'
      );
    }
    this.#render();
  }

  /**
   * Handle one keypress.
   *
   * @returns `true` while the loop keeps going, `false` once it has ended.
   */
  handleKey(input: string | undefined, key?: Key): boolean {
    if (this.#exitReason) return false;

    const command = parseKey(input, key);
    if (command === undefined) {
      this.#writeLine(GameLoop.PROMPT);
      return true;
    }

    if (command === 'quit') {
      this.#writeLine(GameLoop.FAREWELL);
      this.#exitReason = 'quit';
      return false;
    }

    const undoing = command === 'undo';
    const outcome = undoing ? this.game.undo() : this.game.move(command);
    switch (outcome.kind) {
      case 'moved':
        this.#render();
        return true;
      case 'blocked':
        this.#render(
          MazeVisualization.highlight(
            undoing ? GameLoop.NOTHING_TO_UNDO : GameLoop.BLOCKED_NOTICE,
            'notice',
            this.#options
          )
        );
        return true;
      case 'won':
      case 'finished':
        this.#render(
          MazeVisualization.highlight(
            this.winMessage(),
            'success',
            this.#options
          ),
          false
        );
        this.#exitReason = 'won';
        return false;
    }
  }

  /** `You reached the goal in <n> moves (shortest: <m>)!` */
  winMessage(): string {
    const moves = this.game.moves;
    const noun = moves === 1 ? 'move' : 'moves';
    return `You reached the goal in ${moves} ${noun} (shortest: ${this.game.optimalMoves})!`;
  }

  /**
   * Play until the player wins, quits, or `source` ends.
   *
   * Draws the first frame, then feeds every keypress from `source` to
   * `handleKey`. All listeners are detached before the promise settles.
   */
  run(source: KeySource): Promise<ExitReason> {
    return new Promise<ExitReason>((resolve) => {
      let release: () => void = () => undefined;

      const finish = (reason: ExitReason) => {
        release();
        source.removeListener('end', onEnd);
        source.removeListener('close', onEnd);
        resolve(reason);
      };
      const onEnd = () => {
        this.#exitReason = this.#exitReason ?? 'closed';
        finish(this.#exitReason);
      };
      const onKey = (input: string | undefined, key: Key | undefined) => {
        if (!this.handleKey(input, key)) finish(this.#exitReason ?? 'closed');
      };

      this.start();
      source.once('end', onEnd);
      source.once('close', onEnd);
      release = TerminalUtility.listenForKeys(source, onKey);
    });
  }

  #render(notice?: string, prompt = true): void {
    if (this.#options.clearScreen) this.#clear();
    const frame = [
      MazeVisualization.visualizeMaze(
        this.game.grid,
        this.game.position,
        this.#options
      ),
      '',
      MazeVisualization.statusLine(this.game.moves, this.game.progress),
    ];
    if (notice) frame.push(notice);
    if (prompt) frame.push(GameLoop.PROMPT);
    this.#writeLine(frame.join('\n'));
  }

  #writeLine(text: string): void {
    this.#options.write(text + '\n');
  }
}
