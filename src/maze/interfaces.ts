// Shared types for the terminal maze.
// Kept in one place so the grid, movement, game and rendering layers agree.

/**
 * Member names for the closed set of cell kinds.
 *
 * @example
 * grid.cellAt(0, 1) === Cell.Wall
 */
export const Cell = {
  Wall: 'wall',
  Open: 'open',
  Start: 'start',
  Goal: 'goal',
} as const;

/** One grid unit's type. */
export type Cell = typeof Cell[keyof typeof Cell];

/**
 * A (row, column) coordinate on the grid.
 *
 * Row 0 is the top row, column 0 the leftmost column.
 */
export interface IGridPosition {
  readonly row: number;
  readonly col: number;
}

/** The four movement directions. */
export type Direction = 'up' | 'down' | 'left' | 'right';

/** Everything the keyboard can ask for. */
export type Command = Direction | 'undo' | 'quit';

/** Overall progress of a session: `won` is terminal. */
export type GameState = 'running' | 'won';

/**
 * Result of asking the game to move the player.
 *
 * - `moved`: the move (or undo) was accepted and the goal was not reached.
 * - `blocked`: a wall or the grid edge rejected the move, or there was
 *   nothing to undo.
 * - `won`: the move was accepted and landed on the goal.
 * - `finished`: the game was already won, nothing was processed.
 */
export interface IMoveOutcome {
  kind: 'moved' | 'blocked' | 'won' | 'finished';
  /** Player position after the move was handled. */
  position: IGridPosition;
}

/** Why a game loop stopped. `closed` means the input ended before a win or quit. */
export type ExitReason = 'won' | 'quit' | 'closed';

/**
 * Options controlling how a frame is drawn.
 */
export interface IRenderOptions {
  /** Wrap glyphs in ANSI color sequences. */
  color: boolean;
}
