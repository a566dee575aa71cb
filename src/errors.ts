/**
 * Error types raised by the maze core.
 *
 * Every error extends `MazeError` so callers (the CLI in particular) can tell
 * library failures apart from unexpected runtime faults.
 */

/** Base class for all maze errors. */
export class MazeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Raised by `MazeGrid.cellAt` for coordinates outside the grid.
 *
 * Movement validates bounds before querying the grid, so during play this
 * error never reaches the player.
 */
export class BoundsError extends MazeError {
  readonly row: number;
  readonly col: number;

  constructor(row: number, col: number, width: number, height: number) {
    super(
      `Cell (${row}, ${col}) is outside the ${width}x${height} grid`
    );
    this.row = row;
    this.col = col;
  }
}

/** Raised when a layout or cell matrix cannot be turned into a grid. */
export class MazeFormatError extends MazeError {}

/** Raised when configuration overrides are invalid. */
export class ConfigError extends MazeError {}
