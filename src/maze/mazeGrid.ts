import { BoundsError, MazeFormatError } from '../errors';
import { Cell, IGridPosition } from './interfaces';

/**
 * Immutable maze grid.
 *
 * A grid is built once, from ASCII text or from a cell matrix, and never
 * changes afterwards. It exposes read-only queries only; the player position
 * lives in `MazeGame`.
 *
 * Layout characters:
 *   '#' and box drawing characters (═,║,╔,╗,╚,╝,╠,╣,╦,╩,╬) = wall
 *   '.' or ' ' = open
 *   'S' = start
 *   'E' = goal
 *
 * @example
 * const grid = MazeGrid.fromAscii(['S.#', '..E']);
 * grid.cellAt(0, 2); // 'wall'
 * grid.goal;         // { row: 1, col: 2 }
 */
export class MazeGrid {
  /** Characters treated as walls. */
  static #WALL_CHARS = new Set([
    '#',
    '═',
    '║',
    '╔',
    '╗',
    '╚',
    '╝',
    '╠',
    '╣',
    '╦',
    '╩',
    '╬',
  ]);

  /** Non-wall characters and the cell each one encodes. */
  static #CHAR_CELLS = new Map<string, Cell>([
    ['.', Cell.Open],
    [' ', Cell.Open],
    ['S', Cell.Start],
    ['E', Cell.Goal],
  ]);

  /** Canonical character for each cell, used by `toAscii`. */
  static #CELL_CHARS: Readonly<Record<Cell, string>> = {
    wall: '#',
    open: '.',
    start: 'S',
    goal: 'E',
  };

  readonly width: number;
  readonly height: number;
  readonly start: IGridPosition;
  readonly goal: IGridPosition;

  // Flattened row-major storage: index = row * width + col.
  readonly #cells: readonly Cell[];

  private constructor(
    cells: readonly Cell[],
    width: number,
    height: number,
    start: IGridPosition,
    goal: IGridPosition
  ) {
    this.#cells = cells;
    this.width = width;
    this.height = height;
    this.start = Object.freeze({ ...start });
    this.goal = Object.freeze({ ...goal });
  }

  /**
   * Parse an ASCII layout (one string per row) into a grid.
   *
   * @throws MazeFormatError on an empty or ragged layout, an unknown
   *  character, or anything other than exactly one start and one goal.
   */
  static fromAscii(layout: ReadonlyArray<string>): MazeGrid {
    const rows = layout.map((rowString, rowIndex) =>
      [...rowString].map((cellChar, colIndex) => {
        if (MazeGrid.#WALL_CHARS.has(cellChar)) return Cell.Wall;
        const cell = MazeGrid.#CHAR_CELLS.get(cellChar);
        if (cell === undefined) {
          throw new MazeFormatError(
            `Unknown character '${cellChar}' at row ${rowIndex}, column ${colIndex}`
          );
        }
        return cell;
      })
    );
    return MazeGrid.fromCells(rows);
  }

  /**
   * Build a grid from a rectangular cell matrix.
   *
   * The matrix is copied; later changes to the argument do not reach the grid.
   *
   * @throws MazeFormatError under the same rules as `fromAscii`.
   */
  static fromCells(rows: ReadonlyArray<ReadonlyArray<Cell>>): MazeGrid {
    const height = rows.length;
    if (height === 0) throw new MazeFormatError('Maze has no rows');
    const width = rows[0].length;
    if (width === 0) throw new MazeFormatError('Maze has no columns');

    const cells: Cell[] = new Array(width * height);
    const starts: IGridPosition[] = [];
    const goals: IGridPosition[] = [];

    for (let row = 0; row < height; row++) {
      const source = rows[row];
      if (source.length !== width) {
        throw new MazeFormatError(
          `Row ${row} has ${source.length} cells, expected ${width}`
        );
      }
      for (let col = 0; col < width; col++) {
        const cell = source[col];
        cells[row * width + col] = cell;
        if (cell === Cell.Start) starts.push({ row, col });
        else if (cell === Cell.Goal) goals.push({ row, col });
      }
    }

    if (starts.length !== 1) {
      throw new MazeFormatError(
        `Maze needs exactly one start, found ${starts.length}`
      );
    }
    if (goals.length !== 1) {
      throw new MazeFormatError(
        `Maze needs exactly one goal, found ${goals.length}`
      );
    }

    return new MazeGrid(
      Object.freeze(cells),
      width,
      height,
      starts[0],
      goals[0]
    );
  }

  /** True when the coordinates lie inside the grid. */
  inBounds(row: number, col: number): boolean {
    return (
      Number.isInteger(row) &&
      Number.isInteger(col) &&
      row >= 0 &&
      row < this.height &&
      col >= 0 &&
      col < this.width
    );
  }

  /**
   * Cell kind at the given coordinates.
   *
   * @throws BoundsError when the coordinates are outside the grid.
   */
  cellAt(row: number, col: number): Cell {
    if (!this.inBounds(row, col)) {
      throw new BoundsError(row, col, this.width, this.height);
    }
    return this.#cells[row * this.width + col];
  }

  /** In bounds and not a wall. Never throws. */
  isWalkable(row: number, col: number): boolean {
    return this.inBounds(row, col) && this.cellAt(row, col) !== Cell.Wall;
  }

  /** Canonical text form of the grid, one string per row. */
  toAscii(): string[] {
    const lines: string[] = [];
    for (let row = 0; row < this.height; row++) {
      let line = '';
      for (let col = 0; col < this.width; col++) {
        line += MazeGrid.#CELL_CHARS[this.#cells[row * this.width + col]];
      }
      lines.push(line);
    }
    return lines;
  }
}
