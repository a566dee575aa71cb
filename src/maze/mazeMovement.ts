/**
 * Maze Movement - movement and collision rules
 *
 * Turns a direction into a candidate cell and decides whether the player may
 * enter it. Rejected moves are not errors: the caller simply gets the current
 * position back.
 */

import { Direction, IGridPosition } from './interfaces';
import { MazeGrid } from './mazeGrid';

/**
 * MazeMovement provides static methods for player movement.
 */
export class MazeMovement {
  /** Row/column offsets for each direction. */
  static readonly DIRECTION_DELTAS: Readonly<
    Record<Direction, readonly [number, number]>
  > = {
    up: [-1, 0],
    down: [1, 0],
    left: [0, -1],
    right: [0, 1],
  };

  /** All directions in a stable order (clockwise from up). */
  static readonly DIRECTIONS: readonly Direction[] = [
    'up',
    'right',
    'down',
    'left',
  ];

  /**
   * The cell one step away in `direction`. No validation.
   */
  static candidate(
    position: IGridPosition,
    direction: Direction
  ): IGridPosition {
    const [deltaRow, deltaCol] = MazeMovement.DIRECTION_DELTAS[direction];
    return { row: position.row + deltaRow, col: position.col + deltaCol };
  }

  /**
   * Whether the player may stand on `position`.
   *
   * Bounds are checked first so `cellAt` is never queried out of range.
   */
  static isValidMove(grid: MazeGrid, position: IGridPosition): boolean {
    return grid.isWalkable(position.row, position.col);
  }

  /**
   * Move one cell in `direction` if the target is inside the grid and not a
   * wall; otherwise stay put.
   *
   * @param grid - Maze the player is in.
   * @param currentPos - Position before the move.
   * @param direction - Requested direction.
   * @returns The new position, or a copy of `currentPos` when rejected.
   * @example
   * const grid = MazeGrid.fromAscii(['S#E', '...']);
   * MazeMovement.attemptMove(grid, grid.start, 'right'); // { row: 0, col: 0 }
   * MazeMovement.attemptMove(grid, grid.start, 'down');  // { row: 1, col: 0 }
   */
  static attemptMove(
    grid: MazeGrid,
    currentPos: IGridPosition,
    direction: Direction
  ): IGridPosition {
    const nextPosition = MazeMovement.candidate(currentPos, direction);
    if (MazeMovement.isValidMove(grid, nextPosition)) {
      return nextPosition;
    }
    return { row: currentPos.row, col: currentPos.col };
  }
}
