import { IGridPosition } from './interfaces';
import { MazeGrid } from './mazeGrid';
import { MazeMovement } from './mazeMovement';

/**
 * Breadth-first search helpers for maze analysis.
 *
 * Used to report progress and the optimal move count while playing. None of
 * these helpers move the player.
 *
 * @example
 * const grid = MazeGrid.fromAscii(['S..', '.#E']);
 * MazeUtils.shortestPath(grid, grid.start, grid.goal)?.length; // 4
 */
export class MazeUtils {
  /** Sentinel for walls and unvisited cells in the flat distance buffer. */
  static #UNREACHABLE = -1;

  /** True when both positions name the same cell. */
  static samePosition(a: IGridPosition, b: IGridPosition): boolean {
    return a.row === b.row && a.col === b.col;
  }

  /**
   * BFS over walkable cells from `origin`, returning a flat row-major buffer
   * of step counts (-1 for walls and unreachable cells) plus the predecessor
   * index of every reached cell (-1 for the origin).
   */
  static #search(
    grid: MazeGrid,
    origin: IGridPosition
  ): { distances: Int32Array; parents: Int32Array } {
    const { width } = grid;
    const cellCount = width * grid.height;
    const distances = new Int32Array(cellCount).fill(MazeUtils.#UNREACHABLE);
    const parents = new Int32Array(cellCount).fill(-1);

    if (!grid.isWalkable(origin.row, origin.col)) {
      return { distances, parents };
    }

    const queue = new Int32Array(cellCount);
    let queueHead = 0;
    let queueTail = 0;
    const originIndex = origin.row * width + origin.col;
    distances[originIndex] = 0;
    queue[queueTail++] = originIndex;

    while (queueHead < queueTail) {
      const currentIndex = queue[queueHead++];
      const currentRow = (currentIndex / width) | 0;
      const currentCol = currentIndex - currentRow * width;

      for (const direction of MazeMovement.DIRECTIONS) {
        const next = MazeMovement.candidate(
          { row: currentRow, col: currentCol },
          direction
        );
        if (!MazeMovement.isValidMove(grid, next)) continue;
        const nextIndex = next.row * width + next.col;
        if (distances[nextIndex] !== MazeUtils.#UNREACHABLE) continue;
        distances[nextIndex] = distances[currentIndex] + 1;
        parents[nextIndex] = currentIndex;
        queue[queueTail++] = nextIndex;
      }
    }
    return { distances, parents };
  }

  /**
   * Distance (in moves) from every cell to `target`.
   *
   * Walls and cells that cannot reach `target` hold `Infinity`.
   *
   * @returns Matrix shaped `[height][width]`.
   */
  static buildDistanceMap(grid: MazeGrid, target: IGridPosition): number[][] {
    const { distances } = MazeUtils.#search(grid, target);
    const result: number[][] = [];
    for (let row = 0; row < grid.height; row++) {
      const resultRow: number[] = new Array(grid.width);
      for (let col = 0; col < grid.width; col++) {
        const distance = distances[row * grid.width + col];
        resultRow[col] =
          distance === MazeUtils.#UNREACHABLE ? Infinity : distance;
      }
      result.push(resultRow);
    }
    return result;
  }

  /**
   * Number of moves on the shortest path between two cells, or `Infinity`
   * when no path exists.
   */
  static bfsDistance(
    grid: MazeGrid,
    from: IGridPosition,
    to: IGridPosition
  ): number {
    if (!grid.isWalkable(to.row, to.col)) return Infinity;
    const { distances } = MazeUtils.#search(grid, from);
    const distance = distances[to.row * grid.width + to.col];
    return distance === MazeUtils.#UNREACHABLE ? Infinity : distance;
  }

  /**
   * Cells visited along a shortest path, `from` and `to` included.
   *
   * @returns The path, or `undefined` when `to` cannot be reached.
   */
  static shortestPath(
    grid: MazeGrid,
    from: IGridPosition,
    to: IGridPosition
  ): IGridPosition[] | undefined {
    if (!grid.isWalkable(to.row, to.col)) return undefined;
    const { distances, parents } = MazeUtils.#search(grid, from);
    let cursor = to.row * grid.width + to.col;
    if (distances[cursor] === MazeUtils.#UNREACHABLE) return undefined;

    const path: IGridPosition[] = [];
    while (cursor !== -1) {
      const row = (cursor / grid.width) | 0;
      path.push({ row, col: cursor - row * grid.width });
      cursor = parents[cursor];
    }
    return path.reverse();
  }

  /**
   * Share of the shortest start-to-goal path already covered, as a rounded
   * percentage in [0, 100].
   *
   * @param distanceMap - Output of `buildDistanceMap` for the goal.
   * @param currentPos - Player position.
   * @param startPos - Start position.
   * @returns 100 when start is the goal, 0 when the goal is unreachable.
   */
  static calculateProgress(
    distanceMap: ReadonlyArray<ReadonlyArray<number>>,
    currentPos: IGridPosition,
    startPos: IGridPosition
  ): number {
    const totalDistance = distanceMap[startPos.row]?.[startPos.col];
    const remaining = distanceMap[currentPos.row]?.[currentPos.col];
    if (totalDistance === 0) return 100;
    if (
      totalDistance === undefined ||
      remaining === undefined ||
      !isFinite(totalDistance) ||
      !isFinite(remaining)
    )
      return 0;
    const progress = ((totalDistance - remaining) / totalDistance) * 100;
    return Math.min(100, Math.max(0, Math.round(progress)));
  }
}
