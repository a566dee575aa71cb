import {
  Direction,
  GameState,
  IGridPosition,
  IMoveOutcome,
} from '../maze/interfaces';
import { MazeGrid } from '../maze/mazeGrid';
import { MazeMovement } from '../maze/mazeMovement';
import { MazeUtils } from '../maze/mazeUtils';

/**
 * One play session on a single grid.
 *
 * Owns the player position, the game state and the trail of earlier
 * positions. The position starts on the grid's start cell and only changes
 * through `move` and `undo`; the state flips to `won` the first time the
 * player lands on the goal and never changes again.
 *
 * State machine:
 *   running --(accepted, on goal)--> won (terminal)
 *   running --(accepted, elsewhere)--> running
 *   running --(rejected)--> running
 *   running --(undo)--> running
 */
export class MazeGame {
  readonly grid: MazeGrid;
  #position: IGridPosition;
  #state: GameState = 'running';
  #moves = 0;
  /** Position before each accepted move, most recent last. */
  readonly #history: IGridPosition[] = [];
  /** Distance from every cell to the goal; drives `progress`. */
  readonly #distanceMap: number[][];

  constructor(grid: MazeGrid) {
    this.grid = grid;
    this.#position = { ...grid.start };
    this.#distanceMap = MazeUtils.buildDistanceMap(grid, grid.goal);
  }

  get state(): GameState {
    return this.#state;
  }

  get isWon(): boolean {
    return this.#state === 'won';
  }

  /** Copy of the current player position. */
  get position(): IGridPosition {
    return { ...this.#position };
  }

  /** Number of accepted moves so far. */
  get moves(): number {
    return this.#moves;
  }

  /** Number of moves `undo` can still take back. */
  get undoDepth(): number {
    return this.#history.length;
  }

  /** Fewest moves from start to goal, `Infinity` if the goal is unreachable. */
  get optimalMoves(): number {
    return this.#distanceMap[this.grid.start.row][this.grid.start.col];
  }

  /** Share of the shortest path already covered, 0-100. */
  get progress(): number {
    return MazeUtils.calculateProgress(
      this.#distanceMap,
      this.#position,
      this.grid.start
    );
  }

  /**
   * Try to move the player one cell.
   *
   * Once the game is won every call returns `finished` and changes nothing.
   */
  move(direction: Direction): IMoveOutcome {
    if (this.#state === 'won') {
      return { kind: 'finished', position: this.position };
    }

    const next = MazeMovement.attemptMove(
      this.grid,
      this.#position,
      direction
    );
    if (MazeUtils.samePosition(next, this.#position)) {
      return { kind: 'blocked', position: this.position };
    }

    this.#history.push(this.#position);
    this.#position = next;
    this.#moves++;
    if (MazeUtils.samePosition(next, this.grid.goal)) {
      this.#state = 'won';
      return { kind: 'won', position: this.position };
    }
    return { kind: 'moved', position: this.position };
  }

  /**
   * Step back to the position held before the last accepted move.
   *
   * The move count goes down with it. Returns `blocked` when there is nothing
   * to take back, and `finished` once the game is won.
   */
  undo(): IMoveOutcome {
    if (this.#state === 'won') {
      return { kind: 'finished', position: this.position };
    }
    const previous = this.#history.pop();
    if (!previous) {
      return { kind: 'blocked', position: this.position };
    }
    this.#position = previous;
    this.#moves--;
    return { kind: 'moved', position: this.position };
  }
}
