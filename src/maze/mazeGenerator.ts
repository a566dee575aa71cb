import seedrandom from 'seedrandom';
import { Cell } from './interfaces';
import { MazeGrid } from './mazeGrid';

/**
 * Seeded perfect-maze generator.
 *
 * Carves corridors one cell wide with an iterative recursive backtracker
 * (depth-first search). The start is the top-left interior cell and the exit
 * is the cell the carve reached at the greatest depth, so the exit is always
 * reachable and usually far from the start.
 *
 * The same width, height and seed always produce the same layout.
 *
 * @example
 * const layout = new MazeGenerator(21, 11, 'demo').toAscii();
 */
export class MazeGenerator {
  #width: number;
  #height: number;
  #grid: Cell[][] = [];
  #farthest = { row: 1, col: 1, depth: 0 };

  /** Smallest accepted side length. */
  static readonly MIN_SIZE = 5;

  /** Neighbour offsets two cells away (up, right, down, left). */
  static readonly #CARVE_OFFSETS: readonly (readonly [number, number])[] = [
    [-2, 0],
    [0, 2],
    [2, 0],
    [0, -2],
  ];

  constructor(rawWidth: number, rawHeight: number, seed: string) {
    this.#width = MazeGenerator.normalizeSize(rawWidth);
    this.#height = MazeGenerator.normalizeSize(rawHeight);
    const random = seedrandom(seed);
    this.#initializeGrid();
    this.#carvePerfectMaze(random);
    this.#markStartAndExit();
  }

  /**
   * Floor the requested size, clamp it to `MIN_SIZE` and force it odd so
   * every corridor is surrounded by walls.
   */
  static normalizeSize(raw: number): number {
    const size = Math.max(MazeGenerator.MIN_SIZE, Math.floor(raw));
    return size % 2 === 0 ? size - 1 : size;
  }

  get width(): number {
    return this.#width;
  }

  get height(): number {
    return this.#height;
  }

  /** Layout rows using '#', '.', 'S' and 'E'. */
  toAscii(): string[] {
    return this.toGrid().toAscii();
  }

  /** The generated maze as an immutable grid. */
  toGrid(): MazeGrid {
    return MazeGrid.fromCells(this.#grid);
  }

  #initializeGrid(): void {
    this.#grid = Array.from({ length: this.#height }, () =>
      Array.from({ length: this.#width }, (): Cell => Cell.Wall)
    );
    this.#grid[1][1] = Cell.Open;
  }

  /**
   * Carve from (1,1): look at unvisited cells two steps away in shuffled
   * order, knock down the wall between and descend; backtrack when stuck.
   */
  #carvePerfectMaze(random: () => number): void {
    const stack: { row: number; col: number; depth: number }[] = [
      { row: 1, col: 1, depth: 0 },
    ];
    const offsets = [...MazeGenerator.#CARVE_OFFSETS];

    while (stack.length > 0) {
      const current = stack[stack.length - 1];

      // Fisher-Yates with the seeded source.
      for (let i = offsets.length - 1; i > 0; i--) {
        const j = Math.floor(random() * (i + 1));
        const swap = offsets[i];
        offsets[i] = offsets[j];
        offsets[j] = swap;
      }

      let carved = false;
      for (const [deltaRow, deltaCol] of offsets) {
        const nextRow = current.row + deltaRow;
        const nextCol = current.col + deltaCol;
        // Keep the outer frame intact.
        if (
          nextRow <= 0 ||
          nextCol <= 0 ||
          nextRow >= this.#height - 1 ||
          nextCol >= this.#width - 1
        )
          continue;
        if (this.#grid[nextRow][nextCol] !== Cell.Wall) continue;

        this.#grid[current.row + deltaRow / 2][current.col + deltaCol / 2] =
          Cell.Open;
        this.#grid[nextRow][nextCol] = Cell.Open;

        const depth = current.depth + 1;
        stack.push({ row: nextRow, col: nextCol, depth });
        if (depth > this.#farthest.depth) {
          this.#farthest = { row: nextRow, col: nextCol, depth };
        }
        carved = true;
        break;
      }

      if (!carved) stack.pop();
    }
  }

  #markStartAndExit(): void {
    this.#grid[1][1] = Cell.Start;
    this.#grid[this.#farthest.row][this.#farthest.col] = Cell.Goal;
  }
}
