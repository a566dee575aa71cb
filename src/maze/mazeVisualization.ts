/**
 * Maze Visualization - turns a grid and player position into terminal text
 *
 * Each cell kind has its own glyph; the player glyph is drawn on top of
 * whatever cell the player stands on. With color enabled every glyph is
 * wrapped in ANSI sequences, otherwise the plain glyphs are returned.
 */

import { colors } from './colors';
import { Cell, IGridPosition, IRenderOptions } from './interfaces';
import { MazeGrid } from './mazeGrid';

/**
 * MazeVisualization provides static methods for rendering mazes and status.
 */
export class MazeVisualization {
  /** Plain glyph for each cell kind. */
  static readonly CELL_GLYPHS: Readonly<Record<Cell, string>> = {
    wall: '#',
    open: '.',
    start: 'S',
    goal: 'E',
  };

  /** Glyph drawn where the player stands. */
  static readonly PLAYER_GLYPH = 'P';

  /** ANSI prefix for each cell kind. */
  static #CELL_STYLES: Readonly<Record<Cell, string>> = {
    wall: `${colors.bgBlack}${colors.blueNeon}`,
    open: `${colors.floorBg}${colors.gridLineText}`,
    start: `${colors.bgBlack}${colors.orangeNeon}`,
    goal: `${colors.bgBlack}${colors.orangeNeon}`,
  };

  static #PLAYER_STYLE = `${colors.bgBlack}${colors.bright}${colors.cyanNeon}`;

  /**
   * Render one cell.
   *
   * @param cell - Cell kind.
   * @param isPlayer - Whether the player stands here (takes precedence).
   * @param options - Render options.
   * @returns The glyph, colorized when `options.color` is set.
   */
  static renderCell(
    cell: Cell,
    isPlayer: boolean,
    options: IRenderOptions
  ): string {
    const glyph = isPlayer
      ? MazeVisualization.PLAYER_GLYPH
      : MazeVisualization.CELL_GLYPHS[cell];
    if (!options.color) return glyph;
    const style = isPlayer
      ? MazeVisualization.#PLAYER_STYLE
      : MazeVisualization.#CELL_STYLES[cell];
    return `${style}${glyph}${colors.reset}`;
  }

  /**
   * Render the whole grid with the player overlay, one line per row.
   *
   * @example
   * // corridor layout, player one step right of the start
   * MazeVisualization.visualizeMaze(grid, { row: 0, col: 1 }, { color: false });
   * // first line: 'SP..E'
   */
  static visualizeMaze(
    grid: MazeGrid,
    player: IGridPosition,
    options: IRenderOptions
  ): string {
    const lines: string[] = [];
    for (let row = 0; row < grid.height; row++) {
      let line = '';
      for (let col = 0; col < grid.width; col++) {
        line += MazeVisualization.renderCell(
          grid.cellAt(row, col),
          row === player.row && col === player.col,
          options
        );
      }
      lines.push(line);
    }
    return lines.join('\n');
  }

  /** `Moves: <n>  Progress: <p>%` */
  static statusLine(moves: number, progress: number): string {
    return `Moves: ${moves}  Progress: ${progress}%`;
  }

  /** Colorize a one-line message, or return it unchanged without color. */
  static highlight(
    message: string,
    tone: 'notice' | 'success',
    options: IRenderOptions
  ): string {
    if (!options.color) return message;
    const style = tone === 'success' ? colors.pureGreen : colors.neonRed;
    return `${style}${message}${colors.reset}`;
  }
}
