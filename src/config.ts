/**
 * Game configuration contract & default instance.
 *
 * USAGE PATTERN
 * ------------
 *   import { config } from './config';
 *   config.color = false;   // plain glyphs
 *   config.layout = 'spiral';
 *
 * Adjust BEFORE building a game so the loop reads the intended values. The CLI
 * takes no arguments; it layers environment overrides on top of these
 * defaults through `resolveConfig`.
 */
import { ConfigError } from './errors';

export interface IMazeGameConfig {
  /**
   * Name of a fixed layout from `mazes.ts`, or `generated` for a seeded
   * random maze.
   * Default: 'classic'
   */
  layout: string;

  /** Seed for the `generated` layout. Default: 'maze' */
  seed: string;

  /** Requested width of a generated maze (normalized to odd, min 5). */
  width: number;

  /** Requested height of a generated maze (normalized to odd, min 5). */
  height: number;

  /** Wrap glyphs in ANSI colors. Default: true */
  color: boolean;

  /** Clear the terminal before each frame. Default: true */
  clearScreen: boolean;

  /** Emit warnings (e.g. unreachable goal) through `console.warn`. Default: false */
  warnings: boolean;
}

/** Layout name that selects the seeded generator. */
export const GENERATED_LAYOUT = 'generated';

/**
 * Singleton mutable configuration object.
 * Modify properties directly; do NOT reassign the binding (imports retain reference).
 */
export const config: IMazeGameConfig = {
  layout: 'classic',
  seed: 'maze',
  width: 21,
  height: 11,
  color: true,
  clearScreen: true,
  warnings: false,
};

/** Environment variables `resolveConfig` reads. */
export type MazeEnv = Readonly<Record<string, string | undefined>>;

function parseSize(name: string, raw: string): number {
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigError(`${name} must be a positive integer, got '${raw}'`);
  }
  return value;
}

/**
 * Apply environment overrides to a base configuration.
 *
 * - MAZE_LAYOUT: layout name or `generated`
 * - MAZE_SEED: generator seed
 * - MAZE_WIDTH / MAZE_HEIGHT: generator size
 * - NO_COLOR: any non-empty value disables color
 * - MAZE_WARNINGS=1: enable warnings
 *
 * Layout names are not checked here; `loadMaze` rejects unknown ones.
 *
 * @returns A new object; `base` is left untouched.
 * @throws ConfigError when a size override is not a positive integer.
 */
export function resolveConfig(
  env: MazeEnv,
  base: IMazeGameConfig = config
): IMazeGameConfig {
  const resolved: IMazeGameConfig = { ...base };
  if (env.MAZE_LAYOUT) resolved.layout = env.MAZE_LAYOUT.trim();
  if (env.MAZE_SEED) resolved.seed = env.MAZE_SEED;
  if (env.MAZE_WIDTH) resolved.width = parseSize('MAZE_WIDTH', env.MAZE_WIDTH);
  if (env.MAZE_HEIGHT)
    resolved.height = parseSize('MAZE_HEIGHT', env.MAZE_HEIGHT);
  if (env.NO_COLOR) resolved.color = false;
  if (env.MAZE_WARNINGS === '1') resolved.warnings = true;
  return resolved;
}
