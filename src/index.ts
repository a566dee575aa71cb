/**
 * Terminal Maze - Main export file
 *
 * Re-exports the maze core, the game layer and the ambient helpers for
 * programmatic use. The interactive entry point lives in `cli.ts`.
 */

// Maze core
export { MazeGrid } from './maze/mazeGrid';
export { MazeMovement } from './maze/mazeMovement';
export { MazeUtils } from './maze/mazeUtils';
export { MazeGenerator } from './maze/mazeGenerator';
export { MazeVisualization } from './maze/mazeVisualization';
export { loadMaze } from './maze/loadMaze';
export { colors } from './maze/colors';
export * from './maze/interfaces';
export * as mazes from './maze/mazes';

// Game layer
export { MazeGame } from './game/mazeGame';
export { GameLoop } from './game/gameLoop';
export type { IGameLoopOptions } from './game/gameLoop';
export { parseKey } from './game/commandParser';
export { TerminalUtility } from './game/terminalUtility';
export type { KeySource, KeyListener } from './game/terminalUtility';

// Ambient
export { config, resolveConfig, GENERATED_LAYOUT } from './config';
export type { IMazeGameConfig, MazeEnv } from './config';
export { MazeError, BoundsError, MazeFormatError, ConfigError } from './errors';
export { forceLog, forceError, warn, onceWarn } from './utils/logger';
export type { LogFn } from './utils/logger';
export { main } from './cli';
