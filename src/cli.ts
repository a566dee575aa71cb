#!/usr/bin/env node
/**
 * Terminal maze entry point.
 *
 * Takes no arguments. Settings come from `config` with environment overrides
 * (see `resolveConfig`). Exits 0 when the player wins, quits or the input
 * ends, and 1 when the game cannot start.
 */
import { config, MazeEnv, resolveConfig } from './config';
import { MazeError } from './errors';
import { GameLoop } from './game/gameLoop';
import { MazeGame } from './game/mazeGame';
import { KeySource } from './game/terminalUtility';
import { loadMaze } from './maze/loadMaze';
import { forceError } from './utils/logger';

/** Streams and environment the CLI runs against. */
export interface ICliIo {
  env: MazeEnv;
  input: KeySource;
  write: (text: string) => void;
}

/**
 * Run one game session.
 *
 * @returns Process exit code.
 */
export async function main(
  io: ICliIo = {
    env: process.env,
    input: process.stdin,
    write: (text) => {
      process.stdout.write(text);
    },
  }
): Promise<number> {
  let loop: GameLoop;
  try {
    Object.assign(config, resolveConfig(io.env));
    const game = new MazeGame(loadMaze(config));
    loop = new GameLoop(game, {
      color: config.color,
      clearScreen: config.clearScreen,
      write: io.write,
    });
  } catch (error) {
    if (error instanceof MazeError) {
      forceError(`${error.name}: ${error.message}`);
      return 1;
    }
    throw error;
  }

  await loop.run(io.input);
  return 0;
}

if (require.main === module) {
  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      forceError(error instanceof Error ? error.stack ?? error.message : String(error));
      process.exitCode = 1;
    });
}
