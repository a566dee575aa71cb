import { GENERATED_LAYOUT, IMazeGameConfig } from '../config';
import { ConfigError } from '../errors';
import { MazeGenerator } from './mazeGenerator';
import { MazeGrid } from './mazeGrid';
import { layouts } from './mazes';

/**
 * Build the grid a configuration asks for: a fixed layout by name, or a
 * seeded generated maze when the layout is `generated`.
 *
 * @throws ConfigError for an unknown layout name.
 */
export function loadMaze(
  options: Pick<IMazeGameConfig, 'layout' | 'seed' | 'width' | 'height'>
): MazeGrid {
  if (options.layout === GENERATED_LAYOUT) {
    return new MazeGenerator(
      options.width,
      options.height,
      options.seed
    ).toGrid();
  }
  if (!Object.prototype.hasOwnProperty.call(layouts, options.layout)) {
    const known = [...Object.keys(layouts), GENERATED_LAYOUT].join(', ');
    throw new ConfigError(
      `Unknown layout '${options.layout}' (expected one of: ${known})`
    );
  }
  return MazeGrid.fromAscii(layouts[options.layout]);
}
