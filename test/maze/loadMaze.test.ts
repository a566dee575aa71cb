import { ConfigError } from '../../src/errors';
import { loadMaze } from '../../src/maze/loadMaze';

describe('loadMaze', () => {
  const sizes = { seed: 'maze', width: 9, height: 7 };

  it('loads a fixed layout by name', () => {
    const grid = loadMaze({ ...sizes, layout: 'classic' });
    expect([grid.width, grid.height]).toEqual([21, 11]);
  });

  it('generates a seeded maze for the generated layout', () => {
    const grid = loadMaze({ ...sizes, layout: 'generated' });
    expect([grid.width, grid.height]).toEqual([9, 7]);
  });

  it('generates the same maze for the same seed', () => {
    const first = loadMaze({ ...sizes, layout: 'generated' }).toAscii();
    const second = loadMaze({ ...sizes, layout: 'generated' }).toAscii();
    expect(second).toEqual(first);
  });

  it('rejects unknown layout names', () => {
    expect(() => loadMaze({ ...sizes, layout: 'nope' })).toThrow(ConfigError);
  });

  it('lists the known layouts in the error', () => {
    expect(() => loadMaze({ ...sizes, layout: 'nope' })).toThrow(
      "Unknown layout 'nope' (expected one of: classic, corridor, spiral, generated)"
    );
  });

  it('does not resolve inherited object keys as layouts', () => {
    expect(() => loadMaze({ ...sizes, layout: 'toString' })).toThrow(
      ConfigError
    );
  });
});
