import { MazeGrid } from '../../src/maze/mazeGrid';
import { MazeUtils } from '../../src/maze/mazeUtils';
import { classic } from '../../src/maze/mazes';
import { corridorGrid, unreachableGrid } from '../utils/test-helpers';

describe('MazeUtils', () => {
  describe('samePosition', () => {
    it('compares by value', () => {
      expect(
        MazeUtils.samePosition({ row: 1, col: 4 }, { row: 1, col: 4 })
      ).toBe(true);
    });
  });

  describe('bfsDistance', () => {
    it('counts the corridor moves', () => {
      const grid = corridorGrid();
      expect(MazeUtils.bfsDistance(grid, grid.start, grid.goal)).toBe(4);
    });
    it('finds the shortest route through the classic layout', () => {
      const grid = MazeGrid.fromAscii(classic);
      expect(MazeUtils.bfsDistance(grid, grid.start, grid.goal)).toBe(38);
    });
    it('is Infinity when a wall seals the goal off', () => {
      const grid = unreachableGrid();
      expect(MazeUtils.bfsDistance(grid, grid.start, grid.goal)).toBe(
        Infinity
      );
    });
    it('is Infinity when the target is a wall', () => {
      const grid = corridorGrid();
      expect(MazeUtils.bfsDistance(grid, grid.start, { row: 1, col: 1 })).toBe(
        Infinity
      );
    });
    it('is zero from a cell to itself', () => {
      const grid = corridorGrid();
      expect(MazeUtils.bfsDistance(grid, grid.goal, grid.goal)).toBe(0);
    });
  });

  describe('shortestPath', () => {
    it('lists every cell from start to goal inclusive', () => {
      const grid = corridorGrid();
      expect(MazeUtils.shortestPath(grid, grid.start, grid.goal)).toEqual([
        { row: 0, col: 0 },
        { row: 0, col: 1 },
        { row: 0, col: 2 },
        { row: 0, col: 3 },
        { row: 0, col: 4 },
      ]);
    });
    it('returns undefined when unreachable', () => {
      const grid = unreachableGrid();
      expect(MazeUtils.shortestPath(grid, grid.start, grid.goal)).toBe(
        undefined
      );
    });
    it('has one more cell than the BFS distance on the classic layout', () => {
      const grid = MazeGrid.fromAscii(classic);
      expect(MazeUtils.shortestPath(grid, grid.start, grid.goal)?.length).toBe(
        39
      );
    });
  });

  describe('buildDistanceMap', () => {
    const grid = corridorGrid();
    const distanceMap = MazeUtils.buildDistanceMap(grid, grid.goal);

    it('holds the start-to-goal distance at the start', () => {
      expect(distanceMap[0][0]).toBe(4);
    });
    it('holds Infinity on walls', () => {
      expect(distanceMap[1][1]).toBe(Infinity);
    });
    it('measures far cells along the corridors', () => {
      expect(distanceMap[4][0]).toBe(8);
    });
  });

  describe('calculateProgress', () => {
    const grid = corridorGrid();
    const distanceMap = MazeUtils.buildDistanceMap(grid, grid.goal);

    it('is 0 at the start', () => {
      expect(
        MazeUtils.calculateProgress(distanceMap, grid.start, grid.start)
      ).toBe(0);
    });
    it('is 50 halfway along the corridor', () => {
      expect(
        MazeUtils.calculateProgress(
          distanceMap,
          { row: 0, col: 2 },
          grid.start
        )
      ).toBe(50);
    });
    it('is 100 on the goal', () => {
      expect(
        MazeUtils.calculateProgress(distanceMap, grid.goal, grid.start)
      ).toBe(100);
    });
    it('clamps to 0 when the player moved away from the goal', () => {
      expect(
        MazeUtils.calculateProgress(
          distanceMap,
          { row: 1, col: 0 },
          grid.start
        )
      ).toBe(0);
    });
    it('is 0 when the goal is unreachable', () => {
      const sealed = unreachableGrid();
      const sealedMap = MazeUtils.buildDistanceMap(sealed, sealed.goal);
      expect(
        MazeUtils.calculateProgress(sealedMap, sealed.start, sealed.start)
      ).toBe(0);
    });
    it('is 100 when the start already is the goal', () => {
      expect(
        MazeUtils.calculateProgress([[0]], { row: 0, col: 0 }, { row: 0, col: 0 })
      ).toBe(100);
    });
  });
});
