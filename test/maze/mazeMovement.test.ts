import { Cell, Direction } from '../../src/maze/interfaces';
import { MazeGrid } from '../../src/maze/mazeGrid';
import { MazeMovement } from '../../src/maze/mazeMovement';
import { classic } from '../../src/maze/mazes';
import {
  corridorGrid,
  wallRightOfStartGrid,
} from '../utils/test-helpers';

describe('MazeMovement', () => {
  describe('candidate', () => {
    it('offsets up by one row', () => {
      expect(MazeMovement.candidate({ row: 2, col: 2 }, 'up')).toEqual({
        row: 1,
        col: 2,
      });
    });
    it('offsets left by one column without validating', () => {
      expect(MazeMovement.candidate({ row: 0, col: 0 }, 'left')).toEqual({
        row: 0,
        col: -1,
      });
    });
  });

  describe('attemptMove', () => {
    it('reaches the goal with four moves right along the corridor', () => {
      // Arrange
      const grid = corridorGrid();
      let position = grid.start;
      // Act
      for (let i = 0; i < 4; i++) {
        position = MazeMovement.attemptMove(grid, position, 'right');
      }
      // Assert
      expect(position).toEqual(grid.goal);
    });

    it('stays put when moving up off the top edge', () => {
      const grid = corridorGrid();
      expect(MazeMovement.attemptMove(grid, grid.start, 'up')).toEqual({
        row: 0,
        col: 0,
      });
    });

    it('stays put when moving left off the edge', () => {
      const grid = corridorGrid();
      expect(MazeMovement.attemptMove(grid, grid.start, 'left')).toEqual({
        row: 0,
        col: 0,
      });
    });

    it('stays put when a wall is in the way', () => {
      const grid = wallRightOfStartGrid();
      expect(MazeMovement.attemptMove(grid, grid.start, 'right')).toEqual({
        row: 0,
        col: 0,
      });
    });

    it('returns a copy rather than the input object when rejected', () => {
      const grid = wallRightOfStartGrid();
      const current = { row: 0, col: 0 };
      expect(MazeMovement.attemptMove(grid, current, 'right')).not.toBe(
        current
      );
    });

    it('moves onto open floor', () => {
      const grid = wallRightOfStartGrid();
      expect(MazeMovement.attemptMove(grid, grid.start, 'down')).toEqual({
        row: 1,
        col: 0,
      });
    });

    it('never leaves the grid or lands on a wall from any walkable cell', () => {
      // Arrange
      const grid = MazeGrid.fromAscii(classic);
      const directions: Direction[] = ['up', 'down', 'left', 'right'];
      const violations: string[] = [];
      // Act
      for (let row = 0; row < grid.height; row++) {
        for (let col = 0; col < grid.width; col++) {
          if (!grid.isWalkable(row, col)) continue;
          for (const direction of directions) {
            const next = MazeMovement.attemptMove(grid, { row, col }, direction);
            if (
              !grid.inBounds(next.row, next.col) ||
              grid.cellAt(next.row, next.col) === Cell.Wall
            ) {
              violations.push(`${row},${col} ${direction}`);
            }
          }
        }
      }
      // Assert
      expect(violations).toEqual([]);
    });

    it('never queries the grid out of bounds from an edge cell', () => {
      const grid = corridorGrid();
      const cellAt = jest.spyOn(grid, 'cellAt');
      MazeMovement.attemptMove(grid, { row: 4, col: 4 }, 'down');
      expect(cellAt).not.toHaveBeenCalled();
    });
  });
});
