/**
 * Maze Layouts - the fixed mazes shipped with the game
 *
 * Maze symbols:
 * - '#' = Wall
 * - '.' = Open floor
 * - 'S' = Start position
 * - 'E' = Exit/Goal position
 *
 * Each layout contains exactly one start and one exit.
 */

/** Default layout: a small hand-built labyrinth with a few dead ends. */
export const classic = [
  '#####################',
  '#S....#.......#.....#',
  '#.###.#.#####.#.###.#',
  '#...#...#...#...#...#',
  '###.#####.#.#####.###',
  '#...#.....#.....#...#',
  '#.###.#########.###.#',
  '#.#...#.......#...#.#',
  '#.#.###.#####.###.#.#',
  '#...#.....#.......#E#',
  '#####################',
] as const;

/** Straight run along the top edge; four moves right reach the exit. */
export const corridor = [
  'S...E',
  '.###.',
  '.....',
  '.###.',
  '.....',
] as const;

/** Inward spiral: the exit sits in the centre. */
export const spiral = [
  '###########',
  '#.........#',
  '#.#######.#',
  '#.#.....#.#',
  '#.#.###.#.#',
  '#.#.#E..#.#',
  '#.#.#####.#',
  '#.#.......#',
  '#S#########',
] as const;

/** Every fixed layout by name. */
export const layouts: Readonly<Record<string, ReadonlyArray<string>>> = {
  classic,
  corridor,
  spiral,
};
