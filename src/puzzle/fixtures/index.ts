// Shared test fixtures
import { readFileSync } from 'node:fs';
import type { Tile, TileId } from '../types';

export function readFixture(name: string): string {
  return readFileSync(new URL(`./${name}`, import.meta.url), 'utf8');
}

// 3x3 tiles cut from a 24x24 picture holding two sea monsters
export const MOSAIC_3X3 = {
  file: 'mosaic-3x3.txt',
  image: 'mosaic-3x3-image.txt',
  // True layout, row-major
  layout: [
    [2519, 3117, 2125],
    [7102, 7294, 4571],
    [6272, 2367, 5088]
  ],
  cornerProduct: 170820604416000n,
  monsters: 2,
  roughness: 192
};

function tile(id: TileId, top: number, left: number, right: number, bottom: number, size = 10): Tile {
  return { id, size, top, left, right, bottom, content: [['#']] };
}

/**
 * Six tiles for a 2x2 grid anchored with tile 1 in r0. Tiles 2 and 3 both
 * fit right of 1, tiles 4 and 5 both fit below it, and only 3 has a bottom
 * edge that tile 6 fits under.
 */
export const EDGE_TILES: Tile[] = [
  tile(1, 106, 321, 523, 734),
  tile(2, 231, 523, 761, 960),
  tile(3, 504, 523, 779, 953),
  tile(4, 734, 208, 59, 26),
  tile(5, 734, 443, 59, 572),
  tile(6, 953, 59, 372, 797)
];

/**
 * Six 3-bit tiles for a 3x2 grid anchored with tile 1 in r0. The first
 * choice at (1, 0), tile 2 in r90, leaves nothing for (2, 0), which is only
 * reached after (0, 1) is filled; the search jumps from there straight back
 * to (1, 0).
 */
export const BACKJUMP_TILES: Tile[] = [
  tile(1, 6, 1, 3, 4, 3),
  tile(2, 6, 7, 7, 5, 3),
  tile(3, 4, 1, 3, 6, 3),
  tile(4, 6, 7, 3, 1, 3),
  tile(5, 4, 7, 7, 3, 3),
  tile(6, 7, 7, 7, 0, 3)
];

// 3x3 of 3-bit tiles with many partial fits; solvable as 1 8 2 / 3 6 4 / 5 9 7
export const AMBIGUOUS_TILES: Tile[] = [
  tile(1, 0, 0, 7, 5, 3),
  tile(2, 4, 3, 3, 1, 3),
  tile(3, 4, 5, 2, 1, 3),
  tile(4, 6, 4, 1, 2, 3),
  tile(5, 2, 4, 2, 7, 3),
  tile(6, 1, 7, 1, 1, 3),
  tile(7, 1, 2, 4, 6, 3),
  tile(8, 0, 7, 4, 4, 3),
  tile(9, 5, 7, 4, 7, 3)
];
