// Answers read off a finished arrangement
import type { MonsterSearchResult, SolveTrace, SolverOptions, Tile } from '../types';
import { arrangeTiles, type Arrangement } from '../solver';
import { SEA_MONSTER, searchMonsters, type OrientedGrid } from '../image';

export interface TileAnalysis extends MonsterSearchResult {
  arrangement: Arrangement;
  cornerProduct: bigint;
  trace?: SolveTrace;
}

// Product of the four corner tile ids
export function cornerProduct(arrangement: Arrangement): bigint {
  const last = { x: arrangement.width - 1, y: arrangement.height - 1 };
  const corners = [
    { x: 0, y: 0 },
    { x: last.x, y: 0 },
    { x: 0, y: last.y },
    { x: last.x, y: last.y }
  ];

  let product = 1n;
  for (const corner of corners) {
    const id = arrangement.tileIdAt(corner);
    if (id !== undefined) {
      product *= BigInt(id);
    }
  }
  return product;
}

// Arrange the tiles, then search the assembled image for the pattern
export function analyzeTiles(
  tiles: readonly Tile[],
  options: SolverOptions = {},
  pattern: OrientedGrid = SEA_MONSTER
): TileAnalysis | null {
  const { arrangement, trace } = arrangeTiles(tiles, options);
  if (!arrangement) return null;

  const image = arrangement.image();
  return {
    arrangement,
    cornerProduct: cornerProduct(arrangement),
    ...searchMonsters(image, pattern),
    trace
  };
}
