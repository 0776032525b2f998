// Build the compatibility index for oriented tiles
// Determines which oriented tiles can sit next to a placed oriented tile in each direction

import type {
  Orientation,
  OrientedTile,
  OrientedTileKey,
  OrientedTileSet,
  Relationship,
  Side,
  Tile,
  TileId
} from '../types';
import { orientedTileKey } from '../types';
import { ORIENTATIONS, edgeInOrientation } from './Orientations';

export const RELATIONSHIPS: readonly Relationship[] = ['above', 'below', 'leftOf', 'rightOf'];

// For each relationship: the placed tile's side, and the candidate's side that must match it
const TOUCHING_SIDES: Record<Relationship, { placed: Side; candidate: Side }> = {
  above: { placed: 'top', candidate: 'bottom' },
  below: { placed: 'bottom', candidate: 'top' },
  leftOf: { placed: 'left', candidate: 'right' },
  rightOf: { placed: 'right', candidate: 'left' }
};

// Direct edge comparison, the ground truth the index is built from
export function fitsNextTo(
  placed: Tile,
  placedOrientation: Orientation,
  relationship: Relationship,
  candidate: Tile,
  candidateOrientation: Orientation
): boolean {
  const sides = TOUCHING_SIDES[relationship];
  return edgeInOrientation(candidate, candidateOrientation, sides.candidate)
    === edgeInOrientation(placed, placedOrientation, sides.placed);
}

function entryKey(tileId: TileId, orientation: Orientation, relationship: Relationship): string {
  return `${tileId}:${orientation}:${relationship}`;
}

const EMPTY: OrientedTileSet = new Map();

export class AllowedOrientedTiles {
  private readonly neighbours: ReadonlyMap<string, OrientedTileSet>;

  private constructor(neighbours: ReadonlyMap<string, OrientedTileSet>) {
    this.neighbours = neighbours;
  }

  // Compare every ordered pair of distinct tiles in every pair of orientations
  static build(tiles: readonly Tile[]): AllowedOrientedTiles {
    const neighbours = new Map<string, Map<OrientedTileKey, OrientedTile>>();

    for (const tile of tiles) {
      for (const orientation of ORIENTATIONS) {
        const entries = RELATIONSHIPS.map(relationship => {
          const set = new Map<OrientedTileKey, OrientedTile>();
          neighbours.set(entryKey(tile.id, orientation, relationship), set);
          return { relationship, set };
        });

        for (const candidate of tiles) {
          if (candidate.id === tile.id) continue;

          for (const candidateOrientation of ORIENTATIONS) {
            for (const { relationship, set } of entries) {
              if (fitsNextTo(tile, orientation, relationship, candidate, candidateOrientation)) {
                set.set(orientedTileKey(candidate.id, candidateOrientation), {
                  tileId: candidate.id,
                  orientation: candidateOrientation
                });
              }
            }
          }
        }
      }
    }

    return new AllowedOrientedTiles(neighbours);
  }

  // Oriented tiles allowed at `relationship` of the given placed tile; empty when unknown
  get(tileId: TileId, orientation: Orientation, relationship: Relationship): OrientedTileSet {
    return this.neighbours.get(entryKey(tileId, orientation, relationship)) ?? EMPTY;
  }

  get size(): number {
    return this.neighbours.size;
  }
}
