import { describe, it, expect } from 'vitest';
import { parseTiles } from '../../tiles';
import { EDGE_TILES, MOSAIC_3X3, readFixture } from '../fixtures';
import { orientedTileKey } from '../types';
import { AllowedOrientedTiles, RELATIONSHIPS, fitsNextTo } from './CompatibilityBuilder';
import { ORIENTATIONS } from './Orientations';

describe('AllowedOrientedTiles', () => {
  it('never disagrees with direct edge comparison', () => {
    const tiles = parseTiles(readFixture(MOSAIC_3X3.file));
    const allowed = AllowedOrientedTiles.build(tiles);
    const mismatches: string[] = [];

    for (const a of tiles) {
      for (const b of tiles) {
        if (a.id === b.id) continue;
        for (const oA of ORIENTATIONS) {
          for (const oB of ORIENTATIONS) {
            for (const relationship of RELATIONSHIPS) {
              const indexed = allowed.get(a.id, oA, relationship).has(orientedTileKey(b.id, oB));
              if (indexed !== fitsNextTo(a, oA, relationship, b, oB)) {
                mismatches.push(`${a.id} ${oA} ${relationship} ${b.id} ${oB}`);
              }
            }
          }
        }
      }
    }

    expect(mismatches).toEqual([]);
  });

  it('records a right neighbour exactly when its left edge equals the right edge', () => {
    const allowed = AllowedOrientedTiles.build(EDGE_TILES);

    expect([...allowed.get(1, 'r0', 'rightOf').keys()]).toEqual(['2:r0', '3:r0']);
    expect([...allowed.get(1, 'r0', 'below').keys()]).toEqual(['4:r0', '5:r0']);
    expect([...allowed.get(3, 'r0', 'below').keys()]).toEqual(['6:r0']);
    expect([...allowed.get(6, 'r0', 'above').keys()]).toEqual(['3:r0']);
    expect([...allowed.get(6, 'r0', 'leftOf').keys()]).toEqual(['4:r0', '5:r0']);
  });

  it('keeps the oriented tile alongside its key', () => {
    const allowed = AllowedOrientedTiles.build(EDGE_TILES);
    expect(allowed.get(1, 'r90', 'above').get('2:r90')).toEqual({ tileId: 2, orientation: 'r90' });
  });

  it('never pairs a tile with itself', () => {
    const allowed = AllowedOrientedTiles.build(EDGE_TILES);
    for (const tile of EDGE_TILES) {
      for (const orientation of ORIENTATIONS) {
        for (const relationship of RELATIONSHIPS) {
          for (const candidate of allowed.get(tile.id, orientation, relationship).values()) {
            expect(candidate.tileId).not.toBe(tile.id);
          }
        }
      }
    }
  });

  it('answers unknown lookups with an empty set', () => {
    const allowed = AllowedOrientedTiles.build(EDGE_TILES);
    expect(allowed.get(999, 'r0', 'above').size).toBe(0);
    expect(allowed.get(2, 'r0', 'below').size).toBe(0);
  });

  it('holds one entry per tile, orientation and relationship', () => {
    expect(AllowedOrientedTiles.build(EDGE_TILES).size).toBe(6 * 8 * 4);
  });
});
