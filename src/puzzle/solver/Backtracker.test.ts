import { describe, it, expect, vi } from 'vitest';
import type { Tile, TileId } from '../types';
import { ArrangementError } from '../errors';
import { AllowedOrientedTiles } from '../precompute';
import { parseTiles } from '../../tiles';
import { AMBIGUOUS_TILES, BACKJUMP_TILES, EDGE_TILES, MOSAIC_3X3, readFixture } from '../fixtures';
import { createRandom, randomInt, type RandomSource } from '../utils/random';
import { Arrangement } from './Arrangement';
import { arrangeTiles, createSearchContext, isArrangeable, tryArrange } from './Backtracker';

function layoutOf(arrangement: Arrangement): TileId[][] {
  const rows: TileId[][] = [];
  for (let y = 0; y < arrangement.height; y++) {
    const row: TileId[] = [];
    for (let x = 0; x < arrangement.width; x++) {
      const id = arrangement.tileIdAt({ x, y });
      if (id !== undefined) row.push(id);
    }
    rows.push(row);
  }
  return rows;
}

// Every edge distinct and none the reverse of another, so nothing fits anywhere
function unrelatedTiles(count: number): Tile[] {
  const tiles: Tile[] = [];
  for (let i = 0; i < count; i++) {
    const base = i * 4 + 1;
    tiles.push({ id: i + 1, size: 10, top: base, left: base + 1, right: base + 2, bottom: base + 3, content: [['.']] });
  }
  return tiles;
}

function randomTiles(random: RandomSource, count: number): Tile[] {
  return Array.from({ length: count }, (_, i) => ({
    id: i + 1,
    size: 3,
    top: randomInt(random, 0, 7),
    left: randomInt(random, 0, 7),
    right: randomInt(random, 0, 7),
    bottom: randomInt(random, 0, 7),
    content: [['.']]
  }));
}

describe('tryArrange', () => {
  function anchored(tiles: Tile[], width: number, height: number): Arrangement {
    const arrangement = new Arrangement(width, height, tiles);
    arrangement.place({ x: 0, y: 0 }, 'r0', 1);
    return arrangement;
  }

  it.each([true, false])('settles a conflict at the last cell by trying the next tile (backjumping %s)', backjumping => {
    const arrangement = anchored(EDGE_TILES, 2, 2);
    const ctx = createSearchContext({ backjumping });

    expect(tryArrange(arrangement, AllowedOrientedTiles.build(EDGE_TILES), ctx)).toEqual({ ok: true });
    expect(layoutOf(arrangement)).toEqual([[1, 3], [4, 6]]);
    expect(arrangement.availableTileIds().sort((a, b) => a - b)).toEqual([2, 5]);
    expect(ctx.trace).toMatchObject({
      nodesExplored: 7,
      placements: 6,
      removals: 3,
      backjumps: 0,
      maxDepth: 4
    });
  });

  it('jumps back past frames the conflict does not involve', () => {
    const arrangement = anchored(BACKJUMP_TILES, 3, 2);
    const logger = { log: vi.fn(), debug: vi.fn() };
    const ctx = createSearchContext({ debug: true, logger });

    expect(tryArrange(arrangement, AllowedOrientedTiles.build(BACKJUMP_TILES), ctx)).toEqual({ ok: true });
    expect(layoutOf(arrangement)).toEqual([[1, 3, 5], [4, 2, 6]]);
    expect(ctx.trace).toMatchObject({
      nodesExplored: 8,
      placements: 7,
      removals: 2,
      backjumps: 1,
      maxDepth: 6
    });
    expect(logger.debug.mock.calls.slice(0, 5)).toEqual([
      ['place 2 r90 at (1, 0)'],
      ['place 3 r0 at (0, 1)'],
      ['nothing fits at (2, 0), blaming 2'],
      ['remove 3 from (0, 1)'],
      ['remove 2 from (1, 0)']
    ]);
    expect(logger.debug).toHaveBeenNthCalledWith(6, 'place 3 r0-flip-h at (1, 0)');
  });

  it('tries every alternative in between when backjumping is off', () => {
    const arrangement = anchored(BACKJUMP_TILES, 3, 2);
    const ctx = createSearchContext({ backjumping: false });

    expect(tryArrange(arrangement, AllowedOrientedTiles.build(BACKJUMP_TILES), ctx)).toEqual({ ok: true });
    expect(layoutOf(arrangement)).toEqual([[1, 3, 5], [4, 2, 6]]);
    expect(ctx.trace).toMatchObject({
      nodesExplored: 11,
      placements: 10,
      removals: 5,
      backjumps: 0
    });
  });

  it('blames every neighbour that narrowed a position to nothing', () => {
    const arrangement = anchored(EDGE_TILES, 2, 2);
    arrangement.place({ x: 1, y: 0 }, 'r0', 2);
    arrangement.place({ x: 0, y: 1 }, 'r0', 4);

    const result = tryArrange(arrangement, AllowedOrientedTiles.build(EDGE_TILES), createSearchContext());
    expect(result).toEqual({ ok: false, blamed: new Set([2, 4]) });
  });

  it('blames what the exhausted position depended on', () => {
    const arrangement = anchored(EDGE_TILES, 3, 1);
    const ctx = createSearchContext();

    expect(tryArrange(arrangement, AllowedOrientedTiles.build(EDGE_TILES), ctx)).toEqual({ ok: false, blamed: new Set([1]) });
    expect(ctx.trace.nodesExplored).toBe(3);
    expect(arrangement.placedCount).toBe(1);
    expect(arrangement.frontier()).toEqual([{ x: 1, y: 0 }]);
  });

  it('succeeds at once on a full grid', () => {
    const arrangement = new Arrangement(1, 1, EDGE_TILES);
    arrangement.place({ x: 0, y: 0 }, 'r90', 4);
    expect(tryArrange(arrangement, AllowedOrientedTiles.build(EDGE_TILES), createSearchContext())).toEqual({ ok: true });
  });
});

describe('arrangeTiles', () => {
  const tiles = parseTiles(readFixture(MOSAIC_3X3.file));

  it.each([true, false])('arranges the 3x3 mosaic (backjumping %s)', backjumping => {
    const { arrangement, trace } = arrangeTiles(tiles, { backjumping, trace: true });

    expect(arrangement).not.toBeNull();
    if (!arrangement) return;
    expect(arrangement.isComplete()).toBe(true);
    expect(arrangement.availableTileIds()).toEqual([]);
    // The search settles on the transpose of the cut
    expect(layoutOf(arrangement)).toEqual([
      [2519, 7102, 6272],
      [3117, 7294, 2367],
      [2125, 4571, 5088]
    ]);
    expect(arrangement.placementAt({ x: 0, y: 0 })?.orientation).toBe('r90');
    expect(trace).toMatchObject({ anchorsTried: 10, nodesExplored: 32, maxDepth: 9 });
  });

  it('finds the same arrangement with and without backjumping on ambiguous edges', () => {
    const jumping = arrangeTiles(AMBIGUOUS_TILES, { trace: true });
    const exhaustive = arrangeTiles(AMBIGUOUS_TILES, { backjumping: false, trace: true });

    expect(jumping.arrangement).not.toBeNull();
    expect(exhaustive.arrangement).not.toBeNull();
    if (!jumping.arrangement || !exhaustive.arrangement) return;
    expect(layoutOf(jumping.arrangement)).toEqual([[1, 8, 2], [3, 6, 4], [5, 9, 7]]);
    expect(layoutOf(exhaustive.arrangement)).toEqual([[1, 8, 2], [3, 6, 4], [5, 9, 7]]);
    expect(jumping.trace).toMatchObject({ anchorsTried: 1, nodesExplored: 426, backjumps: 102 });
    expect(exhaustive.trace).toMatchObject({ anchorsTried: 1, nodesExplored: 715, backjumps: 0 });
  });

  it('never loses a solution by jumping back', () => {
    const random = createRandom(2024);
    for (let round = 0; round < 60; round++) {
      const tiles = randomTiles(random, 9);
      const jumping = arrangeTiles(tiles).arrangement;
      const exhaustive = arrangeTiles(tiles, { backjumping: false }).arrangement;

      expect(jumping === null).toBe(exhaustive === null);
      if (jumping && exhaustive) {
        expect(layoutOf(jumping)).toEqual(layoutOf(exhaustive));
      }
    }
  }, 30_000);

  it('omits the trace unless asked', () => {
    expect(arrangeTiles(tiles).trace).toBeUndefined();
  });

  it('reports null after trying every anchor', () => {
    const { arrangement, trace } = arrangeTiles(unrelatedTiles(4), { trace: true });

    expect(arrangement).toBeNull();
    expect(trace?.anchorsTried).toBe(32);
    expect(trace?.nodesExplored).toBe(32);
    expect(isArrangeable(unrelatedTiles(4))).toBe(false);
  });

  it('rejects tile counts that do not fill the grid', () => {
    expect(() => arrangeTiles(unrelatedTiles(3))).toThrow(ArrangementError);
    expect(() => arrangeTiles(unrelatedTiles(6), { width: 4 })).toThrow('6 tiles cannot fill a 4x1.5 grid');
  });

  it('logs anchors and the result in debug mode', () => {
    const logger = { log: vi.fn(), debug: vi.fn() };
    arrangeTiles(tiles, { debug: true, logger });

    expect(logger.log).toHaveBeenNthCalledWith(1, 'trying 4571 r0 in start position');
    expect(logger.log).toHaveBeenCalledTimes(11);
    expect(logger.log).toHaveBeenLastCalledWith('arranged:\n2519 7102 6272\n3117 7294 2367\n2125 4571 5088');
    expect(logger.debug).toHaveBeenCalledWith('place 7102 r90 at (1, 0)');
  });

  it('stays quiet otherwise', () => {
    const logger = { log: vi.fn(), debug: vi.fn() };
    arrangeTiles(tiles, { logger });

    expect(logger.log).not.toHaveBeenCalled();
    expect(logger.debug).not.toHaveBeenCalled();
  });
});
