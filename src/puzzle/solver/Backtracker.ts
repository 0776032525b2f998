// Depth-first arrangement search with conflict-directed backjumping

import type {
  ArrangeResult,
  Logger,
  SolveTrace,
  SolverOptions,
  Tile,
  TileId
} from '../types';
import { ArrangementError } from '../errors';
import { AllowedOrientedTiles, ORIENTATIONS } from '../precompute';
import { Arrangement } from './Arrangement';

export interface SearchContext {
  backjumping: boolean;
  debug: boolean;
  logger: Logger;
  trace: SolveTrace;
}

export interface SolverResult {
  // null once every anchor has been exhausted
  arrangement: Arrangement | null;
  trace?: SolveTrace;
}

const ORIGIN = { x: 0, y: 0 };

export function createTrace(): SolveTrace {
  return {
    anchorsTried: 0,
    nodesExplored: 0,
    placements: 0,
    removals: 0,
    backjumps: 0,
    maxDepth: 0
  };
}

export function createSearchContext(options: SolverOptions = {}): SearchContext {
  return {
    backjumping: options.backjumping ?? true,
    debug: options.debug ?? false,
    logger: options.logger ?? console,
    trace: createTrace()
  };
}

/**
 * Fill the frontier until the grid is covered. A failure names the placed
 * tiles that caused it. With backjumping, a frame whose tile is not among
 * them passes the failure straight up; the first frame whose tile is named
 * tries its next candidate.
 */
export function tryArrange(
  arrangement: Arrangement,
  allowed: AllowedOrientedTiles,
  ctx: SearchContext
): ArrangeResult {
  ctx.trace.nodesExplored++;

  const pos = arrangement.nextPosition();
  if (!pos) {
    return { ok: true };
  }

  const possible = arrangement.possibleOrientations(pos, allowed);
  if (!possible.ok) {
    if (ctx.debug) {
      ctx.logger.debug(`nothing fits at (${pos.x}, ${pos.y}), blaming ${[...possible.blamed].join(', ')}`);
    }
    return { ok: false, blamed: possible.blamed };
  }

  // Everything this position's failure depends on
  const conflicts = new Set<TileId>(possible.consulted);

  for (const candidate of possible.candidates) {
    // Already used elsewhere in this arrangement
    if (!arrangement.isAvailable(candidate.tileId)) {
      conflicts.add(candidate.tileId);
      continue;
    }

    arrangement.place(pos, candidate.orientation, candidate.tileId);
    ctx.trace.placements++;
    ctx.trace.maxDepth = Math.max(ctx.trace.maxDepth, arrangement.placedCount);
    if (ctx.debug) {
      ctx.logger.debug(`place ${candidate.tileId} ${candidate.orientation} at (${pos.x}, ${pos.y})`);
    }

    const result = tryArrange(arrangement, allowed, ctx);
    if (result.ok) {
      return result;
    }

    arrangement.remove(pos);
    ctx.trace.removals++;
    if (ctx.debug) {
      ctx.logger.debug(`remove ${candidate.tileId} from (${pos.x}, ${pos.y})`);
    }

    if (ctx.backjumping && !result.blamed.has(candidate.tileId)) {
      ctx.trace.backjumps++;
      return result;
    }
    for (const id of result.blamed) {
      if (id !== candidate.tileId) conflicts.add(id);
    }
  }

  return { ok: false, blamed: conflicts };
}

function gridSize(tiles: readonly Tile[], options: SolverOptions): { width: number; height: number } {
  const side = Math.round(Math.sqrt(tiles.length));
  const width = options.width ?? (options.height ? tiles.length / options.height : side);
  const height = options.height ?? (options.width ? tiles.length / options.width : side);

  if (!Number.isInteger(width) || !Number.isInteger(height) || width * height !== tiles.length) {
    throw new ArrangementError(`${tiles.length} tiles cannot fill a ${width}x${height} grid`);
  }
  return { width, height };
}

/**
 * Try every tile in every orientation as the anchor at the origin, keeping
 * the first arrangement that covers the grid.
 */
export function arrangeTiles(tiles: readonly Tile[], options: SolverOptions = {}): SolverResult {
  const { width, height } = gridSize(tiles, options);
  const allowed = AllowedOrientedTiles.build(tiles);
  const ctx = createSearchContext(options);

  for (const tile of tiles) {
    for (const orientation of ORIENTATIONS) {
      ctx.trace.anchorsTried++;
      if (ctx.debug) {
        ctx.logger.log(`trying ${tile.id} ${orientation} in start position`);
      }

      const arrangement = new Arrangement(width, height, tiles);
      arrangement.place(ORIGIN, orientation, tile.id);
      ctx.trace.placements++;
      ctx.trace.maxDepth = Math.max(ctx.trace.maxDepth, arrangement.placedCount);

      if (tryArrange(arrangement, allowed, ctx).ok) {
        if (ctx.debug) {
          ctx.logger.log(`arranged:\n${arrangement.toString()}`);
        }
        return {
          arrangement,
          trace: options.trace ? ctx.trace : undefined
        };
      }
    }
  }

  return {
    arrangement: null,
    trace: options.trace ? ctx.trace : undefined
  };
}

// Check if tiles can be arranged at all
export function isArrangeable(tiles: readonly Tile[], options: SolverOptions = {}): boolean {
  return arrangeTiles(tiles, options).arrangement !== null;
}
