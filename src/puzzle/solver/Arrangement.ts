// Arrangement state
// Tracks placements on the grid, the pool of unplaced tiles, and the frontier of open positions

import type {
  CellKey,
  OrientedTile,
  OrientedTileKey,
  Orientation,
  Placement,
  Pos,
  Relationship,
  Tile,
  TileId
} from '../types';
import { addPos, cellKey } from '../types';
import { ArrangementError } from '../errors';
import type { AllowedOrientedTiles } from '../precompute';
import { Image, OrientedGrid } from '../image';

// Neighbour offsets, and where a position sits relative to the neighbour found there
const NEIGHBOURS: ReadonlyArray<{ offset: Pos; relation: Relationship }> = [
  { offset: { x: -1, y: 0 }, relation: 'rightOf' },
  { offset: { x: 0, y: -1 }, relation: 'below' },
  { offset: { x: 1, y: 0 }, relation: 'leftOf' },
  { offset: { x: 0, y: 1 }, relation: 'above' }
];

// `consulted` and `blamed` name the placed neighbours that narrowed the candidates
export type CandidateResult =
  | { ok: true; candidates: OrientedTile[]; consulted: TileId[] }
  | { ok: false; blamed: ReadonlySet<TileId> };

interface OpenCell {
  pos: Pos;
  // Position in the frontier; lower opened earlier
  order: number;
}

export class Arrangement {
  readonly width: number;
  readonly height: number;

  // Placed tiles by cell
  private readonly placements: Map<CellKey, Placement> = new Map();

  // Tiles not yet placed
  private readonly pool: Map<TileId, Tile> = new Map();

  // Empty positions next to at least one placed tile
  private readonly open: Map<CellKey, OpenCell> = new Map();
  private opened = 0;

  // Frontier order each placed cell held before it was filled
  private readonly placedOrder: Map<CellKey, number | undefined> = new Map();

  constructor(width: number, height: number, tiles: readonly Tile[]) {
    this.width = width;
    this.height = height;
    for (const tile of tiles) {
      this.pool.set(tile.id, tile);
    }
  }

  valid(pos: Pos): boolean {
    return pos.x >= 0 && pos.y >= 0 && pos.x < this.width && pos.y < this.height;
  }

  placementAt(pos: Pos): Placement | undefined {
    return this.placements.get(cellKey(pos));
  }

  tileIdAt(pos: Pos): TileId | undefined {
    return this.placementAt(pos)?.tile.id;
  }

  isAvailable(tileId: TileId): boolean {
    return this.pool.has(tileId);
  }

  availableTileIds(): TileId[] {
    return [...this.pool.keys()];
  }

  // Open positions in the order they were opened
  frontier(): Pos[] {
    return [...this.open.values()]
      .sort((a, b) => a.order - b.order)
      .map(cell => cell.pos);
  }

  // Earliest opened position
  nextPosition(): Pos | undefined {
    let next: OpenCell | undefined;
    for (const cell of this.open.values()) {
      if (!next || cell.order < next.order) next = cell;
    }
    return next?.pos;
  }

  get placedCount(): number {
    return this.placements.size;
  }

  isComplete(): boolean {
    return this.placements.size === this.width * this.height;
  }

  private neighbourPositions(pos: Pos): Pos[] {
    return NEIGHBOURS
      .map(n => addPos(pos, n.offset))
      .filter(n => this.valid(n));
  }

  private hasPlacedNeighbour(pos: Pos): boolean {
    return this.neighbourPositions(pos).some(n => this.placements.has(cellKey(n)));
  }

  place(pos: Pos, orientation: Orientation, tileId: TileId): void {
    const tile = this.pool.get(tileId);
    if (!tile) {
      throw new ArrangementError(`tile ${tileId} is not available`);
    }
    if (!this.valid(pos)) {
      throw new ArrangementError(`(${pos.x}, ${pos.y}) is outside the ${this.width}x${this.height} grid`);
    }
    const key = cellKey(pos);
    if (this.placements.has(key)) {
      throw new ArrangementError(`(${pos.x}, ${pos.y}) is already occupied`);
    }

    this.pool.delete(tileId);
    this.placements.set(key, { tile, orientation });
    this.placedOrder.set(key, this.open.get(key)?.order);
    this.open.delete(key);

    for (const n of this.neighbourPositions(pos)) {
      const nKey = cellKey(n);
      if (!this.placements.has(nKey) && !this.open.has(nKey)) {
        this.open.set(nKey, { pos: n, order: this.opened++ });
      }
    }
  }

  /**
   * Undo a place(). The cell rejoins the frontier at the order it had before
   * it was filled, and neighbours that no longer touch a placed tile close.
   */
  remove(pos: Pos): Tile {
    const key = cellKey(pos);
    const placement = this.placements.get(key);
    if (!placement) {
      throw new ArrangementError(`no tile to remove at (${pos.x}, ${pos.y})`);
    }

    const order = this.placedOrder.get(key);
    this.placements.delete(key);
    this.placedOrder.delete(key);
    this.pool.set(placement.tile.id, placement.tile);

    if (this.hasPlacedNeighbour(pos)) {
      this.open.set(key, { pos, order: order ?? this.opened++ });
    }
    for (const n of this.neighbourPositions(pos)) {
      const nKey = cellKey(n);
      if (this.open.has(nKey) && !this.hasPlacedNeighbour(n)) {
        this.open.delete(nKey);
      }
    }

    return placement.tile;
  }

  /**
   * Oriented tiles that fit every placed neighbour of `pos`. Fails on the
   * first neighbour that leaves nothing, blaming it together with every
   * neighbour consulted before it.
   */
  possibleOrientations(pos: Pos, allowed: AllowedOrientedTiles): CandidateResult {
    let possible: Map<OrientedTileKey, OrientedTile> | undefined;
    const consulted: TileId[] = [];

    for (const { offset, relation } of NEIGHBOURS) {
      const neighbour = this.placementAt(addPos(pos, offset));
      if (!neighbour) continue;

      consulted.push(neighbour.tile.id);
      const fits = allowed.get(neighbour.tile.id, neighbour.orientation, relation);
      if (possible === undefined) {
        possible = new Map(fits);
      } else {
        for (const key of possible.keys()) {
          if (!fits.has(key)) possible.delete(key);
        }
      }

      if (possible.size === 0) {
        return { ok: false, blamed: new Set(consulted) };
      }
    }

    if (possible === undefined) {
      throw new ArrangementError(`(${pos.x}, ${pos.y}) has no placed neighbour`);
    }

    return { ok: true, candidates: [...possible.values()], consulted };
  }

  // Interiors of every placed tile, each seen through its orientation, in row-major tile order
  image(): Image {
    if (!this.isComplete()) {
      throw new ArrangementError('cannot build an image until every position is placed');
    }

    const rows: string[][] = [];
    for (let ty = 0; ty < this.height; ty++) {
      const views: OrientedGrid[] = [];
      for (let tx = 0; tx < this.width; tx++) {
        const placement = this.placementAt({ x: tx, y: ty });
        if (!placement) {
          throw new ArrangementError(`(${tx}, ${ty}) is empty`);
        }
        views.push(new OrientedGrid(placement.tile.content, placement.orientation));
      }

      const interior = views.length > 0 ? views[0].height : 0;
      for (let y = 0; y < interior; y++) {
        const row: string[] = [];
        for (const view of views) {
          for (let x = 0; x < view.width; x++) {
            row.push(view.get({ x, y }));
          }
        }
        rows.push(row);
      }
    }

    return new Image(rows);
  }

  toString(): string {
    const lines: string[] = [];
    for (let y = 0; y < this.height; y++) {
      let line = '';
      for (let x = 0; x < this.width; x++) {
        const id = this.tileIdAt({ x, y });
        line += id === undefined ? '---- ' : `${String(id).padStart(4)} `;
      }
      lines.push(line.trimEnd());
    }
    return lines.join('\n');
  }
}
