// Puzzle system types

// ============= Basic Types =============

export type TileId = number;

// Bits of one tile side, most significant bit first
export type EdgePattern = number;

export type Orientation =
  | 'r0'
  | 'r90'
  | 'r180'
  | 'r270'
  | 'r0-flip-h'
  | 'r0-flip-v'
  | 'r90-flip-h'
  | 'r90-flip-v';

// Where a candidate sits relative to an already placed tile
export type Relationship = 'above' | 'below' | 'leftOf' | 'rightOf';

export type Side = 'top' | 'bottom' | 'left' | 'right';

export interface Pos {
  x: number;
  y: number;
}

export interface Size {
  width: number;
  height: number;
}

// Cell key format: "x,y"
export type CellKey = string;
// Oriented tile key format: "tileId:orientation"
export type OrientedTileKey = string;

// ============= Tile Types =============

export interface Tile {
  readonly id: TileId;
  // Side length in cells, border included
  readonly size: number;
  readonly top: EdgePattern;
  readonly left: EdgePattern;
  readonly right: EdgePattern;
  readonly bottom: EdgePattern;
  // Interior with the border trimmed, (size - 2) square
  readonly content: ReadonlyArray<ReadonlyArray<string>>;
}

export interface OrientedTile {
  tileId: TileId;
  orientation: Orientation;
}

// Set of oriented tiles keyed by orientedTileKey
export type OrientedTileSet = ReadonlyMap<OrientedTileKey, OrientedTile>;

export interface Placement {
  tile: Tile;
  orientation: Orientation;
}

// ============= Solver Types =============

// A failure names the placed tiles that together leave no way forward
export type ArrangeResult =
  | { ok: true }
  | { ok: false; blamed: ReadonlySet<TileId> };

export interface Logger {
  log(...args: unknown[]): void;
  debug(...args: unknown[]): void;
}

export interface SolverOptions {
  backjumping?: boolean;  // defaults to true
  trace?: boolean;
  debug?: boolean;
  logger?: Logger;
  // Grid dimensions, default to the square root of the tile count
  width?: number;
  height?: number;
}

export interface SolveTrace {
  anchorsTried: number;
  nodesExplored: number;
  placements: number;
  removals: number;
  backjumps: number;
  // Most tiles on the grid at once, anchor included
  maxDepth: number;
}

// ============= Monster Search Types =============

export interface MonsterSearchResult {
  // Orientation in which matches were found
  orientation: Orientation | undefined;
  monsters: number;
  // Filled cells left unmarked
  roughness: number;
}

// ============= Utility Types =============

export function cellKey(pos: Pos): CellKey {
  return `${pos.x},${pos.y}`;
}

export function orientedTileKey(tileId: TileId, orientation: Orientation): OrientedTileKey {
  return `${tileId}:${orientation}`;
}

export function addPos(a: Pos, b: Pos): Pos {
  return { x: a.x + b.x, y: a.y + b.y };
}
