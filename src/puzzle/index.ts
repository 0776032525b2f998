// Puzzle System - Types, Precompute, Solver, Image and Analysis

// Re-export types
export type {
  TileId,
  EdgePattern,
  Orientation,
  Relationship,
  Side,
  Pos,
  Size,
  Tile,
  OrientedTile,
  OrientedTileSet,
  Placement,
  ArrangeResult,
  Logger,
  SolverOptions,
  SolveTrace,
  MonsterSearchResult
} from './types';

export { ArrangementError } from './errors';

// Precompute API
export {
  reverseEdge,
  ORIENTATIONS,
  edgeInOrientation,
  transformCoordinate,
  inverseOrientation,
  AllowedOrientedTiles
} from './precompute';

// Solver API
export {
  Arrangement,
  tryArrange,
  arrangeTiles,
  isArrangeable
} from './solver';

// Image API
export {
  OrientedGrid,
  Image,
  SEA_MONSTER,
  searchMonsters
} from './image';

export { cornerProduct, analyzeTiles, type TileAnalysis } from './analysis';
export { generatePuzzle, type GenerationConfig, type GeneratedPuzzle } from './generator';
