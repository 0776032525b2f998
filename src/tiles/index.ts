export type { TileRecord } from './types';
export {
  parseTiles,
  parseTileRecords,
  splitRecords,
  tileFromRecord,
  tileRecordSchema,
  formatTile,
  formatTiles,
  TileParseError
} from './TileParser';
