// A tile record as written in the input, before edges are decoded
export interface TileRecord {
  id: number;
  rows: string[];
}
