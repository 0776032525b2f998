// Parse tile records: "Tile <id>:" followed by a square grid of '#' and '.'
import { z } from 'zod';
import type { Tile } from '../puzzle/types';
import { encodeEdge } from '../puzzle/precompute';
import type { TileRecord } from './types';

// Edges are held in a 32-bit integer
const MAX_TILE_SIZE = 31;

const HEADER = /^Tile\s+(\d+):\s*$/;

export const tileRecordSchema = z
  .object({
    id: z.number().int().positive().safe('tile id must be a safe integer'),
    rows: z
      .array(z.string().regex(/^[#.]+$/, 'rows may only contain # and .'))
      .min(3, 'a tile needs at least 3 rows')
      .max(MAX_TILE_SIZE, `a tile may have at most ${MAX_TILE_SIZE} rows`)
  })
  .refine(record => record.rows.every(row => row.length === record.rows.length), {
    message: 'tile grid must be square',
    path: ['rows']
  });

export class TileParseError extends Error {
  readonly record: number | undefined;

  constructor(message: string, record?: number) {
    super(record === undefined ? message : `tile record ${record}: ${message}`);
    this.name = 'TileParseError';
    this.record = record;
  }
}

function column(rows: readonly string[], index: number): string[] {
  return rows.map(row => row[index]);
}

// Decode edges and trim the border off the interior
export function tileFromRecord(record: TileRecord): Tile {
  const { id, rows } = record;
  const size = rows.length;

  return {
    id,
    size,
    top: encodeEdge(rows[0]),
    bottom: encodeEdge(rows[size - 1]),
    left: encodeEdge(column(rows, 0)),
    right: encodeEdge(column(rows, size - 1)),
    content: rows.slice(1, -1).map(row => [...row.slice(1, -1)])
  };
}

// Split input into raw records without validating grid contents
export function splitRecords(text: string): Array<{ header: string; rows: string[] }> {
  return text
    .replace(/\r\n/g, '\n')
    .split(/\n\s*\n/)
    .map(block => block.split('\n').map(line => line.trim()).filter(line => line.length > 0))
    .filter(lines => lines.length > 0)
    .map(([header, ...rows]) => ({ header, rows }));
}

export function parseTileRecords(text: string): TileRecord[] {
  return splitRecords(text).map(({ header, rows }, index) => {
    const match = HEADER.exec(header);
    if (!match) {
      throw new TileParseError(`expected "Tile <id>:" but found "${header}"`, index);
    }

    const parsed = tileRecordSchema.safeParse({ id: Number(match[1]), rows });
    if (!parsed.success) {
      const issues = parsed.error.issues.map(issue => issue.message).join('; ');
      throw new TileParseError(issues, index);
    }
    return parsed.data;
  });
}

export function parseTiles(text: string): Tile[] {
  const records = parseTileRecords(text);

  const seen = new Set<number>();
  for (const [index, record] of records.entries()) {
    if (seen.has(record.id)) {
      throw new TileParseError(`duplicate tile id ${record.id}`, index);
    }
    seen.add(record.id);
  }

  if (records.length > 0) {
    const size = records[0].rows.length;
    const odd = records.findIndex(record => record.rows.length !== size);
    if (odd >= 0) {
      throw new TileParseError(`expected a ${size}x${size} tile`, odd);
    }
  }

  return records.map(tileFromRecord);
}

export function formatTile(record: TileRecord): string {
  return [`Tile ${record.id}:`, ...record.rows].join('\n');
}

export function formatTiles(records: readonly TileRecord[]): string {
  return records.map(formatTile).join('\n\n') + '\n';
}
