// Puzzle Generator - cuts a random image into tiles whose seams match in exactly one way
import type { Pos, Tile, TileId } from '../types';
import { ORIENTATIONS, isPalindrome, reverseEdge } from '../precompute';
import { FILLED, EMPTY, OrientedGrid, SEA_MONSTER } from '../image';
import { formatTiles, parseTiles, type TileRecord } from '../../tiles';
import { randomChoice, randomInt, shuffle, type RandomSource } from '../utils/random';

export interface GenerationConfig {
  // Tiles per side
  size: number;
  // Cells per tile side, border included
  tileSize?: number;
  // Chance that a background interior cell is filled
  fillRatio?: number;
  // Top-left corners of pattern copies drawn into the image (r0)
  monsters?: Pos[];
  pattern?: OrientedGrid;
  random?: RandomSource;
}

export interface GeneratedPuzzle {
  // Input text, tiles scrambled and shuffled
  text: string;
  records: TileRecord[];
  tiles: Tile[];
  // Tile ids in their true positions, row-major
  layout: TileId[][];
  // Assembled interior before scrambling
  image: string[];
}

const MAX_SEAM_ATTEMPTS = 1000;

// Bits of a seam as cells, first bit first
function bitsToCells(pattern: number, width: number): string[] {
  const cells: string[] = [];
  for (let bit = width - 1; bit >= 0; bit--) {
    cells.push(pattern & (1 << bit) ? FILLED : EMPTY);
  }
  return cells;
}

/**
 * Draw a seam value between two fixed corner bits. Every seam is a
 * non-palindrome and differs from every other seam read either way, so
 * each edge has at most one partner.
 */
function drawSeam(random: RandomSource, width: number, start: number, end: number, used: Set<number>): number {
  const middleBits = width - 2;

  for (let attempt = 0; attempt < MAX_SEAM_ATTEMPTS; attempt++) {
    const middle = randomInt(random, 0, (1 << middleBits) - 1);
    const value = (start << (width - 1)) | (middle << 1) | end;
    if (isPalindrome(value, width)) continue;

    const reversed = reverseEdge(value, width);
    if (used.has(value) || used.has(reversed)) continue;

    used.add(value);
    used.add(reversed);
    return value;
  }

  throw new Error(`could not draw a unique ${width}-bit seam`);
}

function drawImage(config: Required<GenerationConfig>): string[][] {
  const interior = config.tileSize - 2;
  const side = config.size * interior;
  const cells: string[][] = [];

  for (let y = 0; y < side; y++) {
    const row: string[] = [];
    for (let x = 0; x < side; x++) {
      row.push(config.random() < config.fillRatio ? FILLED : EMPTY);
    }
    cells.push(row);
  }

  for (const origin of config.monsters) {
    for (const pos of config.pattern.positions()) {
      if (config.pattern.get(pos) !== FILLED) continue;
      const x = origin.x + pos.x;
      const y = origin.y + pos.y;
      if (y >= side || x >= side) {
        throw new RangeError(`pattern at (${origin.x}, ${origin.y}) does not fit a ${side}x${side} image`);
      }
      cells[y][x] = FILLED;
    }
  }

  return cells;
}

function drawIds(random: RandomSource, count: number): TileId[] {
  const ids = new Set<TileId>();
  while (ids.size < count) {
    ids.add(randomInt(random, 1000, 9999));
  }
  return [...ids];
}

export function generatePuzzle(options: GenerationConfig): GeneratedPuzzle {
  const config: Required<GenerationConfig> = {
    tileSize: 10,
    fillRatio: 0.3,
    monsters: [],
    pattern: SEA_MONSTER,
    random: Math.random,
    ...options
  };
  const { size, tileSize, random } = config;
  const interior = tileSize - 2;

  if (size < 1 || tileSize < 3) {
    throw new RangeError('a puzzle needs at least one tile of at least 3x3 cells');
  }

  const image = drawImage(config);

  // Corner bits shared by the up to four tiles meeting at each grid vertex
  const vertices: number[][] = [];
  for (let y = 0; y <= size; y++) {
    vertices.push(Array.from({ length: size + 1 }, () => randomInt(random, 0, 1)));
  }

  const used = new Set<number>();
  // horizontal[y][x]: seam along the top of tile row y, read left to right
  const horizontal: number[][] = [];
  for (let y = 0; y <= size; y++) {
    horizontal.push(Array.from({ length: size }, (_, x) =>
      drawSeam(random, tileSize, vertices[y][x], vertices[y][x + 1], used)));
  }
  // vertical[y][x]: seam along the left of tile column x, read top to bottom
  const vertical: number[][] = [];
  for (let y = 0; y < size; y++) {
    vertical.push(Array.from({ length: size + 1 }, (_, x) =>
      drawSeam(random, tileSize, vertices[y][x], vertices[y + 1][x], used)));
  }

  const ids = drawIds(random, size * size);
  const layout: TileId[][] = [];
  const records: TileRecord[] = [];

  for (let ty = 0; ty < size; ty++) {
    layout.push([]);
    for (let tx = 0; tx < size; tx++) {
      const id = ids[ty * size + tx];
      layout[ty].push(id);

      const top = bitsToCells(horizontal[ty][tx], tileSize);
      const bottom = bitsToCells(horizontal[ty + 1][tx], tileSize);
      const left = bitsToCells(vertical[ty][tx], tileSize);
      const right = bitsToCells(vertical[ty][tx + 1], tileSize);

      const cells: string[][] = [];
      for (let y = 0; y < tileSize; y++) {
        const row: string[] = [];
        for (let x = 0; x < tileSize; x++) {
          if (y === 0) row.push(top[x]);
          else if (y === tileSize - 1) row.push(bottom[x]);
          else if (x === 0) row.push(left[y]);
          else if (x === tileSize - 1) row.push(right[y]);
          else row.push(image[ty * interior + y - 1][tx * interior + x - 1]);
        }
        cells.push(row);
      }

      const scrambled = new OrientedGrid(cells, randomChoice(random, ORIENTATIONS));
      records.push({ id, rows: scrambled.rows() });
    }
  }

  shuffle(random, records);
  const text = formatTiles(records);

  return {
    text,
    records,
    tiles: parseTiles(text),
    layout,
    image: image.map(row => row.join(''))
  };
}
