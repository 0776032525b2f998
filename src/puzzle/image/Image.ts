// Character grids viewed through an orientation
import type { Orientation, Pos, Size } from '../types';
import { addPos } from '../types';
import { orientedSize, transformCoordinate } from '../precompute';

export const FILLED = '#';
export const EMPTY = '.';
export const MARKED = 'O';

// Split text into rows of cells, padding short rows with `fill`
export function textToCells(text: string, fill: string): string[][] {
  const lines = text.split('\n').filter(line => line.length > 0);
  const width = Math.max(0, ...lines.map(line => line.length));
  return lines.map(line => [...line.padEnd(width, fill)]);
}

/**
 * Read-only lens over a grid of cells. Changing `orientation` re-maps
 * coordinates without touching the backing storage.
 */
export class OrientedGrid {
  orientation: Orientation;
  protected readonly cells: ReadonlyArray<ReadonlyArray<string>>;
  private readonly storage: Size;

  constructor(cells: ReadonlyArray<ReadonlyArray<string>>, orientation: Orientation = 'r0') {
    const width = cells.length > 0 ? cells[0].length : 0;
    if (cells.some(row => row.length !== width)) {
      throw new RangeError('grid rows must all have the same length');
    }
    this.cells = cells;
    this.orientation = orientation;
    this.storage = { width, height: cells.length };
  }

  // Don't-care cells are spaces
  static fromString(text: string): OrientedGrid {
    return new OrientedGrid(textToCells(text, ' '));
  }

  get width(): number {
    return orientedSize(this.orientation, this.storage.width, this.storage.height).width;
  }

  get height(): number {
    return orientedSize(this.orientation, this.storage.width, this.storage.height).height;
  }

  contains(pos: Pos): boolean {
    return pos.x >= 0 && pos.y >= 0 && pos.x < this.width && pos.y < this.height;
  }

  protected storagePos(pos: Pos): Pos {
    if (!this.contains(pos)) {
      throw new RangeError(`(${pos.x}, ${pos.y}) is outside the ${this.width}x${this.height} grid`);
    }
    return transformCoordinate(this.orientation, pos, this.storage.width, this.storage.height);
  }

  get(pos: Pos): string {
    const at = this.storagePos(pos);
    return this.cells[at.y][at.x];
  }

  // Row-major over the oriented view
  *positions(): Generator<Pos> {
    const { width, height } = this;
    for (let y = 0; y < height; y++) {
      for (let x = 0; x < width; x++) {
        yield { x, y };
      }
    }
  }

  countOf(cell: string): number {
    let count = 0;
    for (const pos of this.positions()) {
      if (this.get(pos) === cell) count++;
    }
    return count;
  }

  rows(): string[] {
    const rows: string[] = [];
    for (let y = 0; y < this.height; y++) {
      let row = '';
      for (let x = 0; x < this.width; x++) {
        row += this.get({ x, y });
      }
      rows.push(row);
    }
    return rows;
  }

  toString(): string {
    return this.rows().join('\n');
  }
}

// The assembled picture; monster marks are written through the lens
export class Image extends OrientedGrid {
  private readonly writable: string[][];

  constructor(cells: string[][], orientation: Orientation = 'r0') {
    super(cells, orientation);
    this.writable = cells;
  }

  static fromString(text: string): Image {
    return new Image(textToCells(text, EMPTY));
  }

  set(pos: Pos, cell: string): void {
    const at = this.storagePos(pos);
    this.writable[at.y][at.x] = cell;
  }

  isFilled(pos: Pos): boolean {
    const cell = this.get(pos);
    return cell === FILLED || cell === MARKED;
  }

  // Every '#' of the pattern lands on a filled cell; other pattern cells don't matter
  hasPatternAt(origin: Pos, pattern: OrientedGrid): boolean {
    for (const pos of pattern.positions()) {
      if (pattern.get(pos) !== FILLED) continue;
      if (!this.isFilled(addPos(origin, pos))) return false;
    }
    return true;
  }

  markPattern(origin: Pos, pattern: OrientedGrid): void {
    for (const pos of pattern.positions()) {
      if (pattern.get(pos) === FILLED) {
        this.set(addPos(origin, pos), MARKED);
      }
    }
  }

  // Mark every occurrence in the current orientation, returning how many were found
  findMonsters(pattern: OrientedGrid): number {
    let count = 0;
    for (let y = 0; y <= this.height - pattern.height; y++) {
      for (let x = 0; x <= this.width - pattern.width; x++) {
        const origin = { x, y };
        if (this.hasPatternAt(origin, pattern)) {
          this.markPattern(origin, pattern);
          count++;
        }
      }
    }
    return count;
  }
}
