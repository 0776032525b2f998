// The 8 symmetries of a square: which canonical edge shows on each side,
// and how logical coordinates map onto storage
import type { EdgePattern, Orientation, Pos, Side, Size, Tile } from '../types';
import { reverseEdge } from './EdgePattern';

export const ORIENTATIONS: readonly Orientation[] = [
  'r0',
  'r90',
  'r180',
  'r270',
  'r0-flip-h',
  'r0-flip-v',
  'r90-flip-h',
  'r90-flip-v'
];

export const SIDES: readonly Side[] = ['top', 'bottom', 'left', 'right'];

// Canonical side shown on a given side, and whether it reads reversed
interface EdgeSource {
  side: Side;
  reversed: boolean;
}

function edge(side: Side, reversed: boolean = false): EdgeSource {
  return { side, reversed };
}

const EDGE_TABLE: Record<Orientation, Record<Side, EdgeSource>> = {
  'r0': {
    top: edge('top'),
    bottom: edge('bottom'),
    left: edge('left'),
    right: edge('right')
  },
  'r90': {
    top: edge('right'),
    bottom: edge('left'),
    left: edge('top', true),
    right: edge('bottom', true)
  },
  'r180': {
    top: edge('bottom', true),
    bottom: edge('top', true),
    left: edge('right', true),
    right: edge('left', true)
  },
  'r270': {
    top: edge('left', true),
    bottom: edge('right', true),
    left: edge('bottom'),
    right: edge('top')
  },
  'r0-flip-h': {
    top: edge('top', true),
    bottom: edge('bottom', true),
    left: edge('right'),
    right: edge('left')
  },
  'r0-flip-v': {
    top: edge('bottom'),
    bottom: edge('top'),
    left: edge('left', true),
    right: edge('right', true)
  },
  'r90-flip-h': {
    top: edge('right', true),
    bottom: edge('left', true),
    left: edge('bottom', true),
    right: edge('top', true)
  },
  'r90-flip-v': {
    top: edge('left'),
    bottom: edge('right'),
    left: edge('top'),
    right: edge('bottom')
  }
};

// Edge shown on `side` once the tile is turned to `orientation`
export function edgeInOrientation(tile: Tile, orientation: Orientation, side: Side): EdgePattern {
  const source = EDGE_TABLE[orientation][side];
  const pattern = tile[source.side];
  return source.reversed ? reverseEdge(pattern, tile.size) : pattern;
}

export function topEdge(tile: Tile, orientation: Orientation): EdgePattern {
  return edgeInOrientation(tile, orientation, 'top');
}

export function bottomEdge(tile: Tile, orientation: Orientation): EdgePattern {
  return edgeInOrientation(tile, orientation, 'bottom');
}

export function leftEdge(tile: Tile, orientation: Orientation): EdgePattern {
  return edgeInOrientation(tile, orientation, 'left');
}

export function rightEdge(tile: Tile, orientation: Orientation): EdgePattern {
  return edgeInOrientation(tile, orientation, 'right');
}

// Quarter turns swap the axes
export function swapsAxes(orientation: Orientation): boolean {
  return orientation === 'r90'
    || orientation === 'r270'
    || orientation === 'r90-flip-h'
    || orientation === 'r90-flip-v';
}

// Dimensions of a width x height grid seen through an orientation
export function orientedSize(orientation: Orientation, width: number, height: number): Size {
  return swapsAxes(orientation)
    ? { width: height, height: width }
    : { width, height };
}

// Map a logical coordinate to storage coordinates of a width x height grid
export function transformCoordinate(orientation: Orientation, pos: Pos, width: number, height: number): Pos {
  const view = orientedSize(orientation, width, height);
  const { x, y } = pos;
  const rx = view.width - 1 - x;
  const ry = view.height - 1 - y;

  switch (orientation) {
    case 'r0':         return { x, y };
    case 'r90':        return { x: ry, y: x };
    case 'r180':       return { x: rx, y: ry };
    case 'r270':       return { x: y, y: rx };
    case 'r0-flip-h':  return { x: rx, y };
    case 'r0-flip-v':  return { x, y: ry };
    case 'r90-flip-h': return { x: ry, y: rx };
    case 'r90-flip-v': return { x: y, y: x };
  }
}

// r90 and r270 undo each other; every other symmetry is its own inverse
export function inverseOrientation(orientation: Orientation): Orientation {
  if (orientation === 'r90') return 'r270';
  if (orientation === 'r270') return 'r90';
  return orientation;
}
