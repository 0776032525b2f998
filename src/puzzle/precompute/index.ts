// Pre-computation exports
export {
  EDGE_WIDTH,
  reverseEdge,
  encodeEdge,
  isPalindrome
} from './EdgePattern';

export {
  ORIENTATIONS,
  SIDES,
  edgeInOrientation,
  topEdge,
  bottomEdge,
  leftEdge,
  rightEdge,
  orientedSize,
  transformCoordinate,
  inverseOrientation
} from './Orientations';

export {
  AllowedOrientedTiles,
  RELATIONSHIPS,
  fitsNextTo
} from './CompatibilityBuilder';
