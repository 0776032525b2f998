// Search every orientation of an image for a pattern
import type { MonsterSearchResult } from '../types';
import { ORIENTATIONS } from '../precompute';
import { FILLED, type Image, type OrientedGrid } from './Image';
import { SEA_MONSTER } from './patterns';

/**
 * Turn the image through each orientation until one holds at least one
 * match, marking matched cells. The image keeps that orientation; with no
 * match anywhere it is returned to r0.
 */
export function searchMonsters(image: Image, pattern: OrientedGrid = SEA_MONSTER): MonsterSearchResult {
  for (const orientation of ORIENTATIONS) {
    image.orientation = orientation;
    const monsters = image.findMonsters(pattern);
    if (monsters > 0) {
      return { orientation, monsters, roughness: image.countOf(FILLED) };
    }
  }

  image.orientation = 'r0';
  return { orientation: undefined, monsters: 0, roughness: image.countOf(FILLED) };
}
