import { OrientedGrid } from './Image';

// Spaces are don't-care cells
export const SEA_MONSTER_TEXT = [
  '                  # ',
  '#    ##    ##    ###',
  ' #  #  #  #  #  #   '
].join('\n');

export const SEA_MONSTER = OrientedGrid.fromString(SEA_MONSTER_TEXT);
