// Image exports
export { OrientedGrid, Image, FILLED, EMPTY, MARKED, textToCells } from './Image';
export { SEA_MONSTER, SEA_MONSTER_TEXT } from './patterns';
export { searchMonsters } from './MonsterSearch';
