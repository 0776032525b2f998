// Generator exports
export { generatePuzzle, type GenerationConfig, type GeneratedPuzzle } from './PuzzleGenerator';
