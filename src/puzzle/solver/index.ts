// Solver exports
export { Arrangement, type CandidateResult } from './Arrangement';
export {
  tryArrange,
  arrangeTiles,
  isArrangeable,
  createSearchContext,
  createTrace,
  type SearchContext,
  type SolverResult
} from './Backtracker';
