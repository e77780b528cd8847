export { setMatchStatus, replaceMatch, acceptHighTier, summarizeMatches } from './decisions.js';
export type { MatchSummary } from './decisions.js';
