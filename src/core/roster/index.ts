export { isNoOne, normalizeName } from './normalize';
export {
  type AliasTable,
  DEFAULT_MATCH_THRESHOLD,
  type MatchMethod,
  Roster,
  type RosterMatch
} from './roster';
export {
  CONTAINMENT_SCORE,
  longestCommonSubsequence,
  nameSimilarity,
  sequenceRatio
} from './similarity';
