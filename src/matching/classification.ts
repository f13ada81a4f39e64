import { MATCH_CLASSIFICATION } from './constants';
import type { MatchClassification, MatchType } from './types';

/**
 * Evidence category, auto-accept flag and initial status for a match type.
 *
 * @example
 * classifyMatch('MANUAL_VERIFICATION')
 * // Returns: { matchMethod: 'fallback_match', autoAccept: false, initialStatus: 'pending_verification' }
 */
export function classifyMatch(matchType: MatchType): MatchClassification {
  return MATCH_CLASSIFICATION[matchType];
}

export function isAutoAccepted(matchType: MatchType): boolean {
  return MATCH_CLASSIFICATION[matchType].autoAccept;
}
