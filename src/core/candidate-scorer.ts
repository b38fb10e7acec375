/**
 * Headline relevance scoring
 *
 * Pure and deterministic. Inputs are expected lower-cased; use
 * scoreCandidate() to get that for free.
 */

import type { Candidate } from '../types/candidates.js';

export const SCORE_WEIGHTS = {
  /** Headline contains the whole query verbatim */
  verbatimQuery: 5.0,
  /** Per query token found in the headline */
  queryToken: 2.0,
  /** Per seniority marker present */
  seniority: 1.5,
  /** Per generic role term present */
  roleTerm: 1.0,
} as const;

export const SENIORITY_MARKERS = ['senior', 'staff', 'principal', 'lead'] as const;

export const ROLE_TERMS = ['engineer', 'architect', 'developer'] as const;

function countPresent(haystack: string, needles: readonly string[]): number {
  return needles.filter((needle) => haystack.includes(needle)).length;
}

/**
 * Score a lower-cased headline against a lower-cased query. Always >= 0;
 * 0 when nothing matches.
 */
export function score(headlineLower: string, queryLower: string): number {
  const query = queryLower.trim();
  let total = 0;

  if (query.length > 0 && headlineLower.includes(query)) {
    total += SCORE_WEIGHTS.verbatimQuery;
  }

  const tokens = query.split(/\s+/).filter(Boolean);
  total += countPresent(headlineLower, tokens) * SCORE_WEIGHTS.queryToken;
  total += countPresent(headlineLower, SENIORITY_MARKERS) * SCORE_WEIGHTS.seniority;
  total += countPresent(headlineLower, ROLE_TERMS) * SCORE_WEIGHTS.roleTerm;

  return total;
}

export function scoreCandidate(candidate: Candidate, query: string): number {
  return score(candidate.headline.toLowerCase(), query.toLowerCase());
}
