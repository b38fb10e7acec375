/**
 * Candidate search types
 */

/**
 * One structured extraction of a search-result entry.
 * Identity is `profileUrl`, compared as an exact string.
 */
export interface Candidate {
  name: string;
  headline: string;
  profileUrl: string;
}

export interface ScoredCandidate extends Candidate {
  score: number;
}

/**
 * Connection-degree filter understood by the results page.
 * F = 1st degree, S = 2nd degree, O = 3rd+.
 */
export type NetworkFilter = 'F' | 'S' | 'O';

export interface CandidateSearchOptions {
  query: string;
  location?: string;
  /** Maximum number of result pages to visit (default 3) */
  pageLimit?: number;
  /** Minimum headline score to keep a candidate (default 3.0) */
  minScore?: number;
  /** Stop once this many unique qualifying candidates are collected (default 10) */
  targetCount?: number;
}

export interface SearchResult {
  success: boolean;
  candidatesFound: number;
  candidates: ScoredCandidate[];
  pagesSearched: number;
  message?: string;
  error?: string;
}

/**
 * Context handed to the store alongside the final batch
 */
export interface SearchContext {
  query: string;
  location: string;
  pagesSearched: number;
  completedAt: string;
}

/**
 * What the browser reports about a results page that yielded nothing
 */
export interface PageDiagnostics {
  url: string;
  containerCounts: Record<string, number>;
  profileLinkCount: number;
  hasNoResultsMessage: boolean;
}
