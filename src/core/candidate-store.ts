/**
 * Candidate store collaborator
 *
 * The search pipeline hands its final batch to a store exactly once per
 * successful run. Durable persistence is the store owner's concern.
 */

import { logger } from '../utils/logger.js';
import type { ScoredCandidate, SearchContext } from '../types/candidates.js';

const log = logger.store;

export interface CandidateStore {
  saveCandidates(candidates: ScoredCandidate[], context: SearchContext): Promise<void>;
}

/**
 * Keeps the most recent batch in memory for the calling process
 */
export class InMemoryCandidateStore implements CandidateStore {
  private candidates: ScoredCandidate[] = [];
  private context: SearchContext | null = null;
  private saves = 0;

  async saveCandidates(candidates: ScoredCandidate[], context: SearchContext): Promise<void> {
    this.candidates = candidates.map((candidate) => ({ ...candidate }));
    this.context = { ...context };
    this.saves++;
    log.info('Stored search results', { count: candidates.length, query: context.query });
  }

  getCandidates(): ScoredCandidate[] {
    return this.candidates.map((candidate) => ({ ...candidate }));
  }

  getContext(): SearchContext | null {
    return this.context;
  }

  /** Number of batches received so far */
  get saveCount(): number {
    return this.saves;
  }

  reset(): void {
    this.candidates = [];
    this.context = null;
    this.saves = 0;
  }
}
