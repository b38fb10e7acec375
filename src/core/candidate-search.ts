/**
 * Paginated candidate search
 *
 * Visits result pages 1..pageLimit strictly in order. Each page:
 * navigate -> wait for the listing -> extract -> score/filter/dedupe ->
 * append in arrival order. Stops as soon as `targetCount` unique
 * qualifying candidates are collected, or when a page comes back empty.
 *
 * Failure rule:
 * - any error on page 1 is fatal (covers discovery, connection and the
 *   first navigation);
 * - on later pages, terminal session errors (CommandFailureError,
 *   NoTargetAvailableError) are fatal;
 * - every other error on a later page is logged and the page contributes
 *   no candidates.
 * A fatal error returns `success: false` with `candidatesFound: 0`.
 */

import { z } from 'zod';
import { logger } from '../utils/logger.js';
import { TIMEOUTS } from '../utils/timeouts.js';
import { randomDelayMs, sleep } from '../utils/delay.js';
import { formatConfigErrors } from '../utils/config-schemas.js';
import { errorMessage, isTerminalSessionError } from './cdp-errors.js';
import { RESULTS_READY_SELECTOR, diagnoseEmptyPage, extractCandidatesFromPage } from './candidate-extractor.js';
import { scoreCandidate } from './candidate-scorer.js';
import type { CandidateStore } from './candidate-store.js';
import type { PageDriver } from './page-driver.js';
import type {
  Candidate,
  CandidateSearchOptions,
  NetworkFilter,
  ScoredCandidate,
  SearchResult,
} from '../types/candidates.js';

const log = logger.search;

export const DEFAULT_SEARCH_BASE_URL = 'https://www.linkedin.com/search/results/people/';

/**
 * The page-driver surface the pipeline needs
 */
export type SearchDriver = Pick<PageDriver, 'navigate' | 'waitForSelector' | 'evaluate' | 'scrollBy'>;

export interface CandidateSearchConfig {
  baseUrl: string;
  networkFilter?: NetworkFilter;
  /** Bounds of the randomized pause between pages */
  minDelayMs: number;
  maxDelayMs: number;
  resultsWaitMs: number;
  /** Scroll once after the listing appears to trigger lazy loading */
  scrollAfterLoad: boolean;
  scrollDistance: number;
  scrollSettleMs: number;
  random: () => number;
}

const DEFAULT_CONFIG: CandidateSearchConfig = {
  baseUrl: DEFAULT_SEARCH_BASE_URL,
  minDelayMs: 1000,
  maxDelayMs: 3000,
  resultsWaitMs: TIMEOUTS.SEARCH_RESULTS_WAIT,
  scrollAfterLoad: true,
  scrollDistance: 800,
  scrollSettleMs: TIMEOUTS.SCROLL_SETTLE,
  random: Math.random,
};

const searchOptionsSchema = z.object({
  query: z.string().trim().min(1, 'query must not be empty'),
  location: z.string().trim().default(''),
  pageLimit: z.number().int().min(1).max(100).default(3),
  minScore: z.number().min(0).default(3.0),
  targetCount: z.number().int().min(1).default(10),
});

type ResolvedSearchOptions = z.infer<typeof searchOptionsSchema>;

/**
 * Build the results URL for one page. Page 1 carries no page parameter.
 */
export function buildSearchUrl(
  baseUrl: string,
  query: string,
  location: string,
  page: number,
  networkFilter?: NetworkFilter
): string {
  const keywords = location ? `${query} ${location}`.trim() : query;
  let url = `${baseUrl}?keywords=${encodeURIComponent(keywords).replace(/%20/g, '+')}`;
  if (networkFilter) {
    url += `&network=[%22${networkFilter}%22]`;
  }
  if (page > 1) {
    url += `&page=${page}`;
  }
  return url;
}

export class CandidateSearch {
  private readonly config: CandidateSearchConfig;

  constructor(
    private readonly driver: SearchDriver,
    private readonly store: CandidateStore,
    config: Partial<CandidateSearchConfig> = {}
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  async search(options: CandidateSearchOptions): Promise<SearchResult> {
    const parsed = searchOptionsSchema.safeParse(options);
    if (!parsed.success) {
      return {
        success: false,
        candidatesFound: 0,
        candidates: [],
        pagesSearched: 0,
        error: `Invalid search options:\n${formatConfigErrors(parsed.error)}`,
      };
    }
    const opts = parsed.data;
    const startTime = Date.now();

    log.info('Starting candidate search', {
      query: opts.query,
      location: opts.location,
      pageLimit: opts.pageLimit,
      minScore: opts.minScore,
      targetCount: opts.targetCount,
    });

    const accumulated: ScoredCandidate[] = [];
    const seen = new Set<string>();
    let pagesSearched = 0;

    try {
      for (let page = 1; page <= opts.pageLimit; page++) {
        if (page > 1) {
          await sleep(randomDelayMs(this.config.minDelayMs, this.config.maxDelayMs, this.config.random));
        }
        pagesSearched = page;

        let pageCandidates: Candidate[];
        try {
          pageCandidates = await this.loadPage(opts, page);
        } catch (error) {
          if (page === 1 || isTerminalSessionError(error)) {
            throw error;
          }
          log.warn('Page failed, continuing with next page', { page, error: errorMessage(error) });
          continue;
        }

        if (pageCandidates.length === 0) {
          log.info('No more results', { page });
          const diagnostics = await diagnoseEmptyPage(this.driver);
          if (diagnostics) {
            log.debug('Empty page diagnostics', { page, ...diagnostics });
          }
          break;
        }

        const kept = this.accumulate(pageCandidates, opts, accumulated, seen);
        log.info('Processed results page', { page, extracted: pageCandidates.length, kept });

        if (accumulated.length >= opts.targetCount) {
          log.info('Target count reached, stopping search', { targetCount: opts.targetCount, page });
          break;
        }
      }
    } catch (error) {
      log.error('Search failed', { error, query: opts.query, pagesSearched });
      return {
        success: false,
        candidatesFound: 0,
        candidates: [],
        pagesSearched,
        error: errorMessage(error),
      };
    }

    try {
      await this.store.saveCandidates(accumulated, {
        query: opts.query,
        location: opts.location,
        pagesSearched,
        completedAt: new Date().toISOString(),
      });
    } catch (error) {
      log.error('Failed to store search results', { error });
      return {
        success: false,
        candidatesFound: 0,
        candidates: [],
        pagesSearched,
        error: `Failed to store search results: ${errorMessage(error)}`,
      };
    }

    log.timed('Search complete', startTime, { candidatesFound: accumulated.length, pagesSearched });

    return {
      success: true,
      candidatesFound: accumulated.length,
      candidates: accumulated,
      pagesSearched,
      message: `Found ${accumulated.length} candidates`,
    };
  }

  private async loadPage(opts: ResolvedSearchOptions, page: number): Promise<Candidate[]> {
    const url = buildSearchUrl(this.config.baseUrl, opts.query, opts.location, page, this.config.networkFilter);
    log.debug('Loading results page', { page, url });

    await this.driver.navigate(url);

    const ready = await this.driver.waitForSelector(RESULTS_READY_SELECTOR, {
      timeoutMs: this.config.resultsWaitMs,
    });
    if (!ready) {
      log.debug('Timed out waiting for search results', { page });
    }

    if (this.config.scrollAfterLoad) {
      await this.driver.scrollBy(this.config.scrollDistance);
      await sleep(this.config.scrollSettleMs);
    }

    return extractCandidatesFromPage(this.driver);
  }

  /**
   * Score, filter and dedupe one page into `accumulated`. Returns how many
   * were kept.
   */
  private accumulate(
    pageCandidates: Candidate[],
    opts: ResolvedSearchOptions,
    accumulated: ScoredCandidate[],
    seen: Set<string>
  ): number {
    let kept = 0;
    for (const candidate of pageCandidates) {
      if (accumulated.length >= opts.targetCount) {
        break;
      }
      if (!candidate.profileUrl) {
        log.debug('Skipping candidate without profile URL', { name: candidate.name });
        continue;
      }
      if (seen.has(candidate.profileUrl)) {
        continue;
      }

      const candidateScore = scoreCandidate(candidate, opts.query);
      if (candidateScore < opts.minScore) {
        log.debug('Below threshold', { name: candidate.name, score: candidateScore });
        continue;
      }

      seen.add(candidate.profileUrl);
      accumulated.push({ ...candidate, score: candidateScore });
      kept++;
    }
    return kept;
  }
}

/**
 * One-shot search over an existing driver and store
 */
export function smartCandidateSearch(
  options: CandidateSearchOptions,
  deps: { driver: SearchDriver; store: CandidateStore; config?: Partial<CandidateSearchConfig> }
): Promise<SearchResult> {
  return new CandidateSearch(deps.driver, deps.store, deps.config).search(options);
}
