/**
 * Candidate Extractor
 *
 * Runs one fixed in-page script over the people-search result list and
 * normalizes what comes back. Never throws: a failed or malformed
 * evaluation reads as an empty page.
 */

import { logger } from '../utils/logger.js';
import { errorMessage } from './cdp-errors.js';
import type { PageDriver } from './page-driver.js';
import type { Candidate, PageDiagnostics } from '../types/candidates.js';

const log = logger.extractor;

/** Selector for one result entry on the listing */
export const RESULT_ITEM_SELECTOR = '.search-results-container li';

/** Selector that signals the listing (or its empty state) has rendered */
export const RESULTS_READY_SELECTOR = '.search-results-container li, .search-no-results';

/** Maximum entries read from one page */
export const MAX_ENTRIES_PER_PAGE = 30;

/**
 * Reads name, headline and profile link from each result entry.
 *
 * The name comes from the "View <name>'s profile" accessibility line; the
 * headline is the first descriptive line after the "degree connection"
 * line, falling back to the first descriptive line anywhere in the entry.
 */
export const CANDIDATE_EXTRACTION_SCRIPT = `
(() => {
  const items = Array.from(document.querySelectorAll(${JSON.stringify(RESULT_ITEM_SELECTOR)}))
    .slice(0, ${MAX_ENTRIES_PER_PAGE});

  return items.map((li) => {
    const link = li.querySelector('a[href*="/in/"]');
    const lines = (li.textContent || '')
      .split('\\n')
      .map((l) => l.trim())
      .filter((l) => l && l !== 'Status is offline');

    let name = null;
    for (const line of lines) {
      if (/s profile/.test(line) && line.includes('View ') && !line.includes('\\u2022') && !line.includes('degree')) {
        const before = line.substring(0, line.indexOf('View ')).trim();
        if (before.length > 2 && before.length < 50) {
          name = before;
          break;
        }
      }
    }

    let headline = null;
    let afterConnection = false;
    for (const line of lines) {
      if (line.includes('degree connection')) {
        afterConnection = true;
        continue;
      }
      if (afterConnection && !line.includes('degree') && !line.includes('View ') &&
          !line.includes('Status is') && !line.includes('Message') && line.length > 5) {
        headline = line;
        break;
      }
    }

    if (!headline) {
      for (const line of lines) {
        if (!line.includes('View ') && !line.includes('degree') && !line.includes('Status') &&
            !line.includes('Message') && !line.includes('mutual') && !line.includes('follower') &&
            line.length > 10 && line.length < 200) {
          headline = line;
          break;
        }
      }
    }

    return {
      name: name,
      headline: headline,
      profileUrl: link && link.href ? link.href : null,
    };
  });
})()
`;

/**
 * Collects selector counts and profile-link totals for a page that
 * yielded no candidates
 */
export const PAGE_DIAGNOSTICS_SCRIPT = `
(() => {
  const selectors = [
    ${JSON.stringify(RESULT_ITEM_SELECTOR)},
    'div.reusable-search__result-container',
    'li.reusable-search__result-container',
    '.entity-result',
    'ul.reusable-search__entity-result-list > li',
  ];
  const containerCounts = {};
  for (const sel of selectors) {
    const count = document.querySelectorAll(sel).length;
    if (count > 0) containerCounts[sel] = count;
  }
  const bodyText = (document.body && document.body.textContent) || '';
  return {
    url: window.location.href,
    containerCounts,
    profileLinkCount: document.querySelectorAll('a[href*="/in/"]').length,
    hasNoResultsMessage: bodyText.includes('No results found') || bodyText.includes('0 results'),
  };
})()
`;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringField(value: unknown): string {
  return typeof value === 'string' ? value.trim() : '';
}

/**
 * Normalize raw script output into candidates. Anything that is not an
 * array yields []; entries lacking both a name and a profile URL are
 * dropped; missing fields become ''.
 */
export function normalizeCandidates(raw: unknown): Candidate[] {
  if (!Array.isArray(raw)) {
    return [];
  }

  const candidates: Candidate[] = [];
  for (const entry of raw) {
    if (!isRecord(entry)) {
      continue;
    }
    const candidate: Candidate = {
      name: stringField(entry.name),
      headline: stringField(entry.headline),
      profileUrl: stringField(entry.profileUrl),
    };
    if (!candidate.name && !candidate.profileUrl) {
      continue;
    }
    candidates.push(candidate);
  }
  return candidates;
}

export async function extractCandidatesFromPage(driver: Pick<PageDriver, 'evaluate'>): Promise<Candidate[]> {
  try {
    const result = await driver.evaluate(CANDIDATE_EXTRACTION_SCRIPT);
    if (result.kind !== 'value') {
      log.debug('Extraction produced no value', {
        kind: result.kind,
        reason: result.kind === 'none' ? result.reason : result.description,
      });
      return [];
    }

    const candidates = normalizeCandidates(result.value);
    log.debug('Extracted candidates from page', { count: candidates.length });
    return candidates;
  } catch (error) {
    log.error('Extraction error', { error });
    return [];
  }
}

/**
 * Describe an empty results page for debugging. Returns null when the
 * page cannot be inspected.
 */
export async function diagnoseEmptyPage(driver: Pick<PageDriver, 'evaluate'>): Promise<PageDiagnostics | null> {
  try {
    const result = await driver.evaluate(PAGE_DIAGNOSTICS_SCRIPT);
    if (result.kind !== 'value' || !isRecord(result.value)) {
      return null;
    }
    const info = result.value;
    const counts: Record<string, number> = {};
    if (isRecord(info.containerCounts)) {
      for (const [selector, count] of Object.entries(info.containerCounts)) {
        if (typeof count === 'number') {
          counts[selector] = count;
        }
      }
    }
    return {
      url: typeof info.url === 'string' ? info.url : '',
      containerCounts: counts,
      profileLinkCount: typeof info.profileLinkCount === 'number' ? info.profileLinkCount : 0,
      hasNoResultsMessage: info.hasNoResultsMessage === true,
    };
  } catch (error) {
    log.debug('Page diagnostics failed', { error: errorMessage(error) });
    return null;
  }
}
