/**
 * Evidence Budget Selector Module
 *
 * Picks which classified candidates are actually fetched for a record under a
 * maximum-fetch budget, trading raw score for category diversity.
 *
 * Algorithm:
 * 1. Drop non-qualifying candidates (irrelevant, competitor)
 * 2. Stable sort by relevance_score desc, ties by discovery order
 * 3. Drop duplicate URLs, keeping the higher-ranked copy
 * 4. Take the top official source first
 * 5. Round-robin over the category groups, one pick per group per pass, until
 *    the budget is spent or every group is capped or exhausted
 * 6. Fill any budget left with the highest-ranked remaining candidates
 *
 * Output is deterministic for identical input ordering and scores.
 */

import type { CandidateSource, SourceType } from '../types/index.js';
import { normalizeUrl } from '../scraper/index.js';

// ============================================================================
// Type Definitions
// ============================================================================

/**
 * A set of source types sharing one diversity slot sequence
 */
export interface CategoryGroup {
  name: string;
  types: SourceType[];
  /** Maximum picks from this group per record */
  cap: number;
}

export interface SelectOptions {
  /** Category groups in priority order (default: DEFAULT_CATEGORY_GROUPS) */
  groups?: CategoryGroup[];
  /** Spend budget left after the diversity pass on the best remaining candidates (default: true) */
  fillRemaining?: boolean;
}

// ============================================================================
// Constants
// ============================================================================

export const DEFAULT_CATEGORY_GROUPS: readonly CategoryGroup[] = [
  { name: 'official', types: ['official'], cap: 1 },
  { name: 'registry', types: ['registry'], cap: 1 },
  { name: 'social', types: ['social'], cap: 2 },
  { name: 'review', types: ['review'], cap: 2 },
  { name: 'news', types: ['news'], cap: 1 },
  { name: 'directory', types: ['directory'], cap: 1 },
];

/** Never worth a fetch */
export const NON_QUALIFYING_TYPES: readonly SourceType[] = ['irrelevant', 'competitor'];

// ============================================================================
// Core Functions
// ============================================================================

/**
 * Sort by score descending; equal scores keep discovery order
 */
export function rankCandidates(candidates: readonly CandidateSource[]): CandidateSource[] {
  return candidates
    .map((candidate, position) => ({ candidate, position }))
    .sort(
      (a, b) =>
        b.candidate.relevance_score - a.candidate.relevance_score ||
        a.candidate.discovery_index - b.candidate.discovery_index ||
        a.position - b.position
    )
    .map(({ candidate }) => candidate);
}

/**
 * Select a diverse, high-value subset of candidates to fetch
 *
 * @param candidates - Classified candidates of one record
 * @param maxFetch - Fetch budget; the result never exceeds it
 * @returns Selected candidates in pick order, no duplicate URLs
 */
export function selectSources(
  candidates: readonly CandidateSource[],
  maxFetch: number,
  options: SelectOptions = {}
): CandidateSource[] {
  if (maxFetch <= 0) {
    return [];
  }

  const groups = options.groups ?? DEFAULT_CATEGORY_GROUPS;

  const ranked: CandidateSource[] = [];
  const seenUrls = new Set<string>();
  for (const candidate of rankCandidates(candidates)) {
    const key = normalizeUrl(candidate.url);
    if (NON_QUALIFYING_TYPES.includes(candidate.source_type) || seenUrls.has(key)) {
      continue;
    }
    seenUrls.add(key);
    ranked.push(candidate);
  }

  const selected: CandidateSource[] = [];
  const picked = new Set<CandidateSource>();
  const groupCounts = new Map<string, number>();

  const take = (candidate: CandidateSource): void => {
    selected.push(candidate);
    picked.add(candidate);
    const group = groups.find((g) => g.types.includes(candidate.source_type));
    if (group) {
      groupCounts.set(group.name, (groupCounts.get(group.name) ?? 0) + 1);
    }
  };

  const topOfficial = ranked.find((candidate) => candidate.source_type === 'official');
  if (topOfficial) {
    take(topOfficial);
  }

  let progressed = true;
  while (selected.length < maxFetch && progressed) {
    progressed = false;
    for (const group of groups) {
      if (selected.length >= maxFetch) {
        break;
      }
      if ((groupCounts.get(group.name) ?? 0) >= group.cap) {
        continue;
      }
      const next = ranked.find(
        (candidate) => !picked.has(candidate) && group.types.includes(candidate.source_type)
      );
      if (next) {
        take(next);
        progressed = true;
      }
    }
  }

  if (options.fillRemaining ?? true) {
    for (const candidate of ranked) {
      if (selected.length >= maxFetch) {
        break;
      }
      if (!picked.has(candidate)) {
        take(candidate);
      }
    }
  }

  return selected;
}

export default {
  selectSources,
  rankCandidates,
  DEFAULT_CATEGORY_GROUPS,
};
