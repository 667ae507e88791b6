/**
 * Fact Merger Module
 *
 * Merges the PartialProfiles of one record's fetched sources into a single
 * MergedProfile.
 *
 * Rules:
 * - Scalar facts come from the highest-priority source that has them:
 *   registry > official > social(linkedin) > social(other) > review/directory > news
 * - Owner name and title always travel together
 * - Registry filing-date years beat years mined from marketing copy
 * - Contacts, pain points, achievements and social links are unioned
 *   case-insensitively in priority order
 *
 * Sources are ordered by (priority, relevance score desc, discovery index, url)
 * before merging. None of these depend on fetch completion order, so any
 * permutation of the same fetched list merges to the same profile. Equal-priority
 * disagreements are resolved by that order (higher score, then earlier
 * discovery) and logged as merge conflicts.
 */

import type {
  CandidateSource,
  FetchedContent,
  MergeConflict,
  MergedProfile,
  PartialProfile,
  ScalarField,
  SourceType,
  YearsBasis,
} from '../types/index.js';
import { extractDomain, normalizePhone } from '../scraper/index.js';
import { createConsoleLogger, type Logger } from '../observability/index.js';

// ============================================================================
// Constants
// ============================================================================

/** Title given to an owner name reported without one */
export const DEFAULT_OWNER_TITLE = 'Owner';

// ============================================================================
// Priority
// ============================================================================

/**
 * Merge priority of a source, 0 being the most authoritative
 */
export function sourcePriority(source: Pick<CandidateSource, 'source_type' | 'platform'>): number {
  switch (source.source_type) {
    case 'registry':
      return 0;
    case 'official':
      return 1;
    case 'social':
      return source.platform === 'linkedin' ? 2 : 3;
    case 'review':
    case 'directory':
      return 4;
    case 'news':
      return 5;
    default:
      return 6;
  }
}

/**
 * Total order over fetched sources used by the merger: priority, then
 * discovery order, then url. Among equal priority the first discovered wins.
 */
export function compareForMerge(a: FetchedContent, b: FetchedContent): number {
  return (
    sourcePriority(a.source) - sourcePriority(b.source) ||
    a.source.discovery_index - b.source.discovery_index ||
    (a.source.url < b.source.url ? -1 : a.source.url > b.source.url ? 1 : 0)
  );
}

// ============================================================================
// Accumulator
// ============================================================================

interface Claim<T> {
  value: T;
  source: CandidateSource;
}

/**
 * Mutable profile under construction. Sources must be absorbed in merge order.
 */
export class ProfileAccumulator {
  private owner: Claim<{ name: string; title: string }> | null = null;
  private years: Claim<{ count: number; basis: YearsBasis }> | null = null;
  private website: Claim<string> | null = null;

  private readonly phones: string[] = [];
  private readonly emails: string[] = [];
  private readonly painPoints: string[] = [];
  private readonly achievements: string[] = [];
  private readonly socialLinks: Record<string, string> = {};
  private readonly sourcesUsed: string[] = [];
  private readonly conflicts: MergeConflict[] = [];

  constructor(private readonly logger: Logger = createConsoleLogger('merger')) {}

  absorb(fetched: FetchedContent): void {
    const facts = fetched.extracted_facts;
    const source = fetched.source;

    if (!this.sourcesUsed.includes(source.url)) {
      this.sourcesUsed.push(source.url);
    }

    this.absorbOwner(facts, source);
    this.absorbYears(facts, source);
    this.absorbWebsite(facts, source);

    for (const phone of facts.contacts.phones) {
      const formatted = normalizePhone(phone) ?? phone.trim();
      if (!this.phones.includes(formatted)) {
        this.phones.push(formatted);
      }
    }
    for (const email of facts.contacts.emails) {
      pushCaseInsensitive(this.emails, email.trim().toLowerCase());
    }
    for (const painPoint of facts.pain_points) {
      pushCaseInsensitive(this.painPoints, painPoint);
    }
    for (const achievement of facts.achievements) {
      pushCaseInsensitive(this.achievements, achievement);
    }
    for (const [platform, url] of Object.entries(facts.social_links)) {
      const key = platform.toLowerCase();
      if (!(key in this.socialLinks)) {
        this.socialLinks[key] = url;
      }
    }
  }

  private absorbOwner(facts: PartialProfile, source: CandidateSource): void {
    const name = facts.owner_name?.trim();
    if (!name) {
      return;
    }
    const title = facts.owner_title?.trim() || DEFAULT_OWNER_TITLE;

    if (!this.owner) {
      this.owner = { value: { name, title }, source };
      return;
    }
    if (this.owner.value.name.toLowerCase() !== name.toLowerCase()) {
      this.recordConflict('owner', this.owner, `${this.owner.value.name} (${this.owner.value.title})`, `${name} (${title})`, source);
    }
  }

  private absorbYears(facts: PartialProfile, source: CandidateSource): void {
    if (facts.years_in_business === null || facts.years_in_business_basis === null) {
      return;
    }
    const incoming = { count: facts.years_in_business, basis: facts.years_in_business_basis };

    if (!this.years || (this.years.value.basis === 'text' && incoming.basis === 'filing_date')) {
      this.years = { value: incoming, source };
      return;
    }
    if (this.years.value.basis === incoming.basis && this.years.value.count !== incoming.count) {
      this.recordConflict('years_in_business', this.years, String(this.years.value.count), String(incoming.count), source);
    }
  }

  private absorbWebsite(facts: PartialProfile, source: CandidateSource): void {
    const website = facts.website?.trim();
    if (!website) {
      return;
    }
    if (!this.website) {
      this.website = { value: website, source };
      return;
    }
    if (extractDomain(this.website.value) !== extractDomain(website)) {
      this.recordConflict('website', this.website, this.website.value, website, source);
    }
  }

  /**
   * Only equal-priority disagreements are conflicts; a lower-priority source
   * losing to a higher one is the normal case
   */
  private recordConflict<T>(
    field: ScalarField,
    kept: Claim<T>,
    keptDisplay: string,
    discarded: string,
    discardedSource: CandidateSource
  ): void {
    if (sourcePriority(kept.source) !== sourcePriority(discardedSource)) {
      return;
    }
    const conflict: MergeConflict = {
      field,
      kept: keptDisplay,
      kept_source: kept.source.url,
      discarded,
      discarded_source: discardedSource.url,
    };
    this.conflicts.push(conflict);
    this.logger.info('MergeConflict resolved by source order', { ...conflict });
  }

  /**
   * Produce the frozen profile
   */
  finalize(): MergedProfile {
    const provenance: Partial<Record<ScalarField, SourceType>> = {};
    if (this.owner) provenance.owner = this.owner.source.source_type;
    if (this.years) provenance.years_in_business = this.years.source.source_type;
    if (this.website) provenance.website = this.website.source.source_type;

    return Object.freeze({
      owner_name: this.owner?.value.name ?? null,
      owner_title: this.owner?.value.title ?? null,
      years_in_business: this.years?.value.count ?? null,
      website: this.website?.value ?? null,
      contacts: Object.freeze({
        phones: Object.freeze([...this.phones]),
        emails: Object.freeze([...this.emails]),
      }),
      pain_points: Object.freeze([...this.painPoints]),
      achievements: Object.freeze([...this.achievements]),
      social_links: Object.freeze({ ...this.socialLinks }),
      provenance: Object.freeze(provenance),
      sources_used: Object.freeze([...this.sourcesUsed]),
      conflicts: Object.freeze(this.conflicts.map((conflict) => Object.freeze({ ...conflict }))),
    });
  }
}

function pushCaseInsensitive(items: string[], value: string): void {
  const trimmed = value.trim();
  if (!trimmed) return;
  const lower = trimmed.toLowerCase();
  if (!items.some((item) => item.toLowerCase() === lower)) {
    items.push(trimmed);
  }
}

// ============================================================================
// Core Functions
// ============================================================================

/**
 * Merge the fetched sources of one record. Failed fetches contribute nothing.
 */
export function mergeFacts(
  fetched: readonly FetchedContent[],
  logger: Logger = createConsoleLogger('merger')
): MergedProfile {
  const accumulator = new ProfileAccumulator(logger);
  const ordered = fetched.filter((item) => item.fetch_succeeded).sort(compareForMerge);
  for (const item of ordered) {
    accumulator.absorb(item);
  }
  return accumulator.finalize();
}

export function emptyMergedProfile(): MergedProfile {
  return new ProfileAccumulator().finalize();
}

/**
 * True when no fact at all was merged
 */
export function isEmptyProfile(profile: MergedProfile): boolean {
  return (
    profile.owner_name === null &&
    profile.years_in_business === null &&
    profile.website === null &&
    profile.contacts.phones.length === 0 &&
    profile.contacts.emails.length === 0 &&
    profile.pain_points.length === 0 &&
    profile.achievements.length === 0 &&
    Object.keys(profile.social_links).length === 0
  );
}

export default {
  mergeFacts,
  emptyMergedProfile,
  isEmptyProfile,
  sourcePriority,
  compareForMerge,
  ProfileAccumulator,
};
