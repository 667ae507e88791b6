/**
 * Source Classifier Module
 *
 * Assigns a source type and a relevance score to every discovered URL of a
 * record. Pure: the result depends only on the arguments (the current year is
 * passed in through options).
 *
 * Type precedence:
 * 1. Registry hosts (state business registries)
 * 2. Official site (company-name tokens in the domain)
 * 3. Social platforms
 * 4. Review sites, then directories
 * 5. Keyword heuristics (review-ish, news-ish, competitor dealerships)
 * 6. Otherwise irrelevant
 *
 * Usage:
 * ```typescript
 * const source = classifySource(
 *   { url: 'https://smithmotors.com', title: 'Smith Motors', snippet: '' },
 *   'Smith Motors',
 *   { focus: 'achievements', currentYear: 2025 }
 * );
 * ```
 */

import type { CandidateSource, PersonalizationFocus, SourceType } from '../types/index.js';
import { extractDomain } from '../scraper/index.js';

// ============================================================================
// Type Definitions
// ============================================================================

/**
 * A search hit before classification
 */
export interface RawCandidate {
  url: string;
  title: string;
  snippet: string;
}

export interface ClassifyOptions {
  /** Campaign focus family that earns an extra bonus */
  focus?: PersonalizationFocus;
  /** Year used for the recency bonus (default: current year) */
  currentYear?: number;
  /** Position of the hit in the discovery sequence (default: 0) */
  discoveryIndex?: number;
}

// ============================================================================
// Constants
// ============================================================================

/** Company-name words shorter than this are ignored for matching */
export const MIN_TOKEN_LENGTH = 4;

const CORPORATE_WORDS = new Set(['corp', 'corporation', 'company', 'incorporated', 'limited', 'group', 'holdings']);

const REGISTRY_FRAGMENTS = [
  'sunbiz',
  'sos.state',
  'dos.myflorida',
  'corporations',
  'opencorporates',
  'bizfileonline',
  'corp.delaware',
  'ecorp.sos',
];

/** Matches secretary-of-state subdomains such as sos.ca.gov or sos.texas.gov */
const REGISTRY_HOST_PATTERN = /(^|\.)sos\.[a-z.]+\.gov$/;

const SOCIAL_HOSTS: Record<string, string[]> = {
  facebook: ['facebook.com', 'fb.com'],
  linkedin: ['linkedin.com'],
  instagram: ['instagram.com'],
  twitter: ['twitter.com', 'x.com'],
  youtube: ['youtube.com'],
  tiktok: ['tiktok.com'],
};

const REVIEW_HOSTS = ['yelp.com', 'bbb.org', 'trustpilot.com', 'dealerrater.com'];

const DIRECTORY_HOSTS = [
  'yellowpages.com',
  'whitepages.com',
  'manta.com',
  'buzzfile.com',
  'mapquest.com',
  'superpages.com',
  'chamberofcommerce.com',
  'bizapedia.com',
  'dnb.com',
  'cars.com',
  'cargurus.com',
  'autotrader.com',
  'carfax.com',
  'edmunds.com',
];

/** Directories that mostly re-list scraped data */
const AGGREGATOR_HOSTS = ['yellowpages.com', 'whitepages.com', 'manta.com', 'buzzfile.com'];

/** Hosts that never count as a business's own site */
const NON_OFFICIAL_FRAGMENTS = [
  '.gov',
  'wikipedia',
  'bloomberg',
  'reuters',
  'edgar',
  'google.',
  'bing.',
  'yahoo.',
  'kbb.com',
];

const NEWS_DOMAIN_FRAGMENTS = ['news', 'press', 'times', 'herald', 'gazette', 'tribune', 'journal', 'patch.com', 'bizjournals'];
const NEWS_TITLE_TERMS = ['announces', 'launches', 'opens', 'press release', 'breaking'];
const REVIEW_TERMS = ['review', 'rating', 'testimonial'];
const DEALER_TERMS = ['dealer', 'auto', 'cars', 'motors'];

export const BASE_WEIGHTS: Record<SourceType, number> = {
  registry: 12,
  official: 10,
  social: 7,
  review: 8,
  news: 7,
  directory: 4,
  competitor: 1,
  irrelevant: 0,
};

/** Social platforms are weighted individually */
export const PLATFORM_WEIGHTS: Record<string, number> = {
  linkedin: 10,
  facebook: 9,
  instagram: 8,
  twitter: 8,
  youtube: 7,
  tiktok: 6,
};

export const PERSONALIZATION_SIGNALS: Record<PersonalizationFocus, string[]> = {
  recent_activity: ['announce', 'launch', 'new', 'expand', 'open', 'celebrate', 'award', 'promote'],
  pain_points: ['complaint', 'issue', 'problem', 'challenge', 'difficult', 'frustrat', 'disappoint'],
  achievements: ['award', 'recogni', 'certif', 'accredit', 'best', 'top', 'leader', 'excel'],
  growth: ['hiring', 'expand', 'growth', 'new location', 'acquisition', 'partner'],
  leadership: ['owner', 'ceo', 'president', 'founder', 'manager', 'director'],
  culture: ['team', 'culture', 'values', 'mission', 'community', 'volunteer', 'sponsor'],
};

export const NAME_MATCH_BONUS = 3;
export const SIGNAL_BONUS = 2;
export const FOCUS_BONUS = 3;
export const RECENCY_BONUS = 2;
export const AGGREGATOR_PENALTY = -3;

// ============================================================================
// Helpers
// ============================================================================

/**
 * Significant lowercase words of a company name
 */
export function companyTokens(companyName: string): string[] {
  const tokens = companyName
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter((token) => token.length >= MIN_TOKEN_LENGTH && !CORPORATE_WORDS.has(token));
  return Array.from(new Set(tokens));
}

/**
 * True when the domain is one of the hosts or a subdomain of one
 */
function onHost(domain: string, hosts: string[]): boolean {
  return hosts.some((host) => domain === host || domain.endsWith(`.${host}`));
}

export function detectSocialPlatform(domain: string): string | null {
  for (const [platform, hosts] of Object.entries(SOCIAL_HOSTS)) {
    if (onHost(domain, hosts)) {
      return platform;
    }
  }
  return null;
}

export function isRegistryHost(domain: string): boolean {
  return REGISTRY_FRAGMENTS.some((fragment) => domain.includes(fragment)) || REGISTRY_HOST_PATTERN.test(domain);
}

function isReviewUrl(domain: string, url: string): boolean {
  if (onHost(domain, REVIEW_HOSTS)) return true;
  return onHost(domain, ['google.com']) && url.toLowerCase().includes('/maps');
}

function isThirdPartyHost(domain: string): boolean {
  return (
    detectSocialPlatform(domain) !== null ||
    onHost(domain, REVIEW_HOSTS) ||
    onHost(domain, DIRECTORY_HOSTS) ||
    NON_OFFICIAL_FRAGMENTS.some((fragment) => domain.includes(fragment))
  );
}

/**
 * Official-site rule: two company tokens in the domain, or one in the domain
 * plus a different one in the title
 */
export function looksOfficial(domain: string, title: string, tokens: string[]): boolean {
  if (tokens.length === 0 || isThirdPartyHost(domain)) {
    return false;
  }
  const inDomain = tokens.filter((token) => domain.includes(token));
  if (inDomain.length >= 2) {
    return true;
  }
  if (inDomain.length === 1) {
    // a single-word name can only be confirmed by the same word
    const others = tokens.length === 1 ? tokens : tokens.filter((token) => !inDomain.includes(token));
    const lowerTitle = title.toLowerCase();
    return others.some((token) => lowerTitle.includes(token));
  }
  return false;
}

/**
 * Determine the source type of a URL for a given company
 */
export function determineSourceType(
  candidate: RawCandidate,
  tokens: string[]
): { sourceType: SourceType; platform: string | null } {
  const domain = extractDomain(candidate.url);
  const lowerTitle = candidate.title.toLowerCase();
  const text = `${lowerTitle} ${candidate.snippet.toLowerCase()}`;

  if (isRegistryHost(domain)) {
    return { sourceType: 'registry', platform: null };
  }
  if (looksOfficial(domain, candidate.title, tokens)) {
    return { sourceType: 'official', platform: null };
  }
  const platform = detectSocialPlatform(domain);
  if (platform) {
    return { sourceType: 'social', platform };
  }
  if (isReviewUrl(domain, candidate.url)) {
    return { sourceType: 'review', platform: null };
  }
  if (onHost(domain, DIRECTORY_HOSTS)) {
    return { sourceType: 'directory', platform: null };
  }

  if (REVIEW_TERMS.some((term) => domain.includes(term) || lowerTitle.includes(term))) {
    return { sourceType: 'review', platform: null };
  }
  if (
    NEWS_DOMAIN_FRAGMENTS.some((fragment) => domain.includes(fragment)) ||
    NEWS_TITLE_TERMS.some((term) => lowerTitle.includes(term))
  ) {
    return { sourceType: 'news', platform: null };
  }
  if (
    DEALER_TERMS.some((term) => lowerTitle.includes(term)) &&
    !tokens.some((token) => lowerTitle.includes(token))
  ) {
    return { sourceType: 'competitor', platform: null };
  }
  if (tokens.filter((token) => text.includes(token)).length >= 2) {
    return { sourceType: 'directory', platform: null };
  }

  return { sourceType: 'irrelevant', platform: null };
}

/**
 * Score a classified source
 */
export function scoreSource(
  candidate: RawCandidate,
  sourceType: SourceType,
  platform: string | null,
  tokens: string[],
  focus: PersonalizationFocus | undefined,
  currentYear: number
): number {
  const domain = extractDomain(candidate.url);
  const text = `${candidate.title} ${candidate.snippet}`.toLowerCase();

  let score =
    sourceType === 'social' && platform
      ? PLATFORM_WEIGHTS[platform] ?? BASE_WEIGHTS.social
      : BASE_WEIGHTS[sourceType];

  if (onHost(domain, AGGREGATOR_HOSTS)) {
    score += AGGREGATOR_PENALTY;
  }

  if (tokens.length > 0 && tokens.every((token) => text.includes(token))) {
    score += NAME_MATCH_BONUS;
  }

  for (const [family, keywords] of Object.entries(PERSONALIZATION_SIGNALS)) {
    if (keywords.some((keyword) => text.includes(keyword))) {
      score += SIGNAL_BONUS;
      if (family === focus) {
        score += FOCUS_BONUS;
      }
    }
  }

  if (text.includes(String(currentYear)) || text.includes(String(currentYear - 1))) {
    score += RECENCY_BONUS;
  }

  return score;
}

// ============================================================================
// Core Functions
// ============================================================================

/**
 * Classify and score one discovered URL
 */
export function classifySource(
  candidate: RawCandidate,
  companyName: string,
  options: ClassifyOptions = {}
): CandidateSource {
  const tokens = companyTokens(companyName);
  const { sourceType, platform } = determineSourceType(candidate, tokens);
  const currentYear = options.currentYear ?? new Date().getFullYear();

  return {
    url: candidate.url,
    title: candidate.title,
    snippet: candidate.snippet,
    source_type: sourceType,
    relevance_score: scoreSource(candidate, sourceType, platform, tokens, options.focus, currentYear),
    platform,
    discovery_index: options.discoveryIndex ?? 0,
  };
}

/**
 * Classify a discovery sequence, numbering each hit by its position
 */
export function classifyCandidates(
  candidates: RawCandidate[],
  companyName: string,
  options: Omit<ClassifyOptions, 'discoveryIndex'> = {}
): CandidateSource[] {
  return candidates.map((candidate, index) =>
    classifySource(candidate, companyName, { ...options, discoveryIndex: index })
  );
}

export default {
  classifySource,
  classifyCandidates,
  companyTokens,
  determineSourceType,
  scoreSource,
  looksOfficial,
};
