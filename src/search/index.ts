/**
 * Search Module
 *
 * Discovers candidate URLs for a business record and classifies them.
 *
 * Features:
 * - SearchProvider capability; SerperSearchProvider posts to the Serper API with axios
 * - Query set per record: company + location, owner, state registry, reviews, news
 * - Hits de-duplicated by normalized URL in discovery order
 * - Records that already carry candidate URLs skip search
 *
 * Usage:
 * ```typescript
 * const provider = new SerperSearchProvider({ apiKey: process.env.SERPER_API_KEY });
 * const { candidates } = await discoverCandidates(record, provider, { focus: 'growth' });
 * ```
 */

import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import type { BusinessRecord, CandidateSource, ModuleResult, PersonalizationFocus } from '../types/index.js';
import { classifyCandidates, type RawCandidate } from '../classifier/index.js';
import { normalizeUrl } from '../scraper/index.js';
import { errorMessage } from '../async/index.js';
import { createConsoleLogger, noopMetrics, type Logger, type Metrics } from '../observability/index.js';

// ============================================================================
// Type Definitions
// ============================================================================

export type SearchHit = RawCandidate;

export type QueryPurpose = 'company' | 'owner' | 'registry' | 'reviews' | 'news';

export interface SearchQuery {
  query: string;
  purpose: QueryPurpose;
}

/**
 * Web search capability. Failures come back as failed results.
 */
export interface SearchProvider {
  search(query: string): Promise<ModuleResult<SearchHit[]>>;
}

export interface SerperConfig {
  apiKey: string;
  /** Results per query (default: 10) */
  num?: number;
  /** Country code (default: us) */
  gl?: string;
  /** Language (default: en) */
  hl?: string;
  /** Request timeout in milliseconds (default: 15000) */
  timeoutMs?: number;
}

export interface DiscoverOptions {
  focus?: PersonalizationFocus;
  currentYear?: number;
  /** Queries run per record (default: all five) */
  maxQueries?: number;
  logger?: Logger;
  metrics?: Metrics;
}

export interface DiscoveryOutcome {
  candidates: CandidateSource[];
  /** One entry per failed query */
  errors: string[];
  queriesRun: number;
}

// ============================================================================
// Constants
// ============================================================================

export const SERPER_API_URL = 'https://google.serper.dev/search';

const BUSINESS_SUFFIXES = /[\s,]+(inc|llc|ltd|corp|corporation|company|co|incorporated|limited|l\.l\.c)\.?$/i;

const SerperResponseSchema = z.object({
  organic: z
    .array(
      z.object({
        link: z.string(),
        title: z.string().default(''),
        snippet: z.string().default(''),
      })
    )
    .default([]),
});

// ============================================================================
// Serper Provider
// ============================================================================

export class SerperSearchProvider implements SearchProvider {
  private readonly config: Required<SerperConfig>;
  private readonly client: AxiosInstance;

  constructor(
    config: SerperConfig,
    private readonly logger: Logger = createConsoleLogger('search'),
    private readonly metrics: Metrics = noopMetrics,
    client?: AxiosInstance
  ) {
    this.config = { num: 10, gl: 'us', hl: 'en', timeoutMs: 15000, ...config };
    this.client = client ?? axios.create();
  }

  async search(query: string): Promise<ModuleResult<SearchHit[]>> {
    const startTime = Date.now();
    const timestamp = new Date().toISOString();
    const metadata = () => ({ runId: '', module: 'search', timestamp, duration: Date.now() - startTime });

    try {
      const response = await this.client.post<unknown>(
        SERPER_API_URL,
        { q: query, num: this.config.num, gl: this.config.gl, hl: this.config.hl },
        {
          headers: { 'X-API-KEY': this.config.apiKey, 'Content-Type': 'application/json' },
          timeout: this.config.timeoutMs,
        }
      );

      const parsed = SerperResponseSchema.safeParse(response.data);
      if (!parsed.success) {
        const errors = parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
        this.metrics.increment('search.failure', { code: 'PARSE_ERROR' });
        return {
          success: false,
          error: { code: 'SEARCH_FAILED', message: `Unexpected search response: ${errors.join('; ')}` },
          metadata: metadata(),
        };
      }

      const hits = parsed.data.organic.map((item) => ({ url: item.link, title: item.title, snippet: item.snippet }));
      this.metrics.increment('search.success');
      this.metrics.timing('search.duration', Date.now() - startTime);
      this.logger.debug('Search completed', { query, hits: hits.length });

      return { success: true, data: hits, metadata: metadata() };
    } catch (error) {
      this.metrics.increment('search.failure', { code: 'SEARCH_FAILED' });
      this.logger.warn('Search failed', { query, error: errorMessage(error) });
      return {
        success: false,
        error: { code: 'SEARCH_FAILED', message: errorMessage(error) },
        metadata: metadata(),
      };
    }
  }
}

// ============================================================================
// Query Building
// ============================================================================

/**
 * Company name without a trailing legal suffix such as "Inc." or "LLC"
 */
export function cleanCompanyName(name: string): string {
  return name.trim().replace(BUSINESS_SUFFIXES, '').trim();
}

/**
 * "City ST" from the record, or the last two address parts when both are missing
 */
export function buildLocation(record: Pick<BusinessRecord, 'city' | 'state' | 'address'>): string {
  const parts = [record.city, record.state].map((part) => part?.trim() ?? '').filter(Boolean);
  if (parts.length === 0 && record.address) {
    const addressParts = record.address.split(',').map((part) => part.trim()).filter(Boolean);
    if (addressParts.length >= 2) {
      return addressParts.slice(-2).join(' ');
    }
  }
  return parts.join(' ');
}

export function buildSearchQueries(record: BusinessRecord): SearchQuery[] {
  const name = cleanCompanyName(record.company_name);
  if (!name) {
    return [];
  }
  const location = buildLocation(record);
  const withLocation = (query: string): string => (location ? `${query} ${location}` : query);
  const state = record.state?.trim();

  return [
    { query: withLocation(`"${name}"`), purpose: 'company' },
    { query: withLocation(`"${name}" owner OR president`), purpose: 'owner' },
    {
      query: state ? `"${name}" ${state} secretary of state business filing` : `"${name}" business filing officers`,
      purpose: 'registry',
    },
    { query: `"${name}" reviews`, purpose: 'reviews' },
    { query: withLocation(`"${name}" news`), purpose: 'news' },
  ];
}

// ============================================================================
// Discovery
// ============================================================================

function dedupeHits(hits: SearchHit[]): SearchHit[] {
  const seen = new Set<string>();
  const unique: SearchHit[] = [];
  for (const hit of hits) {
    const key = normalizeUrl(hit.url);
    if (!key || seen.has(key)) continue;
    seen.add(key);
    unique.push(hit);
  }
  return unique;
}

/**
 * Collect and classify the candidate sources of one record
 *
 * The record's own website comes first, then its pre-discovered URLs. When it
 * has pre-discovered URLs no search runs.
 */
export async function discoverCandidates(
  record: BusinessRecord,
  provider: SearchProvider | null,
  options: DiscoverOptions = {}
): Promise<DiscoveryOutcome> {
  const logger = options.logger ?? createConsoleLogger('search');
  const metrics = options.metrics ?? noopMetrics;
  const hits: SearchHit[] = [];
  const errors: string[] = [];
  let queriesRun = 0;

  if (record.website) {
    const url = /^https?:\/\//i.test(record.website) ? record.website : `https://${record.website}`;
    hits.push({ url, title: record.company_name, snippet: '' });
  }
  for (const url of record.candidate_urls) {
    hits.push({ url, title: '', snippet: '' });
  }

  if (record.candidate_urls.length === 0 && provider) {
    const queries = buildSearchQueries(record).slice(0, options.maxQueries);
    for (const { query, purpose } of queries) {
      queriesRun++;
      const result = await provider.search(query);
      if (!result.success) {
        errors.push(`${result.error.code}: ${purpose}: ${result.error.message}`);
        continue;
      }
      hits.push(...result.data);
    }
  }

  const candidates = classifyCandidates(dedupeHits(hits), record.company_name, {
    focus: options.focus,
    currentYear: options.currentYear,
  });

  metrics.gauge('search.candidates', candidates.length);
  logger.debug('Candidates discovered', { recordId: record.record_id, candidates: candidates.length, queriesRun });

  return { candidates, errors, queriesRun };
}

export default {
  SerperSearchProvider,
  buildSearchQueries,
  discoverCandidates,
  cleanCompanyName,
  buildLocation,
};
