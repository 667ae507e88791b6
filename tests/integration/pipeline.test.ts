/**
 * Integration Tests for the Enrichment Pipeline
 *
 * Runs records end to end through the orchestrator with in-process page
 * fetcher, search provider and LLM executor stand-ins.
 */

import { describe, it, expect } from '@jest/globals';
import { EnrichmentOrchestrator, type OrchestratorDeps } from '../../src/orchestrator/index.js';
import { emptyMergedProfile } from '../../src/merger/index.js';
import { sleep } from '../../src/async/index.js';
import { silentLogger } from '../../src/observability/index.js';
import type { FetchOptions, PageFetcher, PageFetchResult } from '../../src/scraper/index.js';
import type { LLMCompletion, LLMExecutor, LLMRequest } from '../../src/synthesizer/index.js';
import type { BusinessRecord, EnrichmentResult, ModuleResult } from '../../src/types/index.js';

// ============================================================================
// Test Fixtures
// ============================================================================

const metadata = { runId: '', module: 'test', timestamp: '2025-01-01T00:00:00.000Z' };

const REGISTRY_TEXT = [
  'Officer/Director Detail',
  'Name & Address',
  'Title PRES',
  'DOE, JANE',
  '123 MAIN ST',
  'Date Filed: 03/15/1998',
  'Status: Active',
].join('\n');

const HOME_TEXT = 'John Carter, Owner. Serving Austin since 1985. Schedule service online today.';
const REVIEW_TEXT = 'Waited two hours for service. Staff were friendly and helpful.';

const SITE = 'https://smithmotors.com';
const REGISTRY = 'https://search.sunbiz.org/smith-motors';
const REVIEWS = 'https://www.yelp.com/biz/smith-motors';

const VALID_JSON = JSON.stringify({
  subject: 'Congrats on 40 years, Smith Motors',
  opening: 'Jane, I saw that Smith Motors has served Austin families for forty years and counting.',
  value_prop: 'We help dealers turn online shoppers into showroom visits.',
  hot_button: 'Service wait times',
  call_to_action: 'Open to a short call next week?',
});

type PageScript = string | 'hang' | { fail: string } | { throws: string };

const page = (url: string, text: string): PageFetchResult => ({
  url,
  text,
  title: '',
  contacts: { phones: ['(512) 555-0100'], emails: [] },
  links: [],
  succeeded: true,
  error: null,
});

/**
 * Serves scripted pages and tracks how many fetches run at once
 */
class ScriptedFetcher implements PageFetcher {
  readonly requested: string[] = [];
  readonly signals: AbortSignal[] = [];
  inFlight = 0;
  maxInFlight = 0;

  constructor(
    private readonly pages: Record<string, PageScript>,
    private readonly delayMs = 0
  ) {}

  async fetch(url: string, options: FetchOptions = {}): Promise<PageFetchResult> {
    this.requested.push(url);
    if (options.signal) {
      this.signals.push(options.signal);
    }
    const script = this.pages[url] ?? { fail: 'FETCH_FAILED: HTTP 404' };
    if (script === 'hang') {
      return new Promise<PageFetchResult>(() => {});
    }
    if (typeof script === 'object' && 'throws' in script) {
      throw new Error(script.throws);
    }

    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    await sleep(this.delayMs);
    this.inFlight--;

    if (typeof script === 'object') {
      return { url, text: '', title: '', contacts: { phones: [], emails: [] }, links: [], succeeded: false, error: script.fail };
    }
    return page(url, script);
  }
}

class ScriptedExecutor implements LLMExecutor {
  readonly requests: LLMRequest[] = [];

  constructor(private readonly respond: (request: LLMRequest, call: number) => ModuleResult<LLMCompletion>) {}

  async execute(request: LLMRequest): Promise<ModuleResult<LLMCompletion>> {
    this.requests.push(request);
    return this.respond(request, this.requests.length);
  }

  estimateCost(): number {
    return 0.001;
  }
}

const completion = (content: string): ModuleResult<LLMCompletion> => ({
  success: true,
  data: { content, tokens_used: 120, cost: 0.003, cached: false },
  metadata,
});

const apiError = (message: string): ModuleResult<LLMCompletion> => ({
  success: false,
  error: { code: 'LLM_API_ERROR', message },
  metadata,
});

const alwaysValid = () => new ScriptedExecutor(() => completion(VALID_JSON));

const createRecord = (overrides: Partial<BusinessRecord> = {}): BusinessRecord => ({
  record_id: 'rec_0001',
  company_name: 'Smith Motors',
  address: null,
  city: 'Austin',
  state: 'TX',
  zip_code: null,
  phone: null,
  email: null,
  website: SITE,
  contact_name: null,
  candidate_urls: [REGISTRY, REVIEWS],
  ...overrides,
});

const createOrchestrator = (overrides: Partial<OrchestratorDeps> = {}): EnrichmentOrchestrator =>
  new EnrichmentOrchestrator({
    fetcher: new ScriptedFetcher({ [SITE]: HOME_TEXT, [REGISTRY]: REGISTRY_TEXT, [REVIEWS]: REVIEW_TEXT }),
    executor: alwaysValid(),
    templates: { primary: 'PRIMARY {{context}}', simple: 'SIMPLE {{facts}}' },
    logger: silentLogger,
    now: () => new Date('2025-06-01T12:00:00.000Z'),
    ...overrides,
  });

const states = (result: EnrichmentResult) => result.state_history.map((entry) => entry.state);

// ============================================================================
// Tests
// ============================================================================

describe('Enrichment Pipeline', () => {
  describe('complete record', () => {
    it('should let the registry owner win over the website owner', async () => {
      const executor = alwaysValid();
      const result = await createOrchestrator({ executor }).enrichRecord(createRecord());

      expect(result.status).toBe('DONE');
      expect(result.merged_profile.owner_name).toBe('Jane Doe');
      expect(result.merged_profile.owner_title).toBe('President');
      expect(result.merged_profile.website).toBe(SITE);
      expect(result.generated_content.generation_path).toBe('primary');
      expect(result.generated_content.subject).toBe('Congrats on 40 years, Smith Motors');
      expect(result.errors).toEqual([]);
      expect(executor.requests[0]?.prompt.startsWith('PRIMARY ### Owner & Personnel\nOwner: Jane Doe (President)')).toBe(
        true
      );
    });

    it('should select the official source first and fetch every selected source', async () => {
      const fetcher = new ScriptedFetcher({ [SITE]: HOME_TEXT, [REGISTRY]: REGISTRY_TEXT, [REVIEWS]: REVIEW_TEXT });
      const result = await createOrchestrator({ fetcher }).enrichRecord(createRecord());

      expect(result.selected_sources).toEqual([SITE, REGISTRY, REVIEWS]);
      expect([...fetcher.requested].sort()).toEqual([REGISTRY, SITE, REVIEWS].sort());
      expect(result.merged_profile.pain_points).toContain('Waited two hours for service.');
    });

    it('should walk the record through every state', async () => {
      const result = await createOrchestrator().enrichRecord(createRecord());

      expect(states(result)).toEqual([
        'PENDING',
        'SEARCHED',
        'SELECTED',
        'FETCHED',
        'MERGED',
        'CONTEXTUALIZED',
        'GENERATED',
        'DONE',
      ]);
      expect(result.state_history[0]?.at).toBe('2025-06-01T12:00:00.000Z');
    });

    it('should produce a frozen result with usage and confidence', async () => {
      const result = await createOrchestrator().enrichRecord(createRecord());

      expect(Object.isFrozen(result)).toBe(true);
      expect(Object.isFrozen(result.generated_content)).toBe(true);
      expect(result.usage).toEqual({ tokens_used: 120, cost: 0.003, cached: false, calls: 1 });
      expect(result.confidence_score).toBeGreaterThan(0);
      expect(result.confidence_score).toBeLessThanOrEqual(1);
    });
  });

  describe('failed records', () => {
    it('should fall back to the template when nothing could be fetched', async () => {
      const executor = alwaysValid();
      const fetcher = new ScriptedFetcher({});

      const result = await createOrchestrator({ fetcher, executor }).enrichRecord(createRecord());

      expect(result.status).toBe('FAILED');
      expect(result.merged_profile).toEqual(emptyMergedProfile());
      expect(result.generated_content.generation_path).toBe('template');
      expect(result.generated_content.subject).toBe('Quick question for Smith Motors');
      expect(executor.requests).toHaveLength(0);
      expect(result.fetch_errors).toHaveLength(3);
      expect(result.fetch_errors[0]).toEqual({ url: SITE, source_type: 'official', error: 'FETCH_FAILED: HTTP 404' });
      expect(result.errors).toEqual(['NO_SOURCES_FETCHED: every selected source failed to fetch']);
    });

    it('should fail a record without any qualifying source', async () => {
      const result = await createOrchestrator().enrichRecord(createRecord({ website: null, candidate_urls: [] }));

      expect(result.status).toBe('FAILED');
      expect(result.selected_sources).toEqual([]);
      expect(result.errors).toEqual(['NO_QUALIFYING_SOURCES: no candidate qualified for fetching']);
      expect(result.generated_content.generation_path).toBe('template');
      expect(states(result)).toEqual(['PENDING', 'SEARCHED', 'SELECTED', 'FAILED']);
    });

    it('should fail the record when both prompts fail, keeping the merged profile', async () => {
      const executor = new ScriptedExecutor(() => apiError('overloaded'));

      const result = await createOrchestrator({ executor }).enrichRecord(createRecord());

      expect(result.status).toBe('FAILED');
      expect(result.merged_profile.owner_name).toBe('Jane Doe');
      expect(result.generated_content.generation_path).toBe('template');
      expect(result.errors).toEqual(['primary: LLM_API_ERROR: overloaded', 'simple: LLM_API_ERROR: overloaded']);
      expect(result.confidence_score).toBeLessThanOrEqual(0.5);
    });

    it('should report a thrown fetcher error as a failed fetch', async () => {
      const fetcher = new ScriptedFetcher({ [SITE]: { throws: 'kaboom' }, [REGISTRY]: REGISTRY_TEXT, [REVIEWS]: REVIEW_TEXT });

      const result = await createOrchestrator({ fetcher }).enrichRecord(createRecord());

      expect(result.status).toBe('DONE');
      expect(result.fetch_errors).toEqual([{ url: SITE, source_type: 'official', error: 'FETCH_FAILED: kaboom' }]);
    });
  });

  describe('fallback chain', () => {
    it('should use the simpler prompt when the primary one fails', async () => {
      const executor = new ScriptedExecutor((_, call) =>
        call === 1
          ? apiError('boom')
          : completion(['SUBJECT: Quick idea for Smith Motors', 'OPENING: Jane, congrats on forty years.', 'VALUE_PROP: We bring more buyers to the lot.'].join('\n'))
      );

      const result = await createOrchestrator({ executor }).enrichRecord(createRecord());

      expect(result.status).toBe('DONE');
      expect(result.generated_content.generation_path).toBe('simple');
      expect(result.errors).toEqual(['primary: LLM_API_ERROR: boom']);
      expect(executor.requests[1]?.prompt.startsWith('SIMPLE Owner: Jane Doe (President)')).toBe(true);
    });
  });

  describe('timeouts', () => {
    it('should abort a fetch that exceeds its own timeout', async () => {
      const fetcher = new ScriptedFetcher({ [SITE]: HOME_TEXT, [REGISTRY]: REGISTRY_TEXT, [REVIEWS]: 'hang' });

      const result = await createOrchestrator({ fetcher, settings: { perFetchTimeoutMs: 20 } }).enrichRecord(createRecord());

      expect(result.status).toBe('DONE');
      expect(result.fetch_errors).toEqual([
        { url: REVIEWS, source_type: 'review', error: 'FETCH_TIMEOUT: fetch timed out after 20ms' },
      ]);
      expect(fetcher.signals.filter((signal) => signal.aborted)).toHaveLength(1);
    });

    it('should abandon in-flight fetches at the record deadline', async () => {
      const fetcher = new ScriptedFetcher({ [SITE]: 'hang', [REGISTRY]: 'hang', [REVIEWS]: 'hang' });

      const result = await createOrchestrator({
        fetcher,
        settings: { perFetchTimeoutMs: 10000, recordTimeoutMs: 30 },
      }).enrichRecord(createRecord());

      expect(result.status).toBe('FAILED');
      expect(result.fetch_errors.map((failure) => failure.error)).toEqual([
        'FETCH_TIMEOUT: record deadline exceeded',
        'FETCH_TIMEOUT: record deadline exceeded',
        'FETCH_TIMEOUT: record deadline exceeded',
      ]);
      expect(fetcher.signals.every((signal) => signal.aborted)).toBe(true);
      expect(result.generated_content.generation_path).toBe('template');
    });
  });

  describe('context budget', () => {
    const longText = 'The showroom has plenty of room for new arrivals. '.repeat(5000);
    const longPages = { [SITE]: longText, [REVIEWS]: longText };

    it('should keep a large context within the budget and in section order', async () => {
      const executor = alwaysValid();
      const orchestrator = createOrchestrator({
        fetcher: new ScriptedFetcher(longPages),
        executor,
        settings: { maxContextChars: 80000 },
      });

      await orchestrator.enrichRecord(createRecord());
      const context = (executor.requests[0]?.prompt ?? '').slice('PRIMARY '.length);

      expect(longText.length * 2).toBeGreaterThanOrEqual(500000);
      expect(context.length).toBeLessThanOrEqual(80000);
      expect(context.indexOf('### Testimonials & Reviews')).toBeGreaterThan(-1);
      expect(context.indexOf('### Testimonials & Reviews')).toBeLessThan(context.indexOf('### Homepage Excerpt'));
    });

    it('should fill a small budget exactly', async () => {
      const executor = alwaysValid();
      const orchestrator = createOrchestrator({
        fetcher: new ScriptedFetcher(longPages),
        executor,
        settings: { maxContextChars: 5000 },
      });

      await orchestrator.enrichRecord(createRecord());

      expect(executor.requests[0]?.prompt.length).toBe('PRIMARY '.length + 5000);
    });
  });

  describe('batches', () => {
    it('should return one result per record in input order', async () => {
      const records = [
        createRecord({ record_id: 'rec_0001' }),
        createRecord({ record_id: 'rec_0002', website: null, candidate_urls: [] }),
        createRecord({ record_id: 'rec_0003' }),
      ];
      const completed: string[] = [];

      const results = await createOrchestrator({ settings: { concurrencyLimit: 2 } }).enrichRecords(records, {
        onResult: (result) => completed.push(result.record_id),
      });

      expect(results.map((result) => result.record_id)).toEqual(['rec_0001', 'rec_0002', 'rec_0003']);
      expect(results.map((result) => result.status)).toEqual(['DONE', 'FAILED', 'DONE']);
      expect([...completed].sort()).toEqual(['rec_0001', 'rec_0002', 'rec_0003']);
    });

    it('should survive a throwing result callback', async () => {
      const results = await createOrchestrator().enrichRecords([createRecord()], {
        onResult: () => {
          throw new Error('listener failed');
        },
      });

      expect(results).toHaveLength(1);
      expect(results[0]?.status).toBe('DONE');
    });

    it('should bound simultaneous fetches', async () => {
      const fetcher = new ScriptedFetcher({ [SITE]: HOME_TEXT, [REGISTRY]: REGISTRY_TEXT, [REVIEWS]: REVIEW_TEXT }, 10);
      const records = [createRecord({ record_id: 'rec_0001' }), createRecord({ record_id: 'rec_0002' })];

      await createOrchestrator({
        fetcher,
        settings: { concurrencyLimit: 1, perRecordFetchConcurrency: 2 },
      }).enrichRecords(records);

      expect(fetcher.requested).toHaveLength(6);
      expect(fetcher.maxInFlight).toBe(2);
    });
  });

  describe('search', () => {
    it('should search when the record has no candidate URLs', async () => {
      const queries: string[] = [];
      const orchestrator = createOrchestrator({
        searchProvider: {
          search: async (query: string) => {
            queries.push(query);
            return {
              success: true,
              data: query.includes('secretary') ? [{ url: REGISTRY, title: 'SMITH MOTORS INC', snippet: '' }] : [],
              metadata,
            };
          },
        },
      });

      const result = await orchestrator.enrichRecord(createRecord({ candidate_urls: [] }));

      expect(queries).toHaveLength(5);
      expect(result.selected_sources).toEqual([SITE, REGISTRY]);
      expect(result.merged_profile.owner_name).toBe('Jane Doe');
    });
  });
});
