/**
 * Enrichment Orchestrator Module
 *
 * Drives every record through the pipeline and always produces exactly one
 * frozen EnrichmentResult per record.
 *
 * States: PENDING -> SEARCHED -> SELECTED -> FETCHED -> MERGED ->
 *         CONTEXTUALIZED -> GENERATED -> DONE, with FAILED reachable from any step
 *
 * Concurrency:
 * - Records run under a shared p-limit semaphore (concurrencyLimit)
 * - A record's selected sources are fetched under a second limiter
 *   (perRecordFetchConcurrency); each fetch has its own timeout
 * - The record deadline (recordTimeoutMs) abandons in-flight fetches; merging
 *   waits for every fetch to settle, succeed, fail or time out
 *
 * A record is FAILED when no source qualifies, when no fetch succeeds, or when
 * both LLM prompts fail. Content then comes from the template path.
 *
 * Usage:
 * ```typescript
 * const orchestrator = await EnrichmentOrchestrator.fromConfig(loadConfig());
 * const results = await orchestrator.enrichRecords(records, {
 *   onResult: (result) => console.log(result.record_id, result.status),
 * });
 * ```
 */

import pLimit from 'p-limit';
import type {
  BusinessRecord,
  CandidateSource,
  EnrichmentResult,
  FetchedContent,
  FetchFailure,
  GeneratedContent,
  LLMUsage,
  MergedProfile,
  RecordState,
  StateTransition,
} from '../types/index.js';
import { resolveSettings, type EnrichmentConfig, type PipelineSettings } from '../config/index.js';
import { discoverCandidates, SerperSearchProvider, type SearchProvider } from '../search/index.js';
import { selectSources } from '../selector/index.js';
import { HttpPageFetcher, type PageFetcher, type PageFetchResult } from '../scraper/index.js';
import { emptyPartialProfile, extractFacts } from '../extractor/index.js';
import { emptyMergedProfile, mergeFacts } from '../merger/index.js';
import { prioritizeContext, renderContext } from '../prioritizer/index.js';
import {
  AnthropicExecutor,
  buildTemplateContent,
  calculateConfidence,
  emptyContent,
  generateContent,
  type GenerationOutcome,
  loadPromptTemplates,
  type LLMCompletion,
  type LLMExecutor,
  type PromptTemplates,
} from '../synthesizer/index.js';
import { ResponseCache } from '../cache/index.js';
import { errorMessage, TimeoutError, withTimeout } from '../async/index.js';
import { createConsoleLogger, noopMetrics, type Logger, type Metrics } from '../observability/index.js';

// ============================================================================
// Type Definitions
// ============================================================================

export interface OrchestratorDeps {
  fetcher: PageFetcher;
  executor: LLMExecutor;
  templates: PromptTemplates;
  /** Without a provider only record websites and candidate URLs are used */
  searchProvider?: SearchProvider | null;
  settings?: Partial<PipelineSettings>;
  logger?: Logger;
  metrics?: Metrics;
  /** Clock for timestamps and the current year (default: new Date()) */
  now?: () => Date;
}

export interface EnrichOptions {
  /** Called as each record finishes, in completion order */
  onResult?: (result: EnrichmentResult, index: number) => void;
}

interface FetchRound {
  fetched: FetchedContent[];
  failures: FetchFailure[];
}

interface RecordOutcome {
  status: EnrichmentResult['status'];
  profile: MergedProfile;
  content: GeneratedContent;
  usage: LLMUsage;
  /** Successfully fetched sources */
  fetchedCount: number;
  selected: CandidateSource[];
  fetchFailures: FetchFailure[];
  errors: string[];
}

// ============================================================================
// State Tracking
// ============================================================================

/**
 * Ordered state history of one record
 */
class RecordTracker {
  private readonly history: StateTransition[] = [];

  constructor(
    readonly recordId: string,
    private readonly now: () => Date,
    private readonly logger: Logger
  ) {
    this.transition('PENDING');
  }

  transition(state: RecordState, note?: string): void {
    this.history.push(note ? { state, at: this.now().toISOString(), note } : { state, at: this.now().toISOString() });
    this.logger.debug('Record state changed', { recordId: this.recordId, state, note });
  }

  snapshot(): readonly StateTransition[] {
    return Object.freeze(this.history.map((entry) => Object.freeze({ ...entry })));
  }
}

function failedPage(url: string, error: string): PageFetchResult {
  return { url, text: '', title: '', contacts: { phones: [], emails: [] }, links: [], succeeded: false, error };
}

function emptyUsage(): LLMUsage {
  return { tokens_used: 0, cost: 0, cached: false, calls: 0 };
}

// ============================================================================
// Orchestrator
// ============================================================================

export class EnrichmentOrchestrator {
  readonly settings: PipelineSettings;
  private readonly fetcher: PageFetcher;
  private readonly executor: LLMExecutor;
  private readonly templates: PromptTemplates;
  private readonly searchProvider: SearchProvider | null;
  private readonly logger: Logger;
  private readonly metrics: Metrics;
  private readonly now: () => Date;
  private readonly recordLimit: ReturnType<typeof pLimit>;

  constructor(deps: OrchestratorDeps) {
    this.settings = resolveSettings(deps.settings);
    this.fetcher = deps.fetcher;
    this.executor = deps.executor;
    this.templates = deps.templates;
    this.searchProvider = deps.searchProvider ?? null;
    this.logger = deps.logger ?? createConsoleLogger('orchestrator');
    this.metrics = deps.metrics ?? noopMetrics;
    this.now = deps.now ?? (() => new Date());
    this.recordLimit = pLimit(this.settings.concurrencyLimit);
  }

  /**
   * Wire the production collaborators from a loaded configuration
   */
  static async fromConfig(
    config: EnrichmentConfig,
    deps: { logger?: Logger; metrics?: Metrics; promptsDir?: string } = {}
  ): Promise<EnrichmentOrchestrator> {
    const metrics = deps.metrics ?? noopMetrics;
    const cache = new ResponseCache<LLMCompletion>({ ttlMs: config.cacheTtlMs, maxEntries: config.cacheMaxEntries });

    return new EnrichmentOrchestrator({
      fetcher: new HttpPageFetcher({ timeoutMs: config.perFetchTimeoutMs }, deps.logger, metrics),
      executor: new AnthropicExecutor(
        { apiKey: config.anthropicApiKey, model: config.anthropicModel, timeoutMs: config.llmTimeoutMs },
        { cache, logger: deps.logger, metrics }
      ),
      templates: await loadPromptTemplates(deps.promptsDir),
      searchProvider: config.serperApiKey ? new SerperSearchProvider({ apiKey: config.serperApiKey }, deps.logger, metrics) : null,
      settings: config,
      logger: deps.logger,
      metrics,
    });
  }

  /**
   * Enrich a batch. Results come back in input order.
   */
  async enrichRecords(records: readonly BusinessRecord[], options: EnrichOptions = {}): Promise<EnrichmentResult[]> {
    const startTime = Date.now();
    this.logger.info('Enrichment batch started', { records: records.length, concurrency: this.settings.concurrencyLimit });

    const results = await Promise.all(
      records.map((record, index) =>
        this.recordLimit(async () => {
          const result = await this.enrichRecord(record);
          if (options.onResult) {
            try {
              options.onResult(result, index);
            } catch (error) {
              this.logger.error('onResult callback failed', { recordId: record.record_id, error: errorMessage(error) });
            }
          }
          return result;
        })
      )
    );

    const failed = results.filter((result) => result.status === 'FAILED').length;
    this.metrics.timing('orchestrator.batch.duration', Date.now() - startTime);
    this.logger.info('Enrichment batch completed', {
      records: results.length,
      failed,
      durationMs: Date.now() - startTime,
    });

    return results;
  }

  /**
   * Enrich one record. Never throws.
   */
  async enrichRecord(record: BusinessRecord): Promise<EnrichmentResult> {
    const startTime = Date.now();
    const tracker = new RecordTracker(record.record_id, this.now, this.logger);
    const errors: string[] = [];
    let selected: CandidateSource[] = [];
    let fetchFailures: FetchFailure[] = [];

    try {
      const currentYear = this.now().getFullYear();
      const discovery = await discoverCandidates(record, this.searchProvider, {
        focus: this.settings.campaign.focus,
        currentYear,
        logger: this.logger,
        metrics: this.metrics,
      });
      errors.push(...discovery.errors);
      tracker.transition('SEARCHED', `${discovery.candidates.length} candidates`);

      selected = selectSources(discovery.candidates, this.settings.maxFetchPerRecord);
      tracker.transition('SELECTED', `${selected.length} sources`);

      if (selected.length === 0) {
        errors.push('NO_QUALIFYING_SOURCES: no candidate qualified for fetching');
        const profile = emptyMergedProfile();
        const outcome = await this.generate(record, profile, '', true);
        tracker.transition('FAILED', 'no qualifying sources');
        return this.finish(record, tracker, startTime, {
          status: 'FAILED',
          profile,
          content: outcome.content,
          usage: outcome.usage,
          fetchedCount: 0,
          selected,
          fetchFailures: [],
          errors: [...errors, ...outcome.errors],
        });
      }

      const round = await this.fetchAll(selected, currentYear);
      fetchFailures = round.failures;
      const succeeded = round.fetched.filter((item) => item.fetch_succeeded).length;
      tracker.transition('FETCHED', `${succeeded}/${selected.length} succeeded`);

      const profile = mergeFacts(round.fetched, this.logger);
      tracker.transition('MERGED');

      const context = prioritizeContext(profile, round.fetched, this.settings.maxContextChars);
      tracker.transition('CONTEXTUALIZED', `${context.total_chars} chars`);

      const outcome = await this.generate(record, profile, renderContext(context), succeeded === 0);
      errors.push(...outcome.errors);
      tracker.transition('GENERATED', outcome.content.generation_path);

      let status: EnrichmentResult['status'] = 'DONE';
      if (succeeded === 0) {
        errors.push('NO_SOURCES_FETCHED: every selected source failed to fetch');
        status = 'FAILED';
        tracker.transition('FAILED', 'no sources fetched');
      } else if (outcome.llmFailed) {
        status = 'FAILED';
        tracker.transition('FAILED', 'generation failed');
      } else {
        tracker.transition('DONE');
      }

      return this.finish(record, tracker, startTime, {
        status,
        profile,
        content: outcome.content,
        usage: outcome.usage,
        fetchedCount: succeeded,
        selected,
        fetchFailures,
        errors,
      });
    } catch (error) {
      this.logger.error('Record enrichment failed unexpectedly', { recordId: record.record_id, error: errorMessage(error) });
      this.metrics.increment('orchestrator.unexpected_error');
      errors.push(`UNEXPECTED_ERROR: ${errorMessage(error)}`);
      tracker.transition('FAILED', 'unexpected error');

      const profile = emptyMergedProfile();
      const template = buildTemplateContent(record, profile, this.settings.campaign);
      const content: GeneratedContent = template ? { ...template, generation_path: 'template' } : emptyContent();
      return this.finish(record, tracker, startTime, {
        status: 'FAILED',
        profile,
        content,
        usage: emptyUsage(),
        fetchedCount: 0,
        selected,
        fetchFailures,
        errors,
      });
    }
  }

  // ==========================================================================
  // Stages
  // ==========================================================================

  /**
   * Fetch the selected sources. Resolves once every fetch has settled.
   */
  private async fetchAll(selected: CandidateSource[], currentYear: number): Promise<FetchRound> {
    const limit = pLimit(this.settings.perRecordFetchConcurrency);
    const deadline = new AbortController();
    const timer = setTimeout(() => deadline.abort(), this.settings.recordTimeoutMs);

    try {
      const fetched = await Promise.all(
        selected.map((source) => limit(() => this.fetchOne(source, deadline.signal, currentYear)))
      );
      const failures: FetchFailure[] = fetched
        .filter((item) => !item.fetch_succeeded)
        .map((item) => ({ url: item.source.url, source_type: item.source.source_type, error: item.error ?? 'FETCH_FAILED' }));
      return { fetched, failures };
    } finally {
      clearTimeout(timer);
    }
  }

  private async fetchOne(source: CandidateSource, deadline: AbortSignal, currentYear: number): Promise<FetchedContent> {
    const page = await this.fetchPage(source.url, deadline);
    this.metrics.increment('orchestrator.fetch', { outcome: page.succeeded ? 'success' : 'failure' });

    if (!page.succeeded) {
      return {
        source,
        raw_text: '',
        extracted_facts: emptyPartialProfile(source),
        fetch_succeeded: false,
        error: page.error ?? 'FETCH_FAILED',
      };
    }

    return {
      source,
      raw_text: page.text,
      extracted_facts: extractFacts(
        source,
        { text: page.text, title: page.title, contacts: page.contacts, links: page.links },
        { currentYear }
      ),
      fetch_succeeded: true,
      error: null,
    };
  }

  /**
   * One page fetch bounded by the per-fetch timeout and the record deadline
   */
  private async fetchPage(url: string, deadline: AbortSignal): Promise<PageFetchResult> {
    if (deadline.aborted) {
      return failedPage(url, 'FETCH_TIMEOUT: record deadline exceeded');
    }

    const controller = new AbortController();
    let onDeadline: () => void = () => {};
    const abandoned = new Promise<PageFetchResult>((resolve) => {
      onDeadline = () => {
        controller.abort();
        resolve(failedPage(url, 'FETCH_TIMEOUT: record deadline exceeded'));
      };
      deadline.addEventListener('abort', onDeadline, { once: true });
    });

    const timeoutMs = this.settings.perFetchTimeoutMs;
    try {
      return await withTimeout(
        Promise.race([this.fetcher.fetch(url, { timeoutMs, signal: controller.signal }), abandoned]),
        timeoutMs,
        'fetch',
        () => controller.abort()
      );
    } catch (error) {
      if (error instanceof TimeoutError) {
        return failedPage(url, `FETCH_TIMEOUT: ${error.message}`);
      }
      return failedPage(url, `FETCH_FAILED: ${errorMessage(error)}`);
    } finally {
      deadline.removeEventListener('abort', onDeadline);
    }
  }

  private generate(
    record: BusinessRecord,
    profile: MergedProfile,
    context: string,
    skipLlm: boolean
  ): Promise<GenerationOutcome> {
    return generateContent({ record, profile, context, campaign: this.settings.campaign }, this.executor, {
      templates: this.templates,
      maxCostPerRecord: this.settings.maxCostPerRecord,
      llmTimeoutMs: this.settings.llmTimeoutMs,
      skipLlm,
      logger: this.logger,
      metrics: this.metrics,
    });
  }

  private finish(record: BusinessRecord, tracker: RecordTracker, startTime: number, outcome: RecordOutcome): EnrichmentResult {
    const { status, profile, content, usage, fetchedCount, selected, fetchFailures, errors } = outcome;
    const durationMs = Date.now() - startTime;
    this.metrics.timing('orchestrator.record.duration', durationMs, { status });
    this.metrics.increment('orchestrator.record', { status, path: content.generation_path });
    this.logger.info('Record enriched', {
      recordId: record.record_id,
      status,
      path: content.generation_path,
      sources: selected.length,
      fetched: fetchedCount,
      durationMs,
    });

    return Object.freeze({
      record_id: record.record_id,
      status,
      merged_profile: profile,
      generated_content: Object.freeze({ ...content }),
      confidence_score: calculateConfidence(profile, content, fetchedCount),
      selected_sources: Object.freeze(selected.map((source) => source.url)),
      fetch_errors: Object.freeze(fetchFailures.map((failure) => Object.freeze({ ...failure }))),
      errors: Object.freeze([...errors]),
      usage: Object.freeze({ ...usage }),
      state_history: tracker.snapshot(),
    });
  }
}

export default {
  EnrichmentOrchestrator,
};
