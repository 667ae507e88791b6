/**
 * Configuration Module
 *
 * Loads pipeline settings from environment variables and validates them with
 * zod. The only pipeline-fatal error in the system lives here: without LLM
 * credentials no record can be enriched, so loading fails up front instead of
 * every record failing later.
 *
 * Environment variables:
 * - ANTHROPIC_API_KEY (required), ANTHROPIC_MODEL
 * - SERPER_API_KEY (optional, enables web search)
 * - MAX_FETCH_PER_RECORD, MAX_CONTEXT_CHARS, CONCURRENCY_LIMIT,
 *   PER_RECORD_FETCH_CONCURRENCY
 * - PER_FETCH_TIMEOUT_SECONDS, LLM_TIMEOUT_SECONDS, RECORD_TIMEOUT_SECONDS
 * - PERSONALIZATION_FOCUS, MAX_COST_PER_RECORD
 * - CACHE_TTL_SECONDS, CACHE_MAX_ENTRIES
 * - CAMPAIGN_GOAL, CAMPAIGN_VALUE_PROPOSITION, CAMPAIGN_SENDER_NAME, CAMPAIGN_INDUSTRY
 * - S3_BUCKET, S3_PREFIX, AWS_REGION
 *
 * Usage:
 * ```typescript
 * const config = loadConfig();
 * const orchestrator = new EnrichmentOrchestrator({ settings: config, ... });
 * ```
 */

import { z } from 'zod';
import type { PersonalizationFocus } from '../types/index.js';

// ============================================================================
// Type Definitions
// ============================================================================

/**
 * Campaign framing handed to content generation
 */
export interface CampaignContext {
  goal: string;
  valueProposition: string;
  senderName: string;
  industry: string;
  focus: PersonalizationFocus;
}

/**
 * Budgets and limits that shape a pipeline run (no credentials)
 */
export interface PipelineSettings {
  /** Maximum sources fetched per record (default: 8) */
  maxFetchPerRecord: number;
  /** Character budget of the LLM context (default: 80000) */
  maxContextChars: number;
  /** Records processed at the same time (default: 3) */
  concurrencyLimit: number;
  /** Simultaneous fetches within one record (default: 3) */
  perRecordFetchConcurrency: number;
  /** Timeout for a single page fetch (default: 20000) */
  perFetchTimeoutMs: number;
  /** Timeout for a single LLM call (default: 45000) */
  llmTimeoutMs: number;
  /** Overall fetch budget per record (default: 120000) */
  recordTimeoutMs: number;
  /** Estimated USD cost above which the primary prompt is skipped (default: 0.1) */
  maxCostPerRecord: number;
  campaign: CampaignContext;
}

export interface EnrichmentConfig extends PipelineSettings {
  anthropicApiKey: string;
  anthropicModel: string;
  serperApiKey: string | null;
  cacheTtlMs: number;
  cacheMaxEntries: number;
  storage: {
    bucket: string | null;
    prefix: string;
    region: string;
  };
}

/**
 * Raised when the environment cannot produce a usable configuration
 */
export class ConfigurationError extends Error {
  readonly code = 'CONFIG_ERROR';

  constructor(
    message: string,
    readonly issues: string[]
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

// ============================================================================
// Constants
// ============================================================================

export const PERSONALIZATION_FOCUSES = [
  'recent_activity',
  'pain_points',
  'achievements',
  'growth',
  'leadership',
  'culture',
] as const satisfies readonly PersonalizationFocus[];

export const DEFAULT_MODEL = 'claude-sonnet-4-20250514';

export const DEFAULT_CAMPAIGN: CampaignContext = {
  goal: 'book a short introductory call',
  valueProposition: 'modern digital marketing that brings more qualified buyers to the lot',
  senderName: 'Alex',
  industry: 'automotive retail',
  focus: 'recent_activity',
};

export const DEFAULT_PIPELINE_SETTINGS: PipelineSettings = {
  maxFetchPerRecord: 8,
  maxContextChars: 80000,
  concurrencyLimit: 3,
  perRecordFetchConcurrency: 3,
  perFetchTimeoutMs: 20000,
  llmTimeoutMs: 45000,
  recordTimeoutMs: 120000,
  maxCostPerRecord: 0.1,
  campaign: DEFAULT_CAMPAIGN,
};

// ============================================================================
// Schema
// ============================================================================

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const EnvSchema = z.object({
  ANTHROPIC_API_KEY: z
    .string({ required_error: 'is required' })
    .min(1, 'is required'),
  ANTHROPIC_MODEL: z.string().default(DEFAULT_MODEL),
  SERPER_API_KEY: z.string().optional(),
  MAX_FETCH_PER_RECORD: positiveInt(DEFAULT_PIPELINE_SETTINGS.maxFetchPerRecord),
  MAX_CONTEXT_CHARS: positiveInt(DEFAULT_PIPELINE_SETTINGS.maxContextChars),
  CONCURRENCY_LIMIT: positiveInt(DEFAULT_PIPELINE_SETTINGS.concurrencyLimit),
  PER_RECORD_FETCH_CONCURRENCY: positiveInt(DEFAULT_PIPELINE_SETTINGS.perRecordFetchConcurrency),
  PER_FETCH_TIMEOUT_SECONDS: positiveInt(20),
  LLM_TIMEOUT_SECONDS: positiveInt(45),
  RECORD_TIMEOUT_SECONDS: positiveInt(120),
  PERSONALIZATION_FOCUS: z.enum(PERSONALIZATION_FOCUSES).default(DEFAULT_CAMPAIGN.focus),
  MAX_COST_PER_RECORD: z.coerce.number().nonnegative().default(DEFAULT_PIPELINE_SETTINGS.maxCostPerRecord),
  CACHE_TTL_SECONDS: positiveInt(3600),
  CACHE_MAX_ENTRIES: positiveInt(500),
  CAMPAIGN_GOAL: z.string().default(DEFAULT_CAMPAIGN.goal),
  CAMPAIGN_VALUE_PROPOSITION: z.string().default(DEFAULT_CAMPAIGN.valueProposition),
  CAMPAIGN_SENDER_NAME: z.string().default(DEFAULT_CAMPAIGN.senderName),
  CAMPAIGN_INDUSTRY: z.string().default(DEFAULT_CAMPAIGN.industry),
  S3_BUCKET: z.string().optional(),
  S3_PREFIX: z.string().default('enrichment-runs'),
  AWS_REGION: z.string().default('us-east-1'),
});

// ============================================================================
// Core Functions
// ============================================================================

/**
 * Drop blank values so that defaults apply to `FOO=` the same as to an unset FOO
 */
function withoutBlanks(env: Record<string, string | undefined>): Record<string, string> {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      cleaned[key] = value.trim();
    }
  }
  return cleaned;
}

/**
 * Load and validate configuration
 *
 * @param env - Environment variables (default: process.env)
 * @throws ConfigurationError listing every invalid variable
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): EnrichmentConfig {
  const parsed = EnvSchema.safeParse(withoutBlanks(env));

  if (!parsed.success) {
    const issues = parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`, issues);
  }

  const vars = parsed.data;

  return Object.freeze({
    anthropicApiKey: vars.ANTHROPIC_API_KEY,
    anthropicModel: vars.ANTHROPIC_MODEL,
    serperApiKey: vars.SERPER_API_KEY ?? null,
    maxFetchPerRecord: vars.MAX_FETCH_PER_RECORD,
    maxContextChars: vars.MAX_CONTEXT_CHARS,
    concurrencyLimit: vars.CONCURRENCY_LIMIT,
    perRecordFetchConcurrency: vars.PER_RECORD_FETCH_CONCURRENCY,
    perFetchTimeoutMs: vars.PER_FETCH_TIMEOUT_SECONDS * 1000,
    llmTimeoutMs: vars.LLM_TIMEOUT_SECONDS * 1000,
    recordTimeoutMs: vars.RECORD_TIMEOUT_SECONDS * 1000,
    maxCostPerRecord: vars.MAX_COST_PER_RECORD,
    cacheTtlMs: vars.CACHE_TTL_SECONDS * 1000,
    cacheMaxEntries: vars.CACHE_MAX_ENTRIES,
    campaign: Object.freeze({
      goal: vars.CAMPAIGN_GOAL,
      valueProposition: vars.CAMPAIGN_VALUE_PROPOSITION,
      senderName: vars.CAMPAIGN_SENDER_NAME,
      industry: vars.CAMPAIGN_INDUSTRY,
      focus: vars.PERSONALIZATION_FOCUS,
    }),
    storage: Object.freeze({
      bucket: vars.S3_BUCKET ?? null,
      prefix: vars.S3_PREFIX,
      region: vars.AWS_REGION,
    }),
  });
}

/**
 * Fill unspecified settings with defaults
 */
export function resolveSettings(settings: Partial<PipelineSettings> = {}): PipelineSettings {
  return {
    ...DEFAULT_PIPELINE_SETTINGS,
    ...settings,
    campaign: { ...DEFAULT_CAMPAIGN, ...settings.campaign },
  };
}

export default {
  loadConfig,
  resolveSettings,
  ConfigurationError,
  DEFAULT_PIPELINE_SETTINGS,
  DEFAULT_CAMPAIGN,
};
