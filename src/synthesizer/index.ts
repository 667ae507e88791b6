/**
 * Synthesizer Module
 *
 * Turns a record's merged profile and prioritized context into outreach
 * content through an LLM, falling back step by step when the model fails.
 *
 * Features:
 * - LLMExecutor collaborator interface; AnthropicExecutor backed by @anthropic-ai/sdk
 * - Rate-limit retry with backoff, per-model cost estimate, explicit ResponseCache
 * - Prompt templates loaded from prompts/*.md with {{variable}} substitution
 * - JSON (zod) or line-format response parsing, then content validation
 * - Fallback chain: primary prompt -> simpler prompt -> template -> empty content
 * - Cost policy: a primary prompt estimated above maxCostPerRecord is skipped
 *
 * Usage:
 * ```typescript
 * const executor = new AnthropicExecutor({ apiKey, model }, { cache });
 * const templates = await loadPromptTemplates();
 * const outcome = await generateContent({ record, profile, context, campaign }, executor, {
 *   templates,
 *   maxCostPerRecord: 0.1,
 *   llmTimeoutMs: 45000,
 * });
 * ```
 */

import Anthropic from '@anthropic-ai/sdk';
import { z } from 'zod';
import { readFile } from 'fs/promises';
import { join } from 'path';
import type {
  BusinessRecord,
  GeneratedContent,
  GenerationPath,
  LLMUsage,
  MergedProfile,
  ModuleError,
  ModuleResult,
} from '../types/index.js';
import type { CampaignContext } from '../config/index.js';
import { ConfigurationError, DEFAULT_MODEL } from '../config/index.js';
import { ResponseCache } from '../cache/index.js';
import { formatProfile } from '../prioritizer/index.js';
import { validateContent, type DraftContent } from '../validator/index.js';
import { sleep, withTimeout, errorMessage, TimeoutError } from '../async/index.js';
import { createConsoleLogger, noopMetrics, type Logger, type Metrics } from '../observability/index.js';

// ============================================================================
// Type Definitions
// ============================================================================

export interface LLMRequest {
  prompt: string;
  maxTokens: number;
  temperature: number;
  system?: string;
}

export interface LLMCompletion {
  content: string;
  tokens_used: number;
  /** USD */
  cost: number;
  cached: boolean;
}

export interface ExecuteOptions {
  signal?: AbortSignal;
}

/**
 * Content-generation collaborator. Provider errors come back as failed
 * results; execute never throws for them.
 */
export interface LLMExecutor {
  execute(request: LLMRequest, options?: ExecuteOptions): Promise<ModuleResult<LLMCompletion>>;
  /** Estimated USD cost of a request, used by the cost policy */
  estimateCost(request: LLMRequest): number;
}

/**
 * Configuration for the Anthropic executor
 */
export interface AnthropicExecutorConfig {
  /** Anthropic API key (from ANTHROPIC_API_KEY) */
  apiKey: string;
  /** Model ID (default: claude-sonnet-4-20250514) */
  model?: string;
  /** Request timeout in milliseconds (default: 45000) */
  timeoutMs?: number;
  /** Backoff delays for rate-limited calls (default: RATE_LIMIT_DELAYS_MS) */
  rateLimitDelaysMs?: readonly number[];
}

export interface AnthropicExecutorDeps {
  cache?: ResponseCache<LLMCompletion>;
  logger?: Logger;
  metrics?: Metrics;
  client?: Anthropic;
}

export interface PromptTemplates {
  primary: string;
  simple: string;
}

export interface GenerationInput {
  record: BusinessRecord;
  profile: MergedProfile;
  /** Rendered prioritized context */
  context: string;
  campaign: CampaignContext;
}

export interface GenerationOptions {
  templates: PromptTemplates;
  maxCostPerRecord: number;
  llmTimeoutMs: number;
  /** Go straight to the template (nothing was fetched to write from) */
  skipLlm?: boolean;
  maxTokens?: number;
  temperature?: number;
  logger?: Logger;
  metrics?: Metrics;
}

export interface GenerationOutcome {
  content: GeneratedContent;
  usage: LLMUsage;
  /** One entry per failed LLM attempt, `path: CODE: message` */
  errors: string[];
  /** True when the LLM was tried and neither prompt produced usable content */
  llmFailed: boolean;
}

export type ParseResult = { success: true; data: DraftContent } | { success: false; error: ModuleError };

interface ModelPrice {
  /** USD per million input tokens */
  input: number;
  /** USD per million output tokens */
  output: number;
}

// ============================================================================
// Constants
// ============================================================================

const DEFAULT_MAX_TOKENS = 600;
const DEFAULT_TEMPERATURE = 0.7;
const DEFAULT_TIMEOUT = 45000;

/** Exponential backoff delays for rate limit handling */
export const RATE_LIMIT_DELAYS_MS: readonly number[] = [1000, 2000, 4000, 8000, 16000];

/** Matched by model-id prefix; unknown models are priced as Sonnet */
export const MODEL_PRICING: Readonly<Record<string, ModelPrice>> = {
  'claude-opus-4': { input: 15, output: 75 },
  'claude-sonnet-4': { input: 3, output: 15 },
  'claude-3-7-sonnet': { input: 3, output: 15 },
  'claude-3-5-sonnet': { input: 3, output: 15 },
  'claude-3-5-haiku': { input: 0.8, output: 4 },
  'claude-3-haiku': { input: 0.25, output: 1.25 },
};

const FALLBACK_PRICE: ModelPrice = { input: 3, output: 15 };

export const PROMPTS_DIR = join(__dirname, '..', '..', 'prompts');

export const PROMPT_FILES: Readonly<Record<keyof PromptTemplates, string>> = {
  primary: 'outreach-primary.md',
  simple: 'outreach-simple.md',
};

const SYSTEM_PROMPT =
  'You write concise, specific B2B outreach for small business owners. Use only facts given in the prompt and follow the requested output format exactly.';

const DEFAULT_HOT_BUTTON = 'Turning more online shoppers into showroom visits';
const TEMPLATE_CALL_TO_ACTION = 'Would you be open to a short call next week?';

/** Confidence multiplier per generation path */
export const PATH_WEIGHTS: Readonly<Record<GenerationPath, number>> = {
  primary: 1,
  simple: 0.85,
  template: 0.5,
  none: 0,
};

// ============================================================================
// Cost Estimation
// ============================================================================

export function priceFor(model: string): ModelPrice {
  const prefix = Object.keys(MODEL_PRICING).find((key) => model.startsWith(key));
  return prefix ? MODEL_PRICING[prefix] : FALLBACK_PRICE;
}

/**
 * Rough token count, about four characters per token
 */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}

export function estimateCost(model: string, inputTokens: number, outputTokens: number): number {
  const price = priceFor(model);
  return (inputTokens * price.input + outputTokens * price.output) / 1_000_000;
}

// ============================================================================
// Anthropic Executor
// ============================================================================

function isRateLimited(error: unknown): boolean {
  if (error instanceof Anthropic.APIError && (error.status === 429 || error.status === 529)) {
    return true;
  }
  const message = errorMessage(error);
  return message.includes('rate_limit') || message.includes('overloaded');
}

export class AnthropicExecutor implements LLMExecutor {
  readonly model: string;
  private readonly apiKey: string;
  private readonly timeoutMs: number;
  private readonly rateLimitDelaysMs: readonly number[];
  private readonly cache: ResponseCache<LLMCompletion> | null;
  private readonly logger: Logger;
  private readonly metrics: Metrics;
  private client: Anthropic | null;

  constructor(config: AnthropicExecutorConfig, deps: AnthropicExecutorDeps = {}) {
    this.apiKey = config.apiKey;
    this.model = config.model || DEFAULT_MODEL;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT;
    this.rateLimitDelaysMs = config.rateLimitDelaysMs ?? RATE_LIMIT_DELAYS_MS;
    this.cache = deps.cache ?? null;
    this.logger = deps.logger ?? createConsoleLogger('synthesizer');
    this.metrics = deps.metrics ?? noopMetrics;
    this.client = deps.client ?? null;
  }

  estimateCost(request: LLMRequest): number {
    const inputTokens = estimateTokens(request.prompt) + estimateTokens(request.system ?? '');
    return estimateCost(this.model, inputTokens, request.maxTokens);
  }

  cacheKey(request: LLMRequest): string {
    return ResponseCache.key('messages.create', {
      model: this.model,
      prompt: request.prompt,
      system: request.system ?? null,
      maxTokens: request.maxTokens,
      temperature: request.temperature,
    });
  }

  async execute(request: LLMRequest, options: ExecuteOptions = {}): Promise<ModuleResult<LLMCompletion>> {
    const startTime = Date.now();
    const timestamp = new Date().toISOString();
    const metadata = () => ({ runId: '', module: 'synthesizer', timestamp, duration: Date.now() - startTime });

    if (!this.apiKey) {
      return {
        success: false,
        error: { code: 'CONFIG_ERROR', message: 'ANTHROPIC_API_KEY is required' },
        metadata: metadata(),
      };
    }

    const key = this.cacheKey(request);
    const hit = this.cache?.get(key);
    if (hit) {
      this.cache?.recordSavings(hit.cost);
      this.metrics.increment('synthesizer.llm.cache_hit', { model: this.model });
      this.logger.debug('LLM response served from cache', { model: this.model });
      return {
        success: true,
        data: { content: hit.content, tokens_used: hit.tokens_used, cost: 0, cached: true },
        metadata: metadata(),
      };
    }

    this.client ??= new Anthropic({ apiKey: this.apiKey, timeout: this.timeoutMs, maxRetries: 0 });
    const client = this.client;

    this.logger.info('Calling Claude API', {
      model: this.model,
      maxTokens: request.maxTokens,
      temperature: request.temperature,
      promptLength: request.prompt.length,
    });
    this.metrics.increment('synthesizer.llm.calls', { model: this.model });

    let lastError: unknown = null;

    for (let attempt = 0; attempt <= this.rateLimitDelaysMs.length; attempt++) {
      if (options.signal?.aborted) {
        lastError = new Error('request aborted');
        break;
      }
      try {
        const response = await client.messages.create(
          {
            model: this.model,
            max_tokens: request.maxTokens,
            temperature: request.temperature,
            ...(request.system ? { system: request.system } : {}),
            messages: [{ role: 'user', content: request.prompt }],
          },
          { signal: options.signal }
        );

        const textBlock = response.content.find((block) => block.type === 'text');
        const text = textBlock && textBlock.type === 'text' ? textBlock.text.trim() : '';
        if (!text) {
          this.metrics.increment('synthesizer.llm.empty', { model: this.model });
          return {
            success: false,
            error: { code: 'LLM_EMPTY_RESPONSE', message: 'No text content in Claude response' },
            metadata: metadata(),
          };
        }

        const inputTokens = response.usage.input_tokens;
        const outputTokens = response.usage.output_tokens;
        const completion: LLMCompletion = {
          content: text,
          tokens_used: inputTokens + outputTokens,
          cost: estimateCost(this.model, inputTokens, outputTokens),
          cached: false,
        };

        this.logger.info('Claude API response received', {
          model: this.model,
          inputTokens,
          outputTokens,
          stopReason: response.stop_reason,
        });
        this.metrics.timing('synthesizer.llm.duration', Date.now() - startTime, { model: this.model });
        this.metrics.gauge('synthesizer.llm.tokens', completion.tokens_used, { model: this.model });

        this.cache?.set(key, completion);
        return { success: true, data: completion, metadata: metadata() };
      } catch (error) {
        lastError = error;
        const delay = this.rateLimitDelaysMs[attempt];
        if (isRateLimited(error) && delay !== undefined) {
          this.logger.warn(`Rate limited, retrying in ${delay}ms`, { attempt: attempt + 1, error: errorMessage(error) });
          this.metrics.increment('synthesizer.llm.rate_limit', { model: this.model });
          await sleep(delay);
          continue;
        }
        break;
      }
    }

    this.logger.error('Claude API call failed', { error: errorMessage(lastError) });
    this.metrics.increment('synthesizer.llm.errors', { model: this.model });

    return {
      success: false,
      error: { code: 'LLM_API_ERROR', message: errorMessage(lastError), details: lastError },
      metadata: metadata(),
    };
  }
}

// ============================================================================
// Prompts
// ============================================================================

/**
 * Load both outreach templates
 *
 * @throws ConfigurationError when a template file is missing
 */
export async function loadPromptTemplates(dir: string = PROMPTS_DIR): Promise<PromptTemplates> {
  const load = async (fileName: string): Promise<string> => {
    const path = join(dir, fileName);
    try {
      return await readFile(path, 'utf-8');
    } catch (error) {
      throw new ConfigurationError(`Failed to load prompt template: ${path}`, [`${path}: ${errorMessage(error)}`]);
    }
  };
  const [primary, simple] = await Promise.all([load(PROMPT_FILES.primary), load(PROMPT_FILES.simple)]);
  return { primary, simple };
}

/**
 * Replace every {{name}} with its variable; unknown names become empty
 */
export function compilePrompt(template: string, variables: Readonly<Record<string, string>>): string {
  return template.replace(/\{\{(\w+)\}\}/g, (_, name: string) => variables[name] ?? '');
}

function locationOf(record: BusinessRecord): string {
  return [record.city, record.state].filter((part): part is string => Boolean(part?.trim())).join(', ') || 'location unknown';
}

export function buildPromptVariables(input: GenerationInput): Record<string, string> {
  const { record, profile, campaign } = input;
  return {
    company_name: record.company_name,
    location: locationOf(record),
    owner_name: profile.owner_name
      ? `${profile.owner_name} (${profile.owner_title ?? 'Owner'})`
      : record.contact_name || 'Unknown',
    context: input.context || 'No research was gathered for this business.',
    facts: formatProfile(profile) || 'No verified facts were found.',
    campaign_goal: campaign.goal,
    value_proposition: campaign.valueProposition,
    sender_name: campaign.senderName,
    industry: campaign.industry,
    focus: campaign.focus.replace(/_/g, ' '),
  };
}

// ============================================================================
// Response Parsing
// ============================================================================

const DraftContentSchema = z.object({
  subject: z.string().trim().min(1, 'is required'),
  opening: z.string().trim().min(1, 'is required'),
  value_prop: z.string().trim().min(1, 'is required'),
  hot_button: z.string().trim().default(''),
  call_to_action: z.string().trim().default(''),
});

const LINE_FIELDS: Readonly<Record<string, keyof DraftContent>> = {
  SUBJECT: 'subject',
  OPENING: 'opening',
  ICEBREAKER: 'opening',
  VALUE_PROP: 'value_prop',
  VALUE_PROPOSITION: 'value_prop',
  HOT_BUTTON: 'hot_button',
  CTA: 'call_to_action',
  CALL_TO_ACTION: 'call_to_action',
};

const LINE_PATTERN = /^\s*\**([A-Z_]+?)(?:_\d+)?\**\s*:\s*(.+)$/i;

/**
 * Remove a surrounding markdown code fence, if any
 */
export function stripCodeFences(text: string): string {
  const trimmed = text.trim();
  const fenced = /^```[a-zA-Z]*\s*\n?([\s\S]*?)\n?```$/.exec(trimmed);
  return fenced ? fenced[1].trim() : trimmed;
}

function validateDraft(candidate: unknown): ParseResult {
  const parsed = DraftContentSchema.safeParse(candidate);
  if (!parsed.success) {
    const errors = parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    return {
      success: false,
      error: { code: 'PARSE_ERROR', message: `Response failed schema validation: ${errors.join('; ')}`, details: errors },
    };
  }
  return { success: true, data: parsed.data };
}

/**
 * Parse `SUBJECT: ...` style lines; the first value of each field wins
 */
export function parseLineFormat(text: string): Partial<DraftContent> {
  const fields: Partial<DraftContent> = {};
  for (const line of text.split('\n')) {
    const match = LINE_PATTERN.exec(line);
    if (!match) continue;
    const field = LINE_FIELDS[match[1].toUpperCase()];
    if (field && fields[field] === undefined) {
      fields[field] = match[2].trim();
    }
  }
  return fields;
}

/**
 * Parse an LLM response into draft content
 */
export function parseGeneratedContent(response: string): ParseResult {
  const cleaned = stripCodeFences(response);
  if (!cleaned) {
    return { success: false, error: { code: 'LLM_EMPTY_RESPONSE', message: 'Response is empty' } };
  }

  if (cleaned.startsWith('{')) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(cleaned);
    } catch (parseError) {
      return {
        success: false,
        error: {
          code: 'PARSE_ERROR',
          message: 'Failed to parse response as JSON',
          details: { parseError: errorMessage(parseError), responsePreview: cleaned.substring(0, 200) },
        },
      };
    }
    return validateDraft(parsed);
  }

  const fields = parseLineFormat(cleaned);
  if (Object.keys(fields).length === 0) {
    return {
      success: false,
      error: { code: 'PARSE_ERROR', message: 'Response is neither JSON nor the line format' },
    };
  }
  return validateDraft(fields);
}

// ============================================================================
// Fallbacks
// ============================================================================

/**
 * Deterministic content built from the record alone; null without a company name
 */
export function buildTemplateContent(
  record: BusinessRecord,
  profile: MergedProfile,
  campaign: CampaignContext
): DraftContent | null {
  const company = record.company_name.trim();
  if (!company) {
    return null;
  }
  const firstName = profile.owner_name?.trim().split(/\s+/)[0] ?? null;

  return {
    subject: `Quick question for ${company}`,
    opening: firstName
      ? `Hi ${firstName}, I've been researching ${company} and noticed some opportunities.`
      : `I've been researching ${company} and noticed some opportunities.`,
    value_prop: `We help ${campaign.industry} businesses with ${campaign.valueProposition}.`,
    hot_button: profile.pain_points[0] ?? DEFAULT_HOT_BUTTON,
    call_to_action: TEMPLATE_CALL_TO_ACTION,
  };
}

export function emptyContent(): GeneratedContent {
  return {
    subject: '',
    opening: '',
    value_prop: '',
    hot_button: '',
    call_to_action: '',
    generation_path: 'none',
  };
}

// ============================================================================
// Generation
// ============================================================================

/**
 * Run the fallback chain for one record. Never throws.
 */
export async function generateContent(
  input: GenerationInput,
  executor: LLMExecutor,
  options: GenerationOptions
): Promise<GenerationOutcome> {
  const logger = options.logger ?? createConsoleLogger('synthesizer');
  const metrics = options.metrics ?? noopMetrics;
  const usage: LLMUsage = { tokens_used: 0, cost: 0, cached: false, calls: 0 };
  const errors: string[] = [];
  const variables = buildPromptVariables(input);
  const recordId = input.record.record_id;

  const finish = (draft: DraftContent | null, path: GenerationPath, llmFailed: boolean): GenerationOutcome => {
    metrics.increment('synthesizer.generation', { path });
    return {
      content: draft ? { ...draft, generation_path: path } : emptyContent(),
      usage,
      errors,
      llmFailed,
    };
  };

  const attempt = async (path: 'primary' | 'simple', prompt: string): Promise<DraftContent | null> => {
    const request: LLMRequest = {
      prompt,
      maxTokens: options.maxTokens ?? DEFAULT_MAX_TOKENS,
      temperature: options.temperature ?? DEFAULT_TEMPERATURE,
      system: SYSTEM_PROMPT,
    };
    usage.calls++;

    const controller = new AbortController();
    let result: ModuleResult<LLMCompletion>;
    try {
      result = await withTimeout(
        executor.execute(request, { signal: controller.signal }),
        options.llmTimeoutMs,
        'llm',
        () => controller.abort()
      );
    } catch (error) {
      const code = error instanceof TimeoutError ? 'LLM_TIMEOUT' : 'LLM_API_ERROR';
      errors.push(`${path}: ${code}: ${errorMessage(error)}`);
      logger.warn('LLM call failed', { recordId, path, code });
      return null;
    }

    if (!result.success) {
      errors.push(`${path}: ${result.error.code}: ${result.error.message}`);
      logger.warn('LLM call failed', { recordId, path, code: result.error.code });
      return null;
    }

    usage.tokens_used += result.data.tokens_used;
    usage.cost += result.data.cost;
    usage.cached = usage.cached || result.data.cached;

    const parsed = parseGeneratedContent(result.data.content);
    if (!parsed.success) {
      errors.push(`${path}: ${parsed.error.code}: ${parsed.error.message}`);
      logger.warn('LLM response could not be parsed', { recordId, path });
      return null;
    }

    const validation = validateContent(parsed.data, { record: input.record, ownerName: input.profile.owner_name });
    if (!validation.valid) {
      errors.push(`${path}: INVALID_CONTENT: ${validation.errors.map((e) => e.message).join('; ')}`);
      logger.warn('LLM content failed validation', { recordId, path, errors: validation.errors.length });
      return null;
    }

    logger.debug('LLM content accepted', { recordId, path, qualityScore: validation.qualityScore });
    return parsed.data;
  };

  if (!options.skipLlm) {
    const primaryPrompt = compilePrompt(options.templates.primary, variables);
    const estimated = executor.estimateCost({
      prompt: primaryPrompt,
      maxTokens: options.maxTokens ?? DEFAULT_MAX_TOKENS,
      temperature: options.temperature ?? DEFAULT_TEMPERATURE,
      system: SYSTEM_PROMPT,
    });

    if (estimated > options.maxCostPerRecord) {
      logger.info('Primary prompt skipped by cost policy', {
        recordId,
        estimatedCost: estimated,
        maxCostPerRecord: options.maxCostPerRecord,
      });
      metrics.increment('synthesizer.cost_policy_skip');
    } else {
      const primary = await attempt('primary', primaryPrompt);
      if (primary) {
        return finish(primary, 'primary', false);
      }
    }

    const simple = await attempt('simple', compilePrompt(options.templates.simple, variables));
    if (simple) {
      return finish(simple, 'simple', false);
    }
  }

  const llmFailed = !options.skipLlm;
  const template = buildTemplateContent(input.record, input.profile, input.campaign);
  if (template) {
    return finish(template, 'template', llmFailed);
  }
  return finish(null, 'none', llmFailed);
}

// ============================================================================
// Confidence
// ============================================================================

/**
 * Confidence in [0, 1]: evidence gathered, scaled by how the content was made
 *
 * @param fetchedCount - Number of successfully fetched sources
 */
export function calculateConfidence(
  profile: MergedProfile,
  content: Pick<GeneratedContent, 'generation_path'>,
  fetchedCount: number
): number {
  let evidence = Math.min(fetchedCount / 10, 0.2);

  if (profile.owner_name) {
    evidence += 0.2;
    if (profile.contacts.emails.length > 0 || profile.contacts.phones.length > 0) {
      evidence += 0.1;
    }
  }
  if (profile.years_in_business !== null) evidence += 0.05;
  if (profile.achievements.length > 0) evidence += 0.15;
  if (profile.pain_points.length > 0) evidence += 0.1;
  if (Object.keys(profile.social_links).length > 0) evidence += 0.1;
  if (profile.website) evidence += 0.1;

  const score = Math.min(1, evidence) * PATH_WEIGHTS[content.generation_path];
  return Math.round(score * 100) / 100;
}

export default {
  AnthropicExecutor,
  generateContent,
  loadPromptTemplates,
  compilePrompt,
  parseGeneratedContent,
  buildTemplateContent,
  calculateConfidence,
  estimateCost,
};
