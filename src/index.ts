/**
 * Dealer Outreach Enrichment - Main Entry Point
 *
 * Multi-source evidence aggregation and personalized outreach generation for
 * lists of dealerships and other local businesses.
 *
 * Architecture:
 * - The orchestrator drives each record through search, source selection,
 *   fetching, fact extraction, merging, context prioritization and generation
 * - Collaborators (page fetcher, search provider, LLM executor, storage) are
 *   interfaces; the defaults use axios, Serper, Anthropic and S3
 * - The run manager wraps a whole dataset: run IDs, idempotency and artifacts
 */

// Core Types
export type * from './types/index.js';

// Configuration and observability
export {
  loadConfig,
  resolveSettings,
  ConfigurationError,
  DEFAULT_MODEL,
  DEFAULT_CAMPAIGN,
  DEFAULT_PIPELINE_SETTINGS,
  PERSONALIZATION_FOCUSES,
  type CampaignContext,
  type PipelineSettings,
  type EnrichmentConfig,
} from './config/index.js';

export {
  createConsoleLogger,
  silentLogger,
  noopMetrics,
  type Logger,
  type Metrics,
} from './observability/index.js';

export { TimeoutError, withTimeout, sleep, errorMessage } from './async/index.js';

// Source discovery and selection
export {
  SerperSearchProvider,
  buildSearchQueries,
  discoverCandidates,
  cleanCompanyName,
  type SearchProvider,
  type SearchHit,
  type SerperConfig,
  type DiscoveryOutcome,
} from './search/index.js';

export {
  classifySource,
  classifyCandidates,
  determineSourceType,
  scoreSource,
  type RawCandidate,
  type ClassifyOptions,
} from './classifier/index.js';

export {
  selectSources,
  rankCandidates,
  DEFAULT_CATEGORY_GROUPS,
  type CategoryGroup,
  type SelectOptions,
} from './selector/index.js';

// Fetching and facts
export {
  HttpPageFetcher,
  normalizeUrl,
  extractDomain,
  extractContacts,
  htmlToText,
  type PageFetcher,
  type PageFetchResult,
  type HttpFetcherConfig,
} from './scraper/index.js';

export {
  extractFacts,
  emptyPartialProfile,
  parseRegistryText,
  findOwnerMention,
  type PageEvidence,
} from './extractor/index.js';

export { mergeFacts, emptyMergedProfile, isEmptyProfile, sourcePriority } from './merger/index.js';

export {
  prioritizeContext,
  renderContext,
  formatProfile,
  DEFAULT_MAX_CONTEXT_CHARS,
  type PrioritizeOptions,
} from './prioritizer/index.js';

// Generation
export { ResponseCache, type CacheOptions, type CacheStats } from './cache/index.js';

export {
  AnthropicExecutor,
  loadPromptTemplates,
  generateContent,
  parseGeneratedContent,
  buildTemplateContent,
  calculateConfidence,
  estimateCost,
  type LLMExecutor,
  type LLMRequest,
  type LLMCompletion,
  type PromptTemplates,
  type GenerationOutcome,
} from './synthesizer/index.js';

export {
  validateContent,
  scoreQuality,
  formatValidationErrors,
  type ValidationResult,
  type ValidationError,
} from './validator/index.js';

// Orchestration
export { EnrichmentOrchestrator, type OrchestratorDeps, type EnrichOptions } from './orchestrator/index.js';

// Dataset I/O
export {
  parseDataset,
  detectColumnMapping,
  type ColumnMapping,
  type ParsedDataset,
  type RejectedRow,
} from './normalizer/index.js';

export {
  renderOutputRow,
  renderDatasetCsv,
  summarizeResults,
  renderSummaryText,
  OUTPUT_COLUMNS,
  type RunSummary,
} from './renderers/index.js';

// Runs and storage
export {
  generateRunId,
  createRun,
  checkIdempotency,
  updateRunStatus,
  getRunMetadata,
  runEnrichmentJob,
  type RunStatus,
  type RunMetadata,
  type RunArtifact,
  type JobOutcome,
  type JobDependencies,
} from './run-manager/index.js';

export {
  S3StorageAdapter,
  MemoryStorageAdapter,
  createStorageAdapter,
  ArtifactNotFoundError,
  type S3Config,
} from './storage/index.js';
