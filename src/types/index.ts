/**
 * Core type definitions for the dealer outreach enrichment pipeline
 *
 * This module exports all shared types used across the system.
 */

/**
 * Unique identifier for a batch enrichment run
 * Format: run_<hash>
 */
export type RunId = string;

/**
 * Stable identifier of one input record within a dataset
 */
export type RecordId = string;

// ============================================================================
// Sources
// ============================================================================

/**
 * Kind of evidence a discovered URL represents
 */
export type SourceType =
  | 'official'
  | 'registry'
  | 'social'
  | 'review'
  | 'directory'
  | 'news'
  | 'competitor'
  | 'irrelevant';

/**
 * Keyword family a campaign wants its outreach to lean on
 */
export type PersonalizationFocus =
  | 'recent_activity'
  | 'pain_points'
  | 'achievements'
  | 'growth'
  | 'leadership'
  | 'culture';

/**
 * A classified, scored search result for one record.
 * Lives only for the duration of one record's enrichment.
 */
export interface CandidateSource {
  url: string;
  title: string;
  snippet: string;
  source_type: SourceType;
  relevance_score: number;
  /** Social platform name (facebook, linkedin, ...) for social sources */
  platform: string | null;
  /** Position in the record's discovery sequence */
  discovery_index: number;
}

// ============================================================================
// Facts and Profiles
// ============================================================================

export interface ContactSet {
  phones: string[];
  emails: string[];
}

/**
 * How a years-in-business figure was obtained
 */
export type YearsBasis = 'filing_date' | 'text';

/**
 * Facts extracted from a single fetched source
 */
export interface PartialProfile {
  source_type: SourceType;
  source_url: string;
  owner_name: string | null;
  owner_title: string | null;
  years_in_business: number | null;
  years_in_business_basis: YearsBasis | null;
  website: string | null;
  contacts: ContactSet;
  pain_points: string[];
  achievements: string[];
  /** platform -> profile url */
  social_links: Record<string, string>;
}

/**
 * Result of fetching one selected source
 */
export interface FetchedContent {
  source: CandidateSource;
  raw_text: string;
  extracted_facts: PartialProfile;
  fetch_succeeded: boolean;
  error: string | null;
}

/**
 * Scalar facts that are resolved by source priority
 */
export type ScalarField = 'owner' | 'years_in_business' | 'website';

/**
 * Two equal-priority sources disagreeing on a scalar fact
 */
export interface MergeConflict {
  field: ScalarField;
  kept: string;
  kept_source: string;
  discarded: string;
  discarded_source: string;
}

/**
 * Canonical profile for one business record, frozen once built
 */
export interface MergedProfile {
  readonly owner_name: string | null;
  readonly owner_title: string | null;
  readonly years_in_business: number | null;
  readonly website: string | null;
  readonly contacts: {
    readonly phones: readonly string[];
    readonly emails: readonly string[];
  };
  readonly pain_points: readonly string[];
  readonly achievements: readonly string[];
  readonly social_links: Readonly<Record<string, string>>;
  /** Which source type supplied each scalar */
  readonly provenance: Readonly<Partial<Record<ScalarField, SourceType>>>;
  readonly sources_used: readonly string[];
  readonly conflicts: readonly MergeConflict[];
}

// ============================================================================
// Context
// ============================================================================

export interface ContextSection {
  label: string;
  /** Section heading plus body, exactly as it appears in the rendered context */
  text: string;
  /** 1 is the most urgent */
  priority_rank: number;
  /** True when the section was cut to fit the remaining budget */
  truncated: boolean;
}

export interface PrioritizedContext {
  readonly sections: readonly ContextSection[];
  readonly total_chars: number;
  readonly max_chars: number;
}

// ============================================================================
// Records and Results
// ============================================================================

/**
 * One input business after column mapping
 */
export interface BusinessRecord {
  record_id: RecordId;
  company_name: string;
  address: string | null;
  city: string | null;
  state: string | null;
  zip_code: string | null;
  phone: string | null;
  email: string | null;
  website: string | null;
  contact_name: string | null;
  /** Pre-discovered URLs; when present, search is skipped */
  candidate_urls: string[];
}

export type GenerationPath = 'primary' | 'simple' | 'template' | 'none';

export interface GeneratedContent {
  subject: string;
  opening: string;
  value_prop: string;
  hot_button: string;
  call_to_action: string;
  generation_path: GenerationPath;
}

export type RecordState =
  | 'PENDING'
  | 'SEARCHED'
  | 'SELECTED'
  | 'FETCHED'
  | 'MERGED'
  | 'CONTEXTUALIZED'
  | 'GENERATED'
  | 'DONE'
  | 'FAILED';

export interface StateTransition {
  state: RecordState;
  at: string;
  note?: string;
}

export interface FetchFailure {
  url: string;
  source_type: SourceType;
  error: string;
}

export interface LLMUsage {
  tokens_used: number;
  cost: number;
  cached: boolean;
  calls: number;
}

/**
 * Exactly one per input record, immutable once produced
 */
export interface EnrichmentResult {
  readonly record_id: RecordId;
  readonly status: 'DONE' | 'FAILED';
  readonly merged_profile: MergedProfile;
  readonly generated_content: Readonly<GeneratedContent>;
  readonly confidence_score: number;
  readonly selected_sources: readonly string[];
  readonly fetch_errors: readonly FetchFailure[];
  readonly errors: readonly string[];
  readonly usage: Readonly<LLMUsage>;
  readonly state_history: readonly StateTransition[];
}

// ============================================================================
// Module Results
// ============================================================================

export interface ModuleError {
  code: string;
  message: string;
  details?: unknown;
}

export interface ModuleMetadata {
  runId: RunId;
  module: string;
  timestamp: string;
  duration?: number;
}

export interface ModuleSuccess<T> {
  success: true;
  data: T;
  metadata: ModuleMetadata;
}

export interface ModuleFailure {
  success: false;
  error: ModuleError;
  metadata: ModuleMetadata;
}

/**
 * Result wrapper returned across collaborator boundaries
 */
export type ModuleResult<T> = ModuleSuccess<T> | ModuleFailure;

// ============================================================================
// Storage
// ============================================================================

export type ArtifactType = 'input' | 'results' | 'output' | 'run_artifact';

/**
 * Artifact metadata for storage tracking
 */
export interface ArtifactMetadata {
  runId: RunId;
  artifactType: ArtifactType;
  fileName: string;
  createdAt: string;
  contentType: string;
  size?: number;
  checksum?: string;
}

/**
 * Storage adapter interface for artifact persistence
 */
export interface StorageAdapter {
  save(runId: RunId, artifactType: ArtifactType, content: string | Buffer, options?: { contentType?: string }): Promise<ArtifactMetadata>;
  load(runId: RunId, artifactType: ArtifactType): Promise<{ content: string | Buffer; metadata: ArtifactMetadata }>;
  exists(runId: RunId, artifactType: ArtifactType): Promise<boolean>;
  list(runId: RunId): Promise<ArtifactMetadata[]>;
  delete(runId: RunId, artifactType?: ArtifactType): Promise<void>;
}
