/**
 * Run Manager Module
 *
 * Responsibilities:
 * - Generate deterministic RunIDs using SHA-256
 * - Idempotency: a dataset resubmitted within the same window maps to the
 *   same run, and a completed run is not repeated
 * - Track run state (pending -> processing -> completed | failed) and counts
 *   in the run artifact
 * - runEnrichmentJob: parse, enrich, and store results and output CSV
 *
 * RunID algorithm:
 * 1. Round submitted_at down to the five-minute window
 * 2. Hash `submitted_at_rounded | dataset` with SHA-256
 * 3. Prefix the first 16 hex characters with "run_"
 *
 * Usage:
 * ```typescript
 * const outcome = await runEnrichmentJob(csv, { orchestrator, storage });
 * if (outcome.success) {
 *   console.log(outcome.data.runId, outcome.data.summary);
 * }
 * ```
 */

import { createHash } from 'crypto';
import { z } from 'zod';
import type { ArtifactType, EnrichmentResult, ModuleFailure, ModuleResult, RunId, StorageAdapter } from '../types/index.js';
import { parseDataset, type ColumnMapping, type RejectedRow } from '../normalizer/index.js';
import { renderDatasetCsv, renderSummaryText, summarizeResults, type RunSummary } from '../renderers/index.js';
import type { EnrichmentOrchestrator } from '../orchestrator/index.js';
import { errorMessage } from '../async/index.js';
import { createConsoleLogger, noopMetrics, type Logger, type Metrics } from '../observability/index.js';

// ============================================================================
// Type Definitions
// ============================================================================

export const RUN_STATUSES = ['pending', 'processing', 'completed', 'failed'] as const;

export type RunStatus = (typeof RUN_STATUSES)[number];

const ARTIFACT_TYPES: readonly ArtifactType[] = ['input', 'results', 'output', 'run_artifact'];

const RunCountsSchema = z.object({
  total: z.number(),
  done: z.number(),
  failed: z.number(),
  skipped: z.number(),
});

export type RunCounts = z.infer<typeof RunCountsSchema>;

const RunArtifactSchema = z.object({
  run_id: z.string(),
  status: z.enum(RUN_STATUSES),
  submitted_at: z.string(),
  created_at: z.string(),
  completed_at: z.string().nullable(),
  artifacts: z.object({
    input: z.boolean(),
    results: z.boolean(),
    output: z.boolean(),
    run_artifact: z.boolean(),
  }),
  counts: RunCountsSchema,
  errors: z.array(z.string()),
});

/**
 * Run artifact as stored in run_artifact.json
 */
export type RunArtifact = z.infer<typeof RunArtifactSchema>;

export interface RunMetadata {
  runId: RunId;
  createdAt: string;
  status: RunStatus;
  artifacts: ArtifactType[];
  counts: RunCounts;
  error?: string;
  completedAt?: string;
}

export interface StatusUpdate {
  error?: string;
  counts?: RunCounts;
}

export interface JobDependencies {
  orchestrator: Pick<EnrichmentOrchestrator, 'enrichRecords'>;
  storage: StorageAdapter;
  mapping?: ColumnMapping;
  /** ISO-8601 submission time (default: now) */
  submittedAt?: string;
  logger?: Logger;
  metrics?: Metrics;
}

export interface JobOutcome {
  runId: RunId;
  status: RunStatus;
  /** True when a completed run for the same submission already existed */
  reused: boolean;
  /** Empty for a reused run; the stored results artifact holds them */
  results: EnrichmentResult[];
  rejected: RejectedRow[];
  outputCsv: string;
  summary: RunSummary | null;
}

// ============================================================================
// Run IDs
// ============================================================================

const ROUNDING_INTERVAL_MS = 5 * 60 * 1000;

/**
 * Round an ISO-8601 timestamp down to its five-minute window
 *
 * @throws Error when the timestamp cannot be parsed
 */
export function roundTimestamp(timestamp: string): string {
  const time = new Date(timestamp).getTime();
  if (Number.isNaN(time)) {
    throw new Error(`Invalid submitted_at timestamp: ${timestamp}`);
  }
  return new Date(Math.floor(time / ROUNDING_INTERVAL_MS) * ROUNDING_INTERVAL_MS).toISOString();
}

/**
 * Deterministic run ID for a dataset submission
 */
export function generateRunId(csv: string, submittedAt: string): RunId {
  const hash = createHash('sha256').update([roundTimestamp(submittedAt), csv].join('|')).digest('hex');
  return `run_${hash.substring(0, 16)}`;
}

// ============================================================================
// Run Artifact
// ============================================================================

function createRunArtifact(runId: RunId, submittedAt: string): RunArtifact {
  return {
    run_id: runId,
    status: 'pending',
    submitted_at: submittedAt,
    created_at: new Date().toISOString(),
    completed_at: null,
    artifacts: { input: false, results: false, output: false, run_artifact: false },
    counts: { total: 0, done: 0, failed: 0, skipped: 0 },
    errors: [],
  };
}

async function loadRunArtifact(storage: StorageAdapter, runId: RunId): Promise<RunArtifact> {
  const { content } = await storage.load(runId, 'run_artifact');
  const parsed = RunArtifactSchema.safeParse(JSON.parse(content.toString()));
  if (!parsed.success) {
    const errors = parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new Error(`Corrupt run artifact: ${errors.join('; ')}`);
  }
  return parsed.data;
}

async function saveRunArtifact(storage: StorageAdapter, artifact: RunArtifact): Promise<void> {
  artifact.artifacts.run_artifact = true;
  await storage.save(artifact.run_id, 'run_artifact', JSON.stringify(artifact, null, 2), {
    contentType: 'application/json',
  });
}

function toRunMetadata(artifact: RunArtifact): RunMetadata {
  const metadata: RunMetadata = {
    runId: artifact.run_id,
    createdAt: artifact.created_at,
    status: artifact.status,
    artifacts: ARTIFACT_TYPES.filter((type) => artifact.artifacts[type]),
    counts: { ...artifact.counts },
  };
  if (artifact.errors.length > 0) {
    metadata.error = artifact.errors.join('; ');
  }
  if (artifact.completed_at) {
    metadata.completedAt = artifact.completed_at;
  }
  return metadata;
}

function failure(code: string, message: string, runId: RunId, timestamp: string, startTime: number): ModuleFailure {
  return {
    success: false,
    error: { code, message },
    metadata: { runId, module: 'run-manager', timestamp, duration: Date.now() - startTime },
  };
}

// ============================================================================
// Run Operations
// ============================================================================

/**
 * Look up an existing run
 */
export async function checkIdempotency(
  runId: RunId,
  storage: StorageAdapter
): Promise<ModuleResult<{ exists: boolean; runArtifact?: RunArtifact }>> {
  const startTime = Date.now();
  const timestamp = new Date().toISOString();

  try {
    if (!(await storage.exists(runId, 'run_artifact'))) {
      return {
        success: true,
        data: { exists: false },
        metadata: { runId, module: 'run-manager', timestamp, duration: Date.now() - startTime },
      };
    }
    const runArtifact = await loadRunArtifact(storage, runId);
    return {
      success: true,
      data: { exists: true, runArtifact },
      metadata: { runId, module: 'run-manager', timestamp, duration: Date.now() - startTime },
    };
  } catch (error) {
    return failure('STORAGE_ERROR', `Failed to check idempotency: ${errorMessage(error)}`, runId, timestamp, startTime);
  }
}

/**
 * Create a run for a dataset submission and store its input
 *
 * An existing run with the same ID is returned as it is.
 */
export async function createRun(
  csv: string,
  submittedAt: string,
  storage: StorageAdapter
): Promise<ModuleResult<RunMetadata>> {
  const startTime = Date.now();
  const timestamp = new Date().toISOString();

  let runId: RunId;
  try {
    runId = generateRunId(csv, submittedAt);
  } catch (error) {
    return failure('VALIDATION_ERROR', errorMessage(error), '', timestamp, startTime);
  }

  const existing = await checkIdempotency(runId, storage);
  if (!existing.success) {
    return existing;
  }
  if (existing.data.runArtifact) {
    return {
      success: true,
      data: toRunMetadata(existing.data.runArtifact),
      metadata: { runId, module: 'run-manager', timestamp, duration: Date.now() - startTime },
    };
  }

  try {
    const artifact = createRunArtifact(runId, submittedAt);
    await storage.save(runId, 'input', csv, { contentType: 'text/csv' });
    artifact.artifacts.input = true;
    await saveRunArtifact(storage, artifact);

    return {
      success: true,
      data: toRunMetadata(artifact),
      metadata: { runId, module: 'run-manager', timestamp, duration: Date.now() - startTime },
    };
  } catch (error) {
    return failure('STORAGE_ERROR', `Failed to create run: ${errorMessage(error)}`, runId, timestamp, startTime);
  }
}

export async function updateRunStatus(
  runId: RunId,
  status: RunStatus,
  storage: StorageAdapter,
  update: StatusUpdate = {}
): Promise<ModuleResult<RunMetadata>> {
  const startTime = Date.now();
  const timestamp = new Date().toISOString();

  try {
    const artifact = await loadRunArtifact(storage, runId);
    artifact.status = status;
    if (status === 'completed' || status === 'failed') {
      artifact.completed_at = timestamp;
    }
    if (update.error) {
      artifact.errors.push(update.error);
    }
    if (update.counts) {
      artifact.counts = { ...update.counts };
    }
    await saveRunArtifact(storage, artifact);

    return {
      success: true,
      data: toRunMetadata(artifact),
      metadata: { runId, module: 'run-manager', timestamp, duration: Date.now() - startTime },
    };
  } catch (error) {
    return failure('STORAGE_ERROR', `Failed to update run status: ${errorMessage(error)}`, runId, timestamp, startTime);
  }
}

export async function getRunMetadata(runId: RunId, storage: StorageAdapter): Promise<ModuleResult<RunMetadata>> {
  const startTime = Date.now();
  const timestamp = new Date().toISOString();

  try {
    const artifact = await loadRunArtifact(storage, runId);
    return {
      success: true,
      data: toRunMetadata(artifact),
      metadata: { runId, module: 'run-manager', timestamp, duration: Date.now() - startTime },
    };
  } catch (error) {
    return failure('RUN_NOT_FOUND', `Failed to get run metadata: ${errorMessage(error)}`, runId, timestamp, startTime);
  }
}

/**
 * Save an artifact and flag it in the run artifact
 */
export async function storeArtifact(
  runId: RunId,
  artifactType: Exclude<ArtifactType, 'run_artifact'>,
  content: string,
  contentType: string,
  storage: StorageAdapter
): Promise<void> {
  await storage.save(runId, artifactType, content, { contentType });
  const artifact = await loadRunArtifact(storage, runId);
  artifact.artifacts[artifactType] = true;
  await saveRunArtifact(storage, artifact);
}

// ============================================================================
// Jobs
// ============================================================================

/**
 * Enrich one dataset end to end
 *
 * Rejected rows are counted as skipped and still appear in the output CSV.
 */
export async function runEnrichmentJob(csv: string, deps: JobDependencies): Promise<ModuleResult<JobOutcome>> {
  const startTime = Date.now();
  const timestamp = new Date().toISOString();
  const logger = deps.logger ?? createConsoleLogger('run-manager');
  const metrics = deps.metrics ?? noopMetrics;
  const { storage } = deps;

  const created = await createRun(csv, deps.submittedAt ?? timestamp, storage);
  if (!created.success) {
    return created;
  }
  const runId = created.data.runId;

  if (created.data.status === 'completed') {
    logger.info('Run already completed; returning stored output', { runId });
    metrics.increment('run_manager.reused');
    let stored: string;
    try {
      stored = (await storage.load(runId, 'output')).content.toString();
    } catch (error) {
      return failure('STORAGE_ERROR', `Failed to load stored output: ${errorMessage(error)}`, runId, timestamp, startTime);
    }
    return {
      success: true,
      data: {
        runId,
        status: 'completed',
        reused: true,
        results: [],
        rejected: [],
        outputCsv: stored,
        summary: null,
      },
      metadata: { runId, module: 'run-manager', timestamp, duration: Date.now() - startTime },
    };
  }

  const parsed = parseDataset(csv, deps.mapping);
  if (!parsed.success) {
    await updateRunStatus(runId, 'failed', storage, { error: `${parsed.error.code}: ${parsed.error.message}` });
    metrics.increment('run_manager.failed');
    return { ...parsed, metadata: { ...parsed.metadata, runId } };
  }
  const dataset = parsed.data;
  for (const warning of dataset.warnings) {
    logger.warn('Dataset warning', { runId, warning });
  }

  try {
    const processing = await updateRunStatus(runId, 'processing', storage);
    if (!processing.success) {
      return processing;
    }

    logger.info('Run started', { runId, records: dataset.records.length, rejected: dataset.rejected.length });
    const results = await deps.orchestrator.enrichRecords(dataset.records);

    const outputCsv = renderDatasetCsv(dataset, results);
    await storeArtifact(runId, 'results', JSON.stringify(results, null, 2), 'application/json', storage);
    await storeArtifact(runId, 'output', outputCsv, 'text/csv', storage);

    const summary = summarizeResults(results, dataset.rejected.length);
    const counts = { total: summary.total, done: summary.done, failed: summary.failed, skipped: summary.skipped };
    const completed = await updateRunStatus(runId, 'completed', storage, { counts });
    if (!completed.success) {
      return completed;
    }

    metrics.increment('run_manager.completed');
    metrics.timing('run_manager.duration', Date.now() - startTime);
    logger.info(`Run completed\n${renderSummaryText(summary)}`, { runId });

    return {
      success: true,
      data: {
        runId,
        status: 'completed',
        reused: false,
        results,
        rejected: dataset.rejected,
        outputCsv,
        summary,
      },
      metadata: { runId, module: 'run-manager', timestamp, duration: Date.now() - startTime },
    };
  } catch (error) {
    const message = errorMessage(error);
    logger.error('Run failed', { runId, error: message });
    metrics.increment('run_manager.failed');
    await updateRunStatus(runId, 'failed', storage, { error: message });
    return failure('RUN_FAILED', `Run failed: ${message}`, runId, timestamp, startTime);
  }
}

export default {
  generateRunId,
  roundTimestamp,
  checkIdempotency,
  createRun,
  updateRunStatus,
  getRunMetadata,
  storeArtifact,
  runEnrichmentJob,
};
