/**
 * Renderers Module
 *
 * The EnrichmentResult list is the canonical artifact. Everything here is a
 * view derived from it:
 * - Output rows: the input row with enrichment columns appended (or filled)
 * - Dataset CSV via papaparse, rows reassembled by record_id in input order
 * - A plain-text run summary for logs and notifications
 *
 * Usage:
 * ```typescript
 * const csv = renderDatasetCsv(dataset, results);
 * ```
 */

import Papa from 'papaparse';
import type { EnrichmentResult, RecordId } from '../types/index.js';
import type { DatasetRow, ParsedDataset } from '../normalizer/index.js';

// ============================================================================
// Constants
// ============================================================================

/**
 * Columns added to every output row, in order
 */
export const OUTPUT_COLUMNS = [
  'website',
  'owner_first_name',
  'owner_last_name',
  'owner_email',
  'owner_phone',
  'email_subject',
  'email_icebreaker',
  'hot_button',
  'value_proposition',
  'call_to_action',
  'confidence_score',
  'enrichment_status',
] as const;

export type OutputColumn = (typeof OUTPUT_COLUMNS)[number];

/** Status of rows that were rejected before enrichment */
export const SKIPPED_STATUS = 'SKIPPED';

// ============================================================================
// Row Rendering
// ============================================================================

/**
 * First token is the first name, the rest the last name
 */
export function splitOwnerName(name: string | null): { first: string; last: string } {
  const parts = (name ?? '').trim().split(/\s+/).filter(Boolean);
  return { first: parts[0] ?? '', last: parts.slice(1).join(' ') };
}

/**
 * Enrichment column values for one result; a missing result renders as skipped
 */
export function renderEnrichmentColumns(result: EnrichmentResult | undefined): Record<OutputColumn, string> {
  if (!result) {
    return { ...emptyColumns(), enrichment_status: SKIPPED_STATUS };
  }

  const profile = result.merged_profile;
  const content = result.generated_content;
  const owner = splitOwnerName(profile.owner_name);

  return {
    website: profile.website ?? '',
    owner_first_name: owner.first,
    owner_last_name: owner.last,
    owner_email: profile.contacts.emails[0] ?? '',
    owner_phone: profile.contacts.phones[0] ?? '',
    email_subject: content.subject,
    email_icebreaker: content.opening,
    hot_button: content.hot_button,
    value_proposition: content.value_prop,
    call_to_action: content.call_to_action,
    confidence_score: result.confidence_score.toFixed(2),
    enrichment_status: result.status,
  };
}

function emptyColumns(): Record<OutputColumn, string> {
  return {
    website: '',
    owner_first_name: '',
    owner_last_name: '',
    owner_email: '',
    owner_phone: '',
    email_subject: '',
    email_icebreaker: '',
    hot_button: '',
    value_proposition: '',
    call_to_action: '',
    confidence_score: '',
    enrichment_status: '',
  };
}

/**
 * The input row plus enrichment columns. A column the input already has keeps
 * its value unless the enrichment produced a non-empty one.
 */
export function renderOutputRow(row: DatasetRow, result: EnrichmentResult | undefined): DatasetRow {
  const output: DatasetRow = { ...row };
  for (const [column, value] of Object.entries(renderEnrichmentColumns(result))) {
    if (!(column in output) || value !== '') {
      output[column] = value;
    }
  }
  return output;
}

/**
 * Output headers: input headers first, then enrichment columns not already present
 */
export function outputHeaders(inputHeaders: readonly string[]): string[] {
  return [...inputHeaders, ...OUTPUT_COLUMNS.filter((column) => !inputHeaders.includes(column))];
}

// ============================================================================
// Dataset Rendering
// ============================================================================

export function indexResults(results: readonly EnrichmentResult[]): Map<RecordId, EnrichmentResult> {
  return new Map(results.map((result) => [result.record_id, result]));
}

/**
 * Output rows in input order, whatever order the results arrive in
 */
export function renderDatasetRows(dataset: ParsedDataset, results: readonly EnrichmentResult[]): DatasetRow[] {
  const byId = indexResults(results);
  return dataset.entries.map((entry) => renderOutputRow(entry.row, byId.get(entry.record_id)));
}

export function renderDatasetCsv(dataset: ParsedDataset, results: readonly EnrichmentResult[]): string {
  const fields = outputHeaders(dataset.headers);
  const rows = renderDatasetRows(dataset, results);
  return Papa.unparse(
    { fields, data: rows.map((row) => fields.map((field) => row[field] ?? '')) },
    { newline: '\n' }
  );
}

// ============================================================================
// Summary
// ============================================================================

export interface RunSummary {
  total: number;
  done: number;
  failed: number;
  skipped: number;
  byPath: Record<string, number>;
  totalCost: number;
  averageConfidence: number;
}

export function summarizeResults(results: readonly EnrichmentResult[], skipped = 0): RunSummary {
  const byPath: Record<string, number> = {};
  let totalCost = 0;
  let confidenceSum = 0;
  for (const result of results) {
    const path = result.generated_content.generation_path;
    byPath[path] = (byPath[path] ?? 0) + 1;
    totalCost += result.usage.cost;
    confidenceSum += result.confidence_score;
  }
  return {
    total: results.length + skipped,
    done: results.filter((result) => result.status === 'DONE').length,
    failed: results.filter((result) => result.status === 'FAILED').length,
    skipped,
    byPath,
    totalCost,
    averageConfidence: results.length > 0 ? Math.round((confidenceSum / results.length) * 100) / 100 : 0,
  };
}

export function renderSummaryText(summary: RunSummary): string {
  const paths = Object.entries(summary.byPath)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([path, count]) => `${path}=${count}`)
    .join(', ');
  return [
    `Records: ${summary.total} (done ${summary.done}, failed ${summary.failed}, skipped ${summary.skipped})`,
    `Generation paths: ${paths || 'none'}`,
    `LLM cost: $${summary.totalCost.toFixed(4)}`,
    `Average confidence: ${summary.averageConfidence.toFixed(2)}`,
  ].join('\n');
}

export default {
  renderOutputRow,
  renderDatasetRows,
  renderDatasetCsv,
  splitOwnerName,
  summarizeResults,
  renderSummaryText,
  OUTPUT_COLUMNS,
};
