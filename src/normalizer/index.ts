/**
 * Normalizer Module
 *
 * Responsibilities:
 * - Parse an input CSV dataset (one business per row) with papaparse
 * - Map columns to record fields, auto-detected from headers unless given
 * - Canonicalize values: trimmed strings, lowercase emails, URLs with a scheme
 * - Validate each mapped row with zod; rows without a company name are
 *   reported as rejected, not dropped silently
 * - Keep every original row so unmapped columns pass through to the output
 *
 * Usage:
 * ```typescript
 * const result = parseDataset(csvText, { company_name: 'Dealer Name' });
 * if (result.success) {
 *   const { records, rejected } = result.data;
 * }
 * ```
 */

import Papa from 'papaparse';
import { z } from 'zod';
import type { BusinessRecord, ModuleResult, RecordId } from '../types/index.js';

// ============================================================================
// Type Definitions
// ============================================================================

/**
 * Record fields that can be read from a dataset column
 */
export type InputField =
  | 'company_name'
  | 'address'
  | 'city'
  | 'state'
  | 'zip_code'
  | 'phone'
  | 'email'
  | 'website'
  | 'contact_name';

/**
 * field -> column header
 */
export type ColumnMapping = Partial<Record<InputField, string>>;

export type DatasetRow = Record<string, string>;

export interface DatasetEntry {
  record_id: RecordId;
  row: DatasetRow;
}

export interface RejectedRow {
  record_id: RecordId;
  /** 1-based data row number (header excluded) */
  row_number: number;
  reason: string;
}

export interface ParsedDataset {
  headers: string[];
  mapping: ColumnMapping;
  /** Every data row, in input order */
  entries: DatasetEntry[];
  /** Rows that passed validation */
  records: BusinessRecord[];
  rejected: RejectedRow[];
  /** Non-fatal CSV parser complaints */
  warnings: string[];
}

// ============================================================================
// Constants
// ============================================================================

export const INPUT_FIELDS: readonly InputField[] = [
  'company_name',
  'address',
  'city',
  'state',
  'zip_code',
  'phone',
  'email',
  'website',
  'contact_name',
];

/** Optional column of pre-discovered URLs, separated by whitespace, ";" or "|" */
export const CANDIDATE_URLS_COLUMN = 'candidate_urls';

const BusinessRowSchema = z.object({
  company_name: z.string({ required_error: 'company name is required' }).min(1, 'company name is required'),
  address: z.string().nullable(),
  city: z.string().nullable(),
  state: z.string().nullable(),
  zip_code: z.string().nullable(),
  phone: z.string().nullable(),
  email: z.string().nullable(),
  website: z.string().nullable(),
  contact_name: z.string().nullable(),
  candidate_urls: z.array(z.string()),
});

// ============================================================================
// Canonicalization
// ============================================================================

/**
 * Trim whitespace; empty strings become null
 */
export function trimString(value: string | null | undefined): string | null {
  if (value === null || value === undefined) {
    return null;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

export function normalizeEmail(email: string | null | undefined): string | null {
  const trimmed = trimString(email);
  return trimmed ? trimmed.toLowerCase() : null;
}

/**
 * Ensure a scheme (https by default) and drop a trailing slash on the root
 */
export function normalizeWebsite(url: string | null | undefined): string | null {
  const trimmed = trimString(url);
  if (!trimmed) {
    return null;
  }
  const withScheme = /^https?:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;
  return withScheme.replace(/\/+$/, '');
}

export function recordIdFor(index: number): RecordId {
  return `rec_${String(index + 1).padStart(4, '0')}`;
}

// ============================================================================
// Column Mapping
// ============================================================================

/**
 * Record field a header most likely holds, or null
 */
export function suggestField(header: string): InputField | null {
  const col = header.toLowerCase();

  if (/owner|contact/.test(col)) {
    return /phone|e-?mail/.test(col) ? null : 'contact_name';
  }
  if (/subject|icebreaker|hot button/.test(col)) return null;
  if (/e-?mail/.test(col)) return 'email';
  if (/phone|\btel\b|mobile|cell/.test(col)) return 'phone';
  if (/website|url|\bweb\b|site/.test(col)) return 'website';
  if (/address|street|location/.test(col)) return 'address';
  if (/city|town/.test(col)) return 'city';
  if (/state|province/.test(col)) return 'state';
  if (/zip|postal/.test(col)) return 'zip_code';
  if (/company|dealer|business|organization|^name$/.test(col)) return 'company_name';
  return null;
}

/**
 * Auto-detect a mapping; the first header suggesting a field wins
 */
export function detectColumnMapping(headers: readonly string[]): ColumnMapping {
  const mapping: ColumnMapping = {};
  for (const header of headers) {
    if (header === CANDIDATE_URLS_COLUMN) continue;
    const field = suggestField(header);
    if (field && mapping[field] === undefined) {
      mapping[field] = header;
    }
  }
  return mapping;
}

/**
 * Detected mapping overridden by the explicit one; columns missing from the
 * headers are dropped and reported
 */
export function resolveColumnMapping(
  headers: readonly string[],
  explicit: ColumnMapping = {}
): { mapping: ColumnMapping; warnings: string[] } {
  const mapping: ColumnMapping = { ...detectColumnMapping(headers) };
  const warnings: string[] = [];

  for (const field of INPUT_FIELDS) {
    const column = explicit[field];
    if (column === undefined) continue;
    if (headers.includes(column)) {
      mapping[field] = column;
    } else {
      warnings.push(`Mapped column "${column}" for ${field} is not in the dataset`);
    }
  }

  return { mapping, warnings };
}

function splitCandidateUrls(value: string | undefined): string[] {
  return (value ?? '').split(/[\s;|]+/).filter((url) => /^https?:\/\//i.test(url));
}

// ============================================================================
// Core Functions
// ============================================================================

/**
 * Parse and validate a CSV dataset
 *
 * @param csv - Dataset text with a header row
 * @param explicitMapping - Field -> column overrides for auto-detection
 */
export function parseDataset(csv: string, explicitMapping?: ColumnMapping): ModuleResult<ParsedDataset> {
  const startTime = Date.now();
  const timestamp = new Date().toISOString();
  const metadata = () => ({ runId: '', module: 'normalizer', timestamp, duration: Date.now() - startTime });

  const parsed = Papa.parse<Record<string, string | undefined>>(csv, {
    header: true,
    skipEmptyLines: 'greedy',
    transformHeader: (header) => header.trim(),
  });

  const headers = parsed.meta.fields ?? [];
  if (headers.length === 0) {
    return {
      success: false,
      error: { code: 'VALIDATION_ERROR', message: 'Dataset has no header row' },
      metadata: metadata(),
    };
  }

  const { mapping, warnings } = resolveColumnMapping(headers, explicitMapping);
  const companyColumn = mapping.company_name;
  if (!companyColumn) {
    return {
      success: false,
      error: {
        code: 'VALIDATION_ERROR',
        message: 'No company name column found; map company_name explicitly',
        details: { headers },
      },
      metadata: metadata(),
    };
  }

  for (const error of parsed.errors) {
    if (error.code !== 'UndetectableDelimiter') {
      warnings.push(error.row !== undefined ? `Row ${error.row + 1}: ${error.message}` : error.message);
    }
  }

  const entries: DatasetEntry[] = [];
  const records: BusinessRecord[] = [];
  const rejected: RejectedRow[] = [];

  parsed.data.forEach((raw, index) => {
    const row: DatasetRow = {};
    for (const header of headers) {
      row[header] = raw[header] ?? '';
    }
    const recordId = recordIdFor(index);
    entries.push({ record_id: recordId, row });

    const read = (field: InputField): string | null => {
      const column = mapping[field];
      return column === undefined ? null : trimString(row[column]);
    };

    const candidate = {
      company_name: read('company_name') ?? '',
      address: read('address'),
      city: read('city'),
      state: read('state'),
      zip_code: read('zip_code'),
      phone: read('phone'),
      email: normalizeEmail(read('email')),
      website: normalizeWebsite(read('website')),
      contact_name: read('contact_name'),
      candidate_urls: splitCandidateUrls(row[CANDIDATE_URLS_COLUMN]),
    };

    const result = BusinessRowSchema.safeParse(candidate);
    if (!result.success) {
      rejected.push({
        record_id: recordId,
        row_number: index + 1,
        reason: result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join('; '),
      });
      return;
    }

    records.push({ record_id: recordId, ...result.data });
  });

  return {
    success: true,
    data: { headers, mapping, entries, records, rejected, warnings },
    metadata: metadata(),
  };
}

export default {
  parseDataset,
  detectColumnMapping,
  resolveColumnMapping,
  suggestField,
  normalizeWebsite,
  normalizeEmail,
  trimString,
};
