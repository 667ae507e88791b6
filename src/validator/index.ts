/**
 * Content Validator Module
 *
 * Validates generated outreach content before it is accepted. Output that
 * fails a hard constraint is treated like an empty response, so the
 * generation fallback chain moves on to the next path.
 *
 * Hard constraints:
 * 1. subject, opening and value_prop are non-empty
 * 2. subject <= 80 characters
 * 3. No unfilled placeholders such as "[Owner Name]" or "{{company}}"
 *
 * Quality score (0-100, advisory):
 * - Length: subject and opening within their preferred bands
 * - Personalization: mentions the company, the owner's first name, the city
 * - Completeness: hot button and call to action present
 * - Spam words: each one costs points
 */

import type { BusinessRecord, GeneratedContent } from '../types/index.js';

// ============================================================================
// Type Definitions
// ============================================================================

/**
 * Generated content before a generation path is attached
 */
export type DraftContent = Omit<GeneratedContent, 'generation_path'>;

export interface ValidationError {
  field: string; // e.g., "subject"
  constraint: string; // e.g., "required", "maxLength", "placeholder", "spamWord"
  message: string;
  actual: number | string;
  expected: number | string;
}

export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
  warnings: ValidationError[];
  qualityScore: number;
}

/**
 * What the content should be personalized to
 */
export interface PersonalizationTarget {
  record: Pick<BusinessRecord, 'company_name' | 'city'>;
  ownerName?: string | null;
}

// ============================================================================
// Constraint Constants
// ============================================================================

export const CONSTRAINTS = {
  SUBJECT_MAX_CHARS: 80,
  SUBJECT_PREFERRED_MIN_CHARS: 20,
  SUBJECT_PREFERRED_MAX_CHARS: 60,
  OPENING_PREFERRED_MIN_WORDS: 15,
  OPENING_PREFERRED_MAX_WORDS: 60,
  OPENING_MIN_WORDS: 8,
  OPENING_MAX_WORDS: 100,
} as const;

export const REQUIRED_FIELDS = ['subject', 'opening', 'value_prop'] as const;

const CONTENT_FIELDS = ['subject', 'opening', 'value_prop', 'hot_button', 'call_to_action'] as const;

const PLACEHOLDER_PATTERN = /\[[^\]\n]{1,40}\]|\{\{[^}\n]*\}\}/;

export const SPAM_WORDS = [
  'free',
  'guarantee',
  'guaranteed',
  'act now',
  'limited time',
  'risk-free',
  'winner',
  'cash',
  'urgent',
  'click here',
] as const;

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Count words in a string
 */
export function countWords(text: string): number {
  const trimmed = text.trim();
  if (trimmed === '') {
    return 0;
  }
  return trimmed.split(/\s+/).length;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Spam words present in the text, in SPAM_WORDS order
 */
export function findSpamWords(text: string): string[] {
  const lower = text.toLowerCase();
  return SPAM_WORDS.filter((word) => new RegExp(`\\b${escapeRegExp(word)}\\b`).test(lower));
}

function mentions(text: string, phrase: string | null | undefined): boolean {
  const needle = phrase?.trim().toLowerCase();
  return Boolean(needle) && text.toLowerCase().includes(needle ?? '');
}

// ============================================================================
// Individual Validation Functions
// ============================================================================

export function validateRequired(content: DraftContent): ValidationError[] {
  return REQUIRED_FIELDS.filter((field) => content[field].trim() === '').map((field) => ({
    field,
    constraint: 'required',
    message: `${field} must not be empty`,
    actual: 'empty',
    expected: 'non-empty text',
  }));
}

export function validateSubjectLength(subject: string): ValidationError | null {
  if (subject.length > CONSTRAINTS.SUBJECT_MAX_CHARS) {
    return {
      field: 'subject',
      constraint: 'maxLength',
      message: `subject exceeds maximum length of ${CONSTRAINTS.SUBJECT_MAX_CHARS} characters`,
      actual: subject.length,
      expected: `<= ${CONSTRAINTS.SUBJECT_MAX_CHARS} characters`,
    };
  }
  return null;
}

export function validatePlaceholders(content: DraftContent): ValidationError[] {
  const errors: ValidationError[] = [];
  for (const field of CONTENT_FIELDS) {
    const match = PLACEHOLDER_PATTERN.exec(content[field]);
    if (match) {
      errors.push({
        field,
        constraint: 'placeholder',
        message: `${field} contains an unfilled placeholder`,
        actual: match[0],
        expected: 'no placeholders',
      });
    }
  }
  return errors;
}

// ============================================================================
// Quality Scoring
// ============================================================================

/**
 * Advisory 0-100 score; higher is more specific and less salesy
 */
export function scoreQuality(content: DraftContent, target: PersonalizationTarget): number {
  let score = 0;

  const subjectLength = content.subject.trim().length;
  if (subjectLength >= CONSTRAINTS.SUBJECT_PREFERRED_MIN_CHARS && subjectLength <= CONSTRAINTS.SUBJECT_PREFERRED_MAX_CHARS) {
    score += 15;
  } else if (subjectLength > 0 && subjectLength <= CONSTRAINTS.SUBJECT_MAX_CHARS) {
    score += 8;
  }

  const openingWords = countWords(content.opening);
  if (openingWords >= CONSTRAINTS.OPENING_PREFERRED_MIN_WORDS && openingWords <= CONSTRAINTS.OPENING_PREFERRED_MAX_WORDS) {
    score += 15;
  } else if (openingWords >= CONSTRAINTS.OPENING_MIN_WORDS && openingWords <= CONSTRAINTS.OPENING_MAX_WORDS) {
    score += 8;
  }

  const allText = CONTENT_FIELDS.map((field) => content[field]).join(' ');
  if (mentions(allText, target.record.company_name)) {
    score += 20;
  }
  const firstName = target.ownerName?.trim().split(/\s+/)[0];
  if (mentions(allText, firstName)) {
    score += 10;
  }
  if (mentions(allText, target.record.city)) {
    score += 10;
  }

  if (content.hot_button.trim()) score += 10;
  if (content.call_to_action.trim()) score += 10;

  const spamCount = findSpamWords(`${content.subject} ${content.opening}`).length;
  score += Math.max(0, 10 - 5 * spamCount);

  return Math.min(100, score);
}

// ============================================================================
// Main Validation Function
// ============================================================================

/**
 * Validate generated content against the hard constraints
 *
 * @returns errors make the content unusable; warnings are advisory
 */
export function validateContent(content: DraftContent, target: PersonalizationTarget): ValidationResult {
  const errors: ValidationError[] = [...validateRequired(content)];

  const subjectError = validateSubjectLength(content.subject);
  if (subjectError) {
    errors.push(subjectError);
  }
  errors.push(...validatePlaceholders(content));

  const warnings: ValidationError[] = findSpamWords(`${content.subject} ${content.opening}`).map((word) => ({
    field: 'subject',
    constraint: 'spamWord',
    message: `contains spam-filter trigger "${word}"`,
    actual: word,
    expected: 'no spam words',
  }));

  const openingWords = countWords(content.opening);
  if (openingWords > 0 && (openingWords < CONSTRAINTS.OPENING_MIN_WORDS || openingWords > CONSTRAINTS.OPENING_MAX_WORDS)) {
    warnings.push({
      field: 'opening',
      constraint: 'wordCount',
      message: `opening has ${openingWords} words`,
      actual: openingWords,
      expected: `${CONSTRAINTS.OPENING_MIN_WORDS}-${CONSTRAINTS.OPENING_MAX_WORDS} words`,
    });
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
    qualityScore: scoreQuality(content, target),
  };
}

/**
 * Format validation errors for logging
 */
export function formatValidationErrors(result: ValidationResult): string {
  if (result.valid) {
    return 'Content passed all validation constraints';
  }
  return result.errors.map((error, index) => `${index + 1}. [${error.constraint}] ${error.field}: ${error.message}`).join('\n');
}

export default {
  validateContent,
  scoreQuality,
  findSpamWords,
  formatValidationErrors,
  countWords,
  CONSTRAINTS,
};
