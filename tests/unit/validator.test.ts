/**
 * Unit Tests for Content Validator Module
 */

import { describe, it, expect } from '@jest/globals';
import {
  validateContent,
  scoreQuality,
  findSpamWords,
  countWords,
  formatValidationErrors,
  type DraftContent,
  type PersonalizationTarget,
} from '../../src/validator/index.js';

// ============================================================================
// Test Fixtures
// ============================================================================

const target: PersonalizationTarget = {
  record: { company_name: 'Smith Motors', city: 'Austin' },
  ownerName: 'Jane Doe',
};

const createDraft = (overrides: Partial<DraftContent> = {}): DraftContent => ({
  subject: 'Congrats on 40 years, Smith Motors',
  opening: 'Jane, I saw that Smith Motors has served Austin families for forty years and counting.',
  value_prop: 'We help dealers turn online shoppers into showroom visits.',
  hot_button: 'Service scheduling',
  call_to_action: 'Open to a short call next week?',
  ...overrides,
});

// ============================================================================
// Tests
// ============================================================================

describe('Content Validator', () => {
  describe('validateContent', () => {
    it('should accept specific, complete content', () => {
      const result = validateContent(createDraft(), target);

      expect(result.valid).toBe(true);
      expect(result.errors).toEqual([]);
      expect(result.warnings).toEqual([]);
      expect(result.qualityScore).toBe(100);
    });

    it('should require subject, opening and value proposition', () => {
      const result = validateContent(createDraft({ subject: '', opening: '  ' }), target);

      expect(result.valid).toBe(false);
      expect(result.errors.map((error) => [error.field, error.constraint])).toEqual([
        ['subject', 'required'],
        ['opening', 'required'],
      ]);
    });

    it('should reject subjects over 80 characters', () => {
      const result = validateContent(createDraft({ subject: 'a'.repeat(81) }), target);

      expect(result.valid).toBe(false);
      expect(result.errors[0]?.constraint).toBe('maxLength');
      expect(result.errors[0]?.actual).toBe(81);
    });

    it('should reject unfilled placeholders', () => {
      const result = validateContent(createDraft({ opening: 'Hi {{owner}}, congrats on the anniversary.' }), target);

      expect(result.valid).toBe(false);
      expect(result.errors).toEqual([
        {
          field: 'opening',
          constraint: 'placeholder',
          message: 'opening contains an unfilled placeholder',
          actual: '{{owner}}',
          expected: 'no placeholders',
        },
      ]);
    });

    it('should warn about spam words without rejecting', () => {
      const result = validateContent(createDraft({ subject: 'Free offer, act now' }), target);

      expect(result.valid).toBe(true);
      expect(result.warnings.map((warning) => warning.actual)).toEqual(['free', 'act now']);
    });

    it('should warn about very short openings', () => {
      const result = validateContent(createDraft({ opening: 'Hi Jane.' }), target);

      expect(result.valid).toBe(true);
      expect(result.warnings).toHaveLength(1);
      expect(result.warnings[0]?.constraint).toBe('wordCount');
      expect(result.warnings[0]?.message).toBe('opening has 2 words');
    });
  });

  describe('scoreQuality', () => {
    it('should lose personalization points for generic content', () => {
      const generic = createDraft({
        subject: 'Quick question',
        opening: 'I wanted to reach out about your dealership and our marketing services for local shops.',
        value_prop: 'We help dealers.',
      });

      // subject 14 chars: 8, opening 15 words: 15, hot button: 10, cta: 10, no spam: 10
      expect(scoreQuality(generic, target)).toBe(53);
    });
  });

  describe('helpers', () => {
    it('should match spam words on word boundaries', () => {
      expect(findSpamWords('Freedom to choose')).toEqual([]);
      expect(findSpamWords('URGENT: click here')).toEqual(['urgent', 'click here']);
    });

    it('should count words', () => {
      expect(countWords('  one  two ')).toBe(2);
      expect(countWords('')).toBe(0);
    });

    it('should format errors as a numbered list', () => {
      const result = validateContent(createDraft({ subject: '' }), target);

      expect(formatValidationErrors(result)).toBe('1. [required] subject: subject must not be empty');
      expect(formatValidationErrors(validateContent(createDraft(), target))).toBe(
        'Content passed all validation constraints'
      );
    });
  });
});
