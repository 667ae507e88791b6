/**
 * Unit Tests for Normalizer Module
 */

import { describe, it, expect } from '@jest/globals';
import {
  parseDataset,
  detectColumnMapping,
  suggestField,
  normalizeWebsite,
  normalizeEmail,
  trimString,
  recordIdFor,
} from '../../src/normalizer/index.js';

// ============================================================================
// Test Fixtures
// ============================================================================

const DEALER_CSV = [
  'Dealer Name,Owner,City,State,Phone,Email,Website,Notes',
  'Smith Motors,Jane Doe,Austin,TX,512-555-0100,Jane@SmithMotors.com,smithmotors.com/,VIP',
  ',Bob,Dallas,TX,,,,',
  'Jones Auto, ,Houston,TX,,,https://jonesauto.com,',
].join('\n');

// ============================================================================
// Tests
// ============================================================================

describe('Normalizer', () => {
  describe('canonicalization', () => {
    it('should trim strings and null out blanks', () => {
      expect(trimString('  Smith  ')).toBe('Smith');
      expect(trimString('   ')).toBeNull();
      expect(trimString(undefined)).toBeNull();
    });

    it('should lowercase emails', () => {
      expect(normalizeEmail(' Jane@SmithMotors.com ')).toBe('jane@smithmotors.com');
      expect(normalizeEmail('')).toBeNull();
    });

    it('should add a scheme and drop trailing slashes', () => {
      expect(normalizeWebsite('smithmotors.com/')).toBe('https://smithmotors.com');
      expect(normalizeWebsite('HTTP://Example.com//')).toBe('HTTP://Example.com');
      expect(normalizeWebsite('https://example.com/about')).toBe('https://example.com/about');
      expect(normalizeWebsite(null)).toBeNull();
    });

    it('should number records from one', () => {
      expect(recordIdFor(0)).toBe('rec_0001');
      expect(recordIdFor(41)).toBe('rec_0042');
    });
  });

  describe('column mapping', () => {
    it('should suggest fields from header names', () => {
      expect(suggestField('Business Name')).toBe('company_name');
      expect(suggestField('Owner')).toBe('contact_name');
      expect(suggestField('Owner Email')).toBeNull();
      expect(suggestField('Email Subject')).toBeNull();
      expect(suggestField('Zip Code')).toBe('zip_code');
      expect(suggestField('Notes')).toBeNull();
    });

    it('should keep the first header for each field', () => {
      expect(detectColumnMapping(['Company', 'Website', 'Site URL'])).toEqual({
        company_name: 'Company',
        website: 'Website',
      });
    });
  });

  describe('parseDataset', () => {
    it('should map, canonicalize and validate rows', () => {
      const result = parseDataset(DEALER_CSV);

      expect(result.success).toBe(true);
      if (!result.success) return;
      const dataset = result.data;

      expect(dataset.mapping).toEqual({
        company_name: 'Dealer Name',
        contact_name: 'Owner',
        city: 'City',
        state: 'State',
        phone: 'Phone',
        email: 'Email',
        website: 'Website',
      });
      expect(dataset.records.map((record) => record.record_id)).toEqual(['rec_0001', 'rec_0003']);
      expect(dataset.records[0]).toEqual({
        record_id: 'rec_0001',
        company_name: 'Smith Motors',
        address: null,
        city: 'Austin',
        state: 'TX',
        zip_code: null,
        phone: '512-555-0100',
        email: 'jane@smithmotors.com',
        website: 'https://smithmotors.com',
        contact_name: 'Jane Doe',
        candidate_urls: [],
      });
      expect(dataset.records[1]?.contact_name).toBeNull();
    });

    it('should report rows without a company name as rejected', () => {
      const result = parseDataset(DEALER_CSV);

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.data.rejected).toEqual([
        { record_id: 'rec_0002', row_number: 2, reason: 'company_name: company name is required' },
      ]);
    });

    it('should keep every original row in input order', () => {
      const result = parseDataset(DEALER_CSV);

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.data.entries.map((entry) => entry.record_id)).toEqual(['rec_0001', 'rec_0002', 'rec_0003']);
      expect(result.data.entries[1]?.row).toEqual({
        'Dealer Name': '',
        Owner: 'Bob',
        City: 'Dallas',
        State: 'TX',
        Phone: '',
        Email: '',
        Website: '',
        Notes: '',
      });
    });

    it('should split candidate URLs and ignore non-http entries', () => {
      const result = parseDataset('Company,candidate_urls\nAcme,"https://a.com; https://b.com | ftp://x"');

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.data.records[0]?.candidate_urls).toEqual(['https://a.com', 'https://b.com']);
    });

    it('should fail without a company column', () => {
      const result = parseDataset('Biz,Town\nAcme,Austin');

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error.code).toBe('VALIDATION_ERROR');
      expect(result.error.message).toBe('No company name column found; map company_name explicitly');
    });

    it('should apply an explicit mapping and warn about missing columns', () => {
      const result = parseDataset('Biz,Town\nAcme,Austin', { company_name: 'Biz', email: 'Mail' });

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.data.records[0]?.company_name).toBe('Acme');
      expect(result.data.records[0]?.city).toBe('Austin');
      expect(result.data.warnings).toEqual(['Mapped column "Mail" for email is not in the dataset']);
    });

    it('should fail on an empty dataset', () => {
      expect(parseDataset('').success).toBe(false);
    });
  });
});
