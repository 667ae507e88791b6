/**
 * Unit Tests for Fact Extractor Module
 */

import { describe, it, expect } from '@jest/globals';
import {
  extractFacts,
  parseRegistryText,
  pickPrincipalOfficer,
  findOwnerMention,
  mineYearsInBusiness,
  findAchievements,
  findComplaints,
  findWebsiteGaps,
  findSocialLinks,
  formatPersonName,
  isLikelyPersonName,
} from '../../src/extractor/index.js';
import type { CandidateSource, SourceType } from '../../src/types/index.js';

// ============================================================================
// Test Fixtures
// ============================================================================

const source = (url: string, sourceType: SourceType, platform: string | null = null): CandidateSource => ({
  url,
  title: '',
  snippet: '',
  source_type: sourceType,
  relevance_score: 10,
  platform,
  discovery_index: 0,
});

const page = (text: string, title = '') => ({
  text,
  title,
  contacts: { phones: ['(512) 555-0100'], emails: ['jane@smithmotors.com'] },
  links: [],
});

const REGISTRY_TEXT = [
  'Officer/Director Detail',
  'Name & Address',
  'Title PRES',
  'DOE, JANE A',
  '123 MAIN ST',
  'Title VP',
  'SMITH, ROBERT',
  'Date Filed: 03/15/1998',
  'Status: Active',
].join('\n');

// ============================================================================
// Tests
// ============================================================================

describe('Fact Extractor', () => {
  describe('formatPersonName', () => {
    it('should reorder and recase registry names', () => {
      expect(formatPersonName('DOE, JANE A')).toBe('Jane A Doe');
    });

    it('should leave mixed-case names alone', () => {
      expect(formatPersonName('Maria  Lopez')).toBe('Maria Lopez');
    });
  });

  describe('isLikelyPersonName', () => {
    it('should reject dealership words', () => {
      expect(isLikelyPersonName('Smith Motors')).toBe(false);
      expect(isLikelyPersonName('John Carter')).toBe(true);
      expect(isLikelyPersonName('Cher')).toBe(false);
    });
  });

  describe('parseRegistryText', () => {
    it('should parse officer blocks, filing date and status', () => {
      const record = parseRegistryText(REGISTRY_TEXT);

      expect(record.officers).toEqual([
        { name: 'Jane A Doe', title: 'President' },
        { name: 'Robert Smith', title: 'Vice President' },
      ]);
      expect(record.filingYear).toBe(1998);
      expect(record.status).toBe('Active');
      expect(record.website).toBeNull();
    });

    it('should parse inline officer lines', () => {
      const record = parseRegistryText('President: Maria Lopez\nFiling Date: 1/2/2010');

      expect(record.officers).toEqual([{ name: 'Maria Lopez', title: 'President' }]);
      expect(record.filingYear).toBe(2010);
    });
  });

  describe('pickPrincipalOfficer', () => {
    it('should prefer owners and presidents over other officers', () => {
      expect(
        pickPrincipalOfficer([
          { name: 'Robert Smith', title: 'Vice President' },
          { name: 'Jane Doe', title: 'President' },
        ])
      ).toEqual({ name: 'Jane Doe', title: 'President' });
    });

    it('should return null without officers', () => {
      expect(pickPrincipalOfficer([])).toBeNull();
    });
  });

  describe('findOwnerMention', () => {
    it('should find "Name, Role" mentions', () => {
      expect(findOwnerMention('Welcome to our store. John Carter, Owner, has served Austin drivers since 1985.')).toEqual({
        name: 'John Carter',
        title: 'Owner',
      });
    });

    it('should rank owners above general managers', () => {
      expect(findOwnerMention('Mike Ross - General Manager. Owner Sarah Kim welcomes you.')).toEqual({
        name: 'Sarah Kim',
        title: 'Owner',
      });
    });

    it('should ignore business names in the name position', () => {
      expect(findOwnerMention('Smith Motors, Owner operated since 1990')).toBeNull();
    });
  });

  describe('mineYearsInBusiness', () => {
    it('should compute years from a founding year', () => {
      expect(mineYearsInBusiness('Serving Austin since 1985.', 2025)).toBe(40);
    });

    it('should read stated year counts', () => {
      expect(mineYearsInBusiness('For over 30 years we have sold trucks.', 2025)).toBe(30);
      expect(mineYearsInBusiness('Proud of 25 years in business.', 2025)).toBe(25);
    });

    it('should reject future founding years', () => {
      expect(mineYearsInBusiness('Established in 2030', 2025)).toBeNull();
    });

    it('should return null when nothing is stated', () => {
      expect(mineYearsInBusiness('Great cars at great prices.', 2025)).toBeNull();
    });
  });

  describe('findAchievements', () => {
    it('should keep award and ranking sentences', () => {
      const text = "Voted best Ford dealership in Texas. We sell cars. Winner of the 2023 President's Award.";
      expect(findAchievements(text)).toEqual([
        'Voted best Ford dealership in Texas.',
        "Winner of the 2023 President's Award.",
      ]);
    });
  });

  describe('findComplaints', () => {
    it('should keep at most three complaint sentences', () => {
      const text =
        'Great staff. Waited three hours for an oil change. The manager was rude to me. Terrible issue with billing. Another problem here.';
      expect(findComplaints(text)).toEqual([
        'Waited three hours for an oil change.',
        'The manager was rude to me.',
        'Terrible issue with billing.',
      ]);
    });
  });

  describe('findWebsiteGaps', () => {
    it('should report outdated copyright and missing features', () => {
      expect(findWebsiteGaps('© 2019 Smith Motors. All rights reserved.', 2025)).toEqual([
        'Website copyright notice is outdated (2019)',
        'No online service scheduling on website',
        'No online inventory listing on website',
      ]);
    });

    it('should report nothing for a current, complete site', () => {
      const text = 'Copyright 2015-2024 Smith Motors. Schedule service online. Browse our inventory.';
      expect(findWebsiteGaps(text, 2025)).toEqual([]);
    });
  });

  describe('findSocialLinks', () => {
    it('should keep the first profile per platform and skip share links', () => {
      const links = ['https://www.facebook.com/sharer/sharer.php?u=x', 'https://www.facebook.com/smithmotors'];
      expect(findSocialLinks('Follow us https://www.instagram.com/smithmotors', links)).toEqual({
        facebook: 'https://www.facebook.com/smithmotors',
        instagram: 'https://www.instagram.com/smithmotors',
      });
    });
  });

  describe('extractFacts', () => {
    it('should take owner and filing-date years from a registry', () => {
      const profile = extractFacts(source('https://search.sunbiz.org/detail', 'registry'), page(REGISTRY_TEXT), {
        currentYear: 2025,
      });

      expect(profile.owner_name).toBe('Jane A Doe');
      expect(profile.owner_title).toBe('President');
      expect(profile.years_in_business).toBe(27);
      expect(profile.years_in_business_basis).toBe('filing_date');
      expect(profile.source_type).toBe('registry');
      expect(profile.contacts.phones).toEqual(['(512) 555-0100']);
    });

    it('should mine an official home page', () => {
      const profile = extractFacts(
        source('https://www.smithmotors.com/', 'official'),
        page('John Carter, Owner. Serving Austin since 1985. © 2019 Smith Motors.', 'Smith Motors'),
        { currentYear: 2025 }
      );

      expect(profile.owner_name).toBe('John Carter');
      expect(profile.owner_title).toBe('Owner');
      expect(profile.years_in_business).toBe(40);
      expect(profile.years_in_business_basis).toBe('text');
      expect(profile.website).toBe('https://www.smithmotors.com');
      expect(profile.pain_points).toEqual([
        'Website copyright notice is outdated (2019)',
        'No online service scheduling on website',
        'No online inventory listing on website',
      ]);
      expect(profile.achievements).toEqual([]);
      expect(profile.social_links).toEqual({});
    });

    it('should collect complaints from review sources', () => {
      const profile = extractFacts(
        source('https://www.yelp.com/biz/smith-motors', 'review'),
        page('Waited two hours for service. Staff were friendly and helpful.'),
        { currentYear: 2025 }
      );

      expect(profile.pain_points).toEqual(['Waited two hours for service.']);
      expect(profile.owner_name).toBeNull();
      expect(profile.website).toBeNull();
    });

    it('should record the social profile itself', () => {
      const profile = extractFacts(
        source('https://www.facebook.com/smithmotors', 'social', 'facebook'),
        page('Smith Motors on Facebook'),
        { currentYear: 2025 }
      );

      expect(profile.social_links).toEqual({ facebook: 'https://www.facebook.com/smithmotors' });
    });
  });
});
