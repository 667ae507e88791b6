/**
 * Unit Tests for Source Classifier Module
 */

import { describe, it, expect } from '@jest/globals';
import {
  classifySource,
  classifyCandidates,
  companyTokens,
  looksOfficial,
  isRegistryHost,
  detectSocialPlatform,
} from '../../src/classifier/index.js';

const COMPANY = 'Smith Motors';
const OPTIONS = { currentYear: 2025 };

describe('Source Classifier', () => {
  describe('companyTokens', () => {
    it('should drop short words and corporate suffixes', () => {
      expect(companyTokens('Smith Motors Corporation Inc')).toEqual(['smith', 'motors']);
    });

    it('should de-duplicate tokens', () => {
      expect(companyTokens('Lone Star Star Motors')).toEqual(['lone', 'star', 'motors']);
    });
  });

  describe('host helpers', () => {
    it('should recognize state registries', () => {
      expect(isRegistryHost('search.sunbiz.org')).toBe(true);
      expect(isRegistryHost('sos.texas.gov')).toBe(true);
      expect(isRegistryHost('smithmotors.com')).toBe(false);
    });

    it('should detect social platforms including subdomains', () => {
      expect(detectSocialPlatform('m.facebook.com')).toBe('facebook');
      expect(detectSocialPlatform('x.com')).toBe('twitter');
      expect(detectSocialPlatform('notfacebook.com')).toBeNull();
    });
  });

  describe('looksOfficial', () => {
    const tokens = ['smith', 'motors'];

    it('should accept two company tokens in the domain', () => {
      expect(looksOfficial('smithmotors.com', '', tokens)).toBe(true);
    });

    it('should accept one token in the domain plus another in the title', () => {
      expect(looksOfficial('smithauto.com', 'Smith Motors', tokens)).toBe(true);
    });

    it('should reject one token without confirmation in the title', () => {
      expect(looksOfficial('smithauto.com', 'Welcome to Smith', tokens)).toBe(false);
    });

    it('should never treat third-party hosts as official', () => {
      expect(looksOfficial('facebook.com', 'Smith Motors', tokens)).toBe(false);
    });

    it('should confirm a single-token name by the same word in the title', () => {
      expect(looksOfficial('zephyr.com', 'Zephyr - Home', ['zephyr'])).toBe(true);
      expect(looksOfficial('zephyr.com', 'Welcome', ['zephyr'])).toBe(false);
    });
  });

  describe('classifySource', () => {
    it('should classify and score the official site', () => {
      const source = classifySource(
        { url: 'https://www.smithmotors.com', title: 'Smith Motors - Home', snippet: '' },
        COMPANY,
        OPTIONS
      );

      expect(source.source_type).toBe('official');
      expect(source.relevance_score).toBe(13);
      expect(source.platform).toBeNull();
      expect(source.discovery_index).toBe(0);
    });

    it('should classify registry hosts before anything else', () => {
      const source = classifySource(
        { url: 'https://search.sunbiz.org/Inquiry/CorporationSearch/ByName', title: 'Detail by Entity Name', snippet: '' },
        COMPANY,
        OPTIONS
      );

      expect(source.source_type).toBe('registry');
      expect(source.relevance_score).toBe(12);
    });

    it('should weight social sources by platform', () => {
      const source = classifySource(
        { url: 'https://www.facebook.com/smithmotors', title: 'Smith Motors | Facebook', snippet: '' },
        COMPANY,
        OPTIONS
      );

      expect(source.source_type).toBe('social');
      expect(source.platform).toBe('facebook');
      expect(source.relevance_score).toBe(12);
    });

    it('should classify review sites', () => {
      const source = classifySource(
        { url: 'https://www.yelp.com/biz/smith-motors-austin', title: 'Smith Motors - Austin, TX - Yelp', snippet: 'Read 25 reviews' },
        COMPANY,
        OPTIONS
      );

      expect(source.source_type).toBe('review');
      expect(source.relevance_score).toBe(11);
    });

    it('should penalize aggregator directories', () => {
      const source = classifySource(
        { url: 'https://www.yellowpages.com/austin-tx/smith-motors', title: 'Smith Motors in Austin', snippet: '' },
        COMPANY,
        OPTIONS
      );

      expect(source.source_type).toBe('directory');
      expect(source.relevance_score).toBe(4);
    });

    it('should flag other dealerships as competitors', () => {
      const source = classifySource(
        { url: 'https://jonesauto.com', title: 'Jones Auto Sales', snippet: '' },
        COMPANY,
        OPTIONS
      );

      expect(source.source_type).toBe('competitor');
      expect(source.relevance_score).toBe(1);
    });

    it('should add signal, recency and focus bonuses to news', () => {
      const hit = {
        url: 'https://www.austinnews.com/business/smith-motors-expands',
        title: 'Smith Motors announces new showroom',
        snippet: 'Opened in 2025',
      };

      expect(classifySource(hit, COMPANY, OPTIONS).source_type).toBe('news');
      expect(classifySource(hit, COMPANY, OPTIONS).relevance_score).toBe(14);
      expect(classifySource(hit, COMPANY, { ...OPTIONS, focus: 'recent_activity' }).relevance_score).toBe(17);
    });

    it('should mark unrelated pages irrelevant with zero score', () => {
      const source = classifySource({ url: 'https://example.org/page', title: 'Unrelated', snippet: '' }, COMPANY, OPTIONS);

      expect(source.source_type).toBe('irrelevant');
      expect(source.relevance_score).toBe(0);
    });

    it('should be deterministic for identical input', () => {
      const hit = { url: 'https://www.smithmotors.com/about', title: 'About Smith Motors', snippet: 'Family owned' };
      expect(classifySource(hit, COMPANY, OPTIONS)).toEqual(classifySource(hit, COMPANY, OPTIONS));
    });
  });

  describe('classifyCandidates', () => {
    it('should number candidates by discovery position', () => {
      const sources = classifyCandidates(
        [
          { url: 'https://www.smithmotors.com', title: 'Smith Motors', snippet: '' },
          { url: 'https://example.org', title: 'Other', snippet: '' },
        ],
        COMPANY,
        OPTIONS
      );

      expect(sources.map((source) => source.discovery_index)).toEqual([0, 1]);
    });
  });
});
