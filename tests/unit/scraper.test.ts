/**
 * Unit Tests for Scraper Module (page fetcher)
 *
 * HTTP is served by an in-process axios adapter; nothing leaves the process.
 */

import { describe, it, expect } from '@jest/globals';
import axios, { AxiosError, type InternalAxiosRequestConfig } from 'axios';
import {
  HttpPageFetcher,
  classifyPageKind,
  describeFetchError,
  extractContacts,
  extractDomain,
  htmlToText,
  normalizePhone,
  normalizeUrl,
} from '../../src/scraper/index.js';
import { silentLogger } from '../../src/observability/index.js';

// ============================================================================
// Test Fixtures
// ============================================================================

const HOME_HTML = [
  '<html><head><title> Smith Motors </title><script>var tracking = 1;</script></head>',
  '<body><nav>Menu</nav><h1>Welcome</h1>',
  '<p>Call us at 512-555-0100 or email <a href="mailto:Jane@SmithMotors.com">Jane</a>.</p>',
  '<p>Follow <a href="https://www.facebook.com/smithmotors">us</a></p>',
  '</body></html>',
].join('');

const respondWith = (data: string, contentType: string) =>
  axios.create({
    adapter: async (config: InternalAxiosRequestConfig) => ({
      data,
      status: 200,
      statusText: 'OK',
      headers: { 'content-type': contentType },
      config,
    }),
  });

const failWith = (makeError: (config: InternalAxiosRequestConfig) => Error) =>
  axios.create({
    adapter: async (config: InternalAxiosRequestConfig) => {
      throw makeError(config);
    },
  });

// ============================================================================
// Tests
// ============================================================================

describe('Scraper Module', () => {
  describe('URL helpers', () => {
    it('should extract the domain without www', () => {
      expect(extractDomain('https://WWW.Example.com/path')).toBe('example.com');
      expect(extractDomain('example.com/path')).toBe('example.com');
    });

    it('should normalize URLs for de-duplication', () => {
      expect(normalizeUrl('https://www.Example.com/About/?q=1#x')).toBe('example.com/about');
      expect(normalizeUrl('http://example.com/about')).toBe('example.com/about');
    });
  });

  describe('classifyPageKind', () => {
    it('should classify by path first', () => {
      expect(classifyPageKind('https://smithmotors.com/')).toBe('home');
      expect(classifyPageKind('https://smithmotors.com/about-us')).toBe('about');
      expect(classifyPageKind('https://smithmotors.com/staff')).toBe('staff');
    });

    it('should fall back to title keywords', () => {
      expect(classifyPageKind('https://smithmotors.com/page?id=2', 'Contact Us | Smith Motors')).toBe('contact');
      expect(classifyPageKind('https://smithmotors.com/page', 'Misc')).toBe('other');
    });
  });

  describe('normalizePhone', () => {
    it('should format North American numbers', () => {
      expect(normalizePhone('+1 (512) 555-0100')).toBe('(512) 555-0100');
      expect(normalizePhone('555-0100')).toBeNull();
    });
  });

  describe('extractContacts', () => {
    it('should de-duplicate phones and order generic mailboxes last', () => {
      const contacts = extractContacts(
        'Call (512) 555-0100 or 1-512-555-0100. Email info@smithmotors.com or jane.doe@smithmotors.com.'
      );

      expect(contacts.phones).toEqual(['(512) 555-0100']);
      expect(contacts.emails).toEqual(['jane.doe@smithmotors.com', 'info@smithmotors.com']);
    });
  });

  describe('htmlToText', () => {
    it('should keep block boundaries and drop scripts and navigation', () => {
      const page = htmlToText(HOME_HTML);

      expect(page.title).toBe('Smith Motors');
      expect(page.text).toBe('Welcome\nCall us at 512-555-0100 or email Jane.\nFollow us');
      expect(page.links).toEqual(['https://www.facebook.com/smithmotors']);
      expect(page.mailtoEmails).toEqual(['jane@smithmotors.com']);
    });

    it('should keep footer text so copyright years stay visible', () => {
      const page = htmlToText(
        '<html><body><p>Welcome</p><nav>Home</nav><footer>© 2015 Smith Motors</footer></body></html>'
      );

      expect(page.text).toBe('Welcome\n© 2015 Smith Motors');
    });
  });

  describe('describeFetchError', () => {
    it('should treat plain errors as fetch failures', () => {
      expect(describeFetchError(new Error('boom'), 10)).toEqual({ code: 'FETCH_FAILED', message: 'boom' });
    });
  });

  describe('HttpPageFetcher', () => {
    it('should return text, contacts and social links for an HTML page', async () => {
      const fetcher = new HttpPageFetcher({}, silentLogger, undefined, respondWith(HOME_HTML, 'text/html; charset=utf-8'));
      const page = await fetcher.fetch('https://smithmotors.com/');

      expect(page.succeeded).toBe(true);
      expect(page.error).toBeNull();
      expect(page.title).toBe('Smith Motors');
      expect(page.contacts.phones).toEqual(['(512) 555-0100']);
      expect(page.contacts.emails).toEqual(['jane@smithmotors.com']);
      expect(page.links).toEqual(['https://www.facebook.com/smithmotors']);
    });

    it('should reject unsupported content types', async () => {
      const fetcher = new HttpPageFetcher({}, silentLogger, undefined, respondWith('%PDF', 'application/pdf'));
      const page = await fetcher.fetch('https://smithmotors.com/brochure.pdf');

      expect(page.succeeded).toBe(false);
      expect(page.error).toBe('FETCH_FAILED: unsupported content type application/pdf');
    });

    it('should report timeouts without throwing', async () => {
      const client = failWith((config) => new AxiosError('timeout of 100ms exceeded', 'ECONNABORTED', config));
      const fetcher = new HttpPageFetcher({}, silentLogger, undefined, client);
      const page = await fetcher.fetch('https://smithmotors.com/', { timeoutMs: 100 });

      expect(page.succeeded).toBe(false);
      expect(page.error).toBe('FETCH_TIMEOUT: timed out after 100ms');
      expect(page.text).toBe('');
    });

    it('should report HTTP errors by status', async () => {
      const client = failWith(
        (config) =>
          new AxiosError('Request failed with status code 404', 'ERR_BAD_REQUEST', config, null, {
            data: '',
            status: 404,
            statusText: 'Not Found',
            headers: {},
            config,
          })
      );
      const fetcher = new HttpPageFetcher({}, silentLogger, undefined, client);
      const page = await fetcher.fetch('https://smithmotors.com/missing');

      expect(page.error).toBe('FETCH_FAILED: HTTP 404');
    });
  });
});
