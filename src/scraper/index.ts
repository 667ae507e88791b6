/**
 * Scraper Module - Page Fetcher
 *
 * The single page-fetching capability the pipeline depends on. The core only
 * sees the `PageFetcher` interface; `HttpPageFetcher` is the production
 * implementation.
 *
 * Features:
 * - HTTP fetch with axios (timeout, redirect cap, abort signal)
 * - HTML to line-preserving text with cheerio
 * - Phone and email extraction (generic mailboxes ordered last)
 * - Page kind classification from URL path and title keywords
 * - Never throws: network and parse failures become `succeeded: false`
 *
 * Usage:
 * ```typescript
 * const fetcher = new HttpPageFetcher({ timeoutMs: 20000 });
 * const page = await fetcher.fetch('https://smithmotors.com/about');
 * if (page.succeeded) console.log(page.contacts.phones);
 * ```
 */

import axios, { type AxiosInstance } from 'axios';
import * as cheerio from 'cheerio';
import type { ContactSet } from '../types/index.js';
import { createConsoleLogger, noopMetrics, type Logger, type Metrics } from '../observability/index.js';

// ============================================================================
// Type Definitions
// ============================================================================

/**
 * Kind of page within a business website
 */
export type PageKind =
  | 'home'
  | 'about'
  | 'staff'
  | 'services'
  | 'inventory'
  | 'reviews'
  | 'news'
  | 'community'
  | 'contact'
  | 'other';

/**
 * Outcome of fetching one URL
 */
export interface PageFetchResult {
  url: string;
  text: string;
  title: string;
  contacts: ContactSet;
  /** Outbound links worth keeping (social profiles) */
  links: string[];
  succeeded: boolean;
  error: string | null;
}

export interface FetchOptions {
  /** Per-request timeout; overrides the fetcher default */
  timeoutMs?: number;
  signal?: AbortSignal;
}

/**
 * Page fetching capability. Implementations must not throw for network errors.
 */
export interface PageFetcher {
  fetch(url: string, options?: FetchOptions): Promise<PageFetchResult>;
}

export interface HttpFetcherConfig {
  /** Request timeout in milliseconds (default: 20000) */
  timeoutMs?: number;
  /** Maximum redirects followed (default: 5) */
  maxRedirects?: number;
  /** User-Agent header (default: desktop Chrome) */
  userAgent?: string;
  /** Page text beyond this length is cut (default: 200000) */
  maxTextChars?: number;
}

type ResolvedFetcherConfig = Required<HttpFetcherConfig>;

// ============================================================================
// Constants
// ============================================================================

const DEFAULT_CONFIG: ResolvedFetcherConfig = {
  timeoutMs: 20000,
  maxRedirects: 5,
  userAgent:
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36',
  maxTextChars: 200000,
};

/**
 * URL path patterns for page kind classification, checked in declaration order
 */
const PAGE_KIND_PATTERNS: Record<PageKind, RegExp[]> = {
  home: [/^\/$/, /^\/index\.(html?|php)$/i, /^\/home$/i],
  about: [/\/about/i, /\/who-we-are/i, /\/our-story/i, /\/history/i, /\/why-buy/i, /\/why-choose/i],
  staff: [/\/staff/i, /\/team/i, /\/leadership/i, /\/management/i, /\/meet-/i, /\/our-people/i],
  services: [/\/service/i, /\/parts/i, /\/financ/i, /\/repair/i, /\/maintenance/i, /\/body-shop/i],
  inventory: [/\/inventory/i, /\/new-vehicles/i, /\/used-vehicles/i, /\/pre-owned/i, /\/cars-for-sale/i, /\/specials/i],
  reviews: [/\/reviews?/i, /\/testimonials?/i],
  news: [/\/news/i, /\/blog/i, /\/press/i, /\/events?/i],
  community: [/\/community/i, /\/charity/i, /\/giving/i, /\/sponsor/i, /\/volunteer/i],
  contact: [/\/contact/i, /\/hours/i, /\/directions/i, /\/locations?$/i],
  other: [],
};

/**
 * Title keywords used when the path is inconclusive
 */
const PAGE_KIND_KEYWORDS: Record<PageKind, string[]> = {
  home: ['home page', 'welcome to'],
  about: ['about us', 'our story', 'who we are', 'our history'],
  staff: ['our team', 'our staff', 'meet the team', 'leadership'],
  services: ['service department', 'service center', 'auto repair', 'financing'],
  inventory: ['inventory', 'vehicles for sale', 'cars for sale'],
  reviews: ['reviews', 'testimonials', 'what our customers say'],
  news: ['news', 'blog', 'press release'],
  community: ['community', 'giving back', 'charity'],
  contact: ['contact us', 'hours & directions', 'get in touch'],
  other: [],
};

export const PHONE_PATTERN = /(?:\+?1[-.\s]?)?\(?\d{3}\)?[-.\s]?\d{3}[-.\s]?\d{4}\b/g;
export const EMAIL_PATTERN = /[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}/g;

const GENERIC_MAILBOXES = ['info', 'contact', 'sales', 'support', 'service', 'noreply', 'no-reply', 'webmaster', 'admin'];
const ASSET_EXTENSIONS = /\.(png|jpe?g|gif|svg|webp)$/i;

const SOCIAL_LINK_PATTERN = /(facebook\.com|linkedin\.com|instagram\.com|twitter\.com|x\.com|youtube\.com|tiktok\.com)\//i;

// ============================================================================
// URL Helpers
// ============================================================================

/**
 * Hostname without a leading www., lowercased
 */
export function extractDomain(url: string): string {
  try {
    return new URL(url).hostname.toLowerCase().replace(/^www\./, '');
  } catch {
    const match = url.match(/(?:https?:\/\/)?([^/?#]+)/i);
    return (match?.[1] ?? url).toLowerCase().replace(/^www\./, '');
  }
}

/**
 * Normalize URL for deduplication: scheme, www., query, hash and trailing slash ignored
 */
export function normalizeUrl(url: string): string {
  try {
    const parsed = new URL(url);
    const host = parsed.hostname.toLowerCase().replace(/^www\./, '');
    return `${host}${parsed.pathname}`.replace(/\/+$/, '').toLowerCase();
  } catch {
    return url.trim().toLowerCase().replace(/^https?:\/\//, '').replace(/^www\./, '').replace(/\/+$/, '');
  }
}

/**
 * Classify a website page by URL path, then by title keywords
 */
export function classifyPageKind(url: string, title = ''): PageKind {
  let pathname = '/';
  try {
    pathname = new URL(url).pathname || '/';
  } catch {
    pathname = '/';
  }

  for (const [kind, patterns] of Object.entries(PAGE_KIND_PATTERNS)) {
    if (patterns.some((pattern) => pattern.test(pathname))) {
      return toPageKind(kind);
    }
  }

  const lowerTitle = title.toLowerCase();
  for (const [kind, keywords] of Object.entries(PAGE_KIND_KEYWORDS)) {
    if (keywords.some((keyword) => lowerTitle.includes(keyword))) {
      return toPageKind(kind);
    }
  }

  return 'other';
}

function toPageKind(value: string): PageKind {
  switch (value) {
    case 'home':
    case 'about':
    case 'staff':
    case 'services':
    case 'inventory':
    case 'reviews':
    case 'news':
    case 'community':
    case 'contact':
      return value;
    default:
      return 'other';
  }
}

// ============================================================================
// Contact Extraction
// ============================================================================

/**
 * Format a North American phone number as (555) 123-4567, or null when it is not one
 */
export function normalizePhone(raw: string): string | null {
  let digits = raw.replace(/\D/g, '');
  if (digits.length === 11 && digits.startsWith('1')) {
    digits = digits.slice(1);
  }
  if (digits.length !== 10) {
    return null;
  }
  return `(${digits.slice(0, 3)}) ${digits.slice(3, 6)}-${digits.slice(6)}`;
}

function isGenericMailbox(email: string): boolean {
  const local = email.split('@')[0] ?? '';
  return GENERIC_MAILBOXES.includes(local);
}

/**
 * Pull phones and emails out of free text. Personal mailboxes come before
 * generic ones (info@, sales@, ...); duplicates are removed.
 */
export function extractContacts(text: string): ContactSet {
  const phones: string[] = [];
  for (const match of text.matchAll(PHONE_PATTERN)) {
    const phone = normalizePhone(match[0]);
    if (phone && !phones.includes(phone)) {
      phones.push(phone);
    }
  }

  const emails: string[] = [];
  for (const match of text.matchAll(EMAIL_PATTERN)) {
    const email = match[0].toLowerCase().replace(/\.+$/, '');
    if (!ASSET_EXTENSIONS.test(email) && !emails.includes(email)) {
      emails.push(email);
    }
  }

  const personal = emails.filter((email) => !isGenericMailbox(email));
  const generic = emails.filter((email) => isGenericMailbox(email));

  return { phones, emails: [...personal, ...generic] };
}

// ============================================================================
// HTML Processing
// ============================================================================

/**
 * Convert HTML into text that keeps block boundaries as newlines
 */
export function htmlToText(html: string): { title: string; text: string; links: string[]; mailtoEmails: string[] } {
  const $ = cheerio.load(html);
  const title = $('title').first().text().trim();

  const links: string[] = [];
  const mailtoEmails: string[] = [];
  $('a[href]').each((_, el) => {
    const href = ($(el).attr('href') ?? '').trim();
    if (href.toLowerCase().startsWith('mailto:')) {
      const address = href.slice(7).split('?')[0] ?? '';
      if (address) mailtoEmails.push(address.toLowerCase());
    } else if (SOCIAL_LINK_PATTERN.test(href) && !links.includes(href)) {
      links.push(href);
    }
  });

  $('script, style, noscript, iframe, svg, nav').remove();
  $('br').replaceWith('\n');
  $('p, div, li, h1, h2, h3, h4, h5, h6, tr, section, article, dd, dt').append('\n');

  const text = $('body')
    .text()
    .split('\n')
    .map((line) => line.replace(/[ \t\u00a0]+/g, ' ').trim())
    .filter((line) => line.length > 0)
    .join('\n');

  return { title, text, links, mailtoEmails };
}

// ============================================================================
// Errors
// ============================================================================

/**
 * Map a thrown fetch error to a stable code and message
 */
export function describeFetchError(error: unknown, timeoutMs: number): { code: 'FETCH_TIMEOUT' | 'FETCH_FAILED'; message: string } {
  if (axios.isAxiosError(error)) {
    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return { code: 'FETCH_TIMEOUT', message: `timed out after ${timeoutMs}ms` };
    }
    if (error.code === 'ERR_CANCELED') {
      return { code: 'FETCH_FAILED', message: 'request aborted' };
    }
    if (error.response) {
      return { code: 'FETCH_FAILED', message: `HTTP ${error.response.status}` };
    }
    return { code: 'FETCH_FAILED', message: error.message };
  }
  return { code: 'FETCH_FAILED', message: error instanceof Error ? error.message : String(error) };
}

function failedFetch(url: string, error: string): PageFetchResult {
  return {
    url,
    text: '',
    title: '',
    contacts: { phones: [], emails: [] },
    links: [],
    succeeded: false,
    error,
  };
}

// ============================================================================
// HTTP Page Fetcher
// ============================================================================

/**
 * Plain HTTP page fetcher (no browser automation)
 */
export class HttpPageFetcher implements PageFetcher {
  private readonly config: ResolvedFetcherConfig;
  private readonly client: AxiosInstance;

  constructor(
    config: HttpFetcherConfig = {},
    private readonly logger: Logger = createConsoleLogger('fetcher'),
    private readonly metrics: Metrics = noopMetrics,
    client?: AxiosInstance
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.client =
      client ??
      axios.create({
        maxRedirects: this.config.maxRedirects,
        headers: {
          'User-Agent': this.config.userAgent,
          Accept: 'text/html,application/xhtml+xml;q=0.9,*/*;q=0.5',
          'Accept-Language': 'en-US,en;q=0.9',
        },
      });
  }

  async fetch(url: string, options: FetchOptions = {}): Promise<PageFetchResult> {
    const startTime = Date.now();
    const timeoutMs = options.timeoutMs ?? this.config.timeoutMs;

    try {
      const response = await this.client.get<string>(url, {
        timeout: timeoutMs,
        signal: options.signal,
        responseType: 'text',
      });

      const contentType = String(response.headers['content-type'] ?? 'text/html');
      if (!contentType.includes('html') && !contentType.includes('text/plain')) {
        this.metrics.increment('fetcher.unsupported_content');
        return failedFetch(url, `FETCH_FAILED: unsupported content type ${contentType}`);
      }

      const body = typeof response.data === 'string' ? response.data : '';
      const page = contentType.includes('html')
        ? htmlToText(body)
        : { title: '', text: body, links: [], mailtoEmails: [] };

      const text = page.text.slice(0, this.config.maxTextChars);
      const contacts = extractContacts(text);
      for (const email of page.mailtoEmails) {
        if (!contacts.emails.includes(email)) contacts.emails.push(email);
      }

      this.metrics.timing('fetcher.duration', Date.now() - startTime);
      this.metrics.increment('fetcher.success');
      this.logger.debug('Fetched page', { url, chars: text.length });

      return {
        url,
        text,
        title: page.title,
        contacts,
        links: page.links,
        succeeded: true,
        error: null,
      };
    } catch (error) {
      const { code, message } = describeFetchError(error, timeoutMs);
      this.metrics.increment('fetcher.failure', { code });
      this.logger.warn('Fetch failed', { url, code, error: message });
      return failedFetch(url, `${code}: ${message}`);
    }
  }
}

export default {
  HttpPageFetcher,
  classifyPageKind,
  extractContacts,
  extractDomain,
  normalizeUrl,
  normalizePhone,
  htmlToText,
  describeFetchError,
};
