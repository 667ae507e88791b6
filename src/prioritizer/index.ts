/**
 * Context Prioritizer Module
 *
 * Assembles the bounded text context handed to content generation. Evidence is
 * routed into six fixed sections and emitted most valuable first:
 *
 * 1. Owner & Personnel - merged profile facts, registry text, staff pages
 * 2. Business Description - official about pages
 * 3. Recent News & Community - news, social, official news/community pages
 * 4. Testimonials & Reviews - review sites, official testimonial pages
 * 5. Services - official service/inventory pages, directories
 * 6. Homepage Excerpt - remaining official pages
 *
 * Each section is cut to its soft cap. Sections are appended while budget
 * remains; the first section that does not fit is cut to exactly the remaining
 * budget and nothing after it is added.
 */

import type { ContextSection, FetchedContent, MergedProfile, PrioritizedContext } from '../types/index.js';
import { classifyPageKind } from '../scraper/index.js';
import { compareForMerge } from '../merger/index.js';

// ============================================================================
// Type Definitions
// ============================================================================

export type SectionKey = 'personnel' | 'about' | 'news' | 'reviews' | 'services' | 'homepage';

export interface SectionSpec {
  key: SectionKey;
  label: string;
  priority_rank: number;
}

export interface PrioritizeOptions {
  /** Per-section soft cap overrides */
  softCaps?: Partial<Record<SectionKey, number>>;
}

// ============================================================================
// Constants
// ============================================================================

export const DEFAULT_MAX_CONTEXT_CHARS = 80000;

export const SECTION_SPECS: readonly SectionSpec[] = [
  { key: 'personnel', label: 'Owner & Personnel', priority_rank: 1 },
  { key: 'about', label: 'Business Description', priority_rank: 2 },
  { key: 'news', label: 'Recent News & Community', priority_rank: 3 },
  { key: 'reviews', label: 'Testimonials & Reviews', priority_rank: 4 },
  { key: 'services', label: 'Services', priority_rank: 5 },
  { key: 'homepage', label: 'Homepage Excerpt', priority_rank: 6 },
];

/** Longest body kept per section before budget truncation */
export const DEFAULT_SOFT_CAPS: Readonly<Record<SectionKey, number>> = {
  personnel: 10000,
  about: 16000,
  news: 16000,
  reviews: 14000,
  services: 12000,
  homepage: 12000,
};

// ============================================================================
// Section Building
// ============================================================================

/**
 * Which section a fetched source feeds, or null when it feeds none
 */
export function sectionFor(item: FetchedContent): SectionKey | null {
  switch (item.source.source_type) {
    case 'registry':
      return 'personnel';
    case 'social':
    case 'news':
      return 'news';
    case 'review':
      return 'reviews';
    case 'directory':
      return 'services';
    case 'official':
      break;
    default:
      return null;
  }

  switch (classifyPageKind(item.source.url, item.source.title)) {
    case 'staff':
      return 'personnel';
    case 'about':
      return 'about';
    case 'news':
    case 'community':
      return 'news';
    case 'reviews':
      return 'reviews';
    case 'services':
    case 'inventory':
      return 'services';
    default:
      return 'homepage';
  }
}

/**
 * Render merged profile facts as plain lines
 */
export function formatProfile(profile: MergedProfile): string {
  const lines: string[] = [];

  if (profile.owner_name) {
    lines.push(`Owner: ${profile.owner_name} (${profile.owner_title ?? 'Owner'})`);
  }
  if (profile.years_in_business !== null) {
    lines.push(`Years in business: ${profile.years_in_business}`);
  }
  if (profile.website) {
    lines.push(`Website: ${profile.website}`);
  }
  if (profile.contacts.phones.length > 0) {
    lines.push(`Phones: ${profile.contacts.phones.join(', ')}`);
  }
  if (profile.contacts.emails.length > 0) {
    lines.push(`Emails: ${profile.contacts.emails.join(', ')}`);
  }
  const social = Object.entries(profile.social_links);
  if (social.length > 0) {
    lines.push(`Social profiles: ${social.map(([platform, url]) => `${platform} ${url}`).join(', ')}`);
  }
  if (profile.achievements.length > 0) {
    lines.push('Achievements:', ...profile.achievements.map((item) => `- ${item}`));
  }
  if (profile.pain_points.length > 0) {
    lines.push('Observed challenges:', ...profile.pain_points.map((item) => `- ${item}`));
  }

  return lines.join('\n');
}

export function formatSection(label: string, body: string): string {
  return `### ${label}\n${body}\n\n`;
}

function sourceBlock(item: FetchedContent): string {
  return `Source: ${item.source.url}\n${item.raw_text.trim()}`;
}

/**
 * Section bodies before budget truncation, each within its soft cap
 */
export function buildSectionBodies(
  merged: MergedProfile,
  fetched: readonly FetchedContent[],
  softCaps: Record<SectionKey, number>
): Record<SectionKey, string> {
  const blocks: Record<SectionKey, string[]> = {
    personnel: [],
    about: [],
    news: [],
    reviews: [],
    services: [],
    homepage: [],
  };

  const profileText = formatProfile(merged);
  if (profileText) {
    blocks.personnel.push(profileText);
  }

  const usable = fetched
    .filter((item) => item.fetch_succeeded && item.raw_text.trim().length > 0)
    .sort(compareForMerge);

  for (const item of usable) {
    const key = sectionFor(item);
    if (key) {
      blocks[key].push(sourceBlock(item));
    }
  }

  return {
    personnel: blocks.personnel.join('\n\n').slice(0, softCaps.personnel),
    about: blocks.about.join('\n\n').slice(0, softCaps.about),
    news: blocks.news.join('\n\n').slice(0, softCaps.news),
    reviews: blocks.reviews.join('\n\n').slice(0, softCaps.reviews),
    services: blocks.services.join('\n\n').slice(0, softCaps.services),
    homepage: blocks.homepage.join('\n\n').slice(0, softCaps.homepage),
  };
}

// ============================================================================
// Core Functions
// ============================================================================

/**
 * Assemble the prioritized, budget-bounded context for one record
 *
 * @param merged - Frozen merged profile
 * @param fetched - All fetched sources of the record (failures are skipped)
 * @param maxChars - Hard character budget; total_chars never exceeds it
 */
export function prioritizeContext(
  merged: MergedProfile,
  fetched: readonly FetchedContent[],
  maxChars: number = DEFAULT_MAX_CONTEXT_CHARS,
  options: PrioritizeOptions = {}
): PrioritizedContext {
  const softCaps: Record<SectionKey, number> = { ...DEFAULT_SOFT_CAPS, ...options.softCaps };
  const bodies = buildSectionBodies(merged, fetched, softCaps);
  const sections: ContextSection[] = [];
  let totalChars = 0;

  for (const spec of SECTION_SPECS) {
    const body = bodies[spec.key];
    if (!body) {
      continue;
    }

    const remaining = maxChars - totalChars;
    if (remaining <= 0) {
      break;
    }

    const text = formatSection(spec.label, body);
    if (text.length > remaining) {
      sections.push({ label: spec.label, text: text.slice(0, remaining), priority_rank: spec.priority_rank, truncated: true });
      totalChars += remaining;
      break;
    }

    sections.push({ label: spec.label, text, priority_rank: spec.priority_rank, truncated: false });
    totalChars += text.length;
  }

  return Object.freeze({
    sections: Object.freeze(sections),
    total_chars: totalChars,
    max_chars: maxChars,
  });
}

/**
 * The context exactly as sent to the model
 */
export function renderContext(context: PrioritizedContext): string {
  return context.sections.map((section) => section.text).join('');
}

export default {
  prioritizeContext,
  renderContext,
  formatProfile,
  sectionFor,
  SECTION_SPECS,
};
