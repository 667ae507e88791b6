/**
 * Fact Extractor Module
 *
 * Turns the text of one fetched source into a PartialProfile. Every fact is
 * stamped with the source type and URL it came from so the merger can apply
 * source priority later.
 *
 * Features:
 * - Registry officer parsing ("Title PRES" / "DOE, JANE" blocks and
 *   "President: Jane Doe" lines), filing date to years in business
 * - Owner/role mentions in prose ("Jane Doe, Owner", "Owner Jane Doe")
 * - Text-mined years in business ("since 1985", "over 30 years")
 * - Achievement and pain-point sentences
 * - Website capability gaps on official home pages
 * - Social profile links
 */

import type { CandidateSource, ContactSet, PartialProfile } from '../types/index.js';
import { classifyPageKind, extractDomain } from '../scraper/index.js';
import { detectSocialPlatform } from '../classifier/index.js';

// ============================================================================
// Type Definitions
// ============================================================================

/**
 * The parts of a fetched page the extractor reads
 */
export interface PageEvidence {
  text: string;
  title: string;
  contacts: ContactSet;
  links: string[];
}

export interface ExtractOptions {
  /** Year used for filing-date and copyright arithmetic (default: current year) */
  currentYear?: number;
}

export interface Officer {
  name: string;
  title: string;
}

export interface RegistryRecord {
  officers: Officer[];
  filingYear: number | null;
  status: string | null;
  website: string | null;
}

export interface OwnerMention {
  name: string;
  title: string;
}

// ============================================================================
// Constants
// ============================================================================

const TITLE_ABBREVIATIONS: Record<string, string> = {
  P: 'President',
  PRES: 'President',
  PRESIDENT: 'President',
  VP: 'Vice President',
  CEO: 'CEO',
  MGR: 'Manager',
  MANAGER: 'Manager',
  MGRM: 'Managing Member',
  AMBR: 'Authorized Member',
  MEMBER: 'Member',
  OWNER: 'Owner',
  D: 'Director',
  DIR: 'Director',
  S: 'Secretary',
  T: 'Treasurer',
};

/** Lower index = stronger claim to being the decision maker */
const OFFICER_TITLE_RANK = [
  'Owner',
  'President',
  'CEO',
  'Managing Member',
  'Dealer Principal',
  'Manager',
  'Authorized Member',
  'Member',
  'Director',
  'Vice President',
  'Secretary',
  'Treasurer',
];

const MENTION_ROLE_RANK = [
  'Owner',
  'Co-Owner',
  'Dealer Principal',
  'President',
  'CEO',
  'Founder',
  'Managing Partner',
  'General Manager',
];

const REGISTRY_TITLE_LINE = /^Title\s+([A-Z]{1,9})(?:[ ,/]+[A-Z]{1,9})*$/;
const REGISTRY_NAME_LINE = /^[A-Z][A-Za-z'.-]+(?:,?[ \t]+[A-Z][A-Za-z'.-]*){1,3}$/;
const REGISTRY_INLINE_OFFICER =
  /\b(President|Chief Executive Officer|CEO|Owner|Managing Member|Manager|Member|Director|Dealer Principal)[ \t]*:[ \t]*([A-Z][A-Za-z'.-]+(?:,?[ \t]+[A-Z][A-Za-z'.-]+){1,3})/g;
const FILING_DATE =
  /(?:Date Filed|Filed Date|Filing Date|Date of Incorporation|Incorporation Date|Date of Organization)[:\s]+(\d{1,2})\/(\d{1,2})\/(\d{4})/i;
const REGISTRY_STATUS = /\bStatus[:\s]+(Active|Inactive|Dissolved|Good Standing|Revoked)\b/i;
const REGISTRY_WEBSITE = /\b(?:Website|Web Site|URL)[:\s]+((?:https?:\/\/)?(?:www\.)?[a-z0-9-]+(?:\.[a-z0-9-]+)+[^\s]*)/i;

const NAME_SOURCE = "[A-Z](?:[a-z'’-]+|\\.)(?:[ \\t]+[A-Z]\\.)?[ \\t]+[A-Z][a-z'’-]+(?:[ \\t]+(?:Jr\\.|Sr\\.|II|III))?";
const ROLE_SOURCE = '(?:Co-Owner|Owner|Dealer Principal|President|CEO|Founder|Managing Partner|General Manager)';
const NAME_THEN_ROLE = new RegExp(`(${NAME_SOURCE})[ \\t]*(?:,|-|–|\\|)[ \\t]*(?:and[ \\t]+|the[ \\t]+)?(${ROLE_SOURCE})\\b`, 'g');
const ROLE_THEN_NAME = new RegExp(`\\b(${ROLE_SOURCE})[ \\t]*[,:-]?[ \\t]*(${NAME_SOURCE})`, 'g');

/**
 * Words that never appear in a person's name on a dealership page
 */
const NON_PERSON_WORDS = new Set([
  'the', 'our', 'about', 'contact', 'home', 'meet', 'team', 'staff', 'service', 'services',
  'sales', 'parts', 'finance', 'motors', 'motor', 'auto', 'autos', 'cars', 'car', 'dealer',
  'dealership', 'group', 'center', 'new', 'used', 'ford', 'chevrolet', 'toyota', 'honda',
  'nissan', 'hyundai', 'kia', 'jeep', 'dodge', 'ram', 'buick', 'gmc', 'subaru', 'mazda',
  'monday', 'tuesday', 'wednesday', 'thursday', 'friday', 'saturday', 'sunday',
]);

const YEARS_SINCE = /\b(?:since|established(?:\s+in)?|founded(?:\s+in)?|est\.?)\s+(1[89]\d{2}|20\d{2})\b/i;
const YEARS_COUNT = /\b(?:over|more than|for|nearly|almost)\s+(\d{1,3})\+?\s+years\b/i;
const YEARS_IN_BUSINESS = /\b(\d{1,3})\+?\s+years\s+(?:in business|of service|serving)\b/i;

const ACHIEVEMENT_PATTERNS: RegExp[] = [
  /\b(?:best|top)\b.{0,60}\bdealer(?:ship)?s?\b/i,
  /#\s?1\b/,
  /\bawards?\b|\bawarded\b|\baward-winning\b/i,
  /\b(?:certified|authorized)\b.{0,30}\bdealer/i,
  /\b(?:president'?s|chairman'?s)\s+(?:award|club)\b/i,
  /\b(?:five|5)[- ]star\b/i,
];

const PAIN_TERMS = ['complaint', 'issue', 'problem', 'frustrat', 'disappoint', 'rude', 'never again', 'worst', 'poor service', 'waited'];

const COPYRIGHT_YEAR = /(?:©|&copy;|copyright)\s*(?:\d{4}\s*[-–]\s*)?(\d{4})/i;
const ONLINE_SCHEDULING = /\b(?:schedule|book)\s+(?:an?\s+|your\s+)?(?:service|appointment|test drive)/i;
const URL_IN_TEXT = /https?:\/\/[^\s"'<>)]+/g;
const SHARE_LINK = /sharer|share\?|intent\/|\/share\//i;

const MAX_ACHIEVEMENTS = 5;
const MAX_PAIN_POINTS = 3;
const MAX_SENTENCE_CHARS = 200;

// ============================================================================
// Helpers
// ============================================================================

/**
 * "DOE, JANE A" -> "Jane A Doe"; mixed-case words are left alone
 */
export function formatPersonName(raw: string): string {
  const trimmed = raw.replace(/\s+/g, ' ').trim();
  const comma = trimmed.indexOf(',');
  const ordered = comma === -1 ? trimmed : `${trimmed.slice(comma + 1).trim()} ${trimmed.slice(0, comma).trim()}`;
  return ordered
    .split(' ')
    .filter((word) => word.length > 0)
    .map((word) => (word === word.toUpperCase() && word.length > 1 ? word.charAt(0) + word.slice(1).toLowerCase() : word))
    .join(' ');
}

/**
 * Validate if a string looks like a person's name
 */
export function isLikelyPersonName(name: string): boolean {
  const words = name.toLowerCase().split(/\s+/);
  if (words.length < 2 || words.length > 4) {
    return false;
  }
  return !words.some((word) => NON_PERSON_WORDS.has(word.replace(/[.,]/g, '')));
}

function rankOf(title: string, ranking: string[]): number {
  const index = ranking.indexOf(title);
  return index === -1 ? ranking.length : index;
}

function sentencesOf(text: string): string[] {
  return text
    .split(/(?<=[.!?])\s+|\n+/)
    .map((sentence) => sentence.replace(/\s+/g, ' ').trim())
    .filter((sentence) => sentence.length >= 12);
}

function clip(sentence: string): string {
  return sentence.length > MAX_SENTENCE_CHARS ? `${sentence.slice(0, MAX_SENTENCE_CHARS - 3)}...` : sentence;
}

function pushUnique(items: string[], value: string): void {
  const lower = value.toLowerCase();
  if (!items.some((item) => item.toLowerCase() === lower)) {
    items.push(value);
  }
}

function originOf(url: string): string | null {
  try {
    return new URL(url).origin;
  } catch {
    return null;
  }
}

// ============================================================================
// Registry Parsing
// ============================================================================

/**
 * Parse the text of a state business registry detail page
 */
export function parseRegistryText(text: string): RegistryRecord {
  const officers: Officer[] = [];
  const lines = text
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0);

  for (let i = 0; i < lines.length - 1; i++) {
    const titleMatch = lines[i]?.match(REGISTRY_TITLE_LINE);
    const nameLine = lines[i + 1] ?? '';
    if (titleMatch?.[1] && REGISTRY_NAME_LINE.test(nameLine)) {
      const code = titleMatch[1];
      officers.push({
        name: formatPersonName(nameLine),
        title: TITLE_ABBREVIATIONS[code] ?? formatPersonName(code),
      });
    }
  }

  for (const match of text.matchAll(REGISTRY_INLINE_OFFICER)) {
    const [, rawTitle, rawName] = match;
    if (!rawTitle || !rawName) continue;
    const name = formatPersonName(rawName);
    const title = rawTitle === 'Chief Executive Officer' ? 'CEO' : rawTitle;
    if (!officers.some((officer) => officer.name === name)) {
      officers.push({ name, title });
    }
  }

  const filing = text.match(FILING_DATE);
  const status = text.match(REGISTRY_STATUS);
  const website = text.match(REGISTRY_WEBSITE);

  return {
    officers,
    filingYear: filing?.[3] ? parseInt(filing[3], 10) : null,
    status: status?.[1] ?? null,
    website: website?.[1] ?? null,
  };
}

/**
 * The officer most likely to be the decision maker; first listed wins ties
 */
export function pickPrincipalOfficer(officers: Officer[]): Officer | null {
  let best: Officer | null = null;
  for (const officer of officers) {
    if (!best || rankOf(officer.title, OFFICER_TITLE_RANK) < rankOf(best.title, OFFICER_TITLE_RANK)) {
      best = officer;
    }
  }
  return best;
}

// ============================================================================
// Prose Mining
// ============================================================================

/**
 * Find the strongest owner/leadership mention in free text
 */
export function findOwnerMention(text: string): OwnerMention | null {
  const mentions: Array<OwnerMention & { position: number }> = [];

  for (const match of text.matchAll(NAME_THEN_ROLE)) {
    const [, name, title] = match;
    if (name && title && isLikelyPersonName(name)) {
      mentions.push({ name: name.trim(), title, position: match.index ?? 0 });
    }
  }
  for (const match of text.matchAll(ROLE_THEN_NAME)) {
    const [, title, name] = match;
    if (name && title && isLikelyPersonName(name)) {
      mentions.push({ name: name.trim(), title, position: match.index ?? 0 });
    }
  }

  mentions.sort(
    (a, b) => rankOf(a.title, MENTION_ROLE_RANK) - rankOf(b.title, MENTION_ROLE_RANK) || a.position - b.position
  );
  const best = mentions[0];
  return best ? { name: best.name, title: best.title } : null;
}

/**
 * Years in business stated in marketing copy
 */
export function mineYearsInBusiness(text: string, currentYear: number): number | null {
  const since = text.match(YEARS_SINCE);
  if (since?.[1]) {
    const years = currentYear - parseInt(since[1], 10);
    return years >= 0 && years <= 150 ? years : null;
  }
  const count = text.match(YEARS_COUNT) ?? text.match(YEARS_IN_BUSINESS);
  if (count?.[1]) {
    const years = parseInt(count[1], 10);
    return years > 0 && years <= 150 ? years : null;
  }
  return null;
}

export function findAchievements(text: string): string[] {
  const achievements: string[] = [];
  for (const sentence of sentencesOf(text)) {
    if (achievements.length >= MAX_ACHIEVEMENTS) break;
    if (ACHIEVEMENT_PATTERNS.some((pattern) => pattern.test(sentence))) {
      pushUnique(achievements, clip(sentence));
    }
  }
  return achievements;
}

/**
 * Complaint sentences from third-party sources
 */
export function findComplaints(text: string): string[] {
  const complaints: string[] = [];
  for (const sentence of sentencesOf(text)) {
    if (complaints.length >= MAX_PAIN_POINTS) break;
    const lower = sentence.toLowerCase();
    if (PAIN_TERMS.some((term) => lower.includes(term))) {
      pushUnique(complaints, clip(sentence));
    }
  }
  return complaints;
}

/**
 * Capability gaps visible on a dealership's home page
 */
export function findWebsiteGaps(text: string, currentYear: number): string[] {
  const gaps: string[] = [];
  const copyright = text.match(COPYRIGHT_YEAR);
  if (copyright?.[1]) {
    const year = parseInt(copyright[1], 10);
    if (year <= currentYear - 2) {
      gaps.push(`Website copyright notice is outdated (${year})`);
    }
  }
  if (!ONLINE_SCHEDULING.test(text)) {
    gaps.push('No online service scheduling on website');
  }
  if (!/inventory/i.test(text)) {
    gaps.push('No online inventory listing on website');
  }
  return gaps;
}

/**
 * First profile URL per social platform among links and URLs in text
 */
export function findSocialLinks(text: string, links: string[]): Record<string, string> {
  const social: Record<string, string> = {};
  const urls = [...links, ...Array.from(text.matchAll(URL_IN_TEXT), (match) => match[0])];
  for (const url of urls) {
    if (SHARE_LINK.test(url)) continue;
    const platform = detectSocialPlatform(extractDomain(url));
    if (platform && !(platform in social)) {
      social[platform] = url;
    }
  }
  return social;
}

// ============================================================================
// Core Functions
// ============================================================================

export function emptyPartialProfile(source: CandidateSource): PartialProfile {
  return {
    source_type: source.source_type,
    source_url: source.url,
    owner_name: null,
    owner_title: null,
    years_in_business: null,
    years_in_business_basis: null,
    website: null,
    contacts: { phones: [], emails: [] },
    pain_points: [],
    achievements: [],
    social_links: {},
  };
}

/**
 * Extract facts from one fetched source
 *
 * @param source - The classified source that was fetched
 * @param page - Text and structured signals returned by the page fetcher
 */
export function extractFacts(source: CandidateSource, page: PageEvidence, options: ExtractOptions = {}): PartialProfile {
  const currentYear = options.currentYear ?? new Date().getFullYear();
  const profile = emptyPartialProfile(source);
  profile.contacts = { phones: [...page.contacts.phones], emails: [...page.contacts.emails] };

  if (source.source_type === 'registry') {
    const registry = parseRegistryText(page.text);
    const principal = pickPrincipalOfficer(registry.officers);
    if (principal) {
      profile.owner_name = principal.name;
      profile.owner_title = principal.title;
    }
    if (registry.filingYear !== null && registry.filingYear <= currentYear) {
      profile.years_in_business = currentYear - registry.filingYear;
      profile.years_in_business_basis = 'filing_date';
    }
    if (registry.website) {
      profile.website = registry.website.startsWith('http') ? registry.website : `https://${registry.website}`;
    }
    return profile;
  }

  const mention = findOwnerMention(page.text);
  if (mention) {
    profile.owner_name = mention.name;
    profile.owner_title = mention.title;
  }

  const minedYears = mineYearsInBusiness(page.text, currentYear);
  if (minedYears !== null) {
    profile.years_in_business = minedYears;
    profile.years_in_business_basis = 'text';
  }

  profile.achievements = findAchievements(page.text);

  if (source.source_type === 'official') {
    profile.website = originOf(source.url);
    if (classifyPageKind(source.url, page.title) === 'home') {
      profile.pain_points = findWebsiteGaps(page.text, currentYear);
    }
  } else if (source.source_type === 'review' || source.source_type === 'social' || source.source_type === 'news') {
    profile.pain_points = findComplaints(page.text);
  }

  const social: Record<string, string> = {};
  if (source.source_type === 'social' && source.platform) {
    social[source.platform] = source.url;
  }
  for (const [platform, url] of Object.entries(findSocialLinks(page.text, page.links))) {
    if (!(platform in social)) {
      social[platform] = url;
    }
  }
  profile.social_links = social;

  return profile;
}

export default {
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
};
