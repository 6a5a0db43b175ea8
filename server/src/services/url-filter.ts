/**
 * Candidate URL filtering and ranking for website discovery
 */

import fs from 'fs';
import path from 'path';
import { getDataPath } from '../config.js';
import { ConfigError } from '../errors.js';
import { toComparisonKey } from '../normalization/name-cleaner.js';
import { significantTokens } from '../normalization/conflict-rules.js';

const BLOCKED_PATH_PATTERNS: RegExp[] = [
  /\/(search|login|signin|signup|register)(\/|$|\?)/i,
  /\/(tag|tags|category|categories)\//i,
  /\/(jobs?|vacancies)\//i,
  /\.(pdf|docx?|xlsx?|pptx?|zip)$/i,
];

// Second-level labels that sit between the registrable name and the TLD
const SECOND_LEVEL_LABELS = new Set(['co', 'com', 'org', 'net', 'ac', 'gov', 'edu', 'or', 'ne', 'gob', 'gouv']);

export function loadBlockedDomains(dataDir: string = getDataPath()): Set<string> {
  const filePath = path.join(dataDir, 'blocked-domains.json');
  const parsed: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  if (
    typeof parsed !== 'object' ||
    parsed === null ||
    !('blocked_domains' in parsed) ||
    !Array.isArray(parsed.blocked_domains)
  ) {
    throw new ConfigError(`${filePath} must contain a "blocked_domains" array`);
  }
  const domains = new Set<string>();
  for (const value of parsed.blocked_domains) {
    if (typeof value === 'string' && value.trim()) {
      domains.add(value.trim().toLowerCase());
    }
  }
  return domains;
}

/** Lowercased host without "www.", or null for non-http(s) or unparseable URLs */
export function hostnameOf(url: string): string | null {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return null;
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    return null;
  }
  return parsed.hostname.toLowerCase().replace(/^www\./, '');
}

export function isBlockedHost(host: string, blocked: ReadonlySet<string>): boolean {
  for (const domain of blocked) {
    if (host === domain || host.endsWith(`.${domain}`)) {
      return true;
    }
  }
  return false;
}

/**
 * Not a social network, aggregator, forum, search engine or document link
 */
export function isPlausibleOrganizationUrl(url: string, blocked: ReadonlySet<string>): boolean {
  const host = hostnameOf(url);
  if (!host || isBlockedHost(host, blocked)) {
    return false;
  }
  const pathname = new URL(url).pathname;
  return !BLOCKED_PATH_PATTERNS.some((pattern) => pattern.test(pathname));
}

function registrableLabel(host: string): string {
  const labels = host.split('.');
  if (labels.length <= 1) return host;
  labels.pop();
  if (labels.length > 1 && SECOND_LEVEL_LABELS.has(labels[labels.length - 1])) {
    labels.pop();
  }
  return labels[labels.length - 1];
}

/**
 * How well the domain matches the organization name, 0..1.
 * Share of significant name tokens found in the domain label, or 0.8 for
 * an acronym match ("world health organization" -> who.int).
 */
export function domainRelevance(url: string, organizationName: string): number {
  const host = hostnameOf(url);
  if (!host) return 0;

  const label = registrableLabel(host).replace(/[^a-z0-9]/g, '');
  const tokens = significantTokens(toComparisonKey(organizationName)).filter((token) => token.length >= 3);
  if (tokens.length === 0 || !label) return 0;

  const matched = tokens.filter((token) => label.includes(token)).length;
  let score = matched / tokens.length;

  const acronym = significantTokens(toComparisonKey(organizationName))
    .map((token) => token[0])
    .join('');
  if (acronym.length >= 2 && label === acronym) {
    score = Math.max(score, 0.8);
  }
  return score;
}

/**
 * Plausible candidates, one per host, most relevant first.
 * Equal relevance keeps search-engine rank order.
 */
export function rankCandidates(urls: string[], organizationName: string, blocked: ReadonlySet<string>): string[] {
  const seenHosts = new Set<string>();
  const scored: Array<{ url: string; score: number; rank: number }> = [];

  urls.forEach((url, rank) => {
    const host = hostnameOf(url);
    if (!host || seenHosts.has(host) || !isPlausibleOrganizationUrl(url, blocked)) {
      return;
    }
    seenHosts.add(host);
    scored.push({ url, score: domainRelevance(url, organizationName), rank });
  });

  return scored.sort((a, b) => b.score - a.score || a.rank - b.rank).map((candidate) => candidate.url);
}
