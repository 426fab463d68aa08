/**
 * Parse robots.txt into a per-user-agent policy and evaluate URLs against it
 */
import { logger } from '../logger.js';
import type { TextFetcher } from './types.js';

export interface RobotsPolicy {
  userAgent: string;
  allowRules: string[];
  disallowRules: string[];
  crawlDelaySeconds?: number;
  /** Requests per second from a `Request-rate: n/seconds` line. */
  requestRate?: number;
  /** `Sitemap:` lines apply to every agent. */
  sitemapUrls: string[];
}

interface RobotsGroup {
  agents: string[];
  allow: string[];
  disallow: string[];
  crawlDelay?: number;
  requestRate?: number;
}

/** No rules, no delay: what a site without robots.txt gets. */
export function permissivePolicy(userAgent: string): RobotsPolicy {
  return { userAgent, allowRules: [], disallowRules: [], sitemapUrls: [] };
}

/** "crawlkit/0.3.0 (+https://…)" → "crawlkit" */
function productToken(userAgent: string): string {
  return userAgent.trim().split(/[/\s]/)[0].toLowerCase();
}

function parseRequestRate(value: string): number | undefined {
  const slash = value.indexOf('/');
  if (slash === -1) return undefined;
  const requests = Number.parseFloat(value.slice(0, slash));
  const seconds = Number.parseFloat(value.slice(slash + 1));
  if (!(requests > 0) || !(seconds > 0)) return undefined;
  return requests / seconds;
}

/**
 * Parse robots.txt content into the policy for `userAgent`.
 *
 * Consecutive `User-agent` lines open one group. Groups naming our product
 * token are merged and used; otherwise the `*` groups are. `Sitemap:` lines
 * are collected from anywhere in the file.
 */
export function parseRobotsTxt(content: string, userAgent = '*'): RobotsPolicy {
  const groups: RobotsGroup[] = [];
  const sitemapUrls: string[] = [];
  let current: RobotsGroup | null = null;
  let lastWasAgent = false;

  for (const rawLine of content.split(/\r?\n/)) {
    const hash = rawLine.indexOf('#');
    const line = (hash === -1 ? rawLine : rawLine.slice(0, hash)).trim();
    if (!line) continue;

    const colonIdx = line.indexOf(':');
    if (colonIdx === -1) continue;

    const field = line.slice(0, colonIdx).trim().toLowerCase();
    const value = line.slice(colonIdx + 1).trim();

    if (field === 'user-agent') {
      if (!current || !lastWasAgent) {
        current = { agents: [], allow: [], disallow: [] };
        groups.push(current);
      }
      current.agents.push(value.toLowerCase());
      lastWasAgent = true;
      continue;
    }
    lastWasAgent = false;

    if (field === 'sitemap') {
      if (value && !sitemapUrls.includes(value)) sitemapUrls.push(value);
      continue;
    }

    if (!current) continue;

    switch (field) {
      case 'allow':
        if (value) current.allow.push(value);
        break;
      case 'disallow':
        // An empty Disallow allows everything; it adds no rule.
        if (value) current.disallow.push(value);
        break;
      case 'crawl-delay': {
        const delay = Number.parseFloat(value);
        if (delay >= 0) current.crawlDelay = delay;
        break;
      }
      case 'request-rate': {
        const rate = parseRequestRate(value);
        if (rate !== undefined) current.requestRate = rate;
        break;
      }
    }
  }

  const token = productToken(userAgent);
  const specific = groups.filter((g) => g.agents.includes(token));
  const selected = specific.length > 0 ? specific : groups.filter((g) => g.agents.includes('*'));

  const policy: RobotsPolicy = {
    ...permissivePolicy(userAgent),
    sitemapUrls,
  };
  for (const group of selected) {
    policy.allowRules.push(...group.allow);
    policy.disallowRules.push(...group.disallow);
    if (group.crawlDelay !== undefined) policy.crawlDelaySeconds = group.crawlDelay;
    if (group.requestRate !== undefined) policy.requestRate = group.requestRate;
  }
  return policy;
}

const ruleCache = new Map<string, RegExp>();

/** Compile a rule: `*` matches any run of characters, a trailing `$` anchors the end. */
function ruleToRegExp(rule: string): RegExp {
  let re = ruleCache.get(rule);
  if (!re) {
    const anchored = rule.endsWith('$');
    const body = (anchored ? rule.slice(0, -1) : rule)
      .split('*')
      .map((part) => part.replace(/[.+?^${}()|[\]\\]/g, '\\$&'))
      .join('.*');
    re = new RegExp(`^${body}${anchored ? '$' : ''}`);
    ruleCache.set(rule, re);
  }
  return re;
}

function longestMatch(target: string, rules: readonly string[]): number {
  let longest = -1;
  for (const rule of rules) {
    if (rule.length > longest && ruleToRegExp(rule).test(target)) longest = rule.length;
  }
  return longest;
}

/**
 * Longest matching rule wins; Allow wins a tie; no matching rule means allowed.
 * Rules are matched against the URL's path plus query string.
 * Unparseable URLs are refused.
 */
export function isAllowed(policy: RobotsPolicy, url: string): boolean {
  let target: string;
  try {
    const parsed = new URL(url);
    target = (parsed.pathname || '/') + parsed.search;
  } catch {
    return false;
  }

  const disallow = longestMatch(target, policy.disallowRules);
  if (disallow === -1) return true;
  return longestMatch(target, policy.allowRules) >= disallow;
}

/** Minimum spacing between requests asked for by the policy, in milliseconds. */
export function politenessDelayMs(policy: RobotsPolicy): number {
  const fromDelay = (policy.crawlDelaySeconds ?? 0) * 1000;
  const fromRate = policy.requestRate ? 1000 / policy.requestRate : 0;
  return Math.max(fromDelay, fromRate);
}

/**
 * Fetch and parse robots.txt for an origin.
 * A missing file, a non-200 answer or a failed request all yield the
 * permissive policy; the crawl proceeds unrestricted.
 */
export async function fetchRobots(
  origin: string,
  fetchFn: TextFetcher,
  userAgent: string
): Promise<RobotsPolicy> {
  const url = `${origin}/robots.txt`;
  try {
    const response = await fetchFn(url);
    if (!response?.ok) {
      logger.debug({ url, status: response?.status }, 'No robots.txt, crawling unrestricted');
      return permissivePolicy(userAgent);
    }

    const policy = parseRobotsTxt(response.text, userAgent);
    logger.debug(
      {
        origin,
        allowCount: policy.allowRules.length,
        disallowCount: policy.disallowRules.length,
        sitemapCount: policy.sitemapUrls.length,
        crawlDelaySeconds: policy.crawlDelaySeconds,
      },
      'Parsed robots.txt'
    );
    return policy;
  } catch (e) {
    logger.warn({ url, error: String(e) }, 'Failed to fetch robots.txt, crawling unrestricted');
    return permissivePolicy(userAgent);
  }
}
