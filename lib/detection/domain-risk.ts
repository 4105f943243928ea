/**
 * Domain Risk Scorer
 *
 * Scores one URL at a time from independent, additive penalties: host shape,
 * typosquatting against a trusted allowlist, IDN and homoglyph tricks,
 * registration recency, and URL / subdomain patterns. Unparsable URLs are
 * returned as a malformed assessment scored 1.0 instead of throwing.
 */

import { domainToUnicode } from 'node:url';
import { loggers, type Logger } from '@/lib/logging/logger';
import { describeError } from '@/lib/errors';
import type { CircuitBreaker } from '@/lib/resilience/circuit-breaker';
import type { RegistrationLookup, WhoisResult } from '@/lib/threat-intel/domain/whois';
import { analyzeHomoglyphs, hasNonAscii } from './homoglyphs';
import { domainSimilarity, isIpLiteral, levenshteinDistance, splitHost, type HostParts } from './domain';
import { clampScore } from './score';
import type { DomainAssessment, MalformedDomain } from './types';

export const TRUSTED_DOMAINS: readonly string[] = [
  'microsoft.com',
  'google.com',
  'paypal.com',
  'amazon.com',
  'apple.com',
  'facebook.com',
  'twitter.com',
  'linkedin.com',
  'github.com',
  'stackoverflow.com',
  'wikipedia.org',
  'youtube.com',
  'gmail.com',
  'outlook.com',
  'yahoo.com',
  'hotmail.com',
  'office.com',
  'live.com',
  'dropbox.com',
  'zoom.us',
];

export const URL_SHORTENERS: ReadonlySet<string> = new Set([
  'bit.ly',
  'tinyurl.com',
  'goo.gl',
  't.co',
  'ow.ly',
  'short.link',
  'tiny.cc',
  'rebrand.ly',
  'clicky.me',
  'is.gd',
  'buff.ly',
  'cutt.ly',
  'soo.gd',
]);

export const SUSPICIOUS_TLDS: ReadonlySet<string> = new Set([
  'tk',
  'ml',
  'ga',
  'cf',
  'gq',
  'ru',
  'cn',
  'cc',
  'pw',
  'top',
  'click',
  'download',
]);

const SUSPICIOUS_QUERY_PARAMS = ['redirect', 'goto', 'url', 'link', 'target', 'forward'];
const REDIRECT_TOKENS = /redirect|goto/gi;
const SUSPICIOUS_PATHS = ['/login', '/verify', '/confirm', '/update', '/secure'];
const LOGIN_PATH = /log-?in|sign-?in|logon/i;
const SUBDOMAIN_KEYWORDS = ['secure', 'verify', 'login', 'account', 'update', 'confirm'];
const NON_NETWORK_SCHEME = /^(?:mailto|tel|sms|javascript|data|file|about):/i;

export const MAX_URL_REASONS = 5;

export const PENALTIES = {
  ipLiteral: 0.8,
  typosquatHigh: 0.6,
  typosquatMedium: 0.4,
  typosquatLow: 0.3,
  shortener: 0.3,
  suspiciousTld: 0.4,
  punycode: 0.3,
  punycodeDecodesDifferently: 0.2,
  punycodeInvalid: 0.1,
  nonAsciiLabel: 0.2,
  homoglyphPerChar: 0.1,
  homoglyphTableHit: 0.1,
  homoglyphCap: 0.5,
  registeredUnder7Days: 0.5,
  registeredUnder30Days: 0.3,
  registeredUnder90Days: 0.1,
  registrationUnknown: 0.2,
  suspiciousQueryParam: 0.2,
  multipleRedirects: 0.3,
  longUrl: 0.2,
  suspiciousPath: 0.1,
  insecureLogin: 0.3,
  deepSubdomain: 0.2,
  subdomainKeyword: 0.15,
  longSubdomain: 0.1,
} as const;

const DAY_MS = 24 * 60 * 60 * 1000;

export interface DomainRiskScorerOptions {
  /** Omit to treat every registration date as unknown */
  registration?: RegistrationLookup | null;
  /** Guards registration lookups; required to bound them with a timeout */
  breaker?: CircuitBreaker;
  allowlist?: readonly string[];
  now?: () => number;
  logger?: Logger;
}

interface ParsedUrl {
  url: URL;
  /** Host as written in the input, before IDNA conversion */
  rawHost: string;
}

interface Penalty {
  score: number;
  reason: string;
}

export interface TyposquatMatch {
  trusted: string;
  distance: number;
  similarity: number;
  penalty: number;
  viaHomoglyph: boolean;
}

function malformed(url: string): MalformedDomain {
  return { status: 'malformed', url, domain: null, score: 1, reasons: ['Malformed URL'] };
}

/**
 * Add a scheme when missing and parse. null means the URL is unusable.
 */
export function parseUrl(raw: string): ParsedUrl | null {
  const trimmed = raw.trim();
  if (!trimmed || NON_NETWORK_SCHEME.test(trimmed)) return null;

  const withScheme = /^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed) ? trimmed : `http://${trimmed}`;
  if (!URL.canParse(withScheme)) return null;

  const url = new URL(withScheme);
  if (!url.hostname) return null;

  const authority = withScheme.replace(/^[a-z][a-z0-9+.-]*:\/\//i, '').split(/[/?#]/)[0];
  const hostWithPort = authority.slice(authority.lastIndexOf('@') + 1);
  const rawHost = hostWithPort.startsWith('[') ? hostWithPort.slice(0, hostWithPort.indexOf(']') + 1) : hostWithPort.split(':')[0];

  return { url, rawHost: rawHost.toLowerCase() };
}

/**
 * Nearest allowlist entry that earns a typosquatting penalty, or null
 */
export function findTyposquat(domain: string, allowlist: readonly string[], skeleton?: string): TyposquatMatch | null {
  if (allowlist.includes(domain)) return null;

  if (skeleton && skeleton !== domain && allowlist.includes(skeleton)) {
    return { trusted: skeleton, distance: 0, similarity: 1, penalty: PENALTIES.typosquatHigh, viaHomoglyph: true };
  }

  let best: TyposquatMatch | null = null;
  for (const trusted of allowlist) {
    const distance = levenshteinDistance(domain, trusted);
    const similarity = domainSimilarity(domain, trusted);

    let penalty = 0;
    if (similarity >= 0.8 && distance <= 3) penalty = PENALTIES.typosquatHigh;
    else if (similarity >= 0.7 && distance <= 2) penalty = PENALTIES.typosquatMedium;
    else if (similarity >= 0.6 && distance === 1) penalty = PENALTIES.typosquatLow;

    if (penalty === 0) continue;
    if (!best || penalty > best.penalty || (penalty === best.penalty && distance < best.distance)) {
      best = { trusted, distance, similarity, penalty, viaHomoglyph: false };
    }
  }
  return best;
}

export class DomainRiskScorer {
  private readonly registration: RegistrationLookup | null;
  private readonly breaker?: CircuitBreaker;
  private readonly allowlist: readonly string[];
  private readonly now: () => number;
  private readonly logger: Logger;

  constructor(options: DomainRiskScorerOptions = {}) {
    this.registration = options.registration ?? null;
    this.breaker = options.breaker;
    this.allowlist = options.allowlist ?? TRUSTED_DOMAINS;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? loggers.evaluator.withEvaluator('link');
  }

  async assess(rawUrl: string, signal?: AbortSignal): Promise<DomainAssessment> {
    const parsed = parseUrl(rawUrl);
    if (!parsed) {
      return malformed(rawUrl);
    }

    const { url, rawHost } = parsed;
    const host = url.hostname;
    const penalties: Penalty[] = [];

    if (isIpLiteral(host)) {
      penalties.push({ score: PENALTIES.ipLiteral, reason: 'Uses IP address instead of domain name' });
      penalties.push(...this.checkUrlPatterns(url));
      return this.finish(rawUrl, { registrable: host, subdomain: '', tld: '' }, true, null, penalties);
    }

    const parts = splitHost(host);
    const unicodeRegistrable = domainToUnicode(parts.registrable) || parts.registrable;
    const homoglyphs = analyzeHomoglyphs(unicodeRegistrable);

    const typosquat = findTyposquat(
      parts.registrable,
      this.allowlist,
      homoglyphs.flagged.length > 0 ? homoglyphs.skeleton : undefined
    );
    if (typosquat) {
      penalties.push({
        score: typosquat.penalty,
        reason: typosquat.viaHomoglyph
          ? `Visually identical to trusted domain '${typosquat.trusted}' (homoglyph substitution)`
          : `Similar to trusted domain '${typosquat.trusted}' (possible typosquatting)`,
      });
    }

    if (URL_SHORTENERS.has(parts.registrable) || URL_SHORTENERS.has(host)) {
      penalties.push({ score: PENALTIES.shortener, reason: 'Uses URL shortening service' });
    }

    const lastLabel = parts.tld.split('.').pop() ?? '';
    if (SUSPICIOUS_TLDS.has(lastLabel)) {
      penalties.push({ score: PENALTIES.suspiciousTld, reason: `Uses suspicious TLD '.${lastLabel}'` });
    }

    penalties.push(...this.checkInternationalized(rawHost));

    if (homoglyphs.flagged.length > 0) {
      const tableHits = homoglyphs.flagged.filter((c) => c.source === 'table').length;
      const examples = homoglyphs.flagged
        .slice(0, 3)
        .map((c) => `'${c.char}' resembles '${c.lookalike}'`)
        .join(', ');
      penalties.push({
        score: Math.min(
          PENALTIES.homoglyphCap,
          homoglyphs.flagged.length * PENALTIES.homoglyphPerChar + tableHits * PENALTIES.homoglyphTableHit
        ),
        reason: `Homoglyph characters in domain: ${examples}`,
      });
    }

    let registrationAgeDays: number | null = null;
    if (!this.allowlist.includes(parts.registrable)) {
      const recency = await this.checkRegistration(parts.registrable, signal);
      registrationAgeDays = recency.ageDays;
      if (recency.penalty) penalties.push(recency.penalty);
    }

    penalties.push(...this.checkUrlPatterns(url));
    penalties.push(...this.checkSubdomain(parts.subdomain));

    return this.finish(rawUrl, parts, false, registrationAgeDays, penalties);
  }

  private finish(
    url: string,
    parts: HostParts,
    isIp: boolean,
    registrationAgeDays: number | null,
    penalties: Penalty[]
  ): DomainAssessment {
    return {
      status: 'ok',
      url,
      domain: parts.registrable,
      subdomain: parts.subdomain,
      tld: parts.tld,
      isIpLiteral: isIp,
      registrationAgeDays,
      score: clampScore(penalties.reduce((sum, p) => sum + p.score, 0)),
      reasons: penalties.slice(0, MAX_URL_REASONS).map((p) => p.reason),
    };
  }

  private checkInternationalized(rawHost: string): Penalty[] {
    const penalties: Penalty[] = [];
    const labels = rawHost.split('.');
    const punycodeLabels = labels.filter((label) => label.startsWith('xn--'));

    if (punycodeLabels.length > 0) {
      penalties.push({ score: PENALTIES.punycode, reason: 'Domain uses punycode encoding' });

      const decoded = punycodeLabels.map((label) => domainToUnicode(label));
      if (decoded.some((label) => label === '')) {
        penalties.push({ score: PENALTIES.punycodeInvalid, reason: 'Invalid punycode encoding' });
      } else if (decoded.some((label, i) => label !== punycodeLabels[i])) {
        penalties.push({
          score: PENALTIES.punycodeDecodesDifferently,
          reason: `Punycode decodes to '${domainToUnicode(rawHost) || rawHost}'`,
        });
      }
    }

    if (labels.some((label) => !label.startsWith('xn--') && hasNonAscii(label))) {
      penalties.push({ score: PENALTIES.nonAsciiLabel, reason: 'Domain contains non-ASCII characters' });
    }

    return penalties;
  }

  private async checkRegistration(
    domain: string,
    signal?: AbortSignal
  ): Promise<{ ageDays: number | null; penalty: Penalty | null }> {
    const unknown = (reason: string) => ({
      ageDays: null,
      penalty: { score: PENALTIES.registrationUnknown, reason },
    });

    const registration = this.registration;
    if (!registration) {
      return unknown('Registration date unavailable');
    }

    let result: WhoisResult;
    try {
      result = this.breaker
        ? await this.breaker.execute((breakerSignal) => registration.lookup(domain, breakerSignal), signal)
        : await registration.lookup(domain, signal);
    } catch (error) {
      if (signal?.aborted) throw error;
      this.logger.warn('Registration lookup failed', { domain, cause: describeError(error) });
      return unknown('Registration lookup failed');
    }

    if (!result.createdDate) {
      return unknown('Registration date unknown');
    }

    const ageDays = Math.floor((this.now() - result.createdDate.getTime()) / DAY_MS);
    if (ageDays < 7) {
      return { ageDays, penalty: { score: PENALTIES.registeredUnder7Days, reason: `Domain registered ${ageDays} days ago` } };
    }
    if (ageDays < 30) {
      return { ageDays, penalty: { score: PENALTIES.registeredUnder30Days, reason: `Domain registered ${ageDays} days ago` } };
    }
    if (ageDays < 90) {
      return { ageDays, penalty: { score: PENALTIES.registeredUnder90Days, reason: `Domain registered ${ageDays} days ago` } };
    }
    return { ageDays, penalty: null };
  }

  private checkUrlPatterns(url: URL): Penalty[] {
    const penalties: Penalty[] = [];
    const full = url.href;

    const paramNames = new Set(Array.from(url.searchParams.keys(), (key) => key.toLowerCase()));
    for (const param of SUSPICIOUS_QUERY_PARAMS) {
      if (paramNames.has(param)) {
        penalties.push({ score: PENALTIES.suspiciousQueryParam, reason: `Suspicious query parameter '${param}'` });
      }
    }

    if ((full.match(REDIRECT_TOKENS) ?? []).length >= 2) {
      penalties.push({ score: PENALTIES.multipleRedirects, reason: 'Multiple redirect indicators in URL' });
    }

    if (full.length > 200) {
      penalties.push({ score: PENALTIES.longUrl, reason: `Unusually long URL (${full.length} characters)` });
    }

    const path = url.pathname.toLowerCase();
    for (const segment of SUSPICIOUS_PATHS) {
      if (path.includes(segment)) {
        penalties.push({ score: PENALTIES.suspiciousPath, reason: `Suspicious path '${segment}'` });
      }
    }

    if (url.protocol === 'http:' && LOGIN_PATH.test(path)) {
      penalties.push({ score: PENALTIES.insecureLogin, reason: 'Login page served over insecure HTTP' });
    }

    return penalties;
  }

  private checkSubdomain(subdomain: string): Penalty[] {
    if (!subdomain) return [];

    const penalties: Penalty[] = [];
    const labels = subdomain.split('.');

    if (labels.length > 3) {
      penalties.push({ score: PENALTIES.deepSubdomain, reason: `Excessive subdomain depth (${labels.length} levels)` });
    }

    for (const keyword of SUBDOMAIN_KEYWORDS) {
      if (subdomain.includes(keyword)) {
        penalties.push({ score: PENALTIES.subdomainKeyword, reason: `Subdomain contains '${keyword}'` });
      }
    }

    if (subdomain.length > 20) {
      penalties.push({ score: PENALTIES.longSubdomain, reason: 'Unusually long subdomain' });
    }

    return penalties;
  }
}
