/**
 * Routing Path Analyzer
 *
 * Rebuilds the delivery path from Received headers (physically newest first),
 * then scores identity, routing, authentication and header-hygiene signals
 * and settles on a single verdict.
 */

import { detectDisplayNameBrandSpoof, domainsRelated, isLegitimateForwarder } from './brand-protection';
import { isIpLiteral, isNonRoutableIp, registrableDomain } from './domain';
import {
  getHeader,
  getHeaderValues,
  hasHeader,
  parseAuthenticationResults,
  parseEmailAddress,
  type AuthVerdict,
} from './parser';
import { clampScore } from './score';
import type {
  HeaderMap,
  HeaderReason,
  HeaderReasonCategory,
  RouteHop,
  RoutingAnalysis,
  RoutingVerdict,
} from './types';

export const DEFAULT_MAX_NORMAL_HOPS = 8;

export const SUSPICIOUS_ROUTING_TLDS = ['.ru', '.cn', '.tk', '.ml', '.ga', '.cf', '.gq', '.cc', '.pw'];

export const BULK_INDICATORS = [
  'bulk',
  'mass',
  'blast',
  'campaign',
  'newsletter',
  'marketing',
  'mailgun',
  'sendgrid',
  'mandrill',
  'mailchimp',
];

const SERVER_PATTERN = /(?:from|by)\s+([^\s[(;]+)/i;
const IP_PATTERN = /\[([0-9a-fA-F:.]+)\]/;
const MESSAGE_ID_PATTERN = /^<[^@]+@[^>]+>$/;
const BULK_MAILER_PATTERN = /bulk|mass|blast/i;
const ONE_HOUR_MS = 60 * 60 * 1000;
const MAX_REPORTED_REASONS = 5;

export const HEADER_PENALTIES = {
  identityMismatch: 0.4,
  brandSpoof: 0.3,
  returnPathMismatch: 0.2,
  excessiveHops: 0.3,
  elevatedHops: 0.1,
  flaggedHop: 0.2,
  suspiciousTld: 0.15,
  timestampsOutOfOrder: 0.2,
  longDelay: 0.1,
  spfFail: 0.4,
  spfSoftfail: 0.2,
  spfWeak: 0.1,
  spfAbsent: 0.05,
  dkimFail: 0.3,
  dkimMissing: 0.1,
  dmarcFail: 0.5,
  dmarcNone: 0.1,
  missingHeader: 0.1,
  malformedMessageId: 0.1,
  bulkMailer: 0.1,
} as const;

export interface RoutingAnalyzerOptions {
  maxNormalHops?: number;
}

export interface RoutingAssessment {
  verdict: RoutingVerdict;
  routing: RoutingAnalysis;
  /** Every reason that fired, highest penalty first */
  reasons: HeaderReason[];
  score: number;
  confidence: number;
}

function parseTimestamp(line: string): Date | null {
  const separator = line.lastIndexOf(';');
  if (separator < 0) return null;

  const text = line
    .slice(separator + 1)
    .replace(/\([^)]*\)/g, '')
    .trim();
  if (!text) return null;

  const date = new Date(text);
  return isNaN(date.getTime()) ? null : date;
}

export function parseReceivedLine(raw: string): RouteHop {
  const line = raw.replace(/\s+/g, ' ').trim();
  const server = line.match(SERVER_PATTERN);
  const ip = line.match(IP_PATTERN);

  return {
    server: server ? server[1].toLowerCase() : 'unknown',
    ip: ip ? ip[1] : null,
    timestamp: parseTimestamp(line),
    raw,
    malformed: server === null,
  };
}

function suspiciousTldOf(server: string): string | null {
  return SUSPICIOUS_ROUTING_TLDS.find((tld) => server.endsWith(tld)) ?? null;
}

export function isSuspiciousHop(hop: RouteHop): boolean {
  if (hop.malformed) return true;
  if (suspiciousTldOf(hop.server)) return true;
  if (BULK_INDICATORS.some((indicator) => hop.server.includes(indicator))) return true;
  return hop.ip !== null && isNonRoutableIp(hop.ip);
}

/**
 * Received lines in the order they appear in the message; the result lists
 * the origin hop first.
 */
export function reconstructRoute(receivedLines: readonly string[]): RoutingAnalysis {
  const hops = [...receivedLines].reverse().map(parseReceivedLine);

  return {
    hops,
    hopCount: hops.length,
    origin: hops[0] ?? null,
    final: hops[hops.length - 1] ?? null,
    suspiciousHops: hops.filter(isSuspiciousHop),
  };
}

class ReasonCollector {
  readonly reasons: HeaderReason[] = [];

  add(category: HeaderReasonCategory, penalty: number, text: string): void {
    this.reasons.push({ category, penalty, text });
  }

  has(category: HeaderReasonCategory): boolean {
    return this.reasons.some((reason) => reason.category === category);
  }

  total(): number {
    return this.reasons.reduce((sum, reason) => sum + reason.penalty, 0);
  }
}

function checkIdentity(headers: HeaderMap, routing: RoutingAnalysis, collector: ReasonCollector): void {
  const from = parseEmailAddress(getHeader(headers, 'From') ?? '');
  if (!from || !from.domain) return;

  const origin = routing.origin;
  if (origin && !origin.malformed && origin.server.includes('.') && !isIpLiteral(origin.server)) {
    const originDomain = registrableDomain(origin.server);
    if (!domainsRelated(from.domain, originDomain) && !isLegitimateForwarder(originDomain)) {
      collector.add(
        'identity',
        HEADER_PENALTIES.identityMismatch,
        `Sender domain '${from.domain}' does not match originating server '${originDomain}'`
      );
    }
  }

  const spoof = detectDisplayNameBrandSpoof(from.displayName, from.domain);
  if (spoof) {
    collector.add(
      'identity',
      HEADER_PENALTIES.brandSpoof,
      `Display name claims ${spoof.brand.brand} but sender domain is '${spoof.senderDomain}'`
    );
  }

  const returnPath = parseEmailAddress(getHeader(headers, 'Return-Path') ?? '');
  if (returnPath?.domain && !domainsRelated(returnPath.domain, from.domain)) {
    collector.add(
      'identity',
      HEADER_PENALTIES.returnPathMismatch,
      `Return-Path domain '${returnPath.domain}' differs from sender domain '${from.domain}'`
    );
  }
}

function checkRouting(routing: RoutingAnalysis, maxNormalHops: number, collector: ReasonCollector): void {
  if (routing.hopCount > maxNormalHops) {
    collector.add(
      'routing',
      HEADER_PENALTIES.excessiveHops,
      `Excessive routing hops (${routing.hopCount} > ${maxNormalHops})`
    );
  } else if (routing.hopCount > maxNormalHops * 0.75) {
    collector.add('routing', HEADER_PENALTIES.elevatedHops, `Elevated routing hop count (${routing.hopCount})`);
  }

  if (routing.hops.some((hop) => hop.malformed)) {
    collector.add('routing', 0, 'Unparsable routing header line');
  }

  const flagged = routing.suspiciousHops.length;
  if (flagged > 0) {
    collector.add('routing', flagged * HEADER_PENALTIES.flaggedHop, `${flagged} suspicious routing hop(s)`);
  }

  const tlds = new Set<string>();
  for (const hop of routing.hops) {
    const tld = suspiciousTldOf(hop.server);
    if (tld) tlds.add(tld);
  }
  for (const tld of tlds) {
    collector.add('routing', HEADER_PENALTIES.suspiciousTld, `Routed through suspicious TLD '${tld}'`);
  }

  const stamped = routing.hops.flatMap((hop) => (hop.timestamp ? [hop.timestamp.getTime()] : []));
  for (let i = 1; i < stamped.length; i++) {
    const gap = stamped[i] - stamped[i - 1];
    if (gap < 0) {
      collector.add('routing', HEADER_PENALTIES.timestampsOutOfOrder, 'Routing timestamps out of chronological order');
      break;
    }
    if (gap > ONE_HOUR_MS) {
      collector.add('routing', HEADER_PENALTIES.longDelay, 'Delay of more than one hour between routing hops');
      break;
    }
  }
}

function receivedSpfVerdict(headers: HeaderMap): AuthVerdict | null {
  const value = getHeader(headers, 'Received-SPF');
  if (!value) return null;
  // softfail first: 'fail' is a substring of it
  const lower = value.toLowerCase();
  if (lower.includes('softfail')) return 'softfail';
  if (lower.includes('fail')) return 'fail';
  if (lower.includes('pass')) return 'pass';
  if (lower.includes('neutral')) return 'neutral';
  return 'none';
}

function checkAuthentication(headers: HeaderMap, collector: ReasonCollector): void {
  const auth = parseAuthenticationResults(getHeaderValues(headers, 'Authentication-Results').join('; '));

  const spf = auth.spf ?? receivedSpfVerdict(headers);
  if (spf === 'fail') {
    collector.add('auth', HEADER_PENALTIES.spfFail, 'SPF authentication failed');
  } else if (spf === 'softfail') {
    collector.add('auth', HEADER_PENALTIES.spfSoftfail, 'SPF soft failure');
  } else if (spf === null) {
    collector.add('auth', HEADER_PENALTIES.spfAbsent, 'No SPF result');
  } else if (spf !== 'pass') {
    collector.add('auth', HEADER_PENALTIES.spfWeak, `SPF result '${spf}'`);
  }

  const signed = hasHeader(headers, 'DKIM-Signature');
  if (!signed) {
    collector.add('auth', HEADER_PENALTIES.dkimMissing, 'No DKIM signature');
  } else if (auth.dkim === 'fail' || auth.dkim === 'permerror') {
    collector.add('auth', HEADER_PENALTIES.dkimFail, 'DKIM signature failed verification');
  }

  if (auth.dmarc === 'fail') {
    collector.add('auth', HEADER_PENALTIES.dmarcFail, 'DMARC check failed');
  } else if (auth.dmarc === 'none') {
    collector.add('auth', HEADER_PENALTIES.dmarcNone, "DMARC result 'none'");
  }
}

function checkAnomalies(headers: HeaderMap, collector: ReasonCollector): void {
  for (const name of ['From', 'To', 'Date', 'Message-ID']) {
    if (!hasHeader(headers, name)) {
      collector.add('anomaly', HEADER_PENALTIES.missingHeader, `Missing ${name} header`);
    }
  }

  const messageId = getHeader(headers, 'Message-ID');
  if (messageId !== undefined && !MESSAGE_ID_PATTERN.test(messageId.trim())) {
    collector.add('anomaly', HEADER_PENALTIES.malformedMessageId, 'Malformed Message-ID header');
  }

  const mailer = getHeader(headers, 'X-Mailer');
  if (mailer && BULK_MAILER_PATTERN.test(mailer)) {
    collector.add('anomaly', HEADER_PENALTIES.bulkMailer, 'Bulk mailing software in X-Mailer');
  }
}

function decideVerdict(collector: ReasonCollector, score: number): RoutingVerdict {
  if (collector.has('identity') && score >= 0.3) return 'identity_mismatch';
  if ((collector.has('routing') && score >= 0.4) || score >= 0.6) return 'suspicious_routing';
  return 'normal';
}

export function analyzeRouting(headers: HeaderMap, options: RoutingAnalyzerOptions = {}): RoutingAssessment {
  const maxNormalHops = options.maxNormalHops ?? DEFAULT_MAX_NORMAL_HOPS;
  const routing = reconstructRoute(getHeaderValues(headers, 'Received'));
  const collector = new ReasonCollector();

  checkIdentity(headers, routing, collector);
  checkRouting(routing, maxNormalHops, collector);
  checkAuthentication(headers, collector);
  checkAnomalies(headers, collector);

  const score = clampScore(collector.total());

  return {
    verdict: decideVerdict(collector, score),
    routing,
    // stable sort keeps trigger order among equal penalties
    reasons: [...collector.reasons].sort((a, b) => b.penalty - a.penalty),
    score,
    confidence: Math.min(0.95, 0.5 + 0.4 * score),
  };
}

export function topReasonTexts(reasons: readonly HeaderReason[]): string[] {
  return reasons.slice(0, MAX_REPORTED_REASONS).map((reason) => reason.text);
}
