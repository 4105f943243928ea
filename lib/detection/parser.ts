/**
 * Email record construction and header helpers
 *
 * Not a full RFC 5322 parser: callers hand over already-split headers and
 * bodies, this module normalizes them into an immutable EmailRecord.
 */

import { z } from 'zod';
import type { EmailAttachment, EmailRecord, HeaderMap } from './types';

// ============================================================================
// Input validation
// ============================================================================

const headerValueSchema = z.union([z.string(), z.array(z.string())]);

export const attachmentSchema = z.object({
  filename: z.string().default(''),
  contentType: z.string().default('application/octet-stream'),
  content: z.string().default(''),
});

export const emailInputSchema = z.object({
  subject: z.string().optional(),
  from: z.string().optional(),
  replyTo: z.string().optional(),
  headers: z.record(headerValueSchema).default({}),
  bodyText: z.string().default(''),
  bodyHtml: z.string().default(''),
  urls: z.array(z.string()).default([]),
  attachments: z.array(attachmentSchema).default([]),
});

export type EmailInput = z.input<typeof emailInputSchema>;

export interface EmailAddress {
  address: string;
  displayName: string;
  domain: string;
}

// ============================================================================
// Headers
// ============================================================================

export function createHeaderMap(headers: Record<string, string | readonly string[]>): HeaderMap {
  const map = new Map<string, string[]>();
  for (const [name, value] of Object.entries(headers)) {
    const key = name.toLowerCase();
    const values = typeof value === 'string' ? [value] : [...value];
    map.set(key, [...(map.get(key) ?? []), ...values]);
  }
  return map;
}

/**
 * First value of a header, case-insensitive
 */
export function getHeader(headers: HeaderMap, name: string): string | undefined {
  return headers.get(name.toLowerCase())?.[0];
}

export function getHeaderValues(headers: HeaderMap, name: string): readonly string[] {
  return headers.get(name.toLowerCase()) ?? [];
}

export function hasHeader(headers: HeaderMap, name: string): boolean {
  return getHeaderValues(headers, name).length > 0;
}

/**
 * Decode RFC 2047 encoded words (=?UTF-8?B?...?= / =?UTF-8?Q?...?=)
 */
export function decodeHeader(header: string): string {
  return header.replace(/=\?([^?]+)\?([BQ])\?([^?]*)\?=/gi, (_match, _charset: string, encoding: string, text: string) => {
    if (encoding.toUpperCase() === 'B') {
      return Buffer.from(text, 'base64').toString('utf-8');
    }
    return text.replace(/_/g, ' ').replace(/=([0-9A-F]{2})/gi, (_hex: string, hex: string) =>
      String.fromCharCode(parseInt(hex, 16))
    );
  });
}

// ============================================================================
// Addresses
// ============================================================================

export function extractDomain(address: string): string {
  const at = address.lastIndexOf('@');
  return at >= 0 ? address.slice(at + 1).toLowerCase() : '';
}

/**
 * Parse a From / Reply-To / Return-Path value. Returns null when no address can be found.
 */
export function parseEmailAddress(raw: string): EmailAddress | null {
  const trimmed = decodeHeader(raw).trim();
  if (!trimmed) return null;

  // "Display Name" <email@domain.com>
  const quotedMatch = trimmed.match(/^"([^"]*)"\s*<([^<>\s]+@[^<>\s]+)>$/);
  if (quotedMatch) {
    const address = quotedMatch[2].toLowerCase();
    return { address, displayName: quotedMatch[1].trim(), domain: extractDomain(address) };
  }

  // Display Name <email@domain.com>
  const angleMatch = trimmed.match(/^([^<]+)<([^<>\s]+@[^<>\s]+)>$/);
  if (angleMatch) {
    const address = angleMatch[2].toLowerCase();
    return {
      address,
      displayName: angleMatch[1].trim().replace(/^['"]|['"]$/g, ''),
      domain: extractDomain(address),
    };
  }

  // <email@domain.com>
  const bracketOnlyMatch = trimmed.match(/^<([^<>\s]*@[^<>\s]+)>$/);
  if (bracketOnlyMatch) {
    const address = bracketOnlyMatch[1].toLowerCase();
    return { address, displayName: '', domain: extractDomain(address) };
  }

  // email@domain.com
  const simpleMatch = trimmed.match(/^([^\s@<>]+@[^\s@<>]+)$/);
  if (simpleMatch) {
    const address = simpleMatch[1].toLowerCase();
    return { address, displayName: '', domain: extractDomain(address) };
  }

  return null;
}

// ============================================================================
// Authentication results
// ============================================================================

export type AuthVerdict = 'pass' | 'fail' | 'softfail' | 'neutral' | 'none' | 'temperror' | 'permerror';

export interface AuthenticationResults {
  spf: AuthVerdict | null;
  dkim: AuthVerdict | null;
  dmarc: AuthVerdict | null;
}

function normalizeAuthResult(value: string): AuthVerdict {
  switch (value.toLowerCase()) {
    case 'pass':
      return 'pass';
    case 'fail':
    case 'hardfail':
      return 'fail';
    case 'softfail':
      return 'softfail';
    case 'neutral':
      return 'neutral';
    case 'temperror':
      return 'temperror';
    case 'permerror':
      return 'permerror';
    default:
      return 'none';
  }
}

/**
 * Read spf= / dkim= / dmarc= tokens; null for a mechanism the header does not mention
 */
export function parseAuthenticationResults(header: string): AuthenticationResults {
  const read = (mechanism: string): AuthVerdict | null => {
    const match = header.match(new RegExp(`\\b${mechanism}=(\\w+)`, 'i'));
    return match ? normalizeAuthResult(match[1]) : null;
  };

  return { spf: read('spf'), dkim: read('dkim'), dmarc: read('dmarc') };
}

// ============================================================================
// URLs
// ============================================================================

const ATTRIBUTE_URL_PATTERN = /\b(?:href|src)\s*=\s*["']([^"']+)["']/gi;

const TEXT_URL_PATTERNS = [
  /https?:\/\/[^\s<>"'`]+/gi,
  /\bwww\.[^\s<>"'`]+/gi,
  /ftp:\/\/[^\s<>"'`]+/gi,
];

const ABSOLUTE_URL = /^(?:https?:\/\/|ftp:\/\/|www\.)/i;

function cleanUrl(candidate: string): string {
  let url = candidate.trim().replace(/&amp;/g, '&').replace(/[.,;!?)\]}>"']+$/, '');
  if (/^www\./i.test(url)) {
    url = `http://${url}`;
  }
  return url;
}

/**
 * URLs referenced by the bodies: href/src attributes first, then free-text
 * matches, in document order without duplicates. Relative links, mailto:
 * and fragments are ignored.
 */
export function extractUrls(bodyHtml: string, bodyText: string): string[] {
  const candidates: string[] = [];

  for (const match of bodyHtml.matchAll(ATTRIBUTE_URL_PATTERN)) {
    if (ABSOLUTE_URL.test(match[1].trim())) {
      candidates.push(match[1]);
    }
  }

  const combined = `${bodyHtml} ${bodyText}`;
  for (const pattern of TEXT_URL_PATTERNS) {
    for (const match of combined.matchAll(pattern)) {
      candidates.push(match[0]);
    }
  }

  const seen = new Set<string>();
  const urls: string[] = [];
  for (const candidate of candidates) {
    const url = cleanUrl(candidate);
    if (url.length > 10 && !seen.has(url)) {
      seen.add(url);
      urls.push(url);
    }
  }
  return urls;
}

// ============================================================================
// Record
// ============================================================================

/**
 * Build an immutable EmailRecord. Sender, display name and reply-to fall back
 * to the From / Reply-To headers when not given explicitly.
 */
export function createEmailRecord(input: EmailInput): EmailRecord {
  const parsed = emailInputSchema.parse(input);
  const headers = createHeaderMap(parsed.headers);

  const from = parsed.from ?? getHeader(headers, 'From') ?? '';
  const sender = parseEmailAddress(from);
  const replyToRaw = parsed.replyTo ?? getHeader(headers, 'Reply-To') ?? '';
  const replyTo = parseEmailAddress(replyToRaw);

  const attachments: EmailAttachment[] = parsed.attachments.map((attachment) => ({ ...attachment }));

  return Object.freeze({
    subject: decodeHeader(parsed.subject ?? getHeader(headers, 'Subject') ?? ''),
    from,
    sender: sender?.address ?? from.trim().toLowerCase(),
    displayName: sender?.displayName ?? '',
    replyTo: replyTo?.address ?? replyToRaw.trim().toLowerCase(),
    headers,
    bodyText: parsed.bodyText,
    bodyHtml: parsed.bodyHtml,
    urls: Object.freeze([...parsed.urls]),
    attachments: Object.freeze(attachments),
  });
}
