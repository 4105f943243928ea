/**
 * QR evaluator
 * Decodes QR images found in the email and scores what they point at
 */

import { describeError } from '@/lib/errors';
import type { CircuitBreaker } from '@/lib/resilience/circuit-breaker';
import { isIpLiteral, splitHost } from '../domain';
import { parseUrl, SUSPICIOUS_TLDS, TRUSTED_DOMAINS, URL_SHORTENERS } from '../domain-risk';
import { classifyQrContent, findQrImageSources, type DecodedQr, type QRCodec, type QrImageSource } from '../qr-codec';
import { clampScore, mean } from '../score';
import type { EmailRecord, EvaluationContext, Evaluator, QrCodeAssessment, QrDetails, QrFinding } from '../types';

const QR_KEYWORDS = [
  'urgent',
  'verify',
  'suspend',
  'limited',
  'expired',
  'confirm',
  'update',
  'secure',
  'click',
  'act now',
  'immediate',
  'winner',
  'congratulations',
  'prize',
  'bitcoin',
  'crypto',
  'investment',
  'inheritance',
  'lawsuit',
  'tax',
  'refund',
  'irs',
  'police',
];

const SUSPICIOUS_QR_PATHS = ['/login', '/verify', '/confirm', '/update', '/secure', '/download'];

const CRYPTO_ADDRESS_PATTERNS = [
  /\b[13][a-km-zA-HJ-NP-Z1-9]{25,34}\b/, // Bitcoin
  /\b0x[a-fA-F0-9]{40}\b/, // Ethereum
  /\b[LM3][a-km-zA-HJ-NP-Z1-9]{26,33}\b/, // Litecoin
];

const FINANCIAL_PATTERNS = [
  /\b\d{4}[\s-]?\d{4}[\s-]?\d{4}[\s-]?\d{4}\b/, // card number
  /\biban[\s:]*[a-z]{2}\d{2}[a-z0-9]{4}\d{7}[a-z0-9]{0,16}\b/i,
  /\brouting[\s:]*\d{9}\b/i,
];

const VCARD_ORGS = ['bank', 'police', 'irs', 'government', 'security', 'microsoft', 'apple', 'google'];
const WIFI_NAMES = ['free', 'public', 'guest', 'open', 'wifi', 'internet'];

export const SUSPICIOUS_QR_SCORE = 0.5;
export const UNDECODED_QR_SCORE = 0.4;

interface Signal {
  score: number;
  reason: string;
}

export function analyzeQrUrl(content: string): Signal[] {
  const parsed = parseUrl(content);
  if (!parsed) {
    return [{ score: 0.5, reason: 'QR URL is malformed' }];
  }

  const { url } = parsed;
  const signals: Signal[] = [];

  if (isIpLiteral(url.hostname)) {
    signals.push({ score: 0.7, reason: 'QR URL uses IP address' });
  } else {
    const parts = splitHost(url.hostname);
    const lastLabel = parts.tld.split('.').pop() ?? '';
    if (SUSPICIOUS_TLDS.has(lastLabel)) {
      signals.push({ score: 0.4, reason: `QR URL uses suspicious TLD: .${lastLabel}` });
    }
    if (URL_SHORTENERS.has(parts.registrable) || URL_SHORTENERS.has(url.hostname)) {
      signals.push({ score: 0.5, reason: 'QR URL uses shortening service' });
    }
    if (TRUSTED_DOMAINS.includes(parts.registrable)) {
      signals.push({ score: -0.2, reason: 'QR URL points to a trusted domain' });
    }
  }

  if (url.protocol === 'http:') {
    signals.push({ score: 0.2, reason: 'QR URL uses insecure HTTP' });
  }

  const path = url.pathname.toLowerCase();
  for (const segment of SUSPICIOUS_QR_PATHS) {
    if (path.includes(segment)) {
      signals.push({ score: 0.2, reason: `QR URL contains suspicious path: ${segment}` });
    }
  }

  return signals;
}

export function analyzeQrText(content: string): Signal[] {
  const signals: Signal[] = [];
  if (CRYPTO_ADDRESS_PATTERNS.some((pattern) => pattern.test(content))) {
    signals.push({ score: 0.6, reason: 'QR contains cryptocurrency address' });
  }
  if (FINANCIAL_PATTERNS.some((pattern) => pattern.test(content))) {
    signals.push({ score: 0.7, reason: 'QR contains financial information' });
  }
  return signals;
}

export function analyzeVcard(content: string): Signal[] {
  const lower = content.toLowerCase();
  const signals: Signal[] = VCARD_ORGS.filter((org) => lower.includes(org)).map((org) => ({
    score: 0.3,
    reason: `vCard claims affiliation with ${org}`,
  }));

  if (content.split('TEL:').length - 1 > 3) {
    signals.push({ score: 0.2, reason: 'vCard contains many phone numbers' });
  }
  return signals;
}

export function analyzeWifi(content: string): Signal[] {
  const lower = content.toLowerCase();
  const signals: Signal[] = [{ score: 0.3, reason: 'WiFi QR code (potential security risk)' }];

  if (lower.includes('nopass') || lower.includes('open')) {
    signals.push({ score: 0.2, reason: 'WiFi QR code for open network' });
  }
  for (const name of WIFI_NAMES) {
    if (lower.includes(name)) {
      signals.push({ score: 0.1, reason: `WiFi network name contains '${name}'` });
    }
  }
  return signals;
}

function keywordSignal(content: string): Signal | null {
  const lower = content.toLowerCase();
  const found = QR_KEYWORDS.filter((keyword) => lower.includes(keyword));
  if (found.length === 0) return null;
  return {
    score: Math.min(0.5, found.length * 0.1),
    reason: `Contains suspicious keywords: ${found.slice(0, 3).join(', ')}`,
  };
}

/**
 * Score one decoded payload or external image reference
 */
export function assessQrContent(content: string, location: string, external = false): QrCodeAssessment {
  const contentType = external ? 'external_image' : classifyQrContent(content);
  const signals: Signal[] = [{ score: 0.1, reason: 'Contains QR code (requires user interaction)' }];

  switch (contentType) {
    case 'url':
      signals.push(...analyzeQrUrl(content));
      break;
    case 'text':
      signals.push(...analyzeQrText(content));
      break;
    case 'vcard':
      signals.push(...analyzeVcard(content));
      break;
    case 'wifi':
      signals.push(...analyzeWifi(content));
      break;
    case 'external_image':
      signals.push({ score: 0.3, reason: 'QR code loaded from external source' });
      break;
    default:
      break;
  }

  const keywords = keywordSignal(content);
  if (keywords) signals.push(keywords);

  return {
    content,
    contentType,
    location,
    score: clampScore(signals.reduce((sum, signal) => sum + signal.score, 0)),
    reasons: signals.map((signal) => signal.reason),
  };
}

export function describeQr(details: QrDetails): string {
  if (details.totalCodes === 0) {
    return 'No QR codes found in email';
  }

  const parts = [`Analyzed ${details.totalCodes} QR codes`];
  if (details.suspiciousCount > 0) {
    parts.push(`${details.suspiciousCount} suspicious QR codes detected`);
    const counts = new Map<string, number>();
    for (const code of details.codes) {
      counts.set(code.contentType, (counts.get(code.contentType) ?? 0) + 1);
    }
    parts.push(`Types found: ${[...counts].map(([type, count]) => `${count} ${type}`).join(', ')}`);
  } else {
    parts.push('No highly suspicious QR codes detected');
  }
  return parts.join('. ');
}

export interface QrEvaluatorOptions {
  codec?: QRCodec | null;
  breaker?: CircuitBreaker;
}

export class QrEvaluator implements Evaluator<'qr'> {
  readonly id = 'qr';
  private readonly codec: QRCodec | null;
  private readonly breaker?: CircuitBreaker;

  constructor(options: QrEvaluatorOptions = {}) {
    this.codec = options.codec ?? null;
    this.breaker = options.breaker;
  }

  private decode(codec: QRCodec, data: Uint8Array, signal: AbortSignal): Promise<DecodedQr[]> {
    if (this.breaker) {
      return this.breaker.execute((breakerSignal) => codec.decode(data, breakerSignal), signal);
    }
    return codec.decode(data, signal);
  }

  private async assessSource(source: QrImageSource, context: EvaluationContext): Promise<QrCodeAssessment[]> {
    if (source.kind === 'external') {
      return [assessQrContent(`External QR image: ${source.url}`, source.location, true)];
    }

    const codec = this.codec;
    if (!codec) {
      return [];
    }

    try {
      const decoded = await this.decode(codec, source.data, context.signal);
      return decoded.map((symbol) => assessQrContent(symbol.text, source.location));
    } catch (error) {
      if (context.signal.aborted) throw error;
      context.logger.warn('QR image could not be decoded', { location: source.location, cause: describeError(error) });
      return [
        {
          content: '',
          contentType: 'undecoded',
          location: source.location,
          score: UNDECODED_QR_SCORE,
          reasons: [`QR image could not be decoded: ${describeError(error)}`],
        },
      ];
    }
  }

  async evaluate(email: EmailRecord, context: EvaluationContext): Promise<QrFinding> {
    const sources = findQrImageSources(email);
    if (!this.codec && sources.some((source) => source.kind !== 'external')) {
      context.logger.debug('No QR codec configured, skipping inline images');
    }

    const codes = (await Promise.all(sources.map((source) => this.assessSource(source, context)))).flat();

    const details: QrDetails = {
      codes,
      totalCodes: codes.length,
      suspiciousCount: codes.filter((code) => code.score >= SUSPICIOUS_QR_SCORE).length,
    };

    if (codes.length === 0) {
      return {
        evaluator: 'qr',
        score: 0,
        confidence: 1,
        reasons: [],
        summary: describeQr(details),
        details,
        degraded: false,
      };
    }

    const analyzed = codes.filter((code) => code.contentType !== 'undecoded').length;
    const reasons = [...codes]
      .filter((code) => code.score >= SUSPICIOUS_QR_SCORE)
      .sort((a, b) => b.score - a.score)
      .flatMap((code) => code.reasons.slice(0, 2).map((reason) => `QR ${code.contentType}: ${reason}`))
      .slice(0, 5);

    const score = clampScore(mean(codes.map((code) => code.score)));

    return {
      evaluator: 'qr',
      score,
      confidence: Math.min(0.95, 0.7 + 0.25 * (analyzed / codes.length)),
      reasons,
      summary: describeQr(details),
      details,
      degraded: false,
    };
  }
}
