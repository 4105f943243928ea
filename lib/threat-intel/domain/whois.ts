/**
 * WHOIS Lookup Service
 * Retrieves domain registration dates for the registration-recency check
 */

import { z } from 'zod';
import { ExternalServiceError } from '@/lib/errors';
import { loggers, type Logger } from '@/lib/logging/logger';

export interface WhoisResult {
  domain: string;
  registrar?: string;
  /** null when the registry does not disclose it */
  createdDate: Date | null;
  updatedDate?: Date;
  expiresDate?: Date;
  nameServers?: string[];
  status?: string[];
  cached: boolean;
}

/**
 * Anything that can tell when a domain was registered
 */
export interface RegistrationLookup {
  lookup(domain: string, signal?: AbortSignal): Promise<WhoisResult>;
}

export interface WhoisClientOptions {
  apiUrl: string;
  apiKey?: string;
  fetch?: typeof fetch;
  cacheTtlMs?: number;
  now?: () => number;
  logger?: Logger;
}

const CACHE_TTL = 24 * 60 * 60 * 1000; // 24 hours

const optionalText = z.string().nullish();

const whoisApiResponseSchema = z.object({
  domain: optionalText,
  registrar: optionalText,
  created_date: optionalText,
  updated_date: optionalText,
  expires_date: optionalText,
  name_servers: z.array(z.string()).nullish(),
  status: z.union([z.array(z.string()), z.string()]).nullish(),
  raw: optionalText,
});

type WhoisApiResponse = z.infer<typeof whoisApiResponseSchema>;

/**
 * Parse date from WHOIS response
 */
export function parseWhoisDate(dateStr: string | null | undefined): Date | undefined {
  if (!dateStr) return undefined;

  const trimmed = dateStr.trim();

  // 01-Jan-2020 style, which Date does not read everywhere
  const verbose = trimmed.match(/^(\d{1,2})-([A-Za-z]{3})-(\d{4})$/);
  if (verbose) {
    const parsed = new Date(`${verbose[2]} ${verbose[1]}, ${verbose[3]} UTC`);
    return isNaN(parsed.getTime()) ? undefined : parsed;
  }

  const date = new Date(trimmed);
  return isNaN(date.getTime()) ? undefined : date;
}

/**
 * Read dates and registrar out of raw WHOIS text
 */
export function parseWhoisText(raw: string): Partial<WhoisResult> {
  const result: Partial<WhoisResult> = {};

  for (const line of raw.split('\n')) {
    const [key, ...valueParts] = line.split(':');
    const value = valueParts.join(':').trim();
    if (!key || !value) continue;

    const keyLower = key.toLowerCase().trim();

    if (
      !result.createdDate &&
      (keyLower.includes('creation date') || keyLower.includes('created') || keyLower.includes('registration date'))
    ) {
      result.createdDate = parseWhoisDate(value) ?? null;
    } else if (keyLower.includes('updated date') || keyLower.includes('last updated')) {
      result.updatedDate = parseWhoisDate(value);
    } else if (keyLower.includes('expir')) {
      result.expiresDate = parseWhoisDate(value);
    } else if (keyLower.includes('registrar') && !keyLower.includes('abuse') && !result.registrar) {
      result.registrar = value;
    } else if (keyLower.includes('name server') || keyLower.includes('nserver')) {
      result.nameServers = [...(result.nameServers ?? []), value.toLowerCase()];
    }
  }

  return result;
}

function toResult(domain: string, data: WhoisApiResponse): WhoisResult {
  const fromRaw = data.raw ? parseWhoisText(data.raw) : {};
  return {
    domain,
    registrar: data.registrar ?? fromRaw.registrar,
    createdDate: parseWhoisDate(data.created_date) ?? fromRaw.createdDate ?? null,
    updatedDate: parseWhoisDate(data.updated_date) ?? fromRaw.updatedDate,
    expiresDate: parseWhoisDate(data.expires_date) ?? fromRaw.expiresDate,
    nameServers: data.name_servers ?? fromRaw.nameServers,
    status: typeof data.status === 'string' ? [data.status] : data.status ?? undefined,
    cached: false,
  };
}

/**
 * HTTP WHOIS API client with an in-process cache.
 * Failures throw ExternalServiceError; callers decide how to degrade.
 */
export class WhoisClient implements RegistrationLookup {
  private readonly apiUrl: string;
  private readonly apiKey?: string;
  private readonly fetchImpl: typeof fetch;
  private readonly cacheTtlMs: number;
  private readonly now: () => number;
  private readonly logger: Logger;
  private readonly cache = new Map<string, { result: WhoisResult; expiresAt: number }>();

  constructor(options: WhoisClientOptions) {
    this.apiUrl = options.apiUrl;
    this.apiKey = options.apiKey;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.cacheTtlMs = options.cacheTtlMs ?? CACHE_TTL;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? loggers.threatIntel;
  }

  async lookup(domain: string, signal?: AbortSignal): Promise<WhoisResult> {
    const normalizedDomain = domain.toLowerCase().trim();

    const cached = this.cache.get(normalizedDomain);
    if (cached && this.now() < cached.expiresAt) {
      return { ...cached.result, cached: true };
    }

    const headers: Record<string, string> = { Accept: 'application/json' };
    if (this.apiKey) {
      headers.Authorization = `Bearer ${this.apiKey}`;
    }

    let response: Response;
    try {
      response = await this.fetchImpl(`${this.apiUrl}?domain=${encodeURIComponent(normalizedDomain)}`, {
        headers,
        signal,
      });
    } catch (error) {
      throw new ExternalServiceError('whois', `WHOIS request failed for ${normalizedDomain}`, { cause: error });
    }

    if (!response.ok) {
      throw new ExternalServiceError('whois', `WHOIS API returned ${response.status} for ${normalizedDomain}`);
    }

    const parsed = whoisApiResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new ExternalServiceError('whois', `Unexpected WHOIS response for ${normalizedDomain}`, {
        cause: parsed.error,
      });
    }

    const result = toResult(normalizedDomain, parsed.data);
    this.cache.set(normalizedDomain, { result, expiresAt: this.now() + this.cacheTtlMs });
    this.logger.debug('WHOIS lookup completed', {
      domain: normalizedDomain,
      hasCreatedDate: result.createdDate !== null,
    });

    return result;
  }

  clearCache(): void {
    this.cache.clear();
  }
}
