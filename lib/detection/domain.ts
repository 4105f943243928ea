/**
 * Host name helpers shared by the link, header and QR evaluators
 */

/** Two-level public suffixes recognized when splitting a host */
const SECOND_LEVEL_SUFFIXES = new Set([
  'co.uk',
  'org.uk',
  'ac.uk',
  'gov.uk',
  'com.au',
  'co.nz',
  'co.jp',
  'com.br',
  'co.in',
  'com.cn',
]);

export interface HostParts {
  /** Domain name plus public suffix, e.g. example.co.uk */
  registrable: string;
  /** Labels left of the registrable domain, '' when none */
  subdomain: string;
  /** Public suffix without the leading dot */
  tld: string;
}

/**
 * Split a lower-cased host name into registrable domain, subdomain and suffix
 */
export function splitHost(host: string): HostParts {
  const labels = host.toLowerCase().replace(/\.$/, '').split('.').filter(Boolean);

  if (labels.length < 2) {
    return { registrable: labels.join('.'), subdomain: '', tld: labels[0] ?? '' };
  }

  const lastTwo = labels.slice(-2).join('.');
  const suffixLength = SECOND_LEVEL_SUFFIXES.has(lastTwo) && labels.length > 2 ? 2 : 1;
  const registrableLength = suffixLength + 1;

  return {
    registrable: labels.slice(-registrableLength).join('.'),
    subdomain: labels.slice(0, -registrableLength).join('.'),
    tld: labels.slice(-suffixLength).join('.'),
  };
}

export function registrableDomain(host: string): string {
  return splitHost(host).registrable;
}

// ============================================================================
// IP literals
// ============================================================================

const IPV4_PATTERN = /^(\d{1,3})\.(\d{1,3})\.(\d{1,3})\.(\d{1,3})$/;
const IPV6_PATTERN = /^([0-9a-f]{0,4}:){2,7}[0-9a-f]{0,4}$/i;

function stripBrackets(host: string): string {
  return host.startsWith('[') && host.endsWith(']') ? host.slice(1, -1) : host;
}

export function isIpv4(host: string): boolean {
  const match = host.match(IPV4_PATTERN);
  return match !== null && match.slice(1).every((octet) => Number(octet) <= 255);
}

export function isIpv6(host: string): boolean {
  return IPV6_PATTERN.test(stripBrackets(host));
}

export function isIpLiteral(host: string): boolean {
  const bare = stripBrackets(host);
  return isIpv4(bare) || isIpv6(bare);
}

export type IpClass = 'private' | 'loopback' | 'link-local' | 'public' | 'invalid';

/**
 * Classify an IP literal. Private covers RFC 1918 and IPv6 unique-local.
 */
export function classifyIp(ip: string): IpClass {
  const bare = stripBrackets(ip).toLowerCase();

  if (isIpv4(bare)) {
    const [a, b] = bare.split('.').map(Number);
    if (a === 127) return 'loopback';
    if (a === 169 && b === 254) return 'link-local';
    if (a === 10 || (a === 172 && b >= 16 && b <= 31) || (a === 192 && b === 168)) return 'private';
    return 'public';
  }

  if (isIpv6(bare)) {
    if (bare === '::1') return 'loopback';
    if (/^fe[89ab][0-9a-f]?:/.test(bare)) return 'link-local';
    if (/^f[cd][0-9a-f]{0,2}:/.test(bare)) return 'private';
    return 'public';
  }

  return 'invalid';
}

/**
 * Whether an IP literal is unexpected for an inter-domain relay
 */
export function isNonRoutableIp(ip: string): boolean {
  const ipClass = classifyIp(ip);
  return ipClass === 'private' || ipClass === 'loopback' || ipClass === 'link-local';
}

// ============================================================================
// Similarity
// ============================================================================

/**
 * Levenshtein distance over UTF-16 code units
 */
export function levenshteinDistance(str1: string, str2: string): number {
  const m = str1.length;
  const n = str2.length;

  let previous = Array.from({ length: n + 1 }, (_, j) => j);

  for (let i = 1; i <= m; i++) {
    const current = [i];
    for (let j = 1; j <= n; j++) {
      const cost = str1[i - 1] === str2[j - 1] ? 0 : 1;
      current[j] = Math.min(previous[j] + 1, current[j - 1] + 1, previous[j - 1] + cost);
    }
    previous = current;
  }

  return previous[n];
}

/**
 * 1 - distance / longer length; 1 for two empty strings
 */
export function domainSimilarity(a: string, b: string): number {
  const longest = Math.max(a.length, b.length);
  if (longest === 0) return 1;
  return 1 - levenshteinDistance(a, b) / longest;
}
