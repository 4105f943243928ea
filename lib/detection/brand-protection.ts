/**
 * Brand and provider knowledge used for identity checks
 *
 * - Provider alias groups: domains that legitimately send for one another
 * - Forwarding relays that re-originate mail for other domains
 * - Display-name brand spoofing
 */

import { registrableDomain } from './domain';

export interface BrandEntry {
  key: string;
  brand: string;
  /** Registrable domains the brand sends from */
  domains: string[];
  /** Lower-case words that name the brand in a display name */
  names: string[];
}

export const PROTECTED_BRANDS: readonly BrandEntry[] = [
  { key: 'google', brand: 'Google', domains: ['gmail.com', 'google.com', 'googlemail.com'], names: ['google', 'gmail'] },
  {
    key: 'outlook',
    brand: 'Outlook',
    domains: ['outlook.com', 'hotmail.com', 'live.com', 'office365.com'],
    names: ['outlook', 'hotmail'],
  },
  { key: 'yahoo', brand: 'Yahoo', domains: ['yahoo.com', 'yahoomail.com', 'ymail.com'], names: ['yahoo'] },
  { key: 'apple', brand: 'Apple', domains: ['apple.com', 'icloud.com', 'me.com', 'mac.com'], names: ['apple', 'icloud'] },
  { key: 'amazon', brand: 'Amazon', domains: ['amazon.com', 'amazonaws.com', 'amazon.ses'], names: ['amazon'] },
  { key: 'paypal', brand: 'PayPal', domains: ['paypal.com', 'paypalobjects.com'], names: ['paypal'] },
  {
    key: 'microsoft',
    brand: 'Microsoft',
    domains: ['microsoft.com', 'office.com', 'office365.com'],
    names: ['microsoft', 'office 365'],
  },
  { key: 'facebook', brand: 'Facebook', domains: ['facebook.com', 'facebookmail.com'], names: ['facebook', 'meta'] },
  { key: 'twitter', brand: 'Twitter', domains: ['twitter.com', 'x.com'], names: ['twitter'] },
  { key: 'linkedin', brand: 'LinkedIn', domains: ['linkedin.com'], names: ['linkedin'] },
];

/** Relays that forward mail on behalf of other domains */
export const LEGITIMATE_FORWARDERS: ReadonlySet<string> = new Set([
  'gmail.com',
  'google.com',
  'outlook.com',
  'office365.com',
  'yahoo.com',
  'icloud.com',
  'protonmail.com',
]);

function belongsTo(domain: string, brandDomain: string): boolean {
  return domain === brandDomain || domain.endsWith(`.${brandDomain}`);
}

/**
 * Same domain, one a subdomain of the other, or both in one provider group
 */
export function domainsRelated(first: string, second: string): boolean {
  const a = first.toLowerCase();
  const b = second.toLowerCase();
  if (!a || !b) return false;
  if (belongsTo(a, b) || belongsTo(b, a)) return true;

  return PROTECTED_BRANDS.some(
    (entry) => entry.domains.some((d) => belongsTo(a, d)) && entry.domains.some((d) => belongsTo(b, d))
  );
}

export function isLegitimateForwarder(domain: string): boolean {
  return LEGITIMATE_FORWARDERS.has(registrableDomain(domain));
}

export function findBrandMention(displayName: string): BrandEntry | null {
  const nameLower = displayName.toLowerCase();
  for (const entry of PROTECTED_BRANDS) {
    const mentioned = entry.names.some((name) => new RegExp(`\\b${name}\\b`).test(nameLower));
    if (mentioned || entry.domains.some((domain) => nameLower.includes(domain))) {
      return entry;
    }
  }
  return null;
}

export interface BrandSpoof {
  brand: BrandEntry;
  senderDomain: string;
}

/**
 * A display name naming a brand whose domains do not include the sender's
 */
export function detectDisplayNameBrandSpoof(displayName: string, senderDomain: string): BrandSpoof | null {
  if (!displayName || !senderDomain) return null;

  const brand = findBrandMention(displayName);
  if (!brand) return null;

  const domainLower = senderDomain.toLowerCase();
  if (brand.domains.some((domain) => belongsTo(domainLower, domain))) {
    return null;
  }
  return { brand, senderDomain: domainLower };
}
