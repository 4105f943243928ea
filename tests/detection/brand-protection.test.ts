/**
 * Brand Protection Tests
 *
 * Provider groups, forwarding relays and display-name brand spoofing
 */

import { describe, it, expect } from 'vitest';
import {
  detectDisplayNameBrandSpoof,
  domainsRelated,
  findBrandMention,
  isLegitimateForwarder,
  PROTECTED_BRANDS,
} from '@/lib/detection/brand-protection';

describe('Brand Protection', () => {
  describe('domainsRelated', () => {
    it('should relate subdomains in either direction', () => {
      expect(domainsRelated('mail.acme.example', 'acme.example')).toBe(true);
      expect(domainsRelated('ACME.example', 'bounce.acme.example')).toBe(true);
    });

    it('should relate domains of one provider group', () => {
      expect(domainsRelated('outlook.com', 'office365.com')).toBe(true);
      expect(domainsRelated('mail.icloud.com', 'apple.com')).toBe(true);
    });

    it('should not relate look-alike or unrelated domains', () => {
      expect(domainsRelated('acme.example', 'acme.example.evil.test')).toBe(false);
      expect(domainsRelated('hotmail.com', 'microsoft.com')).toBe(false);
      expect(domainsRelated('', 'acme.example')).toBe(false);
    });
  });

  describe('isLegitimateForwarder', () => {
    it('should match relays by registrable domain', () => {
      expect(isLegitimateForwarder('mx.protonmail.com')).toBe(true);
      expect(isLegitimateForwarder('relay.corp.example')).toBe(false);
    });
  });

  describe('findBrandMention', () => {
    it('should match whole brand words only', () => {
      expect(findBrandMention('Meta Support')?.key).toBe('facebook');
      expect(findBrandMention('Metallica Fan Club')).toBeNull();
    });

    it('should match a brand domain written into the name', () => {
      expect(findBrandMention('Notices via icloud.com')?.brand).toBe('Apple');
    });

    it('should have unique brand keys', () => {
      const keys = PROTECTED_BRANDS.map((entry) => entry.key);
      expect(new Set(keys).size).toBe(keys.length);
    });
  });

  describe('detectDisplayNameBrandSpoof', () => {
    it('should flag a brand name sent from a foreign domain', () => {
      const spoof = detectDisplayNameBrandSpoof('Microsoft Support', 'Micros0ft-Help.example');

      expect(spoof?.brand.key).toBe('microsoft');
      expect(spoof?.senderDomain).toBe('micros0ft-help.example');
    });

    it('should accept the brand sending from its own domains', () => {
      expect(detectDisplayNameBrandSpoof('Microsoft Support', 'mail.office.com')).toBeNull();
      expect(detectDisplayNameBrandSpoof('PayPal', 'paypal.com')).toBeNull();
    });

    it('should ignore empty inputs', () => {
      expect(detectDisplayNameBrandSpoof('', 'paypal-secure.example')).toBeNull();
      expect(detectDisplayNameBrandSpoof('PayPal', '')).toBeNull();
    });
  });
});
