/**
 * Host helper and homoglyph tests
 */

import { describe, it, expect } from 'vitest';
import {
  classifyIp,
  domainSimilarity,
  isIpLiteral,
  isNonRoutableIp,
  levenshteinDistance,
  splitHost,
} from '@/lib/detection/domain';
import { analyzeHomoglyphs, lookalikeOf } from '@/lib/detection/homoglyphs';

describe('Host helpers', () => {
  describe('splitHost', () => {
    it('should split a simple host', () => {
      expect(splitHost('www.example.com')).toEqual({ registrable: 'example.com', subdomain: 'www', tld: 'com' });
    });

    it('should recognize two-level public suffixes', () => {
      expect(splitHost('login.secure.example.co.uk')).toEqual({
        registrable: 'example.co.uk',
        subdomain: 'login.secure',
        tld: 'co.uk',
      });
    });

    it('should ignore a trailing dot and upper case', () => {
      expect(splitHost('Mail.Example.ORG.')).toEqual({ registrable: 'example.org', subdomain: 'mail', tld: 'org' });
    });
  });

  describe('IP literals', () => {
    it('should detect IPv4 and bracketed IPv6', () => {
      expect(isIpLiteral('192.168.1.100')).toBe(true);
      expect(isIpLiteral('[2001:db8::1]')).toBe(true);
      expect(isIpLiteral('999.1.1.1')).toBe(false);
      expect(isIpLiteral('example.com')).toBe(false);
    });

    it('should classify address ranges', () => {
      expect(classifyIp('10.0.0.1')).toBe('private');
      expect(classifyIp('172.20.1.1')).toBe('private');
      expect(classifyIp('192.168.0.5')).toBe('private');
      expect(classifyIp('127.0.0.1')).toBe('loopback');
      expect(classifyIp('169.254.10.1')).toBe('link-local');
      expect(classifyIp('203.0.113.9')).toBe('public');
      expect(classifyIp('::1')).toBe('loopback');
      expect(classifyIp('fd00::1')).toBe('private');
      expect(classifyIp('not-an-ip')).toBe('invalid');
    });

    it('should treat only private, loopback and link-local as non-routable', () => {
      expect(isNonRoutableIp('10.1.2.3')).toBe(true);
      expect(isNonRoutableIp('203.0.113.9')).toBe(false);
    });
  });

  describe('similarity', () => {
    it('should compute edit distance', () => {
      expect(levenshteinDistance('kitten', 'sitting')).toBe(3);
      expect(levenshteinDistance('', 'abc')).toBe(3);
      expect(levenshteinDistance('same', 'same')).toBe(0);
    });

    it('should normalize by the longer string', () => {
      expect(domainSimilarity('microsft.com', 'microsoft.com')).toBeCloseTo(1 - 1 / 13, 10);
      expect(domainSimilarity('', '')).toBe(1);
    });
  });
});

describe('Homoglyphs', () => {
  it('should map a Cyrillic letter from the table', () => {
    expect(lookalikeOf('а')).toEqual({ char: 'а', lookalike: 'a', source: 'table' });
  });

  it('should fold fullwidth letters through normalization', () => {
    expect(lookalikeOf('ｇ')).toEqual({ char: 'ｇ', lookalike: 'g', source: 'normalized' });
  });

  it('should never flag ASCII', () => {
    expect(lookalikeOf('a')).toBeNull();
    expect(analyzeHomoglyphs('paypal.com').flagged).toEqual([]);
  });

  it('should build a skeleton and list each flagged character once', () => {
    const result = analyzeHomoglyphs('pааypal');

    expect(result.skeleton).toBe('paaypal');
    expect(result.flagged).toHaveLength(1);
    expect(result.flagged[0].lookalike).toBe('a');
  });
});
