/**
 * WHOIS Lookup Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { ExternalServiceError } from '@/lib/errors';
import { parseWhoisDate, parseWhoisText, WhoisClient } from '@/lib/threat-intel/domain/whois';
import { FIXED_NOW, silentLogger } from '../helpers/setup';

const API_URL = 'https://whois.test/api';

function jsonFetch(body: unknown, status = 200) {
  return vi.fn<typeof fetch>(async () => new Response(JSON.stringify(body), { status }));
}

function client(fetchImpl: typeof fetch, clock: { now: number } = { now: FIXED_NOW }): WhoisClient {
  return new WhoisClient({
    apiUrl: API_URL,
    apiKey: 'test-secret',
    fetch: fetchImpl,
    cacheTtlMs: 60_000,
    now: () => clock.now,
    logger: silentLogger(),
  });
}

describe('WHOIS Lookup', () => {
  describe('parseWhoisDate', () => {
    it('should read ISO and day-month-year dates', () => {
      expect(parseWhoisDate('2020-01-01T00:00:00Z')?.toISOString()).toBe('2020-01-01T00:00:00.000Z');
      expect(parseWhoisDate('01-Jan-2020')?.getTime()).toBe(Date.UTC(2020, 0, 1));
    });

    it('should return undefined for missing or unreadable dates', () => {
      expect(parseWhoisDate(null)).toBeUndefined();
      expect(parseWhoisDate('not a date')).toBeUndefined();
    });
  });

  describe('parseWhoisText', () => {
    it('should read registrar, dates and name servers', () => {
      const parsed = parseWhoisText(
        [
          'Domain Name: EXAMPLE.COM',
          'Registrar: Example Registrar, Inc.',
          'Registrar Abuse Contact Email: abuse@registrar.example',
          'Creation Date: 2019-06-01T12:00:00Z',
          'Registry Expiry Date: 2030-06-01T12:00:00Z',
          'Name Server: NS1.EXAMPLE.COM',
          'Name Server: NS2.EXAMPLE.COM',
        ].join('\n')
      );

      expect(parsed.registrar).toBe('Example Registrar, Inc.');
      expect(parsed.createdDate?.toISOString()).toBe('2019-06-01T12:00:00.000Z');
      expect(parsed.expiresDate?.toISOString()).toBe('2030-06-01T12:00:00.000Z');
      expect(parsed.nameServers).toEqual(['ns1.example.com', 'ns2.example.com']);
    });
  });

  describe('WhoisClient', () => {
    it('should query the API with the key and map the response', async () => {
      const fetchMock = jsonFetch({
        domain: 'example.com',
        registrar: 'Example Registrar',
        created_date: '2020-01-01T00:00:00Z',
        status: 'active',
      });

      const result = await client(fetchMock).lookup(' Example.COM ');

      expect(fetchMock).toHaveBeenCalledWith(`${API_URL}?domain=example.com`, {
        headers: { Accept: 'application/json', Authorization: 'Bearer test-secret' },
        signal: undefined,
      });
      expect(result).toMatchObject({
        domain: 'example.com',
        registrar: 'Example Registrar',
        status: ['active'],
        cached: false,
      });
      expect(result.createdDate?.toISOString()).toBe('2020-01-01T00:00:00.000Z');
    });

    it('should fall back to the raw record', async () => {
      const result = await client(
        jsonFetch({ raw: 'Registrar: Raw Registrar\nCreation Date: 01-Jan-2020\nName Server: NS1.EXAMPLE.COM' })
      ).lookup('example.com');

      expect(result.registrar).toBe('Raw Registrar');
      expect(result.createdDate?.getTime()).toBe(Date.UTC(2020, 0, 1));
      expect(result.nameServers).toEqual(['ns1.example.com']);
    });

    it('should report an undisclosed creation date as null', async () => {
      const result = await client(jsonFetch({ domain: 'example.com' })).lookup('example.com');

      expect(result.createdDate).toBeNull();
    });

    it('should serve repeated lookups from cache until they expire', async () => {
      const clock = { now: FIXED_NOW };
      const fetchMock = jsonFetch({ created_date: '2020-01-01T00:00:00Z' });
      const whois = client(fetchMock, clock);

      await whois.lookup('example.com');
      const second = await whois.lookup('EXAMPLE.com');
      expect(second.cached).toBe(true);
      expect(fetchMock).toHaveBeenCalledTimes(1);

      clock.now += 60_000;
      const third = await whois.lookup('example.com');
      expect(third.cached).toBe(false);
      expect(fetchMock).toHaveBeenCalledTimes(2);
    });

    it('should throw on error statuses', async () => {
      const lookup = client(jsonFetch({}, 503)).lookup('example.com');

      await expect(lookup).rejects.toBeInstanceOf(ExternalServiceError);
      await expect(lookup).rejects.toThrow('WHOIS API returned 503 for example.com');
    });

    it('should wrap network failures', async () => {
      const fetchMock = vi.fn<typeof fetch>().mockRejectedValue(new TypeError('fetch failed'));

      await expect(client(fetchMock).lookup('example.com')).rejects.toThrow('WHOIS request failed for example.com');
    });

    it('should reject responses of the wrong shape', async () => {
      await expect(client(jsonFetch({ name_servers: 'ns1' })).lookup('example.com')).rejects.toThrow(
        'Unexpected WHOIS response for example.com'
      );
    });
  });
});
