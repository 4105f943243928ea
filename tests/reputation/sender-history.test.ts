/**
 * Sender History Store Tests
 */

import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';
import type { SqlClient } from '@/lib/db';
import { InMemorySenderHistoryStore, PostgresSenderHistoryStore } from '@/lib/reputation/sender-history';
import { silentLogger } from '../helpers/setup';

function queryText(strings: TemplateStringsArray): string {
  return strings.join('?').replace(/\s+/g, ' ').trim();
}

describe('Sender History', () => {
  describe('InMemorySenderHistoryStore', () => {
    let store: InMemorySenderHistoryStore;

    beforeEach(() => {
      store = new InMemorySenderHistoryStore();
    });

    it('should return null for an unknown sender', async () => {
      expect(await store.getHistory('nobody@corp.example')).toBeNull();
    });

    it('should aggregate recorded entries', async () => {
      await store.record('Jane@Corp.example', 'Jane Doe', '', new Date('2025-10-02T09:00:00Z'));
      await store.record('jane@corp.example', 'Jane D', 'Billing@Other.example', new Date('2025-10-01T09:00:00Z'));
      await store.record('jane@corp.example', 'Jane Doe', '', new Date('2025-10-03T09:00:00Z'));

      expect(await store.getHistory(' JANE@corp.example ')).toEqual({
        sender: 'jane@corp.example',
        messageCount: 3,
        firstSeen: new Date('2025-10-01T09:00:00Z'),
        lastSeen: new Date('2025-10-03T09:00:00Z'),
        displayNames: ['Jane Doe', 'Jane D'],
        replyToAddresses: ['billing@other.example'],
      });
    });

    it('should aggregate a sender with a very long history', async () => {
      const start = Date.parse('2025-01-01T00:00:00Z');
      const count = 200_000;
      for (let i = 0; i < count; i++) {
        await store.record('bulk@corp.example', 'Bulk', '', new Date(start + i * 1000));
      }

      const history = await store.getHistory('bulk@corp.example');

      expect(history?.messageCount).toBe(count);
      expect(history?.firstSeen).toEqual(new Date(start));
      expect(history?.lastSeen).toEqual(new Date(start + (count - 1) * 1000));
    });

    it('should let a read issued after a write observe it', async () => {
      const write = store.record('ops@corp.example', 'Ops', '', new Date('2025-10-01T09:00:00Z'));
      const read = store.getHistory('ops@corp.example');

      await write;
      expect((await read)?.messageCount).toBe(1);
    });

    it('should reject operations after close', async () => {
      await store.close();

      await expect(store.getHistory('ops@corp.example')).rejects.toThrow('Sender history store is closed');
    });
  });

  describe('PostgresSenderHistoryStore', () => {
    let aggregateRow: Record<string, unknown>;
    let sql: Mock<SqlClient>;
    let store: PostgresSenderHistoryStore;

    beforeEach(() => {
      aggregateRow = {
        message_count: '2',
        first_seen: '2025-10-01T09:00:00Z',
        last_seen: '2025-10-05T09:00:00Z',
        display_names: ['Jane Doe'],
        reply_to_addresses: null,
      };
      sql = vi.fn<SqlClient>(async (strings) => (queryText(strings).startsWith('SELECT') ? [aggregateRow] : []));
      store = new PostgresSenderHistoryStore(sql, silentLogger());
    });

    function callsStartingWith(prefix: string) {
      return sql.mock.calls.filter(([strings]) => queryText(strings).startsWith(prefix));
    }

    it('should map the aggregate row to a history', async () => {
      const history = await store.getHistory('Jane@Corp.example');

      expect(history).toEqual({
        sender: 'jane@corp.example',
        messageCount: 2,
        firstSeen: new Date('2025-10-01T09:00:00Z'),
        lastSeen: new Date('2025-10-05T09:00:00Z'),
        displayNames: ['Jane Doe'],
        replyToAddresses: [],
      });
      expect(callsStartingWith('SELECT')[0].slice(1)).toEqual(['jane@corp.example']);
    });

    it('should return null when the sender has no rows', async () => {
      aggregateRow = {
        message_count: 0,
        first_seen: null,
        last_seen: null,
        display_names: null,
        reply_to_addresses: null,
      };

      expect(await store.getHistory('nobody@corp.example')).toBeNull();
    });

    it('should reject a malformed aggregate row', async () => {
      aggregateRow = { message_count: 'many' };

      await expect(store.getHistory('jane@corp.example')).rejects.toThrow('Unexpected sender_history aggregate row');
    });

    it('should insert one row per message', async () => {
      await store.record('Jane@Corp.example', 'Jane Doe', 'Billing@Other.example', new Date('2025-10-14T12:00:00Z'));

      const inserts = callsStartingWith('INSERT INTO sender_history');
      expect(inserts).toHaveLength(1);
      expect(inserts[0].slice(1)).toEqual([
        expect.any(String),
        'jane@corp.example',
        'Jane Doe',
        'billing@other.example',
        '2025-10-14T12:00:00.000Z',
      ]);
    });

    it('should create the schema once', async () => {
      await store.getHistory('jane@corp.example');
      await store.record('jane@corp.example', 'Jane Doe', '', new Date('2025-10-14T12:00:00Z'));

      expect(callsStartingWith('CREATE TABLE IF NOT EXISTS sender_history')).toHaveLength(1);
      expect(callsStartingWith('CREATE INDEX IF NOT EXISTS idx_sender_history_sender')).toHaveLength(1);
    });

    it('should retry schema creation after a failure', async () => {
      sql.mockRejectedValueOnce(new Error('connection refused'));

      await expect(store.getHistory('jane@corp.example')).rejects.toThrow('connection refused');
      expect(await store.getHistory('jane@corp.example')).not.toBeNull();
      expect(callsStartingWith('CREATE TABLE IF NOT EXISTS sender_history')).toHaveLength(2);
    });
  });
});
