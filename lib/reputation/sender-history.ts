/**
 * Sender history stores
 *
 * Append-only record of who sent what under which display name / reply-to.
 * Entries are only ever added; history for a sender is an aggregate over them.
 */

import { nanoid } from 'nanoid';
import { z } from 'zod';
import type { SqlClient } from '@/lib/db';
import { loggers, type Logger } from '@/lib/logging/logger';
import type { SenderHistory } from '@/lib/detection/types';

export interface SenderHistoryStore {
  /** null for a sender never recorded */
  getHistory(address: string): Promise<SenderHistory | null>;
  record(address: string, displayName: string, replyTo: string, timestamp: Date): Promise<void>;
  close(): Promise<void>;
}

function senderKey(address: string): string {
  return address.trim().toLowerCase();
}

interface HistoryEntry {
  displayName: string;
  replyTo: string;
  timestamp: Date;
}

function aggregate(sender: string, entries: readonly HistoryEntry[]): SenderHistory | null {
  if (entries.length === 0) return null;

  let first = entries[0].timestamp.getTime();
  let last = first;
  for (const entry of entries) {
    const time = entry.timestamp.getTime();
    if (time < first) first = time;
    if (time > last) last = time;
  }
  const distinct = (values: string[]) => [...new Set(values.filter(Boolean))];

  return {
    sender,
    messageCount: entries.length,
    firstSeen: new Date(first),
    lastSeen: new Date(last),
    displayNames: distinct(entries.map((entry) => entry.displayName)),
    replyToAddresses: distinct(entries.map((entry) => entry.replyTo)),
  };
}

/**
 * Process-local store. Operations on one sender run in call order, so a read
 * issued after a write for that sender observes it.
 */
export class InMemorySenderHistoryStore implements SenderHistoryStore {
  private readonly entries = new Map<string, HistoryEntry[]>();
  private readonly queues = new Map<string, Promise<unknown>>();
  private closed = false;

  private enqueue<T>(key: string, task: () => T): Promise<T> {
    const previous = this.queues.get(key) ?? Promise.resolve();
    const next = previous.then(task);
    // the caller gets the rejection through `next`; the chain itself keeps going
    this.queues.set(key, next.catch(() => undefined));
    return next;
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new Error('Sender history store is closed');
    }
  }

  getHistory(address: string): Promise<SenderHistory | null> {
    const key = senderKey(address);
    return this.enqueue(key, () => {
      this.assertOpen();
      return aggregate(key, this.entries.get(key) ?? []);
    });
  }

  record(address: string, displayName: string, replyTo: string, timestamp: Date): Promise<void> {
    const key = senderKey(address);
    return this.enqueue(key, () => {
      this.assertOpen();
      const list = this.entries.get(key) ?? [];
      list.push({ displayName, replyTo: replyTo.toLowerCase(), timestamp: new Date(timestamp.getTime()) });
      this.entries.set(key, list);
    });
  }

  async close(): Promise<void> {
    await Promise.all(this.queues.values());
    this.closed = true;
  }
}

const historyAggregateSchema = z.object({
  message_count: z.coerce.number().int().nonnegative(),
  first_seen: z.coerce.date().nullable(),
  last_seen: z.coerce.date().nullable(),
  display_names: z.array(z.string()).nullable(),
  reply_to_addresses: z.array(z.string()).nullable(),
});

/**
 * Neon / Postgres backed store over the append-only sender_history table
 */
export class PostgresSenderHistoryStore implements SenderHistoryStore {
  private schemaReady: Promise<void> | null = null;

  constructor(
    private readonly sql: SqlClient,
    private readonly logger: Logger = loggers.history
  ) {}

  /**
   * Create the table and index once per store
   */
  ensureSchema(): Promise<void> {
    if (!this.schemaReady) {
      this.schemaReady = this.createSchema().catch((error: unknown) => {
        this.schemaReady = null;
        throw error;
      });
    }
    return this.schemaReady;
  }

  private async createSchema(): Promise<void> {
    await this.sql`
      CREATE TABLE IF NOT EXISTS sender_history (
        id TEXT PRIMARY KEY,
        sender TEXT NOT NULL,
        display_name TEXT NOT NULL DEFAULT '',
        reply_to TEXT NOT NULL DEFAULT '',
        seen_at TIMESTAMPTZ NOT NULL
      )
    `;
    await this.sql`
      CREATE INDEX IF NOT EXISTS idx_sender_history_sender
      ON sender_history (sender, seen_at)
    `;
    this.logger.info('sender_history schema ready');
  }

  async getHistory(address: string): Promise<SenderHistory | null> {
    await this.ensureSchema();
    const key = senderKey(address);

    const rows = await this.sql`
      SELECT
        COUNT(*)::int AS message_count,
        MIN(seen_at) AS first_seen,
        MAX(seen_at) AS last_seen,
        array_agg(DISTINCT display_name) FILTER (WHERE display_name <> '') AS display_names,
        array_agg(DISTINCT reply_to) FILTER (WHERE reply_to <> '') AS reply_to_addresses
      FROM sender_history
      WHERE sender = ${key}
    `;

    const parsed = historyAggregateSchema.safeParse(rows[0]);
    if (!parsed.success) {
      throw new Error(`Unexpected sender_history aggregate row: ${parsed.error.message}`);
    }

    const row = parsed.data;
    if (row.message_count === 0 || !row.first_seen || !row.last_seen) {
      return null;
    }

    return {
      sender: key,
      messageCount: row.message_count,
      firstSeen: row.first_seen,
      lastSeen: row.last_seen,
      displayNames: row.display_names ?? [],
      replyToAddresses: row.reply_to_addresses ?? [],
    };
  }

  async record(address: string, displayName: string, replyTo: string, timestamp: Date): Promise<void> {
    await this.ensureSchema();
    await this.sql`
      INSERT INTO sender_history (id, sender, display_name, reply_to, seen_at)
      VALUES (${nanoid()}, ${senderKey(address)}, ${displayName}, ${replyTo.toLowerCase()}, ${timestamp.toISOString()})
    `;
  }

  async close(): Promise<void> {
    // HTTP client holds no connection
    this.logger.debug('Sender history store closed');
  }
}
