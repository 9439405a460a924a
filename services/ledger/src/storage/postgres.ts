import { Pool } from 'pg';
import { z } from 'zod';
import { ledgerEventTypeSchema, type RecordedLedgerEvent } from '@stake-ledger/protocol';
import type { LedgerDbConfig } from '../config';
import { encodeLedgerEvent } from './events';
import type { LedgerEventStore, StoredLedgerEvent } from './types';

const TABLE = 'ledger_events';

export type Queryable = {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
};

// bigint columns come back as strings
const eventRowSchema = z.object({
  seq: z.coerce.number().int(),
  type: ledgerEventTypeSchema,
  recorded_at_ms: z.coerce.number().int(),
  data: z.record(z.union([z.string(), z.number(), z.boolean()])),
});

const seqRowSchema = z.object({ seq: z.coerce.number().int() });

export const createEventTable = async (db: Queryable): Promise<void> => {
  await db.query(`
    create table if not exists ${TABLE} (
      ledger_id text not null,
      seq bigint not null,
      type text not null,
      recorded_at_ms bigint not null,
      data jsonb not null,
      primary key (ledger_id, seq)
    );
  `);
};

export const createPostgresEventStore = (db: Queryable, ledgerId: string): LedgerEventStore => ({
  async append(events: RecordedLedgerEvent[]): Promise<void> {
    if (events.length === 0) {
      return;
    }
    const values: unknown[] = [];
    const rows = events.map((event, index) => {
      const stored = encodeLedgerEvent(event);
      values.push(ledgerId, stored.seq, stored.type, stored.recordedAtMs, stored.data);
      const base = index * 5;
      return `($${base + 1}, $${base + 2}, $${base + 3}, $${base + 4}, $${base + 5})`;
    });
    await db.query(
      `insert into ${TABLE} (ledger_id, seq, type, recorded_at_ms, data) values ${rows.join(', ')}
       on conflict (ledger_id, seq) do nothing`,
      values,
    );
  },

  async load(afterSeq = 0): Promise<StoredLedgerEvent[]> {
    const result = await db.query(
      `select seq, type, recorded_at_ms, data from ${TABLE} where ledger_id = $1 and seq > $2 order by seq`,
      [ledgerId, afterSeq],
    );
    return result.rows.map((raw) => {
      const row = eventRowSchema.parse(raw);
      return { seq: row.seq, type: row.type, recordedAtMs: row.recorded_at_ms, data: row.data };
    });
  },

  async lastSeq(): Promise<number> {
    const result = await db.query(
      `select coalesce(max(seq), 0) as seq from ${TABLE} where ledger_id = $1`,
      [ledgerId],
    );
    return result.rows.length > 0 ? seqRowSchema.parse(result.rows[0]).seq : 0;
  },
});

export const createPostgresLedgerEventStore = async (
  config: LedgerDbConfig,
  ledgerId: string,
): Promise<{ store: LedgerEventStore; close: () => Promise<void> }> => {
  const pool = new Pool({
    connectionString: config.url,
    ssl: config.ssl ? { rejectUnauthorized: false } : undefined,
  });
  const db: Queryable = { query: (text, values) => pool.query(text, values) };
  await createEventTable(db);
  return { store: createPostgresEventStore(db, ledgerId), close: () => pool.end() };
};
