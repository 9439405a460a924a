import type { LedgerEventType, RecordedLedgerEvent } from '@stake-ledger/protocol';

/** Event fields as stored; amounts are decimal strings. */
export type StoredEventData = Record<string, string | number | boolean>;

export type StoredLedgerEvent = {
  seq: number;
  type: LedgerEventType;
  recordedAtMs: number;
  data: StoredEventData;
};

export type LedgerEventStore = {
  append(events: RecordedLedgerEvent[]): Promise<void>;
  load(afterSeq?: number): Promise<StoredLedgerEvent[]>;
  lastSeq(): Promise<number>;
};
