import type { RecordedLedgerEvent } from '@stake-ledger/protocol';
import { logWarn } from '../logging';
import { eventStoreFailures } from '../observability';
import type { LedgerService } from '../server';
import type { LedgerEventStore, StoredEventData, StoredLedgerEvent } from './types';

export const encodeLedgerEvent = (event: RecordedLedgerEvent): StoredLedgerEvent => {
  const data: StoredEventData = {};
  for (const [key, value] of Object.entries(event)) {
    if (key === 'seq' || key === 'type' || key === 'recordedAtMs') {
      continue;
    }
    if (typeof value === 'bigint') {
      data[key] = value.toString(10);
    } else if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      data[key] = value;
    }
  }
  return { seq: event.seq, type: event.type, recordedAtMs: event.recordedAtMs, data };
};

export const createMemoryEventStore = (): LedgerEventStore & { events: StoredLedgerEvent[] } => {
  const events: StoredLedgerEvent[] = [];
  return {
    events,
    async append(batch) {
      events.push(...batch.map(encodeLedgerEvent));
    },
    async load(afterSeq = 0) {
      return events.filter((event) => event.seq > afterSeq);
    },
    async lastSeq() {
      return events.length > 0 ? events[events.length - 1].seq : 0;
    },
  };
};

/**
 * Appends every committed batch to the store. Appends run in the background;
 * a failed append is logged and counted, the ledger keeps running.
 */
export const attachLedgerEventStore = (service: LedgerService, store: LedgerEventStore): (() => void) => {
  return service.subscribe((events) => {
    store.append(events).catch((error) => {
      eventStoreFailures.inc();
      logWarn('[ledger] failed to append events', { firstSeq: events[0]?.seq, error });
    });
  });
};
