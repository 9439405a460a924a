import { SpanStatusCode } from '@opentelemetry/api';
import type { Checkpointable, LedgerEvent, RecordedLedgerEvent, Rollback } from '@stake-ledger/protocol';
import { logWarn } from '../logging';
import { ledgerOperationDuration, ledgerOperations, ledgerTracer } from '../observability';
import type { LedgerState } from './state';

export type LedgerEventListener = (events: RecordedLedgerEvent[]) => void;

/**
 * Runs ledger operations as all-or-nothing units. Each unit checkpoints the
 * ledger state and every participating collaborator; a thrown error restores
 * them and drops the events buffered since the checkpoint. A unit started from
 * inside another one (an application calling back into the ledger) acts as a
 * savepoint of the enclosing unit. Events reach listeners only once the
 * outermost unit commits.
 */
export type LedgerUnits = {
  run<T>(operation: string, work: () => T): T;
  emit(event: LedgerEvent): void;
  subscribe(listener: LedgerEventListener): () => void;
  lastSeq(): number;
};

export const createLedgerUnits = (
  state: LedgerState,
  participants: Checkpointable[],
  now: () => number,
  initialSeq = 0,
): LedgerUnits => {
  let depth = 0;
  let pending: LedgerEvent[] = [];
  let seq = initialSeq;
  const listeners = new Set<LedgerEventListener>();

  const checkpoint = (): Rollback => {
    const snapshot = structuredClone(state);
    const eventCount = pending.length;
    const rollbacks = participants.map((participant) => participant.checkpoint());
    return () => {
      for (const rollback of rollbacks.reverse()) {
        rollback();
      }
      Object.assign(state, snapshot);
      pending.length = eventCount;
    };
  };

  const publish = (events: LedgerEvent[]): void => {
    if (events.length === 0) {
      return;
    }
    const recordedAtMs = now();
    const recorded: RecordedLedgerEvent[] = events.map((event) => {
      seq += 1;
      return { ...event, seq, recordedAtMs };
    });
    for (const listener of listeners) {
      try {
        listener(recorded);
      } catch (error) {
        logWarn('[ledger] event listener failed', error);
      }
    }
  };

  const run = <T>(operation: string, work: () => T): T => {
    const outermost = depth === 0;
    const rollback = checkpoint();
    const span = outermost ? ledgerTracer.startSpan(`ledger.${operation}`) : undefined;
    const stopTimer = outermost ? ledgerOperationDuration.startTimer({ operation }) : undefined;
    depth += 1;
    try {
      const result = work();
      depth -= 1;
      if (outermost) {
        const events = pending;
        pending = [];
        ledgerOperations.inc({ operation, status: 'ok' });
        span?.setAttribute('ledger.events', events.length);
        publish(events);
      }
      return result;
    } catch (error) {
      depth -= 1;
      rollback();
      if (outermost) {
        pending = [];
        ledgerOperations.inc({ operation, status: 'rejected' });
        span?.setStatus({
          code: SpanStatusCode.ERROR,
          message: error instanceof Error ? error.message : String(error),
        });
      }
      throw error;
    } finally {
      stopTimer?.();
      span?.end();
    }
  };

  const emit = (event: LedgerEvent): void => {
    if (depth === 0) {
      throw new Error('ledger events can only be emitted inside a unit');
    }
    pending.push(event);
  };

  const subscribe = (listener: LedgerEventListener): (() => void) => {
    listeners.add(listener);
    return () => {
      listeners.delete(listener);
    };
  };

  return { run, emit, subscribe, lastSeq: () => seq };
};
