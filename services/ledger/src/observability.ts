import { Counter, collectDefaultMetrics, Gauge, Histogram, Registry } from 'prom-client';
import { trace } from '@opentelemetry/api';

export const ledgerRegistry = new Registry();
collectDefaultMetrics({ register: ledgerRegistry });

export const ledgerOperations = new Counter({
  name: 'ledger_operations_total',
  help: 'Atomic ledger operations by outcome',
  labelNames: ['operation', 'status'],
  registers: [ledgerRegistry],
});

export const ledgerOperationDuration = new Histogram({
  name: 'ledger_operation_duration_seconds',
  help: 'Duration of atomic ledger operations in seconds',
  labelNames: ['operation'],
  buckets: [0.0005, 0.001, 0.005, 0.01, 0.05, 0.1, 0.5],
  registers: [ledgerRegistry],
});

export const ledgerEvents = new Counter({
  name: 'ledger_events_total',
  help: 'Committed ledger events by type',
  labelNames: ['type'],
  registers: [ledgerRegistry],
});

export const slashingQueueLength = new Gauge({
  name: 'ledger_slashing_queue_length',
  help: 'Slashing events ever queued',
  registers: [ledgerRegistry],
});

export const slashingQueuePending = new Gauge({
  name: 'ledger_slashing_queue_pending',
  help: 'Slashing events waiting to be processed',
  registers: [ledgerRegistry],
});

export const eventStoreFailures = new Counter({
  name: 'ledger_event_store_failures_total',
  help: 'Failed appends of committed events to the event store',
  registers: [ledgerRegistry],
});

export const ledgerTracer = trace.getTracer('ledger');
