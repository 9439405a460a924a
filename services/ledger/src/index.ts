export * from './config';
export * from './env';
export * from './logging';
export * from './observability';
export * from './server';
export * from './state';
export * from './http';
export * from './shutdown';
export { createLedgerState, type LedgerContext, type LedgerSettings, type LedgerState } from './accounting/state';
export { createLedgerUnits, type LedgerEventListener, type LedgerUnits } from './accounting/units';
export type { SlashingBatch } from './accounting/slashing';
export type { CreateStakeParams } from './accounting/operators';
export * from './storage/types';
export * from './storage/events';
export * from './storage/postgres';
