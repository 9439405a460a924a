import { readFileSync } from 'node:fs';
import { mkdir, rename, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import stableStringify from 'fast-json-stable-stringify';
import {
  formatAmount,
  ledgerSnapshotSchema,
  parseWithSchema,
  type LedgerSnapshot,
  type LedgerSnapshotInput,
  type OperatorRecord,
} from '@stake-ledger/protocol';
import type { LedgerState } from './accounting/state';
import { logWarn } from './logging';

const snapshotOperator = (record: OperatorRecord): LedgerSnapshotInput['operators'][number] => ({
  operator: record.operator,
  owner: record.owner,
  beneficiary: record.beneficiary,
  authorizer: record.authorizer,
  origin: record.origin,
  nativeStake: formatAmount(record.nativeStake),
  legacyAInNative: formatAmount(record.legacyAInNative),
  legacyBInNative: formatAmount(record.legacyBInNative),
  startStakingMs: record.startStakingMs,
  authorizations: Array.from(record.authorizations.entries()).map(([application, authorization]) => ({
    application,
    authorized: formatAmount(authorization.authorized),
    deauthorizing: formatAmount(authorization.deauthorizing),
  })),
  authorizedApplications: [...record.authorizedApplications],
});

export const buildLedgerSnapshot = (state: LedgerState, capturedAtMs = Date.now()): LedgerSnapshotInput => ({
  capturedAtMs,
  params: {
    ...state.params,
    minimumStake: formatAmount(state.params.minimumStake),
    discrepancyPenalty: formatAmount(state.params.discrepancyPenalty),
    notificationReward: formatAmount(state.params.notificationReward),
  },
  notifiersTreasury: formatAmount(state.notifiersTreasury),
  operators: Array.from(state.operators.values()).map(snapshotOperator),
  applications: Array.from(state.applications.values()).map((record) => ({ ...record })),
  legacyBOwners: Array.from(state.legacyBOwners.entries()).map(([owner, operator]) => ({ owner, operator })),
  slashingQueue: state.slashingQueue.map((event) => ({
    operator: event.operator,
    amount: formatAmount(event.amount),
  })),
  slashingQueueIndex: state.slashingQueueIndex,
});

export const restoreLedgerState = (snapshot: LedgerSnapshot): LedgerState => ({
  params: { ...snapshot.params },
  operators: new Map(
    snapshot.operators.map((entry) => [
      entry.operator,
      {
        operator: entry.operator,
        owner: entry.owner,
        beneficiary: entry.beneficiary,
        authorizer: entry.authorizer,
        origin: entry.origin,
        nativeStake: entry.nativeStake,
        legacyAInNative: entry.legacyAInNative,
        legacyBInNative: entry.legacyBInNative,
        startStakingMs: entry.startStakingMs,
        authorizations: new Map(
          entry.authorizations.map((authorization) => [
            authorization.application,
            { authorized: authorization.authorized, deauthorizing: authorization.deauthorizing },
          ]),
        ),
        authorizedApplications: [...entry.authorizedApplications],
      },
    ]),
  ),
  applications: new Map(snapshot.applications.map((record) => [record.application, { ...record }])),
  legacyBOwners: new Map(snapshot.legacyBOwners.map((entry) => [entry.owner, entry.operator])),
  slashingQueue: snapshot.slashingQueue.map((event) => ({ ...event })),
  slashingQueueIndex: snapshot.slashingQueueIndex,
  notifiersTreasury: snapshot.notifiersTreasury,
});

/** Keys are sorted so identical ledgers produce identical files. */
export const serializeLedgerSnapshot = (snapshot: LedgerSnapshotInput): string => stableStringify(snapshot);

export const persistLedgerState = async (state: LedgerState, filePath: string): Promise<void> => {
  await mkdir(dirname(filePath), { recursive: true });
  const tmpPath = `${filePath}.tmp`;
  await writeFile(tmpPath, serializeLedgerSnapshot(buildLedgerSnapshot(state)));
  await rename(tmpPath, filePath);
};

export const loadLedgerState = (filePath?: string): LedgerState | undefined => {
  if (!filePath) {
    return undefined;
  }
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, 'utf8'));
  } catch (error) {
    logWarn('[ledger] failed to load state', error);
    return undefined;
  }
  const parsed = parseWithSchema(ledgerSnapshotSchema, raw);
  if (!parsed.ok) {
    logWarn('[ledger] ignoring invalid state snapshot', { filePath, errors: parsed.errors });
    return undefined;
  }
  return restoreLedgerState(parsed.value);
};

/** Persists the ledger on an interval; returns a function that stops it. */
export const startLedgerStatePersistence = (
  state: LedgerState,
  filePath?: string,
  intervalMs = 5000,
): (() => void) => {
  if (!filePath) {
    return () => undefined;
  }
  let inFlight = false;
  let queued = false;
  const persist = () => {
    if (inFlight) {
      queued = true;
      return;
    }
    inFlight = true;
    persistLedgerState(state, filePath)
      .catch((error) => {
        logWarn('[ledger] failed to persist state', error);
      })
      .finally(() => {
        inFlight = false;
        if (queued) {
          queued = false;
          persist();
        }
      });
  };
  persist();
  const timer = setInterval(persist, intervalMs);
  return () => clearInterval(timer);
};
