import type {
  Address,
  ApplicationRecord,
  LedgerCollaborators,
  LedgerEvent,
  LedgerParams,
  OperatorRecord,
  SlashingEvent,
} from '@stake-ledger/protocol';

export type LedgerState = {
  params: LedgerParams;
  operators: Map<Address, OperatorRecord>;
  applications: Map<Address, ApplicationRecord>;
  /** Legacy-B owner to the operator its merged stake backs. */
  legacyBOwners: Map<Address, Address>;
  slashingQueue: SlashingEvent[];
  slashingQueueIndex: number;
  notifiersTreasury: bigint;
};

export type LedgerSettings = {
  ledgerAddress: Address;
  minStakeTimeMs: number;
  processorRewardPercent: number;
  legacySeizeRewardPercent: number;
  tolerateInvoluntaryDecreaseFailures: boolean;
};

export type LedgerContext = {
  state: LedgerState;
  collaborators: LedgerCollaborators;
  settings: LedgerSettings;
  now: () => number;
  emit: (event: LedgerEvent) => void;
};

export const createLedgerState = (params: LedgerParams): LedgerState => ({
  params: { ...params },
  operators: new Map(),
  applications: new Map(),
  legacyBOwners: new Map(),
  slashingQueue: [],
  slashingQueueIndex: 0,
  notifiersTreasury: 0n,
});
