import type { Address, LedgerParams } from '@stake-ledger/protocol';

export const MIN_STAKE_TIME_MS = 24 * 60 * 60 * 1000;

export type LedgerConfig = {
  ledgerId: string;
  /** Identity under which the ledger holds tokens and is authorized on legacy mirrors. */
  ledgerAddress: Address;
  governance: Address;
  endpoint: string;
  port: number;
  minimumStake: bigint;
  authorizationCeiling: number;
  discrepancyPenalty: bigint;
  discrepancyRewardMultiplier: number;
  notificationReward: bigint;
  minStakeTimeMs: number;
  processorRewardPercent: number;
  legacySeizeRewardPercent: number;
  tolerateInvoluntaryDecreaseFailures: boolean;
  maxRequestBytes?: number;
  statePath?: string;
  statePersistIntervalMs?: number;
  db?: LedgerDbConfig;
};

export type LedgerDbConfig = {
  url: string;
  ssl?: boolean;
};

export const defaultLedgerConfig: LedgerConfig = {
  ledgerId: 'ledger-1',
  ledgerAddress: 'ledger',
  governance: 'governance',
  endpoint: 'http://localhost:8090',
  port: 8090,
  minimumStake: 0n,
  authorizationCeiling: 0,
  discrepancyPenalty: 0n,
  discrepancyRewardMultiplier: 100,
  notificationReward: 0n,
  minStakeTimeMs: MIN_STAKE_TIME_MS,
  processorRewardPercent: 5,
  legacySeizeRewardPercent: 5,
  tolerateInvoluntaryDecreaseFailures: false,
  maxRequestBytes: 64 * 1024,
  statePath: undefined,
  statePersistIntervalMs: 5000,
  db: undefined,
};

export const paramsFromConfig = (config: LedgerConfig): LedgerParams => ({
  governance: config.governance,
  minimumStake: config.minimumStake,
  authorizationCeiling: config.authorizationCeiling,
  discrepancyPenalty: config.discrepancyPenalty,
  discrepancyRewardMultiplier: config.discrepancyRewardMultiplier,
  notificationReward: config.notificationReward,
});
