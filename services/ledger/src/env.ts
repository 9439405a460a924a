import { existsSync, readFileSync } from 'node:fs';
import {
  isAmountString,
  ledgerParamsUpdateSchema,
  parseWithSchema,
  type LedgerParamsUpdate,
} from '@stake-ledger/protocol';
import { defaultLedgerConfig, type LedgerConfig } from './config';
import { logWarn } from './logging';

export type LedgerEnv = Record<string, string | undefined>;

export type ConversionRatio = { ratio: bigint; divisor: bigint };

const parseNumber = (value?: string): number | undefined => {
  if (!value) return undefined;
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : undefined;
};

const parseBigint = (key: string, value?: string): bigint | undefined => {
  if (!value) return undefined;
  if (!isAmountString(value)) {
    logWarn(`[ledger] ignoring ${key}: not an integer amount`, { value });
    return undefined;
  }
  return BigInt(value);
};

const parseFlag = (value: string | undefined, fallback: boolean): boolean => {
  if (value === undefined) return fallback;
  return value.toLowerCase() === 'true';
};

/** Governance parameters from a JSON file; a missing or invalid file yields no overrides. */
export const loadDynamicConfig = (filePath = 'config.json'): LedgerParamsUpdate => {
  if (!existsSync(filePath)) {
    return {};
  }
  try {
    const raw: unknown = JSON.parse(readFileSync(filePath, 'utf8'));
    const parsed = parseWithSchema(ledgerParamsUpdateSchema, raw);
    if (!parsed.ok) {
      logWarn('[ledger] ignoring invalid config file', { filePath, errors: parsed.errors });
      return {};
    }
    return parsed.value;
  } catch (error) {
    logWarn('[ledger] failed to read config file', error);
    return {};
  }
};

/** Defaults, then the config file, then `LEDGER_*` variables. */
export const buildLedgerConfig = (env: LedgerEnv, dynamic: LedgerParamsUpdate = {}): LedgerConfig => {
  const base = { ...defaultLedgerConfig, ...dynamic };
  const dbUrl = env.LEDGER_DB_URL;
  return {
    ...base,
    ledgerId: env.LEDGER_ID ?? base.ledgerId,
    ledgerAddress: env.LEDGER_ADDRESS ?? base.ledgerAddress,
    governance: env.LEDGER_GOVERNANCE ?? base.governance,
    endpoint: env.LEDGER_ENDPOINT ?? base.endpoint,
    port: parseNumber(env.LEDGER_PORT) ?? base.port,
    minimumStake: parseBigint('LEDGER_MINIMUM_STAKE', env.LEDGER_MINIMUM_STAKE) ?? base.minimumStake,
    authorizationCeiling: parseNumber(env.LEDGER_AUTHORIZATION_CEILING) ?? base.authorizationCeiling,
    discrepancyPenalty:
      parseBigint('LEDGER_DISCREPANCY_PENALTY', env.LEDGER_DISCREPANCY_PENALTY) ?? base.discrepancyPenalty,
    discrepancyRewardMultiplier:
      parseNumber(env.LEDGER_DISCREPANCY_REWARD_MULTIPLIER) ?? base.discrepancyRewardMultiplier,
    notificationReward:
      parseBigint('LEDGER_NOTIFICATION_REWARD', env.LEDGER_NOTIFICATION_REWARD) ?? base.notificationReward,
    minStakeTimeMs: parseNumber(env.LEDGER_MIN_STAKE_TIME_MS) ?? base.minStakeTimeMs,
    processorRewardPercent: parseNumber(env.LEDGER_PROCESSOR_REWARD_PERCENT) ?? base.processorRewardPercent,
    legacySeizeRewardPercent: parseNumber(env.LEDGER_LEGACY_SEIZE_REWARD_PERCENT) ?? base.legacySeizeRewardPercent,
    tolerateInvoluntaryDecreaseFailures: parseFlag(
      env.LEDGER_TOLERATE_INVOLUNTARY_DECREASE_FAILURES,
      base.tolerateInvoluntaryDecreaseFailures,
    ),
    maxRequestBytes: parseNumber(env.LEDGER_MAX_REQUEST_BYTES) ?? base.maxRequestBytes,
    statePath: env.LEDGER_STATE_PATH ?? base.statePath,
    statePersistIntervalMs: parseNumber(env.LEDGER_STATE_PERSIST_MS) ?? base.statePersistIntervalMs,
    db: dbUrl ? { url: dbUrl, ssl: parseFlag(env.LEDGER_DB_SSL, false) } : base.db,
  };
};

export const parseConversionRatio = (value?: string): ConversionRatio | undefined => {
  if (!value) return undefined;
  const [ratio, divisor] = value.split('/').map((part) => part.trim());
  if (!ratio || !divisor || !isAmountString(ratio) || !isAmountString(divisor)) {
    logWarn('[ledger] ignoring conversion ratio, expected "<ratio>/<divisor>"', { value });
    return undefined;
  }
  return { ratio: BigInt(ratio), divisor: BigInt(divisor) };
};

const isPercent = (value: number): boolean => Number.isInteger(value) && value >= 0 && value <= 100;

export const validateLedgerConfig = (config: LedgerConfig): string[] => {
  const issues: string[] = [];
  if (!config.ledgerAddress) issues.push('LEDGER_ADDRESS is required.');
  if (!config.governance) issues.push('LEDGER_GOVERNANCE is required.');
  if (!Number.isInteger(config.port) || config.port < 0) issues.push('LEDGER_PORT must be a port number.');
  if (!isPercent(config.discrepancyRewardMultiplier)) {
    issues.push('LEDGER_DISCREPANCY_REWARD_MULTIPLIER must be within 0..100.');
  }
  if (!isPercent(config.processorRewardPercent)) issues.push('LEDGER_PROCESSOR_REWARD_PERCENT must be within 0..100.');
  if (!isPercent(config.legacySeizeRewardPercent)) {
    issues.push('LEDGER_LEGACY_SEIZE_REWARD_PERCENT must be within 0..100.');
  }
  if (config.authorizationCeiling < 0) issues.push('LEDGER_AUTHORIZATION_CEILING must not be negative.');
  return issues;
};
