import type { StakeBalances } from './types';

export const PERCENT_BASE = 100n;

export const minAmount = (a: bigint, b: bigint): bigint => (a < b ? a : b);

export const maxAmount = (a: bigint, b: bigint): bigint => (a > b ? a : b);

/** `amount * pct / 100`, rounded down. */
export const percentOf = (amount: bigint, pct: number | bigint): bigint => {
  return (amount * BigInt(pct)) / PERCENT_BASE;
};

export const totalStake = (balances: StakeBalances): bigint =>
  balances.native + balances.legacyA + balances.legacyB;

export const isAmountString = (value: string): boolean => /^(0|[1-9][0-9]*)$/.test(value);

export const parseAmount = (value: string): bigint => {
  if (!isAmountString(value)) {
    throw new Error(`invalid amount "${value}"`);
  }
  return BigInt(value);
};

export const formatAmount = (value: bigint): string => value.toString(10);
