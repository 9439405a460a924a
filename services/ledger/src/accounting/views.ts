import {
  LedgerError,
  maxAmount,
  minAmount,
  totalStake,
  type Address,
  type AppAuthorization,
  type OperatorRecord,
  type StakeBalances,
  type StakeSource,
} from '@stake-ledger/protocol';
import type { LedgerState } from './state';

export const STAKE_SOURCES: readonly StakeSource[] = ['native', 'legacyA', 'legacyB'];

export const requireOperator = (state: LedgerState, operator: Address): OperatorRecord => {
  const record = state.operators.get(operator);
  if (!record) {
    throw new LedgerError('operator-not-found', operator);
  }
  return record;
};

export const stakeBalances = (record: OperatorRecord): StakeBalances => ({
  native: record.nativeStake,
  legacyA: record.legacyAInNative,
  legacyB: record.legacyBInNative,
});

export const operatorTotalStake = (record: OperatorRecord): bigint => totalStake(stakeBalances(record));

export const authorizationOf = (record: OperatorRecord, application: Address): AppAuthorization => {
  return record.authorizations.get(application) ?? { authorized: 0n, deauthorizing: 0n };
};

export const isApprovedApplication = (state: LedgerState, application: Address): boolean =>
  state.applications.get(application)?.status === 'approved';

export const maxAuthorization = (record: OperatorRecord): bigint => {
  let max = 0n;
  for (const application of record.authorizedApplications) {
    max = maxAmount(max, authorizationOf(record, application).authorized);
  }
  return max;
};

/**
 * Part of `source` that has to stay staked so that the largest single
 * authorization remains covered, after the other two sources are counted
 * towards it first.
 */
export const getMinStaked = (record: OperatorRecord, source: StakeSource): bigint => {
  let required = maxAuthorization(record);
  if (required === 0n) {
    return 0n;
  }
  const balances = stakeBalances(record);
  for (const other of STAKE_SOURCES) {
    if (other !== source) {
      required -= minAmount(required, balances[other]);
    }
  }
  return required;
};

export const getAvailableToAuthorize = (
  state: LedgerState,
  record: OperatorRecord,
  application: Address,
): bigint => {
  if (!isApprovedApplication(state, application)) {
    return 0n;
  }
  const available = operatorTotalStake(record) - authorizationOf(record, application).authorized;
  return maxAmount(available, 0n);
};

export const isOwnerOrOperator = (record: OperatorRecord, caller: Address): boolean =>
  caller === record.owner || caller === record.operator;

export const requireOwnerOrOperator = (record: OperatorRecord, caller: Address): void => {
  if (!isOwnerOrOperator(record, caller)) {
    throw new LedgerError('not-owner-or-operator', caller);
  }
};

export const requirePositive = (amount: bigint, label = 'amount'): void => {
  if (amount <= 0n) {
    throw new LedgerError('invalid-parameters', `${label} must be positive`);
  }
};
