import {
  LedgerError,
  type Address,
  type OperatorRecord,
  type OperatorRoles,
  type StakeSource,
} from '@stake-ledger/protocol';
import { legacyAAmountInNative } from './legacy';
import type { LedgerContext } from './state';
import { getMinStaked, requireOperator, requireOwnerOrOperator, requirePositive } from './views';

export type CreateStakeParams = {
  operator: Address;
  beneficiary?: Address;
  authorizer?: Address;
};

const requireOperatorAddress = (operator: Address): void => {
  if (!operator) {
    throw new LedgerError('invalid-parameters', 'operator must be specified');
  }
};

/** Fails when any origination path already claimed the identity. */
const requireUnclaimed = (ctx: LedgerContext, operator: Address): void => {
  if (ctx.state.operators.has(operator)) {
    throw new LedgerError('operator-in-use', operator);
  }
  if (ctx.collaborators.legacyA.getDelegationInfo(operator).createdAtMs !== 0) {
    throw new LedgerError('operator-in-use', `${operator} has a legacy-A delegation`);
  }
};

const createRecord = (
  ctx: LedgerContext,
  operator: Address,
  origin: StakeSource,
  roles: OperatorRoles,
): OperatorRecord => {
  const record: OperatorRecord = {
    operator,
    origin,
    ...roles,
    nativeStake: 0n,
    legacyAInNative: 0n,
    legacyBInNative: 0n,
    startStakingMs: ctx.now(),
    authorizations: new Map(),
    authorizedApplications: [],
  };
  ctx.state.operators.set(operator, record);
  return record;
};

const emitStaked = (ctx: LedgerContext, record: OperatorRecord, source: StakeSource, amount: bigint): void => {
  ctx.emit({
    type: 'Staked',
    operator: record.operator,
    source,
    owner: record.owner,
    beneficiary: record.beneficiary,
    authorizer: record.authorizer,
    amount,
  });
};

export const createFromNative = (
  ctx: LedgerContext,
  caller: Address,
  params: CreateStakeParams & { amount: bigint },
): void => {
  requireOperatorAddress(params.operator);
  requireUnclaimed(ctx, params.operator);
  if (params.amount <= ctx.state.params.minimumStake) {
    throw new LedgerError('amount-below-minimum', `minimum is ${ctx.state.params.minimumStake}`);
  }
  const record = createRecord(ctx, params.operator, 'native', {
    owner: caller,
    beneficiary: params.beneficiary ?? caller,
    authorizer: params.authorizer ?? caller,
  });
  record.nativeStake = params.amount;
  emitStaked(ctx, record, 'native', params.amount);
  ctx.collaborators.token.transferFrom(caller, ctx.settings.ledgerAddress, params.amount);
};

/** Anyone may migrate a legacy-A delegation; roles come from the mirror. */
export const createFromLegacyA = (ctx: LedgerContext, operator: Address): void => {
  requireOperatorAddress(operator);
  if (ctx.state.operators.has(operator)) {
    throw new LedgerError('operator-in-use', operator);
  }
  const amount = legacyAAmountInNative(ctx, operator);
  if (amount === 0n) {
    throw new LedgerError('nothing-to-sync', operator);
  }
  const { legacyA } = ctx.collaborators;
  const record = createRecord(ctx, operator, 'legacyA', {
    owner: legacyA.ownerOf(operator),
    beneficiary: legacyA.beneficiaryOf(operator),
    authorizer: legacyA.authorizerOf(operator),
  });
  record.legacyAInNative = amount;
  emitStaked(ctx, record, 'legacyA', amount);
};

/** The caller is the legacy-B owner whose stake is merged into the new operator. */
export const createFromLegacyB = (ctx: LedgerContext, caller: Address, params: CreateStakeParams): void => {
  requireOperatorAddress(params.operator);
  requireUnclaimed(ctx, params.operator);
  if (ctx.state.legacyBOwners.has(caller)) {
    throw new LedgerError('legacy-owner-in-use', caller);
  }
  const { legacyB, legacyBOracle } = ctx.collaborators;
  const amount = legacyBOracle.toNative(legacyB.requestMerge(caller)).amount;
  if (amount === 0n) {
    throw new LedgerError('nothing-to-sync', caller);
  }
  const record = createRecord(ctx, params.operator, 'legacyB', {
    owner: caller,
    beneficiary: params.beneficiary ?? caller,
    authorizer: params.authorizer ?? caller,
  });
  record.legacyBInNative = amount;
  ctx.state.legacyBOwners.set(caller, params.operator);
  emitStaked(ctx, record, 'legacyB', amount);
};

export const topUpNative = (ctx: LedgerContext, caller: Address, operator: Address, amount: bigint): void => {
  requirePositive(amount);
  const record = requireOperator(ctx.state, operator);
  record.nativeStake += amount;
  ctx.emit({ type: 'ToppedUp', operator, source: 'native', amount });
  ctx.collaborators.token.transferFrom(caller, ctx.settings.ledgerAddress, amount);
};

export const topUpLegacyA = (ctx: LedgerContext, caller: Address, operator: Address): bigint => {
  const record = requireOperator(ctx.state, operator);
  requireOwnerOrOperator(record, caller);
  const synced = legacyAAmountInNative(ctx, operator);
  if (synced <= record.legacyAInNative) {
    throw new LedgerError('nothing-to-top-up');
  }
  const amount = synced - record.legacyAInNative;
  record.legacyAInNative = synced;
  ctx.emit({ type: 'ToppedUp', operator, source: 'legacyA', amount });
  return amount;
};

export const topUpLegacyB = (ctx: LedgerContext, caller: Address, operator: Address): bigint => {
  const { state } = ctx;
  const record = requireOperator(state, operator);
  requireOwnerOrOperator(record, caller);
  const backed = state.legacyBOwners.get(record.owner);
  if (backed !== undefined && backed !== operator) {
    throw new LedgerError('legacy-owner-in-use', record.owner);
  }
  const { legacyB, legacyBOracle } = ctx.collaborators;
  const synced = legacyBOracle.toNative(legacyB.requestMerge(record.owner)).amount;
  if (synced <= record.legacyBInNative) {
    throw new LedgerError('nothing-to-top-up');
  }
  const amount = synced - record.legacyBInNative;
  record.legacyBInNative = synced;
  state.legacyBOwners.set(record.owner, operator);
  ctx.emit({ type: 'ToppedUp', operator, source: 'legacyB', amount });
  return amount;
};

const stakedLongEnough = (ctx: LedgerContext, record: OperatorRecord): boolean =>
  record.startStakingMs + ctx.settings.minStakeTimeMs <= ctx.now();

export const unstakeNative = (ctx: LedgerContext, caller: Address, operator: Address, amount: bigint): void => {
  const record = requireOperator(ctx.state, operator);
  requireOwnerOrOperator(record, caller);
  requirePositive(amount);
  if (amount + getMinStaked(record, 'native') > record.nativeStake) {
    throw new LedgerError('too-much-to-unstake');
  }
  const remaining = record.nativeStake - amount;
  if (remaining < ctx.state.params.minimumStake && !stakedLongEnough(ctx, record)) {
    throw new LedgerError('unstake-too-early');
  }
  record.nativeStake = remaining;
  ctx.emit({ type: 'Unstaked', operator, source: 'native', amount });
  ctx.collaborators.token.transfer(record.owner, amount);
};

export const unstakeLegacyA = (ctx: LedgerContext, caller: Address, operator: Address): bigint => {
  const record = requireOperator(ctx.state, operator);
  requireOwnerOrOperator(record, caller);
  const amount = record.legacyAInNative;
  if (amount === 0n) {
    throw new LedgerError('nothing-to-unstake');
  }
  if (getMinStaked(record, 'legacyA') !== 0n) {
    throw new LedgerError('stake-still-authorized', 'legacy-A stake backs an authorization');
  }
  record.legacyAInNative = 0n;
  ctx.emit({ type: 'Unstaked', operator, source: 'legacyA', amount });
  return amount;
};

/** Unstakes the convertible part of `amount`; returns what was actually removed. */
export const unstakeLegacyB = (ctx: LedgerContext, caller: Address, operator: Address, amount: bigint): bigint => {
  const record = requireOperator(ctx.state, operator);
  requireOwnerOrOperator(record, caller);
  requirePositive(amount);
  if (amount + getMinStaked(record, 'legacyB') > record.legacyBInNative) {
    throw new LedgerError('too-much-to-unstake');
  }
  const conversion = ctx.collaborators.legacyBOracle.fromNative(amount);
  if (conversion.amount === 0n) {
    throw new LedgerError('conversion-yields-zero');
  }
  const unstaked = amount - conversion.remainder;
  record.legacyBInNative -= unstaked;
  ctx.emit({ type: 'Unstaked', operator, source: 'legacyB', amount: unstaked });
  return unstaked;
};

export const unstakeAll = (ctx: LedgerContext, caller: Address, operator: Address): void => {
  const record = requireOperator(ctx.state, operator);
  requireOwnerOrOperator(record, caller);
  if (record.authorizedApplications.length !== 0) {
    throw new LedgerError('stake-still-authorized');
  }
  if (record.nativeStake > 0n && ctx.state.params.minimumStake > 0n && !stakedLongEnough(ctx, record)) {
    throw new LedgerError('unstake-too-early');
  }
  const native = record.nativeStake;
  const balances: Array<[StakeSource, bigint]> = [
    ['native', native],
    ['legacyA', record.legacyAInNative],
    ['legacyB', record.legacyBInNative],
  ];
  record.nativeStake = 0n;
  record.legacyAInNative = 0n;
  record.legacyBInNative = 0n;
  for (const [source, amount] of balances) {
    if (amount > 0n) {
      ctx.emit({ type: 'Unstaked', operator, source, amount });
    }
  }
  if (native > 0n) {
    ctx.collaborators.token.transfer(record.owner, native);
  }
};
