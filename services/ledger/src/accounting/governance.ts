import { LedgerError, type Address } from '@stake-ledger/protocol';
import type { LedgerContext } from './state';
import { requirePositive } from './views';

const requireGovernance = (ctx: LedgerContext, caller: Address): void => {
  if (caller !== ctx.state.params.governance) {
    throw new LedgerError('not-governance', caller);
  }
};

export const setMinimumStakeAmount = (ctx: LedgerContext, caller: Address, amount: bigint): void => {
  requireGovernance(ctx, caller);
  if (amount < 0n) {
    throw new LedgerError('invalid-parameters', 'minimum stake must not be negative');
  }
  ctx.state.params.minimumStake = amount;
  ctx.emit({ type: 'MinimumStakeAmountSet', amount });
};

/** Approves a new application or re-enables a disabled one. */
export const approveApplication = (ctx: LedgerContext, caller: Address, application: Address): void => {
  requireGovernance(ctx, caller);
  if (!application) {
    throw new LedgerError('invalid-parameters', 'application must be specified');
  }
  const existing = ctx.state.applications.get(application);
  if (existing?.status === 'approved') {
    throw new LedgerError('invalid-parameters', `${application} is already approved`);
  }
  if (existing) {
    existing.status = 'approved';
  } else {
    ctx.state.applications.set(application, { application, status: 'approved' });
  }
  ctx.emit({ type: 'ApplicationStatusChanged', application, status: 'approved' });
};

const disable = (ctx: LedgerContext, application: Address): void => {
  const record = ctx.state.applications.get(application);
  if (record?.status !== 'approved') {
    throw new LedgerError('application-not-approved', application);
  }
  record.status = 'disabled';
  ctx.emit({ type: 'ApplicationStatusChanged', application, status: 'disabled' });
};

export const disableApplication = (ctx: LedgerContext, caller: Address, application: Address): void => {
  requireGovernance(ctx, caller);
  disable(ctx, application);
};

export const disableApplicationByPanicButton = (
  ctx: LedgerContext,
  caller: Address,
  application: Address,
): void => {
  const record = ctx.state.applications.get(application);
  if (!record || record.panicButton === undefined || record.panicButton !== caller) {
    throw new LedgerError('not-panic-button', caller);
  }
  disable(ctx, application);
};

export const setPanicButton = (
  ctx: LedgerContext,
  caller: Address,
  application: Address,
  panicButton: Address,
): void => {
  requireGovernance(ctx, caller);
  const record = ctx.state.applications.get(application);
  if (!record) {
    throw new LedgerError('application-unknown', application);
  }
  record.panicButton = panicButton;
  ctx.emit({ type: 'PanicButtonSet', application, panicButton });
};

export const setAuthorizationCeiling = (ctx: LedgerContext, caller: Address, ceiling: number): void => {
  requireGovernance(ctx, caller);
  if (!Number.isInteger(ceiling) || ceiling < 0) {
    throw new LedgerError('invalid-parameters', 'ceiling must be a non-negative integer');
  }
  ctx.state.params.authorizationCeiling = ceiling;
  ctx.emit({ type: 'AuthorizationCeilingSet', ceiling });
};

export const setStakeDiscrepancyPenalty = (
  ctx: LedgerContext,
  caller: Address,
  penalty: bigint,
  rewardMultiplier: number,
): void => {
  requireGovernance(ctx, caller);
  if (penalty < 0n || !Number.isInteger(rewardMultiplier) || rewardMultiplier < 0 || rewardMultiplier > 100) {
    throw new LedgerError('invalid-parameters', 'penalty must be non-negative and multiplier within 0..100');
  }
  ctx.state.params.discrepancyPenalty = penalty;
  ctx.state.params.discrepancyRewardMultiplier = rewardMultiplier;
  ctx.emit({ type: 'StakeDiscrepancyPenaltySet', penalty, rewardMultiplier });
};

export const setNotificationReward = (ctx: LedgerContext, caller: Address, reward: bigint): void => {
  requireGovernance(ctx, caller);
  if (reward < 0n) {
    throw new LedgerError('invalid-parameters', 'reward must not be negative');
  }
  ctx.state.params.notificationReward = reward;
  ctx.emit({ type: 'NotificationRewardSet', reward });
};

/** Anyone may fund the notifier treasury. */
export const pushNotificationReward = (ctx: LedgerContext, caller: Address, reward: bigint): void => {
  requirePositive(reward, 'reward');
  ctx.state.notifiersTreasury += reward;
  ctx.emit({ type: 'NotificationRewardPushed', reward });
  ctx.collaborators.token.transferFrom(caller, ctx.settings.ledgerAddress, reward);
};

export const withdrawNotificationReward = (
  ctx: LedgerContext,
  caller: Address,
  recipient: Address,
  amount: bigint,
): void => {
  requireGovernance(ctx, caller);
  requirePositive(amount);
  if (amount > ctx.state.notifiersTreasury) {
    throw new LedgerError('treasury-insufficient');
  }
  ctx.state.notifiersTreasury -= amount;
  ctx.emit({ type: 'NotificationRewardWithdrawn', recipient, amount });
  ctx.collaborators.token.transfer(recipient, amount);
};

export const transferGovernance = (ctx: LedgerContext, caller: Address, newGovernance: Address): void => {
  requireGovernance(ctx, caller);
  if (!newGovernance) {
    throw new LedgerError('invalid-parameters', 'governance must be specified');
  }
  ctx.state.params.governance = newGovernance;
  ctx.emit({ type: 'GovernanceTransferred', oldGovernance: caller, newGovernance });
};
