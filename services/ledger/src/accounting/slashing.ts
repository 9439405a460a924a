import {
  LedgerError,
  minAmount,
  percentOf,
  type Address,
  type SlashingEvent,
} from '@stake-ledger/protocol';
import { correctAuthorizations } from './authorization';
import { legacyAAmountInNative, legacyBAmountInNative, seizeLegacyA, seizeLegacyB } from './legacy';
import type { LedgerContext } from './state';
import { authorizationOf, isApprovedApplication, requirePositive } from './views';

/** Reward multiplier used for legacy seizures made while processing the queue. */
const QUEUE_SEIZE_REWARD_MULTIPLIER = 100;

export type SlashingBatch = {
  processed: number;
  nativeBurned: bigint;
  processorReward: bigint;
};

const requireRewardMultiplier = (rewardMultiplier: number): void => {
  if (!Number.isInteger(rewardMultiplier) || rewardMultiplier < 0 || rewardMultiplier > 100) {
    throw new LedgerError('invalid-parameters', 'reward multiplier must be within 0..100');
  }
};

/**
 * Queues one slashing event per operator. Every operator must have at least
 * `amount` authorized to the calling application. Returns the number of
 * queued events.
 */
export const seize = (
  ctx: LedgerContext,
  application: Address,
  amount: bigint,
  rewardMultiplier: number,
  notifier: Address | undefined,
  operators: Address[],
): number => {
  const { state } = ctx;
  if (!isApprovedApplication(state, application)) {
    throw new LedgerError('application-not-approved', application);
  }
  requirePositive(amount);
  requireRewardMultiplier(rewardMultiplier);
  if (operators.length === 0) {
    throw new LedgerError('invalid-parameters', 'operators must be specified');
  }
  for (const operator of operators) {
    const record = state.operators.get(operator);
    if (!record || authorizationOf(record, application).authorized < amount) {
      throw new LedgerError('operator-not-authorized', `${operator} has less than ${amount} authorized`);
    }
  }

  for (const operator of operators) {
    state.slashingQueue.push({ operator, amount });
    ctx.emit({
      type: 'SlashingQueued',
      operator,
      application,
      amount,
      queueIndex: state.slashingQueue.length - 1,
    });
  }

  if (notifier) {
    const reward = minAmount(
      percentOf(BigInt(operators.length) * state.params.notificationReward, rewardMultiplier),
      state.notifiersTreasury,
    );
    ctx.emit({ type: 'NotifierRewarded', notifier, amount: reward });
    if (reward > 0n) {
      state.notifiersTreasury -= reward;
      ctx.collaborators.token.transfer(notifier, reward);
    }
  }
  return operators.length;
};

export const slash = (
  ctx: LedgerContext,
  application: Address,
  amount: bigint,
  operators: Address[],
): number => seize(ctx, application, amount, 0, undefined, operators);

/** Applies one queue entry: native first, then legacy-A, then legacy-B. Returns the native amount burned. */
const applySlashingEvent = (ctx: LedgerContext, event: SlashingEvent): bigint => {
  const record = ctx.state.operators.get(event.operator);
  if (!record) {
    return 0n;
  }
  const notifier = ctx.settings.ledgerAddress;
  let remaining = event.amount;

  const nativeBurned = minAmount(remaining, record.nativeStake);
  record.nativeStake -= nativeBurned;
  remaining -= nativeBurned;

  if (remaining > 0n && record.legacyAInNative > 0n) {
    record.legacyAInNative = minAmount(record.legacyAInNative, legacyAAmountInNative(ctx, record.operator));
    remaining = seizeLegacyA(ctx, record, remaining, QUEUE_SEIZE_REWARD_MULTIPLIER, notifier);
  }
  if (remaining > 0n && record.legacyBInNative > 0n) {
    record.legacyBInNative = minAmount(record.legacyBInNative, legacyBAmountInNative(ctx, record.owner));
    remaining = seizeLegacyB(ctx, record, remaining, QUEUE_SEIZE_REWARD_MULTIPLIER, notifier);
  }

  ctx.emit({ type: 'TokensSeized', operator: record.operator, amount: event.amount - remaining, discrepancy: false });
  correctAuthorizations(ctx, record);
  return nativeBurned;
};

/**
 * Processes exactly `count` queued events (fewer when the queue holds fewer)
 * from the current queue index.
 */
export const processSlashing = (ctx: LedgerContext, processor: Address, count: number): SlashingBatch => {
  const { state, settings } = ctx;
  if (!Number.isInteger(count) || count <= 0) {
    throw new LedgerError('invalid-parameters', 'count must be a positive integer');
  }
  if (state.slashingQueueIndex >= state.slashingQueue.length) {
    throw new LedgerError('nothing-to-process');
  }
  const start = state.slashingQueueIndex;
  const end = Math.min(start + count, state.slashingQueue.length);
  let nativeBurned = 0n;
  while (state.slashingQueueIndex < end) {
    const event = state.slashingQueue[state.slashingQueueIndex];
    state.slashingQueueIndex += 1;
    nativeBurned += applySlashingEvent(ctx, event);
  }

  const processed = state.slashingQueueIndex - start;
  const processorReward = percentOf(nativeBurned, settings.processorRewardPercent);
  state.notifiersTreasury += nativeBurned - processorReward;
  ctx.emit({ type: 'SlashingProcessed', processor, count: processed, nativeBurned, processorReward });
  if (processorReward > 0n) {
    ctx.collaborators.token.transfer(processor, processorReward);
  }
  return { processed, nativeBurned, processorReward };
};
