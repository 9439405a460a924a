import { minAmount, percentOf, type Address, type OperatorRecord } from '@stake-ledger/protocol';
import type { LedgerContext } from './state';

/** Legacy-A delegation in native units; zero unless the ledger is authorized and the delegation is live. */
export const legacyAAmountInNative = (ctx: LedgerContext, operator: Address): bigint => {
  const { legacyA, legacyAOracle } = ctx.collaborators;
  if (!legacyA.isAuthorizedForOperator(operator, ctx.settings.ledgerAddress)) {
    return 0n;
  }
  const info = legacyA.getDelegationInfo(operator);
  if (info.undelegatedAtMs !== 0) {
    return 0n;
  }
  return legacyAOracle.toNative(info.amount).amount;
};

export const legacyBAmountInNative = (ctx: LedgerContext, owner: Address): bigint => {
  const { legacyB, legacyBOracle } = ctx.collaborators;
  return legacyBOracle.toNative(legacyB.getAllTokens(owner)).amount;
};

/**
 * Charges up to `amountToSlash` against the cached legacy-A stake and seizes
 * the converted amount from the mirror. Returns what is left to slash.
 */
export const seizeLegacyA = (
  ctx: LedgerContext,
  record: OperatorRecord,
  amountToSlash: bigint,
  rewardMultiplier: number,
  notifier: Address,
): bigint => {
  if (record.legacyAInNative === 0n) {
    return amountToSlash;
  }
  let penalty = minAmount(amountToSlash, record.legacyAInNative);
  const conversion = ctx.collaborators.legacyAOracle.fromNative(penalty);
  if (conversion.amount === 0n) {
    return amountToSlash;
  }
  penalty -= conversion.remainder;
  record.legacyAInNative -= penalty;
  ctx.collaborators.legacyA.seize(conversion.amount, rewardMultiplier, notifier, [record.operator]);
  return amountToSlash - penalty;
};

export const seizeLegacyB = (
  ctx: LedgerContext,
  record: OperatorRecord,
  amountToSlash: bigint,
  rewardMultiplier: number,
  notifier: Address,
): bigint => {
  if (record.legacyBInNative === 0n) {
    return amountToSlash;
  }
  let penalty = minAmount(amountToSlash, record.legacyBInNative);
  const conversion = ctx.collaborators.legacyBOracle.fromNative(penalty);
  if (conversion.amount === 0n) {
    return amountToSlash;
  }
  penalty -= conversion.remainder;
  record.legacyBInNative -= penalty;
  const reward = percentOf(
    percentOf(conversion.amount, ctx.settings.legacySeizeRewardPercent),
    rewardMultiplier,
  );
  ctx.collaborators.legacyB.slashStaker(record.owner, conversion.amount, notifier, reward);
  return amountToSlash - penalty;
};
