import { LedgerError, type Address } from '@stake-ledger/protocol';
import { correctAuthorizations } from './authorization';
import { seizeLegacyA, seizeLegacyB } from './legacy';
import type { LedgerContext } from './state';
import { requireOperator } from './views';

/** Returns the native-equivalent amount seized as the discrepancy penalty. */
export const notifyLegacyADiscrepancy = (ctx: LedgerContext, notifier: Address, operator: Address): bigint => {
  const { state, collaborators } = ctx;
  const record = requireOperator(state, operator);
  if (record.legacyAInNative === 0n) {
    throw new LedgerError('nothing-to-slash');
  }
  const info = collaborators.legacyA.getDelegationInfo(operator);
  const live = collaborators.legacyAOracle.toNative(info.amount).amount;
  const undelegated = info.undelegatedAtMs !== 0;
  if (record.legacyAInNative <= live && !undelegated) {
    throw new LedgerError('no-discrepancy');
  }

  record.legacyAInNative = live;
  seizeLegacyA(
    ctx,
    record,
    state.params.discrepancyPenalty,
    state.params.discrepancyRewardMultiplier,
    notifier,
  );
  const seized = live - record.legacyAInNative;
  ctx.emit({ type: 'TokensSeized', operator, amount: seized, discrepancy: true });
  if (undelegated) {
    record.legacyAInNative = 0n;
  }
  correctAuthorizations(ctx, record);
  return seized;
};

export const notifyLegacyBDiscrepancy = (ctx: LedgerContext, notifier: Address, operator: Address): bigint => {
  const { state, collaborators } = ctx;
  const record = requireOperator(state, operator);
  if (record.legacyBInNative === 0n) {
    throw new LedgerError('nothing-to-slash');
  }
  const live = collaborators.legacyBOracle.toNative(collaborators.legacyB.getAllTokens(record.owner)).amount;
  if (record.legacyBInNative <= live) {
    throw new LedgerError('no-discrepancy');
  }

  record.legacyBInNative = live;
  seizeLegacyB(
    ctx,
    record,
    state.params.discrepancyPenalty,
    state.params.discrepancyRewardMultiplier,
    notifier,
  );
  const seized = live - record.legacyBInNative;
  ctx.emit({ type: 'TokensSeized', operator, amount: seized, discrepancy: true });
  correctAuthorizations(ctx, record);
  return seized;
};
