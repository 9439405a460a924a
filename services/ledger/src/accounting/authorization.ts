import {
  LedgerError,
  minAmount,
  type Address,
  type AppAuthorization,
  type ApplicationCallbacks,
  type OperatorRecord,
} from '@stake-ledger/protocol';
import { logWarn } from '../logging';
import type { LedgerContext } from './state';
import {
  authorizationOf,
  getAvailableToAuthorize,
  isApprovedApplication,
  operatorTotalStake,
  requireOperator,
  requirePositive,
} from './views';

const applicationCallbacks = (ctx: LedgerContext, application: Address): ApplicationCallbacks => {
  const callbacks = ctx.collaborators.applications.resolve(application);
  if (!callbacks) {
    throw new LedgerError('application-unreachable', application);
  }
  return callbacks;
};

const requireAuthorizer = (record: OperatorRecord, caller: Address): void => {
  if (caller !== record.authorizer) {
    throw new LedgerError('not-authorizer', caller);
  }
};

const requireApproved = (ctx: LedgerContext, application: Address): void => {
  if (!isApprovedApplication(ctx.state, application)) {
    throw new LedgerError('application-not-approved', application);
  }
};

/** Swap-with-last removal; the order of the remaining applications is not kept. */
export const removeAuthorizedApplication = (record: OperatorRecord, application: Address): void => {
  const list = record.authorizedApplications;
  const index = list.indexOf(application);
  if (index < 0) {
    return;
  }
  list[index] = list[list.length - 1];
  list.pop();
};

export const increaseAuthorization = (
  ctx: LedgerContext,
  caller: Address,
  operator: Address,
  application: Address,
  amount: bigint,
): void => {
  const { state } = ctx;
  const record = requireOperator(state, operator);
  requireAuthorizer(record, caller);
  requireApproved(ctx, application);
  requirePositive(amount);

  const fromAmount = authorizationOf(record, application).authorized;
  if (fromAmount === 0n) {
    const ceiling = state.params.authorizationCeiling;
    if (ceiling !== 0 && record.authorizedApplications.length >= ceiling) {
      throw new LedgerError('too-many-applications', `ceiling ${ceiling}`);
    }
  }
  if (getAvailableToAuthorize(state, record, application) < amount) {
    throw new LedgerError('not-enough-stake-to-authorize');
  }

  let authorization = record.authorizations.get(application);
  if (!authorization) {
    authorization = { authorized: 0n, deauthorizing: 0n };
    record.authorizations.set(application, authorization);
  }
  if (fromAmount === 0n) {
    record.authorizedApplications.push(application);
  }
  authorization.authorized += amount;
  ctx.emit({
    type: 'AuthorizationIncreased',
    operator,
    application,
    fromAmount,
    toAmount: authorization.authorized,
  });
  applicationCallbacks(ctx, application).authorizationIncreased(operator, amount);
};

export const requestAuthorizationDecrease = (
  ctx: LedgerContext,
  caller: Address,
  operator: Address,
  application: Address,
  amount: bigint,
): void => {
  const record = requireOperator(ctx.state, operator);
  requireAuthorizer(record, caller);
  requireApproved(ctx, application);
  requirePositive(amount);

  const authorization = record.authorizations.get(application);
  if (!authorization || amount > authorization.authorized) {
    throw new LedgerError('amount-exceeds-authorized');
  }
  authorization.deauthorizing = amount;
  ctx.emit({
    type: 'AuthorizationDecreaseRequested',
    operator,
    application,
    fromAmount: authorization.authorized,
    toAmount: authorization.authorized - amount,
  });
  applicationCallbacks(ctx, application).authorizationDecreaseRequested(operator, amount);
};

export const requestAuthorizationDecreaseAll = (
  ctx: LedgerContext,
  caller: Address,
  operator: Address,
  application: Address,
): bigint => {
  const record = requireOperator(ctx.state, operator);
  const authorized = authorizationOf(record, application).authorized;
  if (authorized === 0n) {
    throw new LedgerError('nothing-authorized', application);
  }
  requestAuthorizationDecrease(ctx, caller, operator, application, authorized);
  return authorized;
};

/** Requests a full decrease from every approved application the operator is authorized for. */
export const requestAuthorizationDecreaseEverywhere = (
  ctx: LedgerContext,
  caller: Address,
  operator: Address,
): bigint => {
  const record = requireOperator(ctx.state, operator);
  requireAuthorizer(record, caller);
  let deauthorizing = 0n;
  for (const application of [...record.authorizedApplications]) {
    const authorized = authorizationOf(record, application).authorized;
    if (authorized === 0n || !isApprovedApplication(ctx.state, application)) {
      continue;
    }
    requestAuthorizationDecrease(ctx, caller, operator, application, authorized);
    deauthorizing += authorized;
  }
  if (deauthorizing === 0n) {
    throw new LedgerError('nothing-authorized', operator);
  }
  return deauthorizing;
};

/** Called by the application itself; returns the authorization left after the decrease. */
export const approveAuthorizationDecrease = (
  ctx: LedgerContext,
  application: Address,
  operator: Address,
): bigint => {
  const record = requireOperator(ctx.state, operator);
  requireApproved(ctx, application);
  const authorization = record.authorizations.get(application);
  if (!authorization || authorization.deauthorizing === 0n) {
    throw new LedgerError('no-pending-decrease');
  }
  const fromAmount = authorization.authorized;
  authorization.authorized -= authorization.deauthorizing;
  authorization.deauthorizing = 0n;
  ctx.emit({
    type: 'AuthorizationDecreaseApproved',
    operator,
    application,
    fromAmount,
    toAmount: authorization.authorized,
  });
  if (authorization.authorized === 0n) {
    removeAuthorizedApplication(record, application);
  }
  return authorization.authorized;
};

export const forceDecreaseAuthorization = (
  ctx: LedgerContext,
  operator: Address,
  application: Address,
): void => {
  const record = requireOperator(ctx.state, operator);
  if (ctx.state.applications.get(application)?.status !== 'disabled') {
    throw new LedgerError('application-not-disabled', application);
  }
  const authorization = record.authorizations.get(application);
  if (!authorization || authorization.authorized === 0n) {
    throw new LedgerError('application-not-authorized', application);
  }
  const fromAmount = authorization.authorized;
  authorization.authorized = 0n;
  authorization.deauthorizing = 0n;
  ctx.emit({ type: 'AuthorizationDecreaseApproved', operator, application, fromAmount, toAmount: 0n });
  removeAuthorizedApplication(record, application);
};

const notifyInvoluntaryDecrease = (
  ctx: LedgerContext,
  operator: Address,
  application: Address,
  amount: bigint,
): boolean => {
  if (!ctx.settings.tolerateInvoluntaryDecreaseFailures) {
    applicationCallbacks(ctx, application).involuntaryAuthorizationDecrease(operator, amount);
    return true;
  }
  try {
    applicationCallbacks(ctx, application).involuntaryAuthorizationDecrease(operator, amount);
    return true;
  } catch (error) {
    logWarn('[ledger] involuntary decrease notification failed', { operator, application, error });
    return false;
  }
};

/**
 * Clamps every authorization of the operator to its remaining total stake and
 * tells approved applications about the involuntary decrease. The ledger is
 * updated before any application is called.
 */
export const correctAuthorizations = (ctx: LedgerContext, record: OperatorRecord): void => {
  const operator = record.operator;
  const total = operatorTotalStake(record);
  const decreases: Array<{ application: Address; fromAmount: bigint }> = [];
  for (const application of [...record.authorizedApplications]) {
    const authorization: AppAuthorization | undefined = record.authorizations.get(application);
    if (!authorization || authorization.authorized <= total) {
      continue;
    }
    decreases.push({ application, fromAmount: authorization.authorized });
    authorization.deauthorizing = minAmount(authorization.deauthorizing, total);
    authorization.authorized = total;
    if (total === 0n) {
      removeAuthorizedApplication(record, application);
    }
  }

  for (const { application, fromAmount } of decreases) {
    let successfulCall = true;
    if (isApprovedApplication(ctx.state, application)) {
      successfulCall = notifyInvoluntaryDecrease(ctx, operator, application, fromAmount - total);
    }
    ctx.emit({
      type: 'AuthorizationInvoluntaryDecreased',
      operator,
      application,
      fromAmount,
      toAmount: total,
      successfulCall,
    });
  }
};
