import {
  isCheckpointable,
  type Address,
  type AppAuthorization,
  type ApplicationRecord,
  type Checkpointable,
  type LedgerCollaborators,
  type LedgerParams,
  type OperatorRoles,
  type RecordedLedgerEvent,
  type StakeBalances,
  type StakeSource,
} from '@stake-ledger/protocol';
import * as authorization from './accounting/authorization';
import * as discrepancy from './accounting/discrepancy';
import * as governance from './accounting/governance';
import * as operators from './accounting/operators';
import * as slashing from './accounting/slashing';
import { createLedgerState, type LedgerContext, type LedgerState } from './accounting/state';
import { createLedgerUnits, type LedgerEventListener, type LedgerUnits } from './accounting/units';
import * as views from './accounting/views';
import { paramsFromConfig, type LedgerConfig } from './config';
import { logInfo } from './logging';
import { ledgerEvents, slashingQueueLength, slashingQueuePending } from './observability';

export type OperatorView = OperatorRoles & {
  operator: Address;
  origin: StakeSource;
  startStakingMs: number;
  stake: StakeBalances;
  authorizations: Array<AppAuthorization & { application: Address }>;
};

export type LedgerService = {
  config: LedgerConfig;
  state: LedgerState;
  subscribe(listener: LedgerEventListener): () => void;
  lastEventSeq(): number;

  createFromNative(caller: Address, params: operators.CreateStakeParams & { amount: bigint }): void;
  createFromLegacyA(operator: Address): void;
  createFromLegacyB(caller: Address, params: operators.CreateStakeParams): void;
  topUpNative(caller: Address, operator: Address, amount: bigint): void;
  topUpLegacyA(caller: Address, operator: Address): bigint;
  topUpLegacyB(caller: Address, operator: Address): bigint;
  unstakeNative(caller: Address, operator: Address, amount: bigint): void;
  unstakeLegacyA(caller: Address, operator: Address): bigint;
  unstakeLegacyB(caller: Address, operator: Address, amount: bigint): bigint;
  unstakeAll(caller: Address, operator: Address): void;

  increaseAuthorization(caller: Address, operator: Address, application: Address, amount: bigint): void;
  requestAuthorizationDecrease(caller: Address, operator: Address, application: Address, amount: bigint): void;
  requestAuthorizationDecreaseAll(caller: Address, operator: Address, application: Address): bigint;
  requestAuthorizationDecreaseEverywhere(caller: Address, operator: Address): bigint;
  approveAuthorizationDecrease(application: Address, operator: Address): bigint;
  forceDecreaseAuthorization(operator: Address, application: Address): void;

  slash(application: Address, amount: bigint, operators: Address[]): number;
  seize(
    application: Address,
    amount: bigint,
    rewardMultiplier: number,
    notifier: Address | undefined,
    operators: Address[],
  ): number;
  processSlashing(processor: Address, count: number): slashing.SlashingBatch;

  notifyLegacyADiscrepancy(notifier: Address, operator: Address): bigint;
  notifyLegacyBDiscrepancy(notifier: Address, operator: Address): bigint;

  setMinimumStakeAmount(caller: Address, amount: bigint): void;
  approveApplication(caller: Address, application: Address): void;
  disableApplication(caller: Address, application: Address): void;
  disableApplicationByPanicButton(caller: Address, application: Address): void;
  setPanicButton(caller: Address, application: Address, panicButton: Address): void;
  setAuthorizationCeiling(caller: Address, ceiling: number): void;
  setStakeDiscrepancyPenalty(caller: Address, penalty: bigint, rewardMultiplier: number): void;
  setNotificationReward(caller: Address, reward: bigint): void;
  pushNotificationReward(caller: Address, reward: bigint): void;
  withdrawNotificationReward(caller: Address, recipient: Address, amount: bigint): void;
  transferGovernance(caller: Address, newGovernance: Address): void;

  getStake(operator: Address): StakeBalances;
  rolesOf(operator: Address): OperatorRoles;
  getStartStakingTimestamp(operator: Address): number;
  authorizedStake(operator: Address, application: Address): bigint;
  pendingAuthorizationDecrease(operator: Address, application: Address): bigint;
  getAvailableToAuthorize(operator: Address, application: Address): bigint;
  getMinStaked(operator: Address, source: StakeSource): bigint;
  getAuthorizedApplications(operator: Address): Address[];
  describeOperator(operator: Address): OperatorView | undefined;
  getApplication(application: Address): ApplicationRecord | undefined;
  getApplicationsLength(): number;
  getSlashingQueueLength(): number;
  getSlashingQueueIndex(): number;
  getNotifiersTreasury(): bigint;
  getParams(): LedgerParams;
};

export type LedgerServiceOptions = {
  now?: () => number;
  state?: LedgerState;
  initialEventSeq?: number;
};

const LOGGED_EVENTS = new Set<RecordedLedgerEvent['type']>([
  'SlashingProcessed',
  'TokensSeized',
  'ApplicationStatusChanged',
  'GovernanceTransferred',
]);

const recordEventMetrics = (state: LedgerState) => (events: RecordedLedgerEvent[]) => {
  for (const event of events) {
    ledgerEvents.inc({ type: event.type });
    if (LOGGED_EVENTS.has(event.type)) {
      logInfo(`[ledger] ${event.type}`, event);
    }
  }
  slashingQueueLength.set(state.slashingQueue.length);
  slashingQueuePending.set(state.slashingQueue.length - state.slashingQueueIndex);
};

export const describeOperator = (state: LedgerState, operator: Address): OperatorView | undefined => {
  const record = state.operators.get(operator);
  if (!record) {
    return undefined;
  }
  return {
    operator: record.operator,
    owner: record.owner,
    beneficiary: record.beneficiary,
    authorizer: record.authorizer,
    origin: record.origin,
    startStakingMs: record.startStakingMs,
    stake: views.stakeBalances(record),
    authorizations: record.authorizedApplications.map((application) => ({
      application,
      ...views.authorizationOf(record, application),
    })),
  };
};

export const createLedgerService = (
  config: LedgerConfig,
  collaborators: LedgerCollaborators,
  options: LedgerServiceOptions = {},
): LedgerService => {
  const state = options.state ?? createLedgerState(paramsFromConfig(config));
  const now = options.now ?? Date.now;
  const participants: Checkpointable[] = Object.values<unknown>(collaborators).filter(isCheckpointable);
  const units: LedgerUnits = createLedgerUnits(state, participants, now, options.initialEventSeq);
  const ctx: LedgerContext = {
    state,
    collaborators,
    settings: {
      ledgerAddress: config.ledgerAddress,
      minStakeTimeMs: config.minStakeTimeMs,
      processorRewardPercent: config.processorRewardPercent,
      legacySeizeRewardPercent: config.legacySeizeRewardPercent,
      tolerateInvoluntaryDecreaseFailures: config.tolerateInvoluntaryDecreaseFailures,
    },
    now,
    emit: (event) => units.emit(event),
  };
  units.subscribe(recordEventMetrics(state));

  const operator = (address: Address) => views.requireOperator(state, address);

  return {
    config,
    state,
    subscribe: (listener) => units.subscribe(listener),
    lastEventSeq: () => units.lastSeq(),

    createFromNative: (caller, params) =>
      units.run('createFromNative', () => operators.createFromNative(ctx, caller, params)),
    createFromLegacyA: (address) =>
      units.run('createFromLegacyA', () => operators.createFromLegacyA(ctx, address)),
    createFromLegacyB: (caller, params) =>
      units.run('createFromLegacyB', () => operators.createFromLegacyB(ctx, caller, params)),
    topUpNative: (caller, address, amount) =>
      units.run('topUpNative', () => operators.topUpNative(ctx, caller, address, amount)),
    topUpLegacyA: (caller, address) =>
      units.run('topUpLegacyA', () => operators.topUpLegacyA(ctx, caller, address)),
    topUpLegacyB: (caller, address) =>
      units.run('topUpLegacyB', () => operators.topUpLegacyB(ctx, caller, address)),
    unstakeNative: (caller, address, amount) =>
      units.run('unstakeNative', () => operators.unstakeNative(ctx, caller, address, amount)),
    unstakeLegacyA: (caller, address) =>
      units.run('unstakeLegacyA', () => operators.unstakeLegacyA(ctx, caller, address)),
    unstakeLegacyB: (caller, address, amount) =>
      units.run('unstakeLegacyB', () => operators.unstakeLegacyB(ctx, caller, address, amount)),
    unstakeAll: (caller, address) => units.run('unstakeAll', () => operators.unstakeAll(ctx, caller, address)),

    increaseAuthorization: (caller, address, application, amount) =>
      units.run('increaseAuthorization', () =>
        authorization.increaseAuthorization(ctx, caller, address, application, amount),
      ),
    requestAuthorizationDecrease: (caller, address, application, amount) =>
      units.run('requestAuthorizationDecrease', () =>
        authorization.requestAuthorizationDecrease(ctx, caller, address, application, amount),
      ),
    requestAuthorizationDecreaseAll: (caller, address, application) =>
      units.run('requestAuthorizationDecreaseAll', () =>
        authorization.requestAuthorizationDecreaseAll(ctx, caller, address, application),
      ),
    requestAuthorizationDecreaseEverywhere: (caller, address) =>
      units.run('requestAuthorizationDecreaseEverywhere', () =>
        authorization.requestAuthorizationDecreaseEverywhere(ctx, caller, address),
      ),
    approveAuthorizationDecrease: (application, address) =>
      units.run('approveAuthorizationDecrease', () =>
        authorization.approveAuthorizationDecrease(ctx, application, address),
      ),
    forceDecreaseAuthorization: (address, application) =>
      units.run('forceDecreaseAuthorization', () =>
        authorization.forceDecreaseAuthorization(ctx, address, application),
      ),

    slash: (application, amount, targets) =>
      units.run('slash', () => slashing.slash(ctx, application, amount, targets)),
    seize: (application, amount, rewardMultiplier, notifier, targets) =>
      units.run('seize', () => slashing.seize(ctx, application, amount, rewardMultiplier, notifier, targets)),
    processSlashing: (processor, count) =>
      units.run('processSlashing', () => slashing.processSlashing(ctx, processor, count)),

    notifyLegacyADiscrepancy: (notifier, address) =>
      units.run('notifyLegacyADiscrepancy', () => discrepancy.notifyLegacyADiscrepancy(ctx, notifier, address)),
    notifyLegacyBDiscrepancy: (notifier, address) =>
      units.run('notifyLegacyBDiscrepancy', () => discrepancy.notifyLegacyBDiscrepancy(ctx, notifier, address)),

    setMinimumStakeAmount: (caller, amount) =>
      units.run('setMinimumStakeAmount', () => governance.setMinimumStakeAmount(ctx, caller, amount)),
    approveApplication: (caller, application) =>
      units.run('approveApplication', () => governance.approveApplication(ctx, caller, application)),
    disableApplication: (caller, application) =>
      units.run('disableApplication', () => governance.disableApplication(ctx, caller, application)),
    disableApplicationByPanicButton: (caller, application) =>
      units.run('disableApplicationByPanicButton', () =>
        governance.disableApplicationByPanicButton(ctx, caller, application),
      ),
    setPanicButton: (caller, application, panicButton) =>
      units.run('setPanicButton', () => governance.setPanicButton(ctx, caller, application, panicButton)),
    setAuthorizationCeiling: (caller, ceiling) =>
      units.run('setAuthorizationCeiling', () => governance.setAuthorizationCeiling(ctx, caller, ceiling)),
    setStakeDiscrepancyPenalty: (caller, penalty, rewardMultiplier) =>
      units.run('setStakeDiscrepancyPenalty', () =>
        governance.setStakeDiscrepancyPenalty(ctx, caller, penalty, rewardMultiplier),
      ),
    setNotificationReward: (caller, reward) =>
      units.run('setNotificationReward', () => governance.setNotificationReward(ctx, caller, reward)),
    pushNotificationReward: (caller, reward) =>
      units.run('pushNotificationReward', () => governance.pushNotificationReward(ctx, caller, reward)),
    withdrawNotificationReward: (caller, recipient, amount) =>
      units.run('withdrawNotificationReward', () =>
        governance.withdrawNotificationReward(ctx, caller, recipient, amount),
      ),
    transferGovernance: (caller, newGovernance) =>
      units.run('transferGovernance', () => governance.transferGovernance(ctx, caller, newGovernance)),

    getStake: (address) => views.stakeBalances(operator(address)),
    rolesOf: (address) => {
      const record = operator(address);
      return { owner: record.owner, beneficiary: record.beneficiary, authorizer: record.authorizer };
    },
    getStartStakingTimestamp: (address) => operator(address).startStakingMs,
    authorizedStake: (address, application) => views.authorizationOf(operator(address), application).authorized,
    pendingAuthorizationDecrease: (address, application) =>
      views.authorizationOf(operator(address), application).deauthorizing,
    getAvailableToAuthorize: (address, application) =>
      views.getAvailableToAuthorize(state, operator(address), application),
    getMinStaked: (address, source) => views.getMinStaked(operator(address), source),
    getAuthorizedApplications: (address) => [...operator(address).authorizedApplications],
    describeOperator: (address) => describeOperator(state, address),
    getApplication: (application) => {
      const record = state.applications.get(application);
      return record ? { ...record } : undefined;
    },
    getApplicationsLength: () => state.applications.size,
    getSlashingQueueLength: () => state.slashingQueue.length,
    getSlashingQueueIndex: () => state.slashingQueueIndex,
    getNotifiersTreasury: () => state.notifiersTreasury,
    getParams: () => ({ ...state.params }),
  };
};
