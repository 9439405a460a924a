export type Address = string;

export type StakeSource = 'native' | 'legacyA' | 'legacyB';

export type AppAuthorization = {
  authorized: bigint;
  deauthorizing: bigint;
};

export type OperatorRoles = {
  owner: Address;
  beneficiary: Address;
  authorizer: Address;
};

export type OperatorRecord = OperatorRoles & {
  operator: Address;
  origin: StakeSource;
  nativeStake: bigint;
  legacyAInNative: bigint;
  legacyBInNative: bigint;
  startStakingMs: number;
  authorizations: Map<Address, AppAuthorization>;
  /** Applications with a non-zero authorization; order is not preserved on removal. */
  authorizedApplications: Address[];
};

export type StakeBalances = {
  native: bigint;
  legacyA: bigint;
  legacyB: bigint;
};

export type ApplicationStatus = 'approved' | 'disabled';

export type ApplicationRecord = {
  application: Address;
  status: ApplicationStatus;
  panicButton?: Address;
};

export type SlashingEvent = {
  operator: Address;
  amount: bigint;
};

export type LedgerParams = {
  governance: Address;
  minimumStake: bigint;
  authorizationCeiling: number;
  discrepancyPenalty: bigint;
  discrepancyRewardMultiplier: number;
  notificationReward: bigint;
};

export type LedgerEvent =
  | {
      type: 'Staked';
      operator: Address;
      source: StakeSource;
      owner: Address;
      beneficiary: Address;
      authorizer: Address;
      amount: bigint;
    }
  | { type: 'ToppedUp'; operator: Address; source: StakeSource; amount: bigint }
  | { type: 'Unstaked'; operator: Address; source: StakeSource; amount: bigint }
  | {
      type: 'AuthorizationIncreased';
      operator: Address;
      application: Address;
      fromAmount: bigint;
      toAmount: bigint;
    }
  | {
      type: 'AuthorizationDecreaseRequested';
      operator: Address;
      application: Address;
      fromAmount: bigint;
      toAmount: bigint;
    }
  | {
      type: 'AuthorizationDecreaseApproved';
      operator: Address;
      application: Address;
      fromAmount: bigint;
      toAmount: bigint;
    }
  | {
      type: 'AuthorizationInvoluntaryDecreased';
      operator: Address;
      application: Address;
      fromAmount: bigint;
      toAmount: bigint;
      successfulCall: boolean;
    }
  | { type: 'SlashingQueued'; operator: Address; application: Address; amount: bigint; queueIndex: number }
  | { type: 'NotifierRewarded'; notifier: Address; amount: bigint }
  | { type: 'TokensSeized'; operator: Address; amount: bigint; discrepancy: boolean }
  | { type: 'SlashingProcessed'; processor: Address; count: number; nativeBurned: bigint; processorReward: bigint }
  | { type: 'ApplicationStatusChanged'; application: Address; status: ApplicationStatus }
  | { type: 'PanicButtonSet'; application: Address; panicButton: Address }
  | { type: 'MinimumStakeAmountSet'; amount: bigint }
  | { type: 'AuthorizationCeilingSet'; ceiling: number }
  | { type: 'StakeDiscrepancyPenaltySet'; penalty: bigint; rewardMultiplier: number }
  | { type: 'NotificationRewardSet'; reward: bigint }
  | { type: 'NotificationRewardPushed'; reward: bigint }
  | { type: 'NotificationRewardWithdrawn'; recipient: Address; amount: bigint }
  | { type: 'GovernanceTransferred'; oldGovernance: Address; newGovernance: Address };

export type LedgerEventType = LedgerEvent['type'];

/** Ledger event as recorded after commit. */
export type RecordedLedgerEvent = LedgerEvent & {
  seq: number;
  recordedAtMs: number;
};
