import type { Address } from './types';

/** Restores a collaborator to the state captured by {@link Checkpointable.checkpoint}. */
export type Rollback = () => void;

/**
 * Collaborators that hold state of their own implement this so that a failed
 * ledger operation leaves them untouched as well.
 */
export interface Checkpointable {
  checkpoint(): Rollback;
}

export type Conversion = {
  amount: bigint;
  remainder: bigint;
};

export interface TokenCollaborator {
  transferFrom(payer: Address, recipient: Address, amount: bigint): void;
  transfer(recipient: Address, amount: bigint): void;
}

export type DelegationInfo = {
  amount: bigint;
  createdAtMs: number;
  undelegatedAtMs: number;
};

export interface LegacyMirrorA {
  getDelegationInfo(operator: Address): DelegationInfo;
  isAuthorizedForOperator(operator: Address, contract: Address): boolean;
  ownerOf(operator: Address): Address;
  beneficiaryOf(operator: Address): Address;
  authorizerOf(operator: Address): Address;
  seize(amount: bigint, rewardMultiplier: number, notifier: Address, operators: Address[]): void;
}

export interface LegacyMirrorB {
  requestMerge(owner: Address): bigint;
  getAllTokens(owner: Address): bigint;
  slashStaker(owner: Address, amount: bigint, notifier: Address, reward: bigint): void;
}

export interface ConversionOracle {
  /** Legacy amount to native; `remainder` is the unconverted legacy dust. */
  toNative(legacyAmount: bigint): Conversion;
  /** Native amount to legacy; `remainder` is the unconverted native dust. */
  fromNative(nativeAmount: bigint): Conversion;
}

export interface ApplicationCallbacks {
  authorizationIncreased(operator: Address, amount: bigint): void;
  authorizationDecreaseRequested(operator: Address, amount: bigint): void;
  involuntaryAuthorizationDecrease(operator: Address, amount: bigint): void;
}

export interface ApplicationRegistry {
  resolve(application: Address): ApplicationCallbacks | undefined;
}

export type LedgerCollaborators = {
  token: TokenCollaborator;
  legacyA: LegacyMirrorA;
  legacyB: LegacyMirrorB;
  legacyAOracle: ConversionOracle;
  legacyBOracle: ConversionOracle;
  applications: ApplicationRegistry;
};

export const isCheckpointable = (value: unknown): value is Checkpointable => {
  if (!value || typeof value !== 'object') {
    return false;
  }
  return 'checkpoint' in value && typeof value.checkpoint === 'function';
};
