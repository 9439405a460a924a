import type {
  Address,
  Checkpointable,
  DelegationInfo,
  LegacyMirrorA,
  Rollback,
} from '@stake-ledger/protocol';

export const LEGACY_SEIZE_REWARD_PERCENT = 5n;

export type LegacyDelegation = {
  owner: Address;
  beneficiary: Address;
  authorizer: Address;
  amount: bigint;
  createdAtMs: number;
  undelegatedAtMs: number;
  authorizedContracts: Address[];
};

export type DelegateOptions = {
  owner: Address;
  beneficiary?: Address;
  authorizer?: Address;
  amount: bigint;
  createdAtMs?: number;
};

/** Delegation-based legacy staking system keyed by operator. */
export class InMemoryLegacyMirrorA implements LegacyMirrorA, Checkpointable {
  private delegations = new Map<Address, LegacyDelegation>();
  private rewards = new Map<Address, bigint>();

  delegate(operator: Address, options: DelegateOptions): void {
    this.delegations.set(operator, {
      owner: options.owner,
      beneficiary: options.beneficiary ?? options.owner,
      authorizer: options.authorizer ?? options.owner,
      amount: options.amount,
      createdAtMs: options.createdAtMs ?? 1,
      undelegatedAtMs: 0,
      authorizedContracts: [],
    });
  }

  authorizeContract(operator: Address, contract: Address): void {
    const delegation = this.require(operator);
    if (!delegation.authorizedContracts.includes(contract)) {
      delegation.authorizedContracts.push(contract);
    }
  }

  undelegate(operator: Address, atMs: number): void {
    this.require(operator).undelegatedAtMs = atMs;
  }

  setAmount(operator: Address, amount: bigint): void {
    this.require(operator).amount = amount;
  }

  rewardOf(notifier: Address): bigint {
    return this.rewards.get(notifier) ?? 0n;
  }

  getDelegationInfo(operator: Address): DelegationInfo {
    const delegation = this.delegations.get(operator);
    if (!delegation) {
      return { amount: 0n, createdAtMs: 0, undelegatedAtMs: 0 };
    }
    return {
      amount: delegation.amount,
      createdAtMs: delegation.createdAtMs,
      undelegatedAtMs: delegation.undelegatedAtMs,
    };
  }

  isAuthorizedForOperator(operator: Address, contract: Address): boolean {
    return this.delegations.get(operator)?.authorizedContracts.includes(contract) ?? false;
  }

  ownerOf(operator: Address): Address {
    return this.require(operator).owner;
  }

  beneficiaryOf(operator: Address): Address {
    return this.require(operator).beneficiary;
  }

  authorizerOf(operator: Address): Address {
    return this.require(operator).authorizer;
  }

  seize(amount: bigint, rewardMultiplier: number, notifier: Address, operators: Address[]): void {
    let seized = 0n;
    for (const operator of operators) {
      const delegation = this.require(operator);
      if (delegation.amount < amount) {
        throw new Error(`seize exceeds delegation of ${operator}`);
      }
      delegation.amount -= amount;
      seized += amount;
    }
    const reward = (seized * LEGACY_SEIZE_REWARD_PERCENT * BigInt(rewardMultiplier)) / 10_000n;
    this.rewards.set(notifier, this.rewardOf(notifier) + reward);
  }

  checkpoint(): Rollback {
    const delegations = structuredClone(this.delegations);
    const rewards = new Map(this.rewards);
    return () => {
      this.delegations = delegations;
      this.rewards = rewards;
    };
  }

  private require(operator: Address): LegacyDelegation {
    const delegation = this.delegations.get(operator);
    if (!delegation) {
      throw new Error(`no legacy delegation for ${operator}`);
    }
    return delegation;
  }
}
