import type { Address, Checkpointable, LegacyMirrorB, Rollback } from '@stake-ledger/protocol';

/** Owner-keyed legacy staking system whose stake is merged into the ledger. */
export class InMemoryLegacyMirrorB implements LegacyMirrorB, Checkpointable {
  private stakes = new Map<Address, bigint>();
  private merged = new Set<Address>();
  private rewards = new Map<Address, bigint>();

  deposit(owner: Address, amount: bigint): void {
    this.stakes.set(owner, this.getAllTokens(owner) + amount);
  }

  setAmount(owner: Address, amount: bigint): void {
    this.stakes.set(owner, amount);
  }

  isMerged(owner: Address): boolean {
    return this.merged.has(owner);
  }

  rewardOf(notifier: Address): bigint {
    return this.rewards.get(notifier) ?? 0n;
  }

  requestMerge(owner: Address): bigint {
    this.merged.add(owner);
    return this.getAllTokens(owner);
  }

  getAllTokens(owner: Address): bigint {
    return this.stakes.get(owner) ?? 0n;
  }

  slashStaker(owner: Address, amount: bigint, notifier: Address, reward: bigint): void {
    const stake = this.getAllTokens(owner);
    if (stake < amount) {
      throw new Error(`slash exceeds legacy stake of ${owner}`);
    }
    this.stakes.set(owner, stake - amount);
    this.rewards.set(notifier, this.rewardOf(notifier) + reward);
  }

  checkpoint(): Rollback {
    const stakes = new Map(this.stakes);
    const merged = new Set(this.merged);
    const rewards = new Map(this.rewards);
    return () => {
      this.stakes = stakes;
      this.merged = merged;
      this.rewards = rewards;
    };
  }
}
