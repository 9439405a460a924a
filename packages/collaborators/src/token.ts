import type { Address, Checkpointable, Rollback, TokenCollaborator } from '@stake-ledger/protocol';

export type BoundToken = TokenCollaborator & Checkpointable;

const allowanceKey = (owner: Address, spender: Address): string => `${owner}:${spender}`;

export class InMemoryToken implements Checkpointable {
  private balances = new Map<Address, bigint>();
  private allowances = new Map<string, bigint>();

  mint(to: Address, amount: bigint): void {
    this.balances.set(to, this.balanceOf(to) + amount);
  }

  balanceOf(holder: Address): bigint {
    return this.balances.get(holder) ?? 0n;
  }

  approve(owner: Address, spender: Address, amount: bigint): void {
    this.allowances.set(allowanceKey(owner, spender), amount);
  }

  allowance(owner: Address, spender: Address): bigint {
    return this.allowances.get(allowanceKey(owner, spender)) ?? 0n;
  }

  transferAs(sender: Address, recipient: Address, amount: bigint): void {
    if (amount < 0n) {
      throw new Error('negative-transfer');
    }
    const balance = this.balanceOf(sender);
    if (balance < amount) {
      throw new Error('insufficient-balance');
    }
    this.balances.set(sender, balance - amount);
    this.balances.set(recipient, this.balanceOf(recipient) + amount);
  }

  transferFromAs(spender: Address, payer: Address, recipient: Address, amount: bigint): void {
    const allowed = this.allowance(payer, spender);
    if (allowed < amount) {
      throw new Error('insufficient-allowance');
    }
    this.transferAs(payer, recipient, amount);
    this.allowances.set(allowanceKey(payer, spender), allowed - amount);
  }

  /** View of the token that acts with `sender` as the calling identity. */
  as(sender: Address): BoundToken {
    return {
      transfer: (recipient, amount) => this.transferAs(sender, recipient, amount),
      transferFrom: (payer, recipient, amount) => this.transferFromAs(sender, payer, recipient, amount),
      checkpoint: () => this.checkpoint(),
    };
  }

  checkpoint(): Rollback {
    const balances = new Map(this.balances);
    const allowances = new Map(this.allowances);
    return () => {
      this.balances = balances;
      this.allowances = allowances;
    };
  }
}
