import {
  isCheckpointable,
  type Address,
  type ApplicationCallbacks,
  type ApplicationRegistry,
  type Checkpointable,
  type Rollback,
} from '@stake-ledger/protocol';

export type ApplicationMethod = keyof ApplicationCallbacks;

export type ApplicationCall = {
  method: ApplicationMethod;
  operator: Address;
  amount: bigint;
};

/** Consumer application that records every notification it receives. */
export class RecordingApplication implements ApplicationCallbacks, Checkpointable {
  public calls: ApplicationCall[] = [];
  public rejecting = new Set<ApplicationMethod>();
  public onCall?: (call: ApplicationCall) => void;

  authorizationIncreased(operator: Address, amount: bigint): void {
    this.record({ method: 'authorizationIncreased', operator, amount });
  }

  authorizationDecreaseRequested(operator: Address, amount: bigint): void {
    this.record({ method: 'authorizationDecreaseRequested', operator, amount });
  }

  involuntaryAuthorizationDecrease(operator: Address, amount: bigint): void {
    this.record({ method: 'involuntaryAuthorizationDecrease', operator, amount });
  }

  callsOf(method: ApplicationMethod): ApplicationCall[] {
    return this.calls.filter((call) => call.method === method);
  }

  checkpoint(): Rollback {
    const length = this.calls.length;
    return () => {
      this.calls.length = length;
    };
  }

  private record(call: ApplicationCall): void {
    if (this.rejecting.has(call.method)) {
      throw new Error(`${call.method} rejected`);
    }
    this.calls.push(call);
    this.onCall?.(call);
  }
}

export class InMemoryApplicationRegistry implements ApplicationRegistry, Checkpointable {
  private applications = new Map<Address, ApplicationCallbacks>();

  register(application: Address, callbacks: ApplicationCallbacks): void {
    this.applications.set(application, callbacks);
  }

  resolve(application: Address): ApplicationCallbacks | undefined {
    return this.applications.get(application);
  }

  checkpoint(): Rollback {
    const rollbacks: Rollback[] = [];
    for (const callbacks of this.applications.values()) {
      if (isCheckpointable(callbacks)) {
        rollbacks.push(callbacks.checkpoint());
      }
    }
    return () => {
      for (const rollback of rollbacks) {
        rollback();
      }
    };
  }
}
