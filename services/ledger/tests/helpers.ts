import {
  createInMemoryCollaborators,
  RecordingApplication,
  type InMemoryCollaboratorOptions,
} from '@stake-ledger/collaborators';
import {
  isLedgerError,
  type Address,
  type LedgerErrorCode,
  type LedgerEventType,
  type RecordedLedgerEvent,
} from '@stake-ledger/protocol';
import { defaultLedgerConfig, type LedgerConfig } from '../src/config';
import { createLedgerService } from '../src/server';

export const GOVERNANCE = 'governance';
export const APP = 'app-1';
export const START_MS = 1_000;

export const ledgerCode =
  (code: LedgerErrorCode) =>
  (error: unknown): boolean =>
    isLedgerError(error) && error.code === code;

export const createTestLedger = (
  overrides: Partial<LedgerConfig> = {},
  options: InMemoryCollaboratorOptions = {},
) => {
  let nowMs = START_MS;
  const config: LedgerConfig = { ...defaultLedgerConfig, ...overrides };
  const memory = createInMemoryCollaborators(config.ledgerAddress, options);
  const service = createLedgerService(config, memory.collaborators, { now: () => nowMs });
  const events: RecordedLedgerEvent[] = [];
  service.subscribe((batch) => {
    events.push(...batch);
  });

  const registerApp = (application: Address = APP): RecordingApplication => {
    const app = new RecordingApplication();
    memory.applications.register(application, app);
    return app;
  };

  const approveApp = (application: Address = APP): RecordingApplication => {
    const app = registerApp(application);
    service.approveApplication(GOVERNANCE, application);
    return app;
  };

  const fund = (holder: Address, amount: bigint): void => {
    memory.token.mint(holder, amount);
    memory.token.approve(holder, config.ledgerAddress, memory.token.allowance(holder, config.ledgerAddress) + amount);
  };

  const stakeNative = (operator: Address, owner: Address, amount: bigint): void => {
    fund(owner, amount);
    service.createFromNative(owner, { operator, amount });
  };

  const stakeLegacyA = (operator: Address, owner: Address, amount: bigint): void => {
    memory.legacyA.delegate(operator, { owner, amount });
    memory.legacyA.authorizeContract(operator, config.ledgerAddress);
    service.createFromLegacyA(operator);
  };

  const eventsOf = <T extends LedgerEventType>(type: T): Array<Extract<RecordedLedgerEvent, { type: T }>> =>
    events.filter((event): event is Extract<RecordedLedgerEvent, { type: T }> => event.type === type);

  return {
    ...memory,
    config,
    service,
    events,
    registerApp,
    approveApp,
    fund,
    stakeNative,
    stakeLegacyA,
    eventsOf,
    advance: (ms: number) => {
      nowMs += ms;
    },
  };
};

export type TestLedger = ReturnType<typeof createTestLedger>;
