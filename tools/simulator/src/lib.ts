import { createInMemoryCollaborators, RecordingApplication } from '@stake-ledger/collaborators';
import { defaultLedgerConfig, createLedgerService, type LedgerConfig, type LedgerService } from '@stake-ledger/ledger';
import { isLedgerError, totalStake, type Address } from '@stake-ledger/protocol';

export type SimulationConfig = {
  operators: number;
  steps: number;
  seed: number;
};

export type SimulationAction =
  | 'topUp'
  | 'authorize'
  | 'requestDecrease'
  | 'approveDecrease'
  | 'slash'
  | 'process'
  | 'unstake'
  | 'legacyDrop'
  | 'advance';

export type SimulationReport = {
  config: SimulationConfig;
  applied: Record<SimulationAction, number>;
  rejected: Record<string, number>;
  slashingQueued: number;
  slashingProcessed: number;
  notifiersTreasury: string;
  ledgerBalance: string;
  violations: string[];
};

const ACTIONS: SimulationAction[] = [
  'topUp',
  'authorize',
  'authorize',
  'requestDecrease',
  'approveDecrease',
  'slash',
  'process',
  'unstake',
  'legacyDrop',
  'advance',
];

const APPLICATIONS = ['app-1', 'app-2', 'app-3'];
const GOVERNANCE = 'governance';
const HOUR_MS = 60 * 60 * 1000;

export const createRng = (seed: number): (() => number) => {
  let state = seed >>> 0;
  return () => {
    state ^= state << 13;
    state ^= state >>> 17;
    state ^= state << 5;
    return (state >>> 0) / 0xffffffff;
  };
};

const pick = <T>(rng: () => number, values: T[]): T => {
  return values[Math.min(values.length - 1, Math.floor(rng() * values.length))];
};

const randomAmount = (rng: () => number, max = 1000): bigint => BigInt(1 + Math.floor(rng() * max));

const operatorName = (index: number): Address => `op-${index + 1}`;
const ownerName = (index: number): Address => `owner-${index + 1}`;

export const simulationConfig = (): LedgerConfig => ({
  ...defaultLedgerConfig,
  governance: GOVERNANCE,
  authorizationCeiling: 2,
  discrepancyPenalty: 10n,
  discrepancyRewardMultiplier: 50,
  notificationReward: 5n,
});

/** Ledger-wide properties that must hold after every operation, committed or not. */
export const checkInvariants = (
  service: LedgerService,
  operators: Address[],
  ledgerBalance: bigint,
): string[] => {
  const violations: string[] = [];
  let nativeTotal = 0n;
  for (const operator of operators) {
    const view = service.describeOperator(operator);
    if (!view) {
      continue;
    }
    const total = totalStake(view.stake);
    nativeTotal += view.stake.native;
    if (view.stake.native < 0n || view.stake.legacyA < 0n || view.stake.legacyB < 0n) {
      violations.push(`${operator}: negative stake`);
    }
    for (const entry of view.authorizations) {
      if (entry.authorized > total) {
        violations.push(`${operator}: ${entry.application} authorized ${entry.authorized} over stake ${total}`);
      }
      if (entry.deauthorizing > entry.authorized) {
        violations.push(`${operator}: ${entry.application} deauthorizing more than authorized`);
      }
    }
    const ceiling = service.getParams().authorizationCeiling;
    if (ceiling > 0 && view.authorizations.length > ceiling) {
      violations.push(`${operator}: ${view.authorizations.length} applications over ceiling ${ceiling}`);
    }
  }
  if (service.getSlashingQueueIndex() > service.getSlashingQueueLength()) {
    violations.push('slashing queue index past queue length');
  }
  const expectedBalance = nativeTotal + service.getNotifiersTreasury();
  if (ledgerBalance !== expectedBalance) {
    violations.push(`ledger holds ${ledgerBalance}, expected ${expectedBalance}`);
  }
  return violations;
};

/**
 * Runs a seeded random workload against an in-memory ledger. Rejected
 * operations are counted by error code; any other failure propagates.
 */
export const runSimulation = (config: SimulationConfig): SimulationReport => {
  const rng = createRng(config.seed);
  const ledgerConfig = simulationConfig();
  const memory = createInMemoryCollaborators(ledgerConfig.ledgerAddress);
  let nowMs = 1_000;
  const service = createLedgerService(ledgerConfig, memory.collaborators, { now: () => nowMs });

  for (const application of APPLICATIONS) {
    memory.applications.register(application, new RecordingApplication());
    service.approveApplication(GOVERNANCE, application);
  }

  const fund = (holder: Address, amount: bigint): void => {
    memory.token.mint(holder, amount);
    memory.token.approve(holder, ledgerConfig.ledgerAddress, memory.token.allowance(holder, ledgerConfig.ledgerAddress) + amount);
  };

  const operators: Address[] = [];
  const legacyOperators: Address[] = [];
  const owners = new Map<Address, Address>();
  for (let i = 0; i < config.operators; i += 1) {
    const operator = operatorName(i);
    const owner = ownerName(i);
    const amount = randomAmount(rng, 5000) + 100n;
    if (i % 2 === 0) {
      fund(owner, amount);
      service.createFromNative(owner, { operator, amount });
    } else {
      memory.legacyA.delegate(operator, { owner, amount });
      memory.legacyA.authorizeContract(operator, ledgerConfig.ledgerAddress);
      service.createFromLegacyA(operator);
      legacyOperators.push(operator);
    }
    operators.push(operator);
    owners.set(operator, owner);
  }

  const applied: Record<SimulationAction, number> = {
    topUp: 0,
    authorize: 0,
    requestDecrease: 0,
    approveDecrease: 0,
    slash: 0,
    process: 0,
    unstake: 0,
    legacyDrop: 0,
    advance: 0,
  };
  const rejected: Record<string, number> = {};
  const violations: string[] = [];
  let slashingProcessed = 0;

  const perform = (action: SimulationAction): void => {
    const operator = pick(rng, operators);
    const owner = owners.get(operator) ?? operator;
    const application = pick(rng, APPLICATIONS);
    switch (action) {
      case 'topUp': {
        const amount = randomAmount(rng);
        fund(owner, amount);
        service.topUpNative(owner, operator, amount);
        return;
      }
      case 'authorize':
        service.increaseAuthorization(owner, operator, application, randomAmount(rng, 2000));
        return;
      case 'requestDecrease':
        service.requestAuthorizationDecrease(owner, operator, application, randomAmount(rng, 500));
        return;
      case 'approveDecrease':
        service.approveAuthorizationDecrease(application, operator);
        return;
      case 'slash':
        service.slash(application, randomAmount(rng, 300), [operator, pick(rng, operators)]);
        return;
      case 'process':
        slashingProcessed += service.processSlashing('processor', 1 + Math.floor(rng() * 3)).processed;
        return;
      case 'unstake':
        service.unstakeNative(owner, operator, randomAmount(rng, 500));
        return;
      case 'legacyDrop': {
        if (legacyOperators.length === 0) {
          return;
        }
        const legacyOperator = pick(rng, legacyOperators);
        const cached = service.getStake(legacyOperator).legacyA;
        memory.legacyA.setAmount(legacyOperator, cached - cached / 4n);
        service.notifyLegacyADiscrepancy('watcher', legacyOperator);
        return;
      }
      case 'advance':
        nowMs += Math.floor(rng() * 12 * HOUR_MS);
        return;
    }
  };

  for (let step = 0; step < config.steps; step += 1) {
    const action = pick(rng, ACTIONS);
    try {
      perform(action);
      applied[action] += 1;
    } catch (error) {
      if (!isLedgerError(error)) {
        throw error;
      }
      rejected[error.code] = (rejected[error.code] ?? 0) + 1;
    }
    for (const violation of checkInvariants(service, operators, memory.token.balanceOf(ledgerConfig.ledgerAddress))) {
      violations.push(`step ${step + 1} (${action}): ${violation}`);
    }
  }

  return {
    config,
    applied,
    rejected,
    slashingQueued: service.getSlashingQueueLength(),
    slashingProcessed,
    notifiersTreasury: service.getNotifiersTreasury().toString(10),
    ledgerBalance: memory.token.balanceOf(ledgerConfig.ledgerAddress).toString(10),
    violations,
  };
};

export const formatMarkdownSummary = (report: SimulationReport): string => {
  const lines = [
    '# Simulation Summary',
    '',
    `- Operators: ${report.config.operators}`,
    `- Steps: ${report.config.steps} (seed ${report.config.seed})`,
    `- Slashing queued/processed: ${report.slashingQueued}/${report.slashingProcessed}`,
    `- Notifiers treasury: ${report.notifiersTreasury}`,
    `- Ledger balance: ${report.ledgerBalance}`,
    `- Invariant violations: ${report.violations.length}`,
    '',
    '## Applied',
  ];
  for (const [action, count] of Object.entries(report.applied)) {
    lines.push(`- ${action}: ${count}`);
  }
  lines.push('', '## Rejected');
  for (const [code, count] of Object.entries(report.rejected).sort(([a], [b]) => a.localeCompare(b))) {
    lines.push(`- ${code}: ${count}`);
  }
  return lines.join('\n');
};
