import { test } from 'node:test';
import assert from 'node:assert/strict';
import { createInMemoryCollaborators } from '@stake-ledger/collaborators';
import { createLedgerService } from '@stake-ledger/ledger';
import { checkInvariants, createRng, formatMarkdownSummary, runSimulation, simulationConfig } from '../src/lib';

const quietly = <T>(work: () => T): T => {
  const originalLog = console.log;
  console.log = () => undefined;
  try {
    return work();
  } finally {
    console.log = originalLog;
  }
};

test('rng is deterministic for the same seed', () => {
  const rngA = createRng(123);
  const rngB = createRng(123);
  assert.equal(rngA(), rngB());
  assert.equal(rngA(), rngB());
});

test('a random workload keeps every ledger invariant', () => {
  const report = quietly(() => runSimulation({ operators: 6, steps: 300, seed: 7 }));
  assert.deepEqual(report.violations, []);
  const applied = Object.values(report.applied).reduce((sum, count) => sum + count, 0);
  const rejected = Object.values(report.rejected).reduce((sum, count) => sum + count, 0);
  assert.equal(applied + rejected, 300);
});

test('the same seed replays the same workload', () => {
  const first = quietly(() => runSimulation({ operators: 4, steps: 120, seed: 11 }));
  const second = quietly(() => runSimulation({ operators: 4, steps: 120, seed: 11 }));
  assert.deepEqual(first, second);
});

test('zero steps leaves only the initial stakes', () => {
  const report = quietly(() => runSimulation({ operators: 2, steps: 0, seed: 1 }));
  assert.equal(report.slashingQueued, 0);
  assert.equal(report.notifiersTreasury, '0');
  assert.deepEqual(report.rejected, {});
  assert.deepEqual(report.violations, []);
});

test('checkInvariants reports a ledger balance that does not match its stakes', () => {
  const config = simulationConfig();
  const memory = createInMemoryCollaborators(config.ledgerAddress);
  const service = createLedgerService(config, memory.collaborators, { now: () => 1_000 });
  memory.token.mint('owner-1', 500n);
  memory.token.approve('owner-1', config.ledgerAddress, 500n);
  service.createFromNative('owner-1', { operator: 'op-1', amount: 500n });

  assert.deepEqual(checkInvariants(service, ['op-1'], 500n), []);
  assert.deepEqual(checkInvariants(service, ['op-1'], 400n), ['ledger holds 400, expected 500']);
});

test('formats a markdown summary', () => {
  const report = quietly(() => runSimulation({ operators: 2, steps: 0, seed: 1 }));
  const summary = formatMarkdownSummary(report);
  assert.match(summary, /^# Simulation Summary/);
  assert.match(summary, /- Steps: 0 \(seed 1\)/);
  assert.match(summary, /- Invariant violations: 0/);
});
