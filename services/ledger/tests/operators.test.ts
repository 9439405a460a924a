import { test } from 'node:test';
import assert from 'node:assert/strict';
import { createRatioConversionOracle } from '@stake-ledger/collaborators';
import { MIN_STAKE_TIME_MS } from '../src/config';
import { APP, GOVERNANCE, START_MS, createTestLedger, ledgerCode } from './helpers';

test('createFromNative stakes the caller tokens with the caller as owner', () => {
  const ledger = createTestLedger();
  ledger.fund('owner-1', 1_000n);
  ledger.service.createFromNative('owner-1', { operator: 'op-1', amount: 1_000n, beneficiary: 'ben-1' });

  assert.deepEqual(ledger.service.getStake('op-1'), { native: 1_000n, legacyA: 0n, legacyB: 0n });
  assert.deepEqual(ledger.service.rolesOf('op-1'), {
    owner: 'owner-1',
    beneficiary: 'ben-1',
    authorizer: 'owner-1',
  });
  assert.equal(ledger.service.getStartStakingTimestamp('op-1'), START_MS);
  assert.equal(ledger.token.balanceOf('ledger'), 1_000n);
  assert.equal(ledger.token.balanceOf('owner-1'), 0n);
  assert.deepEqual(ledger.events, [
    {
      type: 'Staked',
      operator: 'op-1',
      source: 'native',
      owner: 'owner-1',
      beneficiary: 'ben-1',
      authorizer: 'owner-1',
      amount: 1_000n,
      seq: 1,
      recordedAtMs: START_MS,
    },
  ]);
});

test('an operator identity can be claimed only once across origination paths', () => {
  const ledger = createTestLedger();
  ledger.stakeNative('op-1', 'owner-1', 100n);
  ledger.fund('owner-2', 100n);
  ledger.legacyB.deposit('owner-2', 50n);

  assert.throws(
    () => ledger.service.createFromNative('owner-2', { operator: 'op-1', amount: 100n }),
    ledgerCode('operator-in-use'),
  );
  assert.throws(() => ledger.service.createFromLegacyB('owner-2', { operator: 'op-1' }), ledgerCode('operator-in-use'));
  assert.throws(() => ledger.service.createFromLegacyA('op-1'), ledgerCode('operator-in-use'));
  assert.equal(ledger.token.balanceOf('owner-2'), 100n);
  assert.equal(ledger.legacyB.isMerged('owner-2'), false);

  ledger.legacyA.delegate('op-a', { owner: 'owner-a', amount: 10n });
  ledger.fund('owner-a', 100n);
  assert.throws(
    () => ledger.service.createFromNative('owner-a', { operator: 'op-a', amount: 100n }),
    ledgerCode('operator-in-use'),
  );
  assert.throws(
    () => ledger.service.createFromNative('owner-a', { operator: '', amount: 100n }),
    ledgerCode('invalid-parameters'),
  );
});

test('createFromNative requires more than the minimum stake', () => {
  const ledger = createTestLedger();
  ledger.service.setMinimumStakeAmount(GOVERNANCE, 100n);
  ledger.fund('owner-1', 201n);

  assert.throws(
    () => ledger.service.createFromNative('owner-1', { operator: 'op-1', amount: 100n }),
    ledgerCode('amount-below-minimum'),
  );
  ledger.service.createFromNative('owner-1', { operator: 'op-1', amount: 101n });
  assert.equal(ledger.service.getStake('op-1').native, 101n);
});

test('createFromLegacyA converts the delegation and copies roles from the mirror', () => {
  const ledger = createTestLedger({}, { legacyAOracle: createRatioConversionOracle({ ratio: 3n, divisor: 2n }) });
  ledger.legacyA.delegate('op-a', {
    owner: 'owner-a',
    beneficiary: 'ben-a',
    authorizer: 'auth-a',
    amount: 301n,
  });

  assert.throws(() => ledger.service.createFromLegacyA('op-a'), ledgerCode('nothing-to-sync'));

  ledger.legacyA.authorizeContract('op-a', 'ledger');
  ledger.service.createFromLegacyA('op-a');
  assert.deepEqual(ledger.service.getStake('op-a'), { native: 0n, legacyA: 450n, legacyB: 0n });
  assert.deepEqual(ledger.service.rolesOf('op-a'), { owner: 'owner-a', beneficiary: 'ben-a', authorizer: 'auth-a' });
});

test('topUpLegacyA syncs growth of the delegation', () => {
  const ledger = createTestLedger();
  ledger.stakeLegacyA('op-a', 'owner-a', 300n);
  ledger.legacyA.setAmount('op-a', 400n);

  assert.throws(() => ledger.service.topUpLegacyA('stranger', 'op-a'), ledgerCode('not-owner-or-operator'));
  assert.equal(ledger.service.topUpLegacyA('owner-a', 'op-a'), 100n);
  assert.equal(ledger.service.getStake('op-a').legacyA, 400n);
  assert.throws(() => ledger.service.topUpLegacyA('op-a', 'op-a'), ledgerCode('nothing-to-top-up'));
});

test('createFromLegacyB merges the caller stake and binds the owner to one operator', () => {
  const ledger = createTestLedger();
  ledger.legacyB.deposit('owner-b', 200n);
  ledger.service.createFromLegacyB('owner-b', { operator: 'op-b', authorizer: 'auth-b' });

  assert.deepEqual(ledger.service.getStake('op-b'), { native: 0n, legacyA: 0n, legacyB: 200n });
  assert.deepEqual(ledger.service.rolesOf('op-b'), { owner: 'owner-b', beneficiary: 'owner-b', authorizer: 'auth-b' });
  assert.equal(ledger.legacyB.isMerged('owner-b'), true);

  assert.throws(
    () => ledger.service.createFromLegacyB('owner-b', { operator: 'op-c' }),
    ledgerCode('legacy-owner-in-use'),
  );
  assert.throws(
    () => ledger.service.createFromLegacyB('owner-empty', { operator: 'op-d' }),
    ledgerCode('nothing-to-sync'),
  );
  assert.equal(ledger.legacyB.isMerged('owner-empty'), false);

  ledger.legacyB.deposit('owner-b', 50n);
  assert.equal(ledger.service.topUpLegacyB('owner-b', 'op-b'), 50n);
  assert.equal(ledger.service.getStake('op-b').legacyB, 250n);
});

test('topUpLegacyB on a native operator claims the owner legacy stake', () => {
  const ledger = createTestLedger();
  ledger.stakeNative('op-n', 'owner-n', 100n);
  ledger.legacyB.deposit('owner-n', 30n);

  assert.equal(ledger.service.topUpLegacyB('owner-n', 'op-n'), 30n);
  assert.deepEqual(ledger.service.getStake('op-n'), { native: 100n, legacyA: 0n, legacyB: 30n });
  assert.throws(
    () => ledger.service.createFromLegacyB('owner-n', { operator: 'op-x' }),
    ledgerCode('legacy-owner-in-use'),
  );
});

test('topUpNative accepts tokens from anyone', () => {
  const ledger = createTestLedger();
  ledger.stakeNative('op-1', 'owner-1', 100n);
  ledger.fund('friend', 50n);

  ledger.service.topUpNative('friend', 'op-1', 50n);
  assert.equal(ledger.service.getStake('op-1').native, 150n);
  assert.equal(ledger.token.balanceOf('ledger'), 150n);
  assert.throws(() => ledger.service.topUpNative('friend', 'op-1', 0n), ledgerCode('invalid-parameters'));
  assert.throws(() => ledger.service.topUpNative('friend', 'op-missing', 1n), ledgerCode('operator-not-found'));
});

test('unstakeNative keeps the largest authorization covered', () => {
  const ledger = createTestLedger();
  ledger.approveApp();
  ledger.stakeNative('op-1', 'owner-1', 1_000n);
  ledger.service.increaseAuthorization('owner-1', 'op-1', APP, 600n);

  assert.equal(ledger.service.getMinStaked('op-1', 'native'), 600n);
  assert.throws(() => ledger.service.unstakeNative('owner-1', 'op-1', 500n), ledgerCode('too-much-to-unstake'));

  ledger.service.unstakeNative('op-1', 'op-1', 400n);
  assert.equal(ledger.service.getStake('op-1').native, 600n);
  assert.equal(ledger.token.balanceOf('owner-1'), 400n);
});

test('unstakeNative below the minimum waits for the minimum staking time', () => {
  const ledger = createTestLedger();
  ledger.service.setMinimumStakeAmount(GOVERNANCE, 100n);
  ledger.stakeNative('op-1', 'owner-1', 1_000n);

  assert.throws(() => ledger.service.unstakeNative('owner-1', 'op-1', 950n), ledgerCode('unstake-too-early'));
  ledger.service.unstakeNative('owner-1', 'op-1', 900n);

  ledger.advance(MIN_STAKE_TIME_MS);
  ledger.service.unstakeNative('owner-1', 'op-1', 100n);
  assert.equal(ledger.service.getStake('op-1').native, 0n);
  assert.equal(ledger.token.balanceOf('owner-1'), 1_000n);
});

test('unstakeLegacyA releases the whole legacy-A stake once unauthorized', () => {
  const ledger = createTestLedger();
  ledger.approveApp();
  ledger.stakeLegacyA('op-a', 'owner-a', 300n);
  ledger.service.increaseAuthorization('owner-a', 'op-a', APP, 200n);

  assert.equal(ledger.service.getMinStaked('op-a', 'legacyA'), 200n);
  assert.throws(() => ledger.service.unstakeLegacyA('owner-a', 'op-a'), ledgerCode('stake-still-authorized'));

  ledger.service.requestAuthorizationDecreaseAll('owner-a', 'op-a', APP);
  ledger.service.approveAuthorizationDecrease(APP, 'op-a');
  assert.equal(ledger.service.unstakeLegacyA('owner-a', 'op-a'), 300n);
  assert.equal(ledger.service.getStake('op-a').legacyA, 0n);
  assert.throws(() => ledger.service.unstakeLegacyA('owner-a', 'op-a'), ledgerCode('nothing-to-unstake'));
});

test('unstakeLegacyB removes only the convertible part of the amount', () => {
  const ledger = createTestLedger({}, { legacyBOracle: createRatioConversionOracle({ ratio: 2n, divisor: 1n }) });
  ledger.legacyB.deposit('owner-b', 100n);
  ledger.service.createFromLegacyB('owner-b', { operator: 'op-b' });
  assert.equal(ledger.service.getStake('op-b').legacyB, 200n);

  assert.equal(ledger.service.unstakeLegacyB('owner-b', 'op-b', 101n), 100n);
  assert.equal(ledger.service.getStake('op-b').legacyB, 100n);
  assert.throws(() => ledger.service.unstakeLegacyB('owner-b', 'op-b', 1n), ledgerCode('conversion-yields-zero'));
  assert.throws(() => ledger.service.unstakeLegacyB('owner-b', 'op-b', 101n), ledgerCode('too-much-to-unstake'));
});

test('unstakeAll needs no authorizations and, under a minimum stake, the minimum staking time', () => {
  const ledger = createTestLedger({ minimumStake: 100n });
  ledger.approveApp();
  ledger.stakeNative('op-1', 'owner-1', 1_000n);

  assert.throws(() => ledger.service.unstakeAll('owner-1', 'op-1'), ledgerCode('unstake-too-early'));

  ledger.service.increaseAuthorization('owner-1', 'op-1', APP, 100n);
  ledger.advance(MIN_STAKE_TIME_MS);
  assert.throws(() => ledger.service.unstakeAll('owner-1', 'op-1'), ledgerCode('stake-still-authorized'));

  ledger.service.requestAuthorizationDecreaseAll('owner-1', 'op-1', APP);
  ledger.service.approveAuthorizationDecrease(APP, 'op-1');
  ledger.service.unstakeAll('owner-1', 'op-1');

  assert.deepEqual(ledger.service.getStake('op-1'), { native: 0n, legacyA: 0n, legacyB: 0n });
  assert.equal(ledger.token.balanceOf('owner-1'), 1_000n);
  assert.deepEqual(
    ledger.eventsOf('Unstaked').map(({ source, amount }) => ({ source, amount })),
    [{ source: 'native', amount: 1_000n }],
  );
});

test('unstakeAll of native stake without a minimum needs no waiting', () => {
  const ledger = createTestLedger();
  ledger.stakeNative('op-1', 'owner-1', 1_000n);

  ledger.service.unstakeAll('owner-1', 'op-1');

  assert.deepEqual(ledger.service.getStake('op-1'), { native: 0n, legacyA: 0n, legacyB: 0n });
  assert.equal(ledger.token.balanceOf('owner-1'), 1_000n);
});

test('unstakeAll of legacy-A stake needs no waiting', () => {
  const ledger = createTestLedger({ minimumStake: 100n });
  ledger.stakeLegacyA('op-a', 'owner-a', 300n);

  ledger.service.unstakeAll('owner-a', 'op-a');

  assert.deepEqual(ledger.service.getStake('op-a'), { native: 0n, legacyA: 0n, legacyB: 0n });
  assert.deepEqual(
    ledger.eventsOf('Unstaked').map(({ source, amount }) => ({ source, amount })),
    [{ source: 'legacyA', amount: 300n }],
  );
  assert.equal(ledger.token.balanceOf('owner-a'), 0n);
});
