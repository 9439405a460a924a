import { test } from 'node:test';
import assert from 'node:assert/strict';
import { APP, GOVERNANCE, createTestLedger, ledgerCode, type TestLedger } from './helpers';

const stakeAndAuthorize = (ledger: TestLedger, operator: string, amount: bigint, authorized = amount): void => {
  const owner = `owner-${operator}`;
  ledger.stakeNative(operator, owner, amount);
  ledger.service.increaseAuthorization(owner, operator, APP, authorized);
};

test('slashing burns native stake first, then legacy stake, and corrects authorizations', () => {
  const ledger = createTestLedger();
  const app = ledger.approveApp();
  ledger.stakeLegacyA('op-1', 'owner-1', 300n);
  ledger.fund('owner-1', 500n);
  ledger.service.topUpNative('owner-1', 'op-1', 500n);
  ledger.service.increaseAuthorization('owner-1', 'op-1', APP, 700n);

  assert.equal(ledger.service.slash(APP, 600n, ['op-1']), 1);
  assert.equal(ledger.service.getSlashingQueueLength(), 1);
  assert.equal(ledger.service.getStake('op-1').native, 500n);

  const batch = ledger.service.processSlashing('processor', 1);
  assert.deepEqual(batch, { processed: 1, nativeBurned: 500n, processorReward: 25n });
  assert.deepEqual(ledger.service.getStake('op-1'), { native: 0n, legacyA: 200n, legacyB: 0n });
  assert.equal(ledger.service.authorizedStake('op-1', APP), 200n);
  assert.deepEqual(app.callsOf('involuntaryAuthorizationDecrease'), [
    { method: 'involuntaryAuthorizationDecrease', operator: 'op-1', amount: 500n },
  ]);
  assert.equal(ledger.legacyA.getDelegationInfo('op-1').amount, 200n);
  assert.equal(ledger.legacyA.rewardOf('ledger'), 5n);
  assert.equal(ledger.token.balanceOf('processor'), 25n);
  assert.equal(ledger.service.getNotifiersTreasury(), 475n);
  assert.equal(ledger.service.getSlashingQueueIndex(), 1);
  assert.deepEqual(
    ledger.eventsOf('AuthorizationInvoluntaryDecreased').map(({ fromAmount, toAmount, successfulCall }) => ({
      fromAmount,
      toAmount,
      successfulCall,
    })),
    [{ fromAmount: 700n, toAmount: 200n, successfulCall: true }],
  );
});

test('processSlashing processes exactly the requested number of entries', () => {
  const ledger = createTestLedger();
  const app = ledger.approveApp();
  stakeAndAuthorize(ledger, 'op-1', 100n);
  stakeAndAuthorize(ledger, 'op-2', 100n);
  stakeAndAuthorize(ledger, 'op-3', 100n);
  assert.equal(ledger.service.slash(APP, 10n, ['op-1', 'op-2', 'op-3']), 3);

  assert.deepEqual(ledger.service.processSlashing('processor', 2), {
    processed: 2,
    nativeBurned: 20n,
    processorReward: 1n,
  });
  assert.equal(ledger.service.getSlashingQueueIndex(), 2);
  assert.equal(ledger.service.getStake('op-1').native, 90n);
  assert.equal(ledger.service.getStake('op-3').native, 100n);
  assert.equal(ledger.service.authorizedStake('op-1', APP), 90n);

  assert.deepEqual(ledger.service.processSlashing('processor', 2), {
    processed: 1,
    nativeBurned: 10n,
    processorReward: 0n,
  });
  assert.equal(ledger.service.getSlashingQueueIndex(), 3);
  assert.equal(ledger.service.getNotifiersTreasury(), 29n);
  assert.equal(app.callsOf('involuntaryAuthorizationDecrease').length, 3);
  assert.throws(() => ledger.service.processSlashing('processor', 1), ledgerCode('nothing-to-process'));
  assert.equal(ledger.service.getStake('op-1').native, 90n);
});

test('processSlashing with a count past the end processes what is queued', () => {
  const ledger = createTestLedger();
  ledger.approveApp();
  stakeAndAuthorize(ledger, 'op-1', 100n);
  stakeAndAuthorize(ledger, 'op-2', 100n);
  ledger.service.slash(APP, 40n, ['op-1', 'op-2']);

  assert.equal(ledger.service.processSlashing('processor', 3).processed, 2);
  assert.equal(ledger.service.getSlashingQueueIndex(), 2);
  assert.throws(() => ledger.service.processSlashing('processor', 0), ledgerCode('invalid-parameters'));
});

test('slash rejects the whole call when any operator lacks the authorization', () => {
  const ledger = createTestLedger();
  ledger.approveApp();
  stakeAndAuthorize(ledger, 'op-1', 100n);
  stakeAndAuthorize(ledger, 'op-2', 100n, 5n);

  assert.throws(() => ledger.service.slash(APP, 10n, ['op-1', 'op-2']), ledgerCode('operator-not-authorized'));
  assert.throws(() => ledger.service.slash(APP, 10n, ['op-1', 'op-missing']), ledgerCode('operator-not-authorized'));
  assert.equal(ledger.service.getSlashingQueueLength(), 0);
  assert.deepEqual(ledger.eventsOf('SlashingQueued'), []);

  assert.equal(ledger.service.slash(APP, 5n, ['op-1', 'op-2']), 2);
  assert.equal(ledger.service.getSlashingQueueLength(), 2);
  assert.throws(() => ledger.service.slash(APP, 10n, []), ledgerCode('invalid-parameters'));
  assert.throws(() => ledger.service.slash('app-unknown', 10n, ['op-1']), ledgerCode('application-not-approved'));
  assert.throws(() => ledger.service.seize(APP, 10n, 101, 'notifier', ['op-1']), ledgerCode('invalid-parameters'));
});

test('a rejected seize pays no notifier reward', () => {
  const ledger = createTestLedger();
  ledger.approveApp();
  stakeAndAuthorize(ledger, 'op-1', 100n);
  ledger.service.setNotificationReward(GOVERNANCE, 10n);
  ledger.fund('sponsor', 100n);
  ledger.service.pushNotificationReward('sponsor', 100n);

  assert.throws(
    () => ledger.service.seize(APP, 10n, 100, 'notifier', ['op-1', 'op-missing']),
    ledgerCode('operator-not-authorized'),
  );
  assert.equal(ledger.token.balanceOf('notifier'), 0n);
  assert.equal(ledger.service.getNotifiersTreasury(), 100n);
  assert.deepEqual(ledger.eventsOf('NotifierRewarded'), []);
});

test('seize pays the notifier from the treasury, capped at its balance', () => {
  const ledger = createTestLedger();
  ledger.approveApp();
  stakeAndAuthorize(ledger, 'op-1', 100n);
  stakeAndAuthorize(ledger, 'op-2', 100n);
  ledger.service.setNotificationReward(GOVERNANCE, 10n);
  ledger.fund('sponsor', 1_000n);
  ledger.service.pushNotificationReward('sponsor', 1_000n);

  assert.equal(ledger.service.seize(APP, 10n, 50, 'notifier', ['op-1', 'op-2']), 2);
  assert.equal(ledger.token.balanceOf('notifier'), 10n);
  assert.equal(ledger.service.getNotifiersTreasury(), 990n);

  ledger.service.setNotificationReward(GOVERNANCE, 1_000n);
  ledger.service.seize(APP, 10n, 100, 'notifier-2', ['op-1']);
  assert.equal(ledger.token.balanceOf('notifier-2'), 990n);
  assert.equal(ledger.service.getNotifiersTreasury(), 0n);
  assert.deepEqual(
    ledger.eventsOf('NotifierRewarded').map(({ notifier, amount }) => ({ notifier, amount })),
    [
      { notifier: 'notifier', amount: 10n },
      { notifier: 'notifier-2', amount: 990n },
    ],
  );
});

test('authorization correction does not notify disabled applications', () => {
  const ledger = createTestLedger();
  const app = ledger.approveApp(APP);
  const disabled = ledger.approveApp('app-2');
  stakeAndAuthorize(ledger, 'op-1', 500n);
  ledger.service.increaseAuthorization('owner-op-1', 'op-1', 'app-2', 500n);
  ledger.service.disableApplication(GOVERNANCE, 'app-2');

  ledger.service.slash(APP, 200n, ['op-1']);
  ledger.service.processSlashing('processor', 1);

  assert.equal(ledger.service.authorizedStake('op-1', APP), 300n);
  assert.equal(ledger.service.authorizedStake('op-1', 'app-2'), 300n);
  assert.deepEqual(app.callsOf('involuntaryAuthorizationDecrease'), [
    { method: 'involuntaryAuthorizationDecrease', operator: 'op-1', amount: 200n },
  ]);
  assert.deepEqual(disabled.callsOf('involuntaryAuthorizationDecrease'), []);
});

test('a rejected involuntary decrease notification aborts processing', () => {
  const ledger = createTestLedger();
  const app = ledger.approveApp();
  stakeAndAuthorize(ledger, 'op-1', 500n);
  ledger.service.slash(APP, 100n, ['op-1']);
  app.rejecting.add('involuntaryAuthorizationDecrease');

  assert.throws(() => ledger.service.processSlashing('processor', 1), {
    message: 'involuntaryAuthorizationDecrease rejected',
  });
  assert.equal(ledger.service.getSlashingQueueIndex(), 0);
  assert.equal(ledger.service.getStake('op-1').native, 500n);
  assert.equal(ledger.service.authorizedStake('op-1', APP), 500n);
  assert.equal(ledger.token.balanceOf('processor'), 0n);
});

test('a tolerant ledger records failed involuntary decrease notifications', () => {
  const ledger = createTestLedger({ tolerateInvoluntaryDecreaseFailures: true });
  const app = ledger.approveApp();
  stakeAndAuthorize(ledger, 'op-1', 500n);
  ledger.service.slash(APP, 100n, ['op-1']);
  app.rejecting.add('involuntaryAuthorizationDecrease');

  const warnings: unknown[][] = [];
  const originalWarn = console.warn;
  console.warn = (...args: unknown[]) => {
    warnings.push(args);
  };
  try {
    ledger.service.processSlashing('processor', 1);
  } finally {
    console.warn = originalWarn;
  }

  assert.equal(ledger.service.authorizedStake('op-1', APP), 400n);
  assert.deepEqual(
    ledger.eventsOf('AuthorizationInvoluntaryDecreased').map(({ successfulCall }) => successfulCall),
    [false],
  );
  assert.equal(warnings.length, 1);
  assert.equal(warnings[0][0], '[ledger] involuntary decrease notification failed');
});

test('correction keeps the pending decrease within the authorization', () => {
  const ledger = createTestLedger();
  ledger.approveApp();
  stakeAndAuthorize(ledger, 'op-1', 100n);
  ledger.service.requestAuthorizationDecrease('owner-op-1', 'op-1', APP, 80n);

  ledger.service.slash(APP, 50n, ['op-1']);
  ledger.service.processSlashing('processor', 1);
  assert.equal(ledger.service.authorizedStake('op-1', APP), 50n);
  assert.equal(ledger.service.pendingAuthorizationDecrease('op-1', APP), 50n);
});

test('slashing a legacy-B operator slashes the owner on the mirror', () => {
  const ledger = createTestLedger();
  const app = ledger.approveApp();
  ledger.legacyB.deposit('owner-b', 300n);
  ledger.service.createFromLegacyB('owner-b', { operator: 'op-b' });
  ledger.service.increaseAuthorization('owner-b', 'op-b', APP, 300n);

  ledger.service.slash(APP, 100n, ['op-b']);
  assert.deepEqual(ledger.service.processSlashing('processor', 1), {
    processed: 1,
    nativeBurned: 0n,
    processorReward: 0n,
  });
  assert.deepEqual(ledger.service.getStake('op-b'), { native: 0n, legacyA: 0n, legacyB: 200n });
  assert.equal(ledger.legacyB.getAllTokens('owner-b'), 200n);
  assert.equal(ledger.legacyB.rewardOf('ledger'), 5n);
  assert.equal(ledger.service.authorizedStake('op-b', APP), 200n);
  assert.deepEqual(app.callsOf('involuntaryAuthorizationDecrease'), [
    { method: 'involuntaryAuthorizationDecrease', operator: 'op-b', amount: 100n },
  ]);
});
