import {
  createInMemoryCollaborators,
  createRatioConversionOracle,
  identityConversionOracle,
} from '@stake-ledger/collaborators';
import { buildLedgerConfig, loadDynamicConfig, parseConversionRatio, validateLedgerConfig } from './env';
import { createLedgerHttpServer } from './http';
import { logInfo, logWarn } from './logging';
import { createLedgerService } from './server';
import { createLedgerShutdown } from './shutdown';
import { loadLedgerState, startLedgerStatePersistence } from './state';
import { attachLedgerEventStore } from './storage/events';
import { createPostgresLedgerEventStore } from './storage/postgres';

const start = async (): Promise<void> => {
  try {
    const config = buildLedgerConfig(process.env, loadDynamicConfig(process.env.LEDGER_CONFIG_PATH));
    const issues = validateLedgerConfig(config);
    if (issues.length > 0) {
      logWarn('[ledger] invalid configuration', { issues });
      process.exit(1);
    }

    logInfo('[ledger] starting', { ledgerId: config.ledgerId, endpoint: config.endpoint });
    const ratioA = parseConversionRatio(process.env.LEDGER_LEGACY_A_RATIO);
    const ratioB = parseConversionRatio(process.env.LEDGER_LEGACY_B_RATIO);
    const { collaborators } = createInMemoryCollaborators(config.ledgerAddress, {
      legacyAOracle: ratioA ? createRatioConversionOracle(ratioA) : identityConversionOracle(),
      legacyBOracle: ratioB ? createRatioConversionOracle(ratioB) : identityConversionOracle(),
    });
    logWarn('[ledger] using in-memory collaborators; token and legacy balances will not persist');

    const events = config.db ? await createPostgresLedgerEventStore(config.db, config.ledgerId) : undefined;
    const initialEventSeq = events ? await events.store.lastSeq() : 0;
    const service = createLedgerService(config, collaborators, {
      state: loadLedgerState(config.statePath),
      initialEventSeq,
    });
    if (events) {
      attachLedgerEventStore(service, events.store);
    }

    const server = createLedgerHttpServer(service);
    server.listen(config.port);
    logInfo(`[ledger] listening on ${config.port}`);
    const stopPersistence = startLedgerStatePersistence(
      service.state,
      config.statePath,
      config.statePersistIntervalMs,
    );

    const shutdown = createLedgerShutdown({
      server,
      state: service.state,
      statePath: config.statePath,
      stopPersistence,
      closeEventStore: events?.close,
    });
    const onSignal = (signal: NodeJS.Signals): void => {
      logInfo('[ledger] shutting down', { signal });
      shutdown()
        .then(() => process.exit(0))
        .catch((error) => {
          logWarn('[ledger] shutdown failed', error);
          process.exit(1);
        });
    };
    process.once('SIGTERM', onSignal);
    process.once('SIGINT', onSignal);
  } catch (error) {
    logWarn('[ledger] fatal startup error', error);
    process.exit(1);
  }
};

void start();
