import type { Server } from 'node:http';
import type { LedgerState } from './accounting/state';
import { persistLedgerState } from './state';

export type LedgerShutdownOptions = {
  server: Server;
  state: LedgerState;
  statePath?: string;
  stopPersistence: () => void;
  closeEventStore?: () => Promise<void>;
};

/**
 * Stops the persistence timer, closes the HTTP server, writes a final
 * snapshot and closes the event store. Repeated calls share one shutdown.
 */
export const createLedgerShutdown = (options: LedgerShutdownOptions): (() => Promise<void>) => {
  let closing: Promise<void> | undefined;
  const close = async (): Promise<void> => {
    options.stopPersistence();
    await new Promise<void>((resolve, reject) => {
      options.server.close((error) => (error ? reject(error) : resolve()));
    });
    if (options.statePath) {
      await persistLedgerState(options.state, options.statePath);
    }
    await options.closeEventStore?.();
  };
  return () => {
    if (!closing) {
      closing = close();
    }
    return closing;
  };
};
