import http, { IncomingMessage, ServerResponse } from 'node:http';
import type { Span } from '@opentelemetry/api';
import {
  discrepancyNoticeSchema,
  formatAmount,
  isLedgerError,
  parseWithSchema,
  processSlashingRequestSchema,
  type LedgerErrorCode,
  type LedgerStatusResponse,
} from '@stake-ledger/protocol';
import type { z } from 'zod';
import { logWarn } from './logging';
import { ledgerRegistry, ledgerTracer } from './observability';
import type { LedgerService } from './server';
import { bodyErrorStatus, readJsonBody, sendJson } from './utils/http';

const FORBIDDEN: ReadonlySet<LedgerErrorCode> = new Set([
  'not-governance',
  'not-owner-or-operator',
  'not-authorizer',
  'not-panic-button',
]);

const NOT_FOUND: ReadonlySet<LedgerErrorCode> = new Set(['operator-not-found', 'application-unknown']);

export const errorStatus = (error: unknown): number => {
  if (!isLedgerError(error)) {
    return 500;
  }
  if (error.kind === 'consistency') {
    return 409;
  }
  if (error.kind === 'external') {
    return 500;
  }
  if (FORBIDDEN.has(error.code)) {
    return 403;
  }
  return NOT_FOUND.has(error.code) ? 404 : 400;
};

const errorBody = (error: unknown): { error: string; detail?: string } => {
  if (isLedgerError(error)) {
    return { error: error.code, detail: error.detail };
  }
  return { error: 'internal-error' };
};

export const buildLedgerStatus = (service: LedgerService, startedAtMs: number): LedgerStatusResponse => {
  let approved = 0;
  let disabled = 0;
  for (const record of service.state.applications.values()) {
    if (record.status === 'approved') {
      approved += 1;
    } else {
      disabled += 1;
    }
  }
  return {
    ok: true,
    uptimeMs: Date.now() - startedAtMs,
    operators: service.state.operators.size,
    applications: { approved, disabled },
    slashing: {
      queued: service.getSlashingQueueLength(),
      processed: service.getSlashingQueueIndex(),
    },
    notifiersTreasury: formatAmount(service.getNotifiersTreasury()),
    persistence: {
      state: Boolean(service.config.statePath),
      events: Boolean(service.config.db),
    },
  };
};

export const createLedgerHttpServer = (service: LedgerService): http.Server => {
  const { config } = service;
  const startedAtMs = Date.now();

  /** Reads, validates and runs a POST command inside a span. */
  const handleCommand = async <S extends z.ZodTypeAny>(
    req: IncomingMessage,
    res: ServerResponse,
    name: string,
    schema: S,
    run: (command: z.output<S>, span: Span) => unknown,
  ): Promise<void> => {
    const span = ledgerTracer.startSpan(`ledger.http.${name}`, {
      attributes: { component: 'ledger', 'ledger.endpoint': config.endpoint },
    });
    const respond = (status: number, body: unknown): void => {
      span.setAttribute('http.status_code', status);
      sendJson(res, status, body);
    };
    try {
      const body = await readJsonBody(req, config.maxRequestBytes);
      if (!body.ok) {
        return respond(bodyErrorStatus(body.error), { error: body.error });
      }
      const command = parseWithSchema(schema, body.value);
      if (!command.ok) {
        return respond(400, { error: 'invalid-request', details: command.errors });
      }
      return respond(200, run(command.value, span));
    } catch (error) {
      const status = errorStatus(error);
      if (status === 500) {
        logWarn(`[ledger] ${name} failed`, error);
      }
      return respond(status, errorBody(error));
    } finally {
      span.end();
    }
  };

  const handler = async (req: IncomingMessage, res: ServerResponse) => {
    if (req.method === 'GET' && req.url === '/health') {
      return sendJson(res, 200, { ok: true });
    }

    if (req.method === 'GET' && req.url === '/status') {
      return sendJson(res, 200, buildLedgerStatus(service, startedAtMs));
    }

    if (req.method === 'GET' && req.url === '/metrics') {
      const metrics = await ledgerRegistry.metrics();
      res.setHeader('content-type', ledgerRegistry.contentType);
      res.end(metrics);
      return;
    }

    if (req.method === 'GET' && req.url?.startsWith('/operators/')) {
      const operator = decodeURIComponent(req.url.slice('/operators/'.length));
      const view = service.describeOperator(operator);
      if (!view) {
        return sendJson(res, 404, { error: 'operator-not-found' });
      }
      return sendJson(res, 200, view);
    }

    if (req.method === 'GET' && req.url === '/slashing-queue') {
      const index = service.getSlashingQueueIndex();
      return sendJson(res, 200, {
        length: service.getSlashingQueueLength(),
        index,
        pending: service.state.slashingQueue.slice(index),
      });
    }

    if (req.method === 'POST' && req.url === '/slashing/process') {
      return handleCommand(req, res, 'processSlashing', processSlashingRequestSchema, (command, span) => {
        const batch = service.processSlashing(command.processor, command.count);
        span.setAttribute('ledger.processed', batch.processed);
        return { ok: true, ...batch };
      });
    }

    if (req.method === 'POST' && req.url === '/discrepancy/legacy-a') {
      return handleCommand(req, res, 'notifyLegacyADiscrepancy', discrepancyNoticeSchema, (command) => ({
        ok: true,
        seized: service.notifyLegacyADiscrepancy(command.notifier, command.operator),
      }));
    }

    if (req.method === 'POST' && req.url === '/discrepancy/legacy-b') {
      return handleCommand(req, res, 'notifyLegacyBDiscrepancy', discrepancyNoticeSchema, (command) => ({
        ok: true,
        seized: service.notifyLegacyBDiscrepancy(command.notifier, command.operator),
      }));
    }

    return sendJson(res, 404, { error: 'not-found' });
  };

  return http.createServer((req, res) => {
    handler(req, res).catch((error) => {
      logWarn('[ledger] request failed', error);
      if (!res.headersSent) {
        sendJson(res, 500, { error: 'internal-error' });
      }
    });
  });
};
