import type http from 'node:http';

import { resolveReconcileUrl, type RelayConfig } from '../core/config.js';
import { Logger } from '../core/logger.js';
import { createSinks, ForwardingClient } from '../interface/forwarder.js';
import { SignalLedger } from '../signals/ledger.js';
import { IngestionPipeline } from '../signals/pipeline.js';
import { applyReconciliation, ReconciliationLoader } from '../signals/reconcile.js';
import { createGatewayServer } from './server.js';

export interface Relay {
  ledger: SignalLedger;
  forwarder: ForwardingClient;
  pipeline: IngestionPipeline;
  loader: ReconciliationLoader | null;
  server: http.Server;
}

export function createRelay(config: RelayConfig, logger: Logger, now?: () => Date): Relay {
  const ledger = new SignalLedger({ capacity: config.history.capacity, now });
  const forwarder = new ForwardingClient(createSinks(config), logger);
  const pipeline = new IngestionPipeline({
    ledger,
    forwarder,
    defaultChatId: config.routing.defaultChatId,
    logger,
    now,
  });

  const url = resolveReconcileUrl(config);
  const loader = url
    ? new ReconciliationLoader({ url, timeoutMs: config.reconcile.timeoutMs, order: config.reconcile.order })
    : null;

  const server = createGatewayServer({
    pipeline,
    ledger,
    logger,
    maxBodyBytes: config.gateway.maxBodyBytes,
  });

  return { ledger, forwarder, pipeline, loader, server };
}

/**
 * Seeds history, then starts listening. Requests are only accepted once
 * the startup load has settled.
 */
export async function startRelay(config: RelayConfig, logger: Logger): Promise<Relay> {
  const relay = createRelay(config, logger);
  if (relay.forwarder.sinkNames.length === 0) {
    logger.warn('No sinks configured; signals will only be kept in memory.');
  }

  await applyReconciliation(relay.ledger, relay.loader, logger);

  await new Promise<void>((resolve, reject) => {
    relay.server.once('error', reject);
    relay.server.listen(config.gateway.port, config.gateway.host, () => {
      relay.server.off('error', reject);
      resolve();
    });
  });
  logger.info(`Gateway listening on ${config.gateway.host}:${config.gateway.port}`);
  return relay;
}
