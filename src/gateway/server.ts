import http from 'node:http';

import { Logger } from '../core/logger.js';
import type { SignalLedger } from '../signals/ledger.js';
import { ParseError } from '../signals/parse.js';
import type { IngestionPipeline } from '../signals/pipeline.js';
import { renderDashboard } from './dashboard.js';

export class PayloadTooLargeError extends Error {
  readonly status = 413;

  constructor(limit: number) {
    super(`Request body exceeds ${limit} bytes`);
    this.name = 'PayloadTooLargeError';
  }
}

export interface GatewayDeps {
  pipeline: IngestionPipeline;
  ledger: SignalLedger;
  logger?: Logger;
  maxBodyBytes?: number;
}

const ROUTES: Record<string, string[]> = {
  '/': ['GET'],
  '/webhook': ['POST'],
  '/api/stats': ['GET'],
  '/api/signals': ['GET'],
  '/health': ['GET'],
};

function readBody(req: http.IncomingMessage, limit: number): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    let failed = false;
    req.on('data', (chunk: Buffer) => {
      if (failed) return;
      size += chunk.length;
      if (size > limit) {
        failed = true;
        reject(new PayloadTooLargeError(limit));
        return;
      }
      chunks.push(chunk);
    });
    req.on('end', () => {
      if (!failed) resolve(Buffer.concat(chunks));
    });
    req.on('error', (error) => {
      if (!failed) reject(error);
    });
  });
}

function sendJson(res: http.ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(body));
}

export function createGatewayServer(deps: GatewayDeps): http.Server {
  const logger = deps.logger ?? new Logger('info');
  const maxBodyBytes = deps.maxBodyBytes ?? 1024 * 1024;

  const handleWebhook = async (req: http.IncomingMessage, res: http.ServerResponse) => {
    let body: Buffer;
    try {
      body = await readBody(req, maxBodyBytes);
    } catch (error) {
      if (error instanceof PayloadTooLargeError) {
        logger.warn(error.message);
        sendJson(res, error.status, { detail: error.message });
        return;
      }
      throw error;
    }

    try {
      const result = deps.pipeline.ingest(body);
      sendJson(res, 200, { status: 'success', message: 'Signal received' });
      logger.debug(`Forwarding dispatched for ${result.payload.ticker}`);
    } catch (error) {
      if (error instanceof ParseError) {
        logger.warn(`Rejected signal: ${error.detail}`);
        sendJson(res, error.status, { detail: error.detail });
        return;
      }
      throw error;
    }
  };

  return http.createServer(async (req, res) => {
    const path = new URL(req.url ?? '/', 'http://localhost').pathname;
    const methods = ROUTES[path];
    if (!methods) {
      res.writeHead(404);
      res.end();
      return;
    }
    if (!methods.includes(req.method ?? '')) {
      res.writeHead(405, { Allow: methods.join(', ') });
      res.end();
      return;
    }

    try {
      switch (path) {
        case '/health':
          res.writeHead(200, { 'Content-Type': 'text/plain' });
          res.end('ok');
          return;
        case '/webhook':
          await handleWebhook(req, res);
          return;
        case '/api/stats':
          sendJson(res, 200, { stats: deps.ledger.snapshot(), signals: deps.ledger.recent() });
          return;
        case '/api/signals':
          sendJson(res, 200, deps.ledger.recent());
          return;
        default:
          res.writeHead(200, { 'Content-Type': 'text/html; charset=utf-8' });
          res.end(renderDashboard(deps.ledger.snapshot(), deps.ledger.recent()));
      }
    } catch (error) {
      logger.error(`Request ${req.method} ${path} failed`, error);
      if (!res.headersSent) {
        sendJson(res, 500, { detail: 'Internal server error' });
      } else {
        res.end();
      }
    }
  });
}
