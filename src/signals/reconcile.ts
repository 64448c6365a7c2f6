import { z } from 'zod';

import { Logger } from '../core/logger.js';
import { fetchWithTimeout, readErrorBody } from '../interface/http.js';
import type { SignalLedger } from './ledger.js';
import { classifyAction } from './parse.js';
import type { StatsSeed } from './stats.js';
import type { HistoryRow } from './types.js';

export class ReconciliationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ReconciliationError';
  }
}

export type HistoryOrder = 'newest-first' | 'oldest-first';

export interface ReconciliationResult {
  rows: HistoryRow[];
  seed: StatsSeed;
  skipped: number;
}

const looseNumber = z.preprocess((value) => {
  const n = typeof value === 'number' ? value : typeof value === 'string' ? Number(value) : Number.NaN;
  return Number.isFinite(n) ? n : 0;
}, z.number());

const looseText = z.preprocess(
  (value) =>
    typeof value === 'string' || typeof value === 'number' ? String(value).trim() || undefined : undefined,
  z.string().optional()
);

const requiredText = z.preprocess(
  (value) => (typeof value === 'string' || typeof value === 'number' ? String(value).trim() : value),
  z.string().min(1)
);

// Sheet-backed sinks hand back loosely typed cells, so everything but the
// identifying columns is coerced rather than rejected.
const SinkRowSchema = z.object({
  action: requiredText,
  ticker: requiredText,
  price: looseNumber,
  sl: looseNumber,
  tp1: looseNumber,
  tp2: looseNumber,
  tp3: looseNumber,
  result: looseText,
  comment: looseText,
  status: looseText,
  date: looseText,
  time: looseText,
});

function omitUndefined(row: z.infer<typeof SinkRowSchema>): HistoryRow {
  const out: HistoryRow = {
    action: row.action,
    ticker: row.ticker,
    price: row.price,
    sl: row.sl,
    tp1: row.tp1,
    tp2: row.tp2,
    tp3: row.tp3,
  };
  if (row.result !== undefined) out.result = row.result;
  if (row.comment !== undefined) out.comment = row.comment;
  if (row.status !== undefined) out.status = row.status;
  if (row.date !== undefined) out.date = row.date;
  if (row.time !== undefined) out.time = row.time;
  return out;
}

/** A `result`/`status` marker left on an entry row by the sink. */
export function outcomeMarker(row: HistoryRow): 'win' | 'loss' | null {
  for (const value of [row.result, row.status]) {
    const normalized = value?.trim().toLowerCase();
    if (normalized === 'win' || normalized === 'loss') return normalized;
  }
  return null;
}

/** Extracts the row list from `{status, data}` or a bare array. */
export function extractRows(body: unknown): unknown[] {
  if (Array.isArray(body)) return body;
  if (typeof body === 'object' && body !== null) {
    const status = 'status' in body ? body.status : undefined;
    const data = 'data' in body ? body.data : undefined;
    if (status !== undefined && String(status).toLowerCase() !== 'success') {
      throw new ReconciliationError(`History endpoint reported status "${String(status)}"`);
    }
    if (Array.isArray(data)) return data;
  }
  throw new ReconciliationError('History endpoint returned an unexpected payload');
}

/**
 * Rebuilds the ledger state the relay would hold had it seen these rows live:
 * entry rows become history and trades, outcome rows only move the counters,
 * anything else is ignored.
 */
export function buildReconciliation(rawRows: readonly unknown[], order: HistoryOrder): ReconciliationResult {
  const rows: HistoryRow[] = [];
  let wins = 0;
  let losses = 0;
  let skipped = 0;
  for (const raw of rawRows) {
    const parsed = SinkRowSchema.safeParse(raw);
    if (!parsed.success) {
      skipped += 1;
      continue;
    }
    const row = omitUndefined(parsed.data);
    const cls = classifyAction(row.action);
    if (cls.kind === 'outcome') {
      if (cls.outcome === 'win') wins += 1;
      else losses += 1;
    } else if (cls.kind === 'entry') {
      rows.push(row);
      const marker = outcomeMarker(row);
      if (marker === 'win') wins += 1;
      if (marker === 'loss') losses += 1;
    }
  }
  if (order === 'oldest-first') {
    rows.reverse();
  }

  return { rows, seed: { totalTrades: rows.length, wins, losses }, skipped };
}

export class ReconciliationLoader {
  constructor(
    private params: {
      url: string;
      timeoutMs: number;
      order: HistoryOrder;
    }
  ) {}

  async load(): Promise<ReconciliationResult> {
    let body: unknown;
    try {
      // The body is read under the same timer as the request.
      body = await fetchWithTimeout(
        this.params.url,
        { method: 'GET', headers: { Accept: 'application/json' } },
        this.params.timeoutMs,
        async (response): Promise<unknown> => {
          if (!response.ok) {
            const detail = await readErrorBody(response);
            throw new ReconciliationError(`History fetch failed (${response.status}): ${detail}`);
          }
          const text = await response.text();
          try {
            return JSON.parse(text);
          } catch (error) {
            const detail = error instanceof Error ? error.message : String(error);
            throw new ReconciliationError(`History payload is not JSON: ${detail}`);
          }
        }
      );
    } catch (error) {
      if (error instanceof ReconciliationError) throw error;
      const detail = error instanceof Error ? error.message : String(error);
      throw new ReconciliationError(`History fetch failed: ${detail}`);
    }

    return buildReconciliation(extractRows(body), this.params.order);
  }
}

/**
 * Seeds the ledger from the persistence sink. Failures are logged and leave
 * the ledger empty; the returned promise never rejects.
 */
export async function applyReconciliation(
  ledger: SignalLedger,
  loader: ReconciliationLoader | null,
  logger: Logger = new Logger('info')
): Promise<boolean> {
  if (!loader) {
    logger.info('No history endpoint configured; starting with empty history.');
    return false;
  }
  try {
    logger.info('Fetching signal history...');
    const result = await loader.load();
    ledger.reseed(result.rows, result.seed);
    if (result.skipped > 0) {
      logger.warn(`Skipped ${result.skipped} unusable history rows`);
    }
    logger.info(
      `Loaded ${result.rows.length} past trades (${result.seed.wins} wins, ${result.seed.losses} losses)`
    );
    return true;
  } catch (error) {
    logger.error('Failed to fetch history', error);
    return false;
  }
}
