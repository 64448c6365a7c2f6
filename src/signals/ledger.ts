import { HistoryStore } from './history.js';
import { StatsAggregator, type StatsSeed } from './stats.js';
import type { EntrySignal, HistoryRow, Signal, StatsSnapshot } from './types.js';

export type ApplyResult = 'entry' | 'win' | 'loss' | 'ignored';

function toHistoryRow(signal: EntrySignal): HistoryRow {
  return {
    action: signal.action,
    ticker: signal.ticker,
    price: signal.price,
    sl: signal.sl,
    tp1: signal.tp1,
    tp2: signal.tp2,
    tp3: signal.tp3,
    result: signal.result,
    comment: signal.comment,
    date: signal.date,
    time: signal.time,
    receivedAt: signal.receivedAt,
  };
}

/**
 * Shared signal state: recent history plus running stats. Every mutation
 * goes through a synchronous method, so concurrent requests on the event
 * loop can never interleave a read-modify-write.
 */
export class SignalLedger {
  readonly history: HistoryStore;
  private stats = new StatsAggregator();
  private now: () => Date;

  constructor(params: { capacity: number; now?: () => Date }) {
    this.history = new HistoryStore(params.capacity);
    this.now = params.now ?? (() => new Date());
  }

  apply(signal: Signal): ApplyResult {
    switch (signal.kind) {
      case 'entry':
        this.history.pushFront(toHistoryRow(signal));
        this.stats.recordEntry();
        return 'entry';
      case 'outcome':
        if (signal.outcome === 'win') {
          this.stats.recordWin();
          return 'win';
        }
        this.stats.recordLoss();
        return 'loss';
      case 'unrecognized':
        return 'ignored';
    }
  }

  /** Replaces history and counters wholesale; used once at startup. */
  reseed(rows: readonly HistoryRow[], seed: StatsSeed): void {
    this.history.replace(rows);
    this.stats.seed(seed);
  }

  snapshot(): StatsSnapshot {
    return this.stats.snapshot(this.history, this.now());
  }

  recent(): HistoryRow[] {
    return this.history.all();
  }
}
