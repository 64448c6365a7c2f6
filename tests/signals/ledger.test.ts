import { describe, expect, it } from 'vitest';

import { SignalLedger } from '../../src/signals/ledger.js';
import { parseSignal } from '../../src/signals/parse.js';
import { computeWinRate, rowDay } from '../../src/signals/stats.js';

const today = new Date(2026, 4, 20, 12, 0, 0);
const yesterday = new Date(2026, 4, 19, 23, 30, 0);

const signal = (action: string, ticker = 'BTCUSD', at = today) =>
  parseSignal(JSON.stringify({ action, ticker, price: 100 }), at);

describe('computeWinRate', () => {
  it('is zero when nothing has been decided', () => {
    expect(computeWinRate(0, 0)).toBe(0);
  });

  it('rounds to two decimals within [0, 100]', () => {
    expect(computeWinRate(2, 1)).toBe(66.67);
    expect(computeWinRate(1, 0)).toBe(100);
    expect(computeWinRate(0, 3)).toBe(0);
  });
});

describe('rowDay', () => {
  it('prefers the date column and falls back to receivedAt', () => {
    const base = { action: 'buy', ticker: 'X', price: 1, sl: 0, tp1: 0, tp2: 0, tp3: 0 };
    expect(rowDay({ ...base, date: '2026-05-20' })).toBe('2026-05-20');
    expect(rowDay({ ...base, date: 'not a date', receivedAt: today })).toBe('2026-05-20');
    expect(rowDay(base)).toBeNull();
  });
});

describe('SignalLedger', () => {
  it('counts every entry even after history evicts it', () => {
    const ledger = new SignalLedger({ capacity: 3, now: () => today });
    for (let i = 0; i < 7; i += 1) {
      expect(ledger.apply(signal('buy', `T${i}`))).toBe('entry');
    }
    const stats = ledger.snapshot();
    expect(stats.total_trades).toBe(7);
    expect(ledger.recent().map((row) => row.ticker)).toEqual(['T6', 'T5', 'T4']);
    expect(stats.today_trades).toBe(3);
  });

  it('updates counters for outcomes without adding history rows', () => {
    const ledger = new SignalLedger({ capacity: 10, now: () => today });
    ledger.apply(signal('buy'));
    expect(ledger.apply(signal('win'))).toBe('win');
    expect(ledger.recent()).toHaveLength(1);
    expect(ledger.snapshot()).toEqual({
      total_trades: 1,
      today_trades: 1,
      wins: 1,
      losses: 0,
      win_rate: 100,
    });

    expect(ledger.apply(signal('SL'))).toBe('loss');
    expect(ledger.snapshot().win_rate).toBe(50);
  });

  it('leaves state untouched for unrecognized actions', () => {
    const ledger = new SignalLedger({ capacity: 10, now: () => today });
    expect(ledger.apply(signal('close'))).toBe('ignored');
    expect(ledger.snapshot()).toEqual({
      total_trades: 0,
      today_trades: 0,
      wins: 0,
      losses: 0,
      win_rate: 0,
    });
    expect(ledger.recent()).toEqual([]);
  });

  it('recomputes today_trades on every read as the date rolls over', () => {
    let clock = yesterday;
    const ledger = new SignalLedger({ capacity: 10, now: () => clock });
    ledger.apply(signal('buy', 'A', yesterday));
    ledger.apply(signal('sell', 'B', yesterday));
    expect(ledger.snapshot().today_trades).toBe(2);

    clock = today;
    expect(ledger.snapshot().today_trades).toBe(0);
    ledger.apply(signal('buy', 'C', today));
    expect(ledger.snapshot().today_trades).toBe(1);
    expect(ledger.snapshot().total_trades).toBe(3);
  });

  it('returns identical snapshots when nothing is ingested in between', () => {
    const ledger = new SignalLedger({ capacity: 10, now: () => today });
    ledger.apply(signal('buy'));
    ledger.apply(signal('loss'));
    expect(ledger.snapshot()).toEqual(ledger.snapshot());
  });

  it('reseed replaces history and counters', () => {
    const ledger = new SignalLedger({ capacity: 2, now: () => today });
    ledger.apply(signal('buy', 'LIVE'));
    const base = { action: 'buy', price: 1, sl: 0, tp1: 0, tp2: 0, tp3: 0, date: '2026-05-20' };
    ledger.reseed(
      [
        { ...base, ticker: 'R1' },
        { ...base, ticker: 'R2' },
        { ...base, ticker: 'R3' },
      ],
      { totalTrades: 3, wins: 1, losses: 1 }
    );
    expect(ledger.recent().map((row) => row.ticker)).toEqual(['R1', 'R2']);
    expect(ledger.snapshot()).toEqual({
      total_trades: 3,
      today_trades: 2,
      wins: 1,
      losses: 1,
      win_rate: 50,
    });
  });
});
