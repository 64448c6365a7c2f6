import { dayKey, formatDay } from './dates.js';
import type { HistoryStore } from './history.js';
import type { HistoryRow, StatsSnapshot } from './types.js';

export interface StatsSeed {
  totalTrades: number;
  wins: number;
  losses: number;
}

export function computeWinRate(wins: number, losses: number): number {
  const decided = wins + losses;
  if (decided <= 0) return 0;
  return Math.round((wins / decided) * 100 * 100) / 100;
}

export function rowDay(row: HistoryRow): string | null {
  return dayKey(row.date) ?? dayKey(row.receivedAt);
}

export class StatsAggregator {
  private totalTrades = 0;
  private wins = 0;
  private losses = 0;

  recordEntry(): void {
    this.totalTrades += 1;
  }

  recordWin(): void {
    this.wins += 1;
  }

  recordLoss(): void {
    this.losses += 1;
  }

  seed(seed: StatsSeed): void {
    this.totalTrades = seed.totalTrades;
    this.wins = seed.wins;
    this.losses = seed.losses;
  }

  /** `today_trades` is recounted over `history` on every call. */
  snapshot(history: HistoryStore, now: Date): StatsSnapshot {
    const today = formatDay(now);
    return {
      total_trades: this.totalTrades,
      today_trades: history.countWhere((row) => rowDay(row) === today),
      wins: this.wins,
      losses: this.losses,
      win_rate: computeWinRate(this.wins, this.losses),
    };
  }
}
