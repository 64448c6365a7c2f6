export type EntrySide = 'buy' | 'sell';
export type Outcome = 'win' | 'loss';

/** Fields shared by every signal once it has been validated and stamped. */
export interface SignalFields {
  action: string;
  ticker: string;
  price: number;
  sl: number;
  tp1: number;
  tp2: number;
  tp3: number;
  result?: string;
  comment?: string;
  chatId?: string;
  text?: string;
  /** Calendar date, `YYYY-MM-DD` unless the caller supplied its own. */
  date: string;
  /** Wall time, `HH:MM:SS` unless the caller supplied its own. */
  time: string;
  /** Pipeline clock at ingestion; never taken from the caller. */
  receivedAt: Date;
}

export interface EntrySignal extends SignalFields {
  kind: 'entry';
  side: EntrySide;
}

export interface OutcomeSignal extends SignalFields {
  kind: 'outcome';
  outcome: Outcome;
}

export interface UnrecognizedSignal extends SignalFields {
  kind: 'unrecognized';
}

export type Signal = EntrySignal | OutcomeSignal | UnrecognizedSignal;

/**
 * One row of the recent-signal history. Ingested entries and rows loaded
 * from the persistence sink at startup share this shape.
 */
export interface HistoryRow {
  action: string;
  ticker: string;
  price: number;
  sl: number;
  tp1: number;
  tp2: number;
  tp3: number;
  result?: string;
  comment?: string;
  /** Outcome column kept by the persistence sink (e.g. `WIN`, `LOSS`). */
  status?: string;
  date?: string;
  time?: string;
  receivedAt?: Date;
}

export interface StatsSnapshot {
  total_trades: number;
  today_trades: number;
  wins: number;
  losses: number;
  win_rate: number;
}

/** Wire payload handed to the sinks. */
export interface NormalizedPayload {
  action: string;
  ticker: string;
  price: number;
  sl: number;
  tp1: number;
  tp2: number;
  tp3: number;
  result?: string;
  comment?: string;
  date: string;
  time: string;
  chat_id: string;
  text: string;
}
