import { describe, expect, it } from 'vitest';

import { classifyAction, decodeBody, ParseError, parseSignal } from '../../src/signals/parse.js';

const receivedAt = new Date(2026, 2, 14, 9, 5, 7);

function expectParseError(fn: () => unknown): ParseError {
  try {
    fn();
  } catch (error) {
    expect(error).toBeInstanceOf(ParseError);
    if (error instanceof ParseError) return error;
  }
  throw new Error('expected a ParseError');
}

describe('classifyAction', () => {
  it('maps entry and outcome actions case-insensitively', () => {
    expect(classifyAction('BUY')).toEqual({ kind: 'entry', side: 'buy' });
    expect(classifyAction('Sell')).toEqual({ kind: 'entry', side: 'sell' });
    expect(classifyAction('win')).toEqual({ kind: 'outcome', outcome: 'win' });
    expect(classifyAction('TP')).toEqual({ kind: 'outcome', outcome: 'win' });
    expect(classifyAction('Loss')).toEqual({ kind: 'outcome', outcome: 'loss' });
    expect(classifyAction('sl')).toEqual({ kind: 'outcome', outcome: 'loss' });
  });

  it('treats anything else as unrecognized', () => {
    expect(classifyAction('close')).toEqual({ kind: 'unrecognized' });
    expect(classifyAction('constructor')).toEqual({ kind: 'unrecognized' });
  });
});

describe('decodeBody', () => {
  it('decodes a JSON buffer', () => {
    expect(decodeBody(Buffer.from('{"a":1}'))).toEqual({ a: 1 });
  });

  it('strips a byte order mark', () => {
    expect(decodeBody('\uFEFF{"a":1}')).toEqual({ a: 1 });
  });

  it('unwraps a double-encoded body', () => {
    expect(decodeBody(JSON.stringify(JSON.stringify({ a: 1 })))).toEqual({ a: 1 });
  });

  it('rejects empty and non-JSON bodies', () => {
    expect(expectParseError(() => decodeBody('   ')).detail).toBe('Request body is empty');
    expect(expectParseError(() => decodeBody('action=buy')).detail).toMatch(/^Request body is not valid JSON/);
  });
});

describe('parseSignal', () => {
  it('builds an entry signal with defaults and a pipeline timestamp', () => {
    const signal = parseSignal('{"action":"buy","ticker":"BTCUSD","price":50000}', receivedAt);
    expect(signal).toEqual({
      kind: 'entry',
      side: 'buy',
      action: 'buy',
      ticker: 'BTCUSD',
      price: 50000,
      sl: 0,
      tp1: 0,
      tp2: 0,
      tp3: 0,
      result: undefined,
      comment: undefined,
      chatId: undefined,
      text: undefined,
      date: '2026-03-14',
      time: '09:05:07',
      receivedAt,
    });
  });

  it('keeps caller date and time but always stamps receivedAt', () => {
    const signal = parseSignal(
      '{"action":"sell","ticker":"ETHUSD","price":3000,"date":"2026-03-01","time":"23:59:00"}',
      receivedAt
    );
    expect(signal.date).toBe('2026-03-01');
    expect(signal.time).toBe('23:59:00');
    expect(signal.receivedAt).toBe(receivedAt);
  });

  it('coerces numeric strings and treats null levels as absent', () => {
    const signal = parseSignal(
      '{"action":"buy","ticker":"SOLUSD","price":"142.5","sl":null,"tp1":"150","chat_id":-100123}',
      receivedAt
    );
    expect(signal.price).toBe(142.5);
    expect(signal.sl).toBe(0);
    expect(signal.tp1).toBe(150);
    expect(signal.chatId).toBe('-100123');
  });

  it('classifies outcome and unrecognized actions', () => {
    const win = parseSignal('{"action":"WIN","ticker":"BTCUSD","price":1}', receivedAt);
    expect(win.kind).toBe('outcome');
    if (win.kind === 'outcome') expect(win.outcome).toBe('win');

    const other = parseSignal('{"action":"close","ticker":"BTCUSD","price":1}', receivedAt);
    expect(other.kind).toBe('unrecognized');
  });

  it('rejects a missing ticker', () => {
    const error = expectParseError(() => parseSignal('{"action":"buy","price":1}', receivedAt));
    expect(error.status).toBe(422);
    expect(error.detail).toBe('ticker: Required');
  });

  it('rejects non-numeric levels instead of storing zero', () => {
    const error = expectParseError(() =>
      parseSignal('{"action":"buy","ticker":"BTCUSD","price":1,"tp2":"soon"}', receivedAt)
    );
    expect(error.detail).toMatch(/^tp2: /);
  });

  it('rejects an empty action', () => {
    const error = expectParseError(() => parseSignal('{"action":"  ","ticker":"BTCUSD","price":1}', receivedAt));
    expect(error.detail).toMatch(/^action: /);
  });

  it('rejects bodies that are not objects', () => {
    expect(expectParseError(() => parseSignal('[1,2]', receivedAt)).detail).toBe('Signal must be a JSON object');
  });
});
