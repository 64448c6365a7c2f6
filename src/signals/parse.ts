import { z } from 'zod';

import { formatDay, formatTime } from './dates.js';
import type { EntrySide, Outcome, Signal, SignalFields } from './types.js';

export class ParseError extends Error {
  readonly status = 422;

  constructor(readonly detail: string) {
    super(detail);
    this.name = 'ParseError';
  }
}

const absentIfNull = (value: unknown): unknown => (value === null ? undefined : value);

const toNumber = (value: unknown): unknown => {
  if (typeof value === 'string' && value.trim() !== '') return Number(value);
  return absentIfNull(value);
};

const requiredNumber = z.preprocess(toNumber, z.number().finite());
const level = z.preprocess(toNumber, z.number().finite().default(0));
const optionalText = z.preprocess(absentIfNull, z.string().optional());
const optionalDateText = z.preprocess(
  (value) => (typeof value === 'string' && value.trim() === '' ? undefined : absentIfNull(value)),
  z.string().trim().optional()
);

const SignalSchema = z.object({
  action: z.string().trim().min(1),
  ticker: z.string().trim().min(1),
  price: requiredNumber,
  sl: level,
  tp1: level,
  tp2: level,
  tp3: level,
  result: optionalText,
  comment: optionalText,
  chat_id: z.preprocess(absentIfNull, z.union([z.string(), z.number()]).transform(String).optional()),
  text: optionalText,
  date: optionalDateText,
  time: optionalDateText,
});

export type RawSignal = z.infer<typeof SignalSchema>;

export type ActionClass =
  | { kind: 'entry'; side: EntrySide }
  | { kind: 'outcome'; outcome: Outcome }
  | { kind: 'unrecognized' };

const ACTION_CLASSES = new Map<string, ActionClass>([
  ['buy', { kind: 'entry', side: 'buy' }],
  ['sell', { kind: 'entry', side: 'sell' }],
  ['win', { kind: 'outcome', outcome: 'win' }],
  ['tp', { kind: 'outcome', outcome: 'win' }],
  ['loss', { kind: 'outcome', outcome: 'loss' }],
  ['sl', { kind: 'outcome', outcome: 'loss' }],
]);

export function classifyAction(action: string): ActionClass {
  return ACTION_CLASSES.get(action.trim().toLowerCase()) ?? { kind: 'unrecognized' };
}

/**
 * Decodes a request body as JSON whatever content type it was sent with.
 * Some alert sources double-encode, so a JSON string holding JSON is
 * decoded once more.
 */
export function decodeBody(raw: Buffer | string): unknown {
  let text = typeof raw === 'string' ? raw : raw.toString('utf-8');
  if (text.charCodeAt(0) === 0xfeff) {
    text = text.slice(1);
  }
  if (!text.trim()) {
    throw new ParseError('Request body is empty');
  }

  const decode = (input: string): unknown => {
    try {
      return JSON.parse(input);
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      throw new ParseError(`Request body is not valid JSON: ${detail}`);
    }
  };

  const value = decode(text);
  if (typeof value === 'string' && value.trim().startsWith('{')) {
    return decode(value);
  }
  return value;
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.join('.');
      return path ? `${path}: ${issue.message}` : issue.message;
    })
    .join('; ');
}

export function validateSignal(value: unknown): RawSignal {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new ParseError('Signal must be a JSON object');
  }
  const parsed = SignalSchema.safeParse(value);
  if (!parsed.success) {
    throw new ParseError(describeIssues(parsed.error));
  }
  return parsed.data;
}

/** Stamps and classifies a validated signal. */
export function buildSignal(raw: RawSignal, receivedAt: Date): Signal {
  const fields: SignalFields = {
    action: raw.action,
    ticker: raw.ticker,
    price: raw.price,
    sl: raw.sl,
    tp1: raw.tp1,
    tp2: raw.tp2,
    tp3: raw.tp3,
    result: raw.result,
    comment: raw.comment,
    chatId: raw.chat_id,
    text: raw.text,
    date: raw.date || formatDay(receivedAt),
    time: raw.time || formatTime(receivedAt),
    receivedAt,
  };

  const cls = classifyAction(raw.action);
  switch (cls.kind) {
    case 'entry':
      return { ...fields, kind: 'entry', side: cls.side };
    case 'outcome':
      return { ...fields, kind: 'outcome', outcome: cls.outcome };
    case 'unrecognized':
      return { ...fields, kind: 'unrecognized' };
  }
}

export function parseSignal(raw: Buffer | string, receivedAt: Date): Signal {
  return buildSignal(validateSignal(decodeBody(raw)), receivedAt);
}
