import type { NormalizedPayload, Signal } from './types.js';

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(value: unknown): string {
  return String(value ?? '').replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

export function directionMarker(action: string): string {
  return action.toLowerCase().includes('buy') ? '🟢' : '🔴';
}

/** Telegram-flavoured HTML summary used when the caller sends no `text`. */
export function formatSignalMessage(signal: Signal): string {
  return [
    `${directionMarker(signal.action)} <b>SIGNAL RECEIVED</b>`,
    `<b>Ticker:</b> ${escapeHtml(signal.ticker)}`,
    `<b>Action:</b> ${escapeHtml(signal.action)}`,
    `<b>Price:</b> ${signal.price}`,
    `<b>TP1:</b> ${signal.tp1} | <b>TP2:</b> ${signal.tp2} | <b>TP3:</b> ${signal.tp3}`,
    `<b>SL:</b> ${signal.sl}`,
  ].join('\n');
}

export function normalizePayload(signal: Signal, defaultChatId: string | undefined): NormalizedPayload {
  const payload: NormalizedPayload = {
    action: signal.action,
    ticker: signal.ticker,
    price: signal.price,
    sl: signal.sl,
    tp1: signal.tp1,
    tp2: signal.tp2,
    tp3: signal.tp3,
    date: signal.date,
    time: signal.time,
    chat_id: signal.chatId || defaultChatId || '',
    text: signal.text || formatSignalMessage(signal),
  };
  if (signal.result !== undefined) payload.result = signal.result;
  if (signal.comment !== undefined) payload.comment = signal.comment;
  return payload;
}
