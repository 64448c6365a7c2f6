import type { NormalizedPayload } from '../signals/types.js';
import { ForwardingError, type SignalSink } from './channels.js';
import { fetchWithTimeout, readReply, type HttpReply } from './http.js';

const TELEGRAM_MAX_MESSAGE_CHARS = 4000; // Telegram hard limit is 4096; keep headroom.

/** Cuts at the last line break that fits, or hard at `maxChars` when a line is longer. */
export function splitTelegramMessage(text: string, maxChars: number = TELEGRAM_MAX_MESSAGE_CHARS): string[] {
  const chunks: string[] = [];
  let rest = text;
  while (rest.length > maxChars) {
    const newline = rest.lastIndexOf('\n', maxChars);
    const cut = newline > 0 ? newline : maxChars;
    chunks.push(rest.slice(0, cut));
    rest = rest.slice(rest[cut] === '\n' ? cut + 1 : cut);
  }
  chunks.push(rest);
  return chunks;
}

/** Sends the payload text straight to a Telegram chat via the Bot API. */
export class TelegramSink implements SignalSink {
  name = 'telegram';

  constructor(
    private token: string,
    private timeoutMs: number
  ) {
    if (!token) {
      throw new Error('Telegram sink requires a bot token');
    }
  }

  async deliver(payload: NormalizedPayload): Promise<void> {
    if (!payload.chat_id) {
      throw new ForwardingError(this.name, 'No chat_id resolved for Telegram delivery');
    }
    for (const chunk of splitTelegramMessage(payload.text)) {
      await this.sendMessage(payload.chat_id, chunk);
    }
  }

  private async sendMessage(chatId: string, text: string): Promise<void> {
    let reply: HttpReply;
    try {
      reply = await fetchWithTimeout(
        `https://api.telegram.org/bot${this.token}/sendMessage`,
        {
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          body: JSON.stringify({ chat_id: chatId, text, parse_mode: 'HTML' }),
        },
        this.timeoutMs,
        readReply
      );
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      // Transport errors echo the request URL, which carries the bot token.
      throw new ForwardingError(this.name, `Telegram unreachable: ${detail.split(this.token).join('***')}`);
    }
    if (!reply.ok) {
      throw new ForwardingError(
        this.name,
        `Telegram send failed (${reply.status}): ${reply.body}`,
        reply.status
      );
    }
  }
}
