import type { NormalizedPayload } from '../signals/types.js';
import { ForwardingError, type SignalSink } from './channels.js';
import { fetchWithTimeout, readReply, type HttpReply } from './http.js';

/**
 * Posts each payload as JSON to the persistence/relay endpoint, which stores
 * the row and relays the message onwards.
 */
export class WebhookSink implements SignalSink {
  name = 'webhook';

  constructor(
    private webhookUrl: string,
    private timeoutMs: number
  ) {}

  async deliver(payload: NormalizedPayload): Promise<void> {
    let reply: HttpReply;
    try {
      reply = await fetchWithTimeout(
        this.webhookUrl,
        {
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          body: JSON.stringify(payload),
        },
        this.timeoutMs,
        readReply
      );
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      throw new ForwardingError(this.name, `Webhook unreachable: ${detail}`);
    }

    if (!reply.ok) {
      throw new ForwardingError(
        this.name,
        `Webhook sink failed (${reply.status}): ${reply.body}`,
        reply.status
      );
    }
  }
}
