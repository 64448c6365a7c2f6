import type { RelayConfig } from '../core/config.js';
import { Logger } from '../core/logger.js';
import type { NormalizedPayload } from '../signals/types.js';
import type { SignalSink } from './channels.js';
import { TelegramSink } from './telegram.js';
import { WebhookSink } from './webhook.js';

export type DeliveryReport =
  | { sink: string; ok: true }
  | { sink: string; ok: false; error: string };

export function createSinks(config: RelayConfig): SignalSink[] {
  const sinks: SignalSink[] = [];
  const webhook = config.sinks.webhook;
  if (webhook.enabled && webhook.url) {
    sinks.push(new WebhookSink(webhook.url, webhook.timeoutMs));
  }
  const telegram = config.sinks.telegram;
  if (telegram.enabled && telegram.token) {
    sinks.push(new TelegramSink(telegram.token, telegram.timeoutMs));
  }
  return sinks;
}

/**
 * Best-effort fan-out to every configured sink. Each sink runs as its own
 * task; the returned promise always resolves with one report per sink.
 */
export class ForwardingClient {
  private logger: Logger;

  constructor(
    private sinks: SignalSink[],
    logger?: Logger
  ) {
    this.logger = logger ?? new Logger('info');
  }

  get sinkNames(): string[] {
    return this.sinks.map((sink) => sink.name);
  }

  async dispatch(payload: NormalizedPayload): Promise<DeliveryReport[]> {
    return Promise.all(this.sinks.map((sink) => this.deliverTo(sink, payload)));
  }

  private async deliverTo(sink: SignalSink, payload: NormalizedPayload): Promise<DeliveryReport> {
    try {
      this.logger.debug(`Forwarding ${payload.ticker} to ${sink.name}`);
      await sink.deliver(payload);
      this.logger.info(`Forwarded ${payload.ticker} ${payload.action} to ${sink.name}`);
      return { sink: sink.name, ok: true };
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      this.logger.error(`Forwarding to ${sink.name} failed for ${payload.ticker}`, detail);
      return { sink: sink.name, ok: false, error: detail };
    }
  }
}
