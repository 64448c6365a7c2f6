import { Logger } from '../core/logger.js';
import type { DeliveryReport, ForwardingClient } from '../interface/forwarder.js';
import type { ApplyResult, SignalLedger } from './ledger.js';
import { normalizePayload } from './message.js';
import { parseSignal } from './parse.js';
import type { NormalizedPayload, Signal } from './types.js';

export interface IngestResult {
  signal: Signal;
  applied: ApplyResult;
  payload: NormalizedPayload;
  /** Forwarding task; resolves once every sink has answered or failed. */
  delivery: Promise<DeliveryReport[]>;
}

export interface IngestionPipelineOptions {
  ledger: SignalLedger;
  forwarder: ForwardingClient;
  defaultChatId?: string;
  logger?: Logger;
  now?: () => Date;
}

export class IngestionPipeline {
  private ledger: SignalLedger;
  private forwarder: ForwardingClient;
  private defaultChatId?: string;
  private logger: Logger;
  private now: () => Date;

  constructor(options: IngestionPipelineOptions) {
    this.ledger = options.ledger;
    this.forwarder = options.forwarder;
    this.defaultChatId = options.defaultChatId;
    this.logger = options.logger ?? new Logger('info');
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Parses, applies and forwards one raw event. Throws `ParseError` before
   * touching any state when the body is unusable.
   */
  ingest(raw: Buffer | string): IngestResult {
    const signal = parseSignal(raw, this.now());

    const applied = this.ledger.apply(signal);
    if (applied === 'ignored') {
      this.logger.warn(`Unrecognized action "${signal.action}" for ${signal.ticker}; stats unchanged`);
    } else {
      this.logger.info(`Signal received: ${signal.ticker} ${signal.action}`);
    }

    const payload = normalizePayload(signal, this.defaultChatId);
    const delivery = this.forwarder.dispatch(payload).catch((error: unknown): DeliveryReport[] => {
      this.logger.error('Forwarding task failed', error);
      return [];
    });

    return { signal, applied, payload, delivery };
  }
}
