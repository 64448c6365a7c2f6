import type { NormalizedPayload } from '../signals/types.js';

/** A downstream destination for normalized signals. */
export interface SignalSink {
  name: string;
  deliver(payload: NormalizedPayload): Promise<void>;
}

export class ForwardingError extends Error {
  constructor(
    readonly sink: string,
    message: string,
    readonly status?: number
  ) {
    super(message);
    this.name = 'ForwardingError';
  }
}
