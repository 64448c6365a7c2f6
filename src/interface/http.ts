import fetch, { type RequestInit, type Response } from 'node-fetch';

export class RequestTimeoutError extends Error {
  constructor(readonly url: string, readonly timeoutMs: number) {
    super(`Request timed out after ${timeoutMs}ms`);
    this.name = 'RequestTimeoutError';
  }
}

/**
 * Runs `fetch` and then `read` under one abort timer, so a peer that sends
 * headers and stalls mid-body still times out.
 */
export async function fetchWithTimeout<T>(
  url: string,
  init: RequestInit,
  timeoutMs: number,
  read: (response: Response) => Promise<T>
): Promise<T> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);
  try {
    const response = await fetch(url, { ...init, signal: controller.signal });
    return await read(response);
  } catch (error) {
    if (controller.signal.aborted) {
      throw new RequestTimeoutError(url, timeoutMs);
    }
    throw error;
  } finally {
    clearTimeout(timer);
  }
}

export async function readErrorBody(response: Response): Promise<string> {
  const body = await response.text().catch(() => '');
  return body.trim().slice(0, 200) || 'no response body';
}

export type HttpReply = { ok: true } | { ok: false; status: number; body: string };

/**
 * Consumes the body either way: a 2xx body is discarded so the socket is
 * released, anything else keeps a short excerpt for the error message.
 */
export async function readReply(response: Response): Promise<HttpReply> {
  if (!response.ok) {
    return { ok: false, status: response.status, body: await readErrorBody(response) };
  }
  await response.text();
  return { ok: true };
}
