import { setTimeout as delay } from "timers/promises";
import { fetch, type Response } from "undici";
import { logger } from "./logger.js";

export type HttpOpts = {
  headers?: Record<string, string>;
  retries?: number;
  backoffBaseMs?: number;
  timeoutMs?: number;
};

export class HttpError extends Error {
  readonly status: number;
  readonly retryable: boolean;

  constructor(status: number, message: string) {
    super(message);
    this.name = "HttpError";
    this.status = status;
    this.retryable = status === 0 || status === 429 || (status >= 500 && status < 600);
  }
}

/** GET a text body, retrying 429s, 5xxs and network errors with exponential backoff. */
export async function httpGetText(url: string, opts: HttpOpts = {}): Promise<{ url: string; text: string }> {
  const { headers = {}, retries = 2, backoffBaseMs = 500, timeoutMs = 20000 } = opts;
  let attempt = 0;
  while (true) {
    try {
      let res: Response;
      try {
        res = await fetch(url, { headers, redirect: "follow", signal: AbortSignal.timeout(timeoutMs) });
      } catch (err) {
        throw new HttpError(0, `Network error: ${err instanceof Error ? err.message : String(err)}`);
      }
      if (res.status >= 200 && res.status < 300) return { url: res.url || url, text: await res.text() };
      await res.body?.cancel();
      throw new HttpError(res.status, `HTTP ${res.status}`);
    } catch (err) {
      attempt++;
      const retryable = err instanceof HttpError && err.retryable;
      if (!retryable || attempt > retries) {
        logger.error({ url, attempt, err: String(err) }, "HTTP failed");
        throw err;
      }
      const wait = backoffBaseMs * Math.pow(2, attempt - 1);
      logger.warn({ url, attempt, wait }, "HTTP retry");
      await delay(wait + Math.random() * 250);
    }
  }
}
