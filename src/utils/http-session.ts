/**
 * HTTP Session
 * One client per pipeline worker, each with its own connection pool
 */

import { Agent, type Dispatcher } from "undici";
import { RequestTimeoutError } from "../errors";
import { WorkerLocal } from "./worker-scope";

export interface SessionRequestInit {
  method: "GET";
  headers: Record<string, string>;
  signal: AbortSignal;
  dispatcher: Dispatcher;
}

export type FetchLike = (
  input: string,
  init: SessionRequestInit,
) => Promise<Response>;

export interface HttpSessionOptions {
  headers?: Record<string, string>;
  fetch?: FetchLike;
  /** Connection pool for this session's requests; a new Agent by default */
  dispatcher?: Dispatcher;
}

export const DEFAULT_TIMEOUT = 5000;

export class HttpSession {
  readonly dispatcher: Dispatcher;
  private headers: Record<string, string>;
  private fetchImpl: FetchLike;
  private requestCount = 0;

  constructor(options: HttpSessionOptions = {}) {
    this.headers = { ...options.headers };
    this.dispatcher = options.dispatcher ?? new Agent();
    // Resolved per call so a stubbed global fetch is picked up
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  get requests(): number {
    return this.requestCount;
  }

  /**
   * GET `url` and pass the response to `consume`
   *
   * The timeout covers the whole exchange: waiting for headers and
   * everything `consume` does with the body. Past it the request is aborted
   * and the call rejects with RequestTimeoutError.
   */
  async request<R>(
    url: string,
    timeout: number,
    consume: (response: Response) => Promise<R>,
  ): Promise<R> {
    const controller = new AbortController();
    const timedOut = new Promise<never>((_resolve, reject) => {
      controller.signal.addEventListener(
        "abort",
        () => reject(new RequestTimeoutError(url, timeout)),
        { once: true },
      );
    });
    const timeoutId = setTimeout(() => controller.abort(), timeout);
    this.requestCount++;

    try {
      const response = await Promise.race([
        this.fetchImpl(url, {
          method: "GET",
          headers: this.headers,
          signal: controller.signal,
          dispatcher: this.dispatcher,
        }),
        timedOut,
      ]);
      return await Promise.race([consume(response), timedOut]);
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

const workerSession = new WorkerLocal(() => new HttpSession());

/**
 * Session owned by the calling worker, created on first use
 */
export function getSession(): HttpSession {
  return workerSession.get();
}
