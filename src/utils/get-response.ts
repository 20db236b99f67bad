/**
 * Fetch a URL with status-code policy and retry logic
 */

import {
  DeclinedFetchError,
  formatError,
  HttpError,
  RequestTimeoutError,
  RetryableHttpError,
} from "../errors";
import { getSession, DEFAULT_TIMEOUT } from "./http-session";
import { logger as defaultLogger, type Logger } from "./logger";
import { DEFAULT_RETRY_POLICY, withRetry, type RetryPolicy } from "./retry";

export interface FetchOptions {
  /** Timeout in milliseconds for each attempt, body included */
  timeout?: number;
  retry?: Partial<RetryPolicy>;
  /** Replaces the backoff sleep, mainly for tests */
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

/**
 * Failures worth another attempt: timeouts, aborts, and the
 * TypeError("fetch failed") fetch raises when the connection itself fails.
 * Other TypeErrors (a malformed URL, a bad header) are not retried.
 */
export function isConnectionError(error: unknown): boolean {
  if (error instanceof RequestTimeoutError) return true;
  if (!(error instanceof Error)) return false;
  if (error.name === "AbortError" || error.name === "TimeoutError") return true;
  return error instanceof TypeError && error.message === "fetch failed";
}

function shouldRetry(error: unknown): boolean {
  return error instanceof RetryableHttpError || isConnectionError(error);
}

/**
 * Apply the status policy:
 * - 200: accept
 * - 5xx: retryable
 * - 403, 404: declined (logged, not retried)
 * - anything else: HttpError
 *
 * The body of a rejected response is cancelled so its connection can be
 * reused.
 */
export async function checkStatus(
  url: string,
  response: Response,
  logger: Logger,
): Promise<void> {
  const { status } = response;

  if (status === 200) {
    return;
  }
  await response.body?.cancel();

  if (status >= 500 && status < 600) {
    logger.debug(`Retrying ${url} with status code ${status}`);
    throw new RetryableHttpError(url, status);
  }
  if (status === 403 || status === 404) {
    const error = new DeclinedFetchError(url, status);
    logger.error(error.message);
    throw error;
  }
  throw new HttpError(url, status);
}

/**
 * GET `url` with the calling worker's session, check the status and hand the
 * response to `read` inside the timed section
 */
async function fetchChecked<R>(
  url: string,
  options: FetchOptions,
  read: (response: Response) => Promise<R>,
): Promise<R> {
  if (!URL.canParse(url)) {
    throw new TypeError(`Invalid URL: ${url}`);
  }

  const logger = options.logger ?? defaultLogger;
  const timeout = options.timeout ?? DEFAULT_TIMEOUT;
  const policy = { ...DEFAULT_RETRY_POLICY, ...options.retry };

  return withRetry(
    () =>
      getSession().request(url, timeout, async (response) => {
        await checkStatus(url, response, logger);
        return read(response);
      }),
    {
      ...policy,
      shouldRetry,
      sleep: options.sleep,
      onRetry: (error, attempt, delay) => {
        logger.debug(
          `Attempt ${attempt}/${policy.maxAttempts} for ${url} failed (${formatError(error)}); retrying in ${delay}ms`,
        );
      },
    },
  );
}

/**
 * GET `url` and return the response with its body fully read
 *
 * Retries 5xx responses and connection errors with exponential backoff
 * (1s doubling up to 10s, 10 attempts by default). After the last attempt
 * the last error propagates. A malformed URL fails at once.
 */
export async function getResponse(
  url: string,
  options: FetchOptions = {},
): Promise<Response> {
  return fetchChecked(
    url,
    options,
    async (response) =>
      new Response(await response.arrayBuffer(), {
        status: response.status,
        statusText: response.statusText,
        headers: response.headers,
      }),
  );
}

/**
 * GET `url` and return the body bytes, with the same policy as getResponse
 */
export async function getBytes(
  url: string,
  options: FetchOptions = {},
): Promise<Buffer> {
  return fetchChecked(url, options, async (response) =>
    Buffer.from(await response.arrayBuffer()),
  );
}
