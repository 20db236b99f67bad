import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from "vitest";
import { getBytes, getResponse, isConnectionError } from "./get-response";
import { Logger } from "./logger";
import {
  DeclinedFetchError,
  HttpError,
  RequestTimeoutError,
  RetryableHttpError,
} from "../errors";

const IMAGE_URL = "https://images.test/cat.png";

function respond(status: number): Response {
  return new Response(status === 200 ? "image-bytes" : null, { status });
}

function endlessBody(): ReadableStream<Uint8Array> {
  return new ReadableStream<Uint8Array>({
    start(controller) {
      controller.enqueue(new Uint8Array([1, 2, 3]));
    },
  });
}

describe("getResponse", () => {
  let fetchMock: Mock<(input: string, init?: RequestInit) => Promise<Response>>;
  let sleep: Mock<(ms: number) => Promise<void>>;
  const logger = new Logger("warn");

  beforeEach(() => {
    fetchMock = vi.fn<(input: string, init?: RequestInit) => Promise<Response>>();
    sleep = vi.fn<(ms: number) => Promise<void>>(async () => {});
    vi.stubGlobal("fetch", fetchMock);
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  it("returns a 200 response", async () => {
    fetchMock.mockResolvedValueOnce(respond(200));

    const response = await getResponse(IMAGE_URL, { sleep, logger });

    expect(response.status).toBe(200);
    expect(await response.text()).toBe("image-bytes");
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(fetchMock.mock.calls[0][0]).toBe(IMAGE_URL);
  });

  it.each([403, 404])("declines %i without retrying and logs it", async (status) => {
    fetchMock.mockResolvedValue(respond(status));

    const error = await getResponse(IMAGE_URL, { sleep, logger }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(DeclinedFetchError);
    expect(error).toMatchObject({ url: IMAGE_URL, status });
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
    expect(console.error).toHaveBeenCalledWith(
      `[ERROR] Failed to download ${IMAGE_URL} with status code ${status}`,
    );
  });

  it.each([400, 418])("raises HttpError for %i without retrying", async (status) => {
    fetchMock.mockResolvedValue(respond(status));

    const error = await getResponse(IMAGE_URL, { sleep, logger }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(HttpError);
    expect(error).not.toBeInstanceOf(RetryableHttpError);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("retries 5xx responses with exponential backoff", async () => {
    fetchMock
      .mockResolvedValueOnce(respond(503))
      .mockResolvedValueOnce(respond(500))
      .mockResolvedValueOnce(respond(200));

    const response = await getResponse(IMAGE_URL, { sleep, logger });

    expect(response.status).toBe(200);
    expect(fetchMock).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls).toEqual([[1000], [2000]]);
  });

  it("gives up after ten attempts on persistent 5xx", async () => {
    fetchMock.mockImplementation(async () => respond(503));

    const error = await getResponse(IMAGE_URL, { sleep, logger }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RetryableHttpError);
    expect(fetchMock).toHaveBeenCalledTimes(10);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([
      1000, 2000, 4000, 8000, 10000, 10000, 10000, 10000, 10000,
    ]);
  });

  it("retries connection errors", async () => {
    fetchMock
      .mockRejectedValueOnce(new TypeError("fetch failed"))
      .mockResolvedValueOnce(respond(200));

    const response = await getResponse(IMAGE_URL, { sleep, logger });

    expect(response.status).toBe(200);
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it("honours a custom retry policy", async () => {
    fetchMock.mockImplementation(async () => respond(502));

    await expect(
      getResponse(IMAGE_URL, { sleep, logger, retry: { maxAttempts: 2, initialDelay: 5 } }),
    ).rejects.toBeInstanceOf(RetryableHttpError);
    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(sleep.mock.calls).toEqual([[5]]);
  });

  it("fails a malformed URL without fetching or retrying", async () => {
    const error = await getResponse("not a url", { sleep, logger }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TypeError);
    expect(error).toMatchObject({ message: "Invalid URL: not a url" });
    expect(fetchMock).not.toHaveBeenCalled();
    expect(sleep).not.toHaveBeenCalled();
  });

  it("does not retry TypeErrors other than network failures", async () => {
    fetchMock.mockRejectedValue(new TypeError("Headers.append: invalid header value"));

    await expect(getResponse(IMAGE_URL, { sleep, logger })).rejects.toThrow(
      "Headers.append: invalid header value",
    );
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("cancels the body of every rejected response", async () => {
    let cancelled = 0;
    const discarded = (status: number) =>
      new Response(
        new ReadableStream<Uint8Array>({
          cancel() {
            cancelled++;
          },
        }),
        { status },
      );
    fetchMock
      .mockResolvedValueOnce(discarded(503))
      .mockResolvedValueOnce(discarded(502))
      .mockResolvedValueOnce(respond(200));

    await getResponse(IMAGE_URL, { sleep, logger });
    expect(cancelled).toBe(2);

    fetchMock.mockResolvedValueOnce(discarded(404));
    await expect(getResponse(IMAGE_URL, { sleep, logger })).rejects.toBeInstanceOf(
      DeclinedFetchError,
    );
    expect(cancelled).toBe(3);
  });

  it("times out and retries when the body stalls", async () => {
    fetchMock.mockImplementation(async () => new Response(endlessBody()));

    const error = await getBytes(IMAGE_URL, {
      sleep,
      logger,
      timeout: 30,
      retry: { maxAttempts: 2 },
    }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RequestTimeoutError);
    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(sleep.mock.calls).toEqual([[1000]]);
  });

  it("returns the body bytes", async () => {
    fetchMock.mockResolvedValueOnce(respond(200));

    const bytes = await getBytes(IMAGE_URL, { sleep, logger });

    expect(bytes.toString("utf-8")).toBe("image-bytes");
  });
});

describe("isConnectionError", () => {
  it("recognises network failures and timeouts", () => {
    const abort = new Error("aborted");
    abort.name = "AbortError";

    expect(isConnectionError(new TypeError("fetch failed"))).toBe(true);
    expect(isConnectionError(abort)).toBe(true);
    expect(isConnectionError(new RequestTimeoutError(IMAGE_URL, 50))).toBe(true);
    expect(isConnectionError(new TypeError("Failed to parse URL from not a url"))).toBe(false);
    expect(isConnectionError(new HttpError(IMAGE_URL, 500))).toBe(false);
    expect(isConnectionError("boom")).toBe(false);
  });
});
