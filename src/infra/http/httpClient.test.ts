import { afterEach, describe, expect, it, vi } from "vitest";
import { HttpClient } from "./httpClient";

type FetchHandler = (...args: Parameters<typeof fetch>) => ReturnType<typeof fetch>;

const serve = (handler: FetchHandler): void => {
  vi.stubGlobal("fetch", handler);
};

const get = (path: string, timeoutMs = 500, deadline?: Date) => ({
  url: `https://datasets.example.test/${path}`,
  timeoutMs,
  deadline,
});

/**
 * Never settles on its own; rejects like undici once the signal aborts.
 */
const hangUntilAborted: FetchHandler = (_input, init) =>
  new Promise<Response>((_resolve, reject) => {
    init?.signal?.addEventListener("abort", () => {
      reject(Object.assign(new Error("This operation was aborted"), { name: "AbortError" }));
    });
  });

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("HttpClient", () => {
  const client = new HttpClient();

  it("parses JSON payloads without asserting their shape", async () => {
    serve(async () => Response.json([{ data: "01/02/2024", valor: "1,5" }]));

    const body = (await client.requestJson(get("sgs.json")))._unsafeUnwrap();

    expect(body).toEqual([{ data: "01/02/2024", valor: "1,5" }]);
  });

  it("downloads binary assets as a Buffer", async () => {
    serve(async () => new Response(new Uint8Array([0x1f, 0x8b, 0x08])));

    const bytes = (await client.requestBytes(get("abecip.json.gz")))._unsafeUnwrap();

    expect(Buffer.isBuffer(bytes)).toBe(true);
    expect([...bytes]).toEqual([0x1f, 0x8b, 0x08]);
  });

  it("sends a single request and leaves retrying to the caller", async () => {
    const calls: string[] = [];
    serve(async (input) => {
      calls.push(String(input));
      throw new TypeError("fetch failed");
    });

    const failure = (await client.requestJson(get("flaky")))._unsafeUnwrapErr();

    expect(calls).toEqual(["https://datasets.example.test/flaky"]);
    expect(failure).toMatchObject({
      code: "transport_error",
      message: "fetch failed",
      retryable: true,
    });
  });

  it.each([
    [503, true],
    [429, true],
    [404, false],
    [401, false],
  ])("classifies HTTP %i as retryable=%s", async (status, retryable) => {
    serve(async () => new Response("nope", { status }));

    const failure = (await client.requestBytes(get("status")))._unsafeUnwrapErr();

    expect(failure).toMatchObject({
      code: "non_success_status",
      message: `HTTP request failed with status ${status}.`,
      httpStatus: status,
      retryable,
    });
  });

  it("aborts slow responses once the timeout elapses", async () => {
    serve(hangUntilAborted);

    const failure = (await client.requestJson(get("slow", 5)))._unsafeUnwrapErr();

    expect(failure).toMatchObject({
      code: "timeout",
      message: "HTTP request timed out after 5ms.",
      retryable: true,
    });
  });

  it("does not start a request after the deadline", async () => {
    const fetchSpy = vi.fn<FetchHandler>(async () => new Response("{}"));
    serve(fetchSpy);

    const failure = (
      await client.requestJson(get("late", 500, new Date(Date.now() - 1_000)))
    )._unsafeUnwrapErr();

    expect(fetchSpy).not.toHaveBeenCalled();
    expect(failure.code).toBe("deadline_exceeded");
  });

  it("rejects bodies that are not JSON without retrying", async () => {
    serve(async () => new Response("<html>maintenance</html>"));

    const failure = (await client.requestJson(get("broken")))._unsafeUnwrapErr();

    expect(failure).toMatchObject({ code: "invalid_json", retryable: false });
  });
});
