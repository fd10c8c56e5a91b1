import { describe, it, expect, vi } from "vitest";
import pino from "pino";
import { HttpEmailChannel, HttpWebhookChannel, LogEmailChannel } from "../src/channels.js";
import type { FetchFn } from "../src/channels.js";

const MESSAGE = { from: "gate@example.com", to: "lead@example.com", subject: "Hi", html: "<p>x</p>" };

function never(): AbortSignal {
  return new AbortController().signal;
}

describe("HttpEmailChannel", () => {
  it("posts the message as JSON with the relay key", async () => {
    const fetchFn = vi.fn<FetchFn>(() => Promise.resolve(new Response(null, { status: 202 })));
    const channel = new HttpEmailChannel({ url: "https://relay.example.com/send", apiKey: "test-secret", fetchFn });

    const result = await channel.send(MESSAGE, never());

    expect(result.ok).toBe(true);
    expect(fetchFn).toHaveBeenCalledTimes(1);
    const [url, init] = fetchFn.mock.calls[0]!;
    expect(url).toBe("https://relay.example.com/send");
    expect(init?.method).toBe("POST");
    expect(init?.headers).toEqual({ "Content-Type": "application/json", Authorization: "Bearer test-secret" });
    expect(JSON.parse(String(init?.body))).toEqual(MESSAGE);
  });

  it("reports a non-2xx response as HTTP_STATUS", async () => {
    const fetchFn = vi.fn<FetchFn>(() => Promise.resolve(new Response("nope", { status: 502 })));
    const result = await new HttpEmailChannel({ url: "https://relay.example.com/send", fetchFn }).send(
      MESSAGE,
      never(),
    );

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe("HTTP_STATUS");
      expect(result.error.status).toBe(502);
      expect(result.error.message).toBe("https://relay.example.com/send responded 502");
    }
  });

  it("reports a network failure as TRANSPORT", async () => {
    const fetchFn = vi.fn<FetchFn>(() => Promise.reject(new TypeError("fetch failed")));
    const result = await new HttpEmailChannel({ url: "https://relay.example.com/send", fetchFn }).send(
      MESSAGE,
      never(),
    );

    expect(result).toMatchObject({ ok: false, error: { code: "TRANSPORT", message: "fetch failed" } });
  });

  it("reports an aborted attempt as TIMEOUT", async () => {
    const controller = new AbortController();
    controller.abort();
    const fetchFn = vi.fn<FetchFn>(() => Promise.reject(new Error("aborted")));

    const result = await new HttpEmailChannel({ url: "https://relay.example.com/send", fetchFn }).send(
      MESSAGE,
      controller.signal,
    );

    expect(result).toMatchObject({ ok: false, error: { code: "TIMEOUT" } });
  });
});

describe("response bodies", () => {
  function trackedResponse(status: number): { response: Response; cancelled: () => boolean } {
    let cancelled = false;
    const body = new ReadableStream<Uint8Array>({
      cancel() {
        cancelled = true;
      },
    });
    return { response: new Response(body, { status }), cancelled: () => cancelled };
  }

  it("cancels the body of a successful response", async () => {
    const tracked = trackedResponse(200);
    const fetchFn = vi.fn<FetchFn>(() => Promise.resolve(tracked.response));

    const result = await new HttpWebhookChannel({ fetchFn }).post("https://chat.example.com/hook", {}, never());

    expect(result.ok).toBe(true);
    expect(tracked.cancelled()).toBe(true);
  });

  it("cancels the body of a failed response", async () => {
    const tracked = trackedResponse(500);
    const fetchFn = vi.fn<FetchFn>(() => Promise.resolve(tracked.response));

    const result = await new HttpEmailChannel({ url: "https://relay.example.com/send", fetchFn }).send(
      MESSAGE,
      never(),
    );

    expect(result).toMatchObject({ ok: false, error: { code: "HTTP_STATUS", status: 500 } });
    expect(tracked.cancelled()).toBe(true);
  });
});

describe("HttpWebhookChannel", () => {
  it("posts the payload to the given URL", async () => {
    const fetchFn = vi.fn<FetchFn>(() => Promise.resolve(new Response(null, { status: 200 })));
    const result = await new HttpWebhookChannel({ fetchFn }).post("https://chat.example.com/hook", { a: 1 }, never());

    expect(result.ok).toBe(true);
    const [url, init] = fetchFn.mock.calls[0]!;
    expect(url).toBe("https://chat.example.com/hook");
    expect(init?.headers).toEqual({ "Content-Type": "application/json" });
    expect(String(init?.body)).toBe('{"a":1}');
  });
});

describe("LogEmailChannel", () => {
  it("logs instead of sending", async () => {
    const lines: string[] = [];
    const logger = pino({ base: null }, { write: (line: string) => void lines.push(line) });

    const result = await new LogEmailChannel(logger).send(MESSAGE);

    expect(result.ok).toBe(true);
    expect(JSON.parse(lines[0]!)).toMatchObject({
      to: "lead@example.com",
      subject: "Hi",
      msg: "email not sent: no mail relay configured",
    });
  });
});
