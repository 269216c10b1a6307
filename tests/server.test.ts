import dgram from "node:dgram";
import { afterEach, describe, expect, it, vi } from "vitest";
import { loadConfiguration } from "../src/config";
import { InferenceError, ModelAttemptError } from "../src/errors";
import type { Completer } from "../src/inference-client";
import { RateLimiter } from "../src/rate-limiter";
import { type GatewayContext, type GatewayServer, handlePacket, startServer } from "../src/server";
import type { CompletionResult } from "../src/types";
import { answerText, buildQuery, parseResponse, silentLogger, testConfig } from "./support/dns";

function completer(complete: (prompt: string, models: readonly string[]) => Promise<CompletionResult>) {
  const fn = vi.fn(complete);
  const value: Completer = { complete: fn };
  return { value, fn };
}

function context(target: Completer, limiter: RateLimiter | null = null): GatewayContext {
  return { config: testConfig(), completer: target, logger: silentLogger, limiter };
}

async function reply(ctx: GatewayContext, packet: Uint8Array): Promise<Uint8Array> {
  const response = await handlePacket(ctx, packet, "127.0.0.1");
  if (!response) throw new Error("Expected a reply");
  return response;
}

describe("handlePacket", () => {
  it("answers a TXT query with the completion", async () => {
    const stub = completer(async () => ({ model: "m2", text: "hello" }));

    const response = await reply(context(stub.value), buildQuery("what.is-rust.example", "TXT", { id: 77 }));

    expect(stub.fn).toHaveBeenCalledWith("what is-rust example", ["m1", "m2", "m3"]);
    const parsed = parseResponse(response);
    expect(parsed.id).toBe(77);
    expect(parsed.rcode).toBe("NOERROR");
    expect(answerText(response)).toBe("hello");
  });

  it("returns a long completion intact across several strings", async () => {
    const text = "a".repeat(1000);
    const stub = completer(async () => ({ model: "m1", text }));

    expect(answerText(await reply(context(stub.value), buildQuery("long")))).toBe(text);
  });

  it("answers NOTIMP without calling the model for other record types", async () => {
    const stub = completer(async () => ({ model: "m1", text: "unused" }));

    const parsed = parseResponse(await reply(context(stub.value), buildQuery("hello", "A")));

    expect(parsed.rcode).toBe("NOTIMP");
    expect(parsed.answers).toEqual([]);
    expect(stub.fn).not.toHaveBeenCalled();
  });

  it("answers SERVFAIL when every model fails", async () => {
    const stub = completer(async () => {
      throw new InferenceError("ALL_MODELS_FAILED", "All models failed", [
        new ModelAttemptError("m1", "rate_limited", "Rate limit exceeded (429)", 429),
      ]);
    });

    const parsed = parseResponse(await reply(context(stub.value), buildQuery("hello")));

    expect(parsed.rcode).toBe("SERVFAIL");
    expect(parsed.answers).toEqual([]);
    expect(parsed.questions).toEqual([{ name: "hello", type: "TXT", class: "IN" }]);
  });

  it("answers SERVFAIL on unexpected errors", async () => {
    const stub = completer(async () => {
      throw new Error("boom");
    });

    expect(parseResponse(await reply(context(stub.value), buildQuery("hello"))).rcode).toBe("SERVFAIL");
  });

  it("answers FORMERR when only the header is readable", async () => {
    const stub = completer(async () => ({ model: "m1", text: "unused" }));
    const packet = Uint8Array.from([0x0a, 0x0b, 0, 0, 0, 2, 0, 0, 0, 0, 0, 0]);

    const parsed = parseResponse(await reply(context(stub.value), packet));

    expect(parsed.id).toBe(0x0a0b);
    expect(parsed.rcode).toBe("FORMERR");
  });

  it("drops packets too short to carry an id", async () => {
    const stub = completer(async () => ({ model: "m1", text: "unused" }));

    expect(await handlePacket(context(stub.value), Uint8Array.of(1), "127.0.0.1")).toBeNull();
  });

  it("refuses clients over their rate limit", async () => {
    const stub = completer(async () => ({ model: "m1", text: "ok" }));
    const ctx = context(stub.value, new RateLimiter({ qps: 1, burst: 1, blockSeconds: 60 }));

    expect(parseResponse(await reply(ctx, buildQuery("first"))).rcode).toBe("NOERROR");
    expect(parseResponse(await reply(ctx, buildQuery("second"))).rcode).toBe("REFUSED");
    expect(stub.fn).toHaveBeenCalledTimes(1);
  });

  it("answers every query from one client when rate limiting is left at its default", async () => {
    const stub = completer(async () => ({ model: "m1", text: "ok" }));
    const defaults = loadConfiguration({ OPENROUTER_API_KEY: "test-secret" });
    const ctx = context(stub.value, new RateLimiter(defaults.rateLimit));

    const rcodes: string[] = [];
    for (let i = 0; i < 25; i++) {
      rcodes.push(String(parseResponse(await reply(ctx, buildQuery("hello"))).rcode));
    }

    expect(rcodes).toEqual(Array(25).fill("NOERROR"));
  });
});

describe("startServer", () => {
  let server: GatewayServer | null = null;
  let client: dgram.Socket | null = null;

  afterEach(async () => {
    client?.close();
    client = null;
    await server?.close();
    server = null;
  });

  it("keeps answering after a datagram it cannot read", async () => {
    const stub = completer(async (prompt) => ({ model: "m1", text: `answer to ${prompt}` }));
    server = await startServer(context(stub.value));
    const socket = dgram.createSocket("udp4");
    client = socket;

    const received = new Promise<Uint8Array>((resolve) => {
      socket.once("message", (message) => resolve(new Uint8Array(message)));
    });
    const port = server.address.port;
    socket.send(Uint8Array.of(1), port, "127.0.0.1");
    socket.send(buildQuery("still here", "TXT", { id: 9 }), port, "127.0.0.1");

    const response = await received;
    expect(parseResponse(response).id).toBe(9);
    expect(answerText(response)).toBe("answer to still here");
  });

  it("answers over UDP without letting a slow query hold up a fast one", async () => {
    let releaseSlow: () => void = () => {};
    const slowGate = new Promise<void>((resolve) => {
      releaseSlow = resolve;
    });
    const stub = completer(async (prompt) => {
      if (prompt === "slow") {
        await slowGate;
      }
      return { model: "m1", text: `answer to ${prompt}` };
    });

    server = await startServer(context(stub.value));
    const socket = dgram.createSocket("udp4");
    client = socket;

    const replies: Uint8Array[] = [];
    const waiters: Array<() => void> = [];
    socket.on("message", (message) => {
      replies.push(new Uint8Array(message));
      waiters.shift()?.();
    });
    const nextReply = () =>
      new Promise<Uint8Array>((resolve) => {
        const take = () => {
          const next = replies.shift();
          if (next) resolve(next);
        };
        if (replies.length > 0) take();
        else waiters.push(take);
      });

    const port = server.address.port;
    socket.send(buildQuery("slow", "TXT", { id: 1 }), port, "127.0.0.1");
    await vi.waitFor(() => expect(stub.fn).toHaveBeenCalledTimes(1));
    socket.send(buildQuery("fast", "TXT", { id: 2 }), port, "127.0.0.1");

    const first = await nextReply();
    expect(parseResponse(first).id).toBe(2);
    expect(answerText(first)).toBe("answer to fast");

    releaseSlow();
    const second = await nextReply();
    expect(parseResponse(second).id).toBe(1);
    expect(answerText(second)).toBe("answer to slow");
  });
});
