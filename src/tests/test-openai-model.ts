import OpenAI from "openai";
import { expect, test } from "vitest";
import { RateLimiter } from "../llm/rateLimiter.js";
import { OpenAINarrativeModel } from "../narrative/openaiModel.js";
import { UpstreamUnavailableError } from "../turn/errors.js";
import { withTimeout } from "../utils/withTimeout.js";

test("a wait on the rate limiter counts against the request timeout", async () => {
  const waits: number[] = [];
  const limiter = new RateLimiter(
    1,
    () => 0,
    (ms) => {
      waits.push(ms);
      return new Promise<void>(() => {});
    },
  );
  await limiter.acquire();

  const model = new OpenAINarrativeModel({
    model: "gpt-4o-mini",
    maxTokens: 100,
    timeoutMs: 20,
    limiter,
    client: () => new OpenAI({ apiKey: "test-key", maxRetries: 0 }),
  });

  await expect(model.complete({ system: "Narrate.", messages: [], temperature: 0.5 })).rejects.toThrow(
    new UpstreamUnavailableError("llm", "chat completion timed out after 20ms"),
  );
  expect(waits).toEqual([60_000]);
  expect(limiter.remaining()).toBe(0);
});

test("a timeout aborts the work it was racing", async () => {
  const controller = new AbortController();
  const work = new Promise<string>((_, reject) => {
    controller.signal.addEventListener("abort", () => reject(new Error("aborted")));
  });

  await expect(withTimeout(work, 10, "search", "section search", controller)).rejects.toThrow(
    "section search timed out after 10ms",
  );
  expect(controller.signal.aborted).toBe(true);
});

test("failures are reported as upstream errors without a timeout", async () => {
  const err = await withTimeout(Promise.reject(new Error("connection reset")), 1000, "llm", "chat completion").catch(
    (e: unknown) => e,
  );
  expect(err).toBeInstanceOf(UpstreamUnavailableError);
  expect(err).toMatchObject({ message: "chat completion failed: connection reset" });
});
