import { describe, expect, it } from "vitest";
import { RemoteCaptchaSolver } from "../src/captcha/remoteSolver";
import { CaptchaError } from "../src/core/errors";
import type { FetchLike, HttpRequestInit } from "../src/core/fetch";
import { createTestLogger } from "./helpers";

interface RecordedCall {
  url: string;
  init: HttpRequestInit;
}

function scriptedFetch(responses: Array<{ status?: number; body: string }>): { fetchFn: FetchLike; calls: RecordedCall[] } {
  const calls: RecordedCall[] = [];
  const fetchFn: FetchLike = async (url, init) => {
    calls.push({ url, init });
    const next = responses.shift();
    if (!next) {
      throw new Error("no scripted response left");
    }
    const status = next.status ?? 200;
    return { ok: status >= 200 && status < 300, status, text: async () => next.body };
  };
  return { fetchFn, calls };
}

const CHALLENGE = { imageBytes: Buffer.from("png-bytes"), discoveredAt: "2025-03-01T09:15:42.120Z" };

function solver(fetchFn: FetchLike, delays: number[], maxPolls = 30): RemoteCaptchaSolver {
  const { logger } = createTestLogger();
  return new RemoteCaptchaSolver({
    apiKey: "test-secret",
    fetchFn,
    logger,
    baseUrl: "https://solver.test/",
    maxPolls,
    sleep: async (ms) => {
      delays.push(ms);
    },
  });
}

describe("RemoteCaptchaSolver", () => {
  it("uploads the image and polls until the answer is ready", async () => {
    const { fetchFn, calls } = scriptedFetch([
      { body: '{"status":1,"request":"job-42"}' },
      { body: '{"status":0,"request":"CAPCHA_NOT_READY"}' },
      { body: '{"status":1,"request":"kwpxz"}' },
    ]);
    const delays: number[] = [];

    await expect(solver(fetchFn, delays).attempt(CHALLENGE)).resolves.toBe("kwpxz");

    expect(calls[0].url).toBe("https://solver.test/in.php");
    expect(calls[0].init.method).toBe("POST");
    expect(calls[0].init.body).toBe(
      `key=test-secret&method=base64&body=${encodeURIComponent(Buffer.from("png-bytes").toString("base64"))}&json=1`,
    );
    expect(calls[1].url).toBe("https://solver.test/res.php?key=test-secret&action=get&id=job-42&json=1");
    expect(calls[1].init.method).toBe("GET");
    expect(delays).toEqual([5000, 5000]);
  });

  it("fails when the upload is rejected", async () => {
    const { fetchFn } = scriptedFetch([{ body: '{"status":0,"request":"ERROR_ZERO_BALANCE"}' }]);
    await expect(solver(fetchFn, []).attempt(CHALLENGE)).rejects.toThrow(
      "Remote solver rejected the image: ERROR_ZERO_BALANCE",
    );
  });

  it("fails on any poll response other than not-ready", async () => {
    const { fetchFn } = scriptedFetch([
      { body: '{"status":1,"request":"job-42"}' },
      { body: '{"status":0,"request":"ERROR_CAPTCHA_UNSOLVABLE"}' },
    ]);
    await expect(solver(fetchFn, []).attempt(CHALLENGE)).rejects.toThrow(
      "Remote solver failed job job-42: ERROR_CAPTCHA_UNSOLVABLE",
    );
  });

  it("gives up after the configured number of polls", async () => {
    const { fetchFn, calls } = scriptedFetch([
      { body: '{"status":1,"request":"job-42"}' },
      { body: '{"status":0,"request":"CAPCHA_NOT_READY"}' },
      { body: '{"status":0,"request":"CAPCHA_NOT_READY"}' },
    ]);
    await expect(solver(fetchFn, [], 2).attempt(CHALLENGE)).rejects.toThrow(
      "Remote solver timed out after 2 polls for job job-42",
    );
    expect(calls).toHaveLength(3);
  });

  it("turns transport problems into CaptchaError", async () => {
    const { fetchFn: badStatus } = scriptedFetch([{ status: 503, body: "busy" }]);
    await expect(solver(badStatus, []).attempt(CHALLENGE)).rejects.toThrow("Remote solver HTTP 503: busy");

    const { fetchFn: notJson } = scriptedFetch([{ body: "oops" }]);
    const rejection = solver(notJson, []).attempt(CHALLENGE);
    await expect(rejection).rejects.toBeInstanceOf(CaptchaError);
    await expect(rejection).rejects.toThrow("Remote solver returned non-JSON body: oops");
  });
});
