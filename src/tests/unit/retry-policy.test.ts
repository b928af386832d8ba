import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { RetryPolicy, isTransientError } from "../../ai/retry-policy";
import { GenerationError } from "../../shared/errors";
import { noopLogger } from "../helpers/fakes";

function policyWithSleeps(maxAttempts = 3, timeoutMs = 1_000): { policy: RetryPolicy; sleeps: number[] } {
  const sleeps: number[] = [];
  const policy = new RetryPolicy({ maxAttempts, backoffMs: 100, timeoutMs }, noopLogger, async (ms) => {
    sleeps.push(ms);
  });
  return { policy, sleeps };
}

describe("RetryPolicy.run", () => {
  it("returns the first accepted value", async () => {
    const { policy } = policyWithSleeps();
    const result = await policy.run(async (attempt) => `value-${attempt}`, { label: "test" });
    assert.deepEqual(result, { ok: true, value: "value-1", attempts: 1, rejected: [] });
  });

  it("retries transient failures with linear backoff", async () => {
    const { policy, sleeps } = policyWithSleeps();
    const result = await policy.run(
      async (attempt) => {
        if (attempt === 1) {
          throw new GenerationError("socket hang up", "network");
        }
        return "recovered";
      },
      { label: "test" },
    );
    assert.deepEqual(result, { ok: true, value: "recovered", attempts: 2, rejected: [] });
    assert.deepEqual(sleeps, [100]);
  });

  it("stops at the first non-transient failure", async () => {
    const { policy, sleeps } = policyWithSleeps();
    let calls = 0;
    const result = await policy.run(
      async () => {
        calls += 1;
        throw new GenerationError("bad request", "http_error", 400);
      },
      { label: "test" },
    );
    assert.deepEqual(result, { ok: false, error_code: "llm_failure", attempts: 1, rejected: [] });
    assert.equal(calls, 1);
    assert.deepEqual(sleeps, []);
  });

  it("gives up after max attempts of transient failures", async () => {
    const { policy, sleeps } = policyWithSleeps();
    const result = await policy.run(
      async () => {
        throw new GenerationError("LLM API error: HTTP 503", "http_error", 503);
      },
      { label: "test" },
    );
    assert.deepEqual(result, { ok: false, error_code: "transient_failure", attempts: 3, rejected: [] });
    assert.deepEqual(sleeps, [100, 200]);
  });

  it("collects values refused by the accept predicate", async () => {
    const { policy } = policyWithSleeps();
    const result = await policy.run(async (attempt) => `draft ${attempt}`, {
      label: "test",
      accept: () => false,
    });
    assert.deepEqual(result, {
      ok: false,
      error_code: "rejected",
      attempts: 3,
      rejected: ["draft 1", "draft 2", "draft 3"],
    });
  });

  it("times out slow attempts", async () => {
    const { policy } = policyWithSleeps(1, 20);
    const result = await policy.run(() => new Promise<string>(() => {}), { label: "test" });
    assert.deepEqual(result, { ok: false, error_code: "timeout", attempts: 1, rejected: [] });
  });
});

describe("isTransientError", () => {
  it("classifies generation errors by code and status", () => {
    assert.equal(isTransientError(new GenerationError("t", "timeout")), true);
    assert.equal(isTransientError(new GenerationError("n", "network")), true);
    assert.equal(isTransientError(new GenerationError("r", "http_error", 429)), true);
    assert.equal(isTransientError(new GenerationError("s", "http_error", 500)), true);
    assert.equal(isTransientError(new GenerationError("c", "http_error", 401)), false);
    assert.equal(isTransientError(new GenerationError("k", "not_configured")), false);
    assert.equal(isTransientError(new Error("read ECONNRESET")), true);
    assert.equal(isTransientError(new Error("unexpected token")), false);
  });
});
