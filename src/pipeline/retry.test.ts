/**
 * Retry and transient-error classification tests.
 *
 * Run with: node --import tsx --test src/pipeline/retry.test.ts
 */

import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { TransientError, isTransientError, withRetry, type RetryEvent } from "./retry.js";
import { InvalidInputError, ValidationError } from "../dataset/errors.js";

// ═══════════════════════════════════════════════════════════════════════════
// HELPERS
// ═══════════════════════════════════════════════════════════════════════════

function recordingSleep(): { delays: number[]; sleep: (ms: number) => Promise<void> } {
  const delays: number[] = [];
  return {
    delays,
    sleep: async (ms) => {
      delays.push(ms);
    },
  };
}

/**
 * Operation that throws the given errors in turn, then returns "done".
 */
function failing(errors: readonly Error[]): { calls: () => number; operation: () => Promise<string> } {
  let calls = 0;
  return {
    calls: () => calls,
    operation: async () => {
      const error = errors[calls];
      calls += 1;
      if (error) {
        throw error;
      }
      return "done";
    },
  };
}

// ═══════════════════════════════════════════════════════════════════════════
// CLASSIFICATION
// ═══════════════════════════════════════════════════════════════════════════

describe("isTransientError", () => {
  const transient = [
    "Rate limit reached for requests",
    "429 Too Many Requests",
    "Request timed out after 60s",
    "upstream timeout",
    "Provider returned error",
    "read ECONNRESET",
    "connect ECONNREFUSED 127.0.0.1:443",
    "socket hang up",
    "503 Service Unavailable",
    "Service temporarily unavailable",
    "Connection closed by peer",
  ];
  for (const message of transient) {
    it(`treats "${message}" as transient`, () => {
      assert.equal(isTransientError(new Error(message)), true);
    });
  }

  const permanent = ["Unknown column \"price\"", "Cannot read properties of undefined", "404 Not Found"];
  for (const message of permanent) {
    it(`treats "${message}" as permanent`, () => {
      assert.equal(isTransientError(new Error(message)), false);
    });
  }

  it("never retries validation-class errors, whatever the message", () => {
    assert.equal(isTransientError(new ValidationError("timeout field is invalid")), false);
    assert.equal(isTransientError(new InvalidInputError("connection column missing")), false);
  });

  it("always retries TransientError", () => {
    assert.equal(isTransientError(new TransientError("flaky")), true);
  });

  it("classifies non-Error values by their text", () => {
    assert.equal(isTransientError("rate limit"), true);
    assert.equal(isTransientError(42), false);
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// RETRY LOOP
// ═══════════════════════════════════════════════════════════════════════════

describe("withRetry", () => {
  it("returns the first success without waiting", async () => {
    const { delays, sleep } = recordingSleep();
    const result = await withRetry(async () => 7, { maxAttempts: 3, backoffMs: 100, sleep });
    assert.deepEqual(result, { value: 7, attempts: 1 });
    assert.deepEqual(delays, []);
  });

  it("succeeds on the third attempt after two transient failures", async () => {
    const { delays, sleep } = recordingSleep();
    const events: RetryEvent[] = [];
    const op = failing([new TransientError("first"), new TransientError("second")]);

    const result = await withRetry(op.operation, {
      maxAttempts: 3,
      backoffMs: 30_000,
      sleep,
      onRetry: (event) => events.push(event),
    });

    assert.deepEqual(result, { value: "done", attempts: 3 });
    assert.equal(op.calls(), 3);
    assert.deepEqual(delays, [30_000, 60_000]);
    assert.deepEqual(
      events.map((event) => [event.attempt, event.delayMs]),
      [
        [1, 30_000],
        [2, 60_000],
      ]
    );
  });

  it("surfaces the last error after three transient failures", async () => {
    const { delays, sleep } = recordingSleep();
    const op = failing([new Error("timeout 1"), new Error("timeout 2"), new Error("timeout 3")]);

    await assert.rejects(withRetry(op.operation, { maxAttempts: 3, backoffMs: 10, sleep }), {
      message: "timeout 3",
    });
    assert.equal(op.calls(), 3);
    assert.deepEqual(delays, [10, 20]);
  });

  it("does not retry a permanent failure", async () => {
    const { delays, sleep } = recordingSleep();
    const op = failing([new ValidationError("bad row index"), new Error("unreachable")]);

    await assert.rejects(withRetry(op.operation, { maxAttempts: 3, backoffMs: 10, sleep }), ValidationError);
    assert.equal(op.calls(), 1);
    assert.deepEqual(delays, []);
  });

  it("passes the attempt number to the operation", async () => {
    const seen: number[] = [];
    await withRetry(
      async (attempt) => {
        seen.push(attempt);
        if (attempt < 2) {
          throw new TransientError("again");
        }
      },
      { maxAttempts: 3, backoffMs: 0, sleep: async () => undefined }
    );
    assert.deepEqual(seen, [1, 2]);
  });
});
