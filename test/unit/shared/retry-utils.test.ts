import { describe, test } from "node:test";
import { strict as assert } from "node:assert";
import {
  isPermanentError,
  isTransientError,
  withRetry,
} from "../../../src/shared/retry-utils.js";
import { ProviderOperationError } from "../../../src/shared/errors.js";

describe("isTransientError", () => {
  test("treats server errors and rate limits as transient", () => {
    assert.equal(isTransientError(new Error("gh: Server Error (HTTP 502)")), true);
    assert.equal(isTransientError(new Error("API rate limit exceeded")), true);
    assert.equal(isTransientError(new Error("connect ETIMEDOUT")), true);
  });

  test("uses the status carried by provider errors", () => {
    const error = new ProviderOperationError("unavailable", { status: 503 });
    assert.equal(isTransientError(error), true);
  });

  test("never retries client errors", () => {
    assert.equal(isTransientError(new Error("gh: Not Found (HTTP 404)")), false);
    assert.equal(
      isTransientError(new ProviderOperationError("invalid", { status: 422 })),
      false
    );
  });

  test("does not retry unknown errors", () => {
    assert.equal(isTransientError(new Error("something odd")), false);
  });
});

describe("isPermanentError", () => {
  test("detects rejected credentials", () => {
    assert.equal(isPermanentError(new Error("Bad credentials")), true);
  });

  test("429 is not permanent", () => {
    assert.equal(
      isPermanentError(new ProviderOperationError("slow down", { status: 429 })),
      false
    );
  });
});

describe("withRetry", () => {
  test("returns the first successful result", async () => {
    let calls = 0;
    const result = await withRetry(async () => {
      calls++;
      return "ok";
    });
    assert.equal(result, "ok");
    assert.equal(calls, 1);
  });

  test("retries transient failures", async () => {
    let calls = 0;
    const attempts: number[] = [];
    const result = await withRetry(
      async () => {
        calls++;
        if (calls < 3) throw new Error("HTTP 502");
        return calls;
      },
      {
        retries: 3,
        minTimeout: 1,
        onRetry: (_error, attempt) => attempts.push(attempt),
      }
    );
    assert.equal(result, 3);
    assert.deepEqual(attempts, [1, 2]);
  });

  test("rethrows permanent failures without retrying", async () => {
    let calls = 0;
    const original = new Error("gh: Not Found (HTTP 404)");
    await assert.rejects(
      withRetry(
        async () => {
          calls++;
          throw original;
        },
        { retries: 3, minTimeout: 1 }
      ),
      (error: unknown) => error === original
    );
    assert.equal(calls, 1);
  });

  test("gives up after the configured retries", async () => {
    let calls = 0;
    await assert.rejects(
      withRetry(
        async () => {
          calls++;
          throw new Error("HTTP 500");
        },
        { retries: 2, minTimeout: 1 }
      ),
      /HTTP 500/
    );
    assert.equal(calls, 3);
  });

  test("runs once when retries are disabled", async () => {
    let calls = 0;
    await assert.rejects(
      withRetry(
        async () => {
          calls++;
          throw new Error("HTTP 500");
        },
        { retries: 0 }
      )
    );
    assert.equal(calls, 1);
  });
});
