import assert from "node:assert/strict";
import test from "node:test";
import { NetworkError, OrderRejectedError } from "@hedgegrid/core";
import { withRetry } from "./retry.js";

const venue = { venue: "paper", operation: "placeOrder" };

test("withRetry backs off exponentially on transient errors", async () => {
  const delays: number[] = [];
  let calls = 0;

  const result = await withRetry(
    async () => {
      calls += 1;
      if (calls < 3) throw new NetworkError("timeout", venue);
      return "ok";
    },
    {
      attempts: 5,
      baseDelayMs: 100,
      sleep: async (ms) => {
        delays.push(ms);
      }
    }
  );

  assert.equal(result, "ok");
  assert.equal(calls, 3);
  assert.deepEqual(delays, [100, 200]);
});

test("withRetry rethrows the last error after the attempt budget", async () => {
  let calls = 0;
  await assert.rejects(
    withRetry(
      async () => {
        calls += 1;
        throw new NetworkError(`fail ${calls}`, venue);
      },
      { attempts: 3, baseDelayMs: 1, sleep: async () => undefined }
    ),
    { name: "NetworkError", message: "fail 3" }
  );
  assert.equal(calls, 3);
});

test("withRetry does not retry rejections", async () => {
  let calls = 0;
  await assert.rejects(
    withRetry(
      async () => {
        calls += 1;
        throw new OrderRejectedError("post-only would cross", venue);
      },
      { attempts: 3, baseDelayMs: 1, sleep: async () => undefined }
    ),
    OrderRejectedError
  );
  assert.equal(calls, 1);
});
