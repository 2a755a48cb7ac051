/**
 * Tests for error handler middleware.
 *
 * Verifies domain errors are mapped to correct HTTP status codes
 * and the error envelope format.
 */

import { describe, it, expect } from "vitest";
import { Hono } from "hono";
import { HTTPException } from "hono/http-exception";
import { LedgerError } from "@keel/ledger";
import { LendingError } from "@keel/lending";
import { VaultError } from "@keel/vault";
import type { AppEnv } from "../../src/types/api-contract.js";
import { handleError } from "../../src/middleware/error-handler.js";
import { readError } from "../setup.js";

function throwing(err: Error) {
  const app = new Hono<AppEnv>();
  app.onError(handleError);
  app.get("/boom", () => {
    throw err;
  });
  return app;
}

describe("error handler", () => {
  it.each([
    { err: new VaultError("ZERO_SHARES", "no shares"), status: 422 },
    { err: new VaultError("UNAUTHORIZED_CALLER", "nope"), status: 403 },
    { err: new VaultError("STRATEGY_EXISTS", "dup"), status: 409 },
    { err: new VaultError("ROUTING_UNAVAILABLE", "no executor"), status: 503 },
    { err: new LendingError("RATE_TOO_HIGH", "too high"), status: 400 },
    { err: new LedgerError("REENTRANT_CALL", "busy"), status: 409 },
  ])("maps $err.code to $status", async ({ err, status }) => {
    const res = await throwing(err).request("/boom");

    expect(res.status).toBe(status);
    expect(await readError(res)).toEqual({ code: err.code, message: err.message });
  });

  it("passes ledger error details through", async () => {
    const err = new LedgerError("TRANSFER_FAILED", "pull failed", { details: { from: "alice" } });
    const res = await throwing(err).request("/boom");

    expect(res.status).toBe(422);
    expect(await readError(res)).toEqual({
      code: "TRANSFER_FAILED",
      message: "pull failed",
      details: { from: "alice" },
    });
  });

  it("hides the message of a coded error without a mapping", async () => {
    const res = await throwing(new LedgerError("ROLLBACK_FAILED", "ledger internals")).request("/boom");

    expect(res.status).toBe(500);
    expect(await readError(res)).toEqual({
      code: "ROLLBACK_FAILED",
      message: "Internal server error",
    });
  });

  it("answers 500 INTERNAL_ERROR for plain errors", async () => {
    const res = await throwing(new Error("secret stack detail")).request("/boom");

    expect(res.status).toBe(500);
    expect(await readError(res)).toEqual({
      code: "INTERNAL_ERROR",
      message: "Internal server error",
    });
  });

  it("lets HTTP exceptions answer for themselves", async () => {
    const res = await throwing(new HTTPException(418, { message: "teapot" })).request("/boom");

    expect(res.status).toBe(418);
    expect(await res.text()).toBe("teapot");
  });
});
