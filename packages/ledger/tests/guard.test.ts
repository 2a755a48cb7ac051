/**
 * Tests for the reentrancy guard.
 */

import { describe, it, expect } from "vitest";
import { ReentrancyGuard } from "../src/guard.js";
import { LedgerError } from "../src/types.js";

describe("ReentrancyGuard", () => {
  it("returns the operation's result", () => {
    const guard = new ReentrancyGuard();
    expect(guard.run("op", () => 42)).toBe(42);
  });

  it("is entered only while the operation runs", () => {
    const guard = new ReentrancyGuard();
    let inside = false;
    guard.run("op", () => {
      inside = guard.entered;
    });
    expect(inside).toBe(true);
    expect(guard.entered).toBe(false);
  });

  it("rejects a nested call through any entry point", () => {
    const guard = new ReentrancyGuard();
    let caught: unknown;
    guard.run("deposit", () => {
      try {
        guard.run("withdraw", () => undefined);
      } catch (err) {
        caught = err;
      }
    });
    expect(caught).toBeInstanceOf(LedgerError);
    expect(caught).toMatchObject({
      code: "REENTRANT_CALL",
      details: { operation: "withdraw", inFlight: "deposit" },
    });
  });

  it("releases the guard when the operation throws", () => {
    const guard = new ReentrancyGuard();
    expect(() =>
      guard.run("op", () => {
        throw new Error("boom");
      }),
    ).toThrow("boom");
    expect(guard.entered).toBe(false);
    expect(guard.run("next", () => "ok")).toBe("ok");
  });
});
