/**
 * Tests for the in-process token book.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { InMemoryTokenBook } from "../src/token-book.js";
import { LedgerError } from "../src/types.js";

describe("InMemoryTokenBook", () => {
  let book: InMemoryTokenBook;

  beforeEach(() => {
    book = new InMemoryTokenBook("USDC");
  });

  it("credits holders and tracks supply", () => {
    expect(book.credit("alice", 500n)).toBe(500n);
    expect(book.credit("alice", 250n)).toBe(750n);
    expect(book.totalSupply).toBe(750n);
  });

  it("refuses to credit the null account", () => {
    expect(() => book.credit("", 1n)).toThrow(LedgerError);
  });

  it("transfers between holders", () => {
    book.credit("alice", 100n);
    expect(book.transfer("alice", "bob", 30n)).toBe(true);
    expect(book.balanceOf("alice")).toBe(70n);
    expect(book.balanceOf("bob")).toBe(30n);
  });

  it("returns false on overdraft and moves nothing", () => {
    book.credit("alice", 10n);
    expect(book.transfer("alice", "bob", 11n)).toBe(false);
    expect(book.balanceOf("alice")).toBe(10n);
    expect(book.balanceOf("bob")).toBe(0n);
  });

  it("returns false for zero amounts and null parties", () => {
    book.credit("alice", 10n);
    expect(book.transfer("alice", "bob", 0n)).toBe(false);
    expect(book.transfer("alice", "", 1n)).toBe(false);
  });

  it("binds an agent to a custodian", () => {
    book.credit("alice", 100n);
    const agent = book.agentFor("vault");
    expect(agent.pull("alice", 40n)).toBe(true);
    expect(agent.push("bob", 15n)).toBe(true);
    expect(agent.balanceOf("vault")).toBe(25n);
    expect(agent.push("bob", 26n)).toBe(false);
  });

  it("lists non-zero holders sorted by id", () => {
    book.credit("carol", 1n);
    book.credit("alice", 2n);
    book.credit("bob", 3n);
    book.transfer("bob", "alice", 3n);
    expect(book.holders()).toEqual([
      { holder: "alice", balance: 5n },
      { holder: "carol", balance: 1n },
    ]);
  });
});
