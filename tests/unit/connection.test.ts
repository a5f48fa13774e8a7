/**
 * Unit tests for the database connection singleton
 */

import { describe, it, expect, afterEach } from "vitest";
import { closeDb, getDb, openDb, resolveDbPath } from "@/db";

describe("database connection", () => {
  afterEach(() => {
    closeDb();
  });

  it("should throw from getDb before openDb", () => {
    expect(() => getDb()).toThrow("Database not opened. Call openDb() first.");
  });

  it("should return the same connection until closed", () => {
    const db = openDb(":memory:");
    expect(openDb(":memory:")).toBe(db);
    expect(getDb()).toBe(db);
    expect(db.pragma("foreign_keys", { simple: true })).toBe(1);

    closeDb();
    expect(() => getDb()).toThrow("Database not opened");
  });

  it("should prefer an explicit path", () => {
    expect(resolveDbPath(":memory:")).toBe(":memory:");
  });
});
