import { describe, expect, it } from "vitest";
import { loadEnv } from "../../src/config/env.js";

describe("loadEnv", () => {
  it("should fall back to defaults", () => {
    expect(loadEnv({})).toEqual({
      NODE_ENV: "development",
      PORT: 3000,
      DATABASE_PATH: "./data/expenses.db",
    });
  });

  it("should coerce the port", () => {
    expect(loadEnv({ PORT: "8080", DATABASE_PATH: ":memory:" })).toMatchObject({
      PORT: 8080,
      DATABASE_PATH: ":memory:",
    });
  });

  it("should reject an unknown NODE_ENV", () => {
    expect(() => loadEnv({ NODE_ENV: "staging" })).toThrow();
  });
});
