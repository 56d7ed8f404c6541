import { describe, expect, it } from "vitest";
import { loadConfig, resolveConfig } from "./config.js";
import { isStatementError } from "./errors.js";

describe("loadConfig", () => {
  it("falls back to defaults", () => {
    expect(loadConfig({})).toEqual({
      brokerId: "statement-ofx",
      accountId: "INVESTMENT",
      currency: "USD",
      delimiter: ",",
      skipLines: 2
    });
  });

  it("reads STATEMENT_OFX_* variables", () => {
    const config = loadConfig({
      STATEMENT_OFX_BROKER_ID: "broker.test",
      STATEMENT_OFX_ACCOUNT_ID: "401K",
      STATEMENT_OFX_CURRENCY: "EUR",
      STATEMENT_OFX_DELIMITER: "\t",
      STATEMENT_OFX_SKIP_LINES: "3"
    });
    expect(config).toEqual({
      brokerId: "broker.test",
      accountId: "401K",
      currency: "EUR",
      delimiter: "\t",
      skipLines: 3
    });
  });

  it("rejects invalid values", () => {
    let caught: unknown;
    try {
      loadConfig({ STATEMENT_OFX_CURRENCY: "usd" });
    } catch (err) {
      caught = err;
    }
    expect(isStatementError(caught) && caught.code).toBe("InvalidConfig");
    expect(() => loadConfig({ STATEMENT_OFX_SKIP_LINES: "-1" })).toThrow(/STATEMENT_OFX_SKIP_LINES/);
    expect(() => loadConfig({ STATEMENT_OFX_DELIMITER: ";;" })).toThrow(/single character/);
  });

  it("rejects a blank or fractional banner count", () => {
    expect(() => loadConfig({ STATEMENT_OFX_SKIP_LINES: "" })).toThrow(
      "Invalid configuration: STATEMENT_OFX_SKIP_LINES: expected a non-negative integer"
    );
    expect(() => loadConfig({ STATEMENT_OFX_SKIP_LINES: "1.5" })).toThrow(/STATEMENT_OFX_SKIP_LINES/);
    expect(() => resolveConfig(loadConfig({}), { skipLines: "" })).toThrow(/non-negative integer/);
  });
});

describe("resolveConfig", () => {
  it("lets flags win over the loaded config", () => {
    const base = loadConfig({ STATEMENT_OFX_BROKER_ID: "from-env" });
    expect(resolveConfig(base, { brokerId: "from-flag", skipLines: "0" })).toEqual({
      ...base,
      brokerId: "from-flag",
      skipLines: 0
    });
  });

  it("validates flags the same way", () => {
    expect(() => resolveConfig(loadConfig({}), { currency: "dollars" })).toThrow(/STATEMENT_OFX_CURRENCY/);
  });
});
