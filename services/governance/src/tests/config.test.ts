/**
 * Configuration + Clock Tests
 */

import { describe, it, expect } from "vitest";
import {
  createGovernanceConfig,
  DEFAULT_GOVERNANCE_CONFIG,
  loadGovernanceConfig,
} from "../config.js";
import { createActionContext, ManualClock } from "../clock.js";
import { InvalidInputError } from "../errors.js";

describe("loadGovernanceConfig", () => {
  it("should fall back to defaults", () => {
    expect(loadGovernanceConfig({})).toEqual(DEFAULT_GOVERNANCE_CONFIG);
  });

  it("should read overrides from the environment", () => {
    const config = loadGovernanceConfig({
      GOVERNANCE_ESCROW_ACCOUNT: "vault.escrow",
      GOVERNANCE_MAX_TITLE_LENGTH: "80",
      GOVERNANCE_AUDIT_HISTORY_SIZE: "25",
      GOVERNANCE_ENFORCE_INVARIANTS: "false",
    });

    expect(config).toEqual({
      escrowAccount: "vault.escrow",
      maxTitleLength: 80,
      maxDescriptionLength: 4096,
      auditHistorySize: 25,
      enforceInvariants: false,
    });
  });

  it("should reject malformed values", () => {
    expect(() => loadGovernanceConfig({ GOVERNANCE_MAX_TITLE_LENGTH: "eighty" })).toThrow();
    expect(() => loadGovernanceConfig({ GOVERNANCE_ENFORCE_INVARIANTS: "yes" })).toThrow();
    expect(() => loadGovernanceConfig({ GOVERNANCE_MAX_TITLE_LENGTH: "0" })).toThrow();
  });
});

describe("createGovernanceConfig", () => {
  it("should merge overrides over the defaults", () => {
    expect(createGovernanceConfig({ auditHistorySize: 10 })).toEqual({
      ...DEFAULT_GOVERNANCE_CONFIG,
      auditHistorySize: 10,
    });
  });

  it("should validate the result", () => {
    expect(() => createGovernanceConfig({ escrowAccount: "" })).toThrow();
    expect(() => createGovernanceConfig({ maxTitleLength: -1 })).toThrow();
  });
});

describe("ManualClock", () => {
  it("should only move forward", () => {
    const clock = new ManualClock(5);

    expect(clock.advance()).toBe(6);
    expect(clock.advance(4)).toBe(10);
    clock.set(10);
    expect(clock.now()).toBe(10);

    expect(() => clock.set(9)).toThrow(InvalidInputError);
    expect(() => clock.advance(-1)).toThrow(InvalidInputError);
    expect(() => clock.set(10.5)).toThrow(InvalidInputError);
    expect(clock.now()).toBe(10);
  });

  it("should reject an invalid starting epoch", () => {
    expect(() => new ManualClock(-1)).toThrow(InvalidInputError);
  });

  it("should build an action context from the current epoch", () => {
    const clock = new ManualClock(42);
    expect(createActionContext(clock, "alice")).toEqual({ caller: "alice", epoch: 42 });
  });
});
