import { describe, expect, it } from "vitest";
import { CategoryStateTracker, isTerminal } from "./stateTracker.js";

describe("CategoryStateTracker", () => {
  it("records the full forward path", () => {
    const t = new CategoryStateTracker();
    t.advance("SCORED");
    t.advance("SELECTED");
    t.advance("EVALUATED");
    t.advance("ASSESSED");
    expect(t.trace).toEqual(["PENDING", "SCORED", "SELECTED", "EVALUATED", "ASSESSED"]);
    expect(isTerminal(t.state)).toBe(true);
  });

  it("lets an empty selection skip evaluation", () => {
    const t = new CategoryStateTracker();
    t.advance("SCORED");
    t.advance("SELECTED");
    t.advance("ASSESSED");
    expect(t.trace).toEqual(["PENDING", "SCORED", "SELECTED", "ASSESSED"]);
  });

  it("allows FAILED from any non-terminal state", () => {
    const t = new CategoryStateTracker();
    t.advance("SCORED");
    t.advance("FAILED");
    expect(t.state).toBe("FAILED");
  });

  it("rejects moves out of a terminal state", () => {
    const t = new CategoryStateTracker();
    t.advance("FAILED");
    expect(() => t.advance("ASSESSED")).toThrow(/terminal/);
    expect(() => t.advance("FAILED")).toThrow(/terminal/);
  });

  it("rejects backward and repeated moves", () => {
    const t = new CategoryStateTracker();
    t.advance("SELECTED");
    expect(() => t.advance("SCORED")).toThrow("Illegal transition SELECTED → SCORED");
    expect(() => t.advance("SELECTED")).toThrow("Illegal transition SELECTED → SELECTED");
    expect(t.trace).toEqual(["PENDING", "SELECTED"]);
  });
});
