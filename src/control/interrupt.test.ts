import { afterEach, describe, it, expect } from "vitest";
import { interrupt, isInterrupted, interrupted } from "./interrupt.js";

describe("interrupt flag", () => {
  afterEach(() => {
    interrupted();
  });

  it("starts cleared", () => {
    expect(isInterrupted()).toBe(false);
  });

  it("stays set until consumed", () => {
    interrupt();
    expect(isInterrupted()).toBe(true);
    expect(isInterrupted()).toBe(true);
  });

  it("interrupted() reports and clears the flag", () => {
    interrupt();
    expect(interrupted()).toBe(true);
    expect(interrupted()).toBe(false);
    expect(isInterrupted()).toBe(false);
  });
});
