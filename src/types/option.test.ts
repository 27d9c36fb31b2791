import { describe, it, expect } from "vitest";
import { some, none, isSome, isNone } from "./option.js";

describe("Option", () => {
  it("some() is present", () => {
    const option = some("x");
    expect(isSome(option)).toBe(true);
    expect(isNone(option)).toBe(false);
    if (isSome(option)) {
      expect(option.value).toBe("x");
    }
  });

  it("some() keeps null as a present value", () => {
    const option = some(null);
    expect(isSome(option)).toBe(true);
    if (isSome(option)) {
      expect(option.value).toBeNull();
    }
  });

  it("none() is absent and shared", () => {
    expect(isNone(none())).toBe(true);
    expect(none<number>()).toBe(none<string>());
  });
});
