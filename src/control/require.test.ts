import { describe, it, expect } from "vitest";
import { requireFunction, requireKind } from "./require.js";
import { errorKind } from "../errors/kind.js";

describe("requireFunction", () => {
  it("accepts functions and classes", () => {
    expect(() => requireFunction(() => 1, "mapper")).not.toThrow();
    expect(() => requireFunction(RangeError, "mapper")).not.toThrow();
  });

  it("rejects null and undefined as missing", () => {
    expect(() => requireFunction(null, "mapper")).toThrow(
      new TypeError("mapper is null"),
    );
    expect(() => requireFunction(undefined, "supplier")).toThrow(
      new TypeError("supplier is null"),
    );
  });

  it("rejects values that cannot be called", () => {
    expect(() => requireFunction(42, "mapper")).toThrow(
      new TypeError("mapper is not a function"),
    );
  });
});

describe("requireKind", () => {
  it("accepts error classes and kind guards", () => {
    const guard = errorKind(
      "code",
      (cause: unknown): cause is string => typeof cause === "string",
    );
    expect(() => requireKind(RangeError, "kind")).not.toThrow();
    expect(() => requireKind(guard, "kind")).not.toThrow();
  });

  it("rejects a missing kind", () => {
    expect(() => requireKind(null, "kind")).toThrow(
      new TypeError("kind is null"),
    );
  });

  it("rejects objects that are not guards", () => {
    expect(() => requireKind({ name: "x" }, "kind")).toThrow(
      new TypeError("kind is not an error class or kind guard"),
    );
  });
});
