import { describe, it, expect } from "vitest";
import {
  NonFatalError,
  OutOfMemoryError,
  StackOverflowError,
  UnsupportedOperationError,
  VirtualMachineError,
} from "./errors.js";
import { describeValue } from "./describe.js";

describe("error classes", () => {
  it("name each instance after its class", () => {
    expect(new UnsupportedOperationError("nope").name).toBe(
      "UnsupportedOperationError",
    );
    expect(new OutOfMemoryError().name).toBe("OutOfMemoryError");
  });

  it("keep the VM error hierarchy", () => {
    expect(new OutOfMemoryError()).toBeInstanceOf(VirtualMachineError);
    expect(new StackOverflowError()).toBeInstanceOf(VirtualMachineError);
    expect(new StackOverflowError()).toBeInstanceOf(Error);
  });
});

describe("NonFatalError", () => {
  it("wraps a thrown value that is not an Error", () => {
    const error = new NonFatalError("disk full");
    expect(error).toBeInstanceOf(Error);
    expect(error.message).toBe("disk full");
    expect(error.cause).toBe("disk full");
  });

  it("describes values that cannot be converted to a string", () => {
    const bare: unknown = Object.create(null);
    const error = new NonFatalError(bare);
    expect(error.message).toBe("[object Object]");
    expect(error.cause).toBe(bare);
  });
});

describe("describeValue", () => {
  it("uses String() when it works", () => {
    expect(describeValue(42)).toBe("42");
    expect(describeValue(null)).toBe("null");
    expect(describeValue(new Error("bad"))).toBe("Error: bad");
    expect(describeValue(Symbol("tag"))).toBe("Symbol(tag)");
  });

  it("falls back when toString throws", () => {
    const hostile = {
      toString(): string {
        throw new Error("no");
      },
    };
    expect(describeValue(hostile)).toBe("[object Object]");
  });
});
