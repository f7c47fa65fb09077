import { describe, expect, it } from "vitest";
import { ConfigurationError } from "./errors.js";
import { formatValue, labelBoth, labelValue, resolveLabeller } from "./labeller.js";

describe("labellers", () => {
  it("prints the value alone or with its variable", () => {
    expect(labelValue("cyl", 4)).toBe("4");
    expect(labelBoth("cyl", 4)).toBe("cyl: 4");
  });

  it("prints missing values as NA", () => {
    expect(formatValue(null)).toBe("NA");
    expect(labelBoth("g", null)).toBe("g: NA");
  });
});

describe("resolveLabeller", () => {
  it("defaults to the bare value", () => {
    expect(resolveLabeller(undefined)("g", "a")).toBe("a");
  });

  it("looks labellers up by name", () => {
    expect(resolveLabeller("label_both")("g", true)).toBe("g: true");
  });

  it("wraps a caller's function", () => {
    const upper = resolveLabeller((_v: string, value: unknown) => String(value).toUpperCase());
    expect(upper("g", "abc")).toBe("ABC");
  });

  it("rejects unknown names, including inherited object keys", () => {
    expect(() => resolveLabeller("label_fancy")).toThrow(ConfigurationError);
    expect(() => resolveLabeller("toString")).toThrow(
      'labeller must be a function or one of "label_value", "label_both"; got "toString"',
    );
  });
});
