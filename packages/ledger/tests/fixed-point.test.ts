import { describe, it, expect } from "vitest";
import { parseUnits, formatUnits } from "../src/fixed-point.js";
import { LedgerError } from "../src/types.js";

describe("parseUnits", () => {
  it("scales whole and fractional amounts to 18 decimals", () => {
    expect(parseUnits("1337")).toBe(1_337_000_000_000_000_000_000n);
    expect(parseUnits("1.0001")).toBe(1_000_100_000_000_000_000n);
    expect(parseUnits("0.000000000000000001")).toBe(1n);
    expect(parseUnits(" 2 ")).toBe(2_000_000_000_000_000_000n);
  });

  it("honours custom decimals", () => {
    expect(parseUnits("5", 0)).toBe(5n);
    expect(parseUnits("1.5", 6)).toBe(1_500_000n);
  });

  it("rejects signs, garbage and excess precision", () => {
    expect(() => parseUnits("-1")).toThrow(LedgerError);
    expect(() => parseUnits("1e18")).toThrow(LedgerError);
    expect(() => parseUnits("")).toThrow(LedgerError);
    expect(() => parseUnits("1.0000000000000000001")).toThrow("decimal places");
  });
});

describe("formatUnits", () => {
  it("renders exactly 18 places", () => {
    expect(formatUnits(1_337_133_700_000_000_000_000n)).toBe("1337.133700000000000000");
    expect(formatUnits(1n)).toBe("0.000000000000000001");
    expect(formatUnits(0n)).toBe("0.000000000000000000");
  });

  it("renders integers with zero decimals", () => {
    expect(formatUnits(5n, 0)).toBe("5");
  });

  it("round-trips through parseUnits", () => {
    const value = 1_999_999_692_838_904_485n;
    expect(parseUnits(formatUnits(value))).toBe(value);
  });
});
