import { describe, expect, it } from "vitest";
import { computeFee } from "../src/domain/feeCalculator.js";
import { I128_MAX, U64_MAX, checkedAdd, checkedMul } from "../src/utils/checked.js";

describe("fee calculator", () => {
  it("truncates the fee on a small pool", () => {
    expect(computeFee(300n, 50)).toEqual({ ok: true, value: { fee: 1n, net: 299n } });
  });

  it("handles zero amounts and the rate bounds", () => {
    expect(computeFee(0n, 50)).toEqual({ ok: true, value: { fee: 0n, net: 0n } });
    expect(computeFee(12_345n, 0)).toEqual({ ok: true, value: { fee: 0n, net: 12_345n } });
    expect(computeFee(12_345n, 10_000)).toEqual({ ok: true, value: { fee: 12_345n, net: 0n } });
  });

  it("rejects rates outside 0..10000 bps", () => {
    const tooHigh = computeFee(100n, 10_001);
    expect(tooHigh.ok).toBe(false);
    if (!tooHigh.ok) {
      expect(tooHigh.error.code).toBe("INVALID_FEE_RATE");
    }
    const fractional = computeFee(100n, 1.5);
    expect(fractional.ok ? "" : fractional.error.code).toBe("INVALID_FEE_RATE");
    const negative = computeFee(100n, -1);
    expect(negative.ok ? "" : negative.error.code).toBe("INVALID_FEE_RATE");
  });

  it("stays exact for 18-decimal billion-token volumes", () => {
    const gross = 10n ** 27n;
    expect(computeFee(gross, 50)).toEqual({
      ok: true,
      value: { fee: 5_000_000_000_000_000_000_000_000n, net: 995_000_000_000_000_000_000_000_000n },
    });
  });

  it("fails with OVERFLOW instead of wrapping", () => {
    const nearMax = computeFee(I128_MAX, 50);
    expect(nearMax.ok ? "" : nearMax.error.code).toBe("OVERFLOW");
    const outOfRange = computeFee(I128_MAX + 1n, 0);
    expect(outOfRange.ok ? "" : outOfRange.error.code).toBe("OVERFLOW");
  });

  it("fails with UNDERFLOW when the net would be negative", () => {
    const result = computeFee(-100n, 50);
    expect(result.ok ? "" : result.error.code).toBe("UNDERFLOW");
  });

  it("keeps 0 <= fee <= gross and net = gross - fee", () => {
    const amounts = [0n, 1n, 99n, 10_001n, 123_456_789n, 10n ** 18n, 10n ** 30n];
    const rates = [0, 1, 50, 200, 500, 9_999, 10_000];
    amounts.forEach((gross) => {
      rates.forEach((bps) => {
        const result = computeFee(gross, bps);
        expect(result.ok).toBe(true);
        if (result.ok) {
          expect(result.value.fee >= 0n && result.value.fee <= gross).toBe(true);
          expect(result.value.net).toBe(gross - result.value.fee);
        }
      });
    });
  });
});

describe("checked volume arithmetic", () => {
  it("fits 64 members contributing u64::MAX / 100 over 10 cycles", () => {
    const contribution = U64_MAX / 100n;
    const perCycle = checkedMul(contribution, 64n);
    expect(perCycle).toEqual({ ok: true, value: 11_805_916_207_174_113_024n });
    if (perCycle.ok) {
      expect(checkedMul(perCycle.value, 10n)).toEqual({ ok: true, value: 118_059_162_071_741_130_240n });
    }
  });

  it("reports overflow past the i128 range", () => {
    const doubled = checkedMul(I128_MAX, 2n);
    expect(doubled.ok ? "" : doubled.error.code).toBe("OVERFLOW");
    const added = checkedAdd(I128_MAX, 1n);
    expect(added.ok ? "" : added.error.code).toBe("OVERFLOW");
  });
});
