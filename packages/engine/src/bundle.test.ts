import { describe, it, expect } from "vitest";
import { addBundles, bundlesEqual, covers, makeBundle, quantity, scaleBundle, subtractBundles } from "./bundle";

describe("resource bundles", () => {
  it("reads missing resources as zero", () => {
    const b = makeBundle({ Timber: 3 });
    expect(quantity(b, "Timber")).toBe(3);
    expect(quantity(b, "Water")).toBe(0);
    expect(quantity(b, "toString")).toBe(0);
  });

  it("keeps every key from either operand, including zeroes", () => {
    const a = makeBundle({ Timber: 5, Water: 1 });
    const b = makeBundle({ Water: 1, Housing: 2 });
    expect(addBundles(a, b)).toEqual({ Timber: 5, Water: 2, Housing: 2 });
    expect(subtractBundles(a, b)).toEqual({ Timber: 5, Water: 0, Housing: -2 });
  });

  it("scales every entry", () => {
    expect(scaleBundle(makeBundle({ Timber: 5, Water: 0.5 }), 4)).toEqual({ Timber: 20, Water: 2 });
  });

  it("does not modify its operands", () => {
    const a = makeBundle({ Timber: 5 });
    addBundles(a, makeBundle({ Timber: 1 }));
    expect(a).toEqual({ Timber: 5 });
    expect(Object.isFrozen(a)).toBe(true);
  });

  it("checks coverage against every required resource", () => {
    const held = makeBundle({ Timber: 5, Water: 2 });
    expect(covers(held, makeBundle({ Timber: 5 }))).toBe(true);
    expect(covers(held, makeBundle({ Timber: 5, Water: 3 }))).toBe(false);
    expect(covers(held, makeBundle({ Gold: 1 }))).toBe(false);
    expect(covers(held, makeBundle({ Gold: 0 }))).toBe(true);
  });

  it("compares bundles with missing keys as zero", () => {
    expect(bundlesEqual(makeBundle({ Timber: 1, Gold: 0 }), makeBundle({ Timber: 1 }))).toBe(true);
    expect(bundlesEqual(makeBundle({ Timber: 1 }), makeBundle({ Timber: 2 }))).toBe(false);
  });
});
