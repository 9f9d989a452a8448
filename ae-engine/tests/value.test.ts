import { describe, expect, it } from "vitest";
import { TypeMismatchError } from "../lib/core/errors";
import { isIntervalTop } from "../lib/core/interval";
import {
  cloneValue,
  createAddress,
  createInterval,
  formatValue,
  getAddress,
  getInterval,
  isAddress,
  isInterval,
  isValueBottom,
  valueContains,
  valueEquals,
  valueJoin,
  valueMeet,
  valueNarrow,
  valueWiden,
} from "../lib/core/value";

describe("abstract value construction", () => {
  it("defaults an interval to top", () => {
    const v = createInterval();
    expect(isInterval(v)).toBe(true);
    expect(isIntervalTop(getInterval(v))).toBe(true);
  });

  it("builds an address value from ids", () => {
    const v = createAddress([10, 20]);
    expect(isAddress(v)).toBe(true);
    expect([...getAddress(v)]).toEqual([10, 20]);
  });

  it("throws on the wrong accessor", () => {
    expect(() => getInterval(createAddress())).toThrow(TypeMismatchError);
    expect(() => getAddress(createInterval(1, 2))).toThrow(TypeMismatchError);
  });

  it("deep-copies on clone", () => {
    const src = createAddress([1]);
    const copy = cloneValue(src);
    getAddress(copy).add(2);
    expect(getAddress(src).size).toBe(1);

    const itv = createInterval(1, 5);
    const itvCopy = cloneValue(itv);
    getInterval(itvCopy).ub = 9;
    expect(getInterval(itv).ub).toBe(5);
  });
});

describe("abstract value lattice", () => {
  it("dispatches join and meet by variant", () => {
    expect(valueJoin(createInterval(1, 5), createInterval(3, 10))).toEqual(
      createInterval(1, 10),
    );
    expect(valueMeet(createAddress([1, 2]), createAddress([2, 3]))).toEqual(
      createAddress([2]),
    );
  });

  it("fails on mismatched variants instead of coercing", () => {
    const i = createInterval(0, 1);
    const a = createAddress([1]);
    expect(() => valueJoin(i, a)).toThrow(TypeMismatchError);
    expect(() => valueMeet(a, i)).toThrow(TypeMismatchError);
    expect(() => valueWiden(i, a)).toThrow(TypeMismatchError);
    expect(() => valueNarrow(a, i)).toThrow(TypeMismatchError);
  });

  it("carries the operation and variants on mismatch", () => {
    try {
      valueJoin(createInterval(), createAddress());
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(TypeMismatchError);
      if (err instanceof TypeMismatchError) {
        expect(err.name).toBe("TypeMismatchError");
        expect(err.detail).toEqual({
          op: "join",
          left: "interval",
          right: "address",
        });
      }
    }
  });

  it("widens intervals and unions address sets", () => {
    expect(valueWiden(createInterval(0, 1), createInterval(0, 2))).toEqual(
      createInterval(0, null),
    );
    expect(valueWiden(createAddress([1]), createAddress([2]))).toEqual(
      createAddress([1, 2]),
    );
  });

  it("narrows intervals and intersects address sets", () => {
    expect(valueNarrow(createInterval(), createInterval(1, 5))).toEqual(
      createInterval(1, 5),
    );
    expect(valueNarrow(createAddress([1, 2]), createAddress([2]))).toEqual(
      createAddress([2]),
    );
  });

  it("answers equals and contains as false across variants", () => {
    expect(valueEquals(createInterval(), createAddress())).toBe(false);
    expect(valueContains(createInterval(), createAddress())).toBe(false);
    expect(valueEquals(createInterval(2, 1), createInterval(5, 0))).toBe(true);
    expect(valueContains(createAddress([1, 2]), createAddress([2]))).toBe(true);
  });

  it("treats bottom intervals and empty sets as uninformative", () => {
    expect(isValueBottom(createInterval(3, 1))).toBe(true);
    expect(isValueBottom(createAddress())).toBe(true);
    expect(isValueBottom(createInterval())).toBe(false);
    expect(isValueBottom(createAddress([0]))).toBe(false);
  });

  it("formats either variant", () => {
    expect(formatValue(createInterval(null, 4))).toBe("[-∞, 4]");
    expect(formatValue(createAddress([0x7f000001]))).toBe("{0x7f000001}");
  });
});
