import { describe, it, expect } from "vitest";
import {
  type AbsState,
  type AddressSchemeOptions,
  type IntervalAbsValue,
  createInterval,
  createState,
  getVirtualMemAddress,
  joinWith,
  load,
  store,
} from "@/ae-engine";

describe("ae-engine barrel exports", () => {
  it("re-exports the state API through a single entry point", () => {
    const state: AbsState = createState();
    const addr = getVirtualMemAddress(1);
    store(state, addr, createInterval(3, 3));

    const other: AbsState = createState([], [[1, createInterval(5, 5)]]);
    joinWith(state, other);

    expect(load(state, addr)).toEqual(createInterval(3, 5));
  });

  it("re-exports value and option types", () => {
    const v: IntervalAbsValue = createInterval(0, 1);
    const opts: AddressSchemeOptions = { idBits: 24 };

    expect(v.kind).toBe("interval");
    expect(opts.tag).toBeUndefined();
  });
});
