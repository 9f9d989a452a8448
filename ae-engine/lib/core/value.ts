import {
  type AddressSet,
  addressContains,
  addressEquals,
  addressJoin,
  addressMeet,
  cloneAddressSet,
  formatAddressSet,
  makeAddressSet,
} from "./address";
import { TypeMismatchError } from "./errors";
import {
  type Bound,
  type Interval,
  cloneInterval,
  formatInterval,
  intervalContains,
  intervalEquals,
  intervalJoin,
  intervalMeet,
  intervalNarrow,
  intervalWiden,
  isIntervalBottom,
  makeInterval,
} from "./interval";

export type IntervalAbsValue = { kind: "interval"; interval: Interval };
export type AddressAbsValue = { kind: "address"; addrs: AddressSet };

export type AbstractValue = IntervalAbsValue | AddressAbsValue;

export type ValueKind = AbstractValue["kind"];

// 引数省略時は [-∞, +∞]
export function createInterval(
  lb: Bound = null,
  ub: Bound = null,
): IntervalAbsValue {
  return { kind: "interval", interval: makeInterval(lb, ub) };
}

export function createAddress(addrs: Iterable<number> = []): AddressAbsValue {
  return { kind: "address", addrs: makeAddressSet(addrs) };
}

export function fromInterval(interval: Interval): IntervalAbsValue {
  return { kind: "interval", interval: cloneInterval(interval) };
}

export function fromAddressSet(addrs: AddressSet): AddressAbsValue {
  return { kind: "address", addrs: cloneAddressSet(addrs) };
}

export function cloneValue(src: AbstractValue): AbstractValue {
  return src.kind === "interval"
    ? fromInterval(src.interval)
    : fromAddressSet(src.addrs);
}

export function isInterval(v: AbstractValue): v is IntervalAbsValue {
  return v.kind === "interval";
}

export function isAddress(v: AbstractValue): v is AddressAbsValue {
  return v.kind === "address";
}

export function getInterval(v: AbstractValue): Interval {
  if (v.kind !== "interval") {
    throw new TypeMismatchError("not an interval value", { kind: v.kind });
  }
  return v.interval;
}

export function getAddress(v: AbstractValue): AddressSet {
  if (v.kind !== "address") {
    throw new TypeMismatchError("not an address value", { kind: v.kind });
  }
  return v.addrs;
}

type LatticeOp = "join" | "meet" | "widen" | "narrow";

type BinaryOps = {
  interval: (a: Interval, b: Interval) => Interval;
  address: (a: AddressSet, b: AddressSet) => AddressSet;
};

// AddressSet には真の widen/narrow が無いので join/meet で代用する
const OPS: Record<LatticeOp, BinaryOps> = {
  join: { interval: intervalJoin, address: addressJoin },
  meet: { interval: intervalMeet, address: addressMeet },
  widen: { interval: intervalWiden, address: addressJoin },
  narrow: { interval: intervalNarrow, address: addressMeet },
};

function combine(
  op: LatticeOp,
  a: AbstractValue,
  b: AbstractValue,
): AbstractValue {
  if (a.kind === "interval" && b.kind === "interval") {
    return { kind: "interval", interval: OPS[op].interval(a.interval, b.interval) };
  }
  if (a.kind === "address" && b.kind === "address") {
    return { kind: "address", addrs: OPS[op].address(a.addrs, b.addrs) };
  }
  throw new TypeMismatchError(`cannot ${op} ${a.kind} with ${b.kind}`, {
    op,
    left: a.kind,
    right: b.kind,
  });
}

export function valueJoin(a: AbstractValue, b: AbstractValue): AbstractValue {
  return combine("join", a, b);
}

export function valueMeet(a: AbstractValue, b: AbstractValue): AbstractValue {
  return combine("meet", a, b);
}

export function valueWiden(a: AbstractValue, b: AbstractValue): AbstractValue {
  return combine("widen", a, b);
}

export function valueNarrow(a: AbstractValue, b: AbstractValue): AbstractValue {
  return combine("narrow", a, b);
}

/** a ⊒ b。型が違えば常に false。 */
export function valueContains(a: AbstractValue, b: AbstractValue): boolean {
  if (a.kind === "interval" && b.kind === "interval") {
    return intervalContains(a.interval, b.interval);
  }
  if (a.kind === "address" && b.kind === "address") {
    return addressContains(a.addrs, b.addrs);
  }
  return false;
}

export function valueEquals(a: AbstractValue, b: AbstractValue): boolean {
  if (a.kind === "interval" && b.kind === "interval") {
    return intervalEquals(a.interval, b.interval);
  }
  if (a.kind === "address" && b.kind === "address") {
    return addressEquals(a.addrs, b.addrs);
  }
  return false;
}

// meet 後に鍵を消すかどうかの判定に使う
export function isValueBottom(v: AbstractValue): boolean {
  return v.kind === "interval"
    ? isIntervalBottom(v.interval)
    : v.addrs.size === 0;
}

export function formatValue(v: AbstractValue): string {
  return v.kind === "interval"
    ? formatInterval(v.interval)
    : formatAddressSet(v.addrs);
}
