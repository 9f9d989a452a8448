import { type AbsState, createState } from "./state";
import {
  type AbstractValue,
  cloneValue,
  isValueBottom,
  valueContains,
  valueEquals,
  valueJoin,
  valueMeet,
  valueNarrow,
  valueWiden,
} from "./value";

type Store = Map<number, AbstractValue>;

const STORES = ["vars", "objs"] as const;

/**
 * state ← state ⊔ other (破壊的)。
 * 片側にしか無い鍵は top 扱いせず、その値をそのまま写す。
 */
export function joinWith(state: AbsState, other: AbsState): { changed: boolean } {
  return commit(
    state,
    STORES.map((s) => joinStore(state[s], other[s])),
  );
}

type StoreUpdate = { next: Store; changed: boolean };

function joinStore(dst: Store, src: Store): StoreUpdate {
  // 鍵集合を先に確定させ、結果は別の Map に組み立てる
  const keys = new Set([...dst.keys(), ...src.keys()]);
  const next: Store = new Map();
  let changed = false;
  for (const k of keys) {
    const cur = dst.get(k);
    const inc = src.get(k);
    if (cur && inc) {
      const n = valueJoin(cur, inc);
      if (!valueEquals(n, cur)) changed = true;
      next.set(k, n);
    } else if (cur) {
      next.set(k, cur);
    } else if (inc) {
      next.set(k, cloneValue(inc));
      changed = true;
    }
  }
  return { next, changed };
}

/**
 * state ← state ⊓ other (破壊的)。
 * other に無い鍵は ⊥ 扱いで削除し、結果が ⊥/空集合になった鍵も削除する。
 * 鍵集合が増えることはない。
 */
export function meetWith(state: AbsState, other: AbsState): { changed: boolean } {
  return commit(
    state,
    STORES.map((s) => meetStore(state[s], other[s])),
  );
}

function meetStore(dst: Store, src: Store): StoreUpdate {
  const next: Store = new Map();
  let changed = false;
  for (const [k, cur] of dst) {
    const inc = src.get(k);
    if (!inc) {
      changed = true;
      continue;
    }
    const n = valueMeet(cur, inc);
    if (isValueBottom(n)) {
      changed = true;
      continue;
    }
    if (!valueEquals(n, cur)) changed = true;
    next.set(k, n);
  }
  return { next, changed };
}

// 両ストアの結果が揃ってから書き戻す。型不一致で例外になった場合、受け手は変更されない。
function commit(
  state: AbsState,
  updates: StoreUpdate[],
): { changed: boolean } {
  STORES.forEach((s, i) => {
    const dst = state[s];
    dst.clear();
    for (const [k, v] of updates[i].next) dst.set(k, v);
  });
  return { changed: updates.some((u) => u.changed) };
}

export function widening(state: AbsState, other: AbsState): AbsState {
  return lift(state, other, valueWiden);
}

export function narrowing(state: AbsState, other: AbsState): AbsState {
  return lift(state, other, valueNarrow);
}

// 両側にある鍵だけ op を適用し、片側のみの鍵は複製して残す
function lift(
  a: AbsState,
  b: AbsState,
  op: (x: AbstractValue, y: AbstractValue) => AbstractValue,
): AbsState {
  const out = createState();
  for (const s of STORES) {
    const left = a[s];
    const right = b[s];
    const keys = new Set([...left.keys(), ...right.keys()]);
    for (const k of keys) {
      const x = left.get(k);
      const y = right.get(k);
      if (x && y) out[s].set(k, op(x, y));
      else if (x) out[s].set(k, cloneValue(x));
      else if (y) out[s].set(k, cloneValue(y));
    }
  }
  return out;
}

/**
 * state ⊒ other。不動点ドライバの収束判定に使う半順序。
 * other の鍵が state に無い、または型が違えば false。
 */
export function containment(state: AbsState, other: AbsState): boolean {
  for (const s of STORES) {
    for (const [k, v] of other[s]) {
      const mine = state[s].get(k);
      if (!mine || !valueContains(mine, v)) return false;
    }
  }
  return true;
}

export function lessThan(state: AbsState, other: AbsState): boolean {
  return !containment(state, other);
}

export function stateEquals(a: AbsState, b: AbsState): boolean {
  return STORES.every((s) => storeEquals(a[s], b[s]));
}

function storeEquals(lhs: Store, rhs: Store): boolean {
  if (lhs.size !== rhs.size) return false;
  for (const [k, v] of lhs) {
    const w = rhs.get(k);
    if (!w || !valueEquals(v, w)) return false;
  }
  return true;
}
