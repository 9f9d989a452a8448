import { type AddressScheme, DEFAULT_ADDRESS_SCHEME } from "../options";
import {
  type AddressSet,
  cloneAddressSet,
  getInternalId,
  isVirtualMemAddress,
  makeAddressSet,
  toHex,
} from "./address";
import { InvalidAddressError } from "./errors";
import {
  type Interval,
  setIntervalBottom,
  setIntervalTop,
} from "./interval";
import { type AbstractValue, cloneValue, createInterval } from "./value";

export type VariableId = number;
export type ObjectId = number;

// ObjectId 0 は null オブジェクト
export const NULL_OBJECT_ID: ObjectId = 0;

export type AbsState = {
  // 変数 → 値
  vars: Map<VariableId, AbstractValue>;
  // メモリオブジェクト → 値
  objs: Map<ObjectId, AbstractValue>;
};

type Entries = Iterable<readonly [number, AbstractValue]>;

export function createState(vars: Entries = [], objs: Entries = []): AbsState {
  return { vars: copyStore(vars), objs: copyStore(objs) };
}

// 値は共有禁止。コピーは必ず中身まで複製する。
export function cloneState(src: AbsState): AbsState {
  return { vars: copyStore(src.vars), objs: copyStore(src.objs) };
}

export function copyStore(entries: Entries): Map<number, AbstractValue> {
  const out = new Map<number, AbstractValue>();
  for (const [k, v] of entries) out.set(k, cloneValue(v));
  return out;
}

export function clearState(state: AbsState) {
  state.vars.clear();
  state.objs.clear();
}

/**
 * 未登録の変数は「まだ制約なし」とみなし、新しい top 区間を返す。
 * 登録済みなら格納されているインスタンスそのものを返す。
 */
export function getVar(state: AbsState, id: VariableId): AbstractValue {
  return state.vars.get(id) ?? createInterval();
}

// 書き込み時に複製し、呼び出し側の値と状態が同じインスタンスを共有しないようにする
export function setVar(state: AbsState, id: VariableId, value: AbstractValue) {
  state.vars.set(id, cloneValue(value));
}

export function inVarToAddrsTable(state: AbsState, id: VariableId): boolean {
  return state.vars.get(id)?.kind === "address";
}

export function inVarToValTable(state: AbsState, id: VariableId): boolean {
  return state.vars.get(id)?.kind === "interval";
}

export function inAddrToAddrsTable(state: AbsState, id: ObjectId): boolean {
  return state.objs.get(id)?.kind === "address";
}

export function inAddrToValTable(state: AbsState, id: ObjectId): boolean {
  return state.objs.get(id)?.kind === "interval";
}

function requireVirtual(addr: number, scheme: AddressScheme): ObjectId {
  if (!isVirtualMemAddress(addr, scheme)) {
    throw new InvalidAddressError(`not a virtual address: ${toHex(addr)}`, {
      addr,
    });
  }
  return getInternalId(addr, scheme);
}

export function store(
  state: AbsState,
  addr: number,
  value: AbstractValue,
  scheme: AddressScheme = DEFAULT_ADDRESS_SCHEME,
) {
  const id = requireVirtual(addr, scheme);
  // null への書き込みは定義済みの no-op (エラーではない)
  if (id === NULL_OBJECT_ID) return;
  state.objs.set(id, cloneValue(value));
}

export function load(
  state: AbsState,
  addr: number,
  scheme: AddressScheme = DEFAULT_ADDRESS_SCHEME,
): AbstractValue {
  const id = requireVirtual(addr, scheme);
  return state.objs.get(id) ?? createInterval();
}

// 手続き境界に渡す最小限のサマリ。オブジェクト側は含めない。
export function sliceState(state: AbsState, ids: Iterable<VariableId>): AbsState {
  const out = createState();
  for (const id of ids) {
    const v = state.vars.get(id);
    if (v) out.vars.set(id, cloneValue(v));
  }
  return out;
}

/**
 * 変数側の区間をすべて ⊥ にしたコピーを返す。
 * アドレス集合には普遍的な ⊥/top が無いので触らない。
 */
export function bottomState(state: AbsState): AbsState {
  return mapIntervals(state, setIntervalBottom);
}

/** bottomState の top 版 */
export function topState(state: AbsState): AbsState {
  return mapIntervals(state, setIntervalTop);
}

function mapIntervals(
  state: AbsState,
  update: (i: Interval) => void,
): AbsState {
  const out = cloneState(state);
  for (const v of out.vars.values()) {
    if (v.kind === "interval") update(v.interval);
  }
  return out;
}

/**
 * 構造体/配列アクセス後のアドレス集合。
 * オフセットが定数なら各アドレスに加算し、幅のある区間なら元の集合をそのまま返す。
 */
export function getGepObjAddrs(
  state: AbsState,
  pointer: VariableId,
  offset: Interval,
): AddressSet {
  const base = state.vars.get(pointer);
  if (base?.kind !== "address") return makeAddressSet();

  const { lb, ub } = offset;
  if (lb !== null && lb === ub) {
    return makeAddressSet([...base.addrs].map((a) => a + lb));
  }
  return cloneAddressSet(base.addrs);
}
