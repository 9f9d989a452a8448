// 区間ドメイン。null はその側が無限 (lb なら -∞, ub なら +∞) を表す。
export type Bound = number | null;

export type Interval = {
  lb: Bound;
  ub: Bound;
};

// 正規の ⊥。lb > ub のペアはすべて ⊥ として扱う。
const BOTTOM_LB = 1;
const BOTTOM_UB = 0;

export function makeInterval(lb: Bound = null, ub: Bound = null): Interval {
  return { lb, ub };
}

export function intervalTop(): Interval {
  return { lb: null, ub: null };
}

export function intervalBottom(): Interval {
  return { lb: BOTTOM_LB, ub: BOTTOM_UB };
}

export function intervalConst(n: number): Interval {
  return { lb: n, ub: n };
}

export function cloneInterval(src: Interval): Interval {
  return { lb: src.lb, ub: src.ub };
}

export function isIntervalTop(i: Interval): boolean {
  return i.lb === null && i.ub === null;
}

export function isIntervalBottom(i: Interval): boolean {
  if (i.lb === null || i.ub === null) return false;
  return i.lb > i.ub;
}

export function isIntervalConst(i: Interval): boolean {
  return i.lb !== null && i.ub !== null && i.lb === i.ub;
}

export function setIntervalTop(i: Interval) {
  i.lb = null;
  i.ub = null;
}

export function setIntervalBottom(i: Interval) {
  i.lb = BOTTOM_LB;
  i.ub = BOTTOM_UB;
}

/** a ⊒ b */
export function intervalContains(a: Interval, b: Interval): boolean {
  if (isIntervalBottom(b)) return true;
  if (isIntervalBottom(a)) return false;

  const lbOk = a.lb === null || (b.lb !== null && a.lb <= b.lb);
  const ubOk = a.ub === null || (b.ub !== null && a.ub >= b.ub);
  return lbOk && ubOk;
}

export function intervalJoin(a: Interval, b: Interval): Interval {
  if (isIntervalBottom(a)) return cloneInterval(b);
  if (isIntervalBottom(b)) return cloneInterval(a);

  const lb = a.lb === null || b.lb === null ? null : Math.min(a.lb, b.lb);
  const ub = a.ub === null || b.ub === null ? null : Math.max(a.ub, b.ub);
  return { lb, ub };
}

export function intervalMeet(a: Interval, b: Interval): Interval {
  if (isIntervalBottom(a) || isIntervalBottom(b)) return intervalBottom();

  const lb = a.lb === null ? b.lb : b.lb === null ? a.lb : Math.max(a.lb, b.lb);
  const ub = a.ub === null ? b.ub : b.ub === null ? a.ub : Math.min(a.ub, b.ub);
  if (lb !== null && ub !== null && lb > ub) return intervalBottom();
  return { lb, ub };
}

/**
 * 標準的な区間 widening。
 * b 側の境界が a を越えて伸びていれば、その側は段階的に広げず一気に無限へ飛ばす。
 * 各境界は高々 1 回しか動かないため、増加列は 2 回以内で安定する。
 */
export function intervalWiden(a: Interval, b: Interval): Interval {
  if (isIntervalBottom(a)) return cloneInterval(b);
  if (isIntervalBottom(b)) return cloneInterval(a);

  const lb = a.lb === null || b.lb === null || b.lb < a.lb ? null : a.lb;
  const ub = a.ub === null || b.ub === null || b.ub > a.ub ? null : a.ub;
  return { lb, ub };
}

/**
 * 無限側だけを b の有限境界で置き換える。
 * 既に有限の境界は b がより狭くても締めない。
 */
export function intervalNarrow(a: Interval, b: Interval): Interval {
  if (isIntervalBottom(a) || isIntervalBottom(b)) return intervalBottom();

  const lb = a.lb === null && b.lb !== null ? b.lb : a.lb;
  const ub = a.ub === null && b.ub !== null ? b.ub : a.ub;
  return { lb, ub };
}

export function intervalEquals(a: Interval, b: Interval): boolean {
  const aBot = isIntervalBottom(a);
  const bBot = isIntervalBottom(b);
  if (aBot || bBot) return aBot && bBot;
  return a.lb === b.lb && a.ub === b.ub;
}

export function formatInterval(i: Interval): string {
  if (isIntervalBottom(i)) return "⊥";
  const lb = i.lb === null ? "-∞" : String(i.lb);
  const ub = i.ub === null ? "+∞" : String(i.ub);
  return `[${lb}, ${ub}]`;
}
