import {
  type DisplayValue,
  type StateDump,
  type StateSection,
  STATE_SCHEMA_VERSION,
} from "@/lib/analysis-schema";
import { isIntervalTop } from "../core/interval";
import type { AbsState } from "../core/state";
import { type AbstractValue, formatValue, isValueBottom } from "../core/value";

type StateToSectionsOptions = {
  /** false のとき objs セクションを生成しない（sliceState 後のサマリ表示向け） */
  includeObjects?: boolean;
};

export function toDisplay(value: AbstractValue): DisplayValue {
  const label = formatValue(value);
  if (value.kind === "address") {
    return value.addrs.size === 0
      ? { label, style: "neutral", kind: "address", description: "指し先なし" }
      : { label, style: "info", kind: "address" };
  }
  if (isValueBottom(value)) {
    return { label, style: "neutral", kind: "interval", description: "到達不能" };
  }
  if (isIntervalTop(value.interval)) {
    return { label, style: "warning", kind: "interval", description: "制約なし" };
  }
  return { label, style: "safe", kind: "interval" };
}

function toData(store: Map<number, AbstractValue>): Record<string, DisplayValue> {
  const data: Record<string, DisplayValue> = {};
  const keys = [...store.keys()].sort((a, b) => a - b);
  for (const k of keys) {
    const v = store.get(k);
    if (v) data[String(k)] = toDisplay(v);
  }
  return data;
}

export function stateToSections(
  state: AbsState,
  options: StateToSectionsOptions = {},
): StateDump {
  const { includeObjects = true } = options;

  const sections: StateSection[] = [
    {
      id: "vars",
      title: "Variables",
      type: "key-value" as const,
      data: toData(state.vars),
    },
  ];

  if (includeObjects) {
    const hasBottomObject = Array.from(state.objs.values()).some(
      (v) => v.kind === "interval" && isValueBottom(v),
    );
    sections.push({
      id: "objs",
      title: "Objects",
      type: "key-value" as const,
      data: toData(state.objs),
      alert: hasBottomObject,
    });
  }

  return { schemaVersion: STATE_SCHEMA_VERSION, sections };
}
