import { toHex } from "../core/address";
import type { AbsState } from "../core/state";
import { formatValue } from "../core/value";
import { type AddressScheme, DEFAULT_ADDRESS_SCHEME } from "../options";

// id 空間に収まらない鍵はタグを付けずに生の id を出す
function displayAddress(id: number, scheme: AddressScheme): string {
  if (!Number.isInteger(id) || id < 0 || id > scheme.idMask) return toHex(id);
  return toHex((scheme.highTag | id) >>> 0);
}

// 鍵は数値の昇順で並べる
function sortedEntries<V>(m: Map<number, V>): [number, V][] {
  return [...m.entries()].sort(([a], [b]) => a - b);
}

export function formatState(
  state: AbsState,
  scheme: AddressScheme = DEFAULT_ADDRESS_SCHEME,
): string {
  const lines = ["Variables:"];
  for (const [id, v] of sortedEntries(state.vars)) {
    lines.push(`  ${id}: ${formatValue(v)}`);
  }
  lines.push("Objects:");
  for (const [id, v] of sortedEntries(state.objs)) {
    lines.push(`  ${id} (${displayAddress(id, scheme)}): ${formatValue(v)}`);
  }
  return lines.join("\n");
}

export function printState(
  state: AbsState,
  log: (line: string) => void = console.log,
  scheme: AddressScheme = DEFAULT_ADDRESS_SCHEME,
) {
  for (const line of formatState(state, scheme).split("\n")) log(line);
}
