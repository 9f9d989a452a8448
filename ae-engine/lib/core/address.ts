import { type AddressScheme, DEFAULT_ADDRESS_SCHEME } from "../options";
import { InvalidAddressError } from "./errors";

// 有限冪集合ドメイン。オブジェクト集合は解析開始時に固定なので widening は不要。
export type AddressSet = Set<number>;

export function makeAddressSet(addrs: Iterable<number> = []): AddressSet {
  return new Set(addrs);
}

export function cloneAddressSet(src: AddressSet): AddressSet {
  return new Set(src);
}

export function addAddress(set: AddressSet, addr: number) {
  set.add(addr);
}

export function hasAddress(set: AddressSet, addr: number): boolean {
  return set.has(addr);
}

export function addressJoin(a: AddressSet, b: AddressSet): AddressSet {
  const out = new Set(a);
  for (const x of b) out.add(x);
  return out;
}

export function addressMeet(a: AddressSet, b: AddressSet): AddressSet {
  const out = new Set<number>();
  for (const x of a) {
    if (b.has(x)) out.add(x);
  }
  return out;
}

/** b ⊆ a */
export function addressContains(a: AddressSet, b: AddressSet): boolean {
  for (const x of b) {
    if (!a.has(x)) return false;
  }
  return true;
}

export function addressEquals(a: AddressSet, b: AddressSet): boolean {
  return a.size === b.size && addressContains(a, b);
}

export function formatAddressSet(set: AddressSet): string {
  if (set.size === 0) return "∅";
  const sorted = [...set].sort((x, y) => x - y);
  return `{${sorted.map(toHex).join(", ")}}`;
}

// 負数は符号を接頭辞の前に置く (-0x5)
export function toHex(n: number): string {
  return n < 0 ? `-0x${(-n).toString(16)}` : `0x${n.toString(16)}`;
}

// --- 仮想アドレス (タグ付き整数) ---

export function getVirtualMemAddress(
  id: number,
  scheme: AddressScheme = DEFAULT_ADDRESS_SCHEME,
): number {
  if (!Number.isInteger(id) || id < 0 || id > scheme.idMask) {
    throw new InvalidAddressError(
      `object id out of range for ${scheme.idBits}-bit id space: ${id}`,
      { id },
    );
  }
  return (scheme.highTag | id) >>> 0;
}

export function isVirtualMemAddress(
  value: number,
  scheme: AddressScheme = DEFAULT_ADDRESS_SCHEME,
): boolean {
  if (!Number.isInteger(value) || value < 0 || value > 0xffffffff) return false;
  return (value & scheme.mask) >>> 0 === scheme.highTag;
}

// タグ付きでない値はそのまま返す
export function getInternalId(
  value: number,
  scheme: AddressScheme = DEFAULT_ADDRESS_SCHEME,
): number {
  if (!isVirtualMemAddress(value, scheme)) return value;
  return (value & scheme.idMask) >>> 0;
}
