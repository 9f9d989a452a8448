import { z } from "zod";

// 仮想アドレスは 32bit 整数に収める。上位 (32 - idBits) bit がタグ、下位 idBits bit が ObjectId。
const ADDRESS_WIDTH = 32;

export const AddressSchemeOptionsSchema = z
  .object({
    idBits: z.number().int().min(1).max(31).default(24),
    tag: z.number().int().positive().default(0x7f),
  })
  .refine((o) => o.tag < 2 ** (ADDRESS_WIDTH - o.idBits), {
    message: "tag does not fit into the high bits left by idBits",
    path: ["tag"],
  });

export type AddressSchemeOptions = z.input<typeof AddressSchemeOptionsSchema>;

export type AddressScheme = Readonly<{
  idBits: number;
  tag: number;
  /** タグを上位に寄せた値 (既定 0x7f000000) */
  highTag: number;
  /** タグ領域のマスク (既定 0xff000000) */
  mask: number;
  /** ObjectId 領域のマスク (既定 0x00ffffff) */
  idMask: number;
}>;

export function normalizeAddressScheme(
  options: AddressSchemeOptions = {},
): AddressScheme {
  const { idBits, tag } = AddressSchemeOptionsSchema.parse(options);
  const idMask = 2 ** idBits - 1;
  // ビット演算は符号付き 32bit になるため >>> 0 で符号なしに戻す
  return Object.freeze({
    idBits,
    tag,
    highTag: (tag * 2 ** idBits) >>> 0,
    mask: ~idMask >>> 0,
    idMask,
  });
}

export const DEFAULT_ADDRESS_SCHEME: AddressScheme = normalizeAddressScheme();
