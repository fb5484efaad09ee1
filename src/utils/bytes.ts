import {
  bytesToHex as toHex,
  hexToBytes as fromHex,
} from "@noble/hashes/utils";
import type { Hex } from "../types/brands";

export const bytesToHex = (bytes: Uint8Array): Hex => `0x${toHex(bytes)}`;

export const hexToBytes = (hex: string): Uint8Array =>
  fromHex(hex.startsWith("0x") || hex.startsWith("0X") ? hex.slice(2) : hex);

export const isZero = (bytes: Uint8Array): boolean =>
  bytes.every((b) => b === 0);

// big-endian, fixed 8 bytes
export const u64ToBytes = (n: bigint): Uint8Array => {
  const out = new Uint8Array(8);
  new DataView(out.buffer).setBigUint64(0, n, false);
  return out;
};

export const bytesToU64 = (b: Uint8Array): bigint =>
  new DataView(b.buffer, b.byteOffset, b.byteLength).getBigUint64(0, false);
