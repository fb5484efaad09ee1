import { HeaderSyncError } from "../core/errors";

// Generic phantom-brand helper
export type Brand<Base, Tag extends string> = Base & { readonly __brand: Tag };

export type Hex = `0x${string}`;

export type Height = Brand<bigint, "Height">;
export type HeaderHash = Brand<Hex, "HeaderHash">;
export type CircuitId = Brand<Hex, "CircuitId">;
export type RequestId = Brand<Hex, "RequestId">;
export type Address = Brand<Hex, "Address">;

export const MAX_U64 = 2n ** 64n - 1n;

const hexOfLength = (bytes: number) => new RegExp(`^0x[0-9a-f]{${bytes * 2}}$`);
const BYTES32 = hexOfLength(32);
const BYTES20 = hexOfLength(20);

const normalizeHex = (s: string): string =>
  (s.startsWith("0x") || s.startsWith("0X") ? "0x" + s.slice(2) : "0x" + s).toLowerCase();

const invalid = (what: string, value: unknown): HeaderSyncError =>
  new HeaderSyncError("InvalidValue", `${what}: ${String(value)}`);

/** Accepts a bigint, a safe integer or a decimal string within the uint64 range. */
export const asHeight = (n: bigint | number | string): Height => {
  let v: bigint;
  if (typeof n === "bigint") v = n;
  else if (typeof n === "number" && Number.isSafeInteger(n)) v = BigInt(n);
  else if (typeof n === "string" && /^\d+$/.test(n)) v = BigInt(n);
  else throw invalid("height", n);
  if (v < 0n || v > MAX_U64) throw invalid("height out of uint64 range", n);
  return v as Height;
};

export const asHeaderHash = (s: string): HeaderHash => {
  const hex = normalizeHex(s);
  if (!BYTES32.test(hex)) throw invalid("header hash", s);
  return hex as HeaderHash;
};

export const asCircuitId = (s: string): CircuitId => {
  const hex = normalizeHex(s);
  if (!BYTES32.test(hex)) throw invalid("circuit id", s);
  return hex as CircuitId;
};

export const asRequestId = (s: string): RequestId => {
  const hex = normalizeHex(s);
  if (!BYTES32.test(hex)) throw invalid("request id", s);
  return hex as RequestId;
};

export const asAddress = (s: string): Address => {
  const hex = normalizeHex(s);
  if (!BYTES20.test(hex)) throw invalid("address", s);
  return hex as Address;
};
