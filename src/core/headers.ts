import { HeaderSyncError } from "./errors";
import type { KvReader, KvWriter } from "./store";
import type { TrustedHeader } from "./types";
import { asHeaderHash, asHeight } from "../types/brands";
import type { HeaderHash, Height } from "../types/brands";
import { bytesToHex, bytesToU64, hexToBytes, isZero, u64ToBytes } from "../utils/bytes";

const LATEST_KEY = "latest";
const headerKey = (height: Height) => `header/${height.toString()}`;

export const GENESIS_UNSET = asHeight(0n);

export const getLatest = (kv: KvReader): Height => {
  const raw = kv.get(LATEST_KEY);
  return raw ? asHeight(bytesToU64(raw)) : GENESIS_UNSET;
};

export const hasGenesis = (kv: KvReader): boolean => kv.get(LATEST_KEY) !== undefined;

/** Zero or missing entries both read as absent. */
export const getHeader = (kv: KvReader, height: Height): HeaderHash | undefined => {
  const raw = kv.get(headerKey(height));
  if (!raw || isZero(raw)) return undefined;
  return asHeaderHash(bytesToHex(raw));
};

export const getHead = (kv: KvReader): TrustedHeader | undefined => {
  const height = getLatest(kv);
  const header = getHeader(kv, height);
  return header ? { height, header } : undefined;
};

// Ordering is the caller's job; this only refuses a zero hash.
export const recordHeader = (kv: KvWriter, height: Height, header: HeaderHash): void => {
  const raw = hexToBytes(header);
  if (isZero(raw)) {
    throw new HeaderSyncError("ZeroHeaderHash", `refusing zero header at height ${height}`);
  }
  kv.put(headerKey(height), raw);
};

export const setLatest = (kv: KvWriter, height: Height): void => {
  kv.put(LATEST_KEY, u64ToBytes(height));
};

export const setGenesis = (kv: KvWriter, height: Height, header: HeaderHash): void => {
  recordHeader(kv, height, header);
  setLatest(kv, height);
};
