import { keccak_256 } from "@noble/hashes/sha3";
import { encode as rlpEncode } from "rlp";
import { concat } from "uint8arrays";
import type { KvStore } from "./store";
import type { GatewayRequest } from "./types";
import { asRequestId } from "../types/brands";
import type { Hex, RequestId } from "../types/brands";
import { bytesToHex } from "../utils/bytes";

/* ── Merkle helper ───────────────────────────────────────── */
export const merkle = (leaves: Uint8Array[]): Uint8Array => {
  if (leaves.length === 0) return keccak_256(new Uint8Array());
  if (leaves.length === 1) return leaves[0];
  const next: Uint8Array[] = [];
  for (let i = 0; i < leaves.length; i += 2) {
    const left = leaves[i];
    const right = i + 1 < leaves.length ? leaves[i + 1] : left;
    next.push(keccak_256(concat([left, right])));
  }
  return merkle(next);
};

/* ── store root over key-sorted entries ──────────────────── */
export const computeStoreRoot = (store: KvStore): Hex => {
  const leaves = [...store.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([key, value]) => keccak_256(rlpEncode([key, value])));
  return bytesToHex(merkle(leaves));
};

/* ── gateway request id ──────────────────────────────────── */
export const deriveRequestId = (nonce: bigint, req: GatewayRequest): RequestId =>
  asRequestId(
    bytesToHex(
      keccak_256(
        rlpEncode([nonce, req.circuitId, req.input, req.callback, req.context, req.fee]),
      ),
    ),
  );
