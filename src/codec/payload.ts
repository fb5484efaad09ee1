// Fixed-width positional encodings consumed by the header circuits.
// Heights are uint64 big-endian; there are no length prefixes.

import { concat } from "uint8arrays";
import { HeaderSyncError } from "../core/errors";
import { asHeaderHash, asHeight } from "../types/brands";
import type { HeaderHash, Height } from "../types/brands";
import { bytesToHex, bytesToU64, hexToBytes, u64ToBytes } from "../utils/bytes";

export const HEADER_BYTES = 32;
export const HEIGHT_BYTES = 8;

/* ── skip: trustedHeader(32) ‖ trustedHeight(8) ‖ requestedHeight(8) ── */
export const encodeSkipInput = (
  trustedHeader: HeaderHash,
  trustedHeight: Height,
  requestedHeight: Height,
): Uint8Array =>
  concat([hexToBytes(trustedHeader), u64ToBytes(trustedHeight), u64ToBytes(requestedHeight)]);

/* ── step: headHeader(32) ‖ trustedHeight(8) ── */
export const encodeStepInput = (headHeader: HeaderHash, trustedHeight: Height): Uint8Array =>
  concat([hexToBytes(headHeader), u64ToBytes(trustedHeight)]);

/* ── callback context / proof output ── */
export const encodeHeightContext = (height: Height): Uint8Array => u64ToBytes(height);

export const decodeHeightContext = (context: Uint8Array): Height => {
  if (context.length !== HEIGHT_BYTES) {
    throw new HeaderSyncError(
      "MalformedCallback",
      `context must be ${HEIGHT_BYTES} bytes, got ${context.length}`,
    );
  }
  return asHeight(bytesToU64(context));
};

export const decodeHeaderOutput = (proofOutput: Uint8Array): HeaderHash => {
  if (proofOutput.length !== HEADER_BYTES) {
    throw new HeaderSyncError(
      "MalformedCallback",
      `proof output must be ${HEADER_BYTES} bytes, got ${proofOutput.length}`,
    );
  }
  return asHeaderHash(bytesToHex(proofOutput));
};
