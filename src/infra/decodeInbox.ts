import { decodeCallbackFrame } from "../codec/rlp";
import { HeaderSyncError } from "../core/errors";
import type { CallbackMessage } from "../core/types";
import { asAddress } from "../types/brands";
import type { Address } from "../types/brands";

/** Wire-level message delivered by a transport. */
export interface Delivered {
  from: string; // transport-attested sender, never read from the payload
  payload: Uint8Array; // RLP([kind, proofOutput, context])
}

const senderOf = (from: string): Address => {
  try {
    return asAddress(from);
  } catch {
    throw new HeaderSyncError("MalformedCallback", `sender is not an address: ${from}`);
  }
};

export function decodeInbox(msg: Delivered): CallbackMessage {
  const caller = senderOf(msg.from);
  return { ...decodeCallbackFrame(msg.payload), caller };
}
