// RLP framing for callbacks on the wire and for store snapshots.

import * as rlp from "rlp";
import { toString as utf8 } from "uint8arrays";
import { HeaderSyncError } from "../core/errors";
import { CALLBACK_KINDS } from "../core/types";
import type { CallbackKind } from "../core/types";

type Decoded = Uint8Array | rlp.NestedUint8Array;

const isBytes = (x: Decoded): x is Uint8Array => x instanceof Uint8Array;

const isCallbackKind = (s: string): s is CallbackKind =>
  CALLBACK_KINDS.some((k) => k === s);

/* ── callback payload: RLP([kind, proofOutput, context]) ── */
export interface CallbackFrame {
  readonly kind: CallbackKind;
  readonly proofOutput: Uint8Array;
  readonly context: Uint8Array;
}

export const encodeCallbackFrame = (f: CallbackFrame): Uint8Array =>
  rlp.encode([f.kind, f.proofOutput, f.context]);

export const decodeCallbackFrame = (payload: Uint8Array): CallbackFrame => {
  let decoded: Decoded;
  try {
    decoded = rlp.decode(payload);
  } catch (err) {
    throw new HeaderSyncError("MalformedCallback", `undecodable payload: ${String(err)}`);
  }
  if (isBytes(decoded) || decoded.length !== 3) {
    throw new HeaderSyncError("MalformedCallback", "payload must be a 3-item list");
  }
  const [kind, proofOutput, context] = decoded;
  if (!isBytes(kind) || !isBytes(proofOutput) || !isBytes(context)) {
    throw new HeaderSyncError("MalformedCallback", "payload items must be byte strings");
  }
  const name = utf8(kind);
  if (!isCallbackKind(name)) {
    throw new HeaderSyncError("MalformedCallback", `unknown callback kind "${name}"`);
  }
  return { kind: name, proofOutput, context };
};

/* ── snapshot: RLP([[key, value], …]) ── */
export const encodeSnapshot = (
  entries: Iterable<readonly [string, Uint8Array]>,
): Uint8Array => rlp.encode([...entries].map(([k, v]) => [k, v]));

export const decodeSnapshot = (bytes: Uint8Array): [string, Uint8Array][] => {
  const decoded: Decoded = rlp.decode(bytes);
  if (isBytes(decoded)) throw new Error("snapshot must be a list");
  return decoded.map((entry) => {
    if (isBytes(entry) || entry.length !== 2) throw new Error("snapshot entry must be a pair");
    const [key, value] = entry;
    if (!isBytes(key) || !isBytes(value)) throw new Error("snapshot entry items must be byte strings");
    return [utf8(key), value];
  });
};
