import { HeaderSyncError } from "./errors";
import type { KvReader, KvWriter } from "./store";
import { asCircuitId } from "../types/brands";
import type { CircuitId } from "../types/brands";
import { bytesToHex, hexToBytes, isZero } from "../utils/bytes";

const circuitKey = (name: string) => `circuit/${name}`;

export const getCircuitId = (kv: KvReader, name: string): CircuitId | undefined => {
  const raw = kv.get(circuitKey(name));
  if (!raw || isZero(raw)) return undefined;
  return asCircuitId(bytesToHex(raw));
};

export const requireCircuitId = (kv: KvReader, name: string): CircuitId => {
  const id = getCircuitId(kv, name);
  if (!id) throw new HeaderSyncError("CircuitNotRegistered", `no circuit registered as "${name}"`);
  return id;
};

export const putCircuitId = (kv: KvWriter, name: string, id: CircuitId): void => {
  kv.put(circuitKey(name), hexToBytes(id));
};
