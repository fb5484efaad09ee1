import { keccak_256 } from "@noble/hashes/sha3";
import { LightClient } from "../../src/core/lightClient";
import type { LightClientOptions } from "../../src/core/lightClient";
import { MemoryKvStore } from "../../src/core/store";
import type { KvStore } from "../../src/core/store";
import { SKIP_CIRCUIT, STEP_CIRCUIT } from "../../src/core/types";
import type { LightClientEvent } from "../../src/core/types";
import { MemoryGateway } from "../../src/infra/memoryGateway";
import { asAddress, asCircuitId, asHeaderHash, asHeight } from "../../src/types/brands";
import type { HeaderHash } from "../../src/types/brands";
import { bytesToHex, hexToBytes, u64ToBytes } from "../../src/utils/bytes";

export const GENESIS_HEIGHT = asHeight(3000n);
export const GENESIS_HEADER = asHeaderHash(
  "0xa8512f18c34b70e1533cfd5aa04f251fcb0d7be56ec570051fbad9bdb9435e6a",
);

export const GATEWAY = asAddress("0x" + "11".repeat(20));
export const STRANGER = asAddress("0x" + "22".repeat(20));
export const ADMIN = asAddress("0x" + "aa".repeat(20));

export const SKIP_ID = asCircuitId("0x" + "01".repeat(32));
export const STEP_ID = asCircuitId("0x" + "02".repeat(32));

/** Deterministic, non-zero header hash for a height. */
export const headerFor = (height: bigint): HeaderHash =>
  asHeaderHash(bytesToHex(keccak_256(u64ToBytes(height))));

export const outputOf = (header: HeaderHash): Uint8Array => hexToBytes(header);

export interface Harness {
  store: KvStore;
  gateway: MemoryGateway;
  client: LightClient;
  events: LightClientEvent[];
}

/** Client wired to an in-process gateway, with gateway, circuits and genesis 3000 set. */
export const seededClient = (
  opts: Partial<Omit<LightClientOptions, "gateway" | "onEvent">> = {},
  seed = true,
): Harness => {
  const store = opts.store ?? new MemoryKvStore();
  const gateway = new MemoryGateway(GATEWAY);
  const events: LightClientEvent[] = [];
  const client = new LightClient({
    ...opts,
    store,
    gateway,
    onEvent: (e) => events.push(e),
  });
  gateway.connect(client);
  if (seed) {
    client.setGatewayAddress(GATEWAY, ADMIN);
    client.setCircuitId(SKIP_CIRCUIT, SKIP_ID, ADMIN);
    client.setCircuitId(STEP_CIRCUIT, STEP_ID, ADMIN);
    client.setGenesisHeader(GENESIS_HEIGHT, GENESIS_HEADER, ADMIN);
    events.length = 0;
  }
  return { store, gateway, client, events };
};
