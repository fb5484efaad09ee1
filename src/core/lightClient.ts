import { makeLogger } from "../logging";
import type { Logger } from "../logging";
import type { Address, CircuitId, HeaderHash, Height, Hex } from "../types/brands";
import { HeaderSyncError } from "./errors";
import { authorizeAdmin, getGatewayAddress, OPEN_ADMIN, putGatewayAddress } from "./gate";
import type { AdminPolicy } from "./gate";
import { computeStoreRoot } from "./hash";
import { getHeader, getLatest, hasGenesis, setGenesis } from "./headers";
import { getCircuitId, putCircuitId } from "./registry";
import { routeCallback } from "./router";
import { DEFAULT_MAX_SKIP_SPAN, planSkip } from "./skip";
import { planStep } from "./step";
import { atomically } from "./store";
import type { KvStore } from "./store";
import type {
  AdminEvent,
  CallbackMessage,
  CallbackReceiver,
  EventSink,
  GatewayClient,
  HeaderFulfilled,
  HeaderSkipRequested,
  HeaderStepRequested,
  LightClientEvent,
  RequestOptions,
  TrustedHeader,
} from "./types";

// "repeatable" reproduces the unguarded genesis write of the deployed client.
export type GenesisPolicy = "once" | "repeatable";

export interface LightClientOptions {
  store: KvStore;
  gateway: GatewayClient;
  logger?: Logger;
  maxSkipSpan?: bigint;
  adminPolicy?: AdminPolicy;
  genesisPolicy?: GenesisPolicy;
  onEvent?: EventSink;
}

const logFields = (event: LightClientEvent): Record<string, unknown> =>
  Object.fromEntries(
    Object.entries(event).map(([k, v]) => [k, typeof v === "bigint" ? v.toString() : v]),
  );

export class LightClient implements CallbackReceiver<HeaderFulfilled> {
  readonly maxSkipSpan: bigint;
  private readonly store: KvStore;
  private readonly gateway: GatewayClient;
  private readonly log: Logger;
  private readonly adminPolicy: AdminPolicy;
  private readonly genesisPolicy: GenesisPolicy;
  private readonly onEvent?: EventSink;

  constructor(opts: LightClientOptions) {
    this.store = opts.store;
    this.gateway = opts.gateway;
    this.log = (opts.logger ?? makeLogger("silent")).child({ module: "light-client" });
    this.maxSkipSpan = opts.maxSkipSpan ?? DEFAULT_MAX_SKIP_SPAN;
    this.adminPolicy = opts.adminPolicy ?? OPEN_ADMIN;
    this.genesisPolicy = opts.genesisPolicy ?? "once";
    this.onEvent = opts.onEvent;
    if (this.maxSkipSpan < 1n) {
      throw new HeaderSyncError("InvalidValue", `maxSkipSpan must be positive, got ${this.maxSkipSpan}`);
    }
  }

  /* ── queries ───────────────────────────────────────────── */
  latestHeight(): Height {
    return getLatest(this.store);
  }

  headerAt(height: Height): HeaderHash | undefined {
    return getHeader(this.store, height);
  }

  circuitId(name: string): CircuitId | undefined {
    return getCircuitId(this.store, name);
  }

  gatewayAddress(): Address | undefined {
    return getGatewayAddress(this.store);
  }

  stateRoot(): Hex {
    return computeStoreRoot(this.store);
  }

  /* ── administration ────────────────────────────────────── */
  setGenesisHeader(height: Height, header: HeaderHash, caller?: Address): AdminEvent {
    authorizeAdmin(this.adminPolicy, "setGenesisHeader", caller);
    atomically(this.store, (tx) => {
      if (this.genesisPolicy === "once" && hasGenesis(tx)) {
        throw new HeaderSyncError("GenesisAlreadySet", `genesis already seeded, latest is ${getLatest(tx)}`);
      }
      setGenesis(tx, height, header);
    });
    return this.publish({ type: "GenesisHeaderSet", height, header });
  }

  setGatewayAddress(gateway: Address, caller?: Address): AdminEvent {
    authorizeAdmin(this.adminPolicy, "setGatewayAddress", caller);
    atomically(this.store, (tx) => putGatewayAddress(tx, gateway));
    return this.publish({ type: "GatewayUpdated", gateway });
  }

  setCircuitId(name: string, circuitId: CircuitId, caller?: Address): AdminEvent {
    authorizeAdmin(this.adminPolicy, "setCircuitId", caller);
    atomically(this.store, (tx) => putCircuitId(tx, name, circuitId));
    return this.publish({ type: "CircuitRegistered", name, circuitId });
  }

  /* ── requests ──────────────────────────────────────────── */
  async requestSkip(
    requestedHeight: Height,
    opts: RequestOptions = {},
  ): Promise<HeaderSkipRequested> {
    const plan = planSkip(this.store, requestedHeight, this.maxSkipSpan);
    const requestId = await this.gateway.request({ ...plan.request, fee: opts.fee ?? 0n });
    return this.publish({
      type: "HeaderSkipRequested",
      trustedHeight: plan.trusted.height,
      requestedHeight,
      requestId,
    });
  }

  async requestStep(opts: RequestOptions = {}): Promise<HeaderStepRequested> {
    const plan = planStep(this.store);
    const requestId = await this.gateway.request({ ...plan.request, fee: opts.fee ?? 0n });
    return this.publish({
      type: "HeaderStepRequested",
      trustedHeight: plan.trusted.height,
      previousHeight: plan.trusted.height,
      requestId,
    });
  }

  /* ── callbacks ─────────────────────────────────────────── */
  handleCallback(msg: CallbackMessage): HeaderFulfilled {
    const applied = this.applyCallback(msg);
    return this.publish({
      type: msg.kind === "fulfillSkip" ? "HeaderSkipFulfilled" : "HeaderStepFulfilled",
      height: applied.height,
      header: applied.header,
    });
  }

  fulfillSkip(caller: Address, proofOutput: Uint8Array, context: Uint8Array): HeaderFulfilled {
    return this.handleCallback({ kind: "fulfillSkip", caller, proofOutput, context });
  }

  fulfillStep(caller: Address, proofOutput: Uint8Array, context: Uint8Array): HeaderFulfilled {
    return this.handleCallback({ kind: "fulfillStep", caller, proofOutput, context });
  }

  private applyCallback(msg: CallbackMessage): TrustedHeader {
    try {
      return atomically(this.store, (tx) => routeCallback(tx, msg));
    } catch (err) {
      this.log.warn({ kind: msg.kind, caller: msg.caller, err }, "callback rejected");
      throw err;
    }
  }

  private publish<E extends LightClientEvent>(event: E): E {
    this.log.info(logFields(event), event.type);
    this.onEvent?.(event);
    return event;
  }
}
