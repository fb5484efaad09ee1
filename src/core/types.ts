import type {
  Address,
  CircuitId,
  HeaderHash,
  Height,
  RequestId,
} from "../types/brands";

/* ── trusted state ───────────────────────────────────────── */
export interface TrustedHeader {
  readonly height: Height;
  readonly header: HeaderHash;
}

export const SKIP_CIRCUIT = "skip";
export const STEP_CIRCUIT = "step";

/* ── gateway boundary ────────────────────────────────────── */
export const CALLBACK_KINDS = ["fulfillSkip", "fulfillStep"] as const;
export type CallbackKind = (typeof CALLBACK_KINDS)[number];

export interface GatewayRequest {
  readonly circuitId: CircuitId;
  readonly input: Uint8Array; // positional, no delimiters
  readonly callback: CallbackKind;
  readonly context: Uint8Array; // handed back untouched on fulfillment
  readonly fee: bigint;
}

export interface GatewayClient {
  request(req: GatewayRequest): Promise<RequestId>;
}

export interface CallbackMessage {
  readonly kind: CallbackKind;
  readonly caller: Address;
  readonly proofOutput: Uint8Array;
  readonly context: Uint8Array;
}

export interface CallbackReceiver<R> {
  handleCallback(msg: CallbackMessage): R;
}

export interface RequestOptions {
  readonly fee?: bigint;
}

/* ── observable events ───────────────────────────────────── */
export type HeaderSkipRequested = {
  type: "HeaderSkipRequested";
  trustedHeight: Height;
  requestedHeight: Height;
  requestId: RequestId;
};

export type HeaderStepRequested = {
  type: "HeaderStepRequested";
  trustedHeight: Height;
  previousHeight: Height;
  requestId: RequestId;
};

export type HeaderFulfilled = {
  type: "HeaderSkipFulfilled" | "HeaderStepFulfilled";
  height: Height;
  header: HeaderHash;
};

export type AdminEvent =
  | { type: "GenesisHeaderSet"; height: Height; header: HeaderHash }
  | { type: "GatewayUpdated"; gateway: Address }
  | { type: "CircuitRegistered"; name: string; circuitId: CircuitId };

export type AdvanceRequested = HeaderSkipRequested | HeaderStepRequested;

export type LightClientEvent = AdvanceRequested | HeaderFulfilled | AdminEvent;

export type EventSink = (event: LightClientEvent) => void;
