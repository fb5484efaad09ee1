import {
  decodeHeaderOutput,
  decodeHeightContext,
  encodeHeightContext,
  encodeSkipInput,
} from "../codec/payload";
import { HeaderSyncError } from "./errors";
import { getHead, getLatest, recordHeader, setLatest } from "./headers";
import { requireCircuitId } from "./registry";
import type { KvReader, KvWriter } from "./store";
import { SKIP_CIRCUIT } from "./types";
import type { CallbackMessage, GatewayRequest, TrustedHeader } from "./types";
import type { Height } from "../types/brands";

/**
 * Widest jump a single skip may cover. Sized to the largest range a
 * downstream data commitment can aggregate; integrators targeting a different
 * commitment limit should lower it to match.
 */
export const DEFAULT_MAX_SKIP_SPAN = 512n;

export interface SkipPlan {
  readonly trusted: TrustedHeader;
  readonly requestedHeight: Height;
  readonly request: Omit<GatewayRequest, "fee">;
}

export const planSkip = (
  kv: KvReader,
  requestedHeight: Height,
  maxSkipSpan: bigint = DEFAULT_MAX_SKIP_SPAN,
): SkipPlan => {
  const trusted = getHead(kv);
  if (!trusted) {
    throw new HeaderSyncError(
      "TrustedHeaderMissing",
      `no header at latest height ${getLatest(kv)}`,
    );
  }
  const circuitId = requireCircuitId(kv, SKIP_CIRCUIT);

  if (requestedHeight <= trusted.height) {
    throw new HeaderSyncError(
      "NonAdvancingRequest",
      `requested ${requestedHeight} is not above latest ${trusted.height}`,
    );
  }
  if (requestedHeight - trusted.height > maxSkipSpan) {
    throw new HeaderSyncError(
      "SkipSpanExceeded",
      `span ${requestedHeight - trusted.height} exceeds ${maxSkipSpan}`,
    );
  }

  return {
    trusted,
    requestedHeight,
    request: {
      circuitId,
      input: encodeSkipInput(trusted.header, trusted.height, requestedHeight),
      callback: "fulfillSkip",
      context: encodeHeightContext(requestedHeight),
    },
  };
};

export const applySkip = (kv: KvWriter, msg: CallbackMessage): TrustedHeader => {
  const requestedHeight = decodeHeightContext(msg.context);
  const header = decodeHeaderOutput(msg.proofOutput);

  // A request overtaken by another fulfillment must not land.
  const latest = getLatest(kv);
  if (requestedHeight <= latest) {
    throw new HeaderSyncError(
      "StaleOrOutOfOrderFulfillment",
      `skip to ${requestedHeight} arrived with latest at ${latest}`,
    );
  }

  recordHeader(kv, requestedHeight, header);
  setLatest(kv, requestedHeight);
  return { height: requestedHeight, header };
};
