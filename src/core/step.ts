import {
  decodeHeaderOutput,
  decodeHeightContext,
  encodeHeightContext,
  encodeStepInput,
} from "../codec/payload";
import { HeaderSyncError } from "./errors";
import { getHead, getLatest, recordHeader, setLatest } from "./headers";
import { requireCircuitId } from "./registry";
import type { KvReader, KvWriter } from "./store";
import { STEP_CIRCUIT } from "./types";
import type { CallbackMessage, GatewayRequest, TrustedHeader } from "./types";
import { asHeight, MAX_U64 } from "../types/brands";

// Step is the fallback when validator churn between heights is too large for skip.

export interface StepPlan {
  readonly trusted: TrustedHeader;
  readonly request: Omit<GatewayRequest, "fee">;
}

export const planStep = (kv: KvReader): StepPlan => {
  const trusted = getHead(kv);
  if (!trusted) {
    throw new HeaderSyncError(
      "TrustedHeaderMissing",
      `no header at latest height ${getLatest(kv)}`,
    );
  }
  const circuitId = requireCircuitId(kv, STEP_CIRCUIT);

  return {
    trusted,
    request: {
      circuitId,
      input: encodeStepInput(trusted.header, trusted.height),
      callback: "fulfillStep",
      // the previous height, not the target
      context: encodeHeightContext(trusted.height),
    },
  };
};

export const applyStep = (kv: KvWriter, msg: CallbackMessage): TrustedHeader => {
  const previousHeight = decodeHeightContext(msg.context);
  const header = decodeHeaderOutput(msg.proofOutput);
  if (previousHeight === MAX_U64) {
    throw new HeaderSyncError("MalformedCallback", "step past the uint64 range");
  }
  const nextHeight = asHeight(previousHeight + 1n);

  const latest = getLatest(kv);
  if (nextHeight <= latest) {
    throw new HeaderSyncError(
      "StaleOrOutOfOrderFulfillment",
      `step to ${nextHeight} arrived with latest at ${latest}`,
    );
  }

  recordHeader(kv, nextHeight, header);
  setLatest(kv, nextHeight);
  return { height: nextHeight, header };
};
