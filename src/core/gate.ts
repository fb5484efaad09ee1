import { HeaderSyncError } from "./errors";
import type { KvReader, KvWriter } from "./store";
import type { CallbackMessage } from "./types";
import { asAddress } from "../types/brands";
import type { Address } from "../types/brands";
import { bytesToHex, hexToBytes } from "../utils/bytes";

const GATEWAY_KEY = "gateway";

export const getGatewayAddress = (kv: KvReader): Address | undefined => {
  const raw = kv.get(GATEWAY_KEY);
  return raw ? asAddress(bytesToHex(raw)) : undefined;
};

export const putGatewayAddress = (kv: KvWriter, gateway: Address): void => {
  kv.put(GATEWAY_KEY, hexToBytes(gateway));
};

/**
 * The only authentication in the system: a callback is accepted iff it comes
 * from the configured gateway. Proof validity is the gateway's concern.
 */
export const authenticateCallback = (kv: KvReader, msg: CallbackMessage): void => {
  const gateway = getGatewayAddress(kv);
  if (gateway === undefined || gateway !== msg.caller) {
    throw new HeaderSyncError(
      "UnauthorizedCallback",
      `${msg.kind} from ${msg.caller}, gateway is ${gateway ?? "unset"}`,
    );
  }
};

/* ── administrative surface ──────────────────────────────── */

// "open" mirrors the deployed behaviour: anyone may administer.
export type AdminPolicy =
  | { readonly kind: "open" }
  | { readonly kind: "restricted"; readonly admin: Address };

export const OPEN_ADMIN: AdminPolicy = { kind: "open" };

export const authorizeAdmin = (
  policy: AdminPolicy,
  action: string,
  caller?: Address,
): void => {
  if (policy.kind === "open") return;
  if (caller !== policy.admin) {
    throw new HeaderSyncError(
      "UnauthorizedAdmin",
      `${action} by ${caller ?? "anonymous caller"}`,
    );
  }
};
