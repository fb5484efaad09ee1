import { safeParse } from "valibot";
import type { GenesisPolicy } from "./core/lightClient";
import { HeaderSyncError } from "./core/errors";
import type { AdminPolicy } from "./core/gate";
import { OPEN_ADMIN } from "./core/gate";
import type { LogLevel } from "./logging";
import { envSchema } from "./schema";
import { asAddress, asHeight } from "./types/brands";
import type { Address, Height } from "./types/brands";

export interface Config {
  logLevel: LogLevel;
  logPretty: boolean;
  maxSkipSpan: bigint;
  gatewayAddress?: Address;
  adminPolicy: AdminPolicy;
  genesisPolicy: GenesisPolicy;
  stateFile?: string;
  tendermintRpcUrl?: string;
  relayerIntervalMs: number;
  relayerConfirmations: Height;
}

/** Reads the process environment; unknown variables are ignored. */
export const loadConfig = (
  env: Record<string, string | undefined> = process.env,
): Config => {
  const parsed = safeParse(envSchema, env);
  if (!parsed.success) {
    throw new HeaderSyncError(
      "InvalidConfig",
      parsed.issues
        .map((issue) => {
          const key = issue.path?.map((p) => String(p.key)).join(".");
          return key ? `${key}: ${issue.message}` : issue.message;
        })
        .join("; "),
    );
  }
  const e = parsed.output;

  const maxSkipSpan = BigInt(e.MAX_SKIP_SPAN);
  if (maxSkipSpan < 1n) {
    throw new HeaderSyncError("InvalidConfig", "MAX_SKIP_SPAN: must be at least 1");
  }
  const relayerIntervalMs = Number(e.RELAYER_INTERVAL_MS);
  if (!Number.isSafeInteger(relayerIntervalMs) || relayerIntervalMs < 1) {
    throw new HeaderSyncError("InvalidConfig", "RELAYER_INTERVAL_MS: must be a positive integer");
  }

  return {
    logLevel: e.LOG_LEVEL,
    logPretty: e.LOG_PRETTY,
    maxSkipSpan,
    gatewayAddress: e.GATEWAY_ADDRESS === undefined ? undefined : asAddress(e.GATEWAY_ADDRESS),
    adminPolicy:
      e.ADMIN_ADDRESS === undefined
        ? OPEN_ADMIN
        : { kind: "restricted", admin: asAddress(e.ADMIN_ADDRESS) },
    genesisPolicy: e.GENESIS_POLICY,
    stateFile: e.STATE_FILE,
    tendermintRpcUrl: e.TENDERMINT_RPC_URL,
    relayerIntervalMs,
    relayerConfirmations: asHeight(e.RELAYER_CONFIRMATIONS),
  };
};
