import type { LightClient } from "../core/lightClient";
import type { AdminEvent, AdvanceRequested } from "../core/types";
import { makeLogger } from "../logging";
import type { Logger } from "../logging";
import { asHeight } from "../types/brands";
import type { Address, Height } from "../types/brands";
import type { HeaderSource } from "./tendermint";

export const DEFAULT_CONFIRMATIONS = 10n;
export const DEFAULT_RELAYER_INTERVAL_MS = 30 * 60 * 1000;

export interface RelayerOptions {
  client: LightClient;
  source: HeaderSource;
  logger?: Logger;
  confirmations?: bigint;
  mode?: "skip" | "step";
  fee?: bigint;
}

/**
 * Drives the request cadence: each pass asks for the newest height that is
 * `confirmations` behind the source's head, capped at the skip span.
 * Fulfillment is the gateway's job; the relayer only requests.
 */
export class Relayer {
  private readonly client: LightClient;
  private readonly source: HeaderSource;
  private readonly log: Logger;
  private readonly confirmations: bigint;
  private readonly mode: "skip" | "step";
  private readonly fee: bigint;

  constructor(opts: RelayerOptions) {
    this.client = opts.client;
    this.source = opts.source;
    this.log = (opts.logger ?? makeLogger("silent")).child({ module: "relayer" });
    this.confirmations = opts.confirmations ?? DEFAULT_CONFIRMATIONS;
    this.mode = opts.mode ?? "skip";
    this.fee = opts.fee ?? 0n;
  }

  /** Height the next skip should target, or undefined when already caught up. */
  async nextTarget(): Promise<Height | undefined> {
    const head = await this.source.getLatestHeight();
    const latest = this.client.latestHeight();
    if (head < this.confirmations) return undefined;
    const confirmed = head - this.confirmations;
    if (confirmed <= latest) return undefined;
    const cap = latest + this.client.maxSkipSpan;
    return asHeight(confirmed < cap ? confirmed : cap);
  }

  async runOnce(): Promise<AdvanceRequested | undefined> {
    const target = await this.nextTarget();
    const latest = this.client.latestHeight();
    if (target === undefined) {
      this.log.info({ latest: latest.toString() }, "up to date");
      return undefined;
    }
    if (this.mode === "step") return this.client.requestStep({ fee: this.fee });

    this.log.info({ latest: latest.toString(), target: target.toString() }, "requesting skip");
    return this.client.requestSkip(target, { fee: this.fee });
  }

  /**
   * Runs a pass every `intervalMs`, counted from when the previous pass
   * settles, so passes never overlap. Returns a stop function.
   */
  start(intervalMs: number = DEFAULT_RELAYER_INTERVAL_MS): () => void {
    let stopped = false;
    let timer: NodeJS.Timeout | undefined;

    const schedule = (): void => {
      if (stopped) return;
      timer = setTimeout(() => {
        void this.runOnce()
          .catch((err: unknown) => {
            this.log.error({ err }, "relayer pass failed");
          })
          .finally(schedule);
      }, intervalMs);
    };

    schedule();
    return () => {
      stopped = true;
      clearTimeout(timer);
    };
  }
}

/** Seeds genesis from the source's header at `height`. */
export const bootstrapGenesis = async (
  client: LightClient,
  source: HeaderSource,
  height: Height,
  caller?: Address,
): Promise<AdminEvent> => {
  const { header } = await source.getHeader(height);
  return client.setGenesisHeader(height, header, caller);
};
