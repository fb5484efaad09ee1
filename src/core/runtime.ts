import { makeLogger } from "../logging";
import type { Logger } from "../logging";
import type { Height, Hex } from "../types/brands";
import { isHeaderSyncError } from "./errors";
import type { HeaderSyncError } from "./errors";
import type { LightClient } from "./lightClient";
import type {
  CallbackMessage,
  CallbackReceiver,
  LightClientEvent,
  RequestOptions,
} from "./types";

/* ── units of work ───────────────────────────────────────── */
export type Unit =
  | { type: "requestSkip"; height: Height; opts?: RequestOptions }
  | { type: "requestStep"; opts?: RequestOptions }
  | { type: "callback"; message: CallbackMessage };

export type Outcome =
  | { unit: Unit; ok: true; event: LightClientEvent }
  | { unit: Unit; ok: false; error: HeaderSyncError };

export interface TickResult {
  tick: number;
  outcomes: Outcome[];
  latest: Height;
  root: Hex;
}

/* ──────────── runtime shell ──────────── */
/**
 * Serializes requests and gateway callbacks. Units run one at a time in
 * arrival order; a rejected unit is reported and the next one still runs.
 * Any other error aborts the tick and the units not yet run stay queued.
 * As a CallbackReceiver it only queues, so callbacks land on the next tick.
 */
export class Runtime implements CallbackReceiver<void> {
  private inbox: Unit[] = [];
  private tickId = 0;
  private readonly log: Logger;

  constructor(
    private readonly client: LightClient,
    opts: { logger?: Logger } = {},
  ) {
    this.log = (opts.logger ?? makeLogger("silent")).child({ module: "runtime" });
  }

  get pending(): number {
    return this.inbox.length;
  }

  enqueue(...units: Unit[]): void {
    this.inbox.push(...units);
  }

  handleCallback(message: CallbackMessage): void {
    this.enqueue({ type: "callback", message });
  }

  async tick(): Promise<TickResult> {
    const tick = this.tickId++;
    const batch = this.inbox;
    this.inbox = [];
    this.log.debug({ tick, units: batch.length }, "tick start");

    const outcomes: Outcome[] = [];
    for (const [i, unit] of batch.entries()) {
      try {
        outcomes.push({ unit, ok: true, event: await this.run(unit) });
      } catch (err) {
        if (!isHeaderSyncError(err)) {
          // units behind the failure go back to the front of the inbox
          this.inbox = [...batch.slice(i + 1), ...this.inbox];
          this.log.error({ tick, unit: unit.type, done: outcomes.length, err }, "tick aborted");
          throw err;
        }
        this.log.warn({ tick, unit: unit.type, code: err.code }, "unit rejected");
        outcomes.push({ unit, ok: false, error: err });
      }
    }

    const latest = this.client.latestHeight();
    const root = this.client.stateRoot();
    this.log.info({ tick, latest: latest.toString(), root }, "commit");
    return { tick, outcomes, latest, root };
  }

  private run(unit: Unit): Promise<LightClientEvent> | LightClientEvent {
    switch (unit.type) {
      case "requestSkip":
        return this.client.requestSkip(unit.height, unit.opts);
      case "requestStep":
        return this.client.requestStep(unit.opts);
      case "callback":
        return this.client.handleCallback(unit.message);
    }
  }
}
