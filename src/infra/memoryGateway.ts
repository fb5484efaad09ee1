import { HeaderSyncError } from "../core/errors";
import { deriveRequestId } from "../core/hash";
import type {
  CallbackReceiver,
  GatewayClient,
  GatewayRequest,
} from "../core/types";
import type { Address, RequestId } from "../types/brands";

export interface PendingRequest extends GatewayRequest {
  readonly requestId: RequestId;
}

export type Prover = (req: PendingRequest) => Uint8Array;

/**
 * In-process stand-in for the request/callback gateway. Requests wait in a
 * pending list until `fulfill` hands a proof output back through the
 * connected receiver, signed with this gateway's own address.
 */
export class MemoryGateway<R = unknown> implements GatewayClient {
  private nonce = 0n;
  private readonly pending = new Map<RequestId, PendingRequest>();
  private receiver?: CallbackReceiver<R>;
  private collected = 0n;

  constructor(readonly address: Address) {}

  connect(receiver: CallbackReceiver<R>): this {
    this.receiver = receiver;
    return this;
  }

  async request(req: GatewayRequest): Promise<RequestId> {
    const requestId = deriveRequestId(this.nonce++, req);
    this.pending.set(requestId, { ...req, requestId });
    this.collected += req.fee;
    return requestId;
  }

  get feesCollected(): bigint {
    return this.collected;
  }

  pendingRequests(): PendingRequest[] {
    return [...this.pending.values()];
  }

  /** Delivers one proof output. The request is consumed even if the callback is rejected. */
  fulfill(requestId: RequestId, proofOutput: Uint8Array): R {
    const req = this.pending.get(requestId);
    if (!req) throw new HeaderSyncError("UnknownRequest", `no pending request ${requestId}`);
    if (!this.receiver) throw new Error("gateway has no connected receiver");
    this.pending.delete(requestId);
    return this.receiver.handleCallback({
      kind: req.callback,
      caller: this.address,
      proofOutput,
      context: req.context,
    });
  }

  /** Fulfils every pending request in submission order. */
  fulfillAll(prove: Prover): R[] {
    return this.pendingRequests().map((req) => this.fulfill(req.requestId, prove(req)));
  }
}
