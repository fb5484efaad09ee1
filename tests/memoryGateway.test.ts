import { describe, it, expect } from "vitest";
import { decodeHeightContext } from "../src/codec/payload";
import { MemoryGateway } from "../src/infra/memoryGateway";
import { asHeight, asRequestId } from "../src/types/brands";
import { codeOf } from "./helpers/errors";
import { GATEWAY, SKIP_ID, headerFor, outputOf, seededClient } from "./helpers/fixtures";

const request = {
  circuitId: SKIP_ID,
  input: new Uint8Array(48),
  callback: "fulfillSkip" as const,
  context: new Uint8Array(8),
  fee: 5n,
};

describe("MemoryGateway", () => {
  it("assigns a fresh id to every request and collects fees", async () => {
    const gateway = new MemoryGateway(GATEWAY);
    const a = await gateway.request(request);
    const b = await gateway.request(request);
    expect(a).not.toBe(b);
    expect(gateway.pendingRequests().map((r) => r.requestId)).toEqual([a, b]);
    expect(gateway.feesCollected).toBe(10n);
  });

  it("refuses unknown request ids", () => {
    const gateway = new MemoryGateway(GATEWAY);
    expect(codeOf(() => gateway.fulfill(asRequestId("0x" + "00".repeat(32)), new Uint8Array(32)))).toBe(
      "UnknownRequest",
    );
  });

  it("needs a connected receiver to fulfil", async () => {
    const gateway = new MemoryGateway(GATEWAY);
    const id = await gateway.request(request);
    expect(() => gateway.fulfill(id, new Uint8Array(32))).toThrow("gateway has no connected receiver");
    expect(gateway.pendingRequests()).toHaveLength(1);
  });

  it("consumes a request even when its callback is rejected", async () => {
    const { client, gateway } = seededClient();
    const { requestId } = await client.requestSkip(asHeight(3100n));
    expect(codeOf(() => gateway.fulfill(requestId, new Uint8Array(5)))).toBe("MalformedCallback");
    expect(gateway.pendingRequests()).toEqual([]);
    expect(codeOf(() => gateway.fulfill(requestId, outputOf(headerFor(3100n))))).toBe("UnknownRequest");
  });

  it("fulfils everything pending in submission order", async () => {
    const { client, gateway } = seededClient();
    await client.requestSkip(asHeight(3050n));
    await client.requestSkip(asHeight(3100n));
    const heights: bigint[] = [];
    gateway.fulfillAll((req) => {
      heights.push(decodeHeightContext(req.context));
      return outputOf(headerFor(BigInt(heights.length)));
    });
    expect(heights).toEqual([3050n, 3100n]);
    expect(client.latestHeight()).toBe(3100n);
  });
});
