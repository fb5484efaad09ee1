import { describe, it, expect } from "vitest";
import { encodeHeightContext } from "../src/codec/payload";
import { authorizeAdmin, OPEN_ADMIN } from "../src/core/gate";
import { asHeaderHash, asHeight } from "../src/types/brands";
import { asyncCodeOf, codeOf } from "./helpers/errors";
import {
  ADMIN,
  GATEWAY,
  GENESIS_HEADER,
  STRANGER,
  headerFor,
  outputOf,
  seededClient,
} from "./helpers/fixtures";

const ctx3100 = encodeHeightContext(asHeight(3100n));

describe("callback authentication", () => {
  it("rejects a callback from anyone but the gateway, leaving state untouched", () => {
    const { client } = seededClient();
    const root = client.stateRoot();
    expect(codeOf(() => client.fulfillSkip(STRANGER, outputOf(headerFor(3100n)), ctx3100))).toBe(
      "UnauthorizedCallback",
    );
    const ctx3000 = encodeHeightContext(asHeight(3000n));
    expect(codeOf(() => client.fulfillStep(STRANGER, outputOf(headerFor(3001n)), ctx3000))).toBe(
      "UnauthorizedCallback",
    );
    expect(client.latestHeight()).toBe(3000n);
    expect(client.stateRoot()).toBe(root);
  });

  it("rejects every callback while no gateway is configured", () => {
    const { client } = seededClient({}, false);
    client.setGenesisHeader(asHeight(3000n), GENESIS_HEADER);
    expect(client.gatewayAddress()).toBeUndefined();
    expect(codeOf(() => client.fulfillSkip(GATEWAY, outputOf(headerFor(3100n)), ctx3100))).toBe(
      "UnauthorizedCallback",
    );
  });

  it("authenticates before decoding the payload", () => {
    const { client } = seededClient();
    expect(codeOf(() => client.fulfillSkip(STRANGER, new Uint8Array(3), new Uint8Array(3)))).toBe(
      "UnauthorizedCallback",
    );
    expect(codeOf(() => client.fulfillSkip(GATEWAY, new Uint8Array(3), ctx3100))).toBe(
      "MalformedCallback",
    );
  });

  it("follows a gateway rotation", () => {
    const { client } = seededClient();
    client.setGatewayAddress(STRANGER);
    expect(client.gatewayAddress()).toBe(STRANGER);
    expect(codeOf(() => client.fulfillSkip(GATEWAY, outputOf(headerFor(3100n)), ctx3100))).toBe(
      "UnauthorizedCallback",
    );
    client.fulfillSkip(STRANGER, outputOf(headerFor(3100n)), ctx3100);
    expect(client.latestHeight()).toBe(3100n);
  });
});

describe("administration", () => {
  it("is open by default", () => {
    expect(codeOf(() => authorizeAdmin(OPEN_ADMIN, "setCircuitId"))).toBeUndefined();
    const { client } = seededClient();
    expect(() => client.setGatewayAddress(STRANGER, STRANGER)).not.toThrow();
  });

  it("only accepts the admin when restricted", () => {
    const { client, events } = seededClient({ adminPolicy: { kind: "restricted", admin: ADMIN } });
    expect(codeOf(() => client.setGatewayAddress(STRANGER))).toBe("UnauthorizedAdmin");
    expect(codeOf(() => client.setGatewayAddress(STRANGER, STRANGER))).toBe("UnauthorizedAdmin");
    expect(client.gatewayAddress()).toBe(GATEWAY);
    expect(events).toEqual([]);

    expect(client.setGatewayAddress(STRANGER, ADMIN)).toEqual({
      type: "GatewayUpdated",
      gateway: STRANGER,
    });
  });

  it("guards genesis to a single write by default", () => {
    const { client } = seededClient();
    expect(codeOf(() => client.setGenesisHeader(asHeight(5000n), headerFor(5000n)))).toBe(
      "GenesisAlreadySet",
    );
    expect(client.latestHeight()).toBe(3000n);
  });

  it("can reseed genesis, even backwards, when repeatable", async () => {
    const { client } = seededClient({ genesisPolicy: "repeatable" });
    client.setGenesisHeader(asHeight(2000n), headerFor(2000n));
    expect(client.latestHeight()).toBe(2000n);
    expect(await asyncCodeOf(client.requestSkip(asHeight(2512n)))).toBeUndefined();
  });

  it("rejects a zero genesis header", () => {
    const { client } = seededClient({}, false);
    expect(codeOf(() => client.setGenesisHeader(asHeight(3000n), asHeaderHash("0x" + "00".repeat(32))))).toBe("ZeroHeaderHash");
    expect(client.latestHeight()).toBe(0n);
  });
});

