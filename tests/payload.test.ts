import { describe, it, expect } from "vitest";
import {
  decodeHeaderOutput,
  decodeHeightContext,
  encodeHeightContext,
  encodeSkipInput,
  encodeStepInput,
} from "../src/codec/payload";
import { asHeight } from "../src/types/brands";
import { bytesToHex } from "../src/utils/bytes";
import { codeOf } from "./helpers/errors";
import { GENESIS_HEADER, GENESIS_HEIGHT } from "./helpers/fixtures";

describe("circuit payloads", () => {
  it("lays out skip input as header, trusted height, requested height", () => {
    const input = encodeSkipInput(GENESIS_HEADER, GENESIS_HEIGHT, asHeight(3100n));
    expect(input.length).toBe(48);
    expect(bytesToHex(input)).toBe(
      "0xa8512f18c34b70e1533cfd5aa04f251fcb0d7be56ec570051fbad9bdb9435e6a" +
        "0000000000000bb8" +
        "0000000000000c1c",
    );
  });

  it("lays out step input as header, trusted height", () => {
    const input = encodeStepInput(GENESIS_HEADER, GENESIS_HEIGHT);
    expect(bytesToHex(input)).toBe(
      "0xa8512f18c34b70e1533cfd5aa04f251fcb0d7be56ec570051fbad9bdb9435e6a0000000000000bb8",
    );
  });

  it("encodes context as 8 big-endian bytes", () => {
    expect(bytesToHex(encodeHeightContext(asHeight(3100n)))).toBe("0x0000000000000c1c");
    expect(decodeHeightContext(encodeHeightContext(asHeight(3100n)))).toBe(3100n);
  });

  it("rejects a context or proof output of the wrong width", () => {
    expect(codeOf(() => decodeHeightContext(new Uint8Array(7)))).toBe("MalformedCallback");
    expect(codeOf(() => decodeHeightContext(new Uint8Array(32)))).toBe("MalformedCallback");
    expect(codeOf(() => decodeHeaderOutput(new Uint8Array(31)))).toBe("MalformedCallback");
    expect(decodeHeaderOutput(new Uint8Array(32).fill(0xab))).toBe("0x" + "ab".repeat(32));
  });
});
