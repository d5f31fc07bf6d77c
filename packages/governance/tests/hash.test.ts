import { describe, it, expect } from "vitest";
import fc from "fast-check";
import {
  descriptionHashFromTime,
  digest64,
  hashOperation,
  hashProposal,
} from "../src/hash.js";
import { ALICE, BOB } from "./helpers.js";

describe("hashProposal", () => {
  it("produces the known id for a fixed input", () => {
    expect(hashProposal(ALICE, 42, 1000, 0)).toBe(625063841);
  });

  it("is deterministic", () => {
    expect(hashProposal(ALICE, 42, 1000, 0)).toBe(hashProposal(ALICE, 42, 1000, 0));
  });

  it("changes with each bound field", () => {
    const base = hashProposal(ALICE, 42, 1000, 0);
    expect(hashProposal(BOB, 42, 1000, 0)).toBe(3529605239);
    expect(hashProposal(ALICE, 42, 1000, 1)).toBe(477854199);
    expect(hashProposal(ALICE, 43, 1000, 0)).not.toBe(base);
    expect(hashProposal(ALICE, 42, 1001, 0)).not.toBe(base);
  });

  it("rejects out-of-range inputs", () => {
    expect(() => hashProposal(new Uint8Array(19), 0, 0, 0)).toThrow(RangeError);
    expect(() => hashProposal(ALICE, -1, 0, 0)).toThrow(RangeError);
    expect(() => hashProposal(ALICE, 0, 0, 256)).toThrow(RangeError);
  });
});

describe("hashOperation", () => {
  it("produces the known id for a fixed input", () => {
    expect(hashOperation(7, 1000, 0)).toBe(2995937141);
  });
});

describe("descriptionHashFromTime", () => {
  it("multiplies by 0x9E3779B9 wrapping at 32 bits", () => {
    expect(descriptionHashFromTime(0)).toBe(0);
    expect(descriptionHashFromTime(1000)).toBe(145980072);
    expect(descriptionHashFromTime(0xffff_ffff)).toBe(1640531527);
  });
});

describe("digest64", () => {
  it("stays within 64 bits", () => {
    const h = digest64([new Uint8Array([1, 2, 3])]);
    expect(h >= 0n && h < 1n << 64n).toBe(true);
  });
});

describe("identifier properties", () => {
  const arbAccount = fc.uint8Array({ minLength: 20, maxLength: 20 });
  const arbU32 = fc.integer({ min: 0, max: 0xffff_ffff });
  const arbNonce = fc.integer({ min: 0, max: 255 });

  it("proposal ids are never zero and always odd", () => {
    fc.assert(
      fc.property(arbAccount, arbU32, arbU32, arbNonce, (proposer, desc, now, nonce) => {
        const id = hashProposal(proposer, desc, now, nonce);
        expect(id).not.toBe(0);
        expect(id % 2).toBe(1);
        expect(id).toBeLessThanOrEqual(0xffff_ffff);
      }),
    );
  });

  it("operation ids are never zero", () => {
    fc.assert(
      fc.property(arbU32, arbU32, arbNonce, (proposalId, time, nonce) => {
        expect(hashOperation(proposalId, time, nonce)).not.toBe(0);
      }),
    );
  });

  it("changing the nonce changes the proposal id", () => {
    fc.assert(
      fc.property(arbAccount, arbU32, arbU32, fc.integer({ min: 0, max: 254 }), (p, d, t, n) => {
        expect(hashProposal(p, d, t, n)).not.toBe(hashProposal(p, d, t, n + 1));
      }),
      { numRuns: 200 },
    );
  });
});
