import { describe, it, expect } from "vitest";
import { RECORD_CAPACITY } from "@civitas/record";
import { ALICE_HEX, createTestApp, jsonRequest, readBody } from "./setup.js";

describe("health routes", () => {
  it("reports record usage", async () => {
    const { app } = createTestApp();
    const res = await app.request(jsonRequest("/health"));

    expect(res.status).toBe(200);
    const body = await readBody<{
      status: string;
      record: { bytes: number; capacity: number };
      timestamp: string;
    }>(res);
    expect(body.status).toBe("ok");
    expect(body.record).toEqual({
      bytes: `member_count=1;member_0=${ALICE_HEX}:0:7`.length,
      capacity: RECORD_CAPACITY,
    });
    expect(Number.isNaN(Date.parse(body.timestamp))).toBe(false);
  });

  it("does not need a caller", async () => {
    const { app } = createTestApp();
    const res = await app.request(jsonRequest("/health", "GET", undefined, { "X-Account-Id": "bad" }));
    expect(res.status).toBe(200);
  });
});

describe("record routes", () => {
  it("returns the raw record", async () => {
    const { app } = createTestApp();
    const res = await app.request(jsonRequest("/api/v1/record"));

    expect(await res.json()).toEqual({
      data: {
        record: `member_count=1;member_0=${ALICE_HEX}:0:7`,
        bytes: 68,
        capacity: RECORD_CAPACITY,
      },
    });
  });

  it("answers unknown routes with a 404 envelope", async () => {
    const { app } = createTestApp();
    const res = await app.request(jsonRequest("/api/v1/nothing"));

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({
      error: { code: "NOT_FOUND", message: "No route for GET /api/v1/nothing" },
    });
  });
});
