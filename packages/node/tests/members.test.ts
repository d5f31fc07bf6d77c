import { describe, it, expect } from "vitest";
import {
  ALICE_HEX,
  BOB_HEX,
  CAROL_HEX,
  callerRequest,
  createTestApp,
  jsonRequest,
  readBody,
} from "./setup.js";
import type { ErrorBody } from "./setup.js";

describe("member routes", () => {
  it("lists the seeded admin", async () => {
    const { app } = createTestApp();
    const res = await app.request(jsonRequest("/api/v1/members"));

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      data: [
        {
          index: 0,
          account: ALICE_HEX,
          votingPower: "0",
          roles: ["proposer", "executor", "admin"],
          delegate: ALICE_HEX,
          effectiveVotes: "0",
        },
      ],
    });
  });

  it("registers the caller with no roles", async () => {
    const { app, host } = createTestApp();
    const res = await app.request(callerRequest(BOB_HEX, "/api/v1/members"));

    expect(res.status).toBe(201);
    expect(await res.json()).toEqual({
      data: {
        index: 1,
        account: BOB_HEX,
        votingPower: "0",
        roles: [],
        delegate: BOB_HEX,
        effectiveVotes: "0",
      },
    });
    expect(host.record).toBe(
      `member_0=${ALICE_HEX}:0:7;member_count=2;member_1=${BOB_HEX}:0:0`,
    );
  });

  it("registers with the configured self-registration power", async () => {
    const { app } = createTestApp({ params: { selfRegisterPower: 5n } });
    const res = await app.request(callerRequest(BOB_HEX, "/api/v1/members"));
    const body = await readBody<{ data: { votingPower: string } }>(res);
    expect(body.data.votingPower).toBe("5");
  });

  it("requires the X-Account-Id header to register", async () => {
    const { app } = createTestApp();
    const res = await app.request(jsonRequest("/api/v1/members", "POST", {}));

    expect(res.status).toBe(401);
    const body = await readBody<ErrorBody>(res);
    expect(body.error).toEqual({
      code: "UNAUTHORIZED",
      message: "X-Account-Id header is required",
    });
  });

  it("rejects a malformed X-Account-Id", async () => {
    const { app } = createTestApp();
    const res = await app.request(callerRequest("xyz", "/api/v1/members"));

    expect(res.status).toBe(400);
    const body = await readBody<ErrorBody>(res);
    expect(body.error.message).toBe("X-Account-Id must be 40 hex characters");
  });

  // ─── Admin Operations ──────────────────────────────────────────

  it("lets the admin set voting power as a decimal string", async () => {
    const { app } = createTestApp();
    const res = await app.request(
      callerRequest(ALICE_HEX, `/api/v1/members/${BOB_HEX}/power`, "PUT", {
        votingPower: "18446744073709551615",
      }),
    );

    expect(res.status).toBe(200);
    const body = await readBody<{ data: { votingPower: string; roles: string[] } }>(res);
    expect(body.data.votingPower).toBe("18446744073709551615");
    expect(body.data.roles).toEqual([]);
  });

  it("rejects voting power above u64", async () => {
    const { app } = createTestApp();
    const res = await app.request(
      callerRequest(ALICE_HEX, `/api/v1/members/${BOB_HEX}/power`, "PUT", {
        votingPower: "18446744073709551616",
      }),
    );

    expect(res.status).toBe(400);
    const body = await readBody<ErrorBody>(res);
    expect(body.error.code).toBe("VALIDATION_ERROR");
    expect(body.error.details?.issues).toEqual([
      { path: "votingPower", message: "Exceeds the u64 range" },
    ]);
  });

  it("rejects power changes from non-admins with 403", async () => {
    const { app } = createTestApp();
    await app.request(callerRequest(BOB_HEX, "/api/v1/members"));
    const res = await app.request(
      callerRequest(BOB_HEX, `/api/v1/members/${BOB_HEX}/power`, "PUT", { votingPower: 1 }),
    );

    expect(res.status).toBe(403);
    const body = await readBody<ErrorBody>(res);
    expect(body.error.code).toBe("NOT_ADMIN");
    expect(body.error.details).toEqual({ exitCode: -18 });
  });

  it("grants and revokes roles by name", async () => {
    const { app } = createTestApp();
    await app.request(callerRequest(CAROL_HEX, "/api/v1/members"));

    const granted = await app.request(
      callerRequest(ALICE_HEX, `/api/v1/members/${CAROL_HEX}/roles`, "POST", { role: "executor" }),
    );
    const grantedBody = await readBody<{ data: { roles: string[] } }>(granted);
    expect(grantedBody.data.roles).toEqual(["executor"]);

    const revoked = await app.request(
      callerRequest(ALICE_HEX, `/api/v1/members/${CAROL_HEX}/roles/executor`, "DELETE"),
    );
    const revokedBody = await readBody<{ data: { roles: string[] } }>(revoked);
    expect(revokedBody.data.roles).toEqual([]);
  });

  it("rejects an unknown role name", async () => {
    const { app } = createTestApp();
    const res = await app.request(
      callerRequest(ALICE_HEX, `/api/v1/members/${ALICE_HEX}/roles/owner`, "DELETE"),
    );
    expect(res.status).toBe(400);
  });

  it("registers a non-member when granting a role", async () => {
    const { app, host } = createTestApp();
    const res = await app.request(
      callerRequest(ALICE_HEX, `/api/v1/members/${CAROL_HEX}/roles`, "POST", { role: "admin" }),
    );

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      data: {
        index: 1,
        account: CAROL_HEX,
        votingPower: "0",
        roles: ["admin"],
        delegate: CAROL_HEX,
        effectiveVotes: "0",
      },
    });
    expect(host.record).toBe(
      `member_0=${ALICE_HEX}:0:7;member_count=2;member_1=${CAROL_HEX}:0:4`,
    );
  });
});

describe("delegation routes", () => {
  it("moves base power to the delegatee", async () => {
    const { app } = createTestApp();
    await app.request(
      callerRequest(ALICE_HEX, `/api/v1/members/${ALICE_HEX}/power`, "PUT", {
        votingPower: "200000000",
      }),
    );
    await app.request(
      callerRequest(ALICE_HEX, `/api/v1/members/${BOB_HEX}/power`, "PUT", {
        votingPower: "100000000",
      }),
    );

    const res = await app.request(
      callerRequest(BOB_HEX, "/api/v1/delegations", "POST", { delegatee: ALICE_HEX }),
    );

    expect(res.status).toBe(200);
    const body = await readBody<{
      data: { delegator: string; delegatee: string; delegateeMember: { effectiveVotes: string } };
    }>(res);
    expect(body.data.delegator).toBe(BOB_HEX);
    expect(body.data.delegatee).toBe(ALICE_HEX);
    expect(body.data.delegateeMember.effectiveVotes).toBe("300000000");
  });

  it("returns null for a delegatee outside the member list", async () => {
    const { app } = createTestApp();
    const res = await app.request(
      callerRequest(ALICE_HEX, "/api/v1/delegations", "POST", { delegatee: CAROL_HEX }),
    );
    const body = await readBody<{ data: { delegateeMember: unknown } }>(res);
    expect(body.data.delegateeMember).toBeNull();
  });
});
