/**
 * Proposal lifecycle routes.
 *
 * POST /api/v1/proposals                   — Propose
 * GET  /api/v1/proposals                   — List proposals with derived state
 * GET  /api/v1/proposals/:id               — Get a single proposal
 * POST /api/v1/proposals/:id/votes         — Cast a vote
 * POST /api/v1/proposals/:id/vote-intents  — Record a vote-by-signature intent
 * POST /api/v1/proposals/:id/snapshots     — Snapshot an account's voting power
 * POST /api/v1/proposals/:id/queue         — Queue a succeeded proposal
 * POST /api/v1/proposals/:id/execute       — Execute a queued proposal
 * POST /api/v1/proposals/:id/cancel        — Cancel a pending proposal
 * GET  /api/v1/operations/:id              — Get a timelock operation
 */

import { Hono } from "hono";
import { accountIdToHex } from "@civitas/record";
import type { AppEnv } from "../types/api-contract.js";
import {
  CastVoteSchema,
  IdParamSchema,
  ProposeSchema,
  SnapshotSchema,
} from "../types/dto.js";
import { operationToJson, proposalToJson } from "../types/views.js";
import { parseParam, validateBody } from "../middleware/validate.js";
import { requireCaller } from "../middleware/caller.js";

function parseId(value: string): number {
  return parseParam(IdParamSchema, value, "id");
}

export function createProposalRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // POST /api/v1/proposals — Propose
  routes.post("/", validateBody(ProposeSchema), (c) => {
    const body = c.req.valid("json");
    const caller = requireCaller(c.get("caller"));
    const proposal = c.get("service").propose(caller, body.descriptionHash);
    return c.json({ data: proposalToJson(proposal) }, 201);
  });

  // GET /api/v1/proposals — List
  routes.get("/", (c) => {
    return c.json({ data: c.get("service").listProposals().map(proposalToJson) });
  });

  // GET /api/v1/proposals/:id — Get one
  routes.get("/:id", (c) => {
    const proposal = c.get("service").getProposal(parseId(c.req.param("id")));
    return c.json({ data: proposalToJson(proposal) });
  });

  // POST /api/v1/proposals/:id/votes
  routes.post("/:id/votes", validateBody(CastVoteSchema), (c) => {
    const id = parseId(c.req.param("id"));
    const { support } = c.req.valid("json");
    const proposal = c.get("service").castVote(requireCaller(c.get("caller")), id, support);
    return c.json({ data: proposalToJson(proposal) });
  });

  // POST /api/v1/proposals/:id/vote-intents
  routes.post("/:id/vote-intents", validateBody(CastVoteSchema), (c) => {
    const id = parseId(c.req.param("id"));
    const caller = requireCaller(c.get("caller"));
    const { support } = c.req.valid("json");

    c.get("service").submitVoteIntent(caller, id, support);
    return c.json({ data: { proposalId: id, voter: accountIdToHex(caller), support } }, 201);
  });

  // POST /api/v1/proposals/:id/snapshots
  routes.post("/:id/snapshots", validateBody(SnapshotSchema), (c) => {
    const id = parseId(c.req.param("id"));
    const caller = requireCaller(c.get("caller"));
    const account = c.req.valid("json").account ?? caller;

    const snapshot = c.get("service").snapshot(caller, id, account);
    return c.json({
      data: {
        proposalId: snapshot.proposalId,
        account: accountIdToHex(account),
        votingPower: snapshot.votingPower.toString(),
      },
    });
  });

  // POST /api/v1/proposals/:id/queue
  routes.post("/:id/queue", (c) => {
    const id = parseId(c.req.param("id"));
    const proposal = c.get("service").queue(requireCaller(c.get("caller")), id);
    return c.json({ data: proposalToJson(proposal) });
  });

  // POST /api/v1/proposals/:id/execute
  routes.post("/:id/execute", (c) => {
    const id = parseId(c.req.param("id"));
    const proposal = c.get("service").execute(requireCaller(c.get("caller")), id);
    return c.json({ data: proposalToJson(proposal) });
  });

  // POST /api/v1/proposals/:id/cancel
  routes.post("/:id/cancel", (c) => {
    const id = parseId(c.req.param("id"));
    const proposal = c.get("service").cancel(requireCaller(c.get("caller")), id);
    return c.json({ data: proposalToJson(proposal) });
  });

  return routes;
}

export function createOperationRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // GET /api/v1/operations/:id
  routes.get("/:id", (c) => {
    const operation = c.get("service").getOperation(parseId(c.req.param("id")));
    return c.json({ data: operationToJson(operation) });
  });

  return routes;
}
