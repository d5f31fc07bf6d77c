/**
 * Membership routes.
 *
 * GET    /api/v1/members                        — List members with effective votes
 * POST   /api/v1/members                        — Register the caller
 * PUT    /api/v1/members/:account/power         — Set voting power (admin)
 * POST   /api/v1/members/:account/roles         — Grant a role (admin)
 * DELETE /api/v1/members/:account/roles/:role   — Revoke a role (admin)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  AccountHexSchema,
  GrantRoleSchema,
  RoleNameSchema,
  SetVotingPowerSchema,
} from "../types/dto.js";
import { memberToJson } from "../types/views.js";
import { parseParam, validateBody } from "../middleware/validate.js";
import { requireCaller } from "../middleware/caller.js";

export function createMemberRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // GET /api/v1/members — List
  routes.get("/", (c) => {
    const members = c.get("service").listMembers();
    return c.json({ data: members.map(memberToJson) });
  });

  // POST /api/v1/members — Self-register
  routes.post("/", (c) => {
    const caller = requireCaller(c.get("caller"));
    const member = c.get("service").selfRegister(caller);
    return c.json({ data: memberToJson(member) }, 201);
  });

  // PUT /api/v1/members/:account/power
  routes.put("/:account/power", validateBody(SetVotingPowerSchema), (c) => {
    const account = parseParam(AccountHexSchema, c.req.param("account"), "account");
    const body = c.req.valid("json");

    const caller = requireCaller(c.get("caller"));
    const member = c.get("service").setVotingPower(caller, account, body.votingPower);
    return c.json({ data: memberToJson(member) });
  });

  // POST /api/v1/members/:account/roles
  routes.post("/:account/roles", validateBody(GrantRoleSchema), (c) => {
    const account = parseParam(AccountHexSchema, c.req.param("account"), "account");
    const body = c.req.valid("json");

    const caller = requireCaller(c.get("caller"));
    const member = c.get("service").grantRole(caller, account, body.role);
    return c.json({ data: memberToJson(member) });
  });

  // DELETE /api/v1/members/:account/roles/:role
  routes.delete("/:account/roles/:role", (c) => {
    const account = parseParam(AccountHexSchema, c.req.param("account"), "account");
    const role = parseParam(RoleNameSchema, c.req.param("role"), "role");

    const caller = requireCaller(c.get("caller"));
    const member = c.get("service").revokeRole(caller, account, role);
    return c.json({ data: memberToJson(member) });
  });

  return routes;
}
