/**
 * Delegation route.
 *
 * POST /api/v1/delegations — Delegate the caller's votes
 */

import { Hono } from "hono";
import { accountIdToHex } from "@civitas/record";
import type { AppEnv } from "../types/api-contract.js";
import { DelegateSchema } from "../types/dto.js";
import { memberToJson } from "../types/views.js";
import { validateBody } from "../middleware/validate.js";
import { requireCaller } from "../middleware/caller.js";

export function createDelegationRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", validateBody(DelegateSchema), (c) => {
    const service = c.get("service");
    const caller = requireCaller(c.get("caller"));
    const { delegatee } = c.req.valid("json");

    service.delegate(caller, delegatee);

    const target = service.getMember(delegatee);
    return c.json({
      data: {
        delegator: accountIdToHex(caller),
        delegatee: accountIdToHex(delegatee),
        delegateeMember: target === undefined ? null : memberToJson(target),
      },
    });
  });

  return routes;
}
