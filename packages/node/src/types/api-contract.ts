/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 * These are set by middleware and consumed by route handlers.
 */

import type { AccountId } from "@civitas/types";
import type { GovernanceService } from "../services/governance-service.js";

/**
 * Hono environment type for the governance app.
 *
 * Middleware populates Variables; route handlers read them via c.get().
 */
export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** Governance service backing every route (set by the app) */
    service: GovernanceService;

    /** Account from X-Account-Id, when the header is present and valid */
    caller: AccountId | undefined;
  };
}
