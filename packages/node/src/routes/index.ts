/**
 * Route barrel — re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createRecordRoutes } from "./record.js";
export { createMemberRoutes } from "./members.js";
export { createDelegationRoutes } from "./delegations.js";
export { createProposalRoutes, createOperationRoutes } from "./proposals.js";
