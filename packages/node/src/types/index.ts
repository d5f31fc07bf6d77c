/**
 * Type barrel — re-exports all public types from @civitas/node.
 */

// DTOs
export {
  AccountHexSchema,
  IdParamSchema,
  VotingPowerSchema,
  RoleNameSchema,
  SupportSchema,
  ROLE_BY_NAME,
  SUPPORT_BY_NAME,
  SetVotingPowerSchema,
  GrantRoleSchema,
  DelegateSchema,
  ProposeSchema,
  CastVoteSchema,
  SnapshotSchema,
} from "./dto.js";
export type {
  SetVotingPowerDto,
  GrantRoleDto,
  DelegateDto,
  ProposeDto,
  CastVoteDto,
  SnapshotDto,
} from "./dto.js";

// Error
export { ApiError, createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorStatus, ErrorDetail, ErrorEnvelope } from "./error.js";

// Views
export { memberToJson, operationToJson, proposalToJson, roleNames } from "./views.js";
export type { MemberJson, VoteJson, OperationJson, ProposalJson } from "./views.js";

// App env
export type { AppEnv } from "./api-contract.js";
