/**
 * Request DTOs with Zod validation schemas.
 *
 * Each DTO has a Zod schema and a derived TypeScript type.
 * Route handlers use these for body and path validation.
 */

import { z } from "zod";
import { Role, VoteSupport } from "@civitas/types";
import { MAX_U32, MAX_U64, accountIdFromHex, parseU32 } from "@civitas/record";

// =============================================================================
// Shared Schemas
// =============================================================================

/** 40 hex characters, decoded to a 20-byte account id. */
export const AccountHexSchema = z.string().transform((value, ctx) => {
  const account = accountIdFromHex(value);
  if (account === undefined) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Expected 40 hex characters" });
    return z.NEVER;
  }
  return account;
});

/** Decimal u32 as it appears in a path segment. */
export const IdParamSchema = z.string().transform((value, ctx) => {
  const id = parseU32(value);
  if (id === undefined) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Expected a decimal u32 id" });
    return z.NEVER;
  }
  return id;
});

/** u64 as a decimal string, or as a JSON number within the safe range. */
export const VotingPowerSchema = z
  .union([
    z.string().regex(/^\d{1,20}$/, "Expected a decimal integer"),
    z.number().int().min(0).max(Number.MAX_SAFE_INTEGER),
  ])
  .transform((value) => BigInt(value))
  .refine((value) => value <= MAX_U64, "Exceeds the u64 range");

export const ROLE_BY_NAME = {
  proposer: Role.Proposer,
  executor: Role.Executor,
  admin: Role.Admin,
} as const;

export const RoleNameSchema = z
  .enum(["proposer", "executor", "admin"])
  .transform((name) => ROLE_BY_NAME[name]);

export const SUPPORT_BY_NAME = {
  against: VoteSupport.Against,
  for: VoteSupport.For,
  abstain: VoteSupport.Abstain,
} as const;

/**
 * Vote support by name or number. Numbers outside 0-2 pass through so
 * the engine reports INVALID_VOTE.
 */
export const SupportSchema = z.union([
  z.enum(["against", "for", "abstain"]).transform((name) => SUPPORT_BY_NAME[name]),
  z.number().int().min(0).max(255),
]);

// =============================================================================
// Member DTOs
// =============================================================================

export const SetVotingPowerSchema = z.object({
  votingPower: VotingPowerSchema,
});

export type SetVotingPowerDto = z.infer<typeof SetVotingPowerSchema>;

export const GrantRoleSchema = z.object({
  role: RoleNameSchema,
});

export type GrantRoleDto = z.infer<typeof GrantRoleSchema>;

export const DelegateSchema = z.object({
  delegatee: AccountHexSchema,
});

export type DelegateDto = z.infer<typeof DelegateSchema>;

// =============================================================================
// Proposal DTOs
// =============================================================================

export const ProposeSchema = z.object({
  descriptionHash: z.number().int().min(0).max(MAX_U32).optional(),
});

export type ProposeDto = z.infer<typeof ProposeSchema>;

export const CastVoteSchema = z.object({
  support: SupportSchema,
});

export type CastVoteDto = z.infer<typeof CastVoteSchema>;

export const SnapshotSchema = z.object({
  account: AccountHexSchema.optional(),
});

export type SnapshotDto = z.infer<typeof SnapshotSchema>;
