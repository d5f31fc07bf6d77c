/**
 * @civitas/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 * Governance parameters default to the engine's defaults.
 */

import { z } from "zod";
import { DEFAULT_GOVERNANCE_PARAMS, resolveGovernanceParams } from "@civitas/governance";
import type { GovernanceParams } from "@civitas/governance";
import { MAX_KEY_INDEX, MAX_U32, MAX_U64 } from "@civitas/record";

// =============================================================================
// Field Schemas
// =============================================================================

const u32 = (fallback: number) =>
  z.coerce.number().int().min(0).max(MAX_U32).default(fallback);

const u64 = (fallback: bigint) =>
  z
    .string()
    .regex(/^\d{1,20}$/, "Expected a decimal integer")
    .default(fallback.toString())
    .transform((value) => BigInt(value))
    .refine((value) => value <= MAX_U64, "Exceeds the u64 range");

const count = (fallback: number) =>
  z.coerce.number().int().min(1).max(MAX_KEY_INDEX).default(fallback);

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Seeded with Admin, Executor and Proposer on an empty record
  ADMIN_ACCOUNT: z
    .string()
    .regex(/^[0-9a-fA-F]{40}$/, "Expected 40 hex characters")
    .transform((value) => value.toLowerCase())
    .optional(),

  // Governance parameters
  RECORD_CAPACITY: z.coerce.number().int().min(1).default(DEFAULT_GOVERNANCE_PARAMS.recordCapacity),
  MAX_MEMBERS: count(DEFAULT_GOVERNANCE_PARAMS.maxMembers),
  MAX_PROPOSALS: count(DEFAULT_GOVERNANCE_PARAMS.maxProposals),
  VOTING_DELAY: u32(DEFAULT_GOVERNANCE_PARAMS.votingDelay),
  VOTING_PERIOD: u32(DEFAULT_GOVERNANCE_PARAMS.votingPeriod),
  PROPOSAL_THRESHOLD: u64(DEFAULT_GOVERNANCE_PARAMS.proposalThreshold),
  QUORUM_PERCENTAGE: z.coerce
    .number()
    .int()
    .min(0)
    .max(100)
    .default(Number(DEFAULT_GOVERNANCE_PARAMS.quorumPercentage)),
  TIMELOCK_MIN_DELAY: u32(DEFAULT_GOVERNANCE_PARAMS.timelockMinDelay),
  TIMELOCK_GRACE_PERIOD: u32(DEFAULT_GOVERNANCE_PARAMS.timelockGracePeriod),
  SELF_REGISTER_POWER: u64(DEFAULT_GOVERNANCE_PARAMS.selfRegisterPower),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if an env var is invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}

export function toGovernanceParams(config: AppConfig): GovernanceParams {
  return resolveGovernanceParams({
    recordCapacity: config.RECORD_CAPACITY,
    maxMembers: config.MAX_MEMBERS,
    maxProposals: config.MAX_PROPOSALS,
    votingDelay: config.VOTING_DELAY,
    votingPeriod: config.VOTING_PERIOD,
    proposalThreshold: config.PROPOSAL_THRESHOLD,
    quorumPercentage: BigInt(config.QUORUM_PERCENTAGE),
    timelockMinDelay: config.TIMELOCK_MIN_DELAY,
    timelockGracePeriod: config.TIMELOCK_GRACE_PERIOD,
    selfRegisterPower: config.SELF_REGISTER_POWER,
  });
}
