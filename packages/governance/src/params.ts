/**
 * @civitas/governance — Governance parameters.
 *
 * Defaults match the reference deployment: a 300 second voting delay,
 * a three-day voting period, a two-day timelock and a fourteen-day grace
 * period. Hosts may override any of them through configuration.
 */

import { GovernanceError } from "@civitas/types";
import { MAX_KEY_INDEX, MAX_U64, RECORD_CAPACITY, isU32 } from "@civitas/record";

export interface GovernanceParams {
  /** Record capacity in bytes. */
  readonly recordCapacity: number;
  readonly maxMembers: number;
  readonly maxProposals: number;
  /** Seconds between proposal creation and the start of voting. */
  readonly votingDelay: number;
  /** Seconds voting stays open. */
  readonly votingPeriod: number;
  /** Effective votes needed to propose. */
  readonly proposalThreshold: bigint;
  /** Percent of total voting power that For + Abstain must reach. */
  readonly quorumPercentage: bigint;
  readonly timelockMinDelay: number;
  /** Seconds a ready operation stays executable. */
  readonly timelockGracePeriod: number;
  /** Voting power given to self-registered members. */
  readonly selfRegisterPower: bigint;
}

export const DEFAULT_GOVERNANCE_PARAMS: GovernanceParams = Object.freeze({
  recordCapacity: RECORD_CAPACITY,
  maxMembers: 20,
  maxProposals: 10,
  votingDelay: 300,
  votingPeriod: 259_200,
  proposalThreshold: 100_000_000n,
  quorumPercentage: 4n,
  timelockMinDelay: 172_800,
  timelockGracePeriod: 1_209_600,
  selfRegisterPower: 0n,
});

function badConfig(message: string): never {
  throw new GovernanceError("BAD_CONFIG", message);
}

/**
 * Merge overrides onto the defaults and validate the result.
 *
 * @throws {GovernanceError} BAD_CONFIG when a value is out of range
 */
export function resolveGovernanceParams(
  overrides: Partial<GovernanceParams> = {},
): GovernanceParams {
  const params: GovernanceParams = { ...DEFAULT_GOVERNANCE_PARAMS, ...overrides };

  if (!Number.isInteger(params.recordCapacity) || params.recordCapacity < 1) {
    badConfig(`recordCapacity must be a positive integer, got ${String(params.recordCapacity)}`);
  }
  for (const [name, value] of [
    ["maxMembers", params.maxMembers],
    ["maxProposals", params.maxProposals],
  ] as const) {
    // counts are stored as 0-255 and indices must stay addressable
    if (!Number.isInteger(value) || value < 1 || value > MAX_KEY_INDEX) {
      badConfig(`${name} must be between 1 and ${String(MAX_KEY_INDEX)}, got ${String(value)}`);
    }
  }
  for (const [name, value] of [
    ["votingDelay", params.votingDelay],
    ["votingPeriod", params.votingPeriod],
    ["timelockMinDelay", params.timelockMinDelay],
    ["timelockGracePeriod", params.timelockGracePeriod],
  ] as const) {
    if (!isU32(value)) {
      badConfig(`${name} must be a u32, got ${String(value)}`);
    }
  }
  for (const [name, value] of [
    ["proposalThreshold", params.proposalThreshold],
    ["selfRegisterPower", params.selfRegisterPower],
  ] as const) {
    if (value < 0n || value > MAX_U64) {
      badConfig(`${name} must be a u64, got ${value.toString()}`);
    }
  }
  if (params.quorumPercentage < 0n || params.quorumPercentage > 100n) {
    badConfig(`quorumPercentage must be between 0 and 100, got ${params.quorumPercentage.toString()}`);
  }

  return Object.freeze(params);
}
