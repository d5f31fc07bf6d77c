/**
 * @civitas/node — Host contract.
 *
 * The host owns the ledger record, identifies the caller and supplies
 * ledger time. The dispatcher talks to nothing else.
 */

import type { AccountId } from "@civitas/types";

// =============================================================================
// Contract
// =============================================================================

export interface GovernanceHost {
  /** Current record text, or undefined when it cannot be read. */
  readRecord(): string | undefined;

  /** Replace the record. False when the host refused the write. */
  writeRecord(record: string): boolean;

  /** Account that submitted the current call, or undefined. */
  callerIdentity(): AccountId | undefined;

  /** Ledger time in seconds. */
  currentTime(): number;
}

// =============================================================================
// In-Memory Host
// =============================================================================

export interface InMemoryHostOptions {
  readonly record?: string | undefined;
  readonly caller?: AccountId | undefined;
  readonly now?: number | undefined;
}

/**
 * Host backed by a string in memory.
 *
 * Time follows the wall clock until a test fixes it with setTime.
 */
export class InMemoryHost implements GovernanceHost {
  private _record: string;
  private _caller: AccountId | undefined;
  private _now: number | undefined;

  constructor(options: InMemoryHostOptions = {}) {
    this._record = options.record ?? "";
    this._caller = options.caller;
    this._now = options.now;
  }

  get record(): string {
    return this._record;
  }

  readRecord(): string | undefined {
    return this._record;
  }

  writeRecord(record: string): boolean {
    this._record = record;
    return true;
  }

  callerIdentity(): AccountId | undefined {
    return this._caller;
  }

  /** The fixed time when one was set, wall-clock seconds otherwise. */
  currentTime(): number {
    return this._now ?? Math.floor(Date.now() / 1000);
  }

  setCaller(caller: AccountId | undefined): void {
    this._caller = caller;
  }

  setTime(now: number): void {
    this._now = now;
  }

  advanceTime(seconds: number): void {
    this._now = this.currentTime() + seconds;
  }
}
