/**
 * Party Registry -- Error Taxonomy
 *
 * Every rejected operation throws a RegistryError whose `code` names the
 * exact precondition that failed.  Errors are raised before any state is
 * touched, so a caller never has to recover from a partial effect.
 *
 * @module errors
 * @license AGPL-3.0-or-later
 */

/** How a rejection should be treated by the caller. */
export type ErrorCategory =
  | "not-found"
  | "authorization"
  | "state-conflict"
  | "validation"
  | "replay-protection";

const CATEGORY_BY_CODE = {
  // not-found
  InvalidPartyId: "not-found",
  HistoryIndexOutOfRange: "not-found",
  NoSnapshots: "not-found",
  StartIndexOutOfRange: "not-found",

  // authorization
  NotOwner: "authorization",
  NotLeader: "authorization",
  NotOwnerOrLeader: "authorization",
  NotMember: "authorization",
  NotVerified: "authorization",

  // state-conflict
  AlreadyMember: "state-conflict",
  AlreadyMemberOfElsewhere: "state-conflict",
  BannedFromParty: "state-conflict",
  LeaderCannotLeave: "state-conflict",
  CannotRemoveLeader: "state-conflict",
  LeaderHasActiveParty: "state-conflict",
  NewLeaderAlreadyLeadsActiveParty: "state-conflict",
  AlreadyLeader: "state-conflict",
  PartyNotPending: "state-conflict",
  PartyNotInactive: "state-conflict",
  AlreadyInactive: "state-conflict",
  AlreadyBanned: "state-conflict",
  NotBanned: "state-conflict",
  AlreadyDocumentVerified: "state-conflict",
  AlreadyEnrolled: "state-conflict",
  CannotVoteForSameParty: "state-conflict",
  NoVoteToRemove: "state-conflict",
  Paused: "state-conflict",
  UnsupportedOperation: "state-conflict",

  // validation
  StringEmpty: "validation",
  StringTooLong: "validation",
  ZeroIdentity: "validation",
  InvalidBatchSize: "validation",
  InvalidStartIndex: "validation",
  InvalidRetention: "validation",
  InvalidCommitment: "validation",

  // replay-protection
  NullifierReused: "replay-protection",
  ProofInvalid: "replay-protection",
} as const satisfies Record<string, ErrorCategory>;

/** Closed set of rejection codes. */
export type RegistryErrorCode = keyof typeof CATEGORY_BY_CODE;

/** Error thrown by the registry, the snapshot ledger and the election tally */
export class RegistryError extends Error {
  readonly category: ErrorCategory;

  constructor(
    message: string,
    public readonly code: RegistryErrorCode,
    public readonly partyId?: number
  ) {
    super(message);
    this.name = "RegistryError";
    this.category = CATEGORY_BY_CODE[code];
  }
}

/**
 * Narrowing helper for catch blocks.
 */
export function isRegistryError(error: unknown): error is RegistryError {
  return error instanceof RegistryError;
}
