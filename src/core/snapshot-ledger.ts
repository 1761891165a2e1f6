/**
 * Party Registry -- Membership Snapshot Ledger
 *
 * Keeps a bounded time series of membership counts per party.  Capture
 * runs in batches so that a full pass over a large registry can be split
 * across many calls:
 *
 *   let start = 1;
 *   do {
 *     ({ nextPartyId: start } = ledger.captureBatch(owner, start, 50));
 *   } while (start !== 0);
 *
 * Each call commits the parties it scanned, whatever happens to later
 * calls.  `lastSnapshotTime` only moves when a call reaches the last
 * party ID, i.e. when a pass completes.
 *
 * @module snapshot-ledger
 * @license AGPL-3.0-or-later
 */

import { AccessControl } from "./access-control";
import { RegistryError } from "./errors";
import { EventBus } from "./events";
import type {
  CaptureBatchResult,
  Identity,
  MembershipSnapshot,
  PartyCountSource,
  SnapshotStatus,
} from "../types";
import { FIRST_PARTY_ID } from "../types";

export interface SnapshotLedgerDependencies {
  source: PartyCountSource;
  access: AccessControl;
  events: EventBus;
  /** Snapshots kept per party (0 = unbounded) */
  retention: number;
  clock?: () => number;
}

export class SnapshotLedger {
  /** partyId -> snapshots, oldest first */
  private histories: Map<number, MembershipSnapshot[]> = new Map();
  private retention: number;
  private lastSnapshotTime = 0;

  private readonly source: PartyCountSource;
  private readonly access: AccessControl;
  private readonly events: EventBus;
  private readonly now: () => number;

  constructor(deps: SnapshotLedgerDependencies) {
    assertRetention(deps.retention);
    this.source = deps.source;
    this.access = deps.access;
    this.events = deps.events;
    this.retention = deps.retention;
    this.now = deps.clock ?? Date.now;
  }

  // --------------------------------------------------------
  // Capture
  // --------------------------------------------------------

  /**
   * Snapshots every active party in `[startPartyId, startPartyId + batchSize)`,
   * clipped to the allocated party IDs.
   */
  captureBatch(caller: Identity, startPartyId: number, batchSize: number): CaptureBatchResult {
    this.access.requireNotPaused();
    this.access.requireOwner(caller);

    if (!Number.isInteger(batchSize) || batchSize < 1) {
      throw new RegistryError("Batch size must be a positive integer", "InvalidBatchSize");
    }
    const total = this.source.totalPartyCount();
    const lastStart = Math.max(total, 1);
    if (!Number.isInteger(startPartyId) || startPartyId < FIRST_PARTY_ID || startPartyId > lastStart) {
      throw new RegistryError(
        `Start party ${startPartyId} is outside 1..${lastStart}`,
        "InvalidStartIndex"
      );
    }

    const endExclusive = Math.min(startPartyId + batchSize, FIRST_PARTY_ID + total);
    const timestamp = this.now();
    const sequence = this.source.currentSequence();
    let processed = 0;

    for (let partyId = startPartyId; partyId < endExclusive; partyId++) {
      const counts = this.source.getPartyCounts(partyId);
      if (!counts || counts.status !== "active") continue;

      this.append(partyId, {
        timestamp,
        sequence,
        memberCount: counts.memberCount,
        verifiedMemberCount: counts.verifiedMemberCount,
        documentVerifiedMemberCount: counts.documentVerifiedMemberCount,
      });
      processed++;
    }

    const completed = endExclusive >= FIRST_PARTY_ID + total;
    const nextPartyId = completed ? 0 : endExclusive;

    this.events.publish({ type: "SnapshotBatchCaptured", startPartyId, nextPartyId, processed });
    if (completed) {
      this.lastSnapshotTime = timestamp;
      this.events.publish({ type: "SnapshotPassCompleted", timestamp });
    }

    return { nextPartyId, processed, completed };
  }

  /**
   * Changes how many snapshots are kept per party.  Takes effect on each
   * party's next capture; 0 keeps everything.
   */
  setRetentionCount(caller: Identity, retention: number): void {
    this.access.requireNotPaused();
    this.access.requireOwner(caller);
    assertRetention(retention);

    this.retention = retention;
    this.events.publish({ type: "RetentionUpdated", retention });
  }

  // --------------------------------------------------------
  // Queries
  // --------------------------------------------------------

  getLatestSnapshot(partyId: number): MembershipSnapshot {
    const history = this.historyOf(partyId);
    if (history.length === 0) {
      throw new RegistryError(`Party ${partyId} has no snapshots`, "NoSnapshots", partyId);
    }
    return { ...history[history.length - 1] };
  }

  /**
   * Returns up to `count` snapshots starting at `startIndex` (0 = oldest kept).
   */
  getSnapshotHistory(partyId: number, startIndex: number, count: number): MembershipSnapshot[] {
    const history = this.historyOf(partyId);
    if (!Number.isInteger(startIndex) || startIndex < 0 || startIndex >= history.length) {
      throw new RegistryError(
        `Start index ${startIndex} is out of range (length ${history.length})`,
        "StartIndexOutOfRange",
        partyId
      );
    }
    const clamped = Math.min(Math.max(Math.trunc(count), 0), history.length - startIndex);
    return history.slice(startIndex, startIndex + clamped).map((s) => ({ ...s }));
  }

  getSnapshotCount(partyId: number): number {
    return this.historyOf(partyId).length;
  }

  getSnapshotStatus(): SnapshotStatus {
    return {
      lastSnapshotTime: this.lastSnapshotTime,
      totalParties: this.source.totalPartyCount(),
      retentionPolicy: this.retention,
    };
  }

  // --------------------------------------------------------
  // Internals
  // --------------------------------------------------------

  private historyOf(partyId: number): MembershipSnapshot[] {
    if (!this.source.getPartyCounts(partyId)) {
      throw new RegistryError(`Party ${partyId} does not exist`, "InvalidPartyId", partyId);
    }
    return this.histories.get(partyId) ?? [];
  }

  /** Appends, then keeps the newest `retention` entries. */
  private append(partyId: number, snapshot: MembershipSnapshot): void {
    let history = this.histories.get(partyId);
    if (!history) {
      history = [];
      this.histories.set(partyId, history);
    }
    history.push(snapshot);

    if (this.retention > 0 && history.length > this.retention) {
      history.splice(0, history.length - this.retention);
    }
  }
}

function assertRetention(retention: number): void {
  if (!Number.isInteger(retention) || retention < 0) {
    throw new RegistryError("Retention must be a non-negative integer", "InvalidRetention");
  }
}
