/**
 * Party Registry API — Response Shapes
 *
 * Converts core objects into the snake_case JSON the API returns.
 *
 * @module api/serializers
 * @license AGPL-3.0-or-later
 */

import type {
  LeadershipChange,
  MembershipSnapshot,
  PartyDetails,
  PartyStats,
  SnapshotStatus,
} from "../types";

function iso(ms: number): string {
  return new Date(ms).toISOString();
}

export function serializeParty(party: PartyDetails) {
  return {
    id: party.id,
    name: party.name,
    short_name: party.shortName,
    description: party.description,
    link: party.link,
    founder: party.founder,
    current_leader: party.currentLeader,
    created_at: iso(party.createdAt),
    status: party.status,
    member_count: party.memberCount,
    verified_member_count: party.verifiedMemberCount,
    document_verified_member_count: party.documentVerifiedMemberCount,
  };
}

export function serializeStats(stats: PartyStats) {
  return {
    leadership_changes: stats.leadershipChanges,
    member_joins: stats.memberJoins,
    member_leaves: stats.memberLeaves,
    last_activity_at: iso(stats.lastActivityAt),
  };
}

export function serializeLeadershipChange(change: LeadershipChange) {
  return {
    previous_leader: change.previousLeader,
    new_leader: change.newLeader,
    timestamp: iso(change.timestamp),
    forced: change.forced,
  };
}

export function serializeSnapshot(snapshot: MembershipSnapshot) {
  return {
    timestamp: iso(snapshot.timestamp),
    sequence: snapshot.sequence,
    member_count: snapshot.memberCount,
    verified_member_count: snapshot.verifiedMemberCount,
    document_verified_member_count: snapshot.documentVerifiedMemberCount,
  };
}

export function serializeSnapshotStatus(status: SnapshotStatus) {
  return {
    last_snapshot_time: status.lastSnapshotTime > 0 ? iso(status.lastSnapshotTime) : null,
    total_parties: status.totalParties,
    retention_policy: status.retentionPolicy,
  };
}
