/**
 * Party Registry API — Membership Routes
 *
 * Endpoints:
 * - GET  /v1/parties/:id/members                      — Member list
 * - POST /v1/parties/:id/join                         — Join
 * - POST /v1/parties/:id/join-with-proof              — Join with a personhood proof
 * - POST /v1/parties/:id/leave                        — Leave
 * - POST /v1/parties/:id/members/:identity/remove     — Remove (leader)
 * - POST /v1/parties/:id/members/:identity/ban        — Ban (leader)
 * - POST /v1/parties/:id/members/:identity/unban      — Unban (leader)
 *
 * @module api/routes/members
 * @license AGPL-3.0-or-later
 */

import { Router, Request, Response } from "express";
import { z } from "zod";
import { Platform } from "../../core/platform";
import { asyncRoute, parseBody, parseIntParam, requireCaller } from "../middleware/request";
import type { PersonhoodProof } from "../../types";

// ============================================================
// Proof payload
// ============================================================

const numericString = z.string().regex(/^\d+$/, "must be a decimal string");

export const proofSchema = z.object({
  root: numericString,
  merkle_tree_depth: z.number().int().min(1).max(32),
  group_id: z.string().min(1),
  signal_hash: numericString,
  nullifier_hash: numericString,
  external_nullifier: z.string().min(1),
  proof: z.array(numericString).length(8),
});

export function toPersonhoodProof(body: z.infer<typeof proofSchema>): PersonhoodProof {
  return {
    root: body.root,
    merkleTreeDepth: body.merkle_tree_depth,
    groupId: body.group_id,
    signalHash: body.signal_hash,
    nullifierHash: body.nullifier_hash,
    externalNullifier: body.external_nullifier,
    proof: body.proof,
  };
}

const proofBodySchema = z.object({ proof: proofSchema });

export function createMemberRoutes(platform: Platform): Router {
  const router = Router();
  const { registry } = platform;

  function membershipView(partyId: number, identity: string) {
    const party = registry.getPartyDetails(partyId);
    return {
      party_id: partyId,
      identity,
      is_member: registry.isMember(partyId, identity),
      member_count: party.memberCount,
      verified_member_count: party.verifiedMemberCount,
      document_verified_member_count: party.documentVerifiedMemberCount,
    };
  }

  router.get("/:id/members", (req: Request, res: Response) => {
    const partyId = parseIntParam(req.params.id, "Party id");
    const members = registry.getMembers(partyId);
    res.json({ party_id: partyId, total: members.length, members });
  });

  // --------------------------------------------------------
  // Self-service
  // --------------------------------------------------------

  router.post("/:id/join", (req: Request, res: Response) => {
    const caller = requireCaller(req);
    const partyId = parseIntParam(req.params.id, "Party id");
    registry.joinParty(caller, partyId);
    res.json(membershipView(partyId, caller));
  });

  router.post(
    "/:id/join-with-proof",
    asyncRoute(async (req: Request, res: Response) => {
      const caller = requireCaller(req);
      const partyId = parseIntParam(req.params.id, "Party id");
      const body = parseBody(proofBodySchema, req.body);

      await registry.joinPartyWithProof(caller, partyId, toPersonhoodProof(body.proof));

      res.json({
        ...membershipView(partyId, caller),
        document_verified: registry.isDocumentVerified(caller),
      });
    })
  );

  router.post("/:id/leave", (req: Request, res: Response) => {
    const caller = requireCaller(req);
    const partyId = parseIntParam(req.params.id, "Party id");
    registry.leaveParty(caller, partyId);
    res.json(membershipView(partyId, caller));
  });

  // --------------------------------------------------------
  // Leader moderation
  // --------------------------------------------------------

  router.post("/:id/members/:identity/remove", (req: Request, res: Response) => {
    const caller = requireCaller(req);
    const partyId = parseIntParam(req.params.id, "Party id");
    const target = req.params.identity;
    registry.removeMember(caller, partyId, target);
    res.json(membershipView(partyId, target));
  });

  router.post("/:id/members/:identity/ban", (req: Request, res: Response) => {
    const caller = requireCaller(req);
    const partyId = parseIntParam(req.params.id, "Party id");
    const target = req.params.identity;
    registry.banMember(caller, partyId, target);
    res.json({ ...membershipView(partyId, target), banned: true });
  });

  router.post("/:id/members/:identity/unban", (req: Request, res: Response) => {
    const caller = requireCaller(req);
    const partyId = parseIntParam(req.params.id, "Party id");
    const target = req.params.identity;
    registry.unbanMember(caller, partyId, target);
    res.json({ ...membershipView(partyId, target), banned: false });
  });

  return router;
}
