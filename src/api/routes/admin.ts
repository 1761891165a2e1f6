/**
 * Party Registry API — Administration Routes
 *
 * Endpoints:
 * - GET  /v1/admin/status  — Owner, pause state, party counters, nullifier usage
 * - POST /v1/admin/pause   — Toggle the global pause (owner)
 * - POST /v1/admin/owner   — Transfer ownership (owner)
 * - PUT  /v1/admin/identities/:identity/tier — Set an orb tier (owner)
 * - POST /v1/admin/personhood/commitments    — Enroll a commitment (owner)
 *
 * @module api/routes/admin
 * @license AGPL-3.0-or-later
 */

import { Router, Request, Response } from "express";
import { z } from "zod";
import { Platform } from "../../core/platform";
import { parseBody, requireCaller } from "../middleware/request";

const ownerSchema = z.object({
  new_owner: z.string(),
});

const tierSchema = z.object({
  tier: z.enum(["none", "orb"]),
});

const commitmentSchema = z.object({
  commitment: z.string().regex(/^[1-9][0-9]*$/, "must be a positive decimal string"),
});

export function createAdminRoutes(platform: Platform): Router {
  const router = Router();
  const { access, registry, nullifiers } = platform;

  router.get("/status", (_req: Request, res: Response) => {
    const stats = nullifiers.getStats();
    res.json({
      owner: access.owner,
      paused: access.isPaused,
      parties: registry.getPartyCounters(),
      nullifiers: {
        total_consumed: stats.totalConsumed,
        pending_reservations: stats.pendingReservations,
      },
    });
  });

  router.post("/pause", (req: Request, res: Response) => {
    const caller = requireCaller(req);
    res.json({ paused: registry.togglePause(caller) });
  });

  router.post("/owner", (req: Request, res: Response) => {
    const caller = requireCaller(req);
    const body = parseBody(ownerSchema, req.body);
    access.transferOwnership(caller, body.new_owner);
    res.json({ owner: access.owner });
  });

  // --------------------------------------------------------
  // Verification administration
  // --------------------------------------------------------

  router.put("/identities/:identity/tier", (req: Request, res: Response) => {
    const caller = requireCaller(req);
    const body = parseBody(tierSchema, req.body);
    const identity = req.params.identity;
    platform.setVerificationTier(caller, identity, body.tier);
    res.json({ identity, verification_tier: platform.verifier.verificationTier(identity) });
  });

  router.post("/personhood/commitments", (req: Request, res: Response) => {
    const caller = requireCaller(req);
    const body = parseBody(commitmentSchema, req.body);
    const group = platform.enrollPersonhood(caller, body.commitment);
    res.status(201).json({ commitment: body.commitment, root: group.root, size: group.size });
  });

  return router;
}
