/**
 * Party Registry API — Identity Routes
 *
 * Endpoints:
 * - GET  /v1/identities/:identity        — Memberships, leaderships and tiers
 * - POST /v1/identities/verify-document  — Upgrade the caller with a personhood proof
 *
 * @module api/routes/identities
 * @license AGPL-3.0-or-later
 */

import { Router, Request, Response } from "express";
import { z } from "zod";
import { Platform } from "../../core/platform";
import { asyncRoute, parseBody, requireCaller } from "../middleware/request";
import { proofSchema, toPersonhoodProof } from "./members";

const verifySchema = z.object({ proof: proofSchema });

export function createIdentityRoutes(platform: Platform): Router {
  const router = Router();
  const { registry, verifier } = platform;

  function identityView(identity: string) {
    return {
      identity,
      verification_tier: verifier.verificationTier(identity),
      document_verified: registry.isDocumentVerified(identity),
      parties: registry.getUserParties(identity),
      leaderships: registry.getUserLeaderships(identity),
    };
  }

  router.post(
    "/verify-document",
    asyncRoute(async (req: Request, res: Response) => {
      const caller = requireCaller(req);
      const body = parseBody(verifySchema, req.body);

      await registry.verifyDocument(caller, toPersonhoodProof(body.proof));

      res.json(identityView(caller));
    })
  );

  router.get("/:identity", (req: Request, res: Response) => {
    res.json(identityView(req.params.identity));
  });

  return router;
}
