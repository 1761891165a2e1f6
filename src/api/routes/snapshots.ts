/**
 * Party Registry API — Snapshot Routes
 *
 * Endpoints:
 * - GET  /v1/snapshots/status                — Last pass time, party total, retention
 * - POST /v1/snapshots/capture               — Capture one batch (owner)
 * - PUT  /v1/snapshots/retention             — Change retention (owner)
 * - GET  /v1/parties/:id/snapshots           — History page (?start=&count=)
 * - GET  /v1/parties/:id/snapshots/latest    — Newest snapshot
 *
 * @module api/routes/snapshots
 * @license AGPL-3.0-or-later
 */

import { Router, Request, Response } from "express";
import { z } from "zod";
import { Platform } from "../../core/platform";
import { parseBody, parseIntParam, requireCaller } from "../middleware/request";
import { serializeSnapshot, serializeSnapshotStatus } from "../serializers";
import { FIRST_PARTY_ID } from "../../types";

const captureSchema = z.object({
  start_party_id: z.number().int().optional(),
  batch_size: z.number().int().optional(),
});

const retentionSchema = z.object({
  retention: z.number().int(),
});

const historyQuerySchema = z.object({
  start: z.coerce.number().int().nonnegative().optional(),
  count: z.coerce.number().int().nonnegative().optional(),
});

export function createSnapshotRoutes(platform: Platform): Router {
  const router = Router();
  const { snapshots } = platform;

  router.get("/snapshots/status", (_req: Request, res: Response) => {
    res.json(serializeSnapshotStatus(snapshots.getSnapshotStatus()));
  });

  router.post("/snapshots/capture", (req: Request, res: Response) => {
    const caller = requireCaller(req);
    const body = parseBody(captureSchema, req.body);

    const result = snapshots.captureBatch(
      caller,
      body.start_party_id ?? FIRST_PARTY_ID,
      body.batch_size ?? platform.config.snapshotBatchSize
    );

    res.json({
      next_party_id: result.nextPartyId,
      processed: result.processed,
      completed: result.completed,
    });
  });

  router.put("/snapshots/retention", (req: Request, res: Response) => {
    const caller = requireCaller(req);
    const body = parseBody(retentionSchema, req.body);
    snapshots.setRetentionCount(caller, body.retention);
    res.json(serializeSnapshotStatus(snapshots.getSnapshotStatus()));
  });

  // --------------------------------------------------------
  // Per-party history
  // --------------------------------------------------------

  router.get("/parties/:id/snapshots/latest", (req: Request, res: Response) => {
    const partyId = parseIntParam(req.params.id, "Party id");
    res.json({ party_id: partyId, ...serializeSnapshot(snapshots.getLatestSnapshot(partyId)) });
  });

  router.get("/parties/:id/snapshots", (req: Request, res: Response) => {
    const partyId = parseIntParam(req.params.id, "Party id");
    const query = parseBody(historyQuerySchema, req.query);
    const total = snapshots.getSnapshotCount(partyId);

    // An empty history has no valid start index; report it as an empty page
    if (total === 0 && query.start === undefined) {
      res.json({ party_id: partyId, total, snapshots: [] });
      return;
    }

    const history = snapshots.getSnapshotHistory(partyId, query.start ?? 0, query.count ?? total);
    res.json({ party_id: partyId, total, snapshots: history.map(serializeSnapshot) });
  });

  return router;
}
