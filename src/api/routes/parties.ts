/**
 * Party Registry API — Party Routes
 *
 * Party lifecycle, profile and leadership.
 *
 * Endpoints:
 * - GET   /v1/parties                 — List parties (status filter, pagination)
 * - POST  /v1/parties                 — Found a party (caller becomes leader)
 * - GET   /v1/parties/:id             — Party details
 * - GET   /v1/parties/:id/stats       — Activity counters
 * - GET   /v1/parties/:id/leadership  — Leadership history (?index= for one entry)
 * - PATCH /v1/parties/:id             — Update one profile field (leader)
 * - POST  /v1/parties/:id/approve     — Approve (owner)
 * - POST  /v1/parties/:id/deactivate  — Deactivate (owner or leader)
 * - POST  /v1/parties/:id/reactivate  — Back to pending (owner)
 * - POST  /v1/parties/:id/leader      — Transfer leadership (force: owner)
 *
 * @module api/routes/parties
 * @license AGPL-3.0-or-later
 */

import { Router, Request, Response } from "express";
import { z } from "zod";
import { Platform } from "../../core/platform";
import { ApiError } from "../middleware/error-handler";
import { parseBody, parseIntParam, requireCaller } from "../middleware/request";
import { serializeLeadershipChange, serializeParty, serializeStats } from "../serializers";
import type { PartyStatus } from "../../types";

const listQuerySchema = z.object({
  status: z.enum(["pending", "active", "inactive"]).optional(),
  page: z.coerce.number().int().positive().optional(),
  limit: z.coerce.number().int().positive().optional(),
});

const createSchema = z.object({
  name: z.string(),
  short_name: z.string(),
  description: z.string(),
  link: z.string(),
});

const updateSchema = z
  .object({
    name: z.string().optional(),
    short_name: z.string().optional(),
    description: z.string().optional(),
    link: z.string().optional(),
  })
  .refine((body) => Object.values(body).filter((v) => v !== undefined).length === 1, {
    message: "Exactly one of name, short_name, description or link is required.",
  });

const leaderSchema = z.object({
  new_leader: z.string(),
  force: z.boolean().optional(),
});

export function createPartyRoutes(platform: Platform): Router {
  const router = Router();
  const { registry } = platform;

  // --------------------------------------------------------
  // GET /v1/parties — List parties
  // --------------------------------------------------------
  router.get("/", (req: Request, res: Response) => {
    const query = parseBody(listQuerySchema, req.query);
    const status: PartyStatus | undefined = query.status;
    const page = query.page ?? 1;
    const limit = Math.min(query.limit ?? 20, 100);

    const result = registry.listParties({ status, page, limit });
    const counters = registry.getPartyCounters();

    res.json({
      parties: result.parties.map(serializeParty),
      pagination: { page, limit, total: result.total },
      counters,
    });
  });

  // --------------------------------------------------------
  // POST /v1/parties — Found a party
  // --------------------------------------------------------
  router.post("/", (req: Request, res: Response) => {
    const founder = requireCaller(req);
    const body = parseBody(createSchema, req.body);

    const party = registry.createParty(founder, {
      name: body.name,
      shortName: body.short_name,
      description: body.description,
      link: body.link,
    });

    res.status(201).json(serializeParty(party));
  });

  // --------------------------------------------------------
  // GET /v1/parties/:id — Party details
  // --------------------------------------------------------
  router.get("/:id", (req: Request, res: Response) => {
    const partyId = parseIntParam(req.params.id, "Party id");
    res.json(serializeParty(registry.getPartyDetails(partyId)));
  });

  router.get("/:id/stats", (req: Request, res: Response) => {
    const partyId = parseIntParam(req.params.id, "Party id");
    res.json({ party_id: partyId, ...serializeStats(registry.getPartyStats(partyId)) });
  });

  // --------------------------------------------------------
  // GET /v1/parties/:id/leadership — Leadership history
  // --------------------------------------------------------
  router.get("/:id/leadership", (req: Request, res: Response) => {
    const partyId = parseIntParam(req.params.id, "Party id");

    if (typeof req.query.index === "string") {
      const index = parseIntParam(req.query.index, "index");
      res.json(serializeLeadershipChange(registry.getLeadershipHistoryEntry(partyId, index)));
      return;
    }

    const history = registry.getLeadershipHistory(partyId);
    res.json({
      party_id: partyId,
      length: history.length,
      history: history.map(serializeLeadershipChange),
    });
  });

  // --------------------------------------------------------
  // PATCH /v1/parties/:id — Update one profile field
  // --------------------------------------------------------
  router.patch("/:id", (req: Request, res: Response) => {
    const caller = requireCaller(req);
    const partyId = parseIntParam(req.params.id, "Party id");
    const body = parseBody(updateSchema, req.body);

    if (body.name !== undefined) registry.updateName(caller, partyId, body.name);
    else if (body.short_name !== undefined) registry.updateShortName(caller, partyId, body.short_name);
    else if (body.description !== undefined) registry.updateDescription(caller, partyId, body.description);
    else if (body.link !== undefined) registry.updateLink(caller, partyId, body.link);
    else throw new ApiError(400, "VALIDATION_ERROR", "Nothing to update.");

    res.json(serializeParty(registry.getPartyDetails(partyId)));
  });

  // --------------------------------------------------------
  // Lifecycle transitions
  // --------------------------------------------------------
  router.post("/:id/approve", (req: Request, res: Response) => {
    const caller = requireCaller(req);
    const partyId = parseIntParam(req.params.id, "Party id");
    registry.approveParty(caller, partyId);
    res.json({ id: partyId, status: registry.getPartyDetails(partyId).status });
  });

  router.post("/:id/deactivate", (req: Request, res: Response) => {
    const caller = requireCaller(req);
    const partyId = parseIntParam(req.params.id, "Party id");
    registry.deactivateParty(caller, partyId);
    res.json({ id: partyId, status: registry.getPartyDetails(partyId).status });
  });

  router.post("/:id/reactivate", (req: Request, res: Response) => {
    const caller = requireCaller(req);
    const partyId = parseIntParam(req.params.id, "Party id");
    registry.reactivateParty(caller, partyId);
    res.json({ id: partyId, status: registry.getPartyDetails(partyId).status });
  });

  // --------------------------------------------------------
  // POST /v1/parties/:id/leader — Transfer leadership
  // --------------------------------------------------------
  router.post("/:id/leader", (req: Request, res: Response) => {
    const caller = requireCaller(req);
    const partyId = parseIntParam(req.params.id, "Party id");
    const body = parseBody(leaderSchema, req.body);

    if (body.force) {
      registry.forceLeadershipChange(caller, partyId, body.new_leader);
    } else {
      registry.transferLeadership(caller, partyId, body.new_leader);
    }

    const length = registry.getLeadershipHistoryLength(partyId);
    res.json({
      party_id: partyId,
      current_leader: registry.getPartyDetails(partyId).currentLeader,
      change: serializeLeadershipChange(registry.getLeadershipHistoryEntry(partyId, length - 1)),
    });
  });

  return router;
}
