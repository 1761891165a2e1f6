/**
 * Party Registry API — Election Routes
 *
 * Endpoints:
 * - GET    /v1/elections/current                — Current cycle and voter count
 * - POST   /v1/elections                        — Start a new cycle (owner)
 * - POST   /v1/elections/current/vote           — Cast or move the caller's vote
 * - DELETE /v1/elections/current/vote           — Withdraw the caller's vote
 * - GET    /v1/elections/:id/results            — Tallies for a cycle
 * - GET    /v1/elections/:id/votes/:identity    — One identity's vote
 *
 * @module api/routes/elections
 * @license AGPL-3.0-or-later
 */

import { Router, Request, Response } from "express";
import { z } from "zod";
import { Platform } from "../../core/platform";
import { parseBody, parseIntParam, requireCaller } from "../middleware/request";

const voteSchema = z.object({
  party_id: z.number(),
});

export function createElectionRoutes(platform: Platform): Router {
  const router = Router();
  const { elections } = platform;

  function currentView() {
    const electionId = elections.getCurrentElectionId();
    return { election_id: electionId, voter_count: elections.getVoterCount(electionId) };
  }

  router.get("/current", (_req: Request, res: Response) => {
    res.json(currentView());
  });

  router.post("/", (req: Request, res: Response) => {
    const caller = requireCaller(req);
    const electionId = elections.startNewElection(caller);
    res.status(201).json({ election_id: electionId });
  });

  // --------------------------------------------------------
  // Voting
  // --------------------------------------------------------

  router.post("/current/vote", (req: Request, res: Response) => {
    const caller = requireCaller(req);
    const body = parseBody(voteSchema, req.body);
    const electionId = elections.getCurrentElectionId();
    const previous = elections.getUserVote(electionId, caller);

    elections.vote(caller, body.party_id);

    res.json({
      election_id: electionId,
      party_id: body.party_id,
      previous_party_id: previous === 0 ? null : previous,
      votes: elections.getVotes(electionId, body.party_id),
    });
  });

  router.delete("/current/vote", (req: Request, res: Response) => {
    const caller = requireCaller(req);
    const electionId = elections.getCurrentElectionId();
    const partyId = elections.getUserVote(electionId, caller);

    elections.removeVote(caller);

    res.json({
      election_id: electionId,
      removed_party_id: partyId,
      votes: elections.getVotes(electionId, partyId),
    });
  });

  // --------------------------------------------------------
  // Results
  // --------------------------------------------------------

  router.get("/:id/results", (req: Request, res: Response) => {
    const electionId = parseIntParam(req.params.id, "Election id");
    const results = elections.getElectionResults(electionId);
    res.json({
      election_id: results.electionId,
      total_votes: results.totalVotes,
      voter_count: elections.getVoterCount(electionId),
      tallies: results.tallies.map((t) => ({ party_id: t.partyId, votes: t.votes })),
    });
  });

  router.get("/:id/votes/:identity", (req: Request, res: Response) => {
    const electionId = parseIntParam(req.params.id, "Election id");
    const partyId = elections.getUserVote(electionId, req.params.identity);
    res.json({
      election_id: electionId,
      identity: req.params.identity,
      party_id: partyId === 0 ? null : partyId,
    });
  });

  return router;
}
