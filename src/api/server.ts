/**
 * Party Registry API — Express Server
 *
 * Assembles all routes, middleware, and starts the HTTP server.
 *
 * Usage:
 *   Production:  npm run build && npm start
 *   Or import createApp() for testing without starting the listener.
 *
 * @module api/server
 * @license AGPL-3.0-or-later
 */

import express, { Express } from "express";
import cors from "cors";
import { createPartyRoutes } from "./routes/parties";
import { createMemberRoutes } from "./routes/members";
import { createIdentityRoutes } from "./routes/identities";
import { createSnapshotRoutes } from "./routes/snapshots";
import { createElectionRoutes } from "./routes/elections";
import { createAdminRoutes } from "./routes/admin";
import { notFoundHandler, errorHandler } from "./middleware/error-handler";
import { createRateLimiters } from "./middleware/rate-limiter";
import { getPlatform, createStore } from "./store";
import { Platform, type PlatformCollaborators } from "../core/platform";
import type { PlatformConfig } from "../types";
import { createLogger } from "../utils/logger";

const VERSION = "0.1.0";

const eventLogger = createLogger("events");

// ============================================================
// App Factory
// ============================================================

interface AppOptions {
  /** Optional platform (defaults to singleton) */
  platform?: Platform;
  /** Disable rate limiting (for testing) */
  disableRateLimiting?: boolean;
}

/**
 * Creates and configures the Express app.
 */
export function createApp(options: AppOptions = {}): Express {
  const app = express();
  const platform = options.platform ?? getPlatform();
  const useRateLimiting = !options.disableRateLimiting;
  const limiters = createRateLimiters();

  // Every committed domain event ends up in the log
  platform.events.subscribe((event) => {
    eventLogger.info(event.type, { ...event });
  });

  // --------------------------------------------------------
  // Global Middleware
  // --------------------------------------------------------

  app.use(express.json());

  app.use(
    cors({
      origin: ["http://localhost:3000", "http://localhost:3001"],
      methods: ["GET", "POST", "PUT", "PATCH", "DELETE", "OPTIONS"],
      allowedHeaders: ["Content-Type", "X-Identity"],
    })
  );

  if (useRateLimiting) {
    app.use("/v1", limiters.read);
    app.use("/v1", limiters.write);
  }

  // --------------------------------------------------------
  // Health Check
  // --------------------------------------------------------

  app.get("/health", (_req, res) => {
    res.json({
      status: "ok",
      version: VERSION,
      paused: platform.access.isPaused,
      timestamp: new Date().toISOString(),
    });
  });

  // --------------------------------------------------------
  // API v1 Routes
  // --------------------------------------------------------

  // Parties — lifecycle, profile, leadership
  app.use("/v1/parties", createPartyRoutes(platform));

  // Membership — join, leave, moderation
  app.use("/v1/parties", createMemberRoutes(platform));

  // Identities — per-identity view, document verification
  app.use("/v1/identities", createIdentityRoutes(platform));

  // Snapshots — /v1/snapshots/* and /v1/parties/:id/snapshots*
  app.use("/v1", createSnapshotRoutes(platform));

  // Elections — votes carry their own, tighter limit
  if (useRateLimiting) app.use("/v1/elections/current/vote", limiters.vote);
  app.use("/v1/elections", createElectionRoutes(platform));

  // Administration
  app.use("/v1/admin", createAdminRoutes(platform));

  // --------------------------------------------------------
  // Error Handling
  // --------------------------------------------------------

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}

/**
 * Creates a fresh app with a fresh platform (for testing).
 */
export function createTestApp(
  config?: PlatformConfig,
  collaborators?: PlatformCollaborators
): { app: Express; platform: Platform } {
  const platform = createStore(config, collaborators);
  const app = createApp({ platform, disableRateLimiting: true });
  return { app, platform };
}

// ============================================================
// Start Server (only when run directly)
// ============================================================

const isDirectRun =
  require.main === module ||
  process.argv[1]?.endsWith("server.ts") ||
  process.argv[1]?.endsWith("server.js");

if (isDirectRun) {
  const logger = createLogger("server");
  const platform = getPlatform();
  const app = createApp({ platform });
  const port = platform.config.port;

  platform.scheduler.start();

  app.listen(port, () => {
    logger.info("Party Registry API listening", {
      version: VERSION,
      url: `http://localhost:${port}/v1`,
      owner: platform.access.owner,
      membership: platform.config.policy.membership,
      documentVerification: platform.config.policy.documentVerification,
    });
  });
}
