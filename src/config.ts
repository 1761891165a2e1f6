/**
 * Party Registry -- Configuration
 *
 * Builds a PlatformConfig from environment variables.  Every variable is
 * optional; unset ones fall back to DEFAULT_CONFIG.
 *
 * @module config
 * @license AGPL-3.0-or-later
 */

import { z } from "zod";
import { DEFAULT_CONFIG, type PlatformConfig } from "./types";

const flag = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1");

const count = z.coerce.number().int().nonnegative();
const positive = z.coerce.number().int().positive();

/** Comma-separated list; blank entries are dropped */
const list = z.string().transform((value) =>
  value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0)
);

const commitments = list.pipe(
  z.array(z.string().regex(/^[1-9][0-9]*$/, "commitments must be positive decimal integers"))
);

const envSchema = z.object({
  REGISTRY_OWNER: z.string().min(1).optional(),
  MEMBERSHIP_MODE: z.enum(["single", "multiple"]).optional(),
  DOCUMENT_VERIFICATION: flag.optional(),
  PARTY_BANS: flag.optional(),
  MAX_FIELD_LENGTH: positive.optional(),
  MAX_SHORT_NAME_LENGTH: positive.optional(),
  SNAPSHOT_RETENTION: count.optional(),
  SNAPSHOT_BATCH_SIZE: positive.optional(),
  SNAPSHOT_INTERVAL_MS: count.optional(),
  PERSONHOOD_GROUP_ID: z.string().min(1).optional(),
  PERSONHOOD_SCOPE: z.string().min(1).optional(),
  PERSONHOOD_COMMITMENTS: commitments.optional(),
  ORB_VERIFIED: list.optional(),
  PORT: positive.optional(),
});

/**
 * Parses configuration from an environment map.
 *
 * @throws Error naming every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): PlatformConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${problems}`);
  }

  const vars = parsed.data;
  const defaults = DEFAULT_CONFIG;

  return {
    owner: vars.REGISTRY_OWNER ?? defaults.owner,
    policy: {
      membership: vars.MEMBERSHIP_MODE ?? defaults.policy.membership,
      documentVerification: vars.DOCUMENT_VERIFICATION ?? defaults.policy.documentVerification,
      bans: vars.PARTY_BANS ?? defaults.policy.bans,
      maxFieldLength: vars.MAX_FIELD_LENGTH ?? defaults.policy.maxFieldLength,
      maxShortNameLength: vars.MAX_SHORT_NAME_LENGTH ?? defaults.policy.maxShortNameLength,
    },
    snapshotRetention: vars.SNAPSHOT_RETENTION ?? defaults.snapshotRetention,
    snapshotBatchSize: vars.SNAPSHOT_BATCH_SIZE ?? defaults.snapshotBatchSize,
    snapshotIntervalMs: vars.SNAPSHOT_INTERVAL_MS ?? defaults.snapshotIntervalMs,
    orbVerified: vars.ORB_VERIFIED ?? [...defaults.orbVerified],
    personhood: {
      groupId: vars.PERSONHOOD_GROUP_ID ?? defaults.personhood.groupId,
      scope: vars.PERSONHOOD_SCOPE ?? defaults.personhood.scope,
      commitments: vars.PERSONHOOD_COMMITMENTS ?? [...defaults.personhood.commitments],
    },
    port: vars.PORT ?? defaults.port,
  };
}
