/**
 * Shared test fixtures: a controllable personhood oracle, a manual clock
 * and a platform factory wired to both.
 *
 * @license AGPL-3.0-or-later
 */

import { Platform } from "../src/core/platform";
import { InMemoryIdentityVerifier, type PersonhoodOracle } from "../src/core/personhood";
import { RegistryError, type RegistryErrorCode } from "../src/core/errors";
import { DEFAULT_CONFIG } from "../src/types";
import type { PartyProfile, PersonhoodProof, PlatformConfig, RegistryPolicy } from "../src/types";

export const OWNER = DEFAULT_CONFIG.owner;
export const SCOPE = DEFAULT_CONFIG.personhood.scope;
export const START_TIME = 1_700_000_000_000;

/**
 * Oracle whose verdict the test controls.  With `gated` set, every
 * verification waits until `releaseAll()`.
 */
export class FakeOracle implements PersonhoodOracle {
  verdict = true;
  gated = false;
  calls = 0;
  private waiting: Array<() => void> = [];

  async verify(_proof: PersonhoodProof): Promise<boolean> {
    this.calls++;
    if (this.gated) {
      await new Promise<void>((resolve) => this.waiting.push(resolve));
    }
    return this.verdict;
  }

  get pending(): number {
    return this.waiting.length;
  }

  releaseAll(): void {
    const waiting = this.waiting;
    this.waiting = [];
    for (const resolve of waiting) resolve();
  }
}

export class ManualClock {
  constructor(private current = START_TIME) {}

  readonly now = (): number => this.current;

  advance(ms: number): void {
    this.current += ms;
  }
}

export function makeProof(nullifierHash: string, overrides: Partial<PersonhoodProof> = {}): PersonhoodProof {
  return {
    root: "1",
    merkleTreeDepth: 20,
    groupId: DEFAULT_CONFIG.personhood.groupId,
    signalHash: "0",
    nullifierHash,
    externalNullifier: SCOPE,
    proof: ["1", "2", "3", "4", "5", "6", "7", "8"],
    ...overrides,
  };
}

export function makeProfile(name = "Green Future", shortName = "GRN"): PartyProfile {
  return {
    name,
    shortName,
    description: "Renewables first",
    link: "https://example.org/green",
  };
}

export function makeConfig(
  policy: Partial<RegistryPolicy> = {},
  overrides: Partial<PlatformConfig> = {}
): PlatformConfig {
  return {
    ...DEFAULT_CONFIG,
    ...overrides,
    policy: { ...DEFAULT_CONFIG.policy, ...policy },
  };
}

export interface TestPlatform {
  platform: Platform;
  verifier: InMemoryIdentityVerifier;
  oracle: FakeOracle;
  clock: ManualClock;
}

export function makePlatform(
  policy: Partial<RegistryPolicy> = {},
  overrides: Partial<PlatformConfig> = {}
): TestPlatform {
  const verifier = new InMemoryIdentityVerifier();
  const oracle = new FakeOracle();
  const clock = new ManualClock();
  const platform = new Platform(makeConfig(policy, overrides), {
    verifier,
    oracle,
    clock: clock.now,
  });
  return { platform, verifier, oracle, clock };
}

/** Runs `fn` and asserts it throws a RegistryError with `code`. */
export function expectCode(fn: () => unknown, code: RegistryErrorCode): void {
  let caught: unknown;
  try {
    fn();
  } catch (err) {
    caught = err;
  }
  expect(caught).toBeInstanceOf(RegistryError);
  expect(caught).toMatchObject({ code });
}

/** JSON body accepted by the proof-carrying routes */
export function makeProofBody(nullifierHash: string, overrides: Record<string, unknown> = {}) {
  return {
    proof: {
      root: "1",
      merkle_tree_depth: 20,
      group_id: DEFAULT_CONFIG.personhood.groupId,
      signal_hash: "0",
      nullifier_hash: nullifierHash,
      external_nullifier: SCOPE,
      proof: ["1", "2", "3", "4", "5", "6", "7", "8"],
      ...overrides,
    },
  };
}

export const PARTY_BODY = {
  name: "Green Future",
  short_name: "GRN",
  description: "Renewables first",
  link: "https://example.org/green",
};
