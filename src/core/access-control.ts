/**
 * Party Registry -- Ownership & Pause Switch
 *
 * One AccessControl instance is shared by the registry, the snapshot
 * ledger and the election tally so that a single pause halts every
 * mutating entry point.
 *
 * @module access-control
 * @license AGPL-3.0-or-later
 */

import { RegistryError } from "./errors";
import { EventBus } from "./events";
import type { Identity } from "../types";
import { ZERO_IDENTITY } from "../types";

/** True for the empty string and the all-zero address. */
export function isZeroIdentity(identity: Identity): boolean {
  return identity.trim() === "" || identity === ZERO_IDENTITY;
}

export class AccessControl {
  private ownerIdentity: Identity;
  private paused = false;

  constructor(owner: Identity, private readonly events: EventBus) {
    if (isZeroIdentity(owner)) {
      throw new RegistryError("Owner cannot be the zero identity", "ZeroIdentity");
    }
    this.ownerIdentity = owner;
  }

  get owner(): Identity {
    return this.ownerIdentity;
  }

  get isPaused(): boolean {
    return this.paused;
  }

  isOwner(identity: Identity): boolean {
    return identity === this.ownerIdentity;
  }

  requireOwner(caller: Identity): void {
    if (!this.isOwner(caller)) {
      throw new RegistryError("Caller is not the owner", "NotOwner");
    }
  }

  requireNotPaused(): void {
    if (this.paused) {
      throw new RegistryError("The platform is paused", "Paused");
    }
  }

  /**
   * Flips the global pause switch.  Allowed while paused.
   *
   * @returns The new pause state
   */
  togglePause(caller: Identity): boolean {
    this.requireOwner(caller);
    this.paused = !this.paused;
    this.events.publish({ type: "PauseToggled", paused: this.paused });
    return this.paused;
  }

  transferOwnership(caller: Identity, newOwner: Identity): void {
    this.requireNotPaused();
    this.requireOwner(caller);
    if (isZeroIdentity(newOwner)) {
      throw new RegistryError("New owner cannot be the zero identity", "ZeroIdentity");
    }
    const previousOwner = this.ownerIdentity;
    this.ownerIdentity = newOwner;
    this.events.publish({ type: "OwnershipTransferred", previousOwner, newOwner });
  }
}
