/**
 * Access Gate — owner / responder capability check and pause flag.
 *
 * Rules:
 * - Exactly one owner and one responder at all times
 * - Role checks compare normalized (lowercase) addresses
 * - While paused, every mutating pool operation except unpause fails
 */

import type { Address } from "@hashlock/types";
import { SwapError } from "./errors.js";
import type { Role } from "./types.js";

export class AccessGate {
  private _owner: Address;
  private _responder: Address;
  private _paused = false;

  constructor(owner: Address, responder: Address) {
    this._owner = owner;
    this._responder = responder;
  }

  get owner(): Address {
    return this._owner;
  }

  get responder(): Address {
    return this._responder;
  }

  get paused(): boolean {
    return this._paused;
  }

  isAuthorized(caller: Address, role: Role): boolean {
    const holder = role === "owner" ? this._owner : this._responder;
    return caller.toLowerCase() === holder;
  }

  authorize(caller: Address, role: Role): void {
    if (!this.isAuthorized(caller, role)) {
      throw new SwapError("UNAUTHORIZED", `${caller} does not hold the ${role} role`);
    }
  }

  assertNotPaused(): void {
    if (this._paused) {
      throw new SwapError("PAUSED", "Pool is paused");
    }
  }

  // ─── Role changes ────────────────────────────────────────────────────

  /** Returns the previous owner. */
  transferOwnership(newOwner: Address): Address {
    const previous = this._owner;
    this._owner = newOwner;
    return previous;
  }

  /** Returns the previous responder. */
  setResponder(newResponder: Address): Address {
    const previous = this._responder;
    this._responder = newResponder;
    return previous;
  }

  // ─── Pause ───────────────────────────────────────────────────────────

  pause(): void {
    this.assertNotPaused();
    this._paused = true;
  }

  unpause(): void {
    if (!this._paused) {
      throw new SwapError("INVALID_ARGUMENT", "Pool is not paused");
    }
    this._paused = false;
  }
}
