/**
 * @hashlock/ledger — Fungible balance ledger.
 *
 * Tracks a non-negative integer balance per account plus a total supply.
 *
 * API surface:
 * - mint() — Create units in an account
 * - burn() — Destroy units held by an account
 * - transfer() — Move units between accounts
 * - balanceOf() / totalSupply — Queries
 * - verifyConservation() — Check totalSupply == sum(balances)
 * - snapshot() / fromSnapshot() — Serialize and restore
 *
 * Every operation validates all of its inputs before touching state, so a
 * failed call leaves the ledger exactly as it was. Accounts are compared
 * case-insensitively and stored in lowercase.
 */

import type { Address } from "@hashlock/types";
import { isAddress } from "@hashlock/types";
import type {
  AccountBalance,
  BalanceLine,
  ConservationResult,
  LedgerSnapshot,
} from "./types.js";
import { LedgerError } from "./types.js";

export class BalanceLedger {
  /** Only non-zero balances are stored. */
  private readonly _balances: Map<Address, bigint> = new Map();
  private _totalSupply = 0n;

  // ─── Writes ──────────────────────────────────────────────────────────

  /**
   * Create `amount` units in `account`.
   */
  mint(account: Address, amount: bigint): void {
    const key = this._key(account);
    this._assertPositive(amount);

    this._set(key, this.balanceOf(key) + amount);
    this._totalSupply += amount;
  }

  /**
   * Destroy `amount` units held by `account`.
   * Throws INSUFFICIENT_BALANCE if the account holds less.
   */
  burn(account: Address, amount: bigint): void {
    const key = this._key(account);
    this._assertPositive(amount);
    this._assertCovers(key, amount);

    this._set(key, this.balanceOf(key) - amount);
    this._totalSupply -= amount;
  }

  /**
   * Move `amount` units from `from` to `to`. Supply is unchanged.
   */
  transfer(from: Address, to: Address, amount: bigint): void {
    const source = this._key(from);
    const destination = this._key(to);
    this._assertPositive(amount);
    this._assertCovers(source, amount);

    this._set(source, this.balanceOf(source) - amount);
    this._set(destination, this.balanceOf(destination) + amount);
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  balanceOf(account: Address): bigint {
    return this._balances.get(lower(account)) ?? 0n;
  }

  get totalSupply(): bigint {
    return this._totalSupply;
  }

  /**
   * All accounts with a non-zero balance, ordered by address.
   */
  holders(): readonly AccountBalance[] {
    return [...this._balances.entries()]
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([account, balance]) => ({ account, balance }));
  }

  get holderCount(): number {
    return this._balances.size;
  }

  /**
   * Recompute the sum of balances and compare it to the tracked supply.
   */
  verifyConservation(): ConservationResult {
    let sum = 0n;
    for (const balance of this._balances.values()) {
      sum += balance;
    }
    return {
      valid: sum === this._totalSupply,
      totalSupply: this._totalSupply,
      sumOfBalances: sum,
    };
  }

  // ─── Snapshot (Persistence) ──────────────────────────────────────────

  snapshot(timestamp?: string): LedgerSnapshot {
    const balances: BalanceLine[] = this.holders().map((h) => ({
      account: h.account,
      balance: h.balance.toString(),
    }));
    return {
      version: 1,
      totalSupply: this._totalSupply.toString(),
      balances,
      createdAt: timestamp ?? new Date().toISOString(),
    };
  }

  /**
   * Restore a ledger from a snapshot.
   * Every line is re-validated and the supply must match the sum of lines.
   */
  static fromSnapshot(snapshot: LedgerSnapshot): BalanceLedger {
    const ledger = new BalanceLedger();

    for (const line of snapshot.balances) {
      if (!isAddress(line.account)) {
        throw new LedgerError("INVALID_SNAPSHOT", `Invalid account in snapshot: "${String(line.account)}"`);
      }
      const account = lower(line.account);
      if (ledger._balances.has(account)) {
        throw new LedgerError("INVALID_SNAPSHOT", `Duplicate account in snapshot: "${account}"`);
      }
      const balance = parseRawUnits(line.balance);
      if (balance <= 0n) {
        throw new LedgerError("INVALID_SNAPSHOT", `Snapshot balance must be positive for "${account}"`);
      }
      ledger._balances.set(account, balance);
      ledger._totalSupply += balance;
    }

    if (ledger._totalSupply !== parseRawUnits(snapshot.totalSupply)) {
      throw new LedgerError(
        "INVALID_SNAPSHOT",
        `Snapshot supply ${snapshot.totalSupply} does not equal the sum of balances ${ledger._totalSupply.toString()}`,
      );
    }

    return ledger;
  }

  // ─── Internal ────────────────────────────────────────────────────────

  private _set(account: Address, balance: bigint): void {
    if (balance === 0n) {
      this._balances.delete(account);
    } else {
      this._balances.set(account, balance);
    }
  }

  /** Validate an account and return its map key. */
  private _key(account: Address): Address {
    if (!isAddress(account)) {
      throw new LedgerError("INVALID_ACCOUNT", `Invalid account: "${String(account)}"`);
    }
    return lower(account);
  }

  private _assertPositive(amount: bigint): void {
    if (typeof amount !== "bigint" || amount <= 0n) {
      throw new LedgerError("INVALID_AMOUNT", `Amount must be a positive integer, got: ${String(amount)}`);
    }
  }

  private _assertCovers(account: Address, amount: bigint): void {
    const balance = this.balanceOf(account);
    if (balance < amount) {
      throw new LedgerError(
        "INSUFFICIENT_BALANCE",
        `Account "${account}" holds ${balance.toString()}, needs ${amount.toString()}`,
      );
    }
  }
}

/** Map key for an account. */
function lower(account: Address): Address {
  return `0x${account.slice(2).toLowerCase()}`;
}

function parseRawUnits(value: string): bigint {
  if (!/^\d+$/.test(value)) {
    throw new LedgerError("INVALID_SNAPSHOT", `Invalid unit amount in snapshot: "${value}"`);
  }
  return BigInt(value);
}
