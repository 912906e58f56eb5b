/**
 * Ledger clock.
 *
 * A pool reads height and time from its ledger; it never advances them.
 * ManualClock is the in-process ledger used by tests and the demo.
 */

export interface ChainClock {
  /** Current block height */
  height(): number;
  /** Current ledger time, unix seconds */
  now(): number;
}

export interface ManualClockOptions {
  readonly height?: number;
  readonly time?: number;
  /** Seconds added per block by advance(). Default: 12 */
  readonly blockTime?: number;
}

export class ManualClock implements ChainClock {
  private _height: number;
  private _time: number;
  private readonly _blockTime: number;

  constructor(options: ManualClockOptions = {}) {
    this._height = options.height ?? 0;
    this._time = options.time ?? 1_700_000_000;
    this._blockTime = options.blockTime ?? 12;
  }

  height(): number {
    return this._height;
  }

  now(): number {
    return this._time;
  }

  /** Mine `blocks` blocks. */
  advance(blocks = 1): void {
    if (!Number.isInteger(blocks) || blocks < 0) {
      throw new RangeError(`blocks must be a non-negative integer, got ${blocks}`);
    }
    this._height += blocks;
    this._time += blocks * this._blockTime;
  }

  /** Mine until `height` is reached. */
  advanceTo(height: number): void {
    if (height < this._height) {
      throw new RangeError(`Cannot move from height ${this._height} back to ${height}`);
    }
    this.advance(height - this._height);
  }
}
