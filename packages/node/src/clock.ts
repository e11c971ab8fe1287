/**
 * Block clock — derives the current height from wall time.
 *
 * height = floor((now - genesisTime) / blockIntervalMs), never negative
 * and never lower than a height this clock has already returned.
 * The core never reads a clock; the host passes the height into each call.
 */

export interface BlockClock {
  height(): number;
}

export interface BlockClockOptions {
  readonly genesisTime: Date;
  readonly blockIntervalMs: number;
  /** Millisecond wall time. Default: Date.now */
  readonly now?: () => number;
}

export function createBlockClock(options: BlockClockOptions): BlockClock {
  const genesis = options.genesisTime.getTime();
  const interval = options.blockIntervalMs;
  const now = options.now ?? Date.now;

  if (!Number.isInteger(interval) || interval < 1) {
    throw new Error(`blockIntervalMs must be a positive integer, got ${interval}`);
  }

  let last = 0;

  return {
    height: () => {
      // Wall time can step back (NTP); heights cannot.
      last = Math.max(last, Math.floor((now() - genesis) / interval));
      return last;
    },
  };
}
