// src/stability.ts

export type StabilityOptions = {
  /** Poll interval; one confirming cycle accounts for this much stable time. */
  intervalMs: number;
  /** Stable time required before a file is eligible for copy. */
  thresholdMs: number;
};

export type TrackedFile = {
  lastSize: number;
  stableCount: number;
};

export type DropReason = "missing" | "unreadable";

export type EligibleFile = {
  path: string;
  size: number;
  stableCount: number;
};

export type StabilityUpdate = {
  admitted: string[];
  reset: string[];
  dropped: Array<{ path: string; reason: DropReason }>;
  // new candidates whose size could not be read
  skipped: string[];
  eligible: EligibleFile[];
};

/**
 * Candidate set for one scan: absolute path -> size in bytes, or null when
 * the entry was listed but its size could not be read.
 */
export type Observations = ReadonlyMap<string, number | null>;

/**
 * Per-path size history across scan cycles.
 *
 * A path is eligible once its size has been confirmed unchanged on enough
 * consecutive cycles that stableCount * intervalMs reaches thresholdMs. Any
 * size change restarts the count at zero. Eligible paths leave the table in
 * the same update that reports them, whatever the copy outcome; the caller
 * finishes the copy attempt before the next update.
 */
export class StabilityTracker {
  private readonly intervalMs: number;
  private readonly thresholdMs: number;
  private readonly tracked = new Map<string, TrackedFile>();

  constructor({ intervalMs, thresholdMs }: StabilityOptions) {
    if (!Number.isFinite(intervalMs) || intervalMs <= 0) {
      throw new RangeError(`intervalMs must be positive (got ${intervalMs})`);
    }
    if (!Number.isFinite(thresholdMs) || thresholdMs < 0) {
      throw new RangeError(
        `thresholdMs must be non-negative (got ${thresholdMs})`,
      );
    }
    this.intervalMs = intervalMs;
    this.thresholdMs = thresholdMs;
  }

  get size(): number {
    return this.tracked.size;
  }

  has(path: string): boolean {
    return this.tracked.has(path);
  }

  get(path: string): Readonly<TrackedFile> | undefined {
    return this.tracked.get(path);
  }

  paths(): string[] {
    return Array.from(this.tracked.keys());
  }

  clear(): void {
    this.tracked.clear();
  }

  /** Stable time a file with `stableCount` confirmations has accumulated. */
  stableMs(stableCount: number): number {
    return stableCount * this.intervalMs;
  }

  update(observations: Observations): StabilityUpdate {
    const result: StabilityUpdate = {
      admitted: [],
      reset: [],
      dropped: [],
      skipped: [],
      eligible: [],
    };

    // existing files first, so a path admitted below is never counted twice
    for (const [path, state] of Array.from(this.tracked)) {
      if (!observations.has(path)) {
        this.tracked.delete(path);
        result.dropped.push({ path, reason: "missing" });
        continue;
      }
      const size = observations.get(path);
      if (size == null) {
        this.tracked.delete(path);
        result.dropped.push({ path, reason: "unreadable" });
        continue;
      }
      if (size !== state.lastSize) {
        this.tracked.set(path, { lastSize: size, stableCount: 0 });
        result.reset.push(path);
        continue;
      }
      const stableCount = state.stableCount + 1;
      if (this.stableMs(stableCount) >= this.thresholdMs) {
        this.tracked.delete(path);
        result.eligible.push({ path, size, stableCount });
      } else {
        this.tracked.set(path, { lastSize: size, stableCount });
      }
    }

    const handled = new Set([
      ...result.eligible.map((e) => e.path),
      ...result.dropped.map((d) => d.path),
    ]);
    for (const [path, size] of observations) {
      if (this.tracked.has(path) || handled.has(path)) continue;
      if (size == null) {
        result.skipped.push(path);
        continue;
      }
      this.tracked.set(path, { lastSize: size, stableCount: 0 });
      result.admitted.push(path);
    }

    return result;
  }
}
