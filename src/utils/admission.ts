export type SlotResult<T> = { admitted: false } | { admitted: true; value: T };

/**
 * Bounded counter of builds in flight.
 *
 * reserve() checks and increments with no await in between, so on the
 * event loop no two requests can both see the last free slot.
 */
export class AdmissionController {
  private inFlightCount = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`capacity must be a positive integer, got ${capacity}`);
    }
  }

  get inFlight(): number {
    return this.inFlightCount;
  }

  /** Take a slot if one is free. The counter is untouched on failure. */
  reserve(): boolean {
    if (this.inFlightCount + 1 > this.capacity) {
      return false;
    }
    this.inFlightCount += 1;
    return true;
  }

  /** Give back a slot obtained from a successful reserve(). */
  release(): void {
    if (this.inFlightCount === 0) {
      throw new Error('release() called with no slot reserved');
    }
    this.inFlightCount -= 1;
  }

  /**
   * Run fn while holding a slot, releasing it on every exit path.
   * fn is not called when no slot is free.
   */
  async withSlot<T>(fn: () => Promise<T>): Promise<SlotResult<T>> {
    if (!this.reserve()) {
      return { admitted: false };
    }
    try {
      return { admitted: true, value: await fn() };
    } finally {
      this.release();
    }
  }
}
