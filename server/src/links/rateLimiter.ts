export interface Clock {
  now(): number
  sleep(ms: number): Promise<void>
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: ms => new Promise(resolve => setTimeout(resolve, ms)),
}

/**
 * Enforces a minimum spacing between calls across every caller sharing the
 * instance. A slot is reserved synchronously before any waiting, so callers
 * cannot race for the same slot.
 */
export class RateLimiter {
  private nextSlotAt = 0

  constructor(
    readonly minIntervalMs: number,
    private readonly clock: Clock = systemClock
  ) {}

  /**
   * Waits for the next free slot if it opens within `timeoutMs`.
   * Resolves false without waiting or reserving anything otherwise.
   */
  async acquire(timeoutMs = 0): Promise<boolean> {
    const now = this.clock.now()
    const slot = Math.max(now, this.nextSlotAt)
    const wait = slot - now
    if (wait > timeoutMs) return false

    this.nextSlotAt = slot + this.minIntervalMs
    if (wait > 0) await this.clock.sleep(wait)
    return true
  }
}
