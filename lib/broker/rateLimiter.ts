import { sleep as defaultSleep, type Sleep } from "@/lib/server/retry";

/**
 * Request spacing shared by every quote fetch in the process.
 * Acquisitions are chained, so concurrent callers take turns instead of racing on `nextSlotAt`.
 */
export class RateLimiter {
  private nextSlotAt = 0;
  private cooldownUntil = 0;
  private chain: Promise<void> = Promise.resolve();

  constructor(
    private readonly minSpacingMs: number,
    private readonly clock: () => number = Date.now,
    private readonly wait: Sleep = defaultSleep,
  ) {}

  acquire(): Promise<void> {
    const turn = this.chain.then(async () => {
      const now = this.clock();
      const readyAt = Math.max(this.nextSlotAt, this.cooldownUntil);
      if (readyAt > now) await this.wait(readyAt - now);
      this.nextSlotAt = Math.max(this.clock(), readyAt) + this.minSpacingMs;
    });
    this.chain = turn.catch(() => undefined);
    return turn;
  }

  /** Upstream said slow down (429): hold every caller until the cooldown passes. */
  penalize(ms: number): void {
    this.cooldownUntil = Math.max(this.cooldownUntil, this.clock() + Math.max(0, ms));
  }

  get cooldownRemainingMs(): number {
    return Math.max(0, this.cooldownUntil - this.clock());
  }
}
