/**
 * Exponential reconnect delay: base, 2×base, 4×base … capped at max.
 * There is no attempt ceiling; callers keep retrying for as long as they run.
 */
export class ExponentialBackoff {
  private attemptCount = 0

  constructor(
    private readonly baseDelayMs: number,
    private readonly maxDelayMs: number
  ) {}

  static delayFor(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
    return Math.min(baseDelayMs * 2 ** (attempt - 1), maxDelayMs)
  }

  get attempts(): number {
    return this.attemptCount
  }

  next(): number {
    this.attemptCount++
    return ExponentialBackoff.delayFor(this.attemptCount, this.baseDelayMs, this.maxDelayMs)
  }

  reset(): void {
    this.attemptCount = 0
  }
}
