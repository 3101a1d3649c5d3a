// Rate limiter for outbound Gmail calls.
// Two bounds apply at once: a maximum number of outstanding calls, and a
// maximum number of call starts inside a rolling window. Waiters are admitted
// strictly in FIFO order. backoff() pauses all admissions after the remote
// service signalled throttling.

export interface RateLimiterOptions {
  /** Outstanding (acquired, not yet released) tokens allowed at once. */
  maxConcurrent: number
  /** Call starts allowed inside any window of `windowMs`. */
  maxPerWindow: number
  windowMs: number
}

export interface RateLimitToken {
  readonly id: number
}

export class RateLimiter {
  private readonly options: RateLimiterOptions
  private active = new Set<number>()
  private nextId = 1
  private startTimes: number[] = []
  private queue: Array<(token: RateLimitToken) => void> = []
  private pausedUntil = 0
  private timer: ReturnType<typeof setTimeout> | null = null

  constructor(options: RateLimiterOptions) {
    if (options.maxConcurrent < 1 || options.maxPerWindow < 1 || options.windowMs < 0) {
      throw new RangeError(
        `RateLimiter needs maxConcurrent >= 1, maxPerWindow >= 1 and windowMs >= 0 (got ${JSON.stringify(options)})`,
      )
    }
    this.options = { ...options }
  }

  /** Tokens currently held. */
  get outstanding(): number {
    return this.active.size
  }

  /** Callers waiting in acquire(). */
  get pending(): number {
    return this.queue.length
  }

  /** Wait for a slot. Always pair with release(), success or failure. */
  acquire(): Promise<RateLimitToken> {
    return new Promise((resolve) => {
      this.queue.push(resolve)
      this.drain()
    })
  }

  /** Return a slot. Releasing the same token twice is a no-op. */
  release(token: RateLimitToken): void {
    if (!this.active.delete(token.id)) return
    this.drain()
  }

  /** acquire → fn → release, releasing even when fn rejects. */
  async schedule<T>(fn: () => Promise<T>): Promise<T> {
    const token = await this.acquire()
    try {
      return await fn()
    } finally {
      this.release(token)
    }
  }

  /** Hold every admission for at least `ms`, e.g. after a 429. */
  backoff(ms: number): void {
    this.pausedUntil = Math.max(this.pausedUntil, Date.now() + ms)
  }

  private drain() {
    while (this.queue.length > 0 && this.active.size < this.options.maxConcurrent) {
      const now = Date.now()
      this.pruneWindow(now)
      const wait = this.admissionDelay(now)
      if (wait > 0) {
        this.scheduleDrain(wait)
        return
      }

      const resolve = this.queue.shift()
      if (!resolve) return
      const token: RateLimitToken = { id: this.nextId++ }
      this.active.add(token.id)
      this.startTimes.push(now)
      resolve(token)
    }
  }

  /** Milliseconds until the next admission is allowed, 0 if allowed now. */
  private admissionDelay(now: number): number {
    if (this.pausedUntil > now) return this.pausedUntil - now
    if (this.startTimes.length < this.options.maxPerWindow) return 0
    const oldest = this.startTimes[0] ?? now
    return Math.max(1, oldest + this.options.windowMs - now)
  }

  private pruneWindow(now: number) {
    const cutoff = now - this.options.windowMs
    while (this.startTimes.length > 0 && (this.startTimes[0] ?? now) <= cutoff) {
      this.startTimes.shift()
    }
  }

  private scheduleDrain(ms: number) {
    if (this.timer) return
    this.timer = setTimeout(() => {
      this.timer = null
      this.drain()
    }, ms)
  }
}
