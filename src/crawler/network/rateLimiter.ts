import { createCancelledError } from '../../errors.js';

export interface RateLimiterOptions {
  /** Requests per second. */
  rate: number;
  /** Tokens that may be spent back-to-back; defaults to one second of budget. */
  burst?: number;
  now?: () => number;
}

interface Waiter {
  resolve: () => void;
  reject: (error: unknown) => void;
  detach: () => void;
}

// Guards against refill arithmetic landing a hair under a whole token.
const EPSILON = 1e-9;

/**
 * Token bucket shared by every outbound request of a crawl run. Budget
 * refills continuously at `rate` tokens/second up to `burst`; callers that
 * find the bucket empty wait in FIFO order.
 */
export class RateLimiter {
  private rate: number;
  private burst: number;
  private tokens: number;
  private lastRefill: number;
  private readonly now: () => number;
  private readonly waiters: Waiter[] = [];
  private timer: ReturnType<typeof setTimeout> | undefined;
  private disposed = false;

  constructor(options: RateLimiterOptions) {
    this.rate = options.rate;
    this.burst = Math.max(1, options.burst ?? options.rate);
    this.now = options.now ?? Date.now;
    this.tokens = this.burst;
    this.lastRefill = this.now();
  }

  acquire(signal?: AbortSignal): Promise<void> {
    if (this.disposed) {
      return Promise.reject(createCancelledError('Rate limiter has been disposed'));
    }

    if (signal?.aborted) {
      return Promise.reject(createCancelledError('Rate limit wait aborted'));
    }

    if (this.waiters.length === 0) {
      this.refill();
      if (this.tokens + EPSILON >= 1) {
        this.tokens -= 1;
        return Promise.resolve();
      }
    }

    return new Promise<void>((resolve, reject) => {
      const onAbort = (): void => {
        const index = this.waiters.indexOf(waiter);
        if (index !== -1) {
          this.waiters.splice(index, 1);
        }
        reject(createCancelledError('Rate limit wait aborted'));
        this.reschedule();
      };

      const waiter: Waiter = {
        resolve,
        reject,
        detach: () => signal?.removeEventListener('abort', onAbort),
      };

      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiters.push(waiter);
      this.schedule();
    });
  }

  /** Changes the steady-state rate; burst follows it. */
  updateRate(rate: number): void {
    this.refill();
    this.rate = rate;
    this.burst = Math.max(1, rate);
    this.tokens = Math.min(this.tokens, this.burst);
    this.reschedule();
  }

  get currentRate(): number {
    return this.rate;
  }

  get waiting(): number {
    return this.waiters.length;
  }

  /** Stops the refill timer and rejects everyone still waiting. */
  dispose(): void {
    this.disposed = true;
    this.clearTimer();
    const pending = this.waiters.splice(0);
    for (const waiter of pending) {
      waiter.detach();
      waiter.reject(createCancelledError('Rate limiter has been disposed'));
    }
  }

  private refill(): void {
    const now = this.now();
    const elapsedSeconds = Math.max(0, now - this.lastRefill) / 1_000;
    this.tokens = Math.min(this.burst, this.tokens + elapsedSeconds * this.rate);
    this.lastRefill = now;
  }

  private schedule(): void {
    if (this.timer || this.waiters.length === 0 || this.disposed) {
      return;
    }

    this.refill();
    const deficit = Math.max(0, 1 - this.tokens);
    const waitMs = Math.ceil((deficit / this.rate) * 1_000);

    this.timer = setTimeout(() => {
      this.timer = undefined;
      this.release();
    }, waitMs);
  }

  private reschedule(): void {
    this.clearTimer();
    this.schedule();
  }

  private release(): void {
    this.refill();

    while (this.waiters.length > 0 && this.tokens + EPSILON >= 1) {
      const waiter = this.waiters.shift();
      if (!waiter) {
        break;
      }
      this.tokens -= 1;
      waiter.detach();
      waiter.resolve();
    }

    this.schedule();
  }

  private clearTimer(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
  }
}
