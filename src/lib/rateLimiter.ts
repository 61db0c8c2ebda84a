export interface Clock {
  now(): number;
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep(ms, signal) {
    if (ms <= 0) return Promise.resolve();
    return new Promise<void>((resolve, reject) => {
      if (signal?.aborted) {
        reject(signal.reason);
        return;
      }
      const onAbort = () => {
        clearTimeout(timer);
        reject(signal?.reason);
      };
      const timer = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      }, ms);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }
};

interface HostState {
  nextAllowedAt: number;
  cooldownUntil: number;
  queue: Promise<void>;
}

/**
 * Spaces requests per host. Acquisitions on one host are served in order and
 * never wait on another host's interval or cooldown.
 */
export class HostRateLimiter {
  private readonly hosts = new Map<string, HostState>();

  constructor(
    private readonly minIntervalMs: number,
    private readonly clock: Clock = systemClock
  ) {}

  private state(host: string): HostState {
    let state = this.hosts.get(host);
    if (!state) {
      state = { nextAllowedAt: 0, cooldownUntil: 0, queue: Promise.resolve() };
      this.hosts.set(host, state);
    }
    return state;
  }

  async acquire(host: string, signal?: AbortSignal): Promise<void> {
    const state = this.state(host);
    let release: () => void = () => {};
    const previous = state.queue;
    state.queue = new Promise<void>((resolve) => {
      release = resolve;
    });

    try {
      await previous;
      signal?.throwIfAborted();
      // Re-check after each sleep: a 429 elsewhere on this host may extend the cooldown.
      for (;;) {
        const readyAt = Math.max(state.nextAllowedAt, state.cooldownUntil);
        const waitMs = readyAt - this.clock.now();
        if (waitMs <= 0) break;
        await this.clock.sleep(waitMs, signal);
      }
      state.nextAllowedAt = this.clock.now() + this.minIntervalMs;
    } finally {
      release();
    }
  }

  /** Blocks every acquisition on `host` for at least `ms` from now. */
  suspend(host: string, ms: number) {
    const state = this.state(host);
    state.cooldownUntil = Math.max(state.cooldownUntil, this.clock.now() + ms);
  }

  cooldownRemaining(host: string): number {
    const state = this.hosts.get(host);
    if (!state) return 0;
    return Math.max(0, state.cooldownUntil - this.clock.now());
  }
}
