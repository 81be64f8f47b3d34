/**
 * Returns a promise that resolves after `ms` milliseconds.
 * Zero or negative durations resolve on the next macrotask.
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, Math.max(0, ms)));
}

/**
 * Enforces a minimum interval between consecutive calls to `wait()`.
 * The first call never waits.
 */
export class Pacer {
  private lastAt: number | null = null;

  constructor(private readonly intervalMs: number) {}

  async wait(): Promise<void> {
    if (this.lastAt !== null) {
      const elapsed = Date.now() - this.lastAt;
      if (elapsed < this.intervalMs) {
        await sleep(this.intervalMs - elapsed);
      }
    }
    this.lastAt = Date.now();
  }
}
