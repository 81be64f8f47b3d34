/**
 * Process-lifetime memo of definitive coupon verdicts, keyed by canonical
 * course URL. Unbounded: coupon codes are not reused at volume within the
 * lifetime of one process.
 */
export class VerdictCache {
  private readonly verdicts = new Map<string, boolean>();

  get(key: string): boolean | undefined {
    return this.verdicts.get(key);
  }

  set(key: string, isFree: boolean): void {
    this.verdicts.set(key, isFree);
  }

  get size(): number {
    return this.verdicts.size;
  }
}
