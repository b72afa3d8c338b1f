export const MESSAGE_CACHE_TTL_MS = 60_000;

/**
 * Remembers recently processed gateway message ids so that webhook
 * redeliveries are handled once.
 */
export class RecentMessageIds {
  private seen = new Map<string, number>();

  constructor(private readonly ttlMs: number = MESSAGE_CACHE_TTL_MS) {}

  get size(): number {
    return this.seen.size;
  }

  /** True when `id` was already seen within the TTL; records it otherwise. */
  checkAndRemember(id: string, now: number = Date.now()): boolean {
    this.prune(now);
    if (this.seen.has(id)) {
      return true;
    }
    this.seen.set(id, now);
    return false;
  }

  private prune(now: number): void {
    for (const [id, at] of this.seen) {
      if (now - at >= this.ttlMs) {
        this.seen.delete(id);
      }
    }
  }
}
