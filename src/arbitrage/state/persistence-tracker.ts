import type { Logger } from '../../utils/logger.util';
import type { PairIdentity, PersistenceEntry } from '../types';

/**
 * First-seen heights keyed by pair identity.
 *
 * Entries are never evicted unless `maxEntries` is set, in which case the
 * oldest inserted identity is dropped once the bound is reached. A pair that
 * keeps re-widening keeps its original first-seen height.
 */
export class PersistenceTracker {
  private readonly threshold: number;
  private readonly maxEntries: number;
  private readonly logger?: Logger;
  private firstSeen: Map<PairIdentity, number> = new Map();

  constructor(params: { threshold: number; maxEntries?: number; logger?: Logger }) {
    this.threshold = params.threshold;
    this.maxEntries = params.maxEntries ?? 0;
    this.logger = params.logger;
  }

  /**
   * Records a first sighting and returns false, or reports whether the
   * identity has spanned at least `threshold` heights.
   */
  observe(identity: PairIdentity, height: number): boolean {
    const stored = this.firstSeen.get(identity);
    if (stored === undefined) {
      this.insert(identity, height);
      return false;
    }
    return height - stored >= this.threshold;
  }

  has(identity: PairIdentity): boolean {
    return this.firstSeen.has(identity);
  }

  getFirstSeen(identity: PairIdentity): number | undefined {
    return this.firstSeen.get(identity);
  }

  get size(): number {
    return this.firstSeen.size;
  }

  entries(): PersistenceEntry[] {
    return Array.from(this.firstSeen, ([pairIdentity, firstSeenHeight]) => ({
      pairIdentity,
      firstSeenHeight,
    }));
  }

  restore(entries: readonly PersistenceEntry[]): void {
    const next = new Map<PairIdentity, number>();
    for (const entry of entries) {
      if (!next.has(entry.pairIdentity)) {
        next.set(entry.pairIdentity, entry.firstSeenHeight);
      }
    }
    this.firstSeen = next;
    while (this.maxEntries > 0 && this.firstSeen.size > this.maxEntries) {
      this.evictOldest();
    }
  }

  private insert(identity: PairIdentity, height: number): void {
    if (this.maxEntries > 0 && this.firstSeen.size >= this.maxEntries) {
      this.evictOldest();
    }
    this.firstSeen.set(identity, height);
    this.logger?.debug(`[ARB] Persistence baseline pair=${identity} height=${height}`);
  }

  private evictOldest(): void {
    const oldest = this.firstSeen.keys().next();
    if (oldest.done) return;
    this.firstSeen.delete(oldest.value);
    this.logger?.debug(`[ARB] Persistence evicted pair=${oldest.value}`);
  }
}
