/**
 * Per-object version index: the sorted set of timestamps at which an
 * artifact exists, with "latest at or before" lookup by binary search.
 */

import type { Timestamp } from "../timestamp/index.js";

export class VersionIndex {
  private readonly versions = new Map<string, Timestamp[]>();

  add(key: string, timestamp: Timestamp): void {
    const list = this.versions.get(key);
    if (!list) {
      this.versions.set(key, [timestamp]);
      return;
    }
    const at = VersionIndex.lowerBound(list, timestamp);
    if (list[at] !== timestamp) {
      list.splice(at, 0, timestamp);
    }
  }

  has(key: string, timestamp: Timestamp): boolean {
    const list = this.versions.get(key);
    return list !== undefined && list[VersionIndex.lowerBound(list, timestamp)] === timestamp;
  }

  /**
   * Greatest indexed timestamp <= `timestamp`, if any.
   */
  latestAtOrBefore(key: string, timestamp: Timestamp): Timestamp | undefined {
    const list = this.versions.get(key);
    if (!list) {
      return undefined;
    }
    const upper = VersionIndex.lowerBound(list, timestamp + 1);
    return upper > 0 ? list[upper - 1] : undefined;
  }

  /**
   * Forget every key starting with `prefix`.
   */
  clear(prefix: string): void {
    for (const key of [...this.versions.keys()]) {
      if (key.startsWith(prefix)) {
        this.versions.delete(key);
      }
    }
  }

  /**
   * Ascending snapshot; later additions do not affect it.
   */
  list(key: string): Timestamp[] {
    return [...(this.versions.get(key) ?? [])];
  }

  /** First position whose value is >= `timestamp`. */
  private static lowerBound(list: readonly Timestamp[], timestamp: Timestamp): number {
    let lo = 0;
    let hi = list.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      const value = list[mid];
      if (value !== undefined && value < timestamp) {
        lo = mid + 1;
      } else {
        hi = mid;
      }
    }
    return lo;
  }
}
