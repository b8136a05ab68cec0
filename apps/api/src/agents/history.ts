import type { RouterStats, RoutingHistoryEntry } from "../types/routing";

/**
 * Bounded, append-only routing log owned by one Router. When full, the
 * oldest entry is evicted. Appends and snapshots are synchronous, so on a
 * single event loop a reader never sees a half-written entry.
 */
export class RoutingHistory {
  private entries: RoutingHistoryEntry[] = [];

  constructor(readonly capacity = 1000) {
    if (!Number.isInteger(capacity) || capacity < 1) throw new Error("history capacity must be a positive integer");
  }

  get size(): number {
    return this.entries.length;
  }

  append(entry: RoutingHistoryEntry): void {
    this.entries.push(Object.freeze({ ...entry }));
    if (this.entries.length > this.capacity) this.entries.splice(0, this.entries.length - this.capacity);
  }

  snapshot(): RoutingHistoryEntry[] {
    return [...this.entries];
  }
}

export function emptyStats(): RouterStats {
  return {
    totalQueries: 0,
    bySource: {},
    byRetrievalType: {},
    avgConfidence: 0,
    errorCount: 0,
    successRate: 0
  };
}

export function computeStats(entries: readonly RoutingHistoryEntry[]): RouterStats {
  if (entries.length === 0) return emptyStats();

  const stats = emptyStats();
  let confidenceSum = 0;

  for (const entry of entries) {
    stats.bySource[entry.datasource] = (stats.bySource[entry.datasource] ?? 0) + 1;
    stats.byRetrievalType[entry.retrievalType] = (stats.byRetrievalType[entry.retrievalType] ?? 0) + 1;
    confidenceSum += entry.confidence;
    if (entry.error) stats.errorCount += 1;
  }

  const total = entries.length;
  stats.totalQueries = total;
  stats.avgConfidence = confidenceSum / total;
  stats.successRate = (total - stats.errorCount) / total;
  return stats;
}
