import type { RetrievalMetricsSnapshot } from "./types.js";

/**
 * Retrieval metrics accumulator. Every update happens synchronously between
 * awaits, so each read-modify-write and each snapshot is consistent.
 */
export class RetrievalMetrics {
  private requests = 0;
  private errors = 0;
  private results = 0;
  private latencyMs = 0;

  record(latencyMs: number, resultCount: number, failed = false): void {
    this.requests += 1;
    this.latencyMs += Math.max(0, latencyMs);
    this.results += Math.max(0, resultCount);
    if (failed) this.errors += 1;
  }

  snapshot(): RetrievalMetricsSnapshot {
    const requests = this.requests;
    return {
      searchRequestsTotal: requests,
      searchErrorsTotal: this.errors,
      searchResultsTotal: this.results,
      searchLatencyMsTotal: Math.round(this.latencyMs * 100) / 100,
      avgLatencyMs: requests > 0 ? Math.round((this.latencyMs / requests) * 100) / 100 : 0,
      avgResultsPerRequest: requests > 0 ? Math.round((this.results / requests) * 100) / 100 : 0,
    };
  }
}
