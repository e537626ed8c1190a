/**
 * Operation counters and latency samples for attribute operations
 */

import type { MetricsSnapshot, OperationCounters } from "../types.js";

export type CounterName = keyof OperationCounters;

const MAX_SAMPLES = 100;

export class MetricsCollector {
  #counters = new Map<string, OperationCounters>();
  #latency = new Map<string, number[]>();

  /**
   * Get or create counters for an entity type
   */
  #getCounters(type: string): OperationCounters {
    let counters = this.#counters.get(type);
    if (!counters) {
      counters = {
        reads: 0,
        writes: 0,
        skippedWrites: 0,
        failedWrites: 0,
        deletes: 0,
        failedDeletes: 0,
      };
      this.#counters.set(type, counters);
    }
    return counters;
  }

  increment(type: string, counter: CounterName): void {
    this.#getCounters(type)[counter]++;
  }

  /**
   * Record operation latency
   */
  recordLatency(operation: string, ms: number): void {
    let samples = this.#latency.get(operation);
    if (!samples) {
      samples = [];
      this.#latency.set(operation, samples);
    }
    samples.push(ms);

    // Keep only the most recent samples to bound memory
    if (samples.length > MAX_SAMPLES) {
      samples.shift();
    }
  }

  /**
   * Time an async operation and record its latency
   */
  async time<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    const start = performance.now();
    try {
      return await fn();
    } finally {
      this.recordLatency(operation, performance.now() - start);
    }
  }

  getCounters(type: string): OperationCounters | undefined {
    const counters = this.#counters.get(type);
    return counters ? { ...counters } : undefined;
  }

  snapshot(): MetricsSnapshot {
    const types: Record<string, OperationCounters> = {};
    for (const [type, counters] of this.#counters) {
      types[type] = { ...counters };
    }

    const meanLatencyMs: Record<string, number> = {};
    for (const [operation, samples] of this.#latency) {
      if (samples.length > 0) {
        meanLatencyMs[operation] = samples.reduce((a, b) => a + b, 0) / samples.length;
      }
    }

    return { types, meanLatencyMs };
  }

  reset(): void {
    this.#counters.clear();
    this.#latency.clear();
  }
}
