import { InvariantViolationError } from "./errors";
import { SeededRng } from "./random";
import type {
  LatencyStats,
  MetricsSnapshot,
  OutcomeCounts,
  PercentileStats,
  Request,
  ServerMetrics,
} from "./types";

export const DEFAULT_PERCENTILE_CAPACITY = 100_000;

/** Running count/mean/min/max/variance (Welford). */
export class RunningStats {
  private n = 0;
  private mean = 0;
  private m2 = 0;
  private min = Infinity;
  private max = -Infinity;

  push(value: number) {
    this.n += 1;
    const delta = value - this.mean;
    this.mean += delta / this.n;
    this.m2 += delta * (value - this.mean);
    if (value < this.min) this.min = value;
    if (value > this.max) this.max = value;
  }

  get count() {
    return this.n;
  }

  get average() {
    return this.n > 0 ? this.mean : 0;
  }

  get peak() {
    return this.n > 0 ? this.max : 0;
  }

  toStats(): LatencyStats {
    if (this.n === 0) {
      return { count: 0, avgMs: 0, minMs: 0, maxMs: 0, stddevMs: 0 };
    }
    return {
      count: this.n,
      avgMs: this.mean,
      minMs: this.min,
      maxMs: this.max,
      stddevMs: this.n > 1 ? Math.sqrt(this.m2 / (this.n - 1)) : 0,
    };
  }
}

/**
 * Order statistics in bounded memory. Exact while the number of samples
 * stays within `capacity`; past that it keeps a uniform reservoir
 * (Algorithm R) of `capacity` samples and the result is an estimate.
 */
export class PercentileEstimator {
  private samples: number[] = [];
  private seen = 0;
  private sorted: number[] | null = null;

  constructor(
    private readonly capacity: number = DEFAULT_PERCENTILE_CAPACITY,
    private readonly rng: SeededRng = new SeededRng(0)
  ) {}

  get exact() {
    return this.seen <= this.capacity;
  }

  get count() {
    return this.seen;
  }

  push(value: number) {
    this.seen += 1;
    this.sorted = null;
    if (this.samples.length < this.capacity) {
      this.samples.push(value);
      return;
    }
    const slot = this.rng.nextInt(0, this.seen - 1);
    if (slot < this.capacity) {
      this.samples[slot] = value;
    }
  }

  /** Linear interpolation between closest ranks; `p` in [0, 1]. */
  quantile(p: number): number {
    if (this.samples.length === 0) return 0;
    if (!this.sorted) {
      this.sorted = [...this.samples].sort((a, b) => a - b);
    }
    const sorted = this.sorted;
    const index = Math.min(1, Math.max(0, p)) * (sorted.length - 1);
    const lower = Math.floor(index);
    const upper = Math.min(sorted.length - 1, lower + 1);
    const weight = index - lower;
    return sorted[lower] * (1 - weight) + sorted[upper] * weight;
  }

  percentiles(): PercentileStats {
    return {
      p50: this.quantile(0.5),
      p95: this.quantile(0.95),
      p99: this.quantile(0.99),
      p999: this.quantile(0.999),
    };
  }
}

type Accumulator = {
  counts: OutcomeCounts;
  responseTime: RunningStats;
  queueWait: RunningStats;
  percentiles: PercentileEstimator;
  utilization: RunningStats;
  maxQueueDepth: number;
};

const createAccumulator = (capacity: number, rng: SeededRng): Accumulator => ({
  counts: { total: 0, success: 0, timedOut: 0, error: 0 },
  responseTime: new RunningStats(),
  queueWait: new RunningStats(),
  percentiles: new PercentileEstimator(capacity, rng),
  utilization: new RunningStats(),
  maxQueueDepth: 0,
});

const countOutcome = (counts: OutcomeCounts, request: Request) => {
  counts.total += 1;
  if (request.outcome === "success") counts.success += 1;
  else if (request.outcome === "timed-out") counts.timedOut += 1;
  else counts.error += 1;
};

export type MetricsCollectorOptions = {
  percentileCapacity?: number;
  rng?: SeededRng;
};

/**
 * Incremental aggregation of terminal requests. Raw requests are never
 * kept: each observation folds into counters, running stats and the
 * percentile estimators.
 */
export class MetricsCollector {
  private readonly global: Accumulator;
  private readonly servers = new Map<number, Accumulator>();
  private readonly capacity: number;
  private readonly rng: SeededRng;
  private finalized = false;

  constructor(options: MetricsCollectorOptions = {}) {
    this.capacity = options.percentileCapacity ?? DEFAULT_PERCENTILE_CAPACITY;
    this.rng = options.rng ?? new SeededRng(0);
    this.global = createAccumulator(this.capacity, this.rng.fork("global"));
  }

  get observed() {
    return this.global.counts.total;
  }

  registerServer(serverId: number) {
    this.accumulatorFor(serverId);
  }

  observe(request: Request) {
    this.assertOpen("observe");
    if (request.outcome === "pending") {
      throw new InvariantViolationError(`request ${request.id} observed while pending`);
    }
    if (request.recorded) {
      throw new InvariantViolationError(`request ${request.id} observed twice`);
    }
    if (request.serverId === null || request.enqueueTimeMs === undefined) {
      throw new InvariantViolationError(`request ${request.id} finished without a server`);
    }
    request.recorded = true;

    const completionMs = request.completionTimeMs ?? request.arrivalTimeMs;
    const responseMs = completionMs - request.arrivalTimeMs;
    const waitMs = (request.dispatchTimeMs ?? completionMs) - request.enqueueTimeMs;

    for (const acc of [this.global, this.accumulatorFor(request.serverId)]) {
      countOutcome(acc.counts, request);
      acc.responseTime.push(responseMs);
      acc.queueWait.push(waitMs);
      acc.percentiles.push(responseMs);
    }
  }

  sampleUtilization(serverId: number, utilization: number) {
    this.assertOpen("sampleUtilization");
    this.accumulatorFor(serverId).utilization.push(utilization);
    this.global.utilization.push(utilization);
  }

  recordQueueDepth(serverId: number, depth: number) {
    this.assertOpen("recordQueueDepth");
    const acc = this.accumulatorFor(serverId);
    acc.maxQueueDepth = Math.max(acc.maxQueueDepth, depth);
    this.global.maxQueueDepth = Math.max(this.global.maxQueueDepth, depth);
  }

  finalize(scenario: string, durationMs: number, truncated = 0): MetricsSnapshot {
    this.assertOpen("finalize");
    this.finalized = true;

    const durationSec = durationMs / 1000;
    const { counts } = this.global;
    const servers: ServerMetrics[] = [...this.servers.entries()]
      .sort(([a], [b]) => a - b)
      .map(([serverId, acc]) => ({
        serverId,
        requests: { ...acc.counts },
        responseTime: acc.responseTime.toStats(),
        queueWait: acc.queueWait.toStats(),
        percentiles: acc.percentiles.percentiles(),
        avgUtilization: acc.utilization.average,
        maxUtilization: acc.utilization.peak,
        maxQueueDepth: acc.maxQueueDepth,
      }));

    return Object.freeze({
      scenario,
      durationMs,
      requests: { ...counts },
      truncated,
      responseTime: this.global.responseTime.toStats(),
      queueWait: this.global.queueWait.toStats(),
      percentiles: this.global.percentiles.percentiles(),
      percentilesExact: this.global.percentiles.exact,
      successfulThroughputRps: durationSec > 0 ? counts.success / durationSec : 0,
      totalThroughputRps: durationSec > 0 ? counts.total / durationSec : 0,
      successRate: counts.total > 0 ? counts.success / counts.total : 0,
      avgUtilization: this.global.utilization.average,
      maxUtilization: this.global.utilization.peak,
      maxQueueDepth: this.global.maxQueueDepth,
      servers,
    });
  }

  private accumulatorFor(serverId: number) {
    let acc = this.servers.get(serverId);
    if (!acc) {
      acc = createAccumulator(this.capacity, this.rng.fork(`server-${serverId}`));
      this.servers.set(serverId, acc);
    }
    return acc;
  }

  private assertOpen(operation: string) {
    if (this.finalized) {
      throw new InvariantViolationError(`${operation} called after finalize`);
    }
  }
}
