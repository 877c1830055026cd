import { describe, it, expect } from "@jest/globals";

import { InvariantViolationError } from "../errors";
import { MetricsCollector, PercentileEstimator, RunningStats } from "../metrics";
import { SeededRng } from "../random";
import type { Request, TerminalOutcome } from "../types";
import { makeRequest } from "./fixtures";

const finished = (
  id: number,
  serverId: number,
  outcome: TerminalOutcome,
  times: { arrival: number; dispatch?: number; completion: number }
): Request => ({
  ...makeRequest(id, times.arrival),
  serverId,
  enqueueTimeMs: times.arrival,
  dispatchTimeMs: times.dispatch,
  completionTimeMs: times.completion,
  phase: "done",
  outcome,
});

describe("RunningStats", () => {
  it("tracks mean, extremes and sample deviation", () => {
    const stats = new RunningStats();
    [2, 4, 4, 4, 5, 5, 7, 9].forEach((value) => stats.push(value));
    const summary = stats.toStats();
    expect(summary.count).toBe(8);
    expect(summary.avgMs).toBeCloseTo(5);
    expect(summary.minMs).toBe(2);
    expect(summary.maxMs).toBe(9);
    expect(summary.stddevMs).toBeCloseTo(Math.sqrt(32 / 7));
  });

  it("reports zeros when empty", () => {
    expect(new RunningStats().toStats()).toEqual({
      count: 0,
      avgMs: 0,
      minMs: 0,
      maxMs: 0,
      stddevMs: 0,
    });
  });
});

describe("PercentileEstimator", () => {
  it("interpolates between closest ranks", () => {
    const estimator = new PercentileEstimator();
    for (let value = 100; value >= 1; value -= 1) {
      estimator.push(value);
    }
    const { p50, p95, p99, p999 } = estimator.percentiles();
    expect(p50).toBeCloseTo(50.5);
    expect(p95).toBeCloseTo(95.05);
    expect(p99).toBeCloseTo(99.01);
    expect(p999).toBeCloseTo(99.901);
    expect(estimator.exact).toBe(true);
  });

  it("keeps a bounded reservoir past its capacity", () => {
    const estimator = new PercentileEstimator(50, new SeededRng(3));
    for (let value = 0; value < 10_000; value += 1) {
      estimator.push(value);
    }
    expect(estimator.count).toBe(10_000);
    expect(estimator.exact).toBe(false);
    const median = estimator.quantile(0.5);
    expect(median).toBeGreaterThan(2000);
    expect(median).toBeLessThan(8000);
  });

  it("returns 0 without samples", () => {
    expect(new PercentileEstimator().quantile(0.99)).toBe(0);
  });
});

describe("MetricsCollector", () => {
  const observeThree = (collector: MetricsCollector) => {
    collector.observe(finished(1, 0, "success", { arrival: 0, dispatch: 0, completion: 100 }));
    collector.observe(finished(2, 1, "timed-out", { arrival: 0, completion: 300 }));
    collector.observe(finished(3, 0, "error", { arrival: 100, dispatch: 150, completion: 250 }));
  };

  it("aggregates outcomes, latencies and throughput", () => {
    const collector = new MetricsCollector();
    collector.registerServer(1);
    collector.registerServer(0);
    observeThree(collector);

    const snapshot = collector.finalize("unit", 2000);
    expect(snapshot.scenario).toBe("unit");
    expect(snapshot.requests).toEqual({ total: 3, success: 1, timedOut: 1, error: 1 });
    expect(snapshot.responseTime.avgMs).toBeCloseTo(550 / 3);
    expect(snapshot.responseTime.minMs).toBe(100);
    expect(snapshot.responseTime.maxMs).toBe(300);
    expect(snapshot.queueWait.avgMs).toBeCloseTo(350 / 3);
    expect(snapshot.queueWait.maxMs).toBe(300);
    expect(snapshot.successfulThroughputRps).toBe(0.5);
    expect(snapshot.totalThroughputRps).toBe(1.5);
    expect(snapshot.successRate).toBeCloseTo(1 / 3);
    expect(snapshot.truncated).toBe(0);
    expect(snapshot.servers.map((server) => server.serverId)).toEqual([0, 1]);
    expect(snapshot.servers[0].requests).toEqual({ total: 2, success: 1, timedOut: 0, error: 1 });
    expect(snapshot.servers[1].responseTime.avgMs).toBe(300);
  });

  it("rejects pending and repeated observations", () => {
    const collector = new MetricsCollector();
    const pending = { ...makeRequest(1), serverId: 0, enqueueTimeMs: 0 };
    expect(() => collector.observe(pending)).toThrow(InvariantViolationError);

    const done = finished(2, 0, "success", { arrival: 0, dispatch: 0, completion: 10 });
    collector.observe(done);
    expect(done.recorded).toBe(true);
    expect(() => collector.observe(done)).toThrow("request 2 observed twice");
    expect(collector.observed).toBe(1);
  });

  it("rejects a request that never reached a server", () => {
    const collector = new MetricsCollector();
    const orphan: Request = { ...makeRequest(1), outcome: "error", phase: "done" };
    expect(() => collector.observe(orphan)).toThrow("request 1 finished without a server");
  });

  it("is closed after finalize", () => {
    const collector = new MetricsCollector();
    collector.finalize("unit", 1000);
    expect(() =>
      collector.observe(finished(1, 0, "success", { arrival: 0, dispatch: 0, completion: 1 }))
    ).toThrow("observe called after finalize");
    expect(() => collector.finalize("unit", 1000)).toThrow(InvariantViolationError);
  });

  it("summarizes utilization samples and queue depth", () => {
    const collector = new MetricsCollector();
    collector.sampleUtilization(0, 0.2);
    collector.sampleUtilization(0, 0.6);
    collector.sampleUtilization(1, 1);
    collector.recordQueueDepth(0, 3);
    collector.recordQueueDepth(1, 5);
    collector.recordQueueDepth(0, 1);

    const snapshot = collector.finalize("unit", 1000);
    expect(snapshot.avgUtilization).toBeCloseTo(0.6);
    expect(snapshot.maxUtilization).toBe(1);
    expect(snapshot.maxQueueDepth).toBe(5);
    expect(snapshot.servers[0].avgUtilization).toBeCloseTo(0.4);
    expect(snapshot.servers[0].maxQueueDepth).toBe(3);
  });

  it("passes the truncated count through and guards zero durations", () => {
    const collector = new MetricsCollector();
    observeThree(collector);
    const snapshot = collector.finalize("unit", 0, 4);
    expect(snapshot.truncated).toBe(4);
    expect(snapshot.successfulThroughputRps).toBe(0);
    expect(snapshot.totalThroughputRps).toBe(0);
  });
});
