import { createLogger, getLogLevel } from "../logger";
import { getAlgorithm } from "./algorithms";
import { ConfigurationError, invariant } from "./errors";
import { MetricsCollector } from "./metrics";
import { SeededRng } from "./random";
import { Scheduler } from "./scheduler";
import {
  admitRequest,
  createServer,
  handleServiceComplete,
  handleServiceStart,
  handleTimeout,
  toServerView,
  type ServerContext,
  type ServerState,
} from "./server";
import type { MetricsSnapshot, Request, ScenarioParameters, SimEvent } from "./types";
import { createTrafficGenerator, getWorkload } from "./workloads";

const log = createLogger("simulator");

export const DEFAULT_PROGRESS_INTERVAL_MS = 1000;
export const DEFAULT_SAMPLE_INTERVAL_MS = 1000;

export type ProgressCallback = (timeMs: number, durationMs: number) => void;

export type RunOptions = {
  /** Observational only; invoked at most once per `progressIntervalMs` of simulated time. */
  onProgress?: ProgressCallback;
  progressIntervalMs?: number;
  /** Spacing of the utilization samples taken across the run. */
  sampleIntervalMs?: number;
  percentileCapacity?: number;
};

const isNonNegative = (value: number) => Number.isFinite(value) && value >= 0;
const isPositive = (value: number) => Number.isFinite(value) && value > 0;

/** Collects every contract violation in the parameters instead of stopping at the first. */
export const validateParameters = (params: ScenarioParameters): string[] => {
  const issues: string[] = [];
  const check = (ok: boolean, message: string) => {
    if (!ok) issues.push(message);
  };

  check(params.name.trim().length > 0, "Scenario name must be a non-empty string");
  check(isNonNegative(params.durationMs), `Duration must be >= 0ms (got ${params.durationMs})`);
  check(
    Number.isInteger(params.serverCount) && params.serverCount >= 1,
    `Must have at least 1 server (got ${params.serverCount})`
  );
  check(
    Number.isInteger(params.workerSlots) && params.workerSlots >= 1,
    `Worker slots must be an integer >= 1 (got ${params.workerSlots})`
  );
  check(
    isPositive(params.processingTimeMs),
    `Request processing time must be positive (got ${params.processingTimeMs}ms)`
  );
  check(isNonNegative(params.processingTimeStddevMs), "Processing time stddev must be >= 0");
  check(isNonNegative(params.minServiceTimeMs), "Minimum service time must be >= 0");
  check(isNonNegative(params.networkLatencyMeanMs), "Network latency mean must be >= 0");
  check(isNonNegative(params.networkLatencyStddevMs), "Network latency stddev must be >= 0");
  check(
    params.requestTimeoutMs === null || isPositive(params.requestTimeoutMs),
    `Request timeout must be positive (got ${params.requestTimeoutMs}ms)`
  );
  check(
    params.degradation.threshold >= 0 && params.degradation.threshold <= 1,
    "Degradation threshold must be within [0, 1]"
  );
  check(isNonNegative(params.degradation.gain), "Degradation gain must be >= 0");
  check(
    params.utilizationDecay >= 0 && params.utilizationDecay < 1,
    "Utilization decay must be within [0, 1)"
  );
  check(Number.isInteger(params.seed), `Random seed must be an integer (got ${params.seed})`);
  check(isPositive(params.timeScale), `Time scale must be positive (got ${params.timeScale})`);
  check(isPositive(params.hardware.processingPower), "Hardware processing power must be positive");
  check(isPositive(params.language.efficiencyFactor), "Language efficiency factor must be positive");
  check(params.weights.every(isPositive), "Server weights must be positive");

  const traffic = params.traffic;
  switch (traffic.id) {
    case "poisson":
    case "constant":
      check(isNonNegative(traffic.rateRps), `Request rate cannot be negative (got ${traffic.rateRps})`);
      break;
    case "periodic":
      check(isNonNegative(traffic.rateRps), `Request rate cannot be negative (got ${traffic.rateRps})`);
      check(isPositive(traffic.periodSec), "Periodic traffic needs a positive period");
      break;
    case "wave":
      check(isNonNegative(traffic.rateRps), `Request rate cannot be negative (got ${traffic.rateRps})`);
      check(isPositive(traffic.wavePeriodSec), "Wave traffic needs a positive wave period");
      break;
    case "bursty":
      check(isNonNegative(traffic.burstSizeMean), "Burst size mean must be >= 0");
      check(isPositive(traffic.burstIntervalSec), "Burst interval must be positive");
      check(isNonNegative(traffic.intraBurstGapMs), "Intra-burst gap must be >= 0");
      break;
    case "exponential-burst":
      check(isNonNegative(traffic.burstRate), "Burst rate must be >= 0");
      check(isNonNegative(traffic.meanBurstSize), "Mean burst size must be >= 0");
      check(isNonNegative(traffic.intraBurstGapMs), "Intra-burst gap must be >= 0");
      break;
  }

  params.spikes.forEach((spike, index) => {
    check(
      isNonNegative(spike.startSec) &&
        isNonNegative(spike.durationSec) &&
        isNonNegative(spike.intensityMultiplier),
      `Spike ${index} must have non-negative start, duration and multiplier`
    );
  });

  return issues;
};

/**
 * Runs one scenario to completion and returns its finalized metrics.
 *
 * Arrivals are generated for `[0, durationMs)`. With `drain` set, the run
 * continues past the duration until every admitted request has finished;
 * otherwise it stops at `durationMs` and unfinished requests are reported
 * as `truncated` and left out of every other figure.
 *
 * `timeScale` never reaches the engine: pacing against the wall clock is
 * the caller's business and cannot change the result.
 */
export const runSimulation = (
  params: ScenarioParameters,
  options: RunOptions = {}
): MetricsSnapshot => {
  const issues = validateParameters(params);
  if (issues.length) {
    throw new ConfigurationError(issues);
  }
  const algorithm = getAlgorithm(params.algorithmId);
  // unknown patterns fail here, before any server is built
  getWorkload(params.traffic.id);

  const durationMs = params.durationMs;
  const rng = new SeededRng(params.seed);
  const balancerRng = rng.fork("balancer");
  const scheduler = new Scheduler();
  const collector = new MetricsCollector({
    rng: rng.fork("metrics"),
    percentileCapacity: options.percentileCapacity,
  });
  const generator = createTrafficGenerator(params.traffic, rng.fork("traffic"), {
    spikes: params.spikes,
    horizonMs: durationMs,
  });

  const servers: ServerState[] = Array.from({ length: params.serverCount }, (_, id) =>
    createServer(
      {
        id,
        hardware: params.hardware,
        language: params.language,
        workerSlots: params.workerSlots,
        weight: params.weights[id] ?? 1,
        processingTimeMs: params.processingTimeMs,
        processingTimeStddevMs: params.processingTimeStddevMs,
        processingTimeDistribution: params.processingTimeDistribution,
        minServiceTimeMs: params.minServiceTimeMs,
        networkLatencyMeanMs: params.networkLatencyMeanMs,
        networkLatencyStddevMs: params.networkLatencyStddevMs,
        requestTimeoutMs: params.requestTimeoutMs,
        degradation: params.degradation,
        utilizationDecay: params.utilizationDecay,
      },
      rng.fork(`server-${id}`)
    )
  );
  for (const server of servers) {
    collector.registerServer(server.config.id);
  }

  const ctx: ServerContext = {
    scheduler,
    onTerminal: (request) => collector.observe(request),
    onQueueChange: (server) => collector.recordQueueDepth(server.config.id, server.queue.length),
  };

  const traceRouting = getLogLevel() === "debug";
  let rrIndex = 0;
  let nextRequestId = 1;
  let emitted = 0;

  const scheduleNextArrival = (fromMs: number) => {
    const arrivalMs = fromMs + generator.next(fromMs);
    if (!Number.isFinite(arrivalMs) || arrivalMs >= durationMs) return;
    const request: Request = {
      id: nextRequestId++,
      arrivalTimeMs: arrivalMs,
      serverId: null,
      clamped: false,
      recorded: false,
      phase: "arrived",
      outcome: "pending",
    };
    scheduler.schedule({ timeMs: arrivalMs, kind: "arrival", request });
  };

  const serverFor = (event: SimEvent) => {
    const { serverId } = event.request;
    invariant(serverId !== null, `${event.kind} for unrouted request ${event.request.id}`);
    const server = servers[serverId];
    invariant(server, `${event.kind} for unknown server ${serverId}`);
    return server;
  };

  scheduler.on("arrival", ({ request }) => {
    invariant(request.serverId === null, `request ${request.id} dispatched twice`);
    emitted += 1;
    const selection = algorithm.select({
      servers: servers.map(toServerView),
      rrIndex,
      rng: balancerRng,
    });
    if (selection.rrIndex !== undefined) {
      rrIndex = selection.rrIndex;
    }
    if (traceRouting) {
      log.debug(`request ${request.id} at ${request.arrivalTimeMs.toFixed(3)}ms: ${selection.reason}`);
    }
    const server = servers[selection.serverId];
    invariant(server, `balancer picked unknown server ${selection.serverId}`);
    admitRequest(server, request, ctx);
    scheduleNextArrival(scheduler.nowMs);
  });
  scheduler.on("service-start", (event) => handleServiceStart(event.request, ctx));
  scheduler.on("service-complete", (event) =>
    handleServiceComplete(serverFor(event), event.request, ctx)
  );
  scheduler.on("timeout", (event) => handleTimeout(serverFor(event), event.request, ctx));

  const sampleIntervalMs = options.sampleIntervalMs ?? DEFAULT_SAMPLE_INTERVAL_MS;
  const progressIntervalMs = options.progressIntervalMs ?? DEFAULT_PROGRESS_INTERVAL_MS;
  let nextSampleMs = sampleIntervalMs;
  let nextProgressMs = progressIntervalMs;

  const takeSamples = (uptoMs: number) => {
    while (sampleIntervalMs > 0 && nextSampleMs <= uptoMs && nextSampleMs <= durationMs) {
      for (const server of servers) {
        collector.sampleUtilization(server.config.id, server.utilization);
      }
      nextSampleMs += sampleIntervalMs;
    }
  };

  const reportProgress = (timeMs: number) => {
    if (!options.onProgress) return;
    try {
      options.onProgress(timeMs, durationMs);
    } catch (error) {
      log.warn(`progress callback failed at ${timeMs.toFixed(1)}ms`, error);
    }
  };

  log.info(
    `running "${params.name}": ${params.serverCount} server(s), ${params.traffic.id} traffic, ${algorithm.id}`
  );

  scheduleNextArrival(0);
  scheduler.run(params.drain ? Infinity : durationMs, {
    onAdvance: (_fromMs, toMs) => {
      takeSamples(toMs);
      if (progressIntervalMs > 0 && toMs >= nextProgressMs && toMs < durationMs) {
        reportProgress(toMs);
        nextProgressMs = (Math.floor(toMs / progressIntervalMs) + 1) * progressIntervalMs;
      }
    },
  });
  takeSamples(durationMs);
  reportProgress(durationMs);

  const truncated = emitted - collector.observed;
  if (params.drain) {
    invariant(truncated === 0, `${truncated} request(s) left unfinished after draining`);
  }

  const snapshot = collector.finalize(params.name, durationMs, truncated);
  log.info(
    `finished "${params.name}": ${snapshot.requests.total} requests, ${snapshot.requests.success} ok, ` +
      `${snapshot.requests.timedOut} timed out, ${snapshot.requests.error} errors`
  );
  return snapshot;
};
