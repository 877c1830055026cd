import { invariant } from "./errors";
import { estimateServiceTimeMs } from "./profiles";
import { SeededRng, sampleLogNormal, sampleNormal } from "./random";
import type { Scheduler } from "./scheduler";
import type {
  DegradationModel,
  HardwareProfile,
  LanguageProfile,
  ProcessingTimeDistribution,
  Request,
  ServerView,
} from "./types";

export type ServerConfig = {
  id: number;
  hardware: HardwareProfile;
  language: LanguageProfile;
  workerSlots: number;
  weight: number;
  processingTimeMs: number;
  processingTimeStddevMs: number;
  processingTimeDistribution: ProcessingTimeDistribution;
  minServiceTimeMs: number;
  networkLatencyMeanMs: number;
  networkLatencyStddevMs: number;
  requestTimeoutMs: number | null;
  degradation: DegradationModel;
  utilizationDecay: number;
};

export type ServerState = {
  readonly config: ServerConfig;
  readonly rng: SeededRng;
  inflight: Request[];
  queue: Request[];
  utilization: number;
  ewmaResponseMs: number;
  completed: number;
};

export type ServerContext = {
  scheduler: Scheduler;
  /** Called exactly once per request when it reaches a terminal outcome. */
  onTerminal: (request: Request, server: ServerState) => void;
  onQueueChange?: (server: ServerState) => void;
};

const RESPONSE_EWMA_ALPHA = 0.2;

export const createServer = (config: ServerConfig, rng: SeededRng): ServerState => ({
  config,
  rng,
  inflight: [],
  queue: [],
  utilization: 0,
  ewmaResponseMs: 0,
  completed: 0,
});

export const toServerView = (server: ServerState): ServerView => ({
  id: server.config.id,
  inflight: server.inflight.length,
  queued: server.queue.length,
  workerSlots: server.config.workerSlots,
  utilization: server.utilization,
  avgResponseTimeMs: server.ewmaResponseMs,
  completed: server.completed,
  weight: server.config.weight,
});

/**
 * Contention slowdown. 1 up to the threshold, then `exp(gain * excess)`
 * where excess runs 0..1 across the remaining headroom.
 */
export const degradationFactor = (model: DegradationModel, utilization: number) => {
  if (!model.enabled || model.threshold >= 1 || utilization <= model.threshold) {
    return 1;
  }
  const excess = (Math.min(1, utilization) - model.threshold) / (1 - model.threshold);
  return Math.exp(model.gain * excess);
};

const rawUtilization = (server: ServerState) =>
  Math.min(1, server.inflight.length / server.config.workerSlots);

const refreshUtilization = (server: ServerState) => {
  const decay = server.config.utilizationDecay;
  server.utilization = decay * server.utilization + (1 - decay) * rawUtilization(server);
};

type ServiceSample = {
  serviceTimeMs: number;
  clamped: boolean;
};

export const sampleServiceTime = (server: ServerState): ServiceSample => {
  const { config } = server;
  const meanMs = estimateServiceTimeMs(config.hardware, config.language, config.processingTimeMs);
  const sampled =
    config.processingTimeDistribution === "lognormal"
      ? sampleLogNormal(server.rng, meanMs, config.processingTimeStddevMs)
      : sampleNormal(server.rng, meanMs, config.processingTimeStddevMs);
  // a negative draw is clamped and reported as an error outcome
  const clamped = sampled < 0;
  const floored = Math.max(config.minServiceTimeMs, sampled);
  const utilizationBefore = rawUtilization(server);
  return {
    serviceTimeMs: floored * degradationFactor(config.degradation, utilizationBefore),
    clamped,
  };
};

const sampleNetworkLatency = (server: ServerState) => {
  const { networkLatencyMeanMs, networkLatencyStddevMs } = server.config;
  if (networkLatencyMeanMs <= 0) return 0;
  return Math.max(0, sampleNormal(server.rng, networkLatencyMeanMs, networkLatencyStddevMs));
};

const grantSlot = (server: ServerState, request: Request, ctx: ServerContext) => {
  invariant(
    server.inflight.length < server.config.workerSlots,
    `server ${server.config.id} is over capacity`
  );
  const nowMs = ctx.scheduler.nowMs;
  const sample = sampleServiceTime(server);
  const latencyMs = sampleNetworkLatency(server);

  request.phase = "active";
  request.dispatchTimeMs = nowMs;
  request.serviceTimeMs = sample.serviceTimeMs;
  request.clamped = sample.clamped;
  request.networkLatencyMs = latencyMs;
  server.inflight.push(request);
  refreshUtilization(server);

  ctx.scheduler.schedule({ timeMs: nowMs + latencyMs, kind: "service-start", request });
};

const promoteNext = (server: ServerState, ctx: ServerContext) => {
  while (server.queue.length && server.inflight.length < server.config.workerSlots) {
    const next = server.queue.shift();
    if (!next) break;
    grantSlot(server, next, ctx);
  }
  ctx.onQueueChange?.(server);
};

const releaseSlot = (server: ServerState, request: Request) => {
  const index = server.inflight.indexOf(request);
  invariant(index >= 0, `request ${request.id} is not in flight on server ${server.config.id}`);
  server.inflight.splice(index, 1);
  refreshUtilization(server);
};

// fed by every terminal request, timed-out ones included
const recordResponse = (server: ServerState, responseMs: number) => {
  server.ewmaResponseMs =
    server.completed === 0
      ? responseMs
      : RESPONSE_EWMA_ALPHA * responseMs + (1 - RESPONSE_EWMA_ALPHA) * server.ewmaResponseMs;
  server.completed += 1;
};

/** Hands a freshly routed request to the server. */
export const admitRequest = (server: ServerState, request: Request, ctx: ServerContext) => {
  invariant(request.phase === "arrived", `request ${request.id} admitted twice`);
  const nowMs = ctx.scheduler.nowMs;
  request.serverId = server.config.id;
  request.enqueueTimeMs = nowMs;

  if (server.config.requestTimeoutMs !== null) {
    ctx.scheduler.schedule({
      timeMs: nowMs + server.config.requestTimeoutMs,
      kind: "timeout",
      request,
    });
  }

  if (server.inflight.length < server.config.workerSlots) {
    grantSlot(server, request, ctx);
    return;
  }
  request.phase = "queued";
  server.queue.push(request);
  ctx.onQueueChange?.(server);
};

export const handleServiceStart = (request: Request, ctx: ServerContext) => {
  if (request.outcome !== "pending") return;
  invariant(request.phase === "active", `request ${request.id} started while ${request.phase}`);
  const nowMs = ctx.scheduler.nowMs;
  request.serviceStartTimeMs = nowMs;
  ctx.scheduler.schedule({
    timeMs: nowMs + (request.serviceTimeMs ?? 0),
    kind: "service-complete",
    request,
  });
};

export const handleServiceComplete = (
  server: ServerState,
  request: Request,
  ctx: ServerContext
) => {
  if (request.outcome !== "pending") return;
  const nowMs = ctx.scheduler.nowMs;
  request.outcome = request.clamped ? "error" : "success";
  request.phase = "done";
  request.completionTimeMs = nowMs;
  releaseSlot(server, request);

  recordResponse(server, nowMs - request.arrivalTimeMs);

  ctx.onTerminal(request, server);
  promoteNext(server, ctx);
};

export const handleTimeout = (server: ServerState, request: Request, ctx: ServerContext) => {
  if (request.outcome !== "pending") return;
  const nowMs = ctx.scheduler.nowMs;
  const wasActive = request.phase === "active";
  request.outcome = "timed-out";
  request.completionTimeMs = nowMs;

  if (wasActive) {
    releaseSlot(server, request);
  } else {
    const index = server.queue.indexOf(request);
    invariant(index >= 0, `timed-out request ${request.id} missing from queue`);
    server.queue.splice(index, 1);
  }
  request.phase = "done";
  recordResponse(server, nowMs - request.arrivalTimeMs);

  ctx.onTerminal(request, server);
  promoteNext(server, ctx);
};
