import { ConfigurationError } from "./errors";
import type { SeededRng } from "./random";
import type { AlgorithmId, ServerView } from "./types";

type SelectResult = {
  serverId: number;
  reason: string;
  rrIndex?: number;
};

export type SelectArgs = {
  servers: readonly ServerView[];
  rrIndex: number;
  rng: SeededRng;
};

export type Algorithm = {
  id: AlgorithmId;
  name: string;
  description: string;
  select: (args: SelectArgs) => SelectResult;
};

export const CPU_AWARE_UTILIZATION_WEIGHT = 0.7;
export const CPU_AWARE_QUEUE_WEIGHT = 0.3;

const requireServers = (servers: readonly ServerView[]) => {
  if (servers.length === 0) {
    throw new ConfigurationError("load balancer needs at least one server");
  }
  return servers;
};

/** Lowest score wins; equal scores go to the lowest server id. */
const pickMin = (
  servers: readonly ServerView[],
  score: (server: ServerView) => number
) => {
  let chosen = servers[0];
  let best = score(chosen);
  for (const server of servers) {
    const value = score(server);
    if (value < best || (value === best && server.id < chosen.id)) {
      chosen = server;
      best = value;
    }
  }
  return { chosen, best };
};

const turnsFor = (server: ServerView) => Math.max(1, Math.round(server.weight));

export const algorithms: Algorithm[] = [
  {
    id: "round-robin",
    name: "Round Robin",
    description: "Cycles through servers in order.",
    select: ({ servers, rrIndex }) => {
      const candidates = requireServers(servers);
      const index = rrIndex % candidates.length;
      const serverId = candidates[index].id;
      return {
        serverId,
        rrIndex: rrIndex + 1,
        reason: `round robin index ${rrIndex} -> ${serverId}`,
      };
    },
  },
  {
    id: "weighted-round-robin",
    name: "Weighted Round Robin",
    description: "Each server takes `weight` consecutive turns per cycle.",
    select: ({ servers, rrIndex }) => {
      const candidates = requireServers(servers);
      const totalWeight = candidates.reduce((sum, server) => sum + turnsFor(server), 0);
      const slot = rrIndex % totalWeight;
      let cursor = 0;
      let chosen = candidates[0];
      for (const server of candidates) {
        cursor += turnsFor(server);
        if (slot < cursor) {
          chosen = server;
          break;
        }
      }
      return {
        serverId: chosen.id,
        rrIndex: rrIndex + 1,
        reason: `weighted round robin -> ${chosen.id} (slot ${slot}/${totalWeight})`,
      };
    },
  },
  {
    id: "least-connections",
    name: "Least Connections",
    description: "Chooses the server with the fewest in-flight plus queued requests.",
    select: ({ servers }) => {
      const { chosen, best } = pickMin(
        requireServers(servers),
        (server) => server.inflight + server.queued
      );
      return {
        serverId: chosen.id,
        reason: `least connections picked ${chosen.id} (${best} open)`,
      };
    },
  },
  {
    id: "least-response-time",
    name: "Least Response Time",
    description: "Chooses the lowest rolling response time; idle servers count as 0.",
    select: ({ servers }) => {
      const { chosen, best } = pickMin(requireServers(servers), (server) =>
        server.completed === 0 ? 0 : server.avgResponseTimeMs
      );
      return {
        serverId: chosen.id,
        reason: `least response time picked ${chosen.id} (${Math.round(best)}ms)`,
      };
    },
  },
  {
    id: "random",
    name: "Random",
    description: "Uniform pick from the run's seeded stream.",
    select: ({ servers, rng }) => {
      const candidates = requireServers(servers);
      const chosen = candidates[rng.nextInt(0, candidates.length - 1)];
      return { serverId: chosen.id, reason: `random picked ${chosen.id}` };
    },
  },
  {
    id: "cpu-aware",
    name: "CPU Aware",
    description: "Blends utilization with queue length relative to the longest queue.",
    select: ({ servers }) => {
      const candidates = requireServers(servers);
      const longest = Math.max(...candidates.map((server) => server.queued));
      const { chosen, best } = pickMin(candidates, (server) => {
        const queueShare = longest > 0 ? server.queued / longest : 0;
        return (
          server.utilization * CPU_AWARE_UTILIZATION_WEIGHT +
          queueShare * CPU_AWARE_QUEUE_WEIGHT
        );
      });
      return {
        serverId: chosen.id,
        reason: `cpu aware picked ${chosen.id} (score ${best.toFixed(3)})`,
      };
    },
  },
];

export const getAlgorithm = (id: AlgorithmId) => {
  const algorithm = algorithms.find((algo) => algo.id === id);
  if (!algorithm) {
    throw new ConfigurationError(`Unknown load balancing strategy: ${id}`);
  }
  return algorithm;
};
