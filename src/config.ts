// src/config.ts

import { InvalidConfigError } from "./errors";
import { InMemoryNetworkOptions } from "./in_memory_network";
import { isLogLevel, LogLevel } from "./logger";

/**
 * Canvas and simulation settings for the force-directed layout.
 */
export interface LayoutConfig {
  /** Canvas width in px. Default: 1200 */
  width: number;
  /** Canvas height in px. Default: 800 */
  height: number;
  /** Simulation steps per cluster. Default: 200 */
  iterations: number;
  /** Grid columns used for the non-largest clusters. Default: 4 */
  isolatedColumns: number;
}

/**
 * Configuration for a simulated gossip network.
 */
export interface GossipNetConfig {
  /** Host part of every node address. Default: "127.0.0.1" */
  host: string;

  /** Node `i` listens on `basePort + i`. Default: 8000 */
  basePort: number;

  /** Hop budget given to freshly originated messages. Default: 20 */
  maxTtl: number;

  /** Outstanding fan-out sends tracked per node. Default: 1024 */
  maxPendingTasks: number;

  layout: LayoutConfig;
}

export const DEFAULT_LAYOUT_CONFIG: LayoutConfig = {
  width: 1200,
  height: 800,
  iterations: 200,
  isolatedColumns: 4,
};

/**
 * Default network configuration.
 */
export const DEFAULT_GOSSIP_NET_CONFIG: GossipNetConfig = {
  host: "127.0.0.1",
  basePort: 8000,
  maxTtl: 20,
  maxPendingTasks: 1024,
  layout: DEFAULT_LAYOUT_CONFIG,
};

export type GossipNetOptions = Partial<Omit<GossipNetConfig, "layout">> & {
  layout?: Partial<LayoutConfig>;
};

function requireInteger(key: string, value: number, min: number): void {
  if (!Number.isInteger(value) || value < min) {
    throw new InvalidConfigError(key, value, `an integer >= ${min}`);
  }
}

/**
 * Merges options over the defaults and validates the result.
 */
export function resolveConfig(options: GossipNetOptions = {}): GossipNetConfig {
  const config: GossipNetConfig = {
    ...DEFAULT_GOSSIP_NET_CONFIG,
    ...options,
    layout: { ...DEFAULT_LAYOUT_CONFIG, ...options.layout },
  };

  if (config.host.length === 0) {
    throw new InvalidConfigError("host", config.host, "a non-empty string");
  }
  requireInteger("basePort", config.basePort, 0);
  if (config.basePort > 65535) {
    throw new InvalidConfigError("basePort", config.basePort, "a port <= 65535");
  }
  requireInteger("maxTtl", config.maxTtl, 0);
  requireInteger("maxPendingTasks", config.maxPendingTasks, 1);
  requireInteger("layout.width", config.layout.width, 200);
  requireInteger("layout.height", config.layout.height, 100);
  requireInteger("layout.iterations", config.layout.iterations, 0);
  requireInteger("layout.isolatedColumns", config.layout.isolatedColumns, 1);

  return config;
}

export interface EnvConfig {
  logLevel?: LogLevel;
  options: GossipNetOptions;
  network: InMemoryNetworkOptions;
}

function readInt(
  env: NodeJS.ProcessEnv,
  name: string,
): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw === "") {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new InvalidConfigError(name, raw, "an integer");
  }
  return value;
}

/**
 * Reads GOSSIPNET_* variables. Unset variables leave the defaults in place.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const options: GossipNetOptions = {};

  const maxTtl = readInt(env, "GOSSIPNET_MAX_TTL");
  if (maxTtl !== undefined) options.maxTtl = maxTtl;

  const network: InMemoryNetworkOptions = {};
  const queueCapacity = readInt(env, "GOSSIPNET_QUEUE_CAPACITY");
  if (queueCapacity !== undefined) network.queueCapacity = queueCapacity;

  const basePort = readInt(env, "GOSSIPNET_BASE_PORT");
  if (basePort !== undefined) options.basePort = basePort;

  const level = env.GOSSIPNET_LOG_LEVEL;
  if (level !== undefined && level !== "" && !isLogLevel(level)) {
    throw new InvalidConfigError("GOSSIPNET_LOG_LEVEL", level, "debug|info|warn|error|none");
  }

  return {
    logLevel: level !== undefined && level !== "" && isLogLevel(level) ? level : undefined,
    options,
    network,
  };
}
