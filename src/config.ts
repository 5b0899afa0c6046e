import { DEFAULT_REGION } from "./common/types.ts";
import type { FanoutInitConfig } from "./initConfig.ts";
import { DEFAULT_DELIVERY_CONCURRENCY, DEFAULT_DELIVERY_TIMEOUT_MS } from "./sns/dispatcher.ts";

const DEFAULT_PORT = 4566;

export interface FanoutOptions {
  port?: number;
  logger?: boolean;
  host?: string;
  /** Used when a request's Authorization header names no region. */
  defaultRegion?: string;
  deliveryTimeoutMs?: number;
  deliveryConcurrency?: number;
  /** Init config object, or the path of a JSON file holding one. */
  init?: FanoutInitConfig | string;
}

export interface ResolvedFanoutConfig {
  port: number;
  logger: boolean;
  host: string;
  defaultRegion: string;
  deliveryTimeoutMs: number;
  deliveryConcurrency: number;
  init?: FanoutInitConfig | string;
}

/**
 * Explicit options win over `FANOUT_*` environment variables, which win over defaults.
 */
export function resolveConfig(
  options: FanoutOptions = {},
  env: NodeJS.ProcessEnv = process.env,
): ResolvedFanoutConfig {
  return {
    port: options.port ?? intFromEnv(env, "FANOUT_PORT") ?? DEFAULT_PORT,
    logger: options.logger ?? env.FANOUT_LOGGER !== "false",
    host: options.host ?? "127.0.0.1",
    defaultRegion: options.defaultRegion ?? env.FANOUT_DEFAULT_REGION ?? DEFAULT_REGION,
    deliveryTimeoutMs:
      options.deliveryTimeoutMs ??
      intFromEnv(env, "FANOUT_DELIVERY_TIMEOUT_MS") ??
      DEFAULT_DELIVERY_TIMEOUT_MS,
    deliveryConcurrency:
      options.deliveryConcurrency ??
      intFromEnv(env, "FANOUT_DELIVERY_CONCURRENCY") ??
      DEFAULT_DELIVERY_CONCURRENCY,
    init: options.init ?? env.FANOUT_INIT,
  };
}

function intFromEnv(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw === "") return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new Error(`${name} must be a non-negative integer, got "${raw}"`);
  }
  return value;
}
