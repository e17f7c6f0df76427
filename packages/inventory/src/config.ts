import { availableParallelism } from "node:os";

import type { InventoryConfig, LogLevel } from "./types";

export interface ConfigOverrides {
  profile?: string;
  region?: string;
  endpointUrl?: string;
}

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

function readInt(name: string, fallback: number): number {
  const raw = process.env[name];

  if (!raw) {
    return fallback;
  }

  const parsed = Number.parseInt(raw, 10);
  if (Number.isNaN(parsed)) {
    throw new Error(`Invalid integer for ${name}: ${raw}`);
  }

  return parsed;
}

function readOptional(name: string): string | undefined {
  const raw = process.env[name]?.trim();
  return raw ? raw : undefined;
}

function readLogLevel(): LogLevel {
  const raw = process.env.LOG_LEVEL?.trim().toLowerCase();
  const match = LOG_LEVELS.find((level) => level === raw);
  return match ?? "info";
}

// CPU count plus headroom for I/O-bound calls, capped at 32.
export function defaultFetchConcurrency(): number {
  return Math.min(32, availableParallelism() + 4);
}

export function loadConfig(overrides: ConfigOverrides = {}): InventoryConfig {
  return {
    profile: overrides.profile ?? readOptional("AWS_PROFILE"),
    region: overrides.region ?? readOptional("AWS_REGION"),
    endpointUrl: overrides.endpointUrl ?? readOptional("INVENTORY_ENDPOINT_URL"),
    awsMaxAttempts: Math.max(1, readInt("INVENTORY_AWS_MAX_ATTEMPTS", 3)),
    progressLogIntervalMs: readInt("PROGRESS_LOG_INTERVAL_MS", 2000),
    fetchConcurrency: defaultFetchConcurrency(),
    logLevel: readLogLevel()
  };
}
