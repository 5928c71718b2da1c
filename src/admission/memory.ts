/**
 * Memory-derived admission ceiling.
 *
 * Available memory is read from, in order: cgroup v2, cgroup v1,
 * /proc/meminfo. The ceiling is floor((available - reserve) / perJob),
 * clamped to [minConcurrent, maxConcurrentCap]; when no source is readable
 * the fallback is used. Readings are cached for `cacheMs`.
 */

import fs from "node:fs";
import type { AdmissionConfig } from "../config.js";
import type { Clock, Logger } from "../types.js";
import { systemClock } from "../types.js";

export type MemorySource = "cgroup_v2" | "cgroup_v1" | "proc_meminfo" | "fallback";

export interface MemoryReading {
  availableMb: number | null;
  source: MemorySource;
}

/** File contents, or null when the file cannot be read. */
export type FileReader = (path: string) => string | null;

const MB = 1024 * 1024;
// cgroup v1 reports a huge sentinel (close to 2^63) when no limit is set.
const CGROUP_V1_UNLIMITED = 1e18;

export const defaultFileReader: FileReader = (path) => {
  try {
    return fs.readFileSync(path, "utf8");
  } catch {
    return null;
  }
};

function readInt(read: FileReader, path: string): number | null {
  const raw = read(path)?.trim();
  if (!raw || !/^\d+$/.test(raw)) return null;
  return Number(raw);
}

export function readAvailableMemory(read: FileReader = defaultFileReader): MemoryReading {
  const v2Max = read("/sys/fs/cgroup/memory.max")?.trim();
  if (v2Max && v2Max !== "max" && /^\d+$/.test(v2Max)) {
    const current = readInt(read, "/sys/fs/cgroup/memory.current");
    if (current !== null) {
      return { availableMb: Math.floor(Number(v2Max) / MB) - Math.floor(current / MB), source: "cgroup_v2" };
    }
  }

  const v1Limit = readInt(read, "/sys/fs/cgroup/memory/memory.limit_in_bytes");
  if (v1Limit !== null && v1Limit <= CGROUP_V1_UNLIMITED) {
    const usage = readInt(read, "/sys/fs/cgroup/memory/memory.usage_in_bytes");
    if (usage !== null) {
      return { availableMb: Math.floor((v1Limit - usage) / MB), source: "cgroup_v1" };
    }
  }

  const meminfo = read("/proc/meminfo");
  const match = meminfo?.match(/MemAvailable:\s+(\d+)\s+kB/);
  if (match?.[1]) {
    return { availableMb: Math.floor(Number(match[1]) / 1024), source: "proc_meminfo" };
  }

  return { availableMb: null, source: "fallback" };
}

function clamp(n: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, n));
}

export function ceilingFromMemory(reading: MemoryReading, cfg: AdmissionConfig): number {
  if (reading.availableMb === null) {
    return clamp(cfg.fallbackConcurrent, cfg.minConcurrent, cfg.maxConcurrentCap);
  }
  const usable = reading.availableMb - cfg.reserveMb;
  if (usable <= 0) return cfg.minConcurrent;
  return clamp(Math.floor(usable / cfg.memoryPerJobMb), cfg.minConcurrent, cfg.maxConcurrentCap);
}

export interface MemoryCeilingParams {
  config: AdmissionConfig;
  logger: Logger;
  readFile?: FileReader;
  clock?: Clock;
}

/** A cached ceiling provider for the memory policy. */
export function createMemoryCeiling(params: MemoryCeilingParams): () => number {
  const { config, logger } = params;
  const clock = params.clock ?? systemClock;
  const read = params.readFile ?? defaultFileReader;
  let cached: { value: number; at: number } | null = null;

  return () => {
    const now = clock();
    if (cached && now - cached.at < config.cacheMs) return cached.value;
    const reading = readAvailableMemory(read);
    const value = ceilingFromMemory(reading, config);
    logger.info(
      `[mover:admission] available ${reading.availableMb ?? "unknown"}MB (${reading.source}), reserve ${config.reserveMb}MB, per job ${config.memoryPerJobMb}MB → ceiling ${value}`,
    );
    cached = { value, at: now };
    return value;
  };
}
