/**
 * Environment configuration, validated with zod.
 *
 * AMM_LOG_LEVEL              pino level or "silent" (default: info)
 * AMM_MIN_INITIAL_LIQUIDITY  minimum native deposit that initializes a pool (default: 1e9)
 * AMM_START_BLOCK            first block number of a new Chain (default: 1)
 */

import { z } from "zod";
import { MIN_INITIAL_LIQUIDITY } from "./constants";

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const integerString = z.string().trim().regex(/^\d+$/, "must be a non-negative integer");

const EnvSchema = z.object({
  AMM_LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
  AMM_MIN_INITIAL_LIQUIDITY: integerString
    .default(MIN_INITIAL_LIQUIDITY.toString())
    .transform((raw) => BigInt(raw))
    .refine((value) => value > 0n, "must be greater than 0"),
  AMM_START_BLOCK: integerString.default("1").transform((raw) => BigInt(raw)),
});

export interface AmmConfig {
  logLevel: LogLevel;
  minInitialLiquidity: bigint;
  startBlock: bigint;
}

/**
 * Parse configuration from an environment map
 * @throws Error naming every invalid variable
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): AmmConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid AMM configuration: ${problems}`);
  }

  return Object.freeze({
    logLevel: parsed.data.AMM_LOG_LEVEL,
    minInitialLiquidity: parsed.data.AMM_MIN_INITIAL_LIQUIDITY,
    startBlock: parsed.data.AMM_START_BLOCK,
  });
}

let cached: AmmConfig | undefined;

/** Process-wide configuration, read from process.env on first use */
export function getConfig(): AmmConfig {
  if (!cached) {
    cached = loadConfig(process.env);
  }
  return cached;
}

export function resetConfig(): void {
  cached = undefined;
}
