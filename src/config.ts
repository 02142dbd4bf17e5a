/**
 * Engine configuration: defaults, SELF_HEAL_* environment variables and explicit options
 */

import dotenv from "dotenv";
import { z } from "zod";
import { ConfigError } from "./types";

export const EngineConfigSchema = z
  .object({
    /** Cap on resolution/action retry attempts */
    maxRetries: z.number().int().min(0).max(20).default(3),
    /** Initial backoff unit */
    backoffBaseMs: z.number().int().nonnegative().default(250),
    /** Ceiling on exponential backoff growth */
    backoffCapMs: z.number().int().nonnegative().default(4000),
    /** Per-candidate existence probe timeout */
    existenceProbeTimeoutMs: z.number().int().positive().default(300),
    /** Worker-pool width */
    maxConcurrentTestCases: z.number().int().positive().default(2),
    /** Cancellation deadline for one test case */
    perTestCaseDeadlineMs: z.number().int().positive().default(120_000),
    /** Window in which a last-known-good candidate gets the recency bonus */
    freshnessWindowMs: z.number().int().nonnegative().default(600_000),
    /** Timeout handed to driver operations (fill/click/navigate) */
    actionTimeoutMs: z.number().int().positive().default(5000),
    /** Upper bound on a single evidence capture */
    evidenceTimeoutMs: z.number().int().positive().default(5000),
    evidenceDir: z.string().min(1).default(".self-heal/evidence"),
    reportFile: z.string().min(1).optional(),
    healEventsFile: z.string().min(1).optional(),
    /** Runs per test case (replay mode for flakiness confirmation) */
    repeatRuns: z.number().int().positive().default(1),
    /** Re-run a test case once more when its last run failed */
    replayFailures: z.boolean().default(false),
    /** Let concurrently running test cases share one candidate store */
    shareCandidateStore: z.boolean().default(false),
    quiet: z.boolean().default(false),
  })
  .refine((c) => c.backoffCapMs >= c.backoffBaseMs, {
    path: ["backoffCapMs"],
    message: "must be greater than or equal to backoffBaseMs",
  });

export type EngineConfig = z.output<typeof EngineConfigSchema>;
export type EngineOptions = z.input<typeof EngineConfigSchema>;

const NUMBER_KEYS = [
  "maxRetries",
  "backoffBaseMs",
  "backoffCapMs",
  "existenceProbeTimeoutMs",
  "maxConcurrentTestCases",
  "perTestCaseDeadlineMs",
  "freshnessWindowMs",
  "actionTimeoutMs",
  "evidenceTimeoutMs",
  "repeatRuns",
] as const;

const BOOLEAN_KEYS = ["replayFailures", "shareCandidateStore", "quiet"] as const;

const STRING_KEYS = ["evidenceDir", "reportFile", "healEventsFile"] as const;

/**
 * Environment variable name for a config key: maxRetries -> SELF_HEAL_MAX_RETRIES
 */
export function envName(key: string): string {
  return "SELF_HEAL_" + key.replace(/[A-Z]/g, (m) => `_${m}`).toUpperCase();
}

function parseBoolean(raw: string): boolean | string {
  const v = raw.trim().toLowerCase();
  if (v === "1" || v === "true" || v === "yes") return true;
  if (v === "0" || v === "false" || v === "no") return false;
  // Left as a string so validation reports it
  return raw;
}

/**
 * Collect config values from SELF_HEAL_* variables. Values stay unvalidated.
 */
export function configFromEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const key of NUMBER_KEYS) {
    const raw = env[envName(key)];
    if (raw !== undefined && raw !== "") out[key] = Number(raw);
  }
  for (const key of BOOLEAN_KEYS) {
    const raw = env[envName(key)];
    if (raw !== undefined && raw !== "") out[key] = parseBoolean(raw);
  }
  for (const key of STRING_KEYS) {
    const raw = env[envName(key)];
    if (raw !== undefined && raw !== "") out[key] = raw;
  }
  return out;
}

/**
 * Merge explicit options over environment values over defaults, then validate.
 * Throws ConfigError naming every invalid key.
 */
export function resolveConfig(opts: EngineOptions = {}, env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const explicit = Object.fromEntries(Object.entries(opts).filter(([, v]) => v !== undefined));
  const result = EngineConfigSchema.safeParse({ ...configFromEnv(env), ...explicit });
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => ({
        key: issue.path.join(".") || "(root)",
        message: issue.message,
      }))
    );
  }
  return result.data;
}

/**
 * Load a .env file into process.env, then resolve the configuration
 */
export function loadConfig(opts: EngineOptions = {}, envFile = ".env"): EngineConfig {
  dotenv.config({ path: envFile });
  return resolveConfig(opts, process.env);
}
