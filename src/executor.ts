/**
 * Action executor: one user-intent action with resolution, retry/backoff and failure classification
 */

import type { EngineConfig } from "./config";
import type { DriverAdapter } from "./drivers/types";
import { engineLog, formatStep } from "./logger";
import { resolveElement } from "./resolver";
import type { CandidateStore } from "./store";
import type { ActionResultT, ActionStepT, ErrorKindT, ResolutionOutcomeT } from "./types";
import { DeadlineExceededError } from "./types";
import { abortReason, abortable, backoffDelay, errorMessage, interpolateValue, sleep, withTimeout } from "./utils";

export type ExecutorConfig = Pick<
  EngineConfig,
  | "maxRetries"
  | "backoffBaseMs"
  | "backoffCapMs"
  | "existenceProbeTimeoutMs"
  | "freshnessWindowMs"
  | "evidenceTimeoutMs"
  | "healEventsFile"
>;

export interface ExecuteContext {
  driver: DriverAdapter;
  store: CandidateStore;
  config: ExecutorConfig;
  testCaseId: string;
  clock?: () => number;
  signal?: AbortSignal;
  /** Source for {{env.NAME}} placeholders in fill values */
  env?: NodeJS.ProcessEnv;
}

type Attempt =
  | { ok: true; resolution?: ResolutionOutcomeT }
  | { ok: false; kind: ErrorKindT; error: string; resolution?: ResolutionOutcomeT };

/**
 * Execute one step. Never throws for driver or resolution failures; those end
 * up as a `failed` result with a classification.
 */
export async function executeAction(step: ActionStepT, stepIndex: number, ctx: ExecuteContext): Promise<ActionResultT> {
  const clock = ctx.clock ?? Date.now;
  const started = clock();
  const what = formatStep(step);
  const { maxRetries, backoffBaseMs, backoffCapMs } = ctx.config;

  const base = step.kind === "navigate"
    ? { stepIndex, kind: step.kind, url: step.url }
    : { stepIndex, kind: step.kind, target: step.target };

  const elapsed = () => Math.max(0, clock() - started);

  // Failures decided before any attempt
  const failEarly = (classification: ErrorKindT, error: string) => {
    engineLog.actionFailed(what, classification, error);
    return finalizeFailure(
      { ...base, status: "failed", retryCount: 0, classification, error, durationMs: elapsed() },
      ctx,
      elapsed
    );
  };

  if (ctx.signal?.aborted) {
    const reason = abortReason(ctx.signal);
    if (!(reason instanceof DeadlineExceededError)) throw reason;
    return failEarly("deadline-exceeded", reason.message);
  }
  if (step.kind !== "navigate" && !ctx.store.has(step.target)) {
    return failEarly("resolution-timeout", `Unknown element descriptor: "${step.target}"`);
  }

  let value: string | undefined;
  if (step.kind === "fill") {
    const filled = interpolateValue(step.value, ctx.env ?? process.env);
    if (filled.missing.length > 0) {
      engineLog.warn(`unset environment variables in fill value: ${filled.missing.join(", ")}`);
    }
    value = filled.value;
  }

  let retryCount = 0;
  let kind: ErrorKindT = "resolution-timeout";
  let error = "";
  let resolution: ResolutionOutcomeT | undefined;

  try {
    for (let attempt = 0; attempt <= maxRetries; attempt++) {
      if (attempt > 0) {
        const delay = backoffDelay(attempt - 1, backoffBaseMs, backoffCapMs);
        engineLog.retrying(what, attempt, delay);
        await sleep(delay, ctx.signal);
        retryCount = attempt;
      }
      if (ctx.signal?.aborted) throw abortReason(ctx.signal);

      const result = await attemptOnce(step, value, ctx, clock);
      resolution = result.resolution ?? resolution;
      if (result.ok) {
        return {
          ...base,
          status: retryCount === 0 ? "success" : "retried-success",
          retryCount,
          resolution: result.resolution,
          durationMs: elapsed(),
        };
      }
      kind = result.kind;
      error = result.error;
    }
  } catch (err) {
    if (!(err instanceof DeadlineExceededError)) throw err;
    kind = "deadline-exceeded";
    error = err.message;
  }

  engineLog.actionFailed(what, kind, error);
  return finalizeFailure(
    { ...base, status: "failed", retryCount, classification: kind, resolution, error, durationMs: elapsed() },
    ctx,
    elapsed
  );
}

async function attemptOnce(
  step: ActionStepT,
  value: string | undefined,
  ctx: ExecuteContext,
  clock: () => number
): Promise<Attempt> {
  if (step.kind === "navigate") {
    return perform(ctx, async () => {
      await ctx.driver.navigate(step.url);
      await ctx.driver.settle?.();
    });
  }

  const resolution = await resolveElement(step.target, {
    driver: ctx.driver,
    store: ctx.store,
    existenceProbeTimeoutMs: ctx.config.existenceProbeTimeoutMs,
    freshnessWindowMs: ctx.config.freshnessWindowMs,
    healEventsFile: ctx.config.healEventsFile,
    testCaseId: ctx.testCaseId,
    clock,
    signal: ctx.signal,
  });

  if (resolution.status === "unresolved" || !resolution.candidate) {
    return {
      ok: false,
      kind: "resolution-timeout",
      error: `No candidate for "${step.target}" matched (${resolution.attempts} probes)`,
      resolution,
    };
  }

  // A resolved target is all an assertion needs
  if (step.kind === "assert") return { ok: true, resolution };

  const locator = resolution.candidate.locator;
  const attempt = step.kind === "fill"
    ? await perform(ctx, () => ctx.driver.fill(locator, value ?? ""))
    : await perform(ctx, async () => {
      await ctx.driver.click(locator);
      await ctx.driver.settle?.();
    });
  return { ...attempt, resolution };
}

/**
 * Run a driver operation. A failure after successful resolution (detached
 * element, interrupted navigation) is an action-error attempt.
 */
async function perform(ctx: ExecuteContext, op: () => Promise<void>): Promise<Attempt> {
  try {
    await abortable(op(), ctx.signal);
    return { ok: true };
  } catch (err) {
    if (err instanceof DeadlineExceededError) throw err;
    return { ok: false, kind: "action-error", error: errorMessage(err) };
  }
}

/**
 * Attach evidence to a failed result. Capture is best-effort: its failure is
 * logged and recorded, never turned into a different verdict.
 */
async function finalizeFailure(
  result: ActionResultT,
  ctx: ExecuteContext,
  elapsed: () => number
): Promise<ActionResultT> {
  const label = `${ctx.testCaseId}-step${result.stepIndex + 1}`;
  try {
    const evidence = await withTimeout(
      ctx.driver.captureEvidence(label),
      ctx.config.evidenceTimeoutMs,
      `evidence capture exceeded ${ctx.config.evidenceTimeoutMs}ms`
    );
    engineLog.evidence(evidence);
    return { ...result, evidence, durationMs: elapsed() };
  } catch (err) {
    const evidenceError = errorMessage(err);
    engineLog.evidenceFailed(evidenceError);
    return { ...result, evidenceError, durationMs: elapsed() };
  }
}
