/**
 * Session orchestrator: runs test cases step by step and produces verdicts
 */

import type { EngineConfig } from "./config";
import type { DriverAdapter, DriverFactory } from "./drivers/types";
import { executeAction } from "./executor";
import type { ExecutorConfig } from "./executor";
import { engineLog } from "./logger";
import type { CandidateStore } from "./store";
import type { ActionResultT, ErrorKindT, TestCaseT, TestVerdictT, VerdictStatusT } from "./types";
import { DeadlineExceededError } from "./types";
import { abortable, errorMessage, runPool, withTimeout } from "./utils";

/**
 * Deterministic verdict: any failed action → fail, else any retried success → flaky, else pass
 */
export function computeVerdictStatus(results: readonly ActionResultT[]): VerdictStatusT {
  let retried = false;
  for (const r of results) {
    if (r.status === "failed") return "fail";
    if (r.status === "retried-success") retried = true;
  }
  return retried ? "flaky" : "pass";
}

export interface RunContext {
  driver: DriverAdapter;
  store: CandidateStore;
  config: ExecutorConfig & Pick<EngineConfig, "perTestCaseDeadlineMs">;
  run?: number;
  clock?: () => number;
  /** Aborting this signal cancels the run as if its deadline had passed */
  signal?: AbortSignal;
  env?: NodeJS.ProcessEnv;
}

/**
 * Run one test case's steps strictly in sequence. The first failed step
 * aborts the rest; the per-test-case deadline cancels pending waits.
 */
export async function runTestCase(testCase: TestCaseT, ctx: RunContext): Promise<TestVerdictT> {
  const clock = ctx.clock ?? Date.now;
  const run = ctx.run ?? 0;
  const started = clock();
  const deadlineMs = ctx.config.perTestCaseDeadlineMs;

  engineLog.banner(testCase.id, run);

  const controller = new AbortController();
  const timer = setTimeout(() => {
    engineLog.deadline(testCase.id, deadlineMs);
    controller.abort(
      new DeadlineExceededError(`Test case "${testCase.id}" exceeded its ${deadlineMs}ms deadline`, deadlineMs)
    );
  }, deadlineMs);
  const onParentAbort = () => {
    const reason = ctx.signal?.reason;
    controller.abort(
      reason instanceof DeadlineExceededError ? reason : new DeadlineExceededError(`Test case "${testCase.id}" was cancelled`)
    );
  };
  if (ctx.signal?.aborted) onParentAbort();
  else ctx.signal?.addEventListener("abort", onParentAbort, { once: true });

  const results: ActionResultT[] = [];
  try {
    for (let i = 0; i < testCase.steps.length; i++) {
      const step = testCase.steps[i];
      engineLog.step(i, testCase.steps.length, step);
      const result = await executeAction(step, i, {
        driver: ctx.driver,
        store: ctx.store,
        config: ctx.config,
        testCaseId: testCase.id,
        clock,
        signal: controller.signal,
        env: ctx.env,
      });
      results.push(result);
      if (result.status === "failed") break;
    }
  } finally {
    clearTimeout(timer);
    ctx.signal?.removeEventListener("abort", onParentAbort);
  }

  const finished = clock();
  const status = computeVerdictStatus(results);
  const skippedSteps = testCase.steps.length - results.length;
  const durationMs = Math.max(0, finished - started);
  engineLog.verdict(testCase.id, status, durationMs, skippedSteps);

  return {
    testCaseId: testCase.id,
    run,
    status,
    results,
    skippedSteps,
    durationMs,
    startedAt: new Date(started).toISOString(),
    finishedAt: new Date(finished).toISOString(),
  };
}

export interface SuiteOptions {
  driverFactory: DriverFactory;
  store: CandidateStore;
  config: EngineConfig;
  clock?: () => number;
  signal?: AbortSignal;
  env?: NodeJS.ProcessEnv;
}

/**
 * Run many test cases on a bounded worker pool. Every test case yields at
 * least one verdict, in submission order, even when its session never opens.
 */
export async function runSuite(testCases: readonly TestCaseT[], opts: SuiteOptions): Promise<TestVerdictT[]> {
  const perCase = await runPool(testCases, opts.config.maxConcurrentTestCases, (testCase) =>
    runWithReplays(testCase, opts)
  );
  return perCase.flat();
}

/**
 * Repeated runs of one test case, plus one extra run after a final failure
 * when replayFailures is on
 */
export async function runWithReplays(testCase: TestCaseT, opts: SuiteOptions): Promise<TestVerdictT[]> {
  const verdicts: TestVerdictT[] = [];
  for (let run = 0; run < opts.config.repeatRuns; run++) {
    verdicts.push(await runInSession(testCase, run, opts));
  }
  const last = verdicts[verdicts.length - 1];
  if (opts.config.replayFailures && last?.status === "fail") {
    verdicts.push(await runInSession(testCase, verdicts.length, opts));
  }
  return verdicts;
}

/**
 * One run in its own driver session. The test case deadline starts here, so
 * it also bounds opening the session; closing is bounded by actionTimeoutMs.
 */
async function runInSession(testCase: TestCaseT, run: number, opts: SuiteOptions): Promise<TestVerdictT> {
  const clock = opts.clock ?? Date.now;
  const started = clock();
  const deadlineMs = opts.config.perTestCaseDeadlineMs;

  const controller = new AbortController();
  const timer = setTimeout(() => {
    engineLog.deadline(testCase.id, deadlineMs);
    controller.abort(
      new DeadlineExceededError(`Test case "${testCase.id}" exceeded its ${deadlineMs}ms deadline`, deadlineMs)
    );
  }, deadlineMs);
  const onParentAbort = () => controller.abort(new DeadlineExceededError(`Test case "${testCase.id}" was cancelled`));
  if (opts.signal?.aborted) onParentAbort();
  else opts.signal?.addEventListener("abort", onParentAbort, { once: true });

  try {
    const opening = opts.driverFactory(testCase, run, opts.config);
    let driver: DriverAdapter;
    try {
      driver = await abortable(opening, controller.signal);
    } catch (err) {
      if (err instanceof DeadlineExceededError) {
        closeWhenOpened(opening, testCase.id);
        return sessionFailure(testCase, run, started, clock(), "deadline-exceeded", err.message);
      }
      return sessionFailure(testCase, run, started, clock(), "action-error", `could not open driver session: ${errorMessage(err)}`);
    }

    try {
      return await runTestCase(testCase, {
        driver,
        store: opts.config.shareCandidateStore ? opts.store : opts.store.clone(),
        config: opts.config,
        run,
        clock,
        signal: controller.signal,
        env: opts.env,
      });
    } catch (err) {
      return sessionFailure(testCase, run, started, clock(), "action-error", errorMessage(err));
    } finally {
      await closeDriver(driver, testCase.id, opts.config.actionTimeoutMs);
    }
  } finally {
    clearTimeout(timer);
    opts.signal?.removeEventListener("abort", onParentAbort);
  }
}

async function closeDriver(driver: DriverAdapter, testCaseId: string, timeoutMs: number): Promise<void> {
  if (!driver.close) return;
  try {
    await withTimeout(driver.close(), timeoutMs, `closing the session took longer than ${timeoutMs}ms`);
  } catch (err) {
    engineLog.warn(`could not close driver session for ${testCaseId}: ${errorMessage(err)}`);
  }
}

// A session that opens after its deadline is closed as soon as it arrives
function closeWhenOpened(opening: Promise<DriverAdapter>, testCaseId: string): void {
  opening
    .then((late) => late.close?.())
    .catch((err: unknown) => engineLog.warn(`late driver session for ${testCaseId}: ${errorMessage(err)}`));
}

function sessionFailure(
  testCase: TestCaseT,
  run: number,
  started: number,
  finished: number,
  kind: ErrorKindT,
  message: string
): TestVerdictT {
  engineLog.warn(`${testCase.id}: ${message}`);
  return {
    testCaseId: testCase.id,
    run,
    status: "fail",
    results: [],
    skippedSteps: testCase.steps.length,
    durationMs: Math.max(0, finished - started),
    startedAt: new Date(started).toISOString(),
    finishedAt: new Date(finished).toISOString(),
    failure: { kind, message },
  };
}
