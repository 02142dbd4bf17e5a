/**
 * selfheal-engine - self-healing selector resolution and retrying execution
 *
 * Ranks each element's candidate locators, falls back when the DOM drifts,
 * retries with backoff, and reports flakiness across repeated runs.
 */

export { runSession, loadSessionInput } from "./engine";
export type { SessionOptions, SessionResult } from "./engine";
export { resolveConfig, loadConfig, EngineConfigSchema } from "./config";
export type { EngineConfig, EngineOptions } from "./config";
export { CandidateStore } from "./store";
export type { ResolutionRecord } from "./store";
export { rankCandidates, specificityTier, scoreCandidate, SPECIFICITY_WEIGHTS, RECENCY_BONUS } from "./ranker";
export type { RankedCandidate, RankOptions, SpecificityTier } from "./ranker";
export { resolveElement } from "./resolver";
export type { ResolveContext } from "./resolver";
export { executeAction } from "./executor";
export type { ExecuteContext, ExecutorConfig } from "./executor";
export { runTestCase, runSuite, runWithReplays, computeVerdictStatus } from "./orchestrator";
export type { RunContext, SuiteOptions } from "./orchestrator";
export { ReportAggregator, writeSessionReport } from "./aggregator";
export { createPlaywrightDriver, playwrightDriverFactory } from "./drivers";
export type { DriverAdapter, DriverFactory, PlaywrightDriverOptions, PageSurface, BrowserSurface } from "./drivers";
export { DeadlineExceededError, UnknownDescriptorError, ConfigError } from "./types";
export type {
  ElementDescriptorT as ElementDescriptor,
  SelectorCandidateT as SelectorCandidate,
  ActionStepT as ActionStep,
  TestCaseT as TestCase,
  ResolutionOutcomeT as ResolutionOutcome,
  ActionResultT as ActionResult,
  TestVerdictT as TestVerdict,
  SessionReport,
  TestCaseReport,
  ErrorKindT as ErrorKind,
} from "./types";
