/**
 * Type definitions and Zod schemas for the engine
 */

import { z } from "zod";

// Zod schemas

export const ElementRole = z.enum(["input", "button", "link", "checkbox", "custom"]);

export const SelectorCandidate = z.object({
  locator: z.string().min(1),
  confidence: z.number().min(0).max(1),
  /** Epoch millis of the last successful resolution */
  lastKnownGoodAt: z.number().int().nonnegative().optional(),
});

export const ElementDescriptor = z.object({
  id: z.string().min(1),
  role: ElementRole,
  candidates: z.array(SelectorCandidate),
});

export const FillStep = z.object({
  kind: z.literal("fill"),
  target: z.string().min(1),
  value: z.string(),
});

export const ClickStep = z.object({
  kind: z.literal("click"),
  target: z.string().min(1),
});

export const NavigateStep = z.object({
  kind: z.literal("navigate"),
  url: z.string().min(1),
});

export const AssertStep = z.object({
  kind: z.literal("assert"),
  target: z.string().min(1),
});

export const ActionStep = z.discriminatedUnion("kind", [FillStep, ClickStep, NavigateStep, AssertStep]);

export const TestCase = z.object({
  id: z.string().min(1),
  name: z.string().optional(),
  steps: z.array(ActionStep),
});

/** Crawl/classification input handed over by the upstream pipeline */
export const SessionInput = z.object({
  descriptors: z.array(ElementDescriptor),
  testCases: z.array(TestCase),
});

export const ErrorKind = z.enum([
  "resolution-timeout",
  "action-error",
  "deadline-exceeded",
  "evidence-capture-failed",
]);

export const ResolutionStatus = z.enum(["resolved", "resolved-with-fallback", "unresolved"]);

export const ProbeRecord = z.object({
  locator: z.string(),
  reason: z.string(),
});

export const ResolutionOutcome = z.object({
  descriptorId: z.string(),
  status: ResolutionStatus,
  candidate: SelectorCandidate.optional(),
  /** Index in the descriptor's declared candidate list */
  candidateIndex: z.number().int().nonnegative().optional(),
  /** Position in the ranked order at resolution time */
  rankPosition: z.number().int().nonnegative().optional(),
  attempts: z.number().int().nonnegative(),
  probes: z.array(ProbeRecord),
});

export const ActionStatus = z.enum(["success", "retried-success", "failed"]);

export const ActionResult = z.object({
  stepIndex: z.number().int().nonnegative(),
  kind: z.enum(["fill", "click", "navigate", "assert"]),
  target: z.string().optional(),
  url: z.string().optional(),
  status: ActionStatus,
  retryCount: z.number().int().nonnegative(),
  classification: ErrorKind.optional(),
  evidence: z.string().optional(),
  evidenceError: z.string().optional(),
  resolution: ResolutionOutcome.optional(),
  error: z.string().optional(),
  durationMs: z.number().nonnegative(),
});

export const VerdictStatus = z.enum(["pass", "fail", "flaky"]);

export const TestVerdict = z.object({
  testCaseId: z.string().min(1),
  run: z.number().int().nonnegative(),
  status: VerdictStatus,
  results: z.array(ActionResult),
  skippedSteps: z.number().int().nonnegative(),
  durationMs: z.number().nonnegative(),
  startedAt: z.string(),
  finishedAt: z.string(),
  /** Set when the run failed outside any single action (e.g. the browser session never opened) */
  failure: z.object({ kind: ErrorKind, message: z.string() }).optional(),
});

// Derived types
export type ElementRoleT = z.infer<typeof ElementRole>;
export type SelectorCandidateT = z.infer<typeof SelectorCandidate>;
export type ElementDescriptorT = z.infer<typeof ElementDescriptor>;
export type ActionStepT = z.infer<typeof ActionStep>;
export type TestCaseT = z.infer<typeof TestCase>;
export type SessionInputT = z.infer<typeof SessionInput>;
export type ErrorKindT = z.infer<typeof ErrorKind>;
export type ResolutionStatusT = z.infer<typeof ResolutionStatus>;
export type ProbeRecordT = z.infer<typeof ProbeRecord>;
export type ResolutionOutcomeT = z.infer<typeof ResolutionOutcome>;
export type ActionStatusT = z.infer<typeof ActionStatus>;
export type ActionResultT = z.infer<typeof ActionResult>;
export type VerdictStatusT = z.infer<typeof VerdictStatus>;
export type TestVerdictT = z.infer<typeof TestVerdict>;

export interface HealingStats {
  resolved: number;
  fallback: number;
  unresolved: number;
}

export interface TestCaseReport {
  runs: number;
  passCount: number;
  failCount: number;
  flakyRunCount: number;
  malformedRuns: number;
  /** Observed divergence across runs, or at least one run that needed retries */
  flaky: boolean;
  /** Divergence seen across two or more runs */
  flakinessConfirmed: boolean;
  failureClassifications: ErrorKindT[];
  healing: HealingStats;
  lastStatus?: VerdictStatusT;
}

export interface SessionReport {
  startedAt: string;
  finishedAt: string;
  totals: {
    total: number;
    passed: number;
    failed: number;
    flaky: number;
  };
  testCases: Record<string, TestCaseReport>;
  rejectedVerdicts: number;
}

// Custom errors

export class DeadlineExceededError extends Error {
  public readonly deadlineMs?: number;

  constructor(message = "Test case deadline exceeded", deadlineMs?: number) {
    super(message);
    this.name = "DeadlineExceededError";
    this.deadlineMs = deadlineMs;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, DeadlineExceededError);
    }
  }
}

export class UnknownDescriptorError extends Error {
  public readonly descriptorId: string;

  constructor(descriptorId: string) {
    super(`Unknown element descriptor: "${descriptorId}"`);
    this.name = "UnknownDescriptorError";
    this.descriptorId = descriptorId;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, UnknownDescriptorError);
    }
  }
}

export class ConfigError extends Error {
  public readonly issues: Array<{ key: string; message: string }>;

  constructor(issues: Array<{ key: string; message: string }>) {
    super(ConfigError.formatMessage(issues));
    this.name = "ConfigError";
    this.issues = issues;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ConfigError);
    }
  }

  static formatMessage(issues: Array<{ key: string; message: string }>): string {
    const lines = [`Invalid engine configuration:`];
    for (const issue of issues) {
      lines.push(`  • ${issue.key}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}
