/**
 * Flakiness & report aggregation across one or more runs of each test case
 */

import type {
  ActionResultT,
  ErrorKindT,
  HealingStats,
  SessionReport,
  TestCaseReport,
  TestVerdictT,
  VerdictStatusT,
} from "./types";
import { ActionResult, TestVerdict, VerdictStatus } from "./types";
import { writeAtomic } from "./utils";

interface Accumulator {
  runs: number;
  passCount: number;
  failCount: number;
  flakyRunCount: number;
  malformedRuns: number;
  kinds: Set<ErrorKindT>;
  healing: HealingStats;
  lastStatus?: VerdictStatusT;
}

function fieldOf(input: unknown, key: string): unknown {
  if (typeof input !== "object" || input === null) return undefined;
  return Object.getOwnPropertyDescriptor(input, key)?.value;
}

function testCaseIdOf(input: unknown): string | undefined {
  const id = fieldOf(input, "testCaseId");
  return typeof id === "string" && id.length > 0 ? id : undefined;
}

interface RunRecord {
  status: VerdictStatusT;
  results: ActionResultT[];
  failure?: TestVerdictT["failure"];
}

/**
 * What can still be read from a verdict that failed validation: its status
 * and whichever results and failure record are well formed
 */
function salvage(input: unknown): RunRecord | undefined {
  const status = VerdictStatus.safeParse(fieldOf(input, "status"));
  if (!status.success) return undefined;

  const results: ActionResultT[] = [];
  const raw = fieldOf(input, "results");
  if (Array.isArray(raw)) {
    for (const item of raw) {
      const result = ActionResult.safeParse(item);
      if (result.success) results.push(result.data);
    }
  }
  const failure = TestVerdict.shape.failure.safeParse(fieldOf(input, "failure"));
  return { status: status.data, results, failure: failure.success ? failure.data : undefined };
}

/**
 * Accumulates verdicts for one invocation. Malformed verdicts are counted,
 * never thrown, so one corrupted run cannot block the rest of the report.
 */
export class ReportAggregator {
  private readonly cases = new Map<string, Accumulator>();
  private rejected = 0;
  private startedAt: number;

  constructor(private readonly clock: () => number = Date.now) {
    this.startedAt = clock();
  }

  reset(): void {
    this.cases.clear();
    this.rejected = 0;
    this.startedAt = this.clock();
  }

  /**
   * Register the test case ids a session was asked to run, so each one
   * appears in the report even if no verdict for it arrives.
   */
  expect(testCaseIds: Iterable<string>): void {
    for (const id of testCaseIds) this.accumulator(id);
  }

  /**
   * A malformed verdict with a usable id and status still counts as a run,
   * so one corrupted result cannot hide a pass/fail divergence.
   */
  add(input: unknown): void {
    const parsed = TestVerdict.safeParse(input);
    if (parsed.success) {
      this.record(parsed.data.testCaseId, parsed.data);
      return;
    }
    const id = testCaseIdOf(input);
    if (!id) {
      this.rejected++;
      return;
    }
    this.accumulator(id).malformedRuns++;
    const partial = salvage(input);
    if (partial) this.record(id, partial);
  }

  addAll(inputs: Iterable<unknown>): void {
    for (const input of inputs) this.add(input);
  }

  finalize(): SessionReport {
    const testCases: Record<string, TestCaseReport> = {};
    const totals = { total: 0, passed: 0, failed: 0, flaky: 0 };

    for (const [id, acc] of this.cases) {
      const passed = acc.passCount + acc.flakyRunCount;
      const diverged = passed > 0 && acc.failCount > 0;
      const report: TestCaseReport = {
        runs: acc.runs,
        passCount: acc.passCount,
        failCount: acc.failCount,
        flakyRunCount: acc.flakyRunCount,
        malformedRuns: acc.malformedRuns,
        flaky: diverged || acc.flakyRunCount > 0,
        flakinessConfirmed: diverged,
        failureClassifications: [...acc.kinds],
        healing: { ...acc.healing },
        lastStatus: acc.lastStatus,
      };
      testCases[id] = report;

      totals.total++;
      if (acc.lastStatus === "pass" || acc.lastStatus === "flaky") totals.passed++;
      else totals.failed++;
      if (report.flaky) totals.flaky++;
    }

    return {
      startedAt: new Date(this.startedAt).toISOString(),
      finishedAt: new Date(this.clock()).toISOString(),
      totals,
      testCases,
      rejectedVerdicts: this.rejected,
    };
  }

  private record(testCaseId: string, verdict: RunRecord): void {
    const acc = this.accumulator(testCaseId);
    acc.runs++;
    acc.lastStatus = verdict.status;
    switch (verdict.status) {
      case "pass": acc.passCount++; break;
      case "fail": acc.failCount++; break;
      case "flaky": acc.flakyRunCount++; break;
    }

    for (const result of verdict.results) {
      if (result.status === "failed" && result.classification) acc.kinds.add(result.classification);
      if (result.evidenceError) acc.kinds.add("evidence-capture-failed");
      switch (result.resolution?.status) {
        case "resolved": acc.healing.resolved++; break;
        case "resolved-with-fallback": acc.healing.fallback++; break;
        case "unresolved": acc.healing.unresolved++; break;
      }
    }
    if (verdict.failure) acc.kinds.add(verdict.failure.kind);
  }

  private accumulator(id: string): Accumulator {
    let acc = this.cases.get(id);
    if (!acc) {
      acc = {
        runs: 0,
        passCount: 0,
        failCount: 0,
        flakyRunCount: 0,
        malformedRuns: 0,
        kinds: new Set(),
        healing: { resolved: 0, fallback: 0, unresolved: 0 },
      };
      this.cases.set(id, acc);
    }
    return acc;
  }
}

/**
 * Write the report artifact as pretty-printed JSON
 */
export async function writeSessionReport(report: SessionReport, file: string): Promise<void> {
  await writeAtomic(file, report);
}
