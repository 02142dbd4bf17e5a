import { describe, it, expect, afterEach } from 'vitest';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { ReportAggregator, writeSessionReport } from '../src/aggregator';
import type { ActionResultT, TestVerdictT, VerdictStatusT } from '../src/types';

const failedClick: ActionResultT = {
  stepIndex: 1,
  kind: 'click',
  target: 'checkout.pay',
  status: 'failed',
  retryCount: 3,
  classification: 'resolution-timeout',
  resolution: { descriptorId: 'checkout.pay', status: 'unresolved', attempts: 2, probes: [] },
  durationMs: 40,
};

const healedClick: ActionResultT = {
  stepIndex: 0,
  kind: 'click',
  target: 'cart.checkout',
  status: 'success',
  retryCount: 0,
  resolution: {
    descriptorId: 'cart.checkout',
    status: 'resolved-with-fallback',
    candidate: { locator: 'button.alt', confidence: 0.4 },
    candidateIndex: 1,
    rankPosition: 1,
    attempts: 2,
    probes: [{ locator: '#checkout', reason: 'absent' }],
  },
  durationMs: 12,
};

function verdict(testCaseId: string, run: number, status: VerdictStatusT, results: ActionResultT[] = []): TestVerdictT {
  return {
    testCaseId,
    run,
    status,
    results,
    skippedSteps: 0,
    durationMs: 50,
    startedAt: '2026-01-05T10:00:00.000Z',
    finishedAt: '2026-01-05T10:00:00.050Z',
  };
}

// ---------- flakiness ----------

describe('ReportAggregator flakiness', () => {
  it('confirms flakiness when runs of the same case diverge', () => {
    const agg = new ReportAggregator(() => 0);
    agg.add(verdict('checkout-flow', 0, 'pass', [healedClick]));
    agg.add(verdict('checkout-flow', 1, 'fail', [healedClick, failedClick]));

    const report = agg.finalize().testCases['checkout-flow'];

    expect(report.runs).toBe(2);
    expect(report.passCount).toBe(1);
    expect(report.failCount).toBe(1);
    expect(report.flaky).toBe(true);
    expect(report.flakinessConfirmed).toBe(true);
    expect(report.failureClassifications).toEqual(['resolution-timeout']);
    expect(report.lastStatus).toBe('fail');
  });

  it('marks a single retried run flaky without confirming it', () => {
    const agg = new ReportAggregator(() => 0);
    agg.add(verdict('login-flow', 0, 'flaky'));

    const report = agg.finalize().testCases['login-flow'];

    expect(report.flaky).toBe(true);
    expect(report.flakyRunCount).toBe(1);
    expect(report.flakinessConfirmed).toBe(false);
  });

  it('does not confirm flakiness from a retried run next to clean passes', () => {
    const agg = new ReportAggregator(() => 0);
    agg.add(verdict('login-flow', 0, 'pass'));
    agg.add(verdict('login-flow', 1, 'flaky'));

    const report = agg.finalize().testCases['login-flow'];

    expect(report.runs).toBe(2);
    expect(report.flaky).toBe(true);
    expect(report.flakinessConfirmed).toBe(false);
  });

  it('does not call consistent failures flaky', () => {
    const agg = new ReportAggregator(() => 0);
    agg.add(verdict('search', 0, 'fail', [failedClick]));
    agg.add(verdict('search', 1, 'fail', [failedClick]));

    const report = agg.finalize().testCases['search'];

    expect(report.flaky).toBe(false);
    expect(report.flakinessConfirmed).toBe(false);
  });
});

// ---------- malformed input ----------

describe('ReportAggregator malformed verdicts', () => {
  it('counts a malformed run against its test case and keeps going', () => {
    const agg = new ReportAggregator(() => 0);
    agg.add({ testCaseId: 'checkout-flow', status: 'exploded' });
    agg.add(verdict('checkout-flow', 1, 'pass'));

    const report = agg.finalize();

    expect(report.testCases['checkout-flow'].malformedRuns).toBe(1);
    expect(report.testCases['checkout-flow'].runs).toBe(1);
    expect(report.rejectedVerdicts).toBe(0);
  });

  it('still counts the status of a run with a corrupt result', () => {
    const agg = new ReportAggregator(() => 0);
    agg.add(verdict('checkout-flow', 0, 'pass', [healedClick]));
    agg.add({ ...verdict('checkout-flow', 1, 'fail'), results: [{ bogus: true }, failedClick] });

    const report = agg.finalize().testCases['checkout-flow'];

    expect(report.malformedRuns).toBe(1);
    expect(report.runs).toBe(2);
    expect(report.passCount).toBe(1);
    expect(report.failCount).toBe(1);
    expect(report.flaky).toBe(true);
    expect(report.flakinessConfirmed).toBe(true);
    expect(report.lastStatus).toBe('fail');
    expect(report.failureClassifications).toEqual(['resolution-timeout']);
    expect(report.healing).toEqual({ resolved: 0, fallback: 1, unresolved: 1 });
  });

  it('rejects input without a test case id', () => {
    const agg = new ReportAggregator(() => 0);
    agg.addAll([null, 'garbage', { status: 'pass' }]);

    const report = agg.finalize();

    expect(report.rejectedVerdicts).toBe(3);
    expect(report.testCases).toEqual({});
  });
});

// ---------- totals and healing ----------

describe('ReportAggregator totals', () => {
  it('counts healing outcomes from each result', () => {
    const agg = new ReportAggregator(() => 0);
    agg.add(verdict('checkout-flow', 0, 'fail', [healedClick, failedClick]));

    expect(agg.finalize().testCases['checkout-flow'].healing).toEqual({ resolved: 0, fallback: 1, unresolved: 1 });
  });

  it('adds session-level failure kinds to the classifications', () => {
    const agg = new ReportAggregator(() => 0);
    agg.add({ ...verdict('login-flow', 0, 'fail'), failure: { kind: 'action-error', message: 'could not open driver session: boom' } });

    expect(agg.finalize().testCases['login-flow'].failureClassifications).toEqual(['action-error']);
  });

  it('lists failed evidence captures alongside the action failure', () => {
    const agg = new ReportAggregator(() => 0);
    agg.add(verdict('checkout-flow', 0, 'fail', [{ ...failedClick, evidenceError: 'screenshot failed: page closed' }]));

    expect(agg.finalize().testCases['checkout-flow'].failureClassifications).toEqual([
      'resolution-timeout',
      'evidence-capture-failed',
    ]);
  });

  it('totals by last status and lists expected cases that never reported', () => {
    const agg = new ReportAggregator(() => 0);
    agg.expect(['a', 'b', 'c', 'd']);
    agg.add(verdict('a', 0, 'pass'));
    agg.add(verdict('b', 0, 'flaky'));
    agg.add(verdict('c', 0, 'pass'));
    agg.add(verdict('c', 1, 'fail'));

    const report = agg.finalize();

    expect(report.totals).toEqual({ total: 4, passed: 2, failed: 2, flaky: 2 });
    expect(report.testCases['d'].runs).toBe(0);
    expect(report.testCases['d'].lastStatus).toBeUndefined();
  });

  it('stamps start and finish from the clock', () => {
    let now = 1_000;
    const agg = new ReportAggregator(() => now);
    now = 4_000;

    const report = agg.finalize();

    expect(report.startedAt).toBe('1970-01-01T00:00:01.000Z');
    expect(report.finishedAt).toBe('1970-01-01T00:00:04.000Z');
  });

  it('starts over after reset', () => {
    const agg = new ReportAggregator(() => 0);
    agg.add(verdict('a', 0, 'pass'));
    agg.add('garbage');
    agg.reset();

    const report = agg.finalize();

    expect(report.testCases).toEqual({});
    expect(report.rejectedVerdicts).toBe(0);
    expect(report.totals.total).toBe(0);
  });
});

// ---------- writeSessionReport ----------

describe('writeSessionReport', () => {
  let tmp: string | undefined;

  afterEach(async () => {
    if (tmp) await fs.rm(tmp, { recursive: true, force: true });
    tmp = undefined;
  });

  it('writes the report as JSON, creating directories', async () => {
    tmp = await fs.mkdtemp(path.join(os.tmpdir(), 'session-report-'));
    const file = path.join(tmp, 'reports', 'session.json');
    const agg = new ReportAggregator(() => 0);
    agg.add(verdict('a', 0, 'pass'));
    const report = agg.finalize();

    await writeSessionReport(report, file);

    expect(JSON.parse(await fs.readFile(file, 'utf8'))).toEqual(JSON.parse(JSON.stringify(report)));
  });
});
