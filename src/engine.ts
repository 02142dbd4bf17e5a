/**
 * Engine entry point: descriptors + test cases in, verdicts and a session report out
 */

import { ReportAggregator, writeSessionReport } from "./aggregator";
import { resolveConfig } from "./config";
import type { EngineOptions } from "./config";
import type { DriverFactory } from "./drivers/types";
import { engineLog, setLogging } from "./logger";
import { runSuite } from "./orchestrator";
import { CandidateStore } from "./store";
import type { ElementDescriptorT, SessionInputT, SessionReport, TestCaseT, TestVerdictT } from "./types";
import { SessionInput } from "./types";
import { readJson } from "./utils";

export interface SessionOptions {
  descriptors: ElementDescriptorT[];
  testCases: TestCaseT[];
  driverFactory: DriverFactory;
  config?: EngineOptions;
  clock?: () => number;
  /** Cancels every running test case */
  signal?: AbortSignal;
  /** Environment for SELF_HEAL_* settings and {{env.NAME}} fill values */
  env?: NodeJS.ProcessEnv;
}

export interface SessionResult {
  report: SessionReport;
  verdicts: TestVerdictT[];
}

/**
 * Run a full session.
 *
 * @example
 * ```typescript
 * const browser = await chromium.launch();
 * const input = await loadSessionInput("crawl/session.json");
 * const { report } = await runSession({
 *   ...input,
 *   driverFactory: playwrightDriverFactory(browser),
 *   config: { maxRetries: 2, reportFile: ".self-heal/report.json" },
 * });
 * ```
 */
export async function runSession(opts: SessionOptions): Promise<SessionResult> {
  const env = opts.env ?? process.env;
  const config = resolveConfig(opts.config, env);
  setLogging(!config.quiet);

  const input = SessionInput.parse({ descriptors: opts.descriptors, testCases: opts.testCases });
  const store = new CandidateStore(input.descriptors);

  const aggregator = new ReportAggregator(opts.clock);
  aggregator.expect(input.testCases.map((t) => t.id));

  const verdicts = await runSuite(input.testCases, {
    driverFactory: opts.driverFactory,
    store,
    config,
    clock: opts.clock,
    signal: opts.signal,
    env,
  });

  aggregator.addAll(verdicts);
  const report = aggregator.finalize();
  engineLog.summary(report.totals);

  if (config.reportFile) {
    await writeSessionReport(report, config.reportFile);
  }
  return { report, verdicts };
}

/**
 * Read and validate the crawl/classification input file
 */
export async function loadSessionInput(file: string): Promise<SessionInputT> {
  return SessionInput.parse(await readJson(file));
}
