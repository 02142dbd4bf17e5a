/**
 * Driver abstraction for the engine
 * Any automation backend implementing this capability set is substitutable.
 */

import type { EngineConfig } from "../config";
import type { TestCaseT } from "../types";

export interface DriverAdapter {
  /** True if the locator matches a usable element within `timeoutMs` */
  exists(locator: string, timeoutMs: number): Promise<boolean>;
  fill(locator: string, value: string): Promise<void>;
  click(locator: string): Promise<void>;
  navigate(url: string): Promise<void>;
  /** Capture a screenshot or DOM snapshot and return a reference to it */
  captureEvidence(label?: string): Promise<string>;
  /** Wait for the page to settle after a click or navigation */
  settle?(): Promise<void>;
  /** Release the session (browser context, page) */
  close?(): Promise<void>;
}

/**
 * Opens one independent driver session per test case run
 */
export type DriverFactory = (testCase: TestCaseT, run: number, config: EngineConfig) => Promise<DriverAdapter>;
