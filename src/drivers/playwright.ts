/**
 * Playwright driver adapter
 * Locator expressions are handed to page.locator() as-is, so any Playwright
 * selector (css, text=, role=, data-testid=, xpath) works as a candidate.
 */

import { errors } from "playwright-core";
import type { Browser, Page } from "playwright-core";
import fs from "node:fs/promises";
import path from "node:path";

import type { DriverAdapter, DriverFactory } from "./types";

/** The slice of a Playwright Locator the adapter uses */
export interface LocatorSurface {
  first(): LocatorSurface;
  waitFor(options: { state: "visible"; timeout: number }): Promise<void>;
  fill(value: string, options: { timeout: number }): Promise<void>;
  click(options: { timeout: number }): Promise<void>;
}

/** The slice of a Playwright Page the adapter uses; `Page` satisfies it */
export interface PageSurface {
  locator(selector: string): LocatorSurface;
  goto(url: string, options: { timeout: number; waitUntil: "domcontentloaded" }): Promise<unknown>;
  screenshot(options: { path: string; fullPage: boolean }): Promise<unknown>;
  waitForLoadState(state: "domcontentloaded", options: { timeout: number }): Promise<void>;
}

export interface BrowserContextSurface {
  newPage(): Promise<PageSurface>;
  close(): Promise<void>;
}

/** The slice of a Playwright Browser the factory uses; `Browser` satisfies it */
export interface BrowserSurface {
  newContext(): Promise<BrowserContextSurface>;
}

export interface PlaywrightDriverOptions {
  /** Timeout for fill/click/navigate */
  actionTimeoutMs?: number;
  /** Directory screenshots are written to */
  evidenceDir?: string;
  /** Clock used to name evidence files */
  now?: () => number;
}

function fileSafe(label: string): string {
  return label.replace(/[^A-Za-z0-9._-]+/g, "_").slice(0, 80) || "evidence";
}

/**
 * Wrap a Playwright page in the engine's driver capability set.
 *
 * @example
 * ```typescript
 * const browser = await chromium.launch();
 * const page = await browser.newPage();
 * const driver = createPlaywrightDriver(page, { evidenceDir: "artifacts" });
 * ```
 */
export function createPlaywrightDriver(page: Page, opts?: PlaywrightDriverOptions): DriverAdapter {
  return adaptPage(page, opts);
}

/** Driver over anything shaped like a Playwright page */
export function adaptPage(page: PageSurface, opts?: PlaywrightDriverOptions): DriverAdapter {
  const timeout = opts?.actionTimeoutMs ?? 5000;
  const evidenceDir = opts?.evidenceDir ?? path.join(process.cwd(), ".self-heal", "evidence");
  const now = opts?.now ?? Date.now;

  return {
    async exists(locator, timeoutMs) {
      try {
        await page.locator(locator).first().waitFor({ state: "visible", timeout: timeoutMs });
        return true;
      } catch (err) {
        if (err instanceof errors.TimeoutError) return false;
        throw err;
      }
    },

    async fill(locator, value) {
      await page.locator(locator).first().fill(value, { timeout });
    },

    async click(locator) {
      await page.locator(locator).first().click({ timeout });
    },

    async navigate(url) {
      await page.goto(url, { timeout, waitUntil: "domcontentloaded" });
    },

    async captureEvidence(label) {
      await fs.mkdir(evidenceDir, { recursive: true });
      const file = path.join(evidenceDir, `${fileSafe(label ?? "evidence")}-${now()}.png`);
      await page.screenshot({ path: file, fullPage: true });
      return file;
    },

    async settle() {
      await page.waitForLoadState("domcontentloaded", { timeout });
    },
  };
}

/**
 * Driver factory that opens a fresh browser context per test case run,
 * so cookies and storage never leak between concurrently running cases.
 * Timeouts and the evidence directory come from the engine config unless
 * `opts` overrides them.
 */
export function playwrightDriverFactory(browser: Browser, opts?: PlaywrightDriverOptions): DriverFactory {
  return contextDriverFactory(browser, opts);
}

/** Per-run context factory over anything shaped like a Playwright browser */
export function contextDriverFactory(browser: BrowserSurface, opts?: PlaywrightDriverOptions): DriverFactory {
  return async (_testCase, _run, config) => {
    const context = await browser.newContext();
    const page = await context.newPage();
    const driver = adaptPage(page, {
      actionTimeoutMs: opts?.actionTimeoutMs ?? config.actionTimeoutMs,
      evidenceDir: opts?.evidenceDir ?? config.evidenceDir,
      now: opts?.now,
    });
    return {
      ...driver,
      close: () => context.close(),
    };
  };
}
