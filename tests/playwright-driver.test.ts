import { describe, it, expect, afterEach } from 'vitest';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { errors } from 'playwright-core';
import { adaptPage, contextDriverFactory } from '../src/drivers/playwright';
import type { BrowserContextSurface, BrowserSurface, LocatorSurface, PageSurface } from '../src/drivers/playwright';
import { resolveConfig } from '../src/config';

type Call = [string, ...unknown[]];

class FakeLocator implements LocatorSurface {
  constructor(private readonly page: FakePage, private readonly selector: string) {}

  first(): LocatorSurface {
    return this;
  }

  async waitFor(options: { state: 'visible'; timeout: number }): Promise<void> {
    this.page.calls.push(['waitFor', this.selector, options]);
    const failure = this.page.waitFailures.get(this.selector);
    if (failure) throw failure;
  }

  async fill(value: string, options: { timeout: number }): Promise<void> {
    this.page.calls.push(['fill', this.selector, value, options]);
  }

  async click(options: { timeout: number }): Promise<void> {
    this.page.calls.push(['click', this.selector, options]);
  }
}

class FakePage implements PageSurface {
  readonly calls: Call[] = [];
  readonly waitFailures = new Map<string, Error>();

  locator(selector: string): LocatorSurface {
    return new FakeLocator(this, selector);
  }

  async goto(url: string, options: { timeout: number; waitUntil: 'domcontentloaded' }): Promise<unknown> {
    this.calls.push(['goto', url, options]);
    return null;
  }

  async screenshot(options: { path: string; fullPage: boolean }): Promise<unknown> {
    this.calls.push(['screenshot', options]);
    return Buffer.from('');
  }

  async waitForLoadState(state: 'domcontentloaded', options: { timeout: number }): Promise<void> {
    this.calls.push(['waitForLoadState', state, options]);
  }
}

// ---------- adaptPage ----------

describe('adaptPage', () => {
  let tmp: string | undefined;

  afterEach(async () => {
    if (tmp) await fs.rm(tmp, { recursive: true, force: true });
    tmp = undefined;
  });

  it('reports visible elements as existing', async () => {
    const page = new FakePage();
    const driver = adaptPage(page);

    await expect(driver.exists('#login-submit', 300)).resolves.toBe(true);
    expect(page.calls).toEqual([['waitFor', '#login-submit', { state: 'visible', timeout: 300 }]]);
  });

  it('maps a visibility timeout to absent', async () => {
    const page = new FakePage();
    page.waitFailures.set('#gone', new errors.TimeoutError('Timeout 300ms exceeded.'));
    const driver = adaptPage(page);

    await expect(driver.exists('#gone', 300)).resolves.toBe(false);
  });

  it('propagates other probe errors', async () => {
    const page = new FakePage();
    page.waitFailures.set('##bad', new Error('Unexpected token "#" while parsing selector "##bad"'));
    const driver = adaptPage(page);

    await expect(driver.exists('##bad', 300)).rejects.toThrow('while parsing selector');
  });

  it('acts with the configured timeout', async () => {
    const page = new FakePage();
    const driver = adaptPage(page, { actionTimeoutMs: 1234 });

    await driver.fill('#username', 'demo-user');
    await driver.click('#login-submit');
    await driver.navigate('https://shop.test/login');
    await driver.settle?.();

    expect(page.calls).toEqual([
      ['fill', '#username', 'demo-user', { timeout: 1234 }],
      ['click', '#login-submit', { timeout: 1234 }],
      ['goto', 'https://shop.test/login', { timeout: 1234, waitUntil: 'domcontentloaded' }],
      ['waitForLoadState', 'domcontentloaded', { timeout: 1234 }],
    ]);
  });

  it('writes full-page screenshots under the evidence directory', async () => {
    tmp = await fs.mkdtemp(path.join(os.tmpdir(), 'evidence-'));
    const evidenceDir = path.join(tmp, 'shots');
    const page = new FakePage();
    const driver = adaptPage(page, { evidenceDir, now: () => 1700 });

    const ref = await driver.captureEvidence('login flow/step 3');

    expect(ref).toBe(path.join(evidenceDir, 'login_flow_step_3-1700.png'));
    expect(page.calls).toEqual([['screenshot', { path: ref, fullPage: true }]]);
    expect((await fs.stat(evidenceDir)).isDirectory()).toBe(true);
  });
});

// ---------- contextDriverFactory ----------

describe('contextDriverFactory', () => {
  it('opens one context per run and closes it with the driver', async () => {
    const pages: FakePage[] = [];
    let closed = 0;
    const browser: BrowserSurface = {
      async newContext(): Promise<BrowserContextSurface> {
        return {
          async newPage() {
            const page = new FakePage();
            pages.push(page);
            return page;
          },
          async close() {
            closed++;
          },
        };
      },
    };
    const config = resolveConfig({ actionTimeoutMs: 777 }, {});
    const factory = contextDriverFactory(browser);
    const testCase = { id: 'login-flow', steps: [] };

    const first = await factory(testCase, 0, config);
    await factory(testCase, 1, config);
    await first.click('#login-submit');
    await first.close?.();

    expect(pages).toHaveLength(2);
    expect(pages[0].calls).toEqual([['click', '#login-submit', { timeout: 777 }]]);
    expect(closed).toBe(1);
  });
});
