/**
 * Run the login session against a local build of the shop.
 * Credentials come from TEST_USERNAME and TEST_PASSWORD; engine settings
 * from SELF_HEAL_* variables. Needs a Chromium build that playwright-core
 * can launch.
 */

import path from "node:path";
import { chromium } from "playwright-core";
import { loadSessionInput, playwrightDriverFactory, runSession } from "../src";

async function main(): Promise<void> {
  const input = await loadSessionInput(path.join(__dirname, "login-session.json"));
  const browser = await chromium.launch();
  try {
    const { report } = await runSession({
      ...input,
      driverFactory: playwrightDriverFactory(browser),
      config: {
        reportFile: ".self-heal/report.json",
        healEventsFile: ".self-heal/heal_events.jsonl",
      },
    });
    process.exitCode = report.totals.failed > 0 ? 1 : 0;
  } finally {
    await browser.close();
  }
}

main().catch((err: unknown) => {
  console.error(err);
  process.exitCode = 1;
});
