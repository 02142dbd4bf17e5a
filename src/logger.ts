/**
 * Console styling and logging for the engine
 */

import type { ActionStepT, ErrorKindT, SessionReport, VerdictStatusT } from "./types";

// ANSI color codes
export const c = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  gray: "\x1b[90m",
  red: "\x1b[91m",
  green: "\x1b[92m",
  yellow: "\x1b[93m",
  blue: "\x1b[94m",
  purple: "\x1b[95m",
  cyan: "\x1b[96m",
  white: "\x1b[97m",
  bgPurple: "\x1b[48;5;99m",
  bgGreen: "\x1b[48;5;28m",
  bgRed: "\x1b[48;5;124m",
  bgYellow: "\x1b[48;5;136m",
};

let enabled = true;

export function setLogging(on: boolean): void {
  enabled = on;
}

function out(line = ""): void {
  if (enabled) console.log(line);
}

export function formatStep(step: ActionStepT): string {
  switch (step.kind) {
    case "fill": return `fill(${step.target})`;
    case "click": return `click(${step.target})`;
    case "navigate": return `navigate(${step.url})`;
    case "assert": return `assert(${step.target})`;
  }
}

const verdictBadge: Record<VerdictStatusT, string> = {
  pass: `${c.bgGreen}${c.bold}${c.white} PASS ${c.reset}`,
  fail: `${c.bgRed}${c.bold}${c.white} FAIL ${c.reset}`,
  flaky: `${c.bgYellow}${c.bold}${c.white} FLAKY ${c.reset}`,
};

export const engineLog = {
  banner: (testCaseId: string, run: number) => {
    out();
    out(`${c.bgPurple}${c.bold}${c.white}  ✦ ${testCaseId}  ${c.reset}${run > 0 ? ` ${c.dim}run #${run + 1}${c.reset}` : ""}`);
  },

  step: (index: number, total: number, step: ActionStepT) => {
    out(`${c.gray}  ├─${c.reset} ${c.dim}[${index + 1}/${total}]${c.reset} ${c.white}${formatStep(step)}${c.reset}`);
  },

  candidateRejected: (locator: string, reason: string) => {
    out(`${c.gray}  │  ${c.dim}↳ ${locator} skipped: ${reason}${c.reset}`);
  },

  candidateError: (locator: string, error: string) => {
    out(`${c.gray}  │  ${c.red}↳ ${locator} error: ${error}${c.reset}`);
  },

  healed: (descriptorId: string, locator: string, rankPosition: number) => {
    out(`${c.gray}  │  ${c.green}✓${c.reset} ${c.bold}${descriptorId}${c.reset} ${c.dim}healed → ${locator} (rank ${rankPosition + 1})${c.reset}`);
  },

  unresolved: (descriptorId: string, attempts: number) => {
    out(`${c.gray}  │  ${c.red}↳ no candidate matched "${descriptorId}" (${attempts} probes)${c.reset}`);
  },

  retrying: (what: string, retry: number, delayMs: number) => {
    out(`${c.gray}  │  ${c.yellow}↻${c.reset} ${c.dim}retry ${retry} for ${what} in ${delayMs}ms${c.reset}`);
  },

  actionFailed: (what: string, kind: ErrorKindT, error: string) => {
    out(`${c.gray}  │${c.reset}`);
    out(`${c.gray}  └─${c.reset} ${c.red}✕ ${what}${c.reset} ${c.dim}[${kind}]${c.reset}`);
    out(`${c.gray}     ${c.dim}${error}${c.reset}`);
  },

  evidence: (ref: string) => {
    out(`${c.gray}     ${c.cyan}◆${c.reset} ${c.dim}evidence: ${ref}${c.reset}`);
  },

  evidenceFailed: (error: string) => {
    out(`${c.gray}     ${c.yellow}⚠${c.reset} ${c.dim}evidence capture failed: ${error}${c.reset}`);
  },

  deadline: (testCaseId: string, deadlineMs: number) => {
    out(`${c.gray}  │  ${c.red}⏱ ${testCaseId} exceeded its ${deadlineMs}ms deadline${c.reset}`);
  },

  verdict: (testCaseId: string, status: VerdictStatusT, durationMs: number, skipped: number) => {
    const skippedNote = skipped > 0 ? ` ${c.dim}(${skipped} steps skipped)${c.reset}` : "";
    out(`${c.gray}  └─${c.reset} ${verdictBadge[status]} ${c.white}${testCaseId}${c.reset} ${c.dim}${durationMs}ms${c.reset}${skippedNote}`);
  },

  summary: (totals: SessionReport["totals"]) => {
    out();
    out(
      `${c.bold}Total: ${totals.total}${c.reset}  ${c.green}Passed: ${totals.passed}${c.reset}  ` +
      `${c.red}Failed: ${totals.failed}${c.reset}  ${c.yellow}Flaky: ${totals.flaky}${c.reset}`
    );
  },

  warn: (message: string) => {
    out(`${c.gray}  │  ${c.yellow}⚠ ${message}${c.reset}`);
  },
};
