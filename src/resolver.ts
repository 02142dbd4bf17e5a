/**
 * Self-healing resolver: probe ranked candidates against the live page
 */

import type { DriverAdapter } from "./drivers/types";
import { engineLog } from "./logger";
import { rankCandidates } from "./ranker";
import type { CandidateStore } from "./store";
import type { ProbeRecordT, ResolutionOutcomeT } from "./types";
import { DeadlineExceededError } from "./types";
import { abortReason, abortable, appendLog, errorMessage } from "./utils";

export interface ResolveContext {
  driver: DriverAdapter;
  store: CandidateStore;
  existenceProbeTimeoutMs: number;
  freshnessWindowMs: number;
  clock: () => number;
  signal?: AbortSignal;
  /** JSON-lines file receiving fallback and unresolved events */
  healEventsFile?: string;
  testCaseId?: string;
}

/**
 * Try each candidate once, in ranked order, until one exists on the page.
 *
 * Each candidate gets a single short probe. Waiting for a slow page and
 * re-probing is the executor's job, not this function's.
 */
export async function resolveElement(descriptorId: string, ctx: ResolveContext): Promise<ResolutionOutcomeT> {
  const descriptor = ctx.store.get(descriptorId);
  const ranked = rankCandidates(descriptor, { now: ctx.clock(), freshnessWindowMs: ctx.freshnessWindowMs });
  const probes: ProbeRecordT[] = [];

  for (let position = 0; position < ranked.length; position++) {
    if (ctx.signal?.aborted) throw abortReason(ctx.signal);
    const { candidate, index } = ranked[position];

    let found = false;
    try {
      found = await abortable(ctx.driver.exists(candidate.locator, ctx.existenceProbeTimeoutMs), ctx.signal);
    } catch (err) {
      if (err instanceof DeadlineExceededError) throw err;
      const reason = errorMessage(err);
      engineLog.candidateError(candidate.locator, reason);
      probes.push({ locator: candidate.locator, reason: `error: ${reason}` });
      continue;
    }

    if (!found) {
      engineLog.candidateRejected(candidate.locator, "not found");
      probes.push({ locator: candidate.locator, reason: "absent" });
      continue;
    }

    const at = ctx.clock();
    ctx.store.recordResolution(descriptorId, index, at);

    const outcome: ResolutionOutcomeT = {
      descriptorId,
      status: position === 0 ? "resolved" : "resolved-with-fallback",
      candidate: { ...candidate, lastKnownGoodAt: Math.max(candidate.lastKnownGoodAt ?? 0, at) },
      candidateIndex: index,
      rankPosition: position,
      attempts: probes.length + 1,
      probes,
    };
    if (outcome.status === "resolved-with-fallback") {
      engineLog.healed(descriptorId, candidate.locator, position);
      await recordHealEvent(ctx, outcome);
    }
    return outcome;
  }

  const outcome: ResolutionOutcomeT = {
    descriptorId,
    status: "unresolved",
    attempts: probes.length,
    probes,
  };
  engineLog.unresolved(descriptorId, probes.length);
  await recordHealEvent(ctx, outcome);
  return outcome;
}

async function recordHealEvent(ctx: ResolveContext, outcome: ResolutionOutcomeT): Promise<void> {
  if (!ctx.healEventsFile) return;
  try {
    await appendLog(ctx.healEventsFile, {
      ts: new Date(ctx.clock()).toISOString(),
      testCaseId: ctx.testCaseId,
      descriptorId: outcome.descriptorId,
      status: outcome.status,
      locator: outcome.candidate?.locator,
      rankPosition: outcome.rankPosition,
      probes: outcome.probes,
    });
  } catch (err) {
    engineLog.warn(`could not write heal event: ${errorMessage(err)}`);
  }
}
