/**
 * Static candidate ranking. Pure: no I/O, never throws.
 */

import type { ElementDescriptorT, ElementRoleT, SelectorCandidateT } from "./types";

export type SpecificityTier = "id" | "label" | "structural";

export const SPECIFICITY_WEIGHTS: Record<SpecificityTier, number> = {
  id: 0.3,
  label: 0.2,
  structural: 0.1,
};

/** Added while a candidate's last success is inside the freshness window */
export const RECENCY_BONUS = 0.5;

export interface RankedCandidate {
  candidate: SelectorCandidateT;
  /** Index in the descriptor's declared list */
  index: number;
  tier: SpecificityTier;
  score: number;
}

export interface RankOptions {
  now: number;
  freshnessWindowMs: number;
}

const POSITIONAL = [/:nth-(child|of-type|last-child|last-of-type)\(/i, /(^|>>\s*)nth=/i, /^\/\//, /^\(\/\//, /^xpath=/i];

const ID_BASED = [
  /^#[A-Za-z_][\w-]*/,
  /\[\s*id\s*[\^$*~|]?=/i,
  /^id=/i,
  /\[\s*data-(testid|test-id|test|qa|cy)\b/i,
  /^(data-testid|internal:testid)=/i,
];

const LABEL_BASED = [
  /\[\s*name\s*[\^$*~|]?=/i,
  /\[\s*aria-label(ledby)?\b/i,
  /^(internal:)?role=[\w-]+\s*\[\s*name\s*=/i,
  /^(internal:)?label=/i,
  /\[\s*(title|alt|for)\s*[\^$*~|]?=/i,
];

// Visible text only identifies elements that carry text
const TEXT_BASED = [/^(internal:)?text=/i, /:has-text\(/i, /:text(-is)?\(/i];

const PLACEHOLDER_BASED = [/\[\s*placeholder\b/i, /^placeholder=/i];

const TEXT_ROLES: ReadonlySet<ElementRoleT> = new Set(["button", "link", "custom"]);
const FIELD_ROLES: ReadonlySet<ElementRoleT> = new Set(["input", "checkbox", "custom"]);

const matchesAny = (patterns: RegExp[], locator: string) => patterns.some((p) => p.test(locator));

/**
 * Classify a locator expression: id-based > name/label-based > structural/positional.
 * Positional selectors are structural even when anchored on an id.
 */
export function specificityTier(locator: string, role: ElementRoleT): SpecificityTier {
  const loc = locator.trim();
  if (matchesAny(POSITIONAL, loc)) return "structural";
  if (matchesAny(ID_BASED, loc)) return "id";
  if (matchesAny(LABEL_BASED, loc)) return "label";
  if (TEXT_ROLES.has(role) && matchesAny(TEXT_BASED, loc)) return "label";
  if (FIELD_ROLES.has(role) && matchesAny(PLACEHOLDER_BASED, loc)) return "label";
  return "structural";
}

export function isFresh(candidate: SelectorCandidateT, opts: RankOptions): boolean {
  const at = candidate.lastKnownGoodAt;
  if (at === undefined) return false;
  const age = opts.now - at;
  return age >= 0 && age <= opts.freshnessWindowMs;
}

/**
 * Composite score: confidence + specificity weight + recency bonus.
 * Rounded so equal inputs compare equal and fall back to declaration order.
 */
export function scoreCandidate(candidate: SelectorCandidateT, role: ElementRoleT, opts: RankOptions): number {
  const tier = specificityTier(candidate.locator, role);
  const raw = candidate.confidence + SPECIFICITY_WEIGHTS[tier] + (isFresh(candidate, opts) ? RECENCY_BONUS : 0);
  return Math.round(raw * 1e6) / 1e6;
}

/**
 * Order a descriptor's candidates by descending composite score.
 * Ties keep declaration order. The output is a permutation of the input.
 */
export function rankCandidates(descriptor: ElementDescriptorT, opts: RankOptions): RankedCandidate[] {
  const ranked = descriptor.candidates.map((candidate, index) => ({
    candidate,
    index,
    tier: specificityTier(candidate.locator, descriptor.role),
    score: scoreCandidate(candidate, descriptor.role, opts),
  }));

  ranked.sort((a, b) => b.score - a.score || a.index - b.index);
  return ranked;
}
