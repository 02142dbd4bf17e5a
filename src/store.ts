/**
 * Candidate store: element descriptors and their selector candidates for one test run
 */

import type { ElementDescriptorT, SelectorCandidateT } from "./types";
import { UnknownDescriptorError } from "./types";

export interface ResolutionRecord {
  candidateIndex: number;
  at: number;
}

interface Entry {
  descriptor: ElementDescriptorT;
  history: ResolutionRecord[];
}

function copyDescriptor(d: ElementDescriptorT): ElementDescriptorT {
  return { id: d.id, role: d.role, candidates: d.candidates.map((cand) => ({ ...cand })) };
}

export class CandidateStore {
  private readonly entries = new Map<string, Entry>();

  constructor(descriptors: Iterable<ElementDescriptorT> = []) {
    for (const d of descriptors) {
      if (this.entries.has(d.id)) {
        throw new Error(`Duplicate element descriptor id: "${d.id}"`);
      }
      this.entries.set(d.id, { descriptor: copyDescriptor(d), history: [] });
    }
  }

  has(id: string): boolean {
    return this.entries.has(id);
  }

  ids(): string[] {
    return [...this.entries.keys()];
  }

  /**
   * Current view of a descriptor. The returned object is a copy.
   */
  get(id: string): ElementDescriptorT {
    return copyDescriptor(this.entry(id).descriptor);
  }

  snapshot(id: string): SelectorCandidateT[] {
    return this.get(id).candidates;
  }

  history(id: string): ResolutionRecord[] {
    return [...this.entry(id).history];
  }

  /**
   * Note a successful resolution. Timestamps only move forward, so concurrent
   * updates from test cases sharing this store commute.
   */
  recordResolution(id: string, candidateIndex: number, at: number): void {
    const entry = this.entry(id);
    const candidate = entry.descriptor.candidates[candidateIndex];
    if (!candidate) {
      throw new RangeError(`Descriptor "${id}" has no candidate at index ${candidateIndex}`);
    }
    entry.history.push({ candidateIndex, at });
    candidate.lastKnownGoodAt = Math.max(candidate.lastKnownGoodAt ?? 0, at);
  }

  /**
   * Independent copy for one test case, history included
   */
  clone(): CandidateStore {
    const copy = new CandidateStore();
    for (const [id, entry] of this.entries) {
      copy.entries.set(id, { descriptor: copyDescriptor(entry.descriptor), history: [...entry.history] });
    }
    return copy;
  }

  private entry(id: string): Entry {
    const entry = this.entries.get(id);
    if (!entry) throw new UnknownDescriptorError(id);
    return entry;
  }
}
