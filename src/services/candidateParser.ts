import { CandidateFrequencyError } from "../errors.js";
import type { Candidate } from "../types.js";

const INTEGER_PATTERN = /^\s*[+-]?\d+\s*$/;

/**
 * Parses an encoded candidate list such as `[word,12] [other,3]`.
 *
 * Each space-separated token loses its first and last character whatever they
 * are; tokens without a comma after that are dropped.
 */
export function parseCandidates(candidateStr: string | null | undefined): Candidate[] {
  if (!candidateStr) {
    return [];
  }

  const parts = candidateStr.replaceAll(", ", ",").split(" ");
  const result: Candidate[] = [];
  for (const part of parts) {
    const inner = part.trim().slice(1, -1);
    const commaIndex = inner.indexOf(",");
    if (commaIndex < 0) {
      continue;
    }
    result.push({
      text: inner.slice(0, commaIndex).trim(),
      frequency: inner.slice(commaIndex + 1).trim()
    });
  }
  return result;
}

export function frequencyValue(candidate: Candidate): number {
  if (!INTEGER_PATTERN.test(candidate.frequency)) {
    throw new CandidateFrequencyError(candidate.text, candidate.frequency);
  }
  return Number.parseInt(candidate.frequency, 10);
}

/** Highest frequency first; equal frequencies keep their encoded order. */
export function sortCandidatesByFrequency(candidates: Candidate[]): Candidate[] {
  const keyed = candidates.map((candidate) => ({
    candidate,
    value: frequencyValue(candidate)
  }));
  keyed.sort((left, right) => right.value - left.value);
  return keyed.map((item) => item.candidate);
}
