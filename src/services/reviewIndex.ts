import type { ProgressStore } from "./progressStore.js";
import type { ReviewEntry } from "../types.js";

export const DEFAULT_REVIEW_LIMIT = 500;

/**
 * Annotated rows, latest row position first. There is no timestamp on a row,
 * so a higher index stands in for a more recent annotation.
 */
export function buildReviewIndex(
  store: ProgressStore,
  limit: number = DEFAULT_REVIEW_LIMIT
): ReviewEntry[] {
  const entries: ReviewEntry[] = [];
  const rows = store.rows();
  for (let index = rows.length - 1; index >= 0 && entries.length < limit; index -= 1) {
    const row = rows[index];
    if (row.corrected === "") {
      continue;
    }
    entries.push({
      index,
      originalForm: row.originalForm,
      corrected: row.corrected
    });
  }
  return entries;
}
