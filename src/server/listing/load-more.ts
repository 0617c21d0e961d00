import type { ListingRunStats } from "../types.js";

export const DEFAULT_LOAD_MORE_BATCH = 10;

/**
 * Heuristic for "the store likely has more objects": the run processed a
 * positive multiple of the batch size and every page came back full.
 * Stores with uneven page sizes can make this wrong in either direction.
 */
export const shouldShowLoadMore = (
  stats: Pick<ListingRunStats, "pagesProcessed" | "fullPages">,
  batchSize = DEFAULT_LOAD_MORE_BATCH,
): boolean => {
  if (stats.pagesProcessed <= 0 || batchSize <= 0) {
    return false;
  }

  return stats.pagesProcessed % batchSize === 0 && stats.fullPages === stats.pagesProcessed;
};
