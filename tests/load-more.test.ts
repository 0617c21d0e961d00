import { describe, it, expect } from "vitest";
import { DEFAULT_LOAD_MORE_BATCH, shouldShowLoadMore } from "../src/server/listing/load-more.js";

describe("shouldShowLoadMore", () => {
  it("should default to a batch of 10 pages", () => {
    expect(DEFAULT_LOAD_MORE_BATCH).toBe(10);
  });

  it("should offer more when a full batch of full pages was read", () => {
    expect(shouldShowLoadMore({ pagesProcessed: 10, fullPages: 10 })).toBe(true);
    expect(shouldShowLoadMore({ pagesProcessed: 20, fullPages: 20 })).toBe(true);
  });

  it("should not offer more when any page was short", () => {
    expect(shouldShowLoadMore({ pagesProcessed: 10, fullPages: 9 })).toBe(false);
  });

  it("should not offer more when the page count is not a multiple of the batch", () => {
    expect(shouldShowLoadMore({ pagesProcessed: 7, fullPages: 7 })).toBe(false);
    expect(shouldShowLoadMore({ pagesProcessed: 11, fullPages: 11 })).toBe(false);
  });

  it("should not offer more when nothing was read", () => {
    expect(shouldShowLoadMore({ pagesProcessed: 0, fullPages: 0 })).toBe(false);
  });

  it("should honour a custom batch size", () => {
    expect(shouldShowLoadMore({ pagesProcessed: 4, fullPages: 4 }, 2)).toBe(true);
    expect(shouldShowLoadMore({ pagesProcessed: 4, fullPages: 4 }, 0)).toBe(false);
  });
});
