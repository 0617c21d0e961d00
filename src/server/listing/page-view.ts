import type { ObjectRecord } from "../types.js";
import type { ResultAccumulator } from "./accumulator.js";

export type PageSnapshot = {
  page: number;
  pageSize: number;
  totalPages: number;
  totalItems: number;
  filterQuery?: string;
  records: ObjectRecord[];
};

const escapeRegExp = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

export const filterByKey = (
  records: readonly ObjectRecord[],
  query: string | undefined,
): readonly ObjectRecord[] => {
  if (!query) {
    return records;
  }

  const pattern = new RegExp(escapeRegExp(query), "i");
  return records.filter((record) => pattern.test(record.key));
};

const assertPageSize = (pageSize: number): void => {
  if (!Number.isInteger(pageSize) || pageSize <= 0) {
    throw new Error(`Invalid pageSize: ${pageSize}`);
  }
};

/**
 * Fixed-size, 1-indexed pages over the accumulator, optionally narrowed by a
 * literal, case-insensitive key filter. Derived state is recomputed whenever
 * the accumulator, the filter or the page size has changed since the last read.
 */
export class PageView {
  private size: number;
  private page = 1;
  private query?: string;

  private filtered: readonly ObjectRecord[] = [];
  private computedFor?: { version: number; query?: string };

  constructor(
    private readonly accumulator: ResultAccumulator,
    pageSize: number,
  ) {
    assertPageSize(pageSize);
    this.size = pageSize;
  }

  get pageSize(): number {
    return this.size;
  }

  get currentPage(): number {
    this.refresh();
    return this.page;
  }

  get filterQuery(): string | undefined {
    return this.query;
  }

  setPageSize(pageSize: number): void {
    assertPageSize(pageSize);
    if (pageSize === this.size) {
      return;
    }

    this.size = pageSize;
    this.page = 1;
    this.refresh();
  }

  setFilter(query: string | undefined): void {
    const normalized = query?.trim() || undefined;
    if (normalized === this.query) {
      return;
    }

    this.query = normalized;
    this.page = 1;
    this.refresh();
  }

  goToPage(page: number): void {
    this.page = Number.isFinite(page) ? Math.trunc(page) : 1;
    this.refresh();
  }

  firstPage(): void {
    this.goToPage(1);
  }

  lastPage(): void {
    this.goToPage(this.totalPages());
  }

  nextPage(): void {
    this.goToPage(this.currentPage + 1);
  }

  previousPage(): void {
    this.goToPage(this.currentPage - 1);
  }

  totalPages(): number {
    this.refresh();
    return Math.max(1, Math.ceil(this.filtered.length / this.size));
  }

  filteredCount(): number {
    this.refresh();
    return this.filtered.length;
  }

  currentPageRecords(): ObjectRecord[] {
    this.refresh();
    const start = (this.page - 1) * this.size;
    return this.filtered.slice(start, start + this.size);
  }

  snapshot(): PageSnapshot {
    const records = this.currentPageRecords();

    return {
      page: this.page,
      pageSize: this.size,
      totalPages: this.totalPages(),
      totalItems: this.filtered.length,
      filterQuery: this.query,
      records,
    };
  }

  /** Re-derives the filtered sequence if stale and clamps the current page. */
  refresh(): void {
    const version = this.accumulator.version;

    if (
      !this.computedFor ||
      this.computedFor.version !== version ||
      this.computedFor.query !== this.query
    ) {
      this.filtered = filterByKey(this.accumulator.all(), this.query);
      this.computedFor = { version, query: this.query };
    }

    const totalPages = Math.max(1, Math.ceil(this.filtered.length / this.size));
    this.page = Math.min(Math.max(this.page, 1), totalPages);
  }
}
