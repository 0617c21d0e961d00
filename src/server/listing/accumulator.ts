import type { ObjectRecord } from "../types.js";

/**
 * Ordered records gathered for one connection, in page-arrival order.
 * No deduplication: a superseding run hands over its full result set through
 * {@link ResultAccumulator.replaceAll} instead of appending it.
 */
export class ResultAccumulator {
  private records: ObjectRecord[] = [];
  private revision = 0;

  append(records: readonly ObjectRecord[]): void {
    if (!records.length) {
      return;
    }

    this.records.push(...records);
    this.revision += 1;
  }

  replaceAll(records: readonly ObjectRecord[]): void {
    this.records = [...records];
    this.revision += 1;
  }

  clear(): void {
    this.records = [];
    this.revision += 1;
  }

  all(): readonly ObjectRecord[] {
    return [...this.records];
  }

  count(): number {
    return this.records.length;
  }

  get version(): number {
    return this.revision;
  }
}
