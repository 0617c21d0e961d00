import crypto from "node:crypto";
import type { FastifyBaseLogger } from "fastify";
import { listingDefaults, type ListingDefaults } from "../config.js";
import { AppError, toErrorMessage } from "../errors.js";
import { recordListingOutcome, sentryLog } from "../observability.js";
import { s3GatewayFactory, type GatewayFactory, type S3GatewayOptions } from "../s3.js";
import type {
  ConnectionConfig,
  ListingEvent,
  ListingRunStats,
  ListingState,
} from "../types.js";
import { ResultAccumulator } from "./accumulator.js";
import { getFolderContents, type FolderContents } from "./folders.js";
import { shouldShowLoadMore } from "./load-more.js";
import { PageView } from "./page-view.js";
import { ListingSession, type ListingOutcome } from "./session.js";
import type { Sleep } from "./sleep.js";

export type SessionHandle = Readonly<{ id: string }>;

export type StartListingOptions = {
  maxPages?: number;
  maxRetries?: number;
};

export type SequencedEvent = ListingEvent & { seq: number };

export type ListingListener = (event: SequencedEvent) => void;

/**
 * Events after a cursor. `truncated` is set when events the caller had not
 * seen were already dropped from the log; `oldestSeq` is the first one kept.
 */
export type EventLogPage = {
  events: SequencedEvent[];
  lastSeq: number;
  oldestSeq: number;
  truncated: boolean;
};

export type ListingMode = "initial" | "load_more";

export type ListingStatus = {
  id: string;
  bucket: string;
  mode: ListingMode;
  state: ListingState;
  maxPages: number;
  stats: ListingRunStats;
  totalObjects: number;
  showLoadMore: boolean;
  lastError?: string;
};

export type ListingControllerDeps = {
  logger: FastifyBaseLogger;
  gatewayFactory?: (connection: ConnectionConfig, options: S3GatewayOptions) => GatewayFactory;
  sleep?: Sleep;
  defaults?: Partial<ListingDefaults>;
  createId?: () => string;
  now?: () => number;
};

type ListingEntry = {
  id: string;
  connection: ConnectionConfig;
  accumulator: ResultAccumulator;
  view: PageView;
  events: SequencedEvent[];
  nextSeq: number;
  listeners: Set<ListingListener>;
  mode: ListingMode;
  maxPages: number;
  maxAttempts: number;
  session: ListingSession;
  done: Promise<ListingOutcome>;
  lastTouchedAt: number;
};

const assertPositiveInteger = (name: string, value: number): void => {
  if (!Number.isInteger(value) || value <= 0) {
    throw new AppError(`${name} must be a positive integer`, 400, true);
  }
};

/**
 * Owns every listing started through the API: the accumulated records, the
 * page view over them, the ordered event log, and at most one active
 * {@link ListingSession} per listing.
 */
export class ListingController {
  private readonly listings = new Map<string, ListingEntry>();
  private readonly logger: FastifyBaseLogger;
  private readonly defaults: ListingDefaults;
  private readonly gatewayFactory: (
    connection: ConnectionConfig,
    options: S3GatewayOptions,
  ) => GatewayFactory;
  private readonly sleep?: Sleep;
  private readonly createId: () => string;
  private readonly now: () => number;

  constructor(deps: ListingControllerDeps) {
    this.logger = deps.logger;
    this.defaults = { ...listingDefaults, ...deps.defaults };
    this.gatewayFactory = deps.gatewayFactory ?? s3GatewayFactory;
    this.sleep = deps.sleep;
    this.createId = deps.createId ?? (() => crypto.randomUUID());
    this.now = deps.now ?? Date.now;
  }

  get size(): number {
    return this.listings.size;
  }

  startListing(connection: ConnectionConfig, options: StartListingOptions = {}): SessionHandle {
    const maxPages = options.maxPages ?? this.defaults.maxPages;
    const maxAttempts = options.maxRetries ?? this.defaults.maxAttempts;
    assertPositiveInteger("maxPages", maxPages);
    assertPositiveInteger("maxRetries", maxAttempts);

    const id = this.createId();
    const accumulator = new ResultAccumulator();
    const entry: ListingEntry = {
      id,
      connection,
      accumulator,
      view: new PageView(accumulator, this.defaults.viewPageSize),
      events: [],
      nextSeq: 1,
      listeners: new Set(),
      mode: "initial",
      maxPages,
      maxAttempts,
      lastTouchedAt: this.now(),
      ...this.launch(id, connection, "initial", maxPages, maxAttempts),
    };

    this.listings.set(id, entry);
    this.logger.info(
      { listingId: id, bucket: connection.bucket, endpoint: connection.endpoint, maxPages },
      "Listing started",
    );

    return { id };
  }

  /**
   * Re-enumerates from the beginning with a larger page budget. The new run's
   * complete result set replaces the accumulator once it completes.
   */
  loadMore(
    handle: SessionHandle,
    additionalPageBatch = this.defaults.maxPages,
  ): { id: string; maxPages: number } {
    const entry = this.getEntry(handle);
    assertPositiveInteger("additionalPageBatch", additionalPageBatch);

    if (!entry.session.isTerminal) {
      throw new AppError("A listing is already running for this connection", 409, true);
    }

    const maxPages = entry.maxPages + additionalPageBatch;
    const { session, done } = this.launch(
      entry.id,
      entry.connection,
      "load_more",
      maxPages,
      entry.maxAttempts,
    );

    entry.mode = "load_more";
    entry.maxPages = maxPages;
    entry.session = session;
    entry.done = done;

    this.logger.info({ listingId: entry.id, maxPages }, "Listing load more started");
    return { id: entry.id, maxPages };
  }

  async cancel(handle: SessionHandle): Promise<ListingState> {
    const entry = this.getEntry(handle);
    entry.session.cancel();
    await entry.done;
    return entry.session.state;
  }

  waitForIdle(handle: SessionHandle): Promise<ListingOutcome> {
    return this.getEntry(handle).done;
  }

  subscribe(handle: SessionHandle, listener: ListingListener): () => void {
    const entry = this.getEntry(handle);
    entry.listeners.add(listener);

    return () => {
      entry.listeners.delete(listener);
    };
  }

  eventsSince(handle: SessionHandle, afterSeq = 0): SequencedEvent[] {
    return this.getEntry(handle).events.filter((event) => event.seq > afterSeq);
  }

  eventLog(handle: SessionHandle, afterSeq = 0): EventLogPage {
    const entry = this.getEntry(handle);
    const events = entry.events.filter((event) => event.seq > afterSeq);
    const oldestSeq = entry.events.length ? entry.events[0].seq : entry.nextSeq;

    return {
      events,
      lastSeq: events.length ? events[events.length - 1].seq : afterSeq,
      oldestSeq,
      truncated: oldestSeq > afterSeq + 1,
    };
  }

  view(handle: SessionHandle): PageView {
    return this.getEntry(handle).view;
  }

  folderContents(handle: SessionHandle, path = ""): FolderContents {
    return getFolderContents(this.getEntry(handle).accumulator.all(), path);
  }

  status(handle: SessionHandle): ListingStatus {
    const entry = this.getEntry(handle);
    const stats = entry.session.stats;
    const state = entry.session.state;

    return {
      id: entry.id,
      bucket: entry.connection.bucket,
      mode: entry.mode,
      state,
      maxPages: entry.maxPages,
      stats,
      totalObjects: entry.accumulator.count(),
      showLoadMore: state === "completed" && shouldShowLoadMore(stats, this.defaults.maxPages),
      lastError: entry.session.lastErrorMessage,
    };
  }

  async close(handle: SessionHandle): Promise<void> {
    const entry = this.getEntry(handle);
    entry.session.cancel();
    await entry.done;
    this.forget(entry);
    this.logger.info({ listingId: entry.id }, "Listing closed");
  }

  /**
   * Forgets finished listings that nobody has read for `idleTtlMs`. Running
   * listings are kept whatever their age.
   */
  evictIdle(): number {
    const cutoff = this.now() - this.defaults.idleTtlMs;
    let evicted = 0;

    for (const entry of this.listings.values()) {
      if (entry.session.isTerminal && entry.lastTouchedAt <= cutoff) {
        this.forget(entry);
        evicted += 1;
      }
    }

    if (evicted) {
      this.logger.info({ evicted, remaining: this.listings.size }, "Idle listings evicted");
    }

    return evicted;
  }

  async closeAll(): Promise<void> {
    await Promise.all([...this.listings.keys()].map((id) => this.close({ id })));
  }

  private getEntry(handle: SessionHandle): ListingEntry {
    const entry = this.listings.get(handle.id);

    if (!entry) {
      throw new AppError("Listing not found", 404);
    }

    entry.lastTouchedAt = this.now();
    return entry;
  }

  private forget(entry: ListingEntry): void {
    entry.listeners.clear();
    entry.accumulator.clear();
    this.listings.delete(entry.id);
  }

  private launch(
    id: string,
    connection: ConnectionConfig,
    mode: ListingMode,
    maxPages: number,
    maxAttempts: number,
  ): { session: ListingSession; done: Promise<ListingOutcome> } {
    const session = new ListingSession(
      this.gatewayFactory(connection, { pageCapacity: this.defaults.pageCapacity }),
      {
        bucket: connection.bucket,
        maxPages,
        maxAttempts,
        backoffMs: this.defaults.backoffMs,
        cancelPollMs: this.defaults.cancelPollMs,
        pageCapacity: this.defaults.pageCapacity,
      },
      (event) => this.handleEvent(id, mode, event),
      {
        logger: this.logger.child({ listingId: id }),
        sleep: this.sleep,
      },
    );

    const done = session
      .run()
      .then((outcome) => {
        const entry = this.listings.get(id);
        if (entry) {
          entry.lastTouchedAt = this.now();
        }

        recordListingOutcome(outcome.status, outcome.stats, { bucket: connection.bucket, mode });
        sentryLog("info", "Listing finished", {
          bucket: connection.bucket,
          mode,
          status: outcome.status,
          pages: outcome.stats.pagesProcessed,
          objects: outcome.stats.totalObjectsFound,
        });
        return outcome;
      })
      .catch((error: unknown): ListingOutcome => {
        this.logger.error({ listingId: id, err: error }, "Listing session crashed");
        return {
          status: "failed",
          stats: session.stats,
          records: [],
        };
      });

    return { session, done };
  }

  private handleEvent(id: string, mode: ListingMode, event: ListingEvent): void {
    const entry = this.listings.get(id);

    // Closed listings drop whatever their cancelled session still reports.
    if (entry) {
      if (event.type === "page_ready" && mode === "initial") {
        entry.accumulator.append(event.records);
        entry.view.refresh();
      }

      if (event.type === "completed" && mode === "load_more") {
        entry.accumulator.replaceAll(event.allRecords);
        entry.view.refresh();
      }

      this.publish(entry, event);
    }
  }

  private publish(entry: ListingEntry, event: ListingEvent): void {
    const sequenced: SequencedEvent = { ...event, seq: entry.nextSeq };
    entry.nextSeq += 1;
    entry.events.push(sequenced);

    if (entry.events.length > this.defaults.eventLogLimit) {
      entry.events.splice(0, entry.events.length - this.defaults.eventLogLimit);
    }

    for (const listener of entry.listeners) {
      try {
        listener(sequenced);
      } catch (error) {
        this.logger.error(
          { listingId: entry.id, err: error, message: toErrorMessage(error) },
          "Listing listener failed",
        );
      }
    }
  }
}
