import type { FastifyBaseLogger } from "fastify";
import { mapStoreError, type StoreError } from "../errors.js";
import { sentryCountMetric } from "../observability.js";
import type { GatewayFactory, ObjectStoreGateway } from "../s3.js";
import type {
  ListingEvent,
  ListingObserver,
  ListingRunStats,
  ListingState,
  ObjectRecord,
} from "../types.js";
import { abortable, isAbortError, sleep as defaultSleep, type Sleep } from "./sleep.js";

export type ListingSessionOptions = {
  bucket: string;
  maxPages: number;
  maxAttempts: number;
  backoffMs: number;
  cancelPollMs: number;
  pageCapacity: number;
};

export type ListingSessionDeps = {
  logger: FastifyBaseLogger;
  sleep?: Sleep;
};

export type ListingOutcomeStatus = "completed" | "cancelled" | "failed";

export type ListingOutcome = {
  status: ListingOutcomeStatus;
  stats: ListingRunStats;
  records: readonly ObjectRecord[];
  error?: StoreError;
};

type PageLoopResult = "exhausted" | "limit" | "cancelled";

const TERMINAL_STATES: ReadonlySet<ListingState> = new Set(["completed", "cancelled", "failed"]);

const assertPositiveInteger = (name: string, value: number): void => {
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`Invalid ${name}: ${value}`);
  }
};

const formatSeconds = (ms: number): string => {
  const seconds = ms / 1000;
  return Number.isInteger(seconds) ? `${seconds}s` : `${seconds.toFixed(1)}s`;
};

/**
 * One bounded enumeration of a bucket.
 *
 * Pages are pulled from the gateway one at a time and surfaced to the observer
 * before the next page is requested. Failures consume one attempt of a fixed
 * budget; between attempts the session waits `backoffMs`, checking for
 * cancellation every `cancelPollMs`. A retry resumes from the continuation
 * token of the last accepted page.
 *
 * Once {@link ListingSession.cancel} is called the observer receives nothing
 * further and {@link ListingSession.run} resolves with status `cancelled`,
 * without waiting for a gateway call that is still in flight.
 */
export class ListingSession {
  private currentState: ListingState = "idle";
  private cancelRequested = false;
  private readonly abortController = new AbortController();
  private running?: Promise<ListingOutcome>;

  private attempt = 1;
  private lastError?: string;
  private readonly records: ObjectRecord[] = [];
  private continuationToken?: string;
  private pagesProcessed = 0;
  private pagesEmitted = 0;
  private fullPages = 0;
  private stoppedAtLimit = false;

  private readonly sleep: Sleep;
  private readonly logger: FastifyBaseLogger;

  constructor(
    private readonly openGateway: GatewayFactory,
    private readonly options: ListingSessionOptions,
    private readonly observer: ListingObserver,
    deps: ListingSessionDeps,
  ) {
    assertPositiveInteger("maxPages", options.maxPages);
    assertPositiveInteger("maxAttempts", options.maxAttempts);
    assertPositiveInteger("cancelPollMs", options.cancelPollMs);
    assertPositiveInteger("pageCapacity", options.pageCapacity);

    if (!Number.isFinite(options.backoffMs) || options.backoffMs < 0) {
      throw new Error(`Invalid backoffMs: ${options.backoffMs}`);
    }

    this.sleep = deps.sleep ?? defaultSleep;
    this.logger = deps.logger.child({ bucket: options.bucket });
  }

  get state(): ListingState {
    return this.currentState;
  }

  get isTerminal(): boolean {
    return TERMINAL_STATES.has(this.currentState);
  }

  get isCancelRequested(): boolean {
    return this.cancelRequested;
  }

  get lastErrorMessage(): string | undefined {
    return this.lastError;
  }

  get stats(): ListingRunStats {
    return {
      maxPages: this.options.maxPages,
      pagesProcessed: this.pagesProcessed,
      totalObjectsFound: this.records.length,
      stoppedAtLimit: this.stoppedAtLimit,
      attemptNumber: this.attempt,
      maxAttempts: this.options.maxAttempts,
      pageCapacity: this.options.pageCapacity,
      fullPages: this.fullPages,
    };
  }

  /** Starts the run on a later microtask, so no event is emitted synchronously. */
  run(): Promise<ListingOutcome> {
    this.running ??= Promise.resolve().then(() => this.execute());
    return this.running;
  }

  cancel(): void {
    if (this.isTerminal || this.cancelRequested) {
      return;
    }

    this.cancelRequested = true;
    this.abortController.abort();
    this.logger.info({ state: this.currentState }, "Listing cancellation requested");
  }

  private async execute(): Promise<ListingOutcome> {
    while (true) {
      if (this.cancelRequested) {
        return this.finish("cancelled");
      }

      let gateway: ObjectStoreGateway | undefined;

      try {
        this.currentState = "connecting";
        this.emit({ type: "progress", text: "Connecting to S3..." });
        gateway = await abortable(this.openGateway(), this.abortController.signal);

        const result = await this.listPages(gateway);

        if (result === "cancelled") {
          return this.finish("cancelled");
        }

        return this.complete();
      } catch (error) {
        if (this.cancelRequested) {
          return this.finish("cancelled");
        }

        const storeError = mapStoreError(error, this.options.bucket);
        this.lastError = storeError.message;
        this.logger.warn(
          {
            attempt: this.attempt,
            maxAttempts: this.options.maxAttempts,
            kind: storeError.kind,
            err: storeError,
          },
          "Listing attempt failed",
        );

        if (this.attempt >= this.options.maxAttempts) {
          this.emit({
            type: "max_retries_exceeded",
            totalAttempts: this.attempt,
            finalError: storeError.message,
            errorKind: storeError.kind,
          });
          return this.finish("failed", storeError);
        }

        this.currentState = "retrying";
        this.emit({
          type: "retry_attempt",
          attempt: this.attempt,
          maxAttempts: this.options.maxAttempts,
          errorMessage: storeError.message,
        });
        this.emit({
          type: "progress",
          text: `Retrying in ${formatSeconds(this.options.backoffMs)} (attempt ${this.attempt + 1}/${this.options.maxAttempts})...`,
        });
        sentryCountMetric("listing.retry", 1, {
          bucket: this.options.bucket,
          attempt: this.attempt,
          kind: storeError.kind,
        });

        if (!(await this.waitForBackoff())) {
          return this.finish("cancelled");
        }

        this.attempt += 1;
      } finally {
        gateway?.close?.();
      }
    }
  }

  private async listPages(gateway: ObjectStoreGateway): Promise<PageLoopResult> {
    this.currentState = "listing";
    this.emit({ type: "progress", text: "Listing bucket contents..." });

    while (this.pagesProcessed < this.options.maxPages) {
      if (this.cancelRequested) {
        return "cancelled";
      }

      const signal = this.abortController.signal;
      const page = await abortable(gateway.fetchPage(this.continuationToken, signal), signal);

      if (this.cancelRequested) {
        return "cancelled";
      }

      this.pagesProcessed += 1;
      this.continuationToken = page.nextToken;
      this.records.push(...page.records);

      if (page.records.length === this.options.pageCapacity) {
        this.fullPages += 1;
      }

      const reachedLimit = this.pagesProcessed >= this.options.maxPages;

      if (page.records.length > 0) {
        this.pagesEmitted += 1;
        this.emit({
          type: "page_ready",
          records: [...page.records],
          pageNumber: this.pagesEmitted,
          recordsInPage: page.records.length,
          totalSoFar: this.records.length,
          isLastPage: !page.hasMore || reachedLimit,
        });
        this.emit({
          type: "progress",
          text: `Loaded page ${this.pagesEmitted} (${this.records.length} objects so far)`,
        });
      }

      if (!page.hasMore) {
        return "exhausted";
      }

      if (reachedLimit) {
        this.stoppedAtLimit = true;
        this.logger.info(
          { pagesProcessed: this.pagesProcessed, totalObjectsFound: this.records.length },
          "Listing stopped at page limit",
        );
        return "limit";
      }
    }

    return "limit";
  }

  private async waitForBackoff(): Promise<boolean> {
    let remaining = this.options.backoffMs;

    while (remaining > 0) {
      if (this.cancelRequested) {
        return false;
      }

      const tick = Math.min(this.options.cancelPollMs, remaining);

      try {
        await this.sleep(tick, this.abortController.signal);
      } catch (error) {
        if (isAbortError(error)) {
          return false;
        }

        throw error;
      }

      remaining -= tick;
    }

    return !this.cancelRequested;
  }

  private complete(): ListingOutcome {
    const stats = this.stats;
    const records = [...this.records];

    this.emit({ type: "progress", text: `Found ${records.length} objects` });
    this.emit({
      type: "completed",
      allRecords: records,
      pagesProcessed: stats.pagesProcessed,
      totalFound: stats.totalObjectsFound,
      stoppedAtLimit: stats.stoppedAtLimit,
      pageCapacity: stats.pageCapacity,
      fullPages: stats.fullPages,
    });

    return this.finish("completed");
  }

  private finish(status: ListingOutcomeStatus, error?: StoreError): ListingOutcome {
    this.currentState = status;

    const stats = this.stats;
    this.logger.info({ status, ...stats }, "Listing session finished");

    return {
      status,
      stats,
      records: [...this.records],
      error,
    };
  }

  private emit(event: ListingEvent): void {
    if (this.cancelRequested) {
      return;
    }

    try {
      this.observer(event);
    } catch (error) {
      this.logger.error({ err: error, eventType: event.type }, "Listing observer failed");
    }
  }
}
