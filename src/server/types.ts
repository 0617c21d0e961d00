export type SessionCredentials = {
  accessKeyId: string;
  secretAccessKey: string;
};

export type ConnectionConfig = {
  endpoint: string;
  region?: string;
  bucket: string;
  prefix?: string;
  credentials: SessionCredentials;
};

export type ObjectRecord = Readonly<{
  key: string;
  size: number;
  lastModified: string;
  etag: string;
  storageClass: string;
}>;

export type ListedPage = {
  records: ObjectRecord[];
  nextToken?: string;
  hasMore: boolean;
};

export type StoreErrorKind = "connectivity" | "auth" | "permission" | "not_found" | "unknown";

export type ListingState =
  | "idle"
  | "connecting"
  | "listing"
  | "retrying"
  | "completed"
  | "cancelled"
  | "failed";

export type ListingRunStats = {
  maxPages: number;
  pagesProcessed: number;
  totalObjectsFound: number;
  stoppedAtLimit: boolean;
  attemptNumber: number;
  maxAttempts: number;
  pageCapacity: number;
  fullPages: number;
};

export type PageReadyEvent = {
  type: "page_ready";
  records: readonly ObjectRecord[];
  pageNumber: number;
  recordsInPage: number;
  totalSoFar: number;
  isLastPage: boolean;
};

export type RetryAttemptEvent = {
  type: "retry_attempt";
  attempt: number;
  maxAttempts: number;
  errorMessage: string;
};

export type MaxRetriesExceededEvent = {
  type: "max_retries_exceeded";
  totalAttempts: number;
  finalError: string;
  errorKind: StoreErrorKind;
};

export type CompletedEvent = {
  type: "completed";
  allRecords: readonly ObjectRecord[];
  pagesProcessed: number;
  totalFound: number;
  stoppedAtLimit: boolean;
  pageCapacity: number;
  fullPages: number;
};

export type ProgressMessageEvent = {
  type: "progress";
  text: string;
};

export type ListingEvent =
  | PageReadyEvent
  | RetryAttemptEvent
  | MaxRetriesExceededEvent
  | CompletedEvent
  | ProgressMessageEvent;

export type ListingObserver = (event: ListingEvent) => void;

export type ApiErrorShape = {
  error: string;
  details?: unknown;
};
