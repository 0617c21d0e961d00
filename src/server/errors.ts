import type { StoreErrorKind } from "./types.js";

export class AppError extends Error {
  statusCode: number;
  exposeDetails: boolean;
  details?: unknown;

  constructor(message: string, statusCode = 500, exposeDetails = false, details?: unknown) {
    super(message);
    this.statusCode = statusCode;
    this.exposeDetails = exposeDetails;
    this.details = details;
  }
}

export const toErrorMessage = (error: unknown): string => {
  if (error instanceof Error) {
    return error.message;
  }

  return "Unknown error";
};

export abstract class StoreError extends Error {
  abstract readonly kind: StoreErrorKind;
}

export class ConnectivityError extends StoreError {
  readonly kind = "connectivity";
  name = "ConnectivityError";
}

export class AuthError extends StoreError {
  readonly kind = "auth";
  name = "AuthError";
}

export class PermissionError extends StoreError {
  readonly kind = "permission";
  name = "PermissionError";
}

export class NotFoundError extends StoreError {
  readonly kind = "not_found";
  name = "NotFoundError";
}

export class UnknownStoreError extends StoreError {
  readonly kind = "unknown";
  name = "UnknownStoreError";
  originalMessage: string;

  constructor(originalMessage: string) {
    super(`S3 error: ${originalMessage}`);
    this.originalMessage = originalMessage;
  }
}

const AUTH_CODES = new Set([
  "CredentialsProviderError",
  "InvalidAccessKeyId",
  "SignatureDoesNotMatch",
  "InvalidToken",
  "ExpiredToken",
  "Unauthorized",
]);

const CONNECTIVITY_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ENOTFOUND",
  "ETIMEDOUT",
  "EAI_AGAIN",
  "EHOSTUNREACH",
  "TimeoutError",
  "NetworkingError",
  "RequestTimeout",
]);

const NOT_FOUND_CODES = new Set(["NoSuchBucket", "NotFound"]);

const PERMISSION_CODES = new Set(["AccessDenied", "Forbidden", "AllAccessDisabled"]);

type SdkErrorShape = {
  name?: unknown;
  code?: unknown;
  Code?: unknown;
  message?: unknown;
  $metadata?: {
    httpStatusCode?: unknown;
  };
};

const readString = (value: unknown): string | undefined => {
  return typeof value === "string" && value ? value : undefined;
};

export const getStoreErrorKind = (error: unknown): StoreErrorKind => {
  if (error instanceof StoreError) {
    return error.kind;
  }

  if (!error || typeof error !== "object") {
    return "unknown";
  }

  const candidate: SdkErrorShape = error;
  const codes = [candidate.Code, candidate.code, candidate.name]
    .map(readString)
    .filter((code): code is string => Boolean(code));
  const statusCode = candidate.$metadata?.httpStatusCode;

  if (codes.some((code) => CONNECTIVITY_CODES.has(code))) {
    return "connectivity";
  }

  if (codes.some((code) => AUTH_CODES.has(code)) || statusCode === 401) {
    return "auth";
  }

  if (codes.some((code) => NOT_FOUND_CODES.has(code)) || statusCode === 404) {
    return "not_found";
  }

  if (codes.some((code) => PERMISSION_CODES.has(code)) || statusCode === 403) {
    return "permission";
  }

  return "unknown";
};

export const mapStoreError = (error: unknown, bucket: string): StoreError => {
  if (error instanceof StoreError) {
    return error;
  }

  switch (getStoreErrorKind(error)) {
    case "connectivity":
      return new ConnectivityError("Cannot connect to the endpoint. Please check the URL.");
    case "auth":
      return new AuthError("Invalid credentials. Please check your access key and secret key.");
    case "not_found":
      return new NotFoundError(`Bucket '${bucket}' does not exist.`);
    case "permission":
      return new PermissionError(
        "Access denied. Please check your credentials and permissions.",
      );
    case "unknown":
      return new UnknownStoreError(toErrorMessage(error));
  }
};
