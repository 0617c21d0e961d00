import * as Sentry from "@sentry/node";
import type { FastifyInstance, FastifyRequest } from "fastify";
import { config } from "./config.js";
import type { ListingRunStats } from "./types.js";

type MetricAttributes = Record<string, string | number | boolean>;

const requestStartTimes = new WeakMap<FastifyRequest, number>();

const getRouteName = (request: FastifyRequest): string => {
  return request.routeOptions.url || request.url;
};

const SENSITIVE_KEYS = new Set([
  "secretaccesskey",
  "accesskeyid",
  "password",
  "authorization",
  "cookie",
]);

export const sanitizeAttributes = (value: unknown): unknown => {
  if (!value || typeof value !== "object") {
    return value;
  }

  if (Array.isArray(value)) {
    return value.map(sanitizeAttributes);
  }

  const output: Record<string, unknown> = {};

  for (const [key, entryValue] of Object.entries(value)) {
    if (SENSITIVE_KEYS.has(key.toLowerCase())) {
      output[key] = "[REDACTED]";
      continue;
    }

    output[key] = sanitizeAttributes(entryValue);
  }

  return output;
};

// Sentry metric attributes only take scalars; nested values are dropped.
export const toMetricAttributes = (attributes?: Record<string, unknown>): MetricAttributes => {
  const output: MetricAttributes = {};

  for (const [key, value] of Object.entries(attributes ?? {})) {
    if (SENSITIVE_KEYS.has(key.toLowerCase())) {
      output[key] = "[REDACTED]";
      continue;
    }

    if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
      output[key] = value;
    }
  }

  return output;
};

const sentryEnabled = (): boolean => Boolean(config.SENTRY_DSN);
const sentryMetricsEnabled = (): boolean => sentryEnabled() && config.SENTRY_ENABLE_METRICS;

type SentryLogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

export const sentryLog = (
  level: SentryLogLevel,
  message: string,
  attributes?: Record<string, unknown>,
): void => {
  if (!sentryEnabled() || !config.SENTRY_ENABLE_LOGS) {
    return;
  }

  Sentry.logger[level](message, toMetricAttributes(attributes));
};

export const sentryCountMetric = (
  name: string,
  value: number,
  attributes?: Record<string, unknown>,
): void => {
  if (!sentryMetricsEnabled()) {
    return;
  }

  Sentry.metrics.count(name, value, {
    attributes: toMetricAttributes(attributes),
  });
};

export const sentryDistributionMetric = (
  name: string,
  value: number,
  unit: "none" | "millisecond" = "none",
  attributes?: Record<string, unknown>,
): void => {
  if (!sentryMetricsEnabled()) {
    return;
  }

  Sentry.metrics.distribution(name, value, {
    unit,
    attributes: toMetricAttributes(attributes),
  });
};

export const recordListingOutcome = (
  status: "completed" | "cancelled" | "failed",
  stats: ListingRunStats,
  attributes?: Record<string, unknown>,
): void => {
  const outcomeAttributes = {
    ...attributes,
    status,
    stopped_at_limit: stats.stoppedAtLimit,
  };

  sentryCountMetric(`listing.${status}`, 1, outcomeAttributes);
  sentryDistributionMetric("listing.pages", stats.pagesProcessed, "none", outcomeAttributes);
  sentryDistributionMetric("listing.objects", stats.totalObjectsFound, "none", outcomeAttributes);
};

export const registerObservabilityHooks = (app: FastifyInstance): void => {
  app.addHook("onRequest", (request, _, done) => {
    requestStartTimes.set(request, Date.now());

    if (sentryEnabled() && config.SENTRY_ENABLE_LOGS) {
      Sentry.getIsolationScope().setAttributes({
        route: getRouteName(request),
        method: request.method,
      });
    }

    sentryCountMetric("http.requests.total", 1, {
      method: request.method,
      route: getRouteName(request),
    });

    done();
  });

  app.addHook("onResponse", (request, reply, done) => {
    if (!sentryEnabled()) {
      done();
      return;
    }

    const startedAt = requestStartTimes.get(request) ?? Date.now();
    const durationMs = Date.now() - startedAt;
    const attributes = {
      method: request.method,
      route: getRouteName(request),
      status_code: reply.statusCode,
    };

    sentryLog("info", "API request completed", {
      ...attributes,
      duration_ms: durationMs,
    });
    sentryDistributionMetric("http.server.duration", durationMs, "millisecond", attributes);

    if (reply.statusCode >= 500) {
      sentryCountMetric("http.requests.errors", 1, attributes);
    }

    done();
  });
};

export const captureServerError = (error: unknown, request?: FastifyRequest): void => {
  if (!sentryEnabled()) {
    return;
  }

  Sentry.withScope((scope) => {
    if (request) {
      scope.setTags({
        method: request.method,
        route: getRouteName(request),
      });
      scope.setContext("request", {
        method: request.method,
        url: request.url,
        query: sanitizeAttributes(request.query),
      });
    }

    Sentry.captureException(error);
  });
};

export const shutdownObservability = async (): Promise<void> => {
  if (!sentryEnabled()) {
    return;
  }

  await Sentry.flush(2000);
};
