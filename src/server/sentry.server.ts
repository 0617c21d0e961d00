import * as Sentry from "@sentry/node";
import { config } from "./config.js";

export const initSentry = (): boolean => {
  if (!config.SENTRY_DSN) {
    return false;
  }

  Sentry.init({
    dsn: config.SENTRY_DSN,
    environment: config.SENTRY_ENVIRONMENT || config.NODE_ENV,
    release: config.SENTRY_RELEASE,
    tracesSampleRate: config.SENTRY_TRACES_SAMPLE_RATE,
    enableLogs: config.SENTRY_ENABLE_LOGS,
    integrations: [
      Sentry.consoleLoggingIntegration({
        levels: ["warn", "error"],
      }),
    ],
  });

  return true;
};
