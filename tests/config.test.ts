import { describe, it, expect } from "vitest";
import { config, envSchema, listingDefaults } from "../src/server/config.js";

describe("config", () => {
  describe("config values", () => {
    it("should have valid NODE_ENV", () => {
      expect(["development", "production", "test"]).toContain(config.NODE_ENV);
    });

    it("should have boolean S3_FORCE_PATH_STYLE", () => {
      expect(typeof config.S3_FORCE_PATH_STYLE).toBe("boolean");
    });

    it("should expose listing defaults from the configuration", () => {
      expect(listingDefaults).toEqual({
        maxPages: config.LISTING_MAX_PAGES,
        maxAttempts: config.LISTING_MAX_RETRIES,
        backoffMs: config.LISTING_RETRY_BACKOFF_MS,
        cancelPollMs: config.LISTING_CANCEL_POLL_MS,
        pageCapacity: config.LISTING_PAGE_CAPACITY,
        viewPageSize: config.VIEW_PAGE_SIZE,
        eventLogLimit: config.LISTING_EVENT_LOG_LIMIT,
        idleTtlMs: config.LISTING_IDLE_TTL_SECONDS * 1000,
      });
    });
  });

  describe("envSchema", () => {
    it("should have default values", () => {
      const parsed = envSchema.parse({});

      expect(parsed.PORT).toBe(3000);
      expect(parsed.S3_DEFAULT_REGION).toBe("us-east-1");
      expect(parsed.LISTING_MAX_PAGES).toBe(10);
      expect(parsed.LISTING_MAX_RETRIES).toBe(3);
      expect(parsed.LISTING_RETRY_BACKOFF_MS).toBe(2000);
      expect(parsed.LISTING_CANCEL_POLL_MS).toBe(100);
      expect(parsed.LISTING_PAGE_CAPACITY).toBe(1000);
      expect(parsed.VIEW_PAGE_SIZE).toBe(1000);
      expect(parsed.LISTING_IDLE_TTL_SECONDS).toBe(3600);
      expect(parsed.LISTING_EVICTION_INTERVAL_SECONDS).toBe(60);
    });

    it("should coerce numbers and booleans from strings", () => {
      const parsed = envSchema.parse({
        LISTING_MAX_PAGES: "25",
        S3_FORCE_PATH_STYLE: "off",
        SENTRY_ENABLE_LOGS: "yes",
      });

      expect(parsed.LISTING_MAX_PAGES).toBe(25);
      expect(parsed.S3_FORCE_PATH_STYLE).toBe(false);
      expect(parsed.SENTRY_ENABLE_LOGS).toBe(true);
    });

    it("should reject a page capacity above what the store serves", () => {
      expect(envSchema.safeParse({ LISTING_PAGE_CAPACITY: "5000" }).success).toBe(false);
    });

    it("should reject a zero page budget", () => {
      expect(envSchema.safeParse({ LISTING_MAX_PAGES: "0" }).success).toBe(false);
    });
  });
});
