import type { FastifyInstance } from "fastify";
import { SimpleIntervalJob, Task } from "toad-scheduler";
import { config } from "../config.js";
import type { ListingController } from "./controller.js";

export const LISTING_EVICTION_JOB_ID = "listing-eviction";

export const registerListingEviction = (app: FastifyInstance, listings: ListingController): void => {
  const task = new Task(
    LISTING_EVICTION_JOB_ID,
    () => {
      listings.evictIdle();
    },
    (error) => {
      app.log.error({ error }, "Listing eviction task failed");
    },
  );

  const job = new SimpleIntervalJob(
    { seconds: config.LISTING_EVICTION_INTERVAL_SECONDS, runImmediately: false },
    task,
    { id: LISTING_EVICTION_JOB_ID },
  );

  app.scheduler.addSimpleIntervalJob(job);
  app.log.info(
    { intervalSeconds: config.LISTING_EVICTION_INTERVAL_SECONDS, idleTtlSeconds: config.LISTING_IDLE_TTL_SECONDS },
    "Listing eviction scheduler registered",
  );
};
