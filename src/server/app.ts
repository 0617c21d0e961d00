import Fastify, { type FastifyInstance, type FastifyServerOptions } from "fastify";
import cors from "@fastify/cors";
import fastifySchedule from "@fastify/schedule";
import { AppError, toErrorMessage } from "./errors.js";
import { ListingController, type ListingControllerDeps } from "./listing/controller.js";
import { registerListingEviction } from "./listing/eviction.js";
import { captureServerError, registerObservabilityHooks, sentryCountMetric } from "./observability.js";
import { registerListingRoutes } from "./routes.js";
import type { ApiErrorShape } from "./types.js";

export type BuildAppOptions = {
  logger?: FastifyServerOptions["logger"];
  listing?: Omit<ListingControllerDeps, "logger">;
};

export type BuiltApp = {
  app: FastifyInstance;
  listings: ListingController;
};

const readStatusCode = (error: unknown): number => {
  if (
    error &&
    typeof error === "object" &&
    "statusCode" in error &&
    typeof error.statusCode === "number"
  ) {
    return error.statusCode;
  }

  return 500;
};

export const buildApp = async (options: BuildAppOptions = {}): Promise<BuiltApp> => {
  const app = Fastify({ logger: options.logger ?? true });

  await app.register(cors, {
    origin: true,
  });
  registerObservabilityHooks(app);

  const listings = new ListingController({
    ...options.listing,
    logger: app.log,
  });

  registerListingRoutes(app, listings);

  await app.register(fastifySchedule);
  registerListingEviction(app, listings);

  app.addHook("onClose", async () => {
    await listings.closeAll();
  });

  app.setErrorHandler((error: unknown, request, reply) => {
    if (error instanceof AppError) {
      if (error.statusCode >= 500) {
        request.log.error({ err: error }, "Request failed");
        captureServerError(error, request);
      }

      const body: ApiErrorShape = {
        error: error.message,
        details: error.exposeDetails ? (error.details ?? error.message) : undefined,
      };
      return reply.code(error.statusCode).send(body);
    }

    const statusCode = readStatusCode(error);

    if (statusCode >= 500) {
      request.log.error({ err: error }, "Request failed");
      captureServerError(error, request);
      sentryCountMetric("http.request.errors", 1, {
        method: request.method,
        route: request.routeOptions.url || request.url,
        status_code: statusCode,
      });
    }

    const body: ApiErrorShape = {
      error: statusCode === 500 ? "Internal server error" : toErrorMessage(error),
    };
    return reply.code(statusCode).send(body);
  });

  return { app, listings };
};
