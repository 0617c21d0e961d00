import { config } from "./config.js";
import { initSentry } from "./sentry.server.js";
import { buildApp } from "./app.js";
import { captureServerError, sentryLog, shutdownObservability } from "./observability.js";

initSentry();

const { app } = await buildApp();

const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
  app.log.info({ signal }, "Shutting down");

  try {
    await app.close();
    await shutdownObservability();
    process.exit(0);
  } catch (error) {
    app.log.error(error);
    process.exit(1);
  }
};

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, (received) => {
    void shutdown(received);
  });
}

const start = async () => {
  try {
    await app.listen({
      port: config.PORT,
      host: config.HOST,
    });
    sentryLog("info", "Fastify server started", {
      port: config.PORT,
      environment: config.NODE_ENV,
    });
  } catch (error) {
    app.log.error(error);
    captureServerError(error);
    process.exit(1);
  }
};

await start();
