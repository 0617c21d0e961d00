import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { AppError } from "./errors.js";
import type { ListingController, SessionHandle } from "./listing/controller.js";
import { groupByFolder, parentFolder, type FolderContents } from "./listing/folders.js";
import { formatSize } from "./listing/format.js";
import { sentryCountMetric } from "./observability.js";

const startListingSchema = z.object({
  endpoint: z.string().url(),
  region: z.string().min(1).optional(),
  bucket: z.string().min(1),
  prefix: z.string().optional(),
  accessKeyId: z.string().min(1),
  secretAccessKey: z.string().min(1),
  maxPages: z.coerce.number().int().positive().optional(),
  maxRetries: z.coerce.number().int().positive().optional(),
});

const listingParamsSchema = z.object({
  id: z.string().min(1),
});

const eventsQuerySchema = z.object({
  after: z.coerce.number().int().min(0).default(0),
});

const objectsQuerySchema = z.object({
  page: z.coerce.number().int().min(1).optional(),
  pageSize: z.coerce.number().int().min(1).max(10000).optional(),
  filter: z.string().optional(),
  view: z.enum(["flat", "folders"]).default("flat"),
});

const foldersQuerySchema = z.object({
  path: z.string().default(""),
});

const loadMoreSchema = z.object({
  pages: z.coerce.number().int().positive().optional(),
});

const parseOrThrow = <T extends z.ZodTypeAny>(
  schema: T,
  value: unknown,
  message: string,
): z.infer<T> => {
  const parsed = schema.safeParse(value);

  if (!parsed.success) {
    throw new AppError(message, 400, true, parsed.error.flatten().fieldErrors);
  }

  return parsed.data;
};

const toHandle = (params: unknown): SessionHandle => {
  return parseOrThrow(listingParamsSchema, params, "Invalid listing id");
};

const presentFolders = (contents: FolderContents) => {
  return {
    path: contents.path,
    parent: contents.path ? parentFolder(contents.path) : null,
    folders: contents.folders.map((folder) => ({
      ...folder,
      sizeFormatted: formatSize(folder.totalSize),
    })),
    files: contents.files.map((file) => ({
      name: file.name,
      ...file.record,
      sizeFormatted: formatSize(file.record.size),
    })),
  };
};

export const registerListingRoutes = (app: FastifyInstance, listings: ListingController): void => {
  app.get("/api/health", async () => {
    return { status: "ok" };
  });

  app.post("/api/listings", async (request, reply) => {
    const body = parseOrThrow(startListingSchema, request.body, "Invalid listing request");

    const handle = listings.startListing(
      {
        endpoint: body.endpoint,
        region: body.region,
        bucket: body.bucket,
        prefix: body.prefix,
        credentials: {
          accessKeyId: body.accessKeyId,
          secretAccessKey: body.secretAccessKey,
        },
      },
      {
        maxPages: body.maxPages,
        maxRetries: body.maxRetries,
      },
    );

    sentryCountMetric("listing.started", 1, { bucket: body.bucket });
    return reply.code(201).send({ id: handle.id });
  });

  app.get("/api/listings/:id", async (request) => {
    return listings.status(toHandle(request.params));
  });

  app.get("/api/listings/:id/events", async (request) => {
    const handle = toHandle(request.params);
    const { after } = parseOrThrow(eventsQuerySchema, request.query, "Invalid events query");

    return listings.eventLog(handle, after);
  });

  app.get("/api/listings/:id/objects", async (request) => {
    const handle = toHandle(request.params);
    const query = parseOrThrow(objectsQuerySchema, request.query, "Invalid objects query");
    const view = listings.view(handle);

    if (query.pageSize !== undefined) {
      view.setPageSize(query.pageSize);
    }

    if (query.filter !== undefined) {
      view.setFilter(query.filter);
    }

    if (query.page !== undefined) {
      view.goToPage(query.page);
    }

    const snapshot = view.snapshot();

    if (query.view === "folders") {
      return {
        ...snapshot,
        groups: presentFolders(groupByFolder(snapshot.records)),
      };
    }

    return snapshot;
  });

  app.get("/api/listings/:id/folders", async (request) => {
    const handle = toHandle(request.params);
    const { path } = parseOrThrow(foldersQuerySchema, request.query, "Invalid folder query");

    return presentFolders(listings.folderContents(handle, path));
  });

  app.post("/api/listings/:id/load-more", async (request, reply) => {
    const handle = toHandle(request.params);
    const { pages } = parseOrThrow(loadMoreSchema, request.body ?? {}, "Invalid load more request");
    const result = listings.loadMore(handle, pages);

    sentryCountMetric("listing.load_more", 1, { max_pages: result.maxPages });
    return reply.code(202).send(result);
  });

  app.post("/api/listings/:id/cancel", async (request) => {
    const state = await listings.cancel(toHandle(request.params));
    return { state };
  });

  app.delete("/api/listings/:id", async (request, reply) => {
    await listings.close(toHandle(request.params));
    return reply.code(204).send();
  });
};
