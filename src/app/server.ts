import express, {
  type Express,
  type NextFunction,
  type Request,
  type Response,
} from "express";
import { Server } from "node:http";
import { logger } from "../logger";
import { describeError } from "../errors";
import { Cache } from "./cache";
import {
  FilterParams,
  FilterQuery,
  InvalidFilterError,
  parseAuctionFilter,
} from "./filters";
import { Auction, isAuction } from "./models";
import { InvalidPageError, pageLink, resolvePage } from "./pagination";
import { sendError } from "./responses";
import { AuctionStore, DatabaseHealth } from "./store";

export const AuctionCacheTtlSeconds = 60;

const NotFound = "Not found.";

const UuidPattern =
  /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

export interface ServiceDependencies {
  readonly store: AuctionStore;
  readonly database: DatabaseHealth;
  readonly cache: Cache;
}

type AsyncHandler = (req: Request, res: Response) => Promise<unknown>;

function handle(handler: AsyncHandler) {
  return (req: Request, res: Response, next: NextFunction) => {
    handler(req, res).catch(next);
  };
}

function queryString(req: Request, key: string): string | undefined {
  const value = req.query[key];
  return typeof value === "string" ? value : undefined;
}

function filterQuery(req: Request): FilterQuery {
  const query: FilterQuery = {};
  for (const key of FilterParams) {
    query[key] = queryString(req, key);
  }
  return query;
}

async function checkStatus(check: () => Promise<void>): Promise<"ok" | "unavailable"> {
  try {
    await check();
    return "ok";
  } catch (error) {
    logger.warn(describeError(error), "Health check failed");
    return "unavailable";
  }
}

async function readCachedAuction(
  cache: Cache,
  key: string,
): Promise<Auction | undefined> {
  try {
    const cached = await cache.get(key);
    if (cached === null) {
      return undefined;
    }
    const auction: unknown = JSON.parse(cached);
    if (!isAuction(auction)) {
      logger.warn({ key }, "Ignoring malformed cache entry");
      return undefined;
    }
    return auction;
  } catch (error) {
    logger.warn({ key, ...describeError(error) }, "Cache read failed");
    return undefined;
  }
}

async function writeCachedAuction(cache: Cache, key: string, auction: Auction) {
  try {
    await cache.set(key, JSON.stringify(auction), AuctionCacheTtlSeconds);
  } catch (error) {
    logger.warn({ key, ...describeError(error) }, "Cache write failed");
  }
}

export function createApp({ store, database, cache }: ServiceDependencies): Express {
  const app = express();
  app.disable("x-powered-by");

  app.get(
    "/health",
    handle(async (_req, res) => {
      const [databaseStatus, cacheStatus] = await Promise.all([
        checkStatus(() => database.ping()),
        checkStatus(() => cache.ping()),
      ]);
      const healthy = databaseStatus === "ok" && cacheStatus === "ok";
      res
        .status(healthy ? 200 : 503)
        .json({ database: databaseStatus, cache: cacheStatus });
    }),
  );

  app.get(
    "/api/auctions",
    handle(async (req, res) => {
      const { filter, params } = parseAuctionFilter(filterQuery(req));

      const count = await store.countAuctions(filter);
      const page = resolvePage(
        {
          page: queryString(req, "page"),
          pageSize: queryString(req, "page_size"),
        },
        count,
      );
      const results = await store.listAuctions(
        filter,
        page.pageSize,
        page.offset,
      );
      res.json({
        count,
        next:
          page.page < page.pageCount
            ? pageLink(req.path, page.page + 1, page.pageSize, params)
            : null,
        previous:
          page.page > 1
            ? pageLink(req.path, page.page - 1, page.pageSize, params)
            : null,
        results,
      });
    }),
  );

  app.get(
    "/api/auctions/:id",
    handle(async (req, res) => {
      const { id } = req.params;
      if (!UuidPattern.test(id)) {
        sendError(res, 404, NotFound);
        return;
      }
      const key = `auction:${id}`;
      const cached = await readCachedAuction(cache, key);
      if (cached) {
        res.json(cached);
        return;
      }
      const auction = await store.getAuction(id);
      if (!auction) {
        sendError(res, 404, NotFound);
        return;
      }
      await writeCachedAuction(cache, key, auction);
      res.json(auction);
    }),
  );

  app.get(
    "/api/categories",
    handle(async (_req, res) => {
      res.json((await store.listCategories()).map((c) => c.name));
    }),
  );

  app.get(
    "/api/tags",
    handle(async (_req, res) => {
      res.json((await store.listTags()).map((t) => t.name));
    }),
  );

  app.use((_req: Request, res: Response) => {
    sendError(res, 404, NotFound);
  });

  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (error instanceof InvalidFilterError) {
      sendError(res, 400, error.errors);
      return;
    }
    if (error instanceof InvalidPageError) {
      sendError(res, 404, error.message);
      return;
    }
    logger.error(
      { method: req.method, path: req.path, ...describeError(error) },
      "Request failed",
    );
    sendError(res, 500, "A server error occurred.");
  });

  return app;
}

/**
 * Serves the API until the process is stopped
 */
export function listen(app: Express, port: number, host = "0.0.0.0"): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, host, () => {
      logger.info({ host, port }, "Listening");
      resolve(server);
    });
    server.once("error", reject);
  });
}
