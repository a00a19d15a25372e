import { Server } from "node:http";
import { logger } from "../logger";
import { AuctionsConfig } from "../config";
import { AuctionsError, ExitCode } from "../errors";
import { ReadinessCheck, waitUntilReady } from "../readiness";
import { Cache } from "./cache";
import { createAuctions } from "./create-auctions";
import { makeMigration, MigrationsDir, runMigrations } from "./migrate";
import { createApp, listen } from "./server";
import { AuctionStore, DatabaseHealth, MigrationStore, UserStore } from "./store";
import { createSuperuser } from "./superuser";

export type ServiceStore = AuctionStore &
  UserStore &
  MigrationStore &
  DatabaseHealth;

export interface CommandDependencies {
  readonly config: AuctionsConfig;
  readonly store: ServiceStore;
  readonly cache: Cache;
  readonly migrationsDir?: string;
  readonly sleep?: (ms: number) => Promise<unknown>;
  // Called with the running server so the caller can shut it down
  readonly onListening?: (server: Server) => void;
}

export type Command = (args: string[]) => Promise<ExitCode>;

export type CommandName =
  | "wait_for_db"
  | "migrate"
  | "makemigrations"
  | "create_auctions"
  | "createsuperuser"
  | "serve"
  | "start";

export function databaseCheck(database: DatabaseHealth): ReadinessCheck {
  return {
    name: "database",
    async check() {
      await database.ping();
      return true;
    },
  };
}

/**
 * The service's management commands. `start` is the container's startup
 * gate: it waits for the database, migrates, then serves, and stops at the
 * first step that fails.
 */
export function createCommands(
  deps: CommandDependencies,
): Record<CommandName, Command> {
  const migrationsDir = deps.migrationsDir ?? MigrationsDir;

  const waitForDb = async () => {
    logger.info("Waiting for database");
    await waitUntilReady(databaseCheck(deps.store), {
      ...deps.config.readiness,
      exitCode: ExitCode.DatabaseUnavailable,
      sleep: deps.sleep,
    });
    return ExitCode.Success;
  };

  const migrate = async () => {
    await runMigrations(deps.store, migrationsDir);
    return ExitCode.Success;
  };

  const serve = async () => {
    const app = createApp({
      store: deps.store,
      database: deps.store,
      cache: deps.cache,
    });
    const server = await listen(app, deps.config.appPort);
    deps.onListening?.(server);
    return ExitCode.Success;
  };

  return {
    wait_for_db: waitForDb,
    migrate,
    makemigrations: async ([name]) => {
      if (!name) {
        throw new AuctionsError("Usage: makemigrations <name>");
      }
      await makeMigration(name, migrationsDir);
      return ExitCode.Success;
    },
    create_auctions: async () => {
      const result = await createAuctions(deps.store);
      logger.info(
        result,
        `Successfully created ${result.auctions} auctions with relationships and random choices`,
      );
      return ExitCode.Success;
    },
    createsuperuser: async () => {
      await createSuperuser(deps.store, deps.config.superuser);
      return ExitCode.Success;
    },
    serve,
    start: async () => {
      await waitForDb();
      await migrate();
      return serve();
    },
  };
}

export function isCommandName(
  commands: Record<CommandName, Command>,
  name: string,
): name is CommandName {
  return Object.hasOwn(commands, name);
}
