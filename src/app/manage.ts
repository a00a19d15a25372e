import { Server } from "node:http";
import { logger, setLogLevel } from "../logger";
import { loadConfig } from "../config";
import { describeError, ExitCode, exitCodeFor } from "../errors";
import { RedisCache } from "./cache";
import { createCommands, isCommandName } from "./commands";
import { createSql, PostgresStore } from "./store";

/**
 * Entry point of the service's management commands, run inside the
 * application container: `manage.ts <command> [args...]`
 */
async function main(argv: string[]): Promise<ExitCode> {
  const [name, ...args] = argv;
  const config = loadConfig();
  setLogLevel(config.logLevel);

  const sql = createSql(config.database);
  const cache = new RedisCache(config.redisUrl);
  let server: Server | undefined;

  const close = async () => {
    await sql.end({ timeout: 5 });
    await cache.close();
  };

  const commands = createCommands({
    config,
    store: new PostgresStore(sql),
    cache,
    onListening: (listening) => {
      server = listening;
    },
  });

  if (!name || !isCommandName(commands, name)) {
    logger.error(
      { command: name, commands: Object.keys(commands) },
      "Unknown command",
    );
    await close();
    return ExitCode.Usage;
  }

  try {
    const code = await commands[name](args);
    const running = server;
    if (running) {
      const shutdown = (signal: string) => {
        logger.info({ signal }, "Shutting down");
        running.close(() => {
          close().catch((error: unknown) =>
            logger.error(describeError(error), "Failed to close connections"),
          );
        });
      };
      process.once("SIGTERM", shutdown);
      process.once("SIGINT", shutdown);
      return code;
    }
    await close();
    return code;
  } catch (error) {
    await close();
    throw error;
  }
}

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logger.error({ error, ...describeError(error) }, "Command failed");
    process.exitCode = exitCodeFor(error);
  });
