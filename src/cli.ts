#!/usr/bin/env node
import Docker from "dockerode";
import { logger, setLogLevel } from "./logger";
import { loadConfig } from "./config";
import { describeError, ExitCode, exitCodeFor } from "./errors";
import { createStackManifest } from "./manifest";
import { Stack } from "./orchestrator";
import { TaskAliases, TaskRunner, Tasks } from "./tasks";

export function usage(): string {
  const lines = [
    "Usage: auctions-stack <command>",
    "",
    "Commands:",
    "  up [--build]        Start the database, the cache and the application",
    "  down [--volumes]    Remove the stack's containers and private network",
    "  run <target>        Run a task target (same as giving the target directly)",
    "  help                Show this help message",
    "",
    "Task targets:",
    ...Object.entries(Tasks).map(
      ([target, task]) => `  ${target.padEnd(20)}${task.description}`,
    ),
    ...Object.entries(TaskAliases).map(
      ([alias, target]) => `  ${alias.padEnd(20)}Alias for ${target}`,
    ),
  ];
  return lines.join("\n");
}

/**
 * Runs one CLI invocation
 * @returns The process exit code
 */
export async function main(argv: string[]): Promise<number> {
  const [command, ...rest] = argv;
  if (!command || command === "help" || command === "--help") {
    console.log(usage());
    return command ? ExitCode.Success : ExitCode.Usage;
  }

  const config = loadConfig();
  setLogLevel(config.logLevel);
  const manifest = createStackManifest(config);
  const docker = new Docker();
  const stack = new Stack(docker, manifest, config.readiness);

  switch (command) {
    case "up":
      await stack.up({ build: rest.includes("--build") });
      return ExitCode.Success;
    case "down":
      await stack.down({ volumes: rest.includes("--volumes") });
      return ExitCode.Success;
    case "run": {
      const [target, ...args] = rest;
      if (!target) {
        console.error(usage());
        return ExitCode.Usage;
      }
      return new TaskRunner(docker, stack).run(target, args);
    }
    default:
      return new TaskRunner(docker, stack).run(command, rest);
  }
}

if (require.main === module) {
  main(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      logger.error({ error, ...describeError(error) }, "Command failed");
      process.exitCode = exitCodeFor(error);
    });
}
