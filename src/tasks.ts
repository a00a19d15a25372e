import Docker from "dockerode";
import { randomBytes } from "node:crypto";
import { chmod, mkdir, stat, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { Readable } from "node:stream";
import { logger } from "./logger";
import { AuctionsError, ExitCode, UnknownTaskError } from "./errors";
import { createServiceContainer, discardContainer } from "./containers";
import { ensureServiceImage } from "./image";
import { AppCommand, AppServiceName, getService } from "./manifest";
import { Stack } from "./orchestrator";

export type TaskTarget =
  | "makemigrations"
  | "migrate"
  | "lint"
  | "format"
  | "test"
  | "coverage_report"
  | "createsuperuser"
  | "install_pre_commit"
  | "create_auctions";

export type TaskDefinition =
  | {
      readonly kind: "container";
      readonly description: string;
      readonly command: string[];
    }
  | {
      readonly kind: "host";
      readonly description: string;
    };

export const Tasks: Record<TaskTarget, TaskDefinition> = {
  makemigrations: {
    kind: "container",
    description: "Create an empty, timestamped SQL migration file",
    command: [...AppCommand, "makemigrations"],
  },
  migrate: {
    kind: "container",
    description: "Apply pending database migrations",
    command: [...AppCommand, "migrate"],
  },
  lint: {
    kind: "container",
    description: "Lint the code with eslint",
    command: ["npx", "eslint", "--ext", ".ts", "src"],
  },
  format: {
    kind: "container",
    description: "Format the code with prettier",
    command: ["npx", "prettier", "--write", "src"],
  },
  test: {
    kind: "container",
    description: "Run the tests in parallel",
    command: ["npx", "jest", "--maxWorkers=50%"],
  },
  coverage_report: {
    kind: "container",
    description: "Run the tests with coverage and write text and html reports",
    command: [
      "npx",
      "jest",
      "--coverage",
      "--coverageReporters=text",
      "--coverageReporters=html",
    ],
  },
  createsuperuser: {
    kind: "container",
    description: "Create the admin/super user configured in .env",
    command: [...AppCommand, "createsuperuser"],
  },
  install_pre_commit: {
    kind: "host",
    description: "Install the git pre-commit hook on the local system",
  },
  create_auctions: {
    kind: "container",
    description: "Generate 201 auction records",
    command: [...AppCommand, "create_auctions"],
  },
};

export const TaskAliases: Record<string, TaskTarget> = {
  black: "format",
};

export const PreCommitHook = `#!/bin/sh
# Installed by auctions-stack install_pre_commit
set -e
npx tsx src/cli.ts lint
npx tsx src/cli.ts test
`;

export interface TaskIO {
  readonly stdout: NodeJS.WritableStream;
}

interface ContainerWaitResult {
  readonly StatusCode: number;
  readonly Error?: { readonly Message?: string } | null;
}

function isTaskTarget(name: string): name is TaskTarget {
  return Object.hasOwn(Tasks, name);
}

export function resolveTarget(name: string): TaskTarget {
  if (Object.hasOwn(TaskAliases, name)) {
    return TaskAliases[name];
  }
  if (isTaskTarget(name)) {
    return name;
  }
  throw new UnknownTaskError(name);
}

/**
 * Runs developer commands inside a fresh, self-removing application
 * container, after the services the application depends on are healthy. A
 * task's exit code is the exit code of the command it wraps.
 */
export class TaskRunner {
  constructor(
    private readonly docker: Docker,
    private readonly stack: Stack,
    private readonly io: TaskIO = process,
  ) {}

  async run(name: string, args: string[] = []): Promise<number> {
    const target = resolveTarget(name);
    const task = Tasks[target];
    logger.info({ target, args }, task.description);
    switch (task.kind) {
      case "host":
        return this.installPreCommit();
      case "container":
        return this.runInContainer(target, [...task.command, ...args]);
    }
  }

  private async runInContainer(
    target: TaskTarget,
    command: string[],
  ): Promise<number> {
    const { manifest } = this.stack;
    const app = getService(manifest, AppServiceName);
    const { networks } = await this.stack.up({
      services: app.dependsOn,
      wait: true,
    });
    await ensureServiceImage(this.docker, manifest, app);

    const container = await createServiceContainer(
      this.docker,
      manifest,
      app,
      networks,
      {
        name: `${manifest.project}_${app.name}_run_${randomBytes(4).toString("hex")}`,
        command,
        restartPolicy: "no",
        publishPorts: false,
        autoRemove: true,
        tty: true,
      },
    );

    let stream: NodeJS.ReadWriteStream | undefined;
    let result: ContainerWaitResult;
    try {
      stream = await container.attach({
        stream: true,
        stdout: true,
        stderr: true,
      });
      stream.pipe(this.io.stdout, { end: false });

      // Waiting starts before the container does so a fast exit is not
      // missed after auto-removal
      [result] = await Promise.all([
        container.wait({ condition: "next-exit" }),
        container.start(),
      ]);
    } catch (error) {
      if (stream instanceof Readable) {
        stream.destroy();
      }
      await discardContainer(container, app);
      throw error;
    }

    if (result.Error?.Message) {
      logger.error({ target, error: result.Error.Message }, "Task errored");
    }
    logger.info({ target, exitCode: result.StatusCode }, "Task finished");
    return result.StatusCode;
  }

  private async installPreCommit(): Promise<number> {
    const gitDir = join(this.stack.manifest.projectDir, ".git");
    const isRepository = await stat(gitDir).then(
      (s) => s.isDirectory(),
      () => false,
    );
    if (!isRepository) {
      throw new AuctionsError(
        `${this.stack.manifest.projectDir} is not a git repository`,
      );
    }
    const hooksDir = join(gitDir, "hooks");
    await mkdir(hooksDir, { recursive: true });
    const hook = join(hooksDir, "pre-commit");
    await writeFile(hook, PreCommitHook);
    await chmod(hook, 0o755);
    logger.info({ hook }, "Installed pre-commit hook");
    return ExitCode.Success;
  }
}
