import Docker from "dockerode";
import { createHash } from "node:crypto";
import { existsSync, readdirSync, readFileSync, statSync } from "node:fs";
import { join, relative, resolve } from "node:path";
import { logger } from "./logger";
import { AuctionsError, isNotFound } from "./errors";
import { StackManifest } from "./lib/types/manifest";
import { BuildDefinition, ServiceDefinition } from "./lib/types/service";
import { ProjectLabel, ServiceLabel } from "./manifest";

export const DependencyFingerprintLabel = "DependencyFingerprint";

// Never sent to the daemon as part of the build context
const ExcludedFromContext = new Set(["node_modules", "dist", "coverage", ".git"]);

interface BuildProgressEvent {
  readonly stream?: string;
  readonly error?: string;
}

/**
 * Hashes the dependency declaration files of a build context. Source files do
 * not take part, so editing them leaves the fingerprint unchanged.
 */
export function dependencyFingerprint(
  contextDir: string,
  files: string[],
): string {
  const hash = createHash("sha256");
  for (const file of [...files].sort()) {
    const path = join(contextDir, file);
    hash.update(file);
    hash.update("\0");
    if (existsSync(path)) {
      hash.update(readFileSync(path));
    }
    hash.update("\0");
  }
  return hash.digest("hex");
}

/**
 * Lists the files sent to the daemon as the build context
 */
export function listBuildContext(contextDir: string): string[] {
  const files: string[] = [];
  const walk = (dir: string) => {
    for (const entry of readdirSync(dir)) {
      if (ExcludedFromContext.has(entry) || entry === ".env") {
        continue;
      }
      const path = join(dir, entry);
      if (statSync(path).isDirectory()) {
        walk(path);
      } else {
        files.push(relative(contextDir, path));
      }
    }
  };
  walk(contextDir);
  return files.sort();
}

async function getImageFingerprint(
  docker: Docker,
  image: string,
): Promise<string | undefined> {
  try {
    const info = await docker.getImage(image).inspect();
    return info.Config.Labels?.[DependencyFingerprintLabel] ?? "";
  } catch (error) {
    if (isNotFound(error)) {
      logger.debug({ image }, "Image not found");
      return undefined;
    }
    throw error;
  }
}

async function buildImage(
  docker: Docker,
  manifest: StackManifest,
  service: ServiceDefinition,
  build: BuildDefinition,
  fingerprint: string,
) {
  const context = resolve(manifest.projectDir, build.context);
  logger.info({ image: service.image, context }, "Building image");
  const stream = await docker.buildImage(
    { context, src: listBuildContext(context) },
    {
      t: service.image,
      dockerfile: build.dockerfile,
      labels: {
        [ProjectLabel]: manifest.project,
        [ServiceLabel]: service.name,
        [DependencyFingerprintLabel]: fingerprint,
      },
    },
  );

  await new Promise<void>((resolvePromise, rejectPromise) => {
    docker.modem.followProgress(
      stream,
      (error: Error | null, output: BuildProgressEvent[]) => {
        const failed = output?.find((event) => event.error !== undefined);
        if (error) {
          rejectPromise(error);
        } else if (failed) {
          rejectPromise(
            new AuctionsError(`Image build failed: ${failed.error}`),
          );
        } else {
          resolvePromise();
        }
      },
      (event: BuildProgressEvent) => {
        if (event.stream) {
          logger.debug({ image: service.image }, event.stream.trimEnd());
        }
      },
    );
  });
  logger.info({ image: service.image }, "Built image");
}

/**
 * Builds a service's image unless an image with the same dependency
 * fingerprint is already present. Layer caching inside the build keeps the
 * dependency install step when only source files changed.
 * @returns true when a build ran
 */
export async function ensureServiceImage(
  docker: Docker,
  manifest: StackManifest,
  service: ServiceDefinition,
  options: { force?: boolean } = {},
): Promise<boolean> {
  const { build } = service;
  if (!build) {
    if ((await getImageFingerprint(docker, service.image)) === undefined) {
      logger.info({ image: service.image }, "Pulling image");
      await pullImage(docker, service.image);
    }
    return false;
  }

  const fingerprint = dependencyFingerprint(
    resolve(manifest.projectDir, build.context),
    build.dependencyFiles,
  );
  const existing = await getImageFingerprint(docker, service.image);
  if (!options.force && existing === fingerprint) {
    logger.debug({ image: service.image, fingerprint }, "Image is current");
    return false;
  }
  await buildImage(docker, manifest, service, build, fingerprint);
  return true;
}

async function pullImage(docker: Docker, image: string) {
  const stream = await docker.pull(image);
  await new Promise<void>((resolvePromise, rejectPromise) => {
    docker.modem.followProgress(stream, (error: Error | null) =>
      error ? rejectPromise(error) : resolvePromise(),
    );
  });
}
