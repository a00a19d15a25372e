import { resolve } from "node:path";
import { AuctionsConfig } from "./config";
import { ManifestError } from "./errors";
import { StackManifest } from "./lib/types/manifest";
import { NetworkDefinition } from "./lib/types/network";
import { ServiceDefinition } from "./lib/types/service";

export const AppServiceName = "auctions";
export const DatabaseServiceName = "auctions_postgres";
export const CacheServiceName = "auctions_redis";

export const SharedNetworkName = "micro-network";
export const PrivateNetworkName = "auctions-private-network";
export const DatabaseVolumeName = "postgres_auctions_data";

// Port redis:alpine listens on inside its container
export const CacheContainerPort = 6379;

// Labels stamped on every resource the stack creates
export const ProjectLabel = "StackProject";
export const ServiceLabel = "StackService";

export const AppCommand = ["node", "--import", "tsx", "src/app/manage.ts"];

/**
 * Declares the auctions stack: the application, its database and its cache.
 */
export function createStackManifest(
  config: AuctionsConfig,
  projectDir: string = process.cwd(),
): StackManifest {
  const app: ServiceDefinition = {
    name: AppServiceName,
    containerName: "auctions_app",
    image: config.image,
    build: {
      context: ".",
      dockerfile: "Dockerfile",
      dependencyFiles: ["package.json", "package-lock.json"],
    },
    restartPolicy: "always",
    ports: [{ containerPort: config.appPort, hostPort: config.appPort }],
    volumes: [{ kind: "bind", source: ".", target: "/auctions" }],
    envFile: config.envFile,
    networks: [SharedNetworkName, PrivateNetworkName],
    dependsOn: [DatabaseServiceName, CacheServiceName],
    command: [...AppCommand, "start"],
    workingDir: "/auctions",
  };

  const database: ServiceDefinition = {
    name: DatabaseServiceName,
    containerName: "auctions_postgres",
    image: "postgres:16",
    restartPolicy: "always",
    ports: [{ containerPort: 5432, hostPort: config.databaseHostPort }],
    volumes: [
      {
        kind: "volume",
        source: DatabaseVolumeName,
        target: "/var/lib/postgresql/data/",
      },
    ],
    envFile: config.envFile,
    networks: [PrivateNetworkName],
    dependsOn: [],
    healthcheck: {
      test: ["CMD-SHELL", 'pg_isready -U "$POSTGRES_USER"'],
      intervalMs: 2_000,
      timeoutMs: 5_000,
      retries: 15,
    },
  };

  const cache: ServiceDefinition = {
    name: CacheServiceName,
    containerName: "auctions_redis",
    image: "redis:alpine",
    restartPolicy: "always",
    ports: [
      { containerPort: CacheContainerPort, hostPort: config.cacheHostPort },
    ],
    volumes: [],
    networks: [PrivateNetworkName],
    dependsOn: [],
    healthcheck: {
      test: ["CMD", "redis-cli", "ping"],
      intervalMs: 2_000,
      timeoutMs: 5_000,
      retries: 15,
    },
  };

  return {
    project: config.project,
    projectDir: resolve(projectDir),
    services: [app, database, cache],
    volumes: [{ name: DatabaseVolumeName }],
    networks: [
      { name: SharedNetworkName, external: true },
      { name: PrivateNetworkName, external: false },
    ],
  };
}

/**
 * Docker name of a project-owned resource. External networks keep their own
 * name since they are shared across projects.
 */
export function getResourceName(project: string, name: string): string {
  return `${project}_${name}`;
}

export function getNetworkName(
  manifest: StackManifest,
  network: NetworkDefinition,
): string {
  return network.external
    ? network.name
    : getResourceName(manifest.project, network.name);
}

export function getService(
  manifest: StackManifest,
  name: string,
): ServiceDefinition {
  const service = manifest.services.find((s) => s.name === name);
  if (!service) {
    throw new ManifestError(`Unknown service: ${name}`);
  }
  return service;
}
