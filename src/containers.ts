import Docker, {
  Container,
  ContainerCreateOptions,
  ContainerInfo,
  PortBinding,
} from "dockerode";
import { createHash } from "node:crypto";
import { resolve } from "node:path";
import { logger } from "./logger";
import { readEnvFile } from "./config";
import { describeError, ManifestError } from "./errors";
import { StackManifest } from "./lib/types/manifest";
import { RestartPolicy, ServiceDefinition } from "./lib/types/service";
import { VolumeMount } from "./lib/types/volume";
import { getResourceName, ProjectLabel, ServiceLabel } from "./manifest";
import { StackNetworks } from "./networks";
import { ReadinessCheck, waitUntilReady, WaitOptions } from "./readiness";

export const ConfigHashLabel = "ConfigHash";
export const OneOffLabel = "StackOneOff";

const NanosPerMs = 1_000_000;

// Container Name -> Container Info
type ExistingContainers = Record<string, ContainerInfo>;

export interface ContainerOverrides {
  readonly name?: string;
  readonly command?: string[];
  readonly restartPolicy?: RestartPolicy;
  readonly publishPorts?: boolean;
  readonly autoRemove?: boolean;
  // Allocate a terminal, which merges stderr into stdout
  readonly tty?: boolean;
}

/**
 * Get the containers the project has created, keyed by container name
 */
async function getExistingContainers(
  docker: Docker,
  project: string,
): Promise<ExistingContainers> {
  const containers = await docker.listContainers({
    all: true,
    filters: { label: [`${ProjectLabel}=${project}`] },
  });
  return containers.reduce((obj: ExistingContainers, container) => {
    const [name = container.Id] = container.Names;
    obj[name.replace(/^\//, "")] = container; // remove leading slash in name
    return obj;
  }, {});
}

function getHash(item: string): string {
  return createHash("md5").update(item).digest("hex");
}

function getBind(manifest: StackManifest, mount: VolumeMount): string {
  switch (mount.kind) {
    case "volume":
      if (!manifest.volumes.some((v) => v.name === mount.source)) {
        throw new ManifestError(`Unknown volume: ${mount.source}`);
      }
      return `${getResourceName(manifest.project, mount.source)}:${mount.target}`;
    case "bind":
      return `${resolve(manifest.projectDir, mount.source)}:${mount.target}${
        mount.readOnly ? ":ro" : ""
      }`;
  }
}

/**
 * Reads the service's env file into Docker's KEY=value form, with inline
 * environment entries taking precedence
 */
export function getServiceEnv(
  manifest: StackManifest,
  service: ServiceDefinition,
): string[] {
  const fromFile = service.envFile
    ? readEnvFile(resolve(manifest.projectDir, service.envFile))
    : {};
  return Object.entries({ ...fromFile, ...service.environment }).map(
    ([key, value]) => `${key}=${value}`,
  );
}

/**
 * Translates a service definition into Docker's container create options
 */
export function createContainerOptions(
  manifest: StackManifest,
  service: ServiceDefinition,
  networks: StackNetworks,
  env: string[],
  overrides: ContainerOverrides = {},
): ContainerCreateOptions {
  const [primaryName] = service.networks;
  const primary = primaryName === undefined ? undefined : networks[primaryName];
  if (primaryName !== undefined && !primary) {
    throw new ManifestError(
      `Service ${service.name} uses unknown network ${primaryName}`,
    );
  }

  const publishPorts = overrides.publishPorts ?? true;
  const portBindings: Record<string, PortBinding[]> = {};
  const exposedPorts: Record<string, object> = {};
  for (const port of service.ports) {
    const key = `${port.containerPort}/${port.protocol ?? "tcp"}`;
    exposedPorts[key] = {};
    if (publishPorts && port.hostPort !== undefined) {
      portBindings[key] = [{ HostPort: String(port.hostPort) }];
    }
  }

  const { healthcheck } = service;
  const configHash = getHash(JSON.stringify({ service, env }));
  logger.trace({ configHash, service: service.name }, "Created config hash");

  return {
    name: overrides.name ?? service.containerName,
    Image: service.image,
    Env: env,
    Cmd: overrides.command ?? service.command,
    WorkingDir: service.workingDir,
    Tty: overrides.tty ?? false,
    ExposedPorts: exposedPorts,
    Healthcheck: healthcheck && {
      Test: healthcheck.test,
      Interval: healthcheck.intervalMs * NanosPerMs,
      Timeout: healthcheck.timeoutMs * NanosPerMs,
      Retries: healthcheck.retries,
    },
    HostConfig: {
      RestartPolicy: { Name: overrides.restartPolicy ?? service.restartPolicy },
      PortBindings: portBindings,
      Binds: service.volumes.map((mount) => getBind(manifest, mount)),
      NetworkMode: primary?.id,
      AutoRemove: overrides.autoRemove ?? false,
    },
    Labels: {
      [ProjectLabel]: manifest.project,
      [ServiceLabel]: service.name,
      [ConfigHashLabel]: configHash,
      [OneOffLabel]: String(overrides.name !== undefined),
    },
    NetworkingConfig: primary && {
      EndpointsConfig: {
        [primary.id]: {
          Aliases: [service.containerName, service.name],
        },
      },
    },
  };
}

/**
 * Creates a container for the service and joins it to every network after the
 * primary one. The container is not started.
 */
export async function createServiceContainer(
  docker: Docker,
  manifest: StackManifest,
  service: ServiceDefinition,
  networks: StackNetworks,
  overrides: ContainerOverrides = {},
): Promise<Container> {
  const options = createContainerOptions(
    manifest,
    service,
    networks,
    getServiceEnv(manifest, service),
    overrides,
  );
  const container = await docker.createContainer(options);
  logger.debug(
    { service: service.name, id: container.id },
    "Created container",
  );

  try {
    for (const name of service.networks.slice(1)) {
      const network = networks[name];
      if (!network) {
        throw new ManifestError(
          `Service ${service.name} uses unknown network ${name}`,
        );
      }
      await network.connect({
        Container: container.id,
        EndpointConfig: { Aliases: [service.containerName, service.name] },
      });
      logger.debug(
        { service: service.name, network: name },
        "Connected container to network",
      );
    }
  } catch (error) {
    await discardContainer(container, service);
    throw error;
  }
  return container;
}

/**
 * Force-removes a container that never got going. A failed removal is logged
 * and does not replace the error the caller is about to raise.
 */
export async function discardContainer(
  container: Container,
  service: ServiceDefinition,
): Promise<void> {
  try {
    await container.remove({ force: true });
    logger.debug(
      { service: service.name, id: container.id },
      "Removed unfinished container",
    );
  } catch (error) {
    logger.error(
      { service: service.name, id: container.id, ...describeError(error) },
      "Failed to remove unfinished container",
    );
  }
}

/**
 * Starts the service's long-running container. A running container created
 * from the same configuration and the image's current build is reused;
 * anything else under the same name is replaced.
 */
export async function launchServiceContainer(
  docker: Docker,
  manifest: StackManifest,
  service: ServiceDefinition,
  networks: StackNetworks,
): Promise<Container> {
  const existingContainers = await getExistingContainers(
    docker,
    manifest.project,
  );
  const existingInfo = existingContainers[service.containerName];
  if (existingInfo !== undefined) {
    const existing = docker.getContainer(existingInfo.Id);
    const expectedHash = createContainerOptions(
      manifest,
      service,
      networks,
      getServiceEnv(manifest, service),
    ).Labels?.[ConfigHashLabel];
    const { Id: imageId } = await docker.getImage(service.image).inspect();
    if (
      existingInfo.Labels[ConfigHashLabel] === expectedHash &&
      existingInfo.ImageID === imageId &&
      existingInfo.State === "running"
    ) {
      logger.debug(
        { service: service.name },
        "Container config matches existing config",
      );
      return existing;
    }
    logger.debug(
      {
        service: service.name,
        state: existingInfo.State,
        image: existingInfo.ImageID,
      },
      "Removing existing container",
    );
    await existing.remove({ force: true });
  }

  const container = await createServiceContainer(
    docker,
    manifest,
    service,
    networks,
  );
  await container.start();
  logger.info({ service: service.name, id: container.id }, "Started container");
  return container;
}

/**
 * Force-removes every container the project created
 * @returns Names of the removed containers
 */
export async function removeServiceContainers(
  docker: Docker,
  manifest: StackManifest,
): Promise<string[]> {
  const existingContainers = await getExistingContainers(
    docker,
    manifest.project,
  );
  const removed: string[] = [];
  for (const [name, info] of Object.entries(existingContainers)) {
    try {
      logger.info({ name, state: info.State }, "Removing container");
      await docker.getContainer(info.Id).remove({ force: true });
      removed.push(name);
    } catch (error) {
      logger.error(
        { name, error, ...describeError(error) },
        "Failed to remove container",
      );
      throw error;
    }
  }
  return removed;
}

/**
 * Check that passes once the container's healthcheck reports healthy, or once
 * it is running when the service declares no healthcheck
 */
export function containerHealthCheck(
  container: Container,
  service: ServiceDefinition,
): ReadinessCheck {
  return {
    name: service.name,
    async check() {
      const { State: state } = await container.inspect();
      if (service.healthcheck) {
        return state.Health?.Status === "healthy";
      }
      return state.Running;
    },
  };
}

export async function waitForHealthy(
  container: Container,
  service: ServiceDefinition,
  options: WaitOptions,
): Promise<number> {
  return waitUntilReady(containerHealthCheck(container, service), options);
}
