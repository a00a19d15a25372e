import Docker, { Network, NetworkInspectInfo } from "dockerode";
import { logger } from "./logger";
import { describeError, ManifestError } from "./errors";
import { StackManifest } from "./lib/types/manifest";
import { getNetworkName, ProjectLabel } from "./manifest";

// Logical network name -> Docker network
export type StackNetworks = Record<string, Network>;

/**
 * Retrieves Docker networks by name
 * @param docker Docker client instance
 * @param names Docker network names to look up
 * @returns Object mapping network names to their inspect info
 */
async function getExistingNetworks(
  docker: Docker,
  names: string[],
): Promise<Record<string, NetworkInspectInfo>> {
  const existingNetworks: NetworkInspectInfo[] = await docker.listNetworks({
    filters: { name: names },
  });

  // The name filter matches substrings, keep exact matches only
  return existingNetworks
    .filter((network) => names.includes(network.Name))
    .reduce(
      (obj: Record<string, NetworkInspectInfo>, network) => {
        obj[network.Name] = network;
        return obj;
      },
      {},
    );
}

async function createNetwork(
  docker: Docker,
  project: string,
  name: string,
): Promise<Network> {
  logger.info({ name }, "Creating docker network");
  return await docker.createNetwork({
    Name: name,
    CheckDuplicate: true,
    Labels: {
      [ProjectLabel]: project,
    },
  });
}

/**
 * Makes sure every network in the manifest exists. Shared networks must have
 * been created outside the stack; project networks are created when missing.
 */
export async function ensureNetworks(
  docker: Docker,
  manifest: StackManifest,
): Promise<StackNetworks> {
  const names = manifest.networks.map((n) => getNetworkName(manifest, n));
  const existingNetworks = await getExistingNetworks(docker, names);
  logger.debug(
    { existingNetworks: Object.keys(existingNetworks) },
    "Existing networks",
  );

  const networks: StackNetworks = {};
  for (const definition of manifest.networks) {
    const name = getNetworkName(manifest, definition);
    const existing = existingNetworks[name];
    if (existing) {
      logger.debug({ name }, "Re-using existing network");
      networks[definition.name] = docker.getNetwork(existing.Id);
    } else if (definition.external) {
      throw new ManifestError(
        `External network ${name} does not exist, create it with "docker network create ${name}"`,
      );
    } else {
      networks[definition.name] = await createNetwork(
        docker,
        manifest.project,
        name,
      );
    }
  }
  return networks;
}

/**
 * Removes the project's own networks. Shared networks are left alone.
 * @returns Names of the removed networks
 */
export async function removeStackNetworks(
  docker: Docker,
  manifest: StackManifest,
): Promise<string[]> {
  const existingNetworks: NetworkInspectInfo[] = await docker.listNetworks({
    filters: { label: [`${ProjectLabel}=${manifest.project}`] },
  });

  const removed: string[] = [];
  for (const info of existingNetworks) {
    try {
      logger.info({ name: info.Name, id: info.Id }, "Removing network");
      await docker.getNetwork(info.Id).remove({ force: true });
      removed.push(info.Name);
    } catch (error) {
      logger.error(
        { name: info.Name, error, ...describeError(error) },
        "Failed to remove network",
      );
      throw error;
    }
  }
  return removed;
}
