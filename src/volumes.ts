import Docker, { VolumeInspectInfo } from "dockerode";
import { logger } from "./logger";
import { StackManifest } from "./lib/types/manifest";
import { getResourceName, ProjectLabel } from "./manifest";

async function listStackVolumes(
  docker: Docker,
  project: string,
): Promise<VolumeInspectInfo[]> {
  const { Volumes: volumes } = await docker.listVolumes({
    filters: { label: [`${ProjectLabel}=${project}`] },
  });
  return volumes ?? [];
}

/**
 * Creates the manifest's named volumes that do not exist yet
 * @returns Docker names of the volumes that were created
 */
export async function ensureVolumes(
  docker: Docker,
  manifest: StackManifest,
): Promise<string[]> {
  const existing = new Set(
    (await listStackVolumes(docker, manifest.project)).map((v) => v.Name),
  );
  const created: string[] = [];
  for (const volume of manifest.volumes) {
    const name = getResourceName(manifest.project, volume.name);
    if (existing.has(name)) {
      logger.debug({ name }, "Re-using existing volume");
      continue;
    }
    logger.info({ name }, "Creating docker volume");
    await docker.createVolume({
      Name: name,
      Labels: { [ProjectLabel]: manifest.project },
    });
    created.push(name);
  }
  return created;
}

/**
 * Removes the project's named volumes and the data in them
 * @returns Docker names of the removed volumes
 */
export async function removeStackVolumes(
  docker: Docker,
  manifest: StackManifest,
): Promise<string[]> {
  const removed: string[] = [];
  for (const volume of await listStackVolumes(docker, manifest.project)) {
    logger.warn({ name: volume.Name }, "Removing volume");
    await docker.getVolume(volume.Name).remove();
    removed.push(volume.Name);
  }
  return removed;
}
