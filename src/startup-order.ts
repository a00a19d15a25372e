import { ManifestError } from "./errors";
import { StackManifest } from "./lib/types/manifest";
import { ServiceDefinition } from "./lib/types/service";

/**
 * Orders services so that every service comes after the services it depends
 * on. Services with no ordering constraint between them keep manifest order.
 */
export function resolveStartupOrder(
  manifest: StackManifest,
): ServiceDefinition[] {
  const byName = new Map(manifest.services.map((s) => [s.name, s]));
  for (const service of manifest.services) {
    for (const dependency of service.dependsOn) {
      if (!byName.has(dependency)) {
        throw new ManifestError(
          `Service ${service.name} depends on unknown service ${dependency}`,
        );
      }
    }
  }

  const ordered: ServiceDefinition[] = [];
  const done = new Set<string>();
  const visiting = new Set<string>();

  const visit = (service: ServiceDefinition, path: string[]) => {
    if (done.has(service.name)) {
      return;
    }
    if (visiting.has(service.name)) {
      throw new ManifestError(
        `Dependency cycle: ${[...path, service.name].join(" -> ")}`,
      );
    }
    visiting.add(service.name);
    for (const dependency of service.dependsOn) {
      const target = byName.get(dependency);
      if (target) {
        visit(target, [...path, service.name]);
      }
    }
    visiting.delete(service.name);
    done.add(service.name);
    ordered.push(service);
  };

  for (const service of manifest.services) {
    visit(service, []);
  }
  return ordered;
}
