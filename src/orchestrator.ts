import Docker, { Container } from "dockerode";
import { Mutex } from "async-mutex";
import { logger } from "./logger";
import { ReadinessConfig } from "./config";
import { describeError } from "./errors";
import { StackManifest } from "./lib/types/manifest";
import { ServiceDefinition } from "./lib/types/service";
import {
  launchServiceContainer,
  removeServiceContainers,
  waitForHealthy,
} from "./containers";
import { ensureServiceImage } from "./image";
import { getService } from "./manifest";
import { ensureNetworks, removeStackNetworks, StackNetworks } from "./networks";
import { resolveStartupOrder } from "./startup-order";
import { ensureVolumes, removeStackVolumes } from "./volumes";

export interface UpOptions {
  // Rebuild images even when their dependency fingerprint is unchanged
  readonly build?: boolean;
  // Only bring up these services and what they depend on
  readonly services?: string[];
  // Also wait for every launched service to become healthy
  readonly wait?: boolean;
}

export interface DownOptions {
  readonly volumes?: boolean;
}

export interface UpResult {
  readonly started: string[];
  readonly networks: StackNetworks;
  readonly containers: Record<string, Container>;
}

export interface DownResult {
  readonly containers: string[];
  readonly networks: string[];
  readonly volumes: string[];
}

/**
 * Brings the stack's services up and down. Calls on one Stack never overlap.
 */
export class Stack {
  // Only one up/down at a time
  private readonly mutex = new Mutex();

  constructor(
    private readonly docker: Docker,
    readonly manifest: StackManifest,
    private readonly readiness: ReadinessConfig,
  ) {}

  up(options: UpOptions = {}): Promise<UpResult> {
    return this.mutex.runExclusive(() => this.launch(options));
  }

  down(options: DownOptions = {}): Promise<DownResult> {
    return this.mutex.runExclusive(() => this.teardown(options));
  }

  private selectServices(names?: string[]): ServiceDefinition[] {
    const ordered = resolveStartupOrder(this.manifest);
    if (names === undefined) {
      return ordered;
    }
    const wanted = new Set<string>();
    const include = (name: string) => {
      if (wanted.has(name)) {
        return;
      }
      wanted.add(name);
      getService(this.manifest, name).dependsOn.forEach(include);
    };
    names.forEach(include);
    return ordered.filter((service) => wanted.has(service.name));
  }

  private async launch(options: UpOptions): Promise<UpResult> {
    const startTime = Date.now();
    const services = this.selectServices(options.services);
    logger.info(
      { project: this.manifest.project, services: services.map((s) => s.name) },
      "Starting stack",
    );

    try {
      const networks = await ensureNetworks(this.docker, this.manifest);
      await ensureVolumes(this.docker, this.manifest);

      const launched = new Map<string, Container>();
      for (const service of services) {
        await ensureServiceImage(this.docker, this.manifest, service, {
          force: options.build,
        });
        // Dependencies must be healthy before the service's own startup runs
        for (const dependency of service.dependsOn) {
          const container = launched.get(dependency);
          if (container) {
            await waitForHealthy(
              container,
              getService(this.manifest, dependency),
              this.readiness,
            );
          }
        }
        launched.set(
          service.name,
          await launchServiceContainer(
            this.docker,
            this.manifest,
            service,
            networks,
          ),
        );
      }

      if (options.wait) {
        for (const [name, container] of launched) {
          await waitForHealthy(
            container,
            getService(this.manifest, name),
            this.readiness,
          );
        }
      }

      logger.info(
        { started: [...launched.keys()], durationMs: Date.now() - startTime },
        "Stack is up",
      );
      return {
        started: [...launched.keys()],
        networks,
        containers: Object.fromEntries(launched),
      };
    } catch (error) {
      logger.error(
        { error, ...describeError(error), durationMs: Date.now() - startTime },
        "Failed to start stack",
      );
      throw error;
    }
  }

  private async teardown(options: DownOptions): Promise<DownResult> {
    logger.info(
      { project: this.manifest.project, volumes: options.volumes ?? false },
      "Stopping stack",
    );
    const containers = await removeServiceContainers(
      this.docker,
      this.manifest,
    );
    const networks = await removeStackNetworks(this.docker, this.manifest);
    const volumes = options.volumes
      ? await removeStackVolumes(this.docker, this.manifest)
      : [];
    logger.info({ containers, networks, volumes }, "Stack is down");
    return { containers, networks, volumes };
  }
}
